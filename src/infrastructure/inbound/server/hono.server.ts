import { serve } from '@hono/node-server';
import { Hono } from 'hono';

// Application
import {
    type ServerConfiguration,
    type ServerPort,
} from '../../../application/ports/inbound/server.port.js';

import { type LoggerPort } from '../../../shared/logger/logger.port.js';

import { createDensityRouter } from './density/density.routes.js';
import { type GetDensityController } from './density/get-density.controller.js';
import { createErrorHandlerMiddleware } from './error-handler.middleware.js';
import { createHealthRouter } from './health/health.routes.js';

export class HonoServer implements ServerPort {
    private app: Hono;
    private server: null | ReturnType<typeof serve> = null;

    constructor(
        private readonly logger: LoggerPort,
        private readonly getDensityController: GetDensityController,
    ) {
        this.app = new Hono();
        this.setupGlobalMiddleware();
        this.registerRoutes();
    }

    public async request(
        path: string,
        options?: { body?: object | string; headers?: Record<string, string>; method?: string },
    ): Promise<Response> {
        const init: RequestInit = {
            body: options?.body ? JSON.stringify(options.body) : undefined,
            headers: options?.headers,
            method: options?.method,
        };
        return this.app.request(path, init);
    }

    public async start(config: ServerConfiguration): Promise<void> {
        return new Promise((resolve) => {
            this.logger.debug('Starting server', { host: config.host, port: config.port });

            this.server = serve(
                { fetch: this.app.fetch, hostname: config.host, port: config.port },
                (info) => {
                    this.logger.info('Server listening', { host: info.address, port: info.port });
                    resolve();
                },
            );
        });
    }

    public async stop(): Promise<void> {
        const server = this.server;
        if (!server) return;

        this.logger.info('Stopping server');
        await new Promise<void>((resolve, reject) => {
            server.close((error) => (error ? reject(error) : resolve()));
        });
        this.server = null;
        this.logger.info('Server stopped');
    }

    private registerRoutes(): void {
        this.app.route('/', createHealthRouter());
        this.app.route('/density', createDensityRouter(this.getDensityController));
    }

    private setupGlobalMiddleware(): void {
        this.app.onError(createErrorHandlerMiddleware(this.logger));
    }
}
