import type { RequestHandler } from 'msw';
import { setupServer, type SetupServerApi } from 'msw/node';
import { randomUUID } from 'node:crypto';
import { rm } from 'node:fs/promises';
import os from 'node:os';
import { resolve } from 'node:path';

// Application
import { type ServerPort } from '../../src/application/ports/inbound/server.port.js';
import { type TaskPort } from '../../src/application/ports/inbound/worker.port.js';
import { type EventRepositoryPort } from '../../src/application/ports/outbound/persistence/event-repository.port.js';
import { type IngestCrimeEventsUseCase } from '../../src/application/use-cases/events/ingest-crime-events.use-case.js';

// Infrastructure
import { type SqliteDatabase } from '../../src/infrastructure/outbound/persistence/sqlite.database.js';

import { createContainer } from '../../src/di/container.js';

export type IntegrationContext = {
    _internal: { workingDirectory: string };
    database: SqliteDatabase;
    eventRepository: EventRepositoryPort;
    gateways: {
        httpServer: ServerPort;
        tasks: TaskPort[];
    };
    heatmapOutputFile: string;
    ingestCrimeEvents: IngestCrimeEventsUseCase;
    msw: SetupServerApi;
};

/**
 * Builds the application container on a temporary SQLite file, with every HTTP collaborator
 * answered by the given handlers
 */
export async function createIntegrationContext(
    handlers: RequestHandler[] = [],
): Promise<IntegrationContext> {
    const workingDirectory = resolve(os.tmpdir(), `crime-map-${randomUUID()}`);
    const heatmapOutputFile = resolve(workingDirectory, 'heatmap.html');

    const container = createContainer({
        databasePath: resolve(workingDirectory, 'events.sqlite'),
        heatmapOutputFile,
    });

    const database = container.get('Database');
    await database.initialize();

    const msw = setupServer(...handlers);
    msw.listen({ onUnhandledRequest: 'error' });

    return {
        _internal: { workingDirectory },
        database,
        eventRepository: container.get('EventRepository'),
        gateways: {
            httpServer: container.get('Server'),
            tasks: container.get('Tasks'),
        },
        heatmapOutputFile,
        ingestCrimeEvents: container.get('IngestCrimeEvents'),
        msw,
    };
}

/**
 * Issues an HTTP request against the server without opening a socket
 */
export async function executeRequest(
    context: IntegrationContext,
    path: string,
    options?: { body?: object | string; headers?: Record<string, string>; method?: string },
): Promise<Response> {
    return context.gateways.httpServer.request(path, options);
}

/**
 * Execute a background task by name within the integration context.
 * Throws if the task name is not registered.
 */
export async function executeTask(context: IntegrationContext, taskName: string): Promise<void> {
    const task = context.gateways.tasks.find((t) => t.name === taskName);
    if (!task) {
        throw new Error(`Task '${taskName}' not found in integration context.`);
    }
    await task.execute();
}

/**
 * Closes the database and MSW, then removes the temporary files. Should be called in afterAll.
 */
export async function cleanupIntegrationContext(context: IntegrationContext): Promise<void> {
    context.msw.close();
    await context.database.close();
    await rm(context._internal.workingDirectory, { force: true, recursive: true });
}
