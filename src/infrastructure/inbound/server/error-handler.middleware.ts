import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';

import type { LoggerPort } from '../../../shared/logger/logger.port.js';

/**
 * Creates a global error handling middleware for Hono
 */
export const createErrorHandlerMiddleware = (logger: LoggerPort) => {
    return async (err: Error, c: Context) => {
        if (err instanceof HTTPException) {
            logger.warn('Rejected HTTP request', { error: err.message, path: c.req.path });
            return c.json({ error: err.message }, err.status);
        }

        logger.error('Unexpected error in HTTP handler', { error: err, path: c.req.path });

        return c.json({ error: 'Internal server error' }, 500);
    };
};
