import { z } from 'zod/v4';

export const loggerLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export type LoggerLevel = z.infer<typeof loggerLevelSchema>;

export type LoggerContext = Record<string, unknown>;

/**
 * Structured logger used by every adapter and use case
 */
export interface LoggerPort {
    debug(message: string, context?: LoggerContext): void;
    error(message: string, context?: LoggerContext): void;
    info(message: string, context?: LoggerContext): void;
    warn(message: string, context?: LoggerContext): void;
}
