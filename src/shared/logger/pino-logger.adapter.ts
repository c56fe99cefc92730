import { type DestinationStream, type Logger, pino } from 'pino';

import { type LoggerContext, type LoggerLevel, type LoggerPort } from './logger.port.js';

export interface PinoLoggerConfiguration {
    level: LoggerLevel;
    prettyPrint: boolean;
}

/**
 * Pino-backed logger. An `error` key in the context goes through pino's error serializer.
 */
export class PinoLoggerAdapter implements LoggerPort {
    private readonly logger: Logger;

    /**
     * @param destination - Stream receiving JSON lines; pretty printing is ignored when set
     */
    constructor(configuration: PinoLoggerConfiguration, destination?: DestinationStream) {
        const options = {
            level: configuration.level,
            serializers: { error: pino.stdSerializers.err },
        };

        if (destination) {
            this.logger = pino(options, destination);
        } else if (configuration.prettyPrint) {
            this.logger = pino({
                ...options,
                transport: {
                    options: { colorize: true, ignore: 'pid,hostname' },
                    target: 'pino-pretty',
                },
            });
        } else {
            this.logger = pino(options);
        }
    }

    public debug(message: string, context?: LoggerContext): void {
        this.logger.debug(context ?? {}, message);
    }

    public error(message: string, context?: LoggerContext): void {
        this.logger.error(context ?? {}, message);
    }

    public info(message: string, context?: LoggerContext): void {
        this.logger.info(context ?? {}, message);
    }

    public warn(message: string, context?: LoggerContext): void {
        this.logger.warn(context ?? {}, message);
    }
}
