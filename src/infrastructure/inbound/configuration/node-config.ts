import { z } from 'zod/v4';

// Configuration
import {
    type ConfigurationPort,
    type InboundConfigurationPort,
    type OutboundConfigurationPort,
} from '../../../application/ports/inbound/configuration.port.js';

import { loggerLevelSchema } from '../../../shared/logger/logger.port.js';

const unitIntervalSchema = z.coerce.number().min(0).max(1);

const configurationSchema = z.object({
    inbound: z.object({
        env: z.enum(['development', 'production', 'test']),
        http: z.object({
            host: z.string(),
            port: z.coerce.number().int().nonnegative(),
        }),
        logger: z.object({
            level: loggerLevelSchema,
            prettyPrint: z.boolean(),
        }),
        pipeline: z.object({
            itemsPerSecond: z.coerce.number().positive(),
            minimumScore: unitIntervalSchema,
            placeExtraction: z.object({
                EN: z.string().min(1),
                PT: z.string().min(1),
            }),
            similarityThreshold: unitIntervalSchema.refine((value) => value > 0, {
                message: 'The similarity threshold must be above 0',
            }),
        }),
        tasks: z.object({
            crimePipeline: z.object({
                enabled: z.boolean().default(true),
                executeOnStartup: z.boolean().default(false),
                feeds: z.array(z.url()).min(1),
                maxItems: z.coerce.number().int().positive(),
                schedule: z.string().min(1),
                since: z.iso.datetime({ offset: true }),
            }),
        }),
    }),
    outbound: z.object({
        heatmap: z.object({
            outputFile: z.string().min(1),
        }),
        nominatim: z.object({
            baseUrl: z.url(),
            requestsPerSecond: z.coerce.number().positive(),
            timeoutMs: z.coerce.number().int().positive(),
            userAgent: z.string().min(1),
        }),
        sqlite: z.object({
            databasePath: z.string().min(1),
        }),
        webClient: z.object({
            timeoutMs: z.coerce.number().int().positive(),
            userAgent: z.string().min(1),
        }),
    }),
});

type Configuration = z.infer<typeof configurationSchema>;

export interface ConfigurationOverrides {
    databasePath?: string;
    heatmapOutputFile?: string;
}

/**
 * Node.js configuration loader backed by node-config
 */
export class NodeConfig implements ConfigurationPort {
    private readonly configuration: Configuration;

    constructor(configurationInput: unknown, overrides?: ConfigurationOverrides) {
        // Parse and validate first
        const parsed = configurationSchema.parse(configurationInput);

        // Apply overrides after parsing
        if (overrides?.databasePath) {
            parsed.outbound.sqlite.databasePath = overrides.databasePath;
        }
        if (overrides?.heatmapOutputFile) {
            parsed.outbound.heatmap.outputFile = overrides.heatmapOutputFile;
        }

        this.configuration = parsed;
    }

    public getInboundConfiguration(): InboundConfigurationPort {
        return this.configuration.inbound;
    }

    public getOutboundConfiguration(): OutboundConfigurationPort {
        return this.configuration.outbound;
    }
}
