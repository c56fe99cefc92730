// Domain
import { type LanguageEnum } from '../../../domain/value-objects/language.vo.js';

import { type LoggerLevel } from '../../../shared/logger/logger.port.js';

/**
 * Configuration port providing access to application settings
 */
export interface ConfigurationPort {
    /**
     * Get the inbound configuration
     */
    getInboundConfiguration(): InboundConfigurationPort;

    /**
     * Get the outbound configuration
     */
    getOutboundConfiguration(): OutboundConfigurationPort;
}

/**
 * Inbound configuration (defined by the user)
 */
export interface InboundConfigurationPort {
    env: 'development' | 'production' | 'test';
    http: {
        host: string;
        port: number;
    };
    logger: {
        level: LoggerLevel;
        prettyPrint: boolean;
    };
    pipeline: PipelineConfigurationPort;
    tasks: {
        crimePipeline: CrimePipelineTaskConfig;
    };
}

/**
 * Outbound configuration (defined by external services)
 */
export interface OutboundConfigurationPort {
    heatmap: {
        outputFile: string;
    };
    nominatim: {
        baseUrl: string;
        requestsPerSecond: number;
        timeoutMs: number;
        userAgent: string;
    };
    sqlite: {
        databasePath: string;
    };
    webClient: {
        timeoutMs: number;
        userAgent: string;
    };
}

/**
 * Pipeline policy: acceptance gate, duplicate threshold, pacing and place extraction table
 */
export interface PipelineConfigurationPort {
    itemsPerSecond: number;
    minimumScore: number;
    placeExtraction: Record<LanguageEnum, string>;
    similarityThreshold: number;
}

/**
 * Crime pipeline task configuration
 */
export interface CrimePipelineTaskConfig {
    enabled: boolean;
    executeOnStartup: boolean;
    feeds: string[];
    maxItems: number;
    schedule: string;
    since: string;
}
