import { Container, Injectable } from '@snap/ts-inject';
import { default as nodeConfiguration } from 'config';

// Configuration
import type { ConfigurationPort } from '../application/ports/inbound/configuration.port.js';
import {
    type ConfigurationOverrides,
    NodeConfig,
} from '../infrastructure/inbound/configuration/node-config.js';

// Application
import type { ServerPort } from '../application/ports/inbound/server.port.js';
import type { TaskPort, WorkerPort } from '../application/ports/inbound/worker.port.js';
import type { EventRepositoryPort } from '../application/ports/outbound/persistence/event-repository.port.js';
import type { FeedProviderPort } from '../application/ports/outbound/providers/feed.port.js';
import type { GeocodingPort } from '../application/ports/outbound/providers/geocoding.port.js';
import type { LanguageDetectionPort } from '../application/ports/outbound/providers/language-detection.port.js';
import type { PlaceExtractorRegistryPort } from '../application/ports/outbound/providers/place-extraction.port.js';
import type { TextExtractionPort } from '../application/ports/outbound/providers/text-extraction.port.js';
import type { HeatmapRendererPort } from '../application/ports/outbound/rendering/heatmap-renderer.port.js';
import { AggregateEventDensityUseCase } from '../application/use-cases/events/aggregate-event-density.use-case.js';
import { IngestCrimeEventsUseCase } from '../application/use-cases/events/ingest-crime-events.use-case.js';
import { ResolveEventLocationUseCase } from '../application/use-cases/events/resolve-event-location.use-case.js';

// Infrastructure
import { GetDensityController } from '../infrastructure/inbound/server/density/get-density.controller.js';
import { HonoServer } from '../infrastructure/inbound/server/hono.server.js';
import { CrimePipelineTask } from '../infrastructure/inbound/worker/events/crime-pipeline.task.js';
import { NodeCronAdapter } from '../infrastructure/inbound/worker/node-cron.adapter.js';
import { NominatimGeocoder } from '../infrastructure/outbound/geocoding/nominatim.geocoder.js';
import { SqliteEventRepository } from '../infrastructure/outbound/persistence/event/sqlite-event.repository.js';
import { SqliteDatabase } from '../infrastructure/outbound/persistence/sqlite.database.js';
import { CompromisePlaceExtractor } from '../infrastructure/outbound/places/compromise-place.extractor.js';
import { PlaceExtractorRegistry } from '../infrastructure/outbound/places/place-extractor.registry.js';
import { FrancLanguageDetector } from '../infrastructure/outbound/providers/franc-language.detector.js';
import { ReadabilityTextExtractor } from '../infrastructure/outbound/providers/readability-text.extractor.js';
import { RssFeedProvider } from '../infrastructure/outbound/providers/rss-feed.provider.js';
import { LeafletHeatmapRenderer } from '../infrastructure/outbound/rendering/leaflet-heatmap.renderer.js';

import { type LoggerPort } from '../shared/logger/logger.port.js';
import { PinoLoggerAdapter } from '../shared/logger/pino-logger.adapter.js';
import { type RateLimiterPort } from '../shared/rate-limit/rate-limiter.port.js';
import { TokenBucketRateLimiter } from '../shared/rate-limit/token-bucket.rate-limiter.js';

/**
 * Outbound adapters
 */
const databaseFactory = Injectable(
    'Database',
    ['Logger', 'Configuration'] as const,
    (logger: LoggerPort, config: ConfigurationPort) =>
        new SqliteDatabase(logger, config.getOutboundConfiguration().sqlite.databasePath),
);

const loggerFactory = Injectable(
    'Logger',
    ['Configuration'] as const,
    (config: ConfigurationPort) =>
        new PinoLoggerAdapter({
            level: config.getInboundConfiguration().logger.level,
            prettyPrint: config.getInboundConfiguration().logger.prettyPrint,
        }),
);

const feedProviderFactory = Injectable(
    'FeedProvider',
    ['Configuration', 'Logger'] as const,
    (config: ConfigurationPort, logger: LoggerPort): FeedProviderPort =>
        new RssFeedProvider(config.getOutboundConfiguration().webClient, logger),
);

const textExtractorFactory = Injectable(
    'TextExtractor',
    ['Configuration', 'Logger'] as const,
    (config: ConfigurationPort, logger: LoggerPort): TextExtractionPort =>
        new ReadabilityTextExtractor(config.getOutboundConfiguration().webClient, logger),
);

const languageDetectorFactory = Injectable(
    'LanguageDetector',
    (): LanguageDetectionPort => new FrancLanguageDetector(),
);

const placeExtractorsFactory = Injectable(
    'PlaceExtractors',
    ['Configuration', 'Logger'] as const,
    (config: ConfigurationPort, logger: LoggerPort): PlaceExtractorRegistryPort =>
        new PlaceExtractorRegistry(
            config.getInboundConfiguration().pipeline.placeExtraction,
            { compromise: new CompromisePlaceExtractor() },
            logger,
        ),
);

const geocoderFactory = Injectable(
    'Geocoder',
    ['Configuration', 'Logger'] as const,
    (config: ConfigurationPort, logger: LoggerPort): GeocodingPort => {
        const nominatim = config.getOutboundConfiguration().nominatim;
        logger.info('Initializing geocoder', {
            baseUrl: nominatim.baseUrl,
            requestsPerSecond: nominatim.requestsPerSecond,
        });
        return new NominatimGeocoder(
            nominatim,
            new TokenBucketRateLimiter({ tokensPerSecond: nominatim.requestsPerSecond }),
            logger,
        );
    },
);

const heatmapRendererFactory = Injectable(
    'HeatmapRenderer',
    ['Configuration', 'Logger'] as const,
    (config: ConfigurationPort, logger: LoggerPort): HeatmapRendererPort =>
        new LeafletHeatmapRenderer(config.getOutboundConfiguration().heatmap, logger),
);

const itemRateLimiterFactory = Injectable(
    'ItemRateLimiter',
    ['Configuration'] as const,
    (config: ConfigurationPort): RateLimiterPort =>
        new TokenBucketRateLimiter({
            tokensPerSecond: config.getInboundConfiguration().pipeline.itemsPerSecond,
        }),
);

/**
 * Repository adapters
 */
const eventRepositoryFactory = Injectable(
    'EventRepository',
    ['Database', 'Logger'] as const,
    (db: SqliteDatabase, logger: LoggerPort): EventRepositoryPort => {
        logger.info('Initializing Event repository', { repository: 'SqliteEvent' });
        return new SqliteEventRepository(db, logger);
    },
);

/**
 * Use case factories
 */
const resolveEventLocationUseCaseFactory = Injectable(
    'ResolveEventLocation',
    ['Geocoder', 'Logger'] as const,
    (geocoder: GeocodingPort, logger: LoggerPort) =>
        new ResolveEventLocationUseCase(geocoder, logger),
);

const aggregateEventDensityUseCaseFactory = Injectable(
    'AggregateEventDensity',
    ['EventRepository', 'Logger'] as const,
    (eventRepository: EventRepositoryPort, logger: LoggerPort) =>
        new AggregateEventDensityUseCase(eventRepository, logger),
);

const ingestCrimeEventsUseCaseFactory = Injectable(
    'IngestCrimeEvents',
    [
        'FeedProvider',
        'TextExtractor',
        'LanguageDetector',
        'PlaceExtractors',
        'ResolveEventLocation',
        'EventRepository',
        'AggregateEventDensity',
        'HeatmapRenderer',
        'ItemRateLimiter',
        'Configuration',
        'Logger',
    ] as const,
    (
        feedProvider: FeedProviderPort,
        textExtractor: TextExtractionPort,
        languageDetector: LanguageDetectionPort,
        placeExtractors: PlaceExtractorRegistryPort,
        resolveEventLocation: ResolveEventLocationUseCase,
        eventRepository: EventRepositoryPort,
        aggregateEventDensity: AggregateEventDensityUseCase,
        heatmapRenderer: HeatmapRendererPort,
        itemRateLimiter: RateLimiterPort,
        config: ConfigurationPort,
        logger: LoggerPort,
    ) => {
        const { minimumScore, similarityThreshold } = config.getInboundConfiguration().pipeline;
        return new IngestCrimeEventsUseCase(
            feedProvider,
            textExtractor,
            languageDetector,
            placeExtractors,
            resolveEventLocation,
            eventRepository,
            aggregateEventDensity,
            heatmapRenderer,
            itemRateLimiter,
            { minimumScore, similarityThreshold },
            logger,
        );
    },
);

/**
 * Controller factories
 */
const controllersFactory = Injectable(
    'Controllers',
    ['AggregateEventDensity'] as const,
    (aggregateEventDensity: AggregateEventDensityUseCase) => ({
        getDensity: new GetDensityController(aggregateEventDensity),
    }),
);

/**
 * Task factories
 */
const tasksFactory = Injectable(
    'Tasks',
    ['IngestCrimeEvents', 'Configuration', 'Logger'] as const,
    (
        ingestCrimeEvents: IngestCrimeEventsUseCase,
        configuration: ConfigurationPort,
        logger: LoggerPort,
    ): TaskPort[] => {
        const tasks: TaskPort[] = [];

        const crimePipelineConfig = configuration.getInboundConfiguration().tasks.crimePipeline;
        if (crimePipelineConfig.enabled) {
            tasks.push(new CrimePipelineTask(ingestCrimeEvents, crimePipelineConfig, logger));
        }

        return tasks;
    },
);

/**
 * Inbound adapters
 */
const configurationFactory = (overrides?: ContainerOverrides) =>
    Injectable('Configuration', () => new NodeConfig(nodeConfiguration, overrides));

const serverFactory = Injectable(
    'Server',
    ['Logger', 'Controllers'] as const,
    (logger: LoggerPort, controllers: { getDensity: GetDensityController }): ServerPort => {
        logger.info('Initializing Server', { implementation: 'Hono' });
        return new HonoServer(logger, controllers.getDensity);
    },
);

const workerFactory = Injectable(
    'Worker',
    ['Logger', 'Tasks'] as const,
    (logger: LoggerPort, tasks: TaskPort[]): WorkerPort => {
        logger.info('Initializing Worker', { implementation: 'NodeCron' });
        return new NodeCronAdapter(logger, tasks);
    },
);

/**
 * Container configuration
 */
export type ContainerOverrides = ConfigurationOverrides;

export const createContainer = (overrides?: ContainerOverrides) =>
    Container
        // Outbound adapters
        .provides(configurationFactory(overrides))
        .provides(loggerFactory)
        .provides(databaseFactory)
        .provides(feedProviderFactory)
        .provides(textExtractorFactory)
        .provides(languageDetectorFactory)
        .provides(placeExtractorsFactory)
        .provides(geocoderFactory)
        .provides(heatmapRendererFactory)
        .provides(itemRateLimiterFactory)
        // Repositories
        .provides(eventRepositoryFactory)
        // Use cases
        .provides(resolveEventLocationUseCaseFactory)
        .provides(aggregateEventDensityUseCaseFactory)
        .provides(ingestCrimeEventsUseCaseFactory)
        // Controllers and tasks
        .provides(controllersFactory)
        .provides(tasksFactory)
        // Inbound adapters
        .provides(serverFactory)
        .provides(workerFactory);
