// Domain
import { CrimeEvent } from '../../../domain/entities/crime-event.entity.js';
import { buildSignature } from '../../../domain/services/minhash-signature.js';
import { type AggregatedPoint } from '../../../domain/services/spatial-aggregator.js';
import { scoreRelevance } from '../../../domain/services/relevance-scorer.js';
import { type ResolvedLocation } from '../../../domain/value-objects/coordinates.vo.js';
import { Language } from '../../../domain/value-objects/language.vo.js';
import { type RelevanceScore } from '../../../domain/value-objects/relevance-score.vo.js';

import { type LoggerPort } from '../../../shared/logger/logger.port.js';
import { type RateLimiterPort } from '../../../shared/rate-limit/rate-limiter.port.js';

import { PipelineFatalError } from '../../errors/pipeline.errors.js';

// Ports
import { type EventRepositoryPort } from '../../ports/outbound/persistence/event-repository.port.js';
import { type CandidateItem, type FeedProviderPort } from '../../ports/outbound/providers/feed.port.js';
import { type LanguageDetectionPort } from '../../ports/outbound/providers/language-detection.port.js';
import { type PlaceExtractorRegistryPort } from '../../ports/outbound/providers/place-extraction.port.js';
import { type TextExtractionPort } from '../../ports/outbound/providers/text-extraction.port.js';
import { type HeatmapRendererPort } from '../../ports/outbound/rendering/heatmap-renderer.port.js';

import { type AggregateEventDensityUseCase } from './aggregate-event-density.use-case.js';
import {
    type ItemOutcome,
    PipelineRunContext,
    type PipelineRunResult,
    proceed,
    signatureKeyOf,
    type StageResult,
    stop,
} from './pipeline-run.js';
import { type ResolveEventLocationUseCase } from './resolve-event-location.use-case.js';

export interface IngestCrimeEventsPolicy {
    minimumScore: number;
    similarityThreshold: number;
}

export interface IngestCrimeEventsRequest {
    feeds: string[];
    maxItems: number;
    since: Date;
}

interface ScoredDocument {
    language: Language;
    score: RelevanceScore;
    text: string;
}

/**
 * Use case running one pass of the crime pipeline
 * @description Reads the feeds, then takes every item in order through text extraction,
 * language detection, scoring, near-duplicate filtering, place resolution and storage.
 * An item failing at any stage is dropped and counted; only fatal errors end the run.
 */
export class IngestCrimeEventsUseCase {
    constructor(
        private readonly feedProvider: FeedProviderPort,
        private readonly textExtractor: TextExtractionPort,
        private readonly languageDetector: LanguageDetectionPort,
        private readonly placeExtractors: PlaceExtractorRegistryPort,
        private readonly resolveEventLocation: ResolveEventLocationUseCase,
        private readonly eventRepository: EventRepositoryPort,
        private readonly aggregateEventDensity: AggregateEventDensityUseCase,
        private readonly heatmapRenderer: HeatmapRendererPort,
        private readonly itemRateLimiter: RateLimiterPort,
        private readonly policy: IngestCrimeEventsPolicy,
        private readonly logger: LoggerPort,
    ) {}

    public async execute(request: IngestCrimeEventsRequest): Promise<PipelineRunResult> {
        try {
            this.logger.info('Starting crime pipeline run', {
                feeds: request.feeds.length,
                maxItems: request.maxItems,
                since: request.since.toISOString(),
            });

            const context = new PipelineRunContext({
                similarityThreshold: this.policy.similarityThreshold,
            });

            // Step 1: Collect candidate items
            const fetchedItems = await this.feedProvider.fetchItems({
                feeds: request.feeds,
                since: request.since,
            });
            const items = fetchedItems.slice(0, Math.max(0, request.maxItems));

            this.logger.info('Candidate items collected', {
                fetched: fetchedItems.length,
                kept: items.length,
            });

            // Step 2: Process items one by one, in feed order
            for (const item of items) {
                const outcome = await this.processItemSafely(item, context);
                context.record(outcome);

                if (outcome === 'SAVED') {
                    await this.itemRateLimiter.acquire();
                }
            }

            // Step 3: Summarise the store
            const points = await this.aggregateEventDensity.execute();
            const renderingArtifact = await this.render(points);

            const result: PipelineRunResult = {
                aggregatedPoints: points.length,
                itemsProcessed: context.itemsProcessed,
                itemsSaved: context.count('SAVED'),
                outcomes: context.summary(),
                renderingArtifact,
            };

            this.logger.info('Crime pipeline run completed', {
                ...result,
                durationMs: Date.now() - context.startedAt.getTime(),
            });

            return result;
        } catch (error) {
            this.logger.error('Crime pipeline run encountered an error', { error });
            throw error;
        }
    }

    private detectLanguage(text: string): Language {
        try {
            return this.languageDetector.detect(text);
        } catch (error) {
            this.logger.debug('Language detection failed, using fallback', { error });
            return Language.fallback();
        }
    }

    private async extractText(item: CandidateItem): Promise<StageResult<string>> {
        try {
            return proceed(await this.textExtractor.extract(item.link));
        } catch (error) {
            this.logger.warn('Text extraction failed', { error, link: item.link });
            return stop('FAILED', 'text extraction failed');
        }
    }

    private filterDuplicate(
        item: CandidateItem,
        document: ScoredDocument,
        context: PipelineRunContext,
    ): StageResult<ScoredDocument> {
        const key = signatureKeyOf(item.link);
        if (context.index.has(key)) {
            return stop('DUPLICATE_REJECTED', 'link already seen in this run');
        }

        const signature = buildSignature(document.text);
        const duplicateOf = context.index.findDuplicateOf(signature);
        if (duplicateOf) {
            return stop('DUPLICATE_REJECTED', `near-duplicate of ${duplicateOf}`);
        }

        context.index.insert(key, signature);
        return proceed(document);
    }

    private async locate(document: ScoredDocument): Promise<StageResult<ResolvedLocation>> {
        const candidates = this.placeExtractors
            .forLanguage(document.language)
            .extractPlaces(document.text);

        if (candidates.length === 0) {
            return stop('PLACE_UNRESOLVED', 'no place candidate');
        }

        const location = await this.resolveEventLocation.execute(candidates);
        if (!location) {
            return stop('PLACE_UNRESOLVED', 'no candidate could be geocoded');
        }

        return proceed(location);
    }

    private async processItem(
        item: CandidateItem,
        context: PipelineRunContext,
    ): Promise<ItemOutcome> {
        const text = await this.extractText(item);
        if (!text.ok) {
            return this.terminate(item, text);
        }

        const scored = this.score(text.value);
        if (!scored.ok) {
            return this.terminate(item, scored);
        }

        const unique = this.filterDuplicate(item, scored.value, context);
        if (!unique.ok) {
            return this.terminate(item, unique);
        }

        const location = await this.locate(unique.value);
        if (!location.ok) {
            return this.terminate(item, location);
        }

        const event = new CrimeEvent({
            ingestedAt: new Date(),
            language: unique.value.language,
            latitude: location.value.latitude,
            link: item.link,
            longitude: location.value.longitude,
            placeLabel: location.value.label,
            publishedAt: item.publishedAt,
            score: unique.value.score,
            title: item.title,
        });

        const inserted = await this.eventRepository.insertIfNew(event);

        this.logger.info('Crime event saved', {
            alreadyStored: !inserted,
            link: item.link,
            place: event.placeLabel,
            score: event.score.value,
        });

        return 'SAVED';
    }

    /**
     * Turns any unexpected error into a failed item; fatal errors end the run
     */
    private async processItemSafely(
        item: CandidateItem,
        context: PipelineRunContext,
    ): Promise<ItemOutcome> {
        try {
            return await this.processItem(item, context);
        } catch (error) {
            if (error instanceof PipelineFatalError) {
                throw error;
            }

            this.logger.warn('Error while processing feed item', { error, link: item.link });
            return 'FAILED';
        }
    }

    private async render(points: AggregatedPoint[]): Promise<null | string> {
        try {
            return await this.heatmapRenderer.render(points);
        } catch (error) {
            this.logger.error('Heat map rendering failed', { error, points: points.length });
            return null;
        }
    }

    private score(text: string): StageResult<ScoredDocument> {
        const language = this.detectLanguage(text);
        const score = scoreRelevance(text, language);

        if (!score.isAtLeast(this.policy.minimumScore)) {
            return stop('REJECTED_LOW_SCORE', `score ${score.toString()}`);
        }

        return proceed({ language, score, text });
    }

    private terminate(
        item: CandidateItem,
        result: Extract<StageResult<unknown>, { ok: false }>,
    ): ItemOutcome {
        this.logger.debug('Feed item dropped', {
            link: item.link,
            outcome: result.outcome,
            reason: result.reason,
        });
        return result.outcome;
    }
}
