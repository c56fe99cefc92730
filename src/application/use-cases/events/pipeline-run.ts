import { createHash } from 'node:crypto';

// Domain
import { NearDuplicateIndex } from '../../../domain/services/near-duplicate-index.js';

export const itemOutcomes = [
    'SAVED',
    'REJECTED_LOW_SCORE',
    'DUPLICATE_REJECTED',
    'PLACE_UNRESOLVED',
    'FAILED',
] as const;

/**
 * Terminal state of one feed item
 */
export type ItemOutcome = (typeof itemOutcomes)[number];

/**
 * Result of one pipeline stage: the value to carry on with, or the outcome ending the item
 */
export type StageResult<T> =
    | { ok: false; outcome: Exclude<ItemOutcome, 'SAVED'>; reason: string }
    | { ok: true; value: T };

export const proceed = <T>(value: T): StageResult<T> => ({ ok: true, value });

export const stop = <T>(outcome: Exclude<ItemOutcome, 'SAVED'>, reason: string): StageResult<T> => ({
    ok: false,
    outcome,
    reason,
});

export interface PipelineRunResult {
    aggregatedPoints: number;
    itemsProcessed: number;
    itemsSaved: number;
    outcomes: Record<ItemOutcome, number>;
    /**
     * Handle of the rendered heat map, null when rendering failed
     */
    renderingArtifact: null | string;
}

/**
 * State owned by a single run and discarded with it
 */
export class PipelineRunContext {
    public readonly index: NearDuplicateIndex;
    public readonly startedAt = new Date();

    private readonly outcomes: Record<ItemOutcome, number> = {
        DUPLICATE_REJECTED: 0,
        FAILED: 0,
        PLACE_UNRESOLVED: 0,
        REJECTED_LOW_SCORE: 0,
        SAVED: 0,
    };

    constructor(options: { similarityThreshold: number }) {
        this.index = new NearDuplicateIndex({ threshold: options.similarityThreshold });
    }

    public get itemsProcessed(): number {
        return itemOutcomes.reduce((total, outcome) => total + this.outcomes[outcome], 0);
    }

    public count(outcome: ItemOutcome): number {
        return this.outcomes[outcome];
    }

    public record(outcome: ItemOutcome): void {
        this.outcomes[outcome]++;
    }

    public summary(): Record<ItemOutcome, number> {
        return { ...this.outcomes };
    }
}

/**
 * Stable index key of an article link
 */
export const signatureKeyOf = (link: string): string =>
    createHash('sha1').update(link, 'utf8').digest('hex');
