import { z } from 'zod/v4';

export const relevanceScoreSchema = z
    .number()
    .min(0)
    .max(1)
    .describe('How strongly a document reads as crime reporting, from 0 to 1.');

/**
 * @description Bounded relevance of a document to crime reporting
 */
export class RelevanceScore {
    public readonly value: number;

    constructor(value: number) {
        this.value = relevanceScoreSchema.parse(value);
    }

    public isAtLeast(threshold: number): boolean {
        return this.value >= threshold;
    }

    public toString(): string {
        return this.value.toFixed(3);
    }
}
