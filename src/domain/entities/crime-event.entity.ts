import { z } from 'zod/v4';

import { latitudeSchema, longitudeSchema } from '../value-objects/coordinates.vo.js';
import { Language } from '../value-objects/language.vo.js';
import { RelevanceScore } from '../value-objects/relevance-score.vo.js';

export const linkSchema = z
    .string()
    .min(1)
    .describe('The source article link, unique across all stored events.');

export const titleSchema = z.string().min(1).describe('The headline of the source article.');

export const publishedAtSchema = z
    .date()
    .describe('The publication date announced by the feed, or the ingestion time when absent.');

export const languageSchema = z
    .instanceof(Language)
    .describe('The language the article text was detected in.');

export const scoreSchema = z
    .instanceof(RelevanceScore)
    .describe('The crime relevance score computed from the article text.');

export const placeLabelSchema = z
    .string()
    .min(1)
    .describe('The place name that resolved to the event coordinates.');

export const ingestedAtSchema = z
    .date()
    .describe('The timestamp when the event was accepted by the pipeline.');

export const crimeEventSchema = z.object({
    ingestedAt: ingestedAtSchema,
    language: languageSchema,
    latitude: latitudeSchema,
    link: linkSchema,
    longitude: longitudeSchema,
    placeLabel: placeLabelSchema,
    publishedAt: publishedAtSchema,
    score: scoreSchema,
    title: titleSchema,
});

export type CrimeEventProps = z.input<typeof crimeEventSchema>;

/**
 * @description A crime news article accepted by the pipeline and pinned to a location
 */
export class CrimeEvent {
    public readonly ingestedAt: Date;
    public readonly language: Language;
    public readonly latitude: number;
    public readonly link: string;
    public readonly longitude: number;
    public readonly placeLabel: string;
    public readonly publishedAt: Date;
    public readonly score: RelevanceScore;
    public readonly title: string;

    public constructor(data: CrimeEventProps) {
        const result = crimeEventSchema.safeParse(data);

        if (!result.success) {
            throw new Error(`Invalid crime event data: ${result.error.message}`);
        }

        const validatedData = result.data;
        this.link = validatedData.link;
        this.title = validatedData.title;
        this.publishedAt = validatedData.publishedAt;
        this.language = validatedData.language;
        this.score = validatedData.score;
        this.latitude = validatedData.latitude;
        this.longitude = validatedData.longitude;
        this.placeLabel = validatedData.placeLabel;
        this.ingestedAt = validatedData.ingestedAt;
    }
}
