import { z } from 'zod/v4';

import { CrimeEvent } from '../../../../domain/entities/crime-event.entity.js';
import { Language } from '../../../../domain/value-objects/language.vo.js';
import { RelevanceScore } from '../../../../domain/value-objects/relevance-score.vo.js';

export const crimeEventRowSchema = z.object({
    ingested_at: z.string(),
    language: z.string(),
    latitude: z.number(),
    link: z.string(),
    longitude: z.number(),
    place_label: z.string(),
    published_at: z.string(),
    score: z.number(),
    title: z.string(),
});

export type CrimeEventRow = z.infer<typeof crimeEventRowSchema>;

export class EventMapper {
    toDomain(row: CrimeEventRow): CrimeEvent {
        return new CrimeEvent({
            ingestedAt: new Date(row.ingested_at),
            language: new Language(row.language),
            latitude: row.latitude,
            link: row.link,
            longitude: row.longitude,
            placeLabel: row.place_label,
            publishedAt: new Date(row.published_at),
            score: new RelevanceScore(row.score),
            title: row.title,
        });
    }

    toRow(event: CrimeEvent): CrimeEventRow {
        return {
            ingested_at: event.ingestedAt.toISOString(),
            language: event.language.toString(),
            latitude: event.latitude,
            link: event.link,
            longitude: event.longitude,
            place_label: event.placeLabel,
            published_at: event.publishedAt.toISOString(),
            score: event.score.value,
            title: event.title,
        };
    }
}
