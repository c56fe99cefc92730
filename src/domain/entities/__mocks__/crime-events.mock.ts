import { Language } from '../../value-objects/language.vo.js';
import { RelevanceScore } from '../../value-objects/relevance-score.vo.js';
import { CrimeEvent } from '../crime-event.entity.js';

/**
 * Generates a single mock `CrimeEvent` with optional overrides.
 */
export function getMockCrimeEvent(options?: {
    latitude?: number;
    link?: string;
    longitude?: number;
    placeLabel?: string;
    score?: number;
    title?: string;
}): CrimeEvent {
    return new CrimeEvent({
        ingestedAt: new Date('2024-03-10T12:00:00.000Z'),
        language: new Language('EN'),
        latitude: options?.latitude ?? -22.9068,
        link: options?.link ?? 'https://news.test/articles/mock-robbery',
        longitude: options?.longitude ?? -43.1729,
        placeLabel: options?.placeLabel ?? 'Rio de Janeiro',
        publishedAt: new Date('2024-03-10T08:30:00.000Z'),
        score: new RelevanceScore(options?.score ?? 0.84),
        title: options?.title ?? 'Armed robbery reported near the harbour',
    });
}

/**
 * Generates mock `CrimeEvent` entities with distinct links.
 */
export function mockCrimeEvents(count: number): CrimeEvent[] {
    return Array.from({ length: count }, (_, index) =>
        getMockCrimeEvent({ link: `https://news.test/articles/mock-${index}` }),
    );
}
