import nlp from 'compromise';
import { z } from 'zod/v4';

// Application
import {
    MAX_PLACE_CANDIDATES,
    type PlaceExtractionPort,
} from '../../../application/ports/outbound/providers/place-extraction.port.js';

const placeListSchema = z.array(z.string());

/**
 * Keeps the first occurrence of each name, compared without case, up to the candidate limit
 */
export const uniquePlaceNames = (names: string[]): string[] => {
    const seen = new Set<string>();
    const unique: string[] = [];

    for (const name of names) {
        const trimmed = name.trim();
        const key = trimmed.toLowerCase();
        if (!trimmed || seen.has(key)) {
            continue;
        }
        seen.add(key);
        unique.push(trimmed);
        if (unique.length === MAX_PLACE_CANDIDATES) {
            break;
        }
    }

    return unique;
};

/**
 * Place names found by the compromise rule-based tagger
 */
export class CompromisePlaceExtractor implements PlaceExtractionPort {
    public extractPlaces(text: string): string[] {
        if (!text.trim()) {
            return [];
        }

        const places = placeListSchema.parse(nlp(text).places().out('array'));

        // The tagger keeps trailing punctuation on some matches
        return uniquePlaceNames(places.map((place) => place.replace(/[.,;:!?]+$/, '')));
    }
}
