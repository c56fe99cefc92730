import { type Language } from '../../../../domain/value-objects/language.vo.js';

export const MAX_PLACE_CANDIDATES = 5;

/**
 * Produces location entities for the languages it was built for
 */
export interface PlaceExtractionPort {
    /**
     * Up to five place names, deduplicated ignoring case, in order of appearance
     */
    extractPlaces(text: string): string[];
}

/**
 * Resolves the place extractor serving each supported language
 */
export interface PlaceExtractorRegistryPort {
    forLanguage(language: Language): PlaceExtractionPort;
}
