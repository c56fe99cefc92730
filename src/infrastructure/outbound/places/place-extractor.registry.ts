// Application
import { PlaceExtractionUnavailableError } from '../../../application/errors/pipeline.errors.js';
import {
    type PlaceExtractionPort,
    type PlaceExtractorRegistryPort,
} from '../../../application/ports/outbound/providers/place-extraction.port.js';

// Domain
import {
    Language,
    languageSchema,
    type LanguageEnum,
} from '../../../domain/value-objects/language.vo.js';

import { type LoggerPort } from '../../../shared/logger/logger.port.js';

/**
 * Implementations known to the process, by the name used in configuration
 */
export type PlaceExtractorImplementations = Record<string, PlaceExtractionPort>;

/**
 * Binds every supported language to its configured place extractor.
 * Construction fails when a language names an implementation that is not available.
 */
export class PlaceExtractorRegistry implements PlaceExtractorRegistryPort {
    private readonly extractors: Map<LanguageEnum, PlaceExtractionPort>;

    constructor(
        selection: Record<LanguageEnum, string>,
        implementations: PlaceExtractorImplementations,
        logger: LoggerPort,
    ) {
        this.extractors = new Map();

        for (const language of languageSchema.options) {
            const name = selection[language];
            const extractor = Object.hasOwn(implementations, name)
                ? implementations[name]
                : undefined;

            if (!extractor) {
                throw new PlaceExtractionUnavailableError(
                    `No place extractor "${name}" available for ${language}. Available extractors are: ${Object.keys(implementations).join(', ')}`,
                );
            }

            this.extractors.set(language, extractor);
        }

        logger.debug('Place extractors ready', { ...selection });
    }

    public forLanguage(language: Language): PlaceExtractionPort {
        const extractor = this.extractors.get(language.value);
        if (!extractor) {
            throw new PlaceExtractionUnavailableError(
                `No place extractor configured for ${language.toString()}`,
            );
        }
        return extractor;
    }
}
