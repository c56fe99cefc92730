import { franc } from 'franc-min';

// Application
import { type LanguageDetectionPort } from '../../../application/ports/outbound/providers/language-detection.port.js';

// Domain
import { Language, type LanguageEnum } from '../../../domain/value-objects/language.vo.js';

const SAMPLE_LENGTH = 2000;

const languageByIso6393: Record<string, LanguageEnum> = {
    eng: 'EN',
    por: 'PT',
};

/**
 * Trigram language identification restricted to the supported languages
 */
export class FrancLanguageDetector implements LanguageDetectionPort {
    public detect(text: string): Language {
        const code = franc(text.slice(0, SAMPLE_LENGTH), {
            only: Object.keys(languageByIso6393),
        });
        const language = languageByIso6393[code];

        return language ? new Language(language) : Language.fallback();
    }
}
