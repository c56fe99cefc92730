import { type Language } from '../../../../domain/value-objects/language.vo.js';

/**
 * Language detection port
 */
export interface LanguageDetectionPort {
    /**
     * Detect the language of a text, returning the fallback language when undecided
     */
    detect(text: string): Language;
}
