import { CRIME_KEYWORDS } from '../value-objects/crime-keywords.js';
import { type Language } from '../value-objects/language.vo.js';
import { RelevanceScore } from '../value-objects/relevance-score.vo.js';

const KEYWORD_SATURATION = 5;
const LENGTH_SATURATION = 2000;
const KEYWORD_WEIGHT = 0.6;
const LENGTH_WEIGHT = 0.4;

/**
 * Counts the distinct keywords of the language found anywhere in the text, ignoring case
 */
export const countKeywordHits = (text: string, language: Language): number => {
    const haystack = text.toLowerCase();
    return CRIME_KEYWORDS[language.value].filter((keyword) => haystack.includes(keyword)).length;
};

/**
 * Scores how much a text reads as crime reporting.
 * Grows with the number of distinct keywords (saturating at 5) and with the text length
 * (saturating at 2000 characters).
 */
export const scoreRelevance = (text: string, language: Language): RelevanceScore => {
    if (text.length === 0) {
        return new RelevanceScore(0);
    }

    const keywordTerm = Math.min(countKeywordHits(text, language) / KEYWORD_SATURATION, 1);
    const lengthTerm = Math.min(text.length / LENGTH_SATURATION, 1);

    return new RelevanceScore(Math.min(KEYWORD_WEIGHT * keywordTerm + LENGTH_WEIGHT * lengthTerm, 1));
};
