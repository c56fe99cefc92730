import { type LanguageEnum } from './language.vo.js';

/**
 * Literals whose presence marks a text as crime reporting, matched as lowercase substrings
 */
export const CRIME_KEYWORDS: Readonly<Record<LanguageEnum, readonly string[]>> = {
    EN: [
        'homicide',
        'murder',
        'robbery',
        'theft',
        'trafficking',
        'assault',
        'kidnapping',
        'extortion',
        'rape',
        'felony',
        'corruption',
        'fraud',
        'organized crime',
        'shooting',
        'arson',
    ],
    PT: [
        'homicídio',
        'assassinato',
        'roubo',
        'furto',
        'tráfico',
        'agressão',
        'sequestro',
        'extorsão',
        'estupro',
        'latrocínio',
        'corrupção',
        'fraude',
        'crime organizado',
        'milícia',
        'tiroteio',
    ],
};
