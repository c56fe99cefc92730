import { z } from 'zod/v4';

export const languageSchema = z.enum(['EN', 'PT']);

export type LanguageEnum = z.infer<typeof languageSchema>;

export const FALLBACK_LANGUAGE: LanguageEnum = 'EN';

export class Language {
    public readonly value: LanguageEnum;

    constructor(language: string) {
        const normalizedLanguage = language.toUpperCase();
        const result = languageSchema.safeParse(normalizedLanguage);

        if (!result.success) {
            throw new Error(
                `Invalid language: ${language}. Supported languages are: ${languageSchema.options.join(', ')}`,
            );
        }

        this.value = result.data;
    }

    public static fallback(): Language {
        return new Language(FALLBACK_LANGUAGE);
    }

    public equals(other: Language): boolean {
        return this.value === other.value;
    }

    public toString(): LanguageEnum {
        return this.value;
    }
}
