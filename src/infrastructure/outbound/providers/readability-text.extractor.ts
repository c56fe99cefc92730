import { Readability } from '@mozilla/readability';
import { JSDOM } from 'jsdom';

// Application
import { type TextExtractionPort } from '../../../application/ports/outbound/providers/text-extraction.port.js';

import { type LoggerPort } from '../../../shared/logger/logger.port.js';

export interface ReadabilityTextExtractorConfiguration {
    timeoutMs: number;
    userAgent: string;
}

export class TextExtractionError extends Error {
    constructor(
        message: string,
        public readonly link: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'TextExtractionError';
    }
}

export const collapseWhitespace = (text: string): string => text.replace(/\s+/g, ' ').trim();

/**
 * Downloads an article page and keeps the readable body, as a reader view would
 */
export class ReadabilityTextExtractor implements TextExtractionPort {
    constructor(
        private readonly configuration: ReadabilityTextExtractorConfiguration,
        private readonly logger: LoggerPort,
    ) {}

    public async extract(link: string): Promise<string> {
        const html = await this.download(link);

        let content: null | string | undefined;
        let dom: JSDOM | undefined;
        try {
            dom = new JSDOM(html, { url: link });
            content = new Readability(dom.window.document).parse()?.textContent;
        } catch (error) {
            throw new TextExtractionError(`Could not parse ${link}`, link, { cause: error });
        } finally {
            dom?.window.close();
        }

        if (content === null || content === undefined) {
            throw new TextExtractionError(`No readable content in ${link}`, link);
        }

        const text = collapseWhitespace(content);
        this.logger.debug('Article text extracted', { characters: text.length, link });

        return text;
    }

    private async download(link: string): Promise<string> {
        let response: Response;
        try {
            response = await fetch(link, {
                headers: { 'User-Agent': this.configuration.userAgent },
                signal: AbortSignal.timeout(this.configuration.timeoutMs),
            });
        } catch (error) {
            throw new TextExtractionError(`Could not download ${link}`, link, { cause: error });
        }

        if (!response.ok) {
            throw new TextExtractionError(
                `Article request failed: ${response.status} ${response.statusText}`,
                link,
            );
        }

        return response.text();
    }
}
