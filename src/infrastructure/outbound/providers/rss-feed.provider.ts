import { isBefore, isValid } from 'date-fns';
import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod/v4';

// Application
import {
    type CandidateItem,
    type FeedOptions,
    type FeedProviderPort,
} from '../../../application/ports/outbound/providers/feed.port.js';

import { type LoggerPort } from '../../../shared/logger/logger.port.js';

// Types
export interface RssFeedConfiguration {
    timeoutMs: number;
    userAgent: string;
}

type FeedEntry = z.infer<typeof feedEntrySchema>;
type TextNode = z.infer<typeof textNodeSchema>;
type LinkNode = z.infer<typeof linkNodeSchema>;

// Schemas
const textNodeSchema = z.union([
    z.string(),
    z.object({ '#text': z.string().optional() }),
]);

const linkNodeSchema = z.union([
    z.string(),
    z.object({
        '#text': z.string().optional(),
        '@_href': z.string().optional(),
        '@_rel': z.string().optional(),
    }),
]);

const feedEntrySchema = z.object({
    'dc:date': textNodeSchema.optional(),
    link: z.union([linkNodeSchema, z.array(linkNodeSchema)]).optional(),
    pubDate: textNodeSchema.optional(),
    published: textNodeSchema.optional(),
    title: textNodeSchema.optional(),
    updated: textNodeSchema.optional(),
});

const feedDocumentSchema = z.object({
    feed: z.object({ entry: z.array(z.unknown()).optional() }).optional(),
    rss: z
        .object({
            channel: z.object({ item: z.array(z.unknown()).optional() }).optional(),
        })
        .optional(),
});

const xmlParser = new XMLParser({
    ignoreAttributes: false,
    isArray: (name) => name === 'item' || name === 'entry' || name === 'link',
    parseTagValue: false,
    trimValues: true,
});

const readText = (node: TextNode | undefined): string => {
    if (node === undefined) {
        return '';
    }
    return (typeof node === 'string' ? node : (node['#text'] ?? '')).trim();
};

const readLink = (node: LinkNode): string => {
    if (typeof node === 'string') {
        return node.trim();
    }
    return (node['@_href'] ?? node['#text'] ?? '').trim();
};

/**
 * Reads RSS 2.0 channels and Atom feeds over HTTP
 */
export class RssFeedProvider implements FeedProviderPort {
    constructor(
        private readonly configuration: RssFeedConfiguration,
        private readonly logger: LoggerPort,
    ) {}

    public async fetchItems(options: FeedOptions): Promise<CandidateItem[]> {
        const items: CandidateItem[] = [];

        for (const feed of options.feeds) {
            try {
                const feedItems = await this.fetchFeed(feed, options.since);
                this.logger.info('Feed read', { feed, items: feedItems.length });
                items.push(...feedItems);
            } catch (error) {
                this.logger.error('Failed to read feed', { error, feed });
            }
        }

        return items;
    }

    private async fetchFeed(feed: string, since: Date): Promise<CandidateItem[]> {
        const response = await fetch(feed, {
            headers: { 'User-Agent': this.configuration.userAgent },
            signal: AbortSignal.timeout(this.configuration.timeoutMs),
        });

        if (!response.ok) {
            throw new Error(`Feed request failed: ${response.status} ${response.statusText}`);
        }

        const entries = this.parseEntries(await response.text());
        const items: CandidateItem[] = [];

        for (const entry of entries) {
            const item = this.toCandidateItem(entry, since);
            if (item) {
                items.push(item);
            }
        }

        return items;
    }

    private parseEntries(xml: string): FeedEntry[] {
        const document = feedDocumentSchema.parse(xmlParser.parse(xml));
        const rawEntries = [
            ...(document.rss?.channel?.item ?? []),
            ...(document.feed?.entry ?? []),
        ];

        return rawEntries.flatMap((rawEntry) => {
            const entry = feedEntrySchema.safeParse(rawEntry);
            return entry.success ? [entry.data] : [];
        });
    }

    private selectLink(entry: FeedEntry): string {
        if (entry.link === undefined) {
            return '';
        }

        const links = Array.isArray(entry.link) ? entry.link : [entry.link];
        const alternate = links.find(
            (link) => typeof link === 'string' || !link['@_rel'] || link['@_rel'] === 'alternate',
        );

        return alternate ? readLink(alternate) : '';
    }

    private toCandidateItem(entry: FeedEntry, since: Date): CandidateItem | null {
        const link = this.selectLink(entry);
        const title = readText(entry.title);

        if (!link || !title) {
            return null;
        }

        const rawDate = readText(
            entry.pubDate ?? entry.published ?? entry['dc:date'] ?? entry.updated,
        );
        const publishedAt = rawDate ? new Date(rawDate) : null;

        if (publishedAt && isValid(publishedAt)) {
            if (isBefore(publishedAt, since)) {
                return null;
            }
            return { link, publishedAt, title };
        }

        return { link, publishedAt: new Date(), title };
    }
}
