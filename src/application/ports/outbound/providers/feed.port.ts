/**
 * An entry announced by a news feed
 */
export interface CandidateItem {
    link: string;
    publishedAt: Date;
    title: string;
}

export interface FeedOptions {
    /**
     * Feed URLs, read in order
     */
    feeds: string[];

    /**
     * Entries published before this instant are dropped; undated entries are kept
     */
    since: Date;
}

/**
 * Feed provider port - lists candidate articles from news feeds
 */
export interface FeedProviderPort {
    /**
     * Fetch entries having both a link and a non-empty title, in feed order
     */
    fetchItems(options: FeedOptions): Promise<CandidateItem[]>;
}
