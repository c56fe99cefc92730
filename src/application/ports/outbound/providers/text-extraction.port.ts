/**
 * Text extraction port - turns an article link into its readable plain text
 */
export interface TextExtractionPort {
    /**
     * Fetch the page and return its readable text with whitespace collapsed.
     * Rejects when the page cannot be fetched or parsed.
     */
    extract(link: string): Promise<string>;
}
