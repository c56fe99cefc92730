import { http, HttpResponse } from 'msw';
import { setupServer } from 'msw/node';
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, test, vi } from 'vitest';
import { mock, type MockProxy } from 'vitest-mock-extended';

import { type LoggerPort } from '../../../../shared/logger/logger.port.js';

import { RssFeedProvider } from '../rss-feed.provider.js';

const RSS_FEED_URL = 'https://feeds.test.local/world.xml';
const ATOM_FEED_URL = 'https://feeds.test.local/atom.xml';
const SINCE = new Date('2024-01-01T00:00:00Z');

const rssFeed = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>World desk</title>
    <item>
      <title>Robbery at the central station</title>
      <link>https://news.test.local/robbery</link>
      <pubDate>Tue, 02 Jan 2024 10:00:00 GMT</pubDate>
    </item>
    <item>
      <title>Old case reopened</title>
      <link>https://news.test.local/old-case</link>
      <pubDate>Fri, 15 Dec 2023 08:00:00 GMT</pubDate>
    </item>
    <item>
      <title>   </title>
      <link>https://news.test.local/untitled</link>
    </item>
    <item>
      <title>Missing link</title>
    </item>
    <item>
      <title><![CDATA[Assalto & tiroteio no centro]]></title>
      <link>https://news.test.local/assalto</link>
    </item>
  </channel>
</rss>`;

const atomFeed = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Atom desk</title>
  <entry>
    <title type="html">Arrest after burglary</title>
    <link rel="self" href="https://news.test.local/self/42"/>
    <link rel="alternate" href="https://news.test.local/arrest"/>
    <updated>2024-03-05T09:30:00Z</updated>
  </entry>
</feed>`;

const server = setupServer(
    http.get(RSS_FEED_URL, () =>
        HttpResponse.text(rssFeed, { headers: { 'Content-Type': 'application/rss+xml' } }),
    ),
    http.get(ATOM_FEED_URL, () =>
        HttpResponse.text(atomFeed, { headers: { 'Content-Type': 'application/atom+xml' } }),
    ),
);

describe('RssFeedProvider', () => {
    let provider: RssFeedProvider;
    let mockLogger: MockProxy<LoggerPort>;

    beforeAll(() => {
        server.listen({ onUnhandledRequest: 'error' });
    });

    beforeEach(() => {
        vi.useFakeTimers({ toFake: ['Date'] });
        vi.setSystemTime(new Date('2024-06-01T12:00:00Z'));
        mockLogger = mock<LoggerPort>();
        provider = new RssFeedProvider({ timeoutMs: 5000, userAgent: 'crime-map-tests' }, mockLogger);
    });

    afterEach(() => {
        vi.useRealTimers();
        server.resetHandlers();
    });

    afterAll(() => {
        server.close();
    });

    test('should keep dated entries after the cutoff and stamp undated ones with the current time', async () => {
        // When
        const items = await provider.fetchItems({ feeds: [RSS_FEED_URL], since: SINCE });

        // Then
        expect(items).toEqual([
            {
                link: 'https://news.test.local/robbery',
                publishedAt: new Date('2024-01-02T10:00:00Z'),
                title: 'Robbery at the central station',
            },
            {
                link: 'https://news.test.local/assalto',
                publishedAt: new Date('2024-06-01T12:00:00Z'),
                title: 'Assalto & tiroteio no centro',
            },
        ]);
    });

    test('should read Atom entries through their alternate link', async () => {
        // When
        const items = await provider.fetchItems({ feeds: [ATOM_FEED_URL], since: SINCE });

        // Then
        expect(items).toEqual([
            {
                link: 'https://news.test.local/arrest',
                publishedAt: new Date('2024-03-05T09:30:00Z'),
                title: 'Arrest after burglary',
            },
        ]);
    });

    test('should apply the cutoff to entries dated with dc:date', async () => {
        // Given
        server.use(
            http.get(
                RSS_FEED_URL,
                () =>
                    HttpResponse.text(`<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:dc="http://purl.org/dc/elements/1.1/">
  <channel>
    <item>
      <title>Shooting downtown</title>
      <link>https://news.test.local/shooting</link>
      <dc:date>2024-02-10T18:00:00Z</dc:date>
    </item>
    <item>
      <title>Archived burglary</title>
      <link>https://news.test.local/archived</link>
      <dc:date>2023-11-20T07:00:00Z</dc:date>
    </item>
  </channel>
</rss>`),
            ),
        );

        // When
        const items = await provider.fetchItems({ feeds: [RSS_FEED_URL], since: SINCE });

        // Then
        expect(items).toEqual([
            {
                link: 'https://news.test.local/shooting',
                publishedAt: new Date('2024-02-10T18:00:00Z'),
                title: 'Shooting downtown',
            },
        ]);
    });

    test('should concatenate feeds in the order given', async () => {
        // When
        const items = await provider.fetchItems({
            feeds: [ATOM_FEED_URL, RSS_FEED_URL],
            since: SINCE,
        });

        // Then
        expect(items.map((item) => item.link)).toEqual([
            'https://news.test.local/arrest',
            'https://news.test.local/robbery',
            'https://news.test.local/assalto',
        ]);
    });

    test('should send the configured user agent', async () => {
        // Given
        let userAgent: null | string = null;
        server.use(
            http.get(ATOM_FEED_URL, ({ request }) => {
                userAgent = request.headers.get('User-Agent');
                return HttpResponse.text(atomFeed);
            }),
        );

        // When
        await provider.fetchItems({ feeds: [ATOM_FEED_URL], since: SINCE });

        // Then
        expect(userAgent).toBe('crime-map-tests');
    });

    test('should skip a failing feed and keep reading the others', async () => {
        // Given
        server.use(http.get(RSS_FEED_URL, () => new HttpResponse(null, { status: 503 })));

        // When
        const items = await provider.fetchItems({
            feeds: [RSS_FEED_URL, ATOM_FEED_URL],
            since: SINCE,
        });

        // Then
        expect(items.map((item) => item.link)).toEqual(['https://news.test.local/arrest']);
        expect(mockLogger.error).toHaveBeenCalledWith('Failed to read feed', {
            error: expect.any(Error),
            feed: RSS_FEED_URL,
        });
    });

    test('should return nothing for a document that is not a feed', async () => {
        // Given
        server.use(http.get(RSS_FEED_URL, () => HttpResponse.text('<html><body>Hi</body></html>')));

        // When
        const items = await provider.fetchItems({ feeds: [RSS_FEED_URL], since: SINCE });

        // Then
        expect(items).toEqual([]);
    });
});
