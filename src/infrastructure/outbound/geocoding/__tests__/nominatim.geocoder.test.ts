import { http, HttpResponse } from 'msw';
import { setupServer } from 'msw/node';
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, test } from 'vitest';
import { mock, type MockProxy } from 'vitest-mock-extended';

import { type LoggerPort } from '../../../../shared/logger/logger.port.js';
import { type RateLimiterPort } from '../../../../shared/rate-limit/rate-limiter.port.js';

import { NominatimGeocoder } from '../nominatim.geocoder.js';

const BASE_URL = 'https://geocoder.test.local';
const SEARCH_URL = `${BASE_URL}/search`;

let lastQuery: URLSearchParams | null = null;
let lastUserAgent: null | string = null;

const server = setupServer(
    http.get(SEARCH_URL, ({ request }) => {
        const url = new URL(request.url);
        lastQuery = url.searchParams;
        lastUserAgent = request.headers.get('User-Agent');

        if (url.searchParams.get('q') === 'Lisboa') {
            return HttpResponse.json([
                { display_name: 'Lisboa, Portugal', lat: '38.7077507', lon: '-9.1365919' },
            ]);
        }

        return HttpResponse.json([]);
    }),
);

describe('NominatimGeocoder', () => {
    let geocoder: NominatimGeocoder;
    let mockLogger: MockProxy<LoggerPort>;
    let mockRateLimiter: MockProxy<RateLimiterPort>;

    beforeAll(() => {
        server.listen({ onUnhandledRequest: 'error' });
    });

    beforeEach(() => {
        lastQuery = null;
        lastUserAgent = null;
        mockLogger = mock<LoggerPort>();
        mockRateLimiter = mock<RateLimiterPort>();
        mockRateLimiter.acquire.mockResolvedValue();
        geocoder = new NominatimGeocoder(
            { baseUrl: BASE_URL, timeoutMs: 5000, userAgent: 'crime-map-tests' },
            mockRateLimiter,
            mockLogger,
        );
    });

    afterEach(() => {
        server.resetHandlers();
    });

    afterAll(() => {
        server.close();
    });

    test('should resolve the first search result to numeric coordinates', async () => {
        // When
        const coordinates = await geocoder.geocode('Lisboa');

        // Then
        expect(coordinates).toEqual({ latitude: 38.7077507, longitude: -9.1365919 });
        expect(lastQuery?.get('format')).toBe('jsonv2');
        expect(lastQuery?.get('limit')).toBe('1');
        expect(lastUserAgent).toBe('crime-map-tests');
    });

    test('should wait for the rate limiter before every request', async () => {
        // When
        await geocoder.geocode('Lisboa');
        await geocoder.geocode('Atlantis');

        // Then
        expect(mockRateLimiter.acquire).toHaveBeenCalledTimes(2);
    });

    test('should return null when nothing matches', async () => {
        expect(await geocoder.geocode('Atlantis')).toBeNull();
        expect(mockLogger.debug).toHaveBeenCalledWith('Place not found', { name: 'Atlantis' });
    });

    test('should return null and log when the service fails', async () => {
        // Given
        server.use(http.get(SEARCH_URL, () => new HttpResponse(null, { status: 429 })));

        // When
        const coordinates = await geocoder.geocode('Lisboa');

        // Then
        expect(coordinates).toBeNull();
        expect(mockLogger.warn).toHaveBeenCalledWith('Failed to geocode place', {
            error: expect.any(Error),
            name: 'Lisboa',
        });
    });

    test('should return null on a malformed payload', async () => {
        // Given
        server.use(http.get(SEARCH_URL, () => HttpResponse.json({ error: 'unexpected' })));

        // Then
        expect(await geocoder.geocode('Lisboa')).toBeNull();
    });

    test('should return null on coordinates outside the globe', async () => {
        // Given
        server.use(http.get(SEARCH_URL, () => HttpResponse.json([{ lat: '95.1', lon: '10' }])));

        // Then
        expect(await geocoder.geocode('Lisboa')).toBeNull();
    });
});
