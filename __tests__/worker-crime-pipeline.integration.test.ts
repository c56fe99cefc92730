import { access, readFile } from 'node:fs/promises';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { FEED_URL, crimeFeedResolvers } from './providers/feeds/crime-feed.resolver.js';
import { nominatimSearchResolver } from './providers/nominatim/search.resolver.js';
import {
    cleanupIntegrationContext,
    createIntegrationContext,
    executeRequest,
    executeTask,
    type IntegrationContext,
} from './setup/integration.js';

/**
 * Integration tests for the crime pipeline.
 * Scenario: a feed announces two crime stories, a wire copy of the first one, an unrelated
 * story, a dead link and an item older than the cutoff.
 */
describe('Worker – crime-pipeline task – integration', () => {
    let context: IntegrationContext;

    beforeAll(async () => {
        context = await createIntegrationContext([...crimeFeedResolvers, nominatimSearchResolver]);
    });

    afterAll(async () => {
        await cleanupIntegrationContext(context);
    });

    it('should store one event per distinct crime story and report every outcome', async () => {
        // When
        const result = await context.ingestCrimeEvents.execute({
            feeds: [FEED_URL],
            maxItems: 50,
            since: new Date('2024-01-01T00:00:00Z'),
        });

        // Then
        expect(result).toEqual({
            aggregatedPoints: 2,
            itemsProcessed: 5,
            itemsSaved: 2,
            outcomes: {
                DUPLICATE_REJECTED: 1,
                FAILED: 1,
                PLACE_UNRESOLVED: 0,
                REJECTED_LOW_SCORE: 1,
                SAVED: 2,
            },
            renderingArtifact: context.heatmapOutputFile,
        });

        const events = await context.eventRepository.findAll();
        expect(events.map((event) => [event.link, event.placeLabel])).toEqual([
            ['https://news.test.local/articles/chicago-pawn-shop', 'Chicago'],
            ['https://news.test.local/articles/boston-kidnapping', 'Boston'],
        ]);
        expect(events[0]?.language.toString()).toBe('EN');
        expect(events[0]?.publishedAt).toEqual(new Date('2024-03-04T09:00:00Z'));
    });

    it('should write the heat map page', async () => {
        await expect(access(context.heatmapOutputFile)).resolves.toBeUndefined();

        const page = await readFile(context.heatmapOutputFile, 'utf8');
        expect(page).toContain('[[41.878,-87.63,1],[42.36,-71.059,1]]');
    });

    it('should serve the density of stored events', async () => {
        // When
        const response = await executeRequest(context, '/density');

        // Then
        expect(response.status).toBe(200);
        expect(await response.json()).toEqual({
            items: [
                { count: 1, latitude: 41.878, longitude: -87.63 },
                { count: 1, latitude: 42.36, longitude: -71.059 },
            ],
            totalEvents: 2,
        });
    });

    it('should keep the store unchanged when the scheduled task runs again', async () => {
        // When
        await executeTask(context, 'crime-pipeline');

        // Then
        expect(await context.eventRepository.count()).toBe(2);
    });

    it('should answer the health check', async () => {
        const response = await executeRequest(context, '/');

        expect(response.status).toBe(200);
        expect(await response.json()).toEqual({ status: 'ok' });
    });
});
