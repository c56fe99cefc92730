import { describe, expect, test } from 'vitest';

import { buildSignature } from '../minhash-signature.js';
import {
    DEFAULT_BANDING_WEIGHTS,
    NearDuplicateIndex,
    optimalBanding,
} from '../near-duplicate-index.js';

const WIRE_STORY =
    'Police officers arrested three suspects after an armed robbery at a jewellery store ' +
    'downtown on Tuesday evening. Witnesses described masked attackers carrying pistols ' +
    'who escaped through the parking garage before patrol vehicles arrived. Detectives ' +
    'recovered stolen watches, several necklaces and a getaway motorcycle abandoned ' +
    'near the harbour bridge. Prosecutors expect formal charges tomorrow morning while ' +
    'investigators review security footage from neighbouring buildings.';

// Same story with one word changed: 50 of 52 distinct shingles shared
const REPUBLISHED_STORY = WIRE_STORY.replace('Tuesday', 'Wednesday');

const UNRELATED_STORY =
    'Farmers celebrated record harvests during the annual agricultural festival, ' +
    'showcasing pumpkins, cheeses, handmade quilts and traditional dances beneath ' +
    'colourful banners across the village meadow.';

// Shares roughly a fifth of its shingles with the wire story
const PARTLY_RELATED_STORY =
    'Police officers arrested three suspects after an armed robbery at a jewellery store ' +
    'downtown on Tuesday evening. Farmers celebrated record harvests during the annual ' +
    'agricultural festival, showcasing pumpkins, cheeses, handmade quilts and traditional dances.';

/**
 * Two texts per pair: `shared` words in common and `unique` words of their own each
 */
const generatePairs = (count: number, shared: number, unique: number): Array<[string, string]> =>
    Array.from({ length: count }, (_, pair) => {
        const common = Array.from({ length: shared }, (_, word) => `pair${pair}shared${word}`);
        const own = (side: string) =>
            Array.from({ length: unique }, (_, word) => `pair${pair}${side}${word}`);
        return [
            [...common, ...own('first')].join(' '),
            [...common, ...own('second')].join(' '),
        ];
    });

describe('NearDuplicateIndex', () => {
    test('should match an identical text once the first copy is inserted', () => {
        // Given
        const index = new NearDuplicateIndex();
        index.insert('first', buildSignature(WIRE_STORY));

        // When / Then
        expect(index.query(buildSignature(WIRE_STORY))).toBe(true);
        expect(index.findDuplicateOf(buildSignature(WIRE_STORY))).toBe('first');
    });

    test('should match a republication with a one-word edit', () => {
        // Given
        const index = new NearDuplicateIndex();
        index.insert('first', buildSignature(WIRE_STORY));

        // When
        const signature = buildSignature(REPUBLISHED_STORY);

        // Then
        expect(signature.similarity(buildSignature(WIRE_STORY))).toBeGreaterThan(0.9);
        expect(index.query(signature)).toBe(true);
    });

    test('should find every pair at 0.90 overlap whose estimate reaches the threshold', () => {
        // Given: 90 shared words out of 100 distinct ones
        const pairs = generatePairs(200, 90, 5);
        let verifiable = 0;
        let detected = 0;

        // When
        for (const [first, second] of pairs) {
            const index = new NearDuplicateIndex();
            index.insert('first', buildSignature(first));
            const signature = buildSignature(second);

            if (signature.similarity(buildSignature(first)) >= index.threshold) {
                verifiable++;
            }
            if (index.query(signature)) {
                detected++;
            }
        }

        // Then
        expect(verifiable).toBeGreaterThanOrEqual(190);
        expect(detected).toBe(verifiable);
    });

    test('should find every pair at 0.95 overlap', () => {
        // Given: 190 shared words out of 200 distinct ones
        const pairs = generatePairs(200, 190, 5);

        // When
        const detected = pairs.filter(([first, second]) => {
            const index = new NearDuplicateIndex();
            index.insert('first', buildSignature(first));
            return index.query(buildSignature(second));
        });

        // Then
        expect(detected).toHaveLength(200);
    });

    test('should not match texts without shared shingles', () => {
        const index = new NearDuplicateIndex();
        index.insert('first', buildSignature(WIRE_STORY));

        expect(index.query(buildSignature(UNRELATED_STORY))).toBe(false);
    });

    test('should not match texts sharing only a small part of their shingles', () => {
        const index = new NearDuplicateIndex();
        index.insert('first', buildSignature(WIRE_STORY));

        expect(index.query(buildSignature(PARTLY_RELATED_STORY))).toBe(false);
    });

    test('should answer false on an empty index', () => {
        expect(new NearDuplicateIndex().query(buildSignature(WIRE_STORY))).toBe(false);
    });

    test('should never match empty signatures, even against each other', () => {
        // Given
        const index = new NearDuplicateIndex();
        index.insert('short', buildSignature('a bad dog'));

        // Then
        expect(index.query(buildSignature('a bad dog'))).toBe(false);
        expect(index.size).toBe(1);
    });

    test('should reject a key inserted twice', () => {
        const index = new NearDuplicateIndex();
        index.insert('first', buildSignature(WIRE_STORY));

        expect(() => index.insert('first', buildSignature(UNRELATED_STORY))).toThrow(
            'Signature key already indexed: first',
        );
    });

    test('should reject signatures of another size', () => {
        const index = new NearDuplicateIndex();

        expect(() => index.query(buildSignature(WIRE_STORY, { size: 64 }))).toThrow(
            'Signature size 64 does not match index size 128',
        );
    });

    test('should reject thresholds outside (0, 1]', () => {
        expect(() => new NearDuplicateIndex({ threshold: 1.5 })).toThrow(
            'Invalid similarity threshold: 1.5',
        );
    });
});

describe('optimalBanding', () => {
    const equalWeights = { falseNegative: 0.5, falsePositive: 0.5 };

    test('should favour recall with the default weights', () => {
        expect(optimalBanding(0.85, 128, DEFAULT_BANDING_WEIGHTS)).toEqual({ bands: 11, rows: 11 });
        expect(new NearDuplicateIndex().banding).toEqual({ bands: 11, rows: 11 });
    });

    test('should use more, shorter bands for a lower threshold with the default weights', () => {
        expect(optimalBanding(0.5, 128, DEFAULT_BANDING_WEIGHTS)).toEqual({ bands: 32, rows: 4 });
    });

    test('should split 128 slots into 8 bands of 16 rows for a 0.85 threshold', () => {
        expect(optimalBanding(0.85, 128, equalWeights)).toEqual({ bands: 8, rows: 16 });
    });

    test('should use more, shorter bands for a lower threshold', () => {
        expect(optimalBanding(0.5, 128, equalWeights)).toEqual({ bands: 25, rows: 5 });
    });
});
