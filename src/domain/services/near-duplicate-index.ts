import { DEFAULT_SIGNATURE_SIZE, type MinHashSignature } from './minhash-signature.js';

export const DEFAULT_SIMILARITY_THRESHOLD = 0.85;

const INTEGRATION_STEPS = 100;

// Candidates are verified against the threshold, so a false positive only costs a comparison
export const DEFAULT_BANDING_WEIGHTS: BandingWeights = { falseNegative: 0.9, falsePositive: 0.1 };

export interface BandingWeights {
    falseNegative: number;
    falsePositive: number;
}

export interface Banding {
    bands: number;
    rows: number;
}

export interface NearDuplicateIndexOptions {
    signatureSize?: number;
    threshold?: number;
    weights?: BandingWeights;
}

const bandingCache = new Map<string, Banding>();

/**
 * Locality-sensitive index over MinHash signatures.
 *
 * Signatures are cut into bands of consecutive rows; two signatures sharing one whole band
 * become candidates, and a candidate counts as a near-duplicate only when its estimated
 * similarity reaches the threshold. The first signature inserted for a similarity class is
 * the one later arrivals match against.
 */
export class NearDuplicateIndex {
    public readonly banding: Banding;
    public readonly threshold: number;

    private readonly bandBuckets: Array<Map<string, string[]>>;
    private readonly signatureSize: number;
    private readonly signatures = new Map<string, MinHashSignature>();

    constructor(options: NearDuplicateIndexOptions = {}) {
        this.threshold = options.threshold ?? DEFAULT_SIMILARITY_THRESHOLD;
        this.signatureSize = options.signatureSize ?? DEFAULT_SIGNATURE_SIZE;

        if (!(this.threshold > 0 && this.threshold <= 1)) {
            throw new Error(`Invalid similarity threshold: ${this.threshold}`);
        }

        this.banding = optimalBanding(
            this.threshold,
            this.signatureSize,
            options.weights ?? DEFAULT_BANDING_WEIGHTS,
        );
        this.bandBuckets = Array.from({ length: this.banding.bands }, () => new Map());
    }

    public get size(): number {
        return this.signatures.size;
    }

    /**
     * Key of the first indexed signature similar enough to the given one, if any
     */
    public findDuplicateOf(signature: MinHashSignature): null | string {
        this.assertSize(signature);

        if (signature.isEmpty) {
            return null;
        }

        const candidates = new Set<string>();
        this.bandKeys(signature).forEach((bandKey, band) => {
            for (const key of this.bandBuckets[band].get(bandKey) ?? []) {
                candidates.add(key);
            }
        });

        for (const key of candidates) {
            const candidate = this.signatures.get(key);
            if (candidate && candidate.similarity(signature) >= this.threshold) {
                return key;
            }
        }

        return null;
    }

    public has(key: string): boolean {
        return this.signatures.has(key);
    }

    public insert(key: string, signature: MinHashSignature): void {
        this.assertSize(signature);

        if (this.signatures.has(key)) {
            throw new Error(`Signature key already indexed: ${key}`);
        }

        this.signatures.set(key, signature);

        if (signature.isEmpty) {
            return;
        }

        this.bandKeys(signature).forEach((bandKey, band) => {
            const bucket = this.bandBuckets[band].get(bandKey);
            if (bucket) {
                bucket.push(key);
            } else {
                this.bandBuckets[band].set(bandKey, [key]);
            }
        });
    }

    public query(signature: MinHashSignature): boolean {
        return this.findDuplicateOf(signature) !== null;
    }

    private assertSize(signature: MinHashSignature): void {
        if (signature.size !== this.signatureSize) {
            throw new Error(
                `Signature size ${signature.size} does not match index size ${this.signatureSize}`,
            );
        }
    }

    private bandKeys(signature: MinHashSignature): string[] {
        const { bands, rows } = this.banding;
        return Array.from({ length: bands }, (_, band) =>
            signature.values.slice(band * rows, (band + 1) * rows).join(','),
        );
    }
}

/**
 * Picks the number of bands and rows per band minimising the weighted probabilities of
 * false positives (similarity below the threshold) and false negatives (above it).
 */
export const optimalBanding = (
    threshold: number,
    signatureSize: number,
    weights: BandingWeights,
): Banding => {
    const cacheKey = `${threshold}:${signatureSize}:${weights.falsePositive}:${weights.falseNegative}`;
    const cached = bandingCache.get(cacheKey);
    if (cached) {
        return cached;
    }

    let best: Banding = { bands: 1, rows: signatureSize };
    let bestError = Number.POSITIVE_INFINITY;

    for (let bands = 1; bands <= signatureSize; bands++) {
        const maxRows = Math.floor(signatureSize / bands);
        for (let rows = 1; rows <= maxRows; rows++) {
            const candidateProbability = (similarity: number) =>
                1 - Math.pow(1 - Math.pow(similarity, rows), bands);
            const falsePositive = integrate(candidateProbability, 0, threshold);
            const falseNegative = integrate((s) => 1 - candidateProbability(s), threshold, 1);
            const error =
                weights.falsePositive * falsePositive + weights.falseNegative * falseNegative;

            if (error < bestError) {
                bestError = error;
                best = { bands, rows };
            }
        }
    }

    bandingCache.set(cacheKey, best);
    return best;
};

// Composite Simpson's rule
const integrate = (fn: (x: number) => number, from: number, to: number): number => {
    const step = (to - from) / INTEGRATION_STEPS;
    let sum = fn(from) + fn(to);
    for (let i = 1; i < INTEGRATION_STEPS; i++) {
        sum += fn(from + i * step) * (i % 2 === 0 ? 2 : 4);
    }
    return (sum * step) / 3;
};
