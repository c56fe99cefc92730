import { createHash } from 'node:crypto';

export const DEFAULT_SIGNATURE_SIZE = 128;
const DEFAULT_SEED = 1;

const MERSENNE_PRIME = (1n << 61n) - 1n;
const MAX_HASH = (1n << 32n) - 1n;

// Words of five or more letters, digits or underscores
const SHINGLE_PATTERN = /[\p{L}\p{N}_]{5,}/gu;

interface Permutation {
    a: bigint;
    b: bigint;
}

const permutationCache = new Map<string, Permutation[]>();

export interface SignatureOptions {
    seed?: number;
    size?: number;
}

/**
 * @description MinHash sketch of a set of shingles. Two signatures built with the same
 * size and seed estimate the Jaccard similarity of their sets by the share of equal slots.
 */
export class MinHashSignature {
    constructor(
        public readonly values: readonly number[],
        public readonly seed: number = DEFAULT_SEED,
    ) {}

    /**
     * True when the source text had no shingle at all
     */
    public get isEmpty(): boolean {
        return this.values.every((value) => value === Number(MAX_HASH));
    }

    public get size(): number {
        return this.values.length;
    }

    public isComparableTo(other: MinHashSignature): boolean {
        return this.size === other.size && this.seed === other.seed;
    }

    /**
     * Estimated Jaccard similarity; empty signatures are similar to nothing
     */
    public similarity(other: MinHashSignature): number {
        if (!this.isComparableTo(other)) {
            throw new Error(
                `Cannot compare signatures of size ${this.size} (seed ${this.seed}) and size ${other.size} (seed ${other.seed})`,
            );
        }

        if (this.isEmpty || other.isEmpty) {
            return 0;
        }

        let equalSlots = 0;
        for (let slot = 0; slot < this.size; slot++) {
            if (this.values[slot] === other.values[slot]) {
                equalSlots++;
            }
        }

        return equalSlots / this.size;
    }
}

/**
 * Distinct lowercase words of at least five characters
 */
export const extractShingles = (text: string): Set<string> =>
    new Set(text.toLowerCase().match(SHINGLE_PATTERN) ?? []);

export const buildSignature = (text: string, options: SignatureOptions = {}): MinHashSignature => {
    const size = options.size ?? DEFAULT_SIGNATURE_SIZE;
    const seed = options.seed ?? DEFAULT_SEED;
    const permutations = getPermutations(size, seed);
    const minimums = new Array<bigint>(size).fill(MAX_HASH);

    for (const shingle of extractShingles(text)) {
        const hash = hashShingle(shingle);
        for (let slot = 0; slot < size; slot++) {
            const { a, b } = permutations[slot];
            const permuted = ((a * hash + b) % MERSENNE_PRIME) & MAX_HASH;
            if (permuted < minimums[slot]) {
                minimums[slot] = permuted;
            }
        }
    }

    return new MinHashSignature(
        minimums.map((value) => Number(value)),
        seed,
    );
};

const hashShingle = (shingle: string): bigint =>
    BigInt(createHash('sha1').update(shingle, 'utf8').digest().readUInt32LE(0));

const getPermutations = (size: number, seed: number): Permutation[] => {
    const cacheKey = `${seed}:${size}`;
    const cached = permutationCache.get(cacheKey);
    if (cached) {
        return cached;
    }

    const permutations = Array.from({ length: size }, (_, slot) => {
        const digest = createHash('sha256').update(`minhash:${seed}:${slot}`).digest();
        const a = digest.readBigUInt64LE(0) % MERSENNE_PRIME;
        const b = digest.readBigUInt64LE(8) % MERSENNE_PRIME;
        return { a: a === 0n ? 1n : a, b };
    });

    permutationCache.set(cacheKey, permutations);
    return permutations;
};
