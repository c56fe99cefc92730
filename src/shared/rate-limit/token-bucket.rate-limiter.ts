import { type RateLimiterPort } from './rate-limiter.port.js';

export interface RateLimiterClock {
    now(): number;
    sleep(milliseconds: number): Promise<void>;
}

export interface TokenBucketOptions {
    /**
     * Maximum number of tokens the bucket holds, i.e. the allowed burst
     * @default 1
     */
    capacity?: number;
    clock?: RateLimiterClock;
    tokensPerSecond: number;
}

const systemClock: RateLimiterClock = {
    now: () => Date.now(),
    sleep: (milliseconds) => new Promise((resolve) => setTimeout(resolve, milliseconds)),
};

/**
 * Token bucket rate limiter. Acquisitions are served one at a time in call order,
 * so concurrent callers never consume the same token.
 */
export class TokenBucketRateLimiter implements RateLimiterPort {
    private readonly capacity: number;
    private readonly clock: RateLimiterClock;
    private lastRefill: number;
    private queue: Promise<void> = Promise.resolve();
    private tokens: number;
    private readonly tokensPerSecond: number;

    constructor(options: TokenBucketOptions) {
        if (!(options.tokensPerSecond > 0)) {
            throw new Error(`Invalid rate: ${options.tokensPerSecond} tokens per second`);
        }

        this.capacity = Math.max(1, options.capacity ?? 1);
        this.clock = options.clock ?? systemClock;
        this.tokensPerSecond = options.tokensPerSecond;
        this.tokens = this.capacity;
        this.lastRefill = this.clock.now();
    }

    public acquire(): Promise<void> {
        const turn = this.queue.then(() => this.take());
        // The caller receives any rejection through `turn`; the queue must keep serving.
        this.queue = turn.catch(() => undefined);
        return turn;
    }

    private refill(): void {
        const now = this.clock.now();
        const elapsed = Math.max(0, now - this.lastRefill);
        this.tokens = Math.min(this.capacity, this.tokens + (elapsed * this.tokensPerSecond) / 1000);
        this.lastRefill = now;
    }

    private async take(): Promise<void> {
        this.refill();

        while (this.tokens < 1) {
            const waitTime = Math.ceil(((1 - this.tokens) / this.tokensPerSecond) * 1000);
            await this.clock.sleep(waitTime);
            this.refill();
        }

        this.tokens -= 1;
    }
}
