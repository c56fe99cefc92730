/**
 * Blocking rate limiter shared by every caller of a throttled resource
 */
export interface RateLimiterPort {
    /**
     * Resolves once the caller is allowed to proceed
     */
    acquire(): Promise<void>;
}
