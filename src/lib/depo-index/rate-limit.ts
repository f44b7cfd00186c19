/**
 * DepoIndex: Rate Limiting
 *
 * Enforces a minimum interval between calls to the AI capability across all
 * workers of one pipeline run.
 */

/** Time source; injected so tests can run without real sleeps */
export interface Clock {
    /** Milliseconds since an arbitrary origin */
    now(): number;
    sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
    now: () => Date.now(),
    sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/** 1.5 seconds between AI calls */
export const DEFAULT_MIN_INTERVAL_MS = 1500;

export class RateLimiter {
    private readonly minIntervalMs: number;
    private readonly clock: Clock;
    /** Start time reserved by the most recent caller */
    private lastSlot = Number.NEGATIVE_INFINITY;

    constructor(minIntervalMs = DEFAULT_MIN_INTERVAL_MS, clock: Clock = systemClock) {
        if (!Number.isFinite(minIntervalMs) || minIntervalMs < 0) {
            throw new RangeError(`minIntervalMs must be a non-negative number, received ${minIntervalMs}`);
        }
        this.minIntervalMs = minIntervalMs;
        this.clock = clock;
    }

    get intervalMs(): number {
        return this.minIntervalMs;
    }

    /**
     * Wait until the caller may issue its call. Returns the reserved start
     * time.
     *
     * The slot is read and updated with no await in between, so concurrent
     * callers always reserve distinct slots `minIntervalMs` apart.
     */
    async acquire(): Promise<number> {
        const now = this.clock.now();
        const slot = Math.max(now, this.lastSlot + this.minIntervalMs);
        this.lastSlot = slot;

        const waitMs = slot - now;
        if (waitMs > 0) {
            await this.clock.sleep(waitMs);
        }
        return slot;
    }
}
