import { delay } from '../infrastructure/resilience/Timeout';

/**
 * Decides how long to wait, given the time since the previous pace() finished.
 */
export type DelayPolicy = (elapsedSinceLastMs: number) => number;

/** Always waits the full interval. */
export const fixedDelay = (intervalMs: number): DelayPolicy => () => intervalMs;

/** Waits only for what is left of the interval. */
export const minimumSpacing = (intervalMs: number): DelayPolicy => (elapsed) => Math.max(0, intervalMs - elapsed);

export type Clock = () => number;
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Spaces successive domain reviews so the primary source's quota holds
 * (VirusTotal's public API allows about 4 requests per minute).
 */
export class RateLimiter {
    private lastPaceAt: number;

    constructor(
        private readonly policy: DelayPolicy,
        private readonly clock: Clock = Date.now,
        private readonly sleep: Sleeper = delay
    ) {
        this.lastPaceAt = clock();
    }

    /**
     * Waits according to the policy. Returns early when the signal aborts.
     * @returns The delay that was requested
     */
    async pace(signal?: AbortSignal): Promise<number> {
        const waitMs = Math.max(0, this.policy(this.clock() - this.lastPaceAt));
        if (waitMs > 0) {
            console.log(`[RateLimiter] Sleeping ${Math.round(waitMs / 1000)}s before the next domain`);
            await this.sleep(waitMs, signal);
        }
        this.lastPaceAt = this.clock();
        return waitMs;
    }
}
