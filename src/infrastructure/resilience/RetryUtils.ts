/**
 * Retry Utilities
 *
 * Exponential backoff for transient failures of external calls.
 */

import axios from 'axios';
import { delay } from './Timeout';

export interface RetryOptions {
    /** Maximum number of attempts (default: 3) */
    maxAttempts?: number;
    /** Initial backoff delay in milliseconds (default: 1000) */
    initialBackoffMs?: number;
    /** Maximum backoff delay in milliseconds (default: 30000) */
    maxBackoffMs?: number;
    /** Backoff multiplier (default: 2) */
    backoffMultiplier?: number;
    /** Optional jitter to add randomness (0-1, default: 0.1) */
    jitter?: number;
    /** Decides whether an error is worth another attempt (default: all errors) */
    isRetryable?: (error: unknown) => boolean;
    /** Callback for each retry attempt */
    onRetry?: (attempt: number, error: unknown, nextDelayMs: number) => void;
    /** Stops retrying once aborted */
    signal?: AbortSignal;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'signal'>> = {
    maxAttempts: 3,
    initialBackoffMs: 1000,
    maxBackoffMs: 30000,
    backoffMultiplier: 2,
    jitter: 0.1,
    isRetryable: () => true,
    onRetry: () => { },
};

/**
 * Execute a function with exponential backoff retry logic.
 *
 * @throws The last error if all attempts fail
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    let currentBackoff = opts.initialBackoffMs;

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn();
        } catch (error) {
            if (attempt >= opts.maxAttempts || !opts.isRetryable(error) || opts.signal?.aborted) {
                throw error;
            }

            const jitterAmount = currentBackoff * opts.jitter * (Math.random() * 2 - 1);
            const nextDelay = Math.min(currentBackoff + jitterAmount, opts.maxBackoffMs);

            opts.onRetry(attempt, error, nextDelay);
            await delay(nextDelay, opts.signal);

            currentBackoff = Math.min(currentBackoff * opts.backoffMultiplier, opts.maxBackoffMs);
        }
    }
}

/**
 * Check if an HTTP error is retryable based on status code.
 */
export function isRetryableHttpError(error: unknown): boolean {
    if (!axios.isAxiosError(error)) {
        return false;
    }

    const status = error.response?.status;

    // Network error (no response)
    if (!status) {
        return error.code !== 'ERR_CANCELED';
    }

    // Rate limited or server error
    return status === 429 || (status >= 500 && status < 600);
}
