/**
 * @format
 * Retry Utilities
 *
 * Exponential backoff shared by in-pass retries (release feed) and
 * across-pass retries (plan steps, scheduled through `nextAttemptAt`).
 */

import { isRolloverError } from '../rollover/errors';

import type { Clock } from './clock';

export interface BackoffPolicy {
    /** Delay before the second attempt */
    readonly baseDelayMs: number;
    /** Upper bound for any single delay */
    readonly maxDelayMs: number;
}

/**
 * Delay after the `attempt`-th failure (1-based): base * 2^(attempt-1), capped.
 */
export function backoffDelay(attempt: number, policy: BackoffPolicy): number {
    const exponent = Math.max(0, attempt - 1);
    return Math.min(policy.baseDelayMs * 2 ** exponent, policy.maxDelayMs);
}

export interface RetryOptions extends BackoffPolicy {
    readonly maxAttempts: number;
    readonly clock: Clock;
    readonly signal?: AbortSignal;
    /** Defaults to the error's own `retryable` flag */
    readonly isRetryable?: (error: unknown) => boolean;
    readonly onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

function defaultRetryable(error: unknown): boolean {
    return isRolloverError(error) && error.retryable;
}

/**
 * Run `operation` until it succeeds, fails with a non-retryable error or
 * runs out of attempts. The last error is rethrown.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
    const isRetryable = options.isRetryable ?? defaultRetryable;

    for (let attempt = 1; ; attempt++) {
        try {
            return await operation();
        } catch (error) {
            if (attempt >= options.maxAttempts || !isRetryable(error)) {
                throw error;
            }
            const delay = backoffDelay(attempt, options);
            options.onRetry?.(error, attempt, delay);
            await options.clock.sleep(delay, options.signal);
        }
    }
}
