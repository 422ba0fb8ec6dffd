/**
 * @format
 * Clock
 *
 * Time source used by every polling loop, so tests can run hours of
 * simulated waiting without real timers.
 */

import { CancelledError } from '../rollover/errors';

export interface Clock {
    now(): Date;
    /**
     * Resolve after `ms`, or reject with CancelledError when the signal aborts.
     */
    sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
    now: () => new Date(),

    sleep: (ms: number, signal?: AbortSignal): Promise<void> =>
        new Promise((resolve, reject) => {
            if (signal?.aborted) {
                reject(new CancelledError('sleep'));
                return;
            }
            const onAbort = (): void => {
                clearTimeout(timer);
                reject(new CancelledError('sleep'));
            };
            const timer = setTimeout(() => {
                signal?.removeEventListener('abort', onAbort);
                resolve();
            }, ms);
            signal?.addEventListener('abort', onAbort, { once: true });
        }),
};

/**
 * Throw CancelledError if the signal has aborted.
 */
export function throwIfCancelled(signal: AbortSignal | undefined, operation: string): void {
    if (signal?.aborted) {
        throw new CancelledError(operation);
    }
}

/** Milliseconds between an ISO timestamp and the clock's now */
export function elapsedSince(clock: Clock, iso: string): number {
    return clock.now().getTime() - new Date(iso).getTime();
}
