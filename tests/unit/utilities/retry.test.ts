/**
 * @format
 * Retry Utilities Unit Tests
 */

import { ClusterUnreachableError, ConflictError } from '../../../lib/rollover/errors';
import { backoffDelay, withRetry } from '../../../lib/utilities/retry';
import { FakeClock } from '../../fixtures';

const POLICY = { baseDelayMs: 1_000, maxDelayMs: 5_000 };

describe('Retry Utilities', () => {
    describe('backoffDelay', () => {
        it('should double from the base and stop at the cap', () => {
            expect([1, 2, 3, 4, 5].map((attempt) => backoffDelay(attempt, POLICY))).toEqual([
                1_000, 2_000, 4_000, 5_000, 5_000,
            ]);
        });
    });

    describe('withRetry', () => {
        it('should retry retryable errors until the operation succeeds', async () => {
            const clock = new FakeClock();
            const operation = jest
                .fn<Promise<string>, []>()
                .mockRejectedValueOnce(new ClusterUnreachableError('throttled'))
                .mockRejectedValueOnce(new ClusterUnreachableError('throttled'))
                .mockResolvedValue('ok');
            const onRetry = jest.fn();

            await expect(withRetry(operation, { ...POLICY, maxAttempts: 3, clock, onRetry })).resolves.toBe('ok');

            expect(operation).toHaveBeenCalledTimes(3);
            expect(clock.sleeps).toEqual([1_000, 2_000]);
            expect(onRetry).toHaveBeenLastCalledWith(expect.any(ClusterUnreachableError), 2, 2_000);
        });

        it('should rethrow a non-retryable error at once', async () => {
            const clock = new FakeClock();
            const operation = jest.fn<Promise<string>, []>().mockRejectedValue(new ConflictError('in use'));

            await expect(withRetry(operation, { ...POLICY, maxAttempts: 3, clock })).rejects.toThrow(ConflictError);
            expect(operation).toHaveBeenCalledTimes(1);
            expect(clock.sleeps).toEqual([]);
        });

        it('should rethrow the last error when attempts run out', async () => {
            const clock = new FakeClock();
            const operation = jest.fn<Promise<string>, []>().mockRejectedValue(new ClusterUnreachableError('down'));

            await expect(withRetry(operation, { ...POLICY, maxAttempts: 2, clock })).rejects.toThrow('down');
            expect(operation).toHaveBeenCalledTimes(2);
        });

        it('should honour a custom retry predicate', async () => {
            const clock = new FakeClock();
            const operation = jest
                .fn<Promise<string>, []>()
                .mockRejectedValueOnce(new Error('plain'))
                .mockResolvedValue('ok');

            await expect(
                withRetry(operation, { ...POLICY, maxAttempts: 2, clock, isRetryable: () => true }),
            ).resolves.toBe('ok');
        });
    });
});
