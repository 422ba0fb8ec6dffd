/**
 * @format
 * Validation Utilities Unit Tests
 */

import {
    collectErrors,
    validateCapacity,
    validateDuration,
    validateRoleName,
} from '../../../lib/utilities/validation';

describe('Validation Utilities', () => {
    describe('validateRoleName', () => {
        it('should accept DNS-label role names', () => {
            expect(validateRoleName('workers')).toEqual({ valid: true });
            expect(validateRoleName('batch-jobs-2')).toEqual({ valid: true });
        });

        it('should reject uppercase and trailing dashes', () => {
            expect(validateRoleName('Workers').valid).toBe(false);
            expect(validateRoleName('workers-').valid).toBe(false);
        });

        it('should reject names that leave no room for the family prefix', () => {
            expect(validateRoleName('a'.repeat(48))).toEqual({
                valid: false,
                error: `Role name '${'a'.repeat(48)}' is too long (max 47 characters)`,
            });
        });
    });

    describe('validateCapacity', () => {
        it('should accept min <= desired <= max', () => {
            expect(validateCapacity({ min: 1, desired: 2, max: 4 }).valid).toBe(true);
            expect(validateCapacity({ min: 0, desired: 0, max: 1 }).valid).toBe(true);
        });

        it('should reject desired above max', () => {
            expect(validateCapacity({ min: 1, desired: 5, max: 4 })).toEqual({
                valid: false,
                error: 'Capacity must satisfy min <= desired <= max (got 1/5/4)',
            });
        });

        it('should reject fractional values and a zero max', () => {
            expect(validateCapacity({ min: 0.5, desired: 1, max: 2 }).valid).toBe(false);
            expect(validateCapacity({ min: 0, desired: 0, max: 0 }).error).toBe('Capacity max must be at least 1');
        });
    });

    describe('validateDuration', () => {
        it('should require a positive finite number', () => {
            expect(validateDuration('health timeout', 1_000).valid).toBe(true);
            expect(validateDuration('health timeout', 0).error).toBe(
                'health timeout must be a positive number of milliseconds (got 0)',
            );
            expect(validateDuration('health timeout', Number.NaN).valid).toBe(false);
        });
    });

    describe('collectErrors', () => {
        it('should keep only the failures', () => {
            expect(
                collectErrors([validateRoleName('workers'), validateDuration('lock TTL', -1), validateRoleName('A')]),
            ).toEqual([
                'lock TTL must be a positive number of milliseconds (got -1)',
                "Invalid role name: 'A'. Use lowercase letters, digits and '-'",
            ]);
        });
    });
});
