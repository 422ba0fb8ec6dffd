/**
 * @format
 * Validation Utilities
 *
 * Input validation helpers for role declarations and controller settings.
 */

import type { Capacity } from '../rollover/types';
import { MAX_NODEGROUP_NAME_LENGTH } from './naming';

/**
 * Validation result
 */
export interface ValidationResult {
    readonly valid: boolean;
    readonly error?: string;
}

const VALID: ValidationResult = { valid: true };

/** Longest family prefix + generation digits + separators we allow for */
const NAME_OVERHEAD = 16;

/**
 * Validate a role name. Roles end up in nodegroup names and node labels,
 * so they must be lowercase DNS-label safe.
 */
export function validateRoleName(role: string): ValidationResult {
    if (!/^[a-z0-9]([a-z0-9-]*[a-z0-9])?$/.test(role)) {
        return {
            valid: false,
            error: `Invalid role name: '${role}'. Use lowercase letters, digits and '-'`,
        };
    }
    if (role.length > MAX_NODEGROUP_NAME_LENGTH - NAME_OVERHEAD) {
        return {
            valid: false,
            error: `Role name '${role}' is too long (max ${MAX_NODEGROUP_NAME_LENGTH - NAME_OVERHEAD} characters)`,
        };
    }
    return VALID;
}

/**
 * Validate nodegroup scaling bounds: 0 <= min <= desired <= max, max >= 1.
 */
export function validateCapacity(capacity: Capacity): ValidationResult {
    const { min, desired, max } = capacity;
    if (![min, desired, max].every((n) => Number.isInteger(n) && n >= 0)) {
        return { valid: false, error: 'Capacity values must be non-negative integers' };
    }
    if (max < 1) {
        return { valid: false, error: 'Capacity max must be at least 1' };
    }
    if (min > desired || desired > max) {
        return {
            valid: false,
            error: `Capacity must satisfy min <= desired <= max (got ${min}/${desired}/${max})`,
        };
    }
    return VALID;
}

/**
 * Validate a positive duration in milliseconds.
 */
export function validateDuration(name: string, ms: number): ValidationResult {
    if (!Number.isFinite(ms) || ms <= 0) {
        return { valid: false, error: `${name} must be a positive number of milliseconds (got ${ms})` };
    }
    return VALID;
}

/**
 * Collect the errors of several validation results.
 */
export function collectErrors(results: readonly ValidationResult[]): string[] {
    return results.filter((r) => !r.valid).map((r) => r.error ?? 'invalid value');
}
