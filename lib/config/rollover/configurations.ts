/**
 * @format
 * Rollover Controller - Configurations
 *
 * Controller behaviour (intervals, timeouts, retry budget) by environment.
 * Every value can be overridden through an environment variable.
 *
 * Usage:
 * ```typescript
 * import { getRolloverConfigs } from '../../config/rollover/configurations';
 * const configs = getRolloverConfigs(Environment.PRODUCTION);
 * const window = configs.timeouts.observationWindowMs; // 900000
 * ```
 */

import { Environment } from '../environments';

// =============================================================================
// TYPE DEFINITIONS
// =============================================================================

/**
 * Per-operation timeouts. None of the controller's waits is unbounded.
 */
export interface RolloverTimeouts {
    /** How long `waitHealthy` waits for a new nodegroup */
    readonly healthTimeoutMs: number;
    /** How long pods may resist eviction before the plan pauses */
    readonly drainGracePeriodMs: number;
    /** How long to wait for the source nodegroup to finish deleting */
    readonly deleteTimeoutMs: number;
    /**
     * Minimum time the target must stay healthy before the source is
     * cordoned and, later, deleted.
     */
    readonly observationWindowMs: number;
}

export interface RolloverRetryConfig {
    /** Attempts per phase before the plan is Failed */
    readonly maxAttempts: number;
    readonly baseDelayMs: number;
    readonly maxDelayMs: number;
}

export interface RolloverConfigs {
    /** Interval between scheduled passes */
    readonly reconcileIntervalMs: number;
    readonly timeouts: RolloverTimeouts;
    readonly retry: RolloverRetryConfig;
    /** Lease length of the per-role lock; must exceed the longest pass */
    readonly lockTtlMs: number;
    readonly pollIntervalMs: number;
}

// =============================================================================
// ENVIRONMENT CONFIGURATIONS
// =============================================================================

const MINUTE = 60_000;

export const ROLLOVER_CONFIGS: Record<Environment, RolloverConfigs> = {
    [Environment.DEVELOPMENT]: {
        reconcileIntervalMs: 5 * MINUTE,
        timeouts: {
            healthTimeoutMs: 20 * MINUTE,
            drainGracePeriodMs: 10 * MINUTE,
            deleteTimeoutMs: 20 * MINUTE,
            observationWindowMs: 2 * MINUTE,
        },
        retry: { maxAttempts: 3, baseDelayMs: MINUTE, maxDelayMs: 10 * MINUTE },
        lockTtlMs: 90 * MINUTE,
        pollIntervalMs: 15_000,
    },
    [Environment.STAGING]: {
        reconcileIntervalMs: 15 * MINUTE,
        timeouts: {
            healthTimeoutMs: 25 * MINUTE,
            drainGracePeriodMs: 15 * MINUTE,
            deleteTimeoutMs: 25 * MINUTE,
            observationWindowMs: 10 * MINUTE,
        },
        retry: { maxAttempts: 4, baseDelayMs: 2 * MINUTE, maxDelayMs: 30 * MINUTE },
        lockTtlMs: 2 * 60 * MINUTE,
        pollIntervalMs: 15_000,
    },
    [Environment.PRODUCTION]: {
        reconcileIntervalMs: 60 * MINUTE,
        timeouts: {
            healthTimeoutMs: 30 * MINUTE,
            drainGracePeriodMs: 30 * MINUTE,
            deleteTimeoutMs: 30 * MINUTE,
            observationWindowMs: 15 * MINUTE,
        },
        retry: { maxAttempts: 5, baseDelayMs: 5 * MINUTE, maxDelayMs: 60 * MINUTE },
        lockTtlMs: 3 * 60 * MINUTE,
        pollIntervalMs: 30_000,
    },
};

// =============================================================================
// ENVIRONMENT VARIABLE OVERRIDES
// =============================================================================

/**
 * Read a numeric value from process.env.
 * Returns undefined if the variable is not set or not a number.
 */
function numberFromEnv(key: string, env: NodeJS.ProcessEnv): number | undefined {
    const raw = env[key];
    if (!raw) return undefined;
    const parsed = Number(raw);
    return Number.isFinite(parsed) ? parsed : undefined;
}

function secondsFromEnv(key: string, env: NodeJS.ProcessEnv): number | undefined {
    const seconds = numberFromEnv(key, env);
    return seconds === undefined ? undefined : seconds * 1000;
}

/**
 * Resolve controller configurations for an environment, applying overrides:
 *
 *   RECONCILE_INTERVAL_SECONDS, HEALTH_TIMEOUT_SECONDS, DRAIN_GRACE_SECONDS,
 *   DELETE_TIMEOUT_SECONDS, OBSERVATION_WINDOW_SECONDS, MAX_ATTEMPTS,
 *   BACKOFF_BASE_SECONDS, BACKOFF_MAX_SECONDS, LOCK_TTL_SECONDS,
 *   POLL_INTERVAL_SECONDS
 */
export function getRolloverConfigs(
    environment: Environment,
    env: NodeJS.ProcessEnv = process.env,
): RolloverConfigs {
    const base = ROLLOVER_CONFIGS[environment];
    return {
        reconcileIntervalMs: secondsFromEnv('RECONCILE_INTERVAL_SECONDS', env) ?? base.reconcileIntervalMs,
        timeouts: {
            healthTimeoutMs: secondsFromEnv('HEALTH_TIMEOUT_SECONDS', env) ?? base.timeouts.healthTimeoutMs,
            drainGracePeriodMs: secondsFromEnv('DRAIN_GRACE_SECONDS', env) ?? base.timeouts.drainGracePeriodMs,
            deleteTimeoutMs: secondsFromEnv('DELETE_TIMEOUT_SECONDS', env) ?? base.timeouts.deleteTimeoutMs,
            observationWindowMs:
                secondsFromEnv('OBSERVATION_WINDOW_SECONDS', env) ?? base.timeouts.observationWindowMs,
        },
        retry: {
            maxAttempts: numberFromEnv('MAX_ATTEMPTS', env) ?? base.retry.maxAttempts,
            baseDelayMs: secondsFromEnv('BACKOFF_BASE_SECONDS', env) ?? base.retry.baseDelayMs,
            maxDelayMs: secondsFromEnv('BACKOFF_MAX_SECONDS', env) ?? base.retry.maxDelayMs,
        },
        lockTtlMs: secondsFromEnv('LOCK_TTL_SECONDS', env) ?? base.lockTtlMs,
        pollIntervalMs: secondsFromEnv('POLL_INTERVAL_SECONDS', env) ?? base.pollIntervalMs,
    };
}
