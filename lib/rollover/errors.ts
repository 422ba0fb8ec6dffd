/**
 * @format
 * Rollover Error Taxonomy
 *
 * Every failure the controller reasons about has its own class with a
 * literal `name` and a `retryable` flag. The state machine decides between
 * "retry with backoff", "pause" and "fail the plan" from these alone.
 *
 * | Error                   | Retryable | Plan outcome                      |
 * |-------------------------|-----------|-----------------------------------|
 * | ResolutionError         | yes       | backoff, then Failed              |
 * | ClusterUnreachableError | yes       | backoff, then Failed              |
 * | TimeoutError            | yes       | backoff, then Failed              |
 * | PartialFailure          | yes       | retry forward, then Failed        |
 * | DrainTimeoutError       | no        | Paused (operator resumes)         |
 * | NotFoundError           | no        | Failed                            |
 * | ConflictError           | no        | Failed (operator correction)      |
 * | VersionConflictError    | no        | pass yields to the other writer   |
 * | CancelledError          | no        | nothing persisted                 |
 */

export abstract class RolloverError extends Error {
    abstract readonly retryable: boolean;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

/** Release feed unreachable or no eligible release published */
export class ResolutionError extends RolloverError {
    readonly name = 'ResolutionError' as const;
    readonly retryable = true;
}

/** Provisioning or workload API could not be reached */
export class ClusterUnreachableError extends RolloverError {
    readonly name = 'ClusterUnreachableError' as const;
    readonly retryable = true;
}

/** A nodegroup (or other resource) the plan depends on does not exist */
export class NotFoundError extends RolloverError {
    readonly name = 'NotFoundError' as const;
    readonly retryable = false;

    constructor(
        readonly resource: string,
        message = `Not found: ${resource}`,
    ) {
        super(message);
    }
}

/** A same-name nodegroup exists with a different spec */
export class ConflictError extends RolloverError {
    readonly name = 'ConflictError' as const;
    readonly retryable = false;
}

/** An operation did not reach its goal state within its timeout */
export class TimeoutError extends RolloverError {
    readonly name = 'TimeoutError' as const;
    readonly retryable = true;

    constructor(
        readonly operation: string,
        readonly timeoutMs: number,
        detail?: string,
    ) {
        super(`${operation} timed out after ${timeoutMs}ms${detail ? `: ${detail}` : ''}`);
    }
}

/** Pods remained on a nodegroup after the drain grace period */
export class DrainTimeoutError extends RolloverError {
    readonly name = 'DrainTimeoutError' as const;
    readonly retryable = false;

    constructor(
        readonly nodegroup: string,
        readonly remainingPods: readonly string[],
        gracePeriodMs: number,
    ) {
        super(
            `Drain of ${nodegroup} exceeded ${gracePeriodMs}ms with ${remainingPods.length} pod(s) remaining: ${remainingPods.join(', ')}`,
        );
    }
}

/**
 * A provider operation completed only partly, e.g. a nodegroup was created
 * but never became healthy. Never answered with automatic rollback.
 */
export class PartialFailure extends RolloverError {
    readonly name = 'PartialFailure' as const;
    readonly retryable = true;

    constructor(
        readonly nodegroup: string,
        message: string,
    ) {
        super(message);
    }
}

/** Optimistic write lost: the stored record changed since it was read */
export class VersionConflictError extends RolloverError {
    readonly name = 'VersionConflictError' as const;
    readonly retryable = false;

    constructor(
        readonly role: string,
        readonly expectedVersion: number,
    ) {
        super(`Plan for role ${role} changed concurrently (expected version ${expectedVersion})`);
    }
}

/** A phase change outside the transition graph */
export class InvalidTransitionError extends RolloverError {
    readonly name = 'InvalidTransitionError' as const;
    readonly retryable = false;

    constructor(from: string, to: string) {
        super(`Invalid plan transition: ${from} → ${to}`);
    }
}

/** The pass was aborted, typically on shutdown */
export class CancelledError extends RolloverError {
    readonly name = 'CancelledError' as const;
    readonly retryable = false;

    constructor(operation: string) {
        super(`${operation} cancelled`);
    }
}

/** Invalid controller or role configuration */
export class ConfigurationError extends RolloverError {
    readonly name = 'ConfigurationError' as const;
    readonly retryable = false;
}

export function isRolloverError(error: unknown): error is RolloverError {
    return error instanceof RolloverError;
}

/** Message of any thrown value */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
