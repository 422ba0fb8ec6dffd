/**
 * @format
 * AWS Error Classification
 *
 * Maps AWS SDK v3 service exceptions onto the rollover taxonomy at the
 * adapter boundary, so nothing above the ports inspects SDK error names.
 */

import {
    ClusterUnreachableError,
    ConflictError,
    NotFoundError,
    type RolloverError,
    isRolloverError,
} from './errors';

const NOT_FOUND = new Set(['ResourceNotFoundException', 'ParameterNotFound', 'NotFoundException']);

const CONFLICT = new Set(['ResourceInUseException', 'ResourceLimitExceededException']);

/** Rejected requests that will not succeed on retry without operator action */
const INVALID = new Set([
    'InvalidParameterException',
    'InvalidRequestException',
    'ValidationException',
    'AccessDeniedException',
]);

/**
 * Classify an error thrown by an AWS SDK call.
 *
 * @param resource - What the call was about, used in messages
 */
export function classifyAwsError(error: unknown, resource: string): RolloverError {
    if (isRolloverError(error)) {
        return error;
    }

    const name = error instanceof Error ? error.name : 'UnknownError';
    const message = error instanceof Error ? error.message : String(error);

    if (NOT_FOUND.has(name)) {
        return new NotFoundError(resource, `${resource} not found: ${message}`);
    }
    if (CONFLICT.has(name) || INVALID.has(name)) {
        return new ConflictError(`${resource}: ${name}: ${message}`, { cause: error });
    }
    return new ClusterUnreachableError(`${resource}: ${name}: ${message}`, { cause: error });
}

/** True when the SDK error reports a missing resource */
export function isAwsNotFound(error: unknown): boolean {
    return error instanceof Error && NOT_FOUND.has(error.name);
}
