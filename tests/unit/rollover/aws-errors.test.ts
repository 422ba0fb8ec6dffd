/**
 * @format
 * AWS Error Classification Unit Tests
 */

import {
    InvalidParameterException,
    ResourceInUseException,
    ResourceNotFoundException,
} from '@aws-sdk/client-eks';

import { classifyAwsError, isAwsNotFound } from '../../../lib/rollover/aws-errors';
import { ClusterUnreachableError, ConflictError, NotFoundError, TimeoutError } from '../../../lib/rollover/errors';

describe('AWS Error Classification', () => {
    it('should map a missing resource to NotFoundError', () => {
        const error = classifyAwsError(
            new ResourceNotFoundException({ message: 'No node group found', $metadata: {} }),
            'nodegroup cgr-1-workers',
        );

        expect(error).toBeInstanceOf(NotFoundError);
        expect(error.message).toBe('nodegroup cgr-1-workers not found: No node group found');
    });

    it('should map resources in use and rejected requests to ConflictError', () => {
        const inUse = classifyAwsError(
            new ResourceInUseException({ message: 'already exists', $metadata: {} }),
            'nodegroup cgr-1-workers',
        );
        const invalid = classifyAwsError(
            new InvalidParameterException({ message: 'bad subnet', $metadata: {} }),
            'nodegroup cgr-1-workers',
        );

        expect(inUse).toBeInstanceOf(ConflictError);
        expect(inUse.message).toBe('nodegroup cgr-1-workers: ResourceInUseException: already exists');
        expect(invalid.retryable).toBe(false);
    });

    it('should treat anything else as a retryable unreachable cluster', () => {
        const throttled = Object.assign(new Error('Rate exceeded'), { name: 'ThrottlingException' });

        const error = classifyAwsError(throttled, 'parameter /feed');

        expect(error).toBeInstanceOf(ClusterUnreachableError);
        expect(error.retryable).toBe(true);
        expect(error.message).toBe('parameter /feed: ThrottlingException: Rate exceeded');
    });

    it('should describe thrown values that are not errors', () => {
        expect(classifyAwsError('socket hang up', 'cluster').message).toBe('cluster: UnknownError: socket hang up');
    });

    it('should pass rollover errors through unchanged', () => {
        const timeout = new TimeoutError('waitHealthy cgr-1-workers', 1_000);

        expect(classifyAwsError(timeout, 'nodegroup cgr-1-workers')).toBe(timeout);
    });

    it('should detect not-found errors by name', () => {
        expect(isAwsNotFound(new ResourceNotFoundException({ message: 'gone', $metadata: {} }))).toBe(true);
        expect(isAwsNotFound(new Error('gone'))).toBe(false);
        expect(isAwsNotFound(undefined)).toBe(false);
    });
});
