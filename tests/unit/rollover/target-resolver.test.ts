/**
 * @format
 * Target Resolver - Unit Tests
 *
 * Uses aws-sdk-client-mock to stand in for the SSM release feed.
 */

import { GetParameterCommand, ParameterNotFound, SSMClient } from '@aws-sdk/client-ssm';
import { mockClient } from 'aws-sdk-client-mock';
import 'aws-sdk-client-mock-jest';

import { AmiFamilyRegistry, customFamily } from '../../../lib/config/ami-families';
import { ResolutionError } from '../../../lib/rollover/errors';
import { TargetResolver } from '../../../lib/rollover/target-resolver';
import { FakeClock } from '../../fixtures';

const ssmMock = mockClient(SSMClient);

const AL2023_FEED = '/aws/service/eks/optimized-ami/1.29/amazon-linux-2023/x86_64/standard/recommended/release_version';
const CHAINGUARD_FEED = '/nodegroup-rollover/chainguard/1.29/release';

function setup(families = new AmiFamilyRegistry()): { clock: FakeClock; resolver: TargetResolver } {
    const clock = new FakeClock();
    const resolver = new TargetResolver(new SSMClient({ region: 'eu-west-1' }), families, clock, {
        maxAttempts: 3,
        baseDelayMs: 2_000,
    });
    return { clock, resolver };
}

describe('TargetResolver', () => {
    beforeEach(() => {
        ssmMock.reset();
    });

    it('should read the release for the Kubernetes version from the family feed', async () => {
        ssmMock.on(GetParameterCommand).resolves({ Parameter: { Value: '1.29.3-20240601\n' } });
        const { resolver } = setup();

        const release = await resolver.resolve('amazon-linux-2023', { kubernetesVersion: '1.29' });

        expect(release).toBe('1.29.3-20240601');
        expect(ssmMock).toHaveReceivedCommandWith(GetParameterCommand, { Name: AL2023_FEED });
    });

    it('should return a pinned release without consulting the feed', async () => {
        const { resolver } = setup();

        await expect(resolver.resolve('chainguard', { kubernetesVersion: '1.29', pinned: '3' })).resolves.toBe('3');
        expect(ssmMock).not.toHaveReceivedCommand(GetParameterCommand);
    });

    it('should read custom families from their declared parameter', async () => {
        ssmMock.on(GetParameterCommand).resolves({ Parameter: { Value: '12' } });
        const families = new AmiFamilyRegistry([
            customFamily({
                name: 'wolfi',
                namePrefix: 'wolfi',
                launchTemplateName: 'wolfi-eks-nodes',
                releaseParameter: '/images/wolfi/{kubernetesVersion}/latest',
            }),
        ]);
        const { resolver } = setup(families);

        await expect(resolver.resolve('wolfi', { kubernetesVersion: '1.30' })).resolves.toBe('12');
        expect(ssmMock).toHaveReceivedCommandWith(GetParameterCommand, { Name: '/images/wolfi/1.30/latest' });
    });

    it('should reject a value that is not an eligible release', async () => {
        ssmMock.on(GetParameterCommand).resolves({ Parameter: { Value: 'latest' } });
        const { resolver } = setup();

        await expect(resolver.resolve('chainguard', { kubernetesVersion: '1.29' })).rejects.toThrow(
            `Release 'latest' from ${CHAINGUARD_FEED} is not an eligible chainguard release`,
        );
    });

    it('should reject an unknown family', async () => {
        const { resolver } = setup();

        await expect(resolver.resolve('gentoo', { kubernetesVersion: '1.29' })).rejects.toThrow(
            new ResolutionError("Unknown AMI family 'gentoo'"),
        );
    });

    it('should retry a flaky feed with backoff', async () => {
        ssmMock
            .on(GetParameterCommand)
            .rejectsOnce(new Error('socket hang up'))
            .resolves({ Parameter: { Value: '4' } });
        const { clock, resolver } = setup();

        await expect(resolver.resolve('chainguard', { kubernetesVersion: '1.29' })).resolves.toBe('4');
        expect(clock.sleeps).toEqual([2_000]);
    });

    it('should give up after the attempt budget', async () => {
        ssmMock.on(GetParameterCommand).rejects(new Error('socket hang up'));
        const { clock, resolver } = setup();

        await expect(resolver.resolve('chainguard', { kubernetesVersion: '1.29' })).rejects.toThrow(
            `Release feed ${CHAINGUARD_FEED} unreachable: Error: socket hang up`,
        );
        expect(ssmMock).toHaveReceivedCommandTimes(GetParameterCommand, 3);
        expect(clock.sleeps).toEqual([2_000, 4_000]);
    });

    it('should report a feed that does not exist', async () => {
        ssmMock
            .on(GetParameterCommand)
            .rejects(new ParameterNotFound({ message: 'not found', $metadata: {} }));
        const { resolver } = setup();

        await expect(resolver.resolve('chainguard', { kubernetesVersion: '1.29' })).rejects.toThrow(
            `Release feed ${CHAINGUARD_FEED} does not exist`,
        );
    });

    it('should report an empty feed', async () => {
        ssmMock.on(GetParameterCommand).resolves({ Parameter: { Value: '  ' } });
        const { resolver } = setup();

        await expect(resolver.resolve('chainguard', { kubernetesVersion: '1.29' })).rejects.toThrow(
            `Release feed ${CHAINGUARD_FEED} is empty`,
        );
    });
});
