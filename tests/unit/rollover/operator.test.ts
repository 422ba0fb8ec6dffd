/**
 * @format
 * Operator Actions - Unit Tests
 */

import { ConfigurationError, ConflictError, NotFoundError } from '../../../lib/rollover/errors';
import { TEST_START, WORKERS_ROLE, buildPlan, createHarness, seedWorkersSource } from '../../fixtures';

describe('OperatorActions', () => {
    // =========================================================================
    // declareTarget()
    // =========================================================================
    describe('declareTarget', () => {
        it('should store the target for a declared role', async () => {
            const h = createHarness();

            const target = await h.operator.declareTarget('workers', 'bottlerocket', '1.20.0');

            expect(target).toEqual({
                role: 'workers',
                amiFamily: 'bottlerocket',
                pinnedRelease: '1.20.0',
                declaredAt: TEST_START,
            });
            await expect(h.store.getTarget('workers')).resolves.toEqual(target);
        });

        it('should reject a role that is not declared', async () => {
            const h = createHarness();

            await expect(h.operator.declareTarget('gpu', 'chainguard')).rejects.toThrow(
                new ConfigurationError("Role 'gpu' is not declared in the roles file"),
            );
        });

        it('should reject an unknown family', async () => {
            const h = createHarness();

            await expect(h.operator.declareTarget('workers', 'gentoo')).rejects.toThrow(ConfigurationError);
        });
    });

    // =========================================================================
    // inspect() / list()
    // =========================================================================
    describe('inspect', () => {
        it('should report a role without a plan', async () => {
            const h = createHarness();

            await expect(h.operator.inspect('workers')).resolves.toEqual({
                role: 'workers',
                config: WORKERS_ROLE,
                target: undefined,
                plan: undefined,
                active: false,
            });
        });

        it('should list stored plans of roles no longer declared', async () => {
            const h = createHarness();
            await h.store.putPlan({ ...buildPlan('Complete'), role: 'legacy' }, 0);

            const statuses = await h.operator.list();

            expect(statuses.map((s) => [s.role, s.active, s.plan?.phase])).toEqual([
                ['legacy', false, 'Complete'],
                ['workers', false, undefined],
            ]);
        });
    });

    // =========================================================================
    // resume()
    // =========================================================================
    describe('resume', () => {
        it('should return a paused plan to the phase it stopped in', async () => {
            const h = createHarness();
            await h.store.putPlan(buildPlan('Paused', { haltedIn: 'SourceDrained', attempts: 1 }), 0);

            const resumed = await h.operator.resume('workers');

            expect(resumed).toMatchObject({ phase: 'SourceDrained', attempts: 0, version: 2, haltedIn: undefined });
            expect(resumed.history[resumed.history.length - 1]).toEqual({
                phase: 'SourceDrained',
                at: TEST_START,
                detail: 'resumed by operator from Paused',
            });
        });

        it('should only resume halted plans', async () => {
            const h = createHarness();
            await h.store.putPlan(buildPlan('SourceCordoned'), 0);

            await expect(h.operator.resume('workers')).rejects.toThrow(
                new ConflictError('Plan for role workers is SourceCordoned; only Paused or Failed plans resume'),
            );
        });

        it('should report a role without an active plan', async () => {
            const h = createHarness();
            await h.store.putPlan(buildPlan('Complete'), 0);

            await expect(h.operator.resume('workers')).rejects.toThrow(
                new NotFoundError('active plan for role workers'),
            );
        });

        it('should not act while a pass holds the role', async () => {
            const h = createHarness();
            await h.store.putPlan(buildPlan('Failed', { haltedIn: 'TargetCreated' }), 0);
            await h.lock.tryAcquire('workers');

            await expect(h.operator.resume('workers')).rejects.toThrow(ConflictError);
            expect((await h.store.getPlan('workers'))?.phase).toBe('Failed');
        });
    });

    // =========================================================================
    // abort()
    // =========================================================================
    describe('abort', () => {
        it('should uncordon the source of a plan stopped mid-drain', async () => {
            const h = createHarness();
            seedWorkersSource(h.cluster);
            await h.drain.cordon('amazon-1-workers');
            await h.store.putPlan(buildPlan('Paused', { haltedIn: 'SourceCordoned' }), 0);

            const aborted = await h.operator.abort('workers');

            expect(aborted.abortedAt).toBe(TEST_START);
            expect(aborted.history[aborted.history.length - 1]).toEqual({
                phase: 'Paused',
                at: TEST_START,
                detail: 'aborted by operator',
            });
            expect(h.cluster.nodesOf('amazon-1-workers').every((n) => n.schedulable)).toBe(true);
            await expect(h.operator.inspect('workers')).resolves.toMatchObject({ active: false });
        });

        it('should leave the source alone before it was cordoned', async () => {
            const h = createHarness();
            seedWorkersSource(h.cluster);
            await h.store.putPlan(buildPlan('TargetCreated'), 0);

            await h.operator.abort('workers');

            expect(h.cluster.calls).toEqual([]);
        });

        it('should release the role lock afterwards', async () => {
            const h = createHarness();
            await h.store.putPlan(buildPlan('TargetCreated'), 0);

            await h.operator.abort('workers');

            await expect(h.lock.tryAcquire('workers')).resolves.toBe(true);
        });
    });
});
