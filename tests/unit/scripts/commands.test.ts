/**
 * @format
 * Rollover CLI Commands - Unit Tests
 */

import { Environment } from '../../../lib/config/environments';
import type { ControllerConfig } from '../../../lib/config/rollover';
import type { Controller } from '../../../lib/rollover/controller';
import { Scheduler } from '../../../lib/rollover/scheduler';
import {
    abortCommand,
    declareCommand,
    hasFailures,
    passRow,
    reconcileCommand,
    resumeCommand,
    statusCommand,
    statusRow,
} from '../../../scripts/rollover/commands';
import { TEST_SETTINGS, TEST_START, WORKERS_ROLE, buildPlan, createHarness, type Harness } from '../../fixtures';

function controllerFrom(harness: Harness): Controller {
    const config: ControllerConfig = {
        environment: Environment.DEVELOPMENT,
        clusterName: 'test-cluster',
        region: 'eu-west-1',
        planStore: 'memory',
        planTableName: 'nodegroup-rollover-plans',
        rolesFile: 'config/roles.yaml',
        instanceId: 'test-controller',
        settings: TEST_SETTINGS,
        declarations: { roles: [WORKERS_ROLE], families: harness.families },
    };
    return {
        config,
        store: harness.store,
        reader: harness.reader,
        reconciler: harness.reconciler,
        operator: harness.operator,
        scheduler: new Scheduler(harness.reconciler, harness.reconciler.roleNames(), {
            intervalMs: TEST_SETTINGS.reconcileIntervalMs,
        }),
    };
}

describe('Rollover CLI Commands', () => {
    // =========================================================================
    // Formatting
    // =========================================================================
    describe('statusRow', () => {
        it('should show a role without a plan', () => {
            expect(statusRow({ role: 'workers', config: WORKERS_ROLE, active: false })).toEqual([
                'workers',
                'chainguard',
                'no plan',
                '-',
                '-',
                '-',
                '-',
            ]);
        });

        it('should show the plan phase, target and last error', () => {
            const plan = buildPlan('Paused', {
                attempts: 1,
                haltedIn: 'SourceCordoned',
                lastError: { name: 'DrainTimeoutError', message: 'drain exceeded', at: TEST_START, phase: 'SourceCordoned' },
            });

            expect(statusRow({ role: 'workers', config: WORKERS_ROLE, plan, active: true })).toEqual([
                'workers',
                'chainguard',
                'Paused',
                'amazon-1-workers',
                'cgr-1-workers (4)',
                '1',
                'DrainTimeoutError: drain exceeded',
            ]);
        });

        it('should prefer the declared family and mark aborted plans', () => {
            const plan = buildPlan('TargetHealthy', { abortedAt: TEST_START });
            const target = { role: 'workers', amiFamily: 'bottlerocket', declaredAt: TEST_START };

            const row = statusRow({ role: 'workers', config: WORKERS_ROLE, target, plan, active: false });

            expect(row[1]).toBe('bottlerocket');
            expect(row[2]).toBe('TargetHealthy (aborted)');
        });
    });

    describe('passRow / hasFailures', () => {
        it('should fill missing columns with a dash', () => {
            expect(passRow({ role: 'workers', outcome: 'no-source' })).toEqual(['workers', 'no-source', '-', '-']);
        });

        it('should fail only on error and failed outcomes', () => {
            expect(hasFailures([{ role: 'workers', outcome: 'paused', phase: 'Paused' }])).toBe(false);
            expect(hasFailures([{ role: 'workers', outcome: 'skipped' }, { role: 'system', outcome: 'failed' }])).toBe(
                true,
            );
        });
    });

    // =========================================================================
    // Commands
    // =========================================================================
    describe('commands', () => {
        let harness: Harness;
        let controller: Controller;

        beforeEach(() => {
            harness = createHarness();
            controller = controllerFrom(harness);
        });

        afterEach(() => {
            jest.restoreAllMocks();
        });

        it('should reconcile every declared role', async () => {
            jest.spyOn(console, 'log').mockImplementation(() => undefined);

            await expect(reconcileCommand(controller)).resolves.toEqual([{ role: 'workers', outcome: 'no-source' }]);
        });

        it('should report a role that is not declared', async () => {
            jest.spyOn(console, 'log').mockImplementation(() => undefined);

            await expect(reconcileCommand(controller, 'batch')).resolves.toEqual([
                { role: 'batch', outcome: 'error', detail: "Role 'batch' is not declared" },
            ]);
        });

        it('should print status as JSON', async () => {
            const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
            await declareCommand(controller, 'workers', 'bottlerocket', '1.20.0');

            await statusCommand(controller, 'workers', true);

            expect(log).toHaveBeenCalledTimes(1);
            expect(JSON.parse(String(log.mock.calls[0][0]))).toEqual([
                {
                    role: 'workers',
                    config: { role: 'workers', amiFamily: 'chainguard', strategy: 'replace' },
                    target: {
                        role: 'workers',
                        amiFamily: 'bottlerocket',
                        pinnedRelease: '1.20.0',
                        declaredAt: TEST_START,
                    },
                    active: false,
                },
            ]);
        });

        it('should resume a paused plan', async () => {
            await harness.store.putPlan(buildPlan('Paused', { haltedIn: 'SourceCordoned' }), 0);

            await resumeCommand(controller, 'workers');

            await expect(harness.store.getPlan('workers')).resolves.toMatchObject({
                phase: 'SourceCordoned',
                version: 2,
            });
        });

        it('should refuse to abort when no plan is active', async () => {
            await expect(abortCommand(controller, 'workers')).rejects.toThrow(
                'Not found: active plan for role workers',
            );
        });
    });
});
