/**
 * @format
 * Controller Harness
 *
 * The production classes wired around the fake clock, fake cluster and
 * in-memory storage. Only the SSM client is real; tests mock it with
 * aws-sdk-client-mock.
 */

import { SSMClient } from '@aws-sdk/client-ssm';

import { AmiFamilyRegistry } from '../../lib/config/ami-families';
import type { RolloverConfigs } from '../../lib/config/rollover/configurations';
import { ClusterStateReader } from '../../lib/rollover/cluster-state-reader';
import { DrainCoordinator } from '../../lib/rollover/drain-coordinator';
import { NodegroupDriver } from '../../lib/rollover/nodegroup-driver';
import { OperatorActions } from '../../lib/rollover/operator';
import { InMemoryPlanStore, type PlanStore } from '../../lib/rollover/plan-store';
import { Reconciler } from '../../lib/rollover/reconciler';
import { InMemoryRoleLock, type RoleLock } from '../../lib/rollover/role-lock';
import { RolloverStateMachine } from '../../lib/rollover/state-machine';
import { TargetResolver } from '../../lib/rollover/target-resolver';
import type { RoleConfig } from '../../lib/rollover/types';

import { FakeClock } from './fake-clock';
import { FakeCluster } from './fake-cluster';

const MINUTE = 60_000;

export const TEST_SETTINGS: RolloverConfigs = {
    reconcileIntervalMs: 5 * MINUTE,
    timeouts: {
        healthTimeoutMs: 10 * MINUTE,
        drainGracePeriodMs: 5 * MINUTE,
        deleteTimeoutMs: 10 * MINUTE,
        observationWindowMs: 0,
    },
    retry: { maxAttempts: 3, baseDelayMs: MINUTE, maxDelayMs: 10 * MINUTE },
    lockTtlMs: 60 * MINUTE,
    pollIntervalMs: 15_000,
};

export const WORKERS_ROLE: RoleConfig = {
    role: 'workers',
    amiFamily: 'chainguard',
    strategy: 'replace',
};

export interface Harness {
    readonly clock: FakeClock;
    readonly cluster: FakeCluster;
    readonly store: PlanStore;
    readonly lock: RoleLock;
    readonly families: AmiFamilyRegistry;
    readonly driver: NodegroupDriver;
    readonly drain: DrainCoordinator;
    readonly reader: ClusterStateReader;
    readonly machine: RolloverStateMachine;
    readonly reconciler: Reconciler;
    readonly operator: OperatorActions;
}

export interface HarnessOptions {
    readonly roles?: readonly RoleConfig[];
    readonly settings?: RolloverConfigs;
    /** Share state with another harness, as a restarted or second controller would */
    readonly clock?: FakeClock;
    readonly cluster?: FakeCluster;
    readonly store?: PlanStore;
    readonly lock?: RoleLock;
}

export function createHarness(options: HarnessOptions = {}): Harness {
    const clock = options.clock ?? new FakeClock();
    const cluster = options.cluster ?? new FakeCluster(clock);
    const store = options.store ?? new InMemoryPlanStore();
    const lock = options.lock ?? new InMemoryRoleLock();
    const settings = options.settings ?? TEST_SETTINGS;
    const roles = options.roles ?? [WORKERS_ROLE];
    const families = new AmiFamilyRegistry();

    const driver = new NodegroupDriver(cluster, cluster, clock, { pollIntervalMs: settings.pollIntervalMs });
    const drain = new DrainCoordinator(cluster, clock);
    const reader = new ClusterStateReader(cluster, cluster, clock);
    const resolver = new TargetResolver(new SSMClient({ region: 'eu-west-1' }), families, clock, {
        maxAttempts: 2,
        baseDelayMs: 1000,
    });
    const machine = new RolloverStateMachine({ store, driver, drain, clock, settings });
    const reconciler = new Reconciler({ roles, families, store, lock, reader, resolver, driver, machine, clock });
    const operator = new OperatorActions({ roles, families, store, lock, nodegroups: cluster, drain, clock });

    return { clock, cluster, store, lock, families, driver, drain, reader, machine, reconciler, operator };
}

/** amazon-1-workers on Amazon Linux 2, two nodes with two app pods each */
export function seedWorkersSource(cluster: FakeCluster): void {
    cluster.seed({
        name: 'amazon-1-workers',
        role: 'workers',
        amiFamily: 'amazon-linux-2',
        releaseVersion: '1.29.0-20240101',
        podsPerNode: 2,
    });
}
