/**
 * @format
 * Controller Wiring
 *
 * Builds the production object graph from a `ControllerConfig`. Tests
 * assemble the same classes around in-process fakes instead.
 */

import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { EKSClient } from '@aws-sdk/client-eks';
import { SSMClient } from '@aws-sdk/client-ssm';

import type { ControllerConfig } from '../config/rollover';
import { type Clock, systemClock } from '../utilities/clock';

import { ClusterStateReader } from './cluster-state-reader';
import { DrainCoordinator } from './drain-coordinator';
import { DynamoDbPlanStore, createDocumentClient } from './dynamodb-plan-store';
import { EksNodegroupApi } from './eks-nodegroup-api';
import { KubernetesWorkloadApi, loadKubeConfig } from './kubernetes-workload-api';
import { NodegroupDriver } from './nodegroup-driver';
import { OperatorActions } from './operator';
import { InMemoryPlanStore, type PlanStore } from './plan-store';
import type { NodegroupApi, WorkloadApi } from './ports';
import { Reconciler } from './reconciler';
import { DynamoDbRoleLock, InMemoryRoleLock, type RoleLock } from './role-lock';
import { Scheduler } from './scheduler';
import { RolloverStateMachine } from './state-machine';
import { TargetResolver } from './target-resolver';

export interface Controller {
    readonly config: ControllerConfig;
    readonly store: PlanStore;
    readonly reader: ClusterStateReader;
    readonly reconciler: Reconciler;
    readonly operator: OperatorActions;
    readonly scheduler: Scheduler;
}

/** Overrides for the pieces that talk to the outside world */
export interface ControllerOverrides {
    readonly nodegroups?: NodegroupApi;
    readonly workloads?: WorkloadApi;
    readonly ssm?: SSMClient;
    readonly store?: PlanStore;
    readonly lock?: RoleLock;
    readonly clock?: Clock;
}

function createStorage(config: ControllerConfig, clock: Clock): { store: PlanStore; lock: RoleLock } {
    if (config.planStore === 'memory') {
        return { store: new InMemoryPlanStore(), lock: new InMemoryRoleLock() };
    }
    const docClient = createDocumentClient(new DynamoDBClient({ region: config.region }));
    return {
        store: new DynamoDbPlanStore(docClient, config.planTableName),
        lock: new DynamoDbRoleLock(docClient, config.planTableName, config.instanceId, config.settings.lockTtlMs, clock),
    };
}

export function createController(config: ControllerConfig, overrides: ControllerOverrides = {}): Controller {
    const clock = overrides.clock ?? systemClock;
    const { settings, declarations } = config;

    const nodegroups =
        overrides.nodegroups ??
        new EksNodegroupApi(new EKSClient({ region: config.region }), config.clusterName, declarations.families);
    const workloads = overrides.workloads ?? new KubernetesWorkloadApi(loadKubeConfig(config.kubeconfigPath));
    const storage = createStorage(config, clock);
    const store = overrides.store ?? storage.store;
    const lock = overrides.lock ?? storage.lock;

    const reader = new ClusterStateReader(nodegroups, workloads, clock);
    const driver = new NodegroupDriver(nodegroups, workloads, clock, { pollIntervalMs: settings.pollIntervalMs });
    const drain = new DrainCoordinator(workloads, clock);
    const resolver = new TargetResolver(
        overrides.ssm ?? new SSMClient({ region: config.region }),
        declarations.families,
        clock,
    );
    const machine = new RolloverStateMachine({ store, driver, drain, clock, settings });

    const reconciler = new Reconciler({
        roles: declarations.roles,
        families: declarations.families,
        store,
        lock,
        reader,
        resolver,
        driver,
        machine,
        clock,
    });
    const operator = new OperatorActions({
        roles: declarations.roles,
        families: declarations.families,
        store,
        lock,
        nodegroups,
        drain,
        clock,
    });
    const scheduler = new Scheduler(reconciler, reconciler.roleNames(), {
        intervalMs: settings.reconcileIntervalMs,
    });

    return { config, store, reader, reconciler, operator, scheduler };
}
