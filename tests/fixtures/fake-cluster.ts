/**
 * @format
 * Fake Cluster
 *
 * In-process stand-in for EKS and the Kubernetes API, implementing both
 * ports. Nodegroups provision and delete on the fake clock's time; every
 * mutating call is recorded in `calls` for assertions.
 */

import { ROLLOVER_TAGS } from '../../lib/config/defaults';
import { ConflictError } from '../../lib/rollover/errors';
import type { EvictionOutcome, NodegroupApi, WorkloadApi } from '../../lib/rollover/ports';
import type { Capacity, ClusterNode, Nodegroup, NodegroupSpec, PodRef } from '../../lib/rollover/types';

import type { FakeClock } from './fake-clock';

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

interface FakeNodegroup extends Mutable<Nodegroup> {
    readyAt?: number;
    deletedAt?: number;
}

type FakeNode = Mutable<ClusterNode>;

interface FakePod extends Mutable<PodRef> {
    /** Evictions are refused, as by a disruption budget */
    blocked: boolean;
}

export interface SeedNodegroup {
    readonly name: string;
    readonly role: string;
    readonly amiFamily: string;
    readonly releaseVersion: string;
    readonly kubernetesVersion?: string;
    readonly capacity?: Capacity;
    readonly managed?: boolean;
    /** Workload pods per node; a DaemonSet pod is always added as well */
    readonly podsPerNode?: number;
}

export interface FakeClusterOptions {
    /** Time from create until the nodegroup is ACTIVE with Ready nodes */
    readonly provisionMs?: number;
    readonly deleteMs?: number;
}

export class FakeCluster implements NodegroupApi, WorkloadApi {
    private readonly nodegroups = new Map<string, FakeNodegroup>();
    private readonly nodes = new Map<string, FakeNode>();
    private readonly pods = new Map<string, FakePod>();

    readonly calls: string[] = [];

    /** New nodegroups never become healthy */
    stuckProvisioning = false;
    /** New nodegroups end in CREATE_FAILED */
    failProvisioning = false;

    private readonly provisionMs: number;
    private readonly deleteMs: number;

    constructor(
        private readonly clock: FakeClock,
        options: FakeClusterOptions = {},
    ) {
        this.provisionMs = options.provisionMs ?? 120_000;
        this.deleteMs = options.deleteMs ?? 60_000;
    }

    // =========================================================================
    // SEEDING / INSPECTION
    // =========================================================================

    seed(seed: SeedNodegroup): void {
        const capacity = seed.capacity ?? { desired: 2, min: 1, max: 4 };
        this.nodegroups.set(seed.name, {
            name: seed.name,
            role: seed.role,
            amiFamily: seed.amiFamily,
            releaseVersion: seed.releaseVersion,
            kubernetesVersion: seed.kubernetesVersion ?? '1.29',
            capacity,
            placement: 'private',
            instanceTypes: ['m5.large'],
            subnets: ['subnet-a', 'subnet-b'],
            nodeRole: 'arn:aws:iam::123456789012:role/test-node-role',
            labels: { 'node.kubernetes.io/role': seed.role },
            tags: {},
            managed: seed.managed ?? true,
            lifecycle: 'Healthy',
            issues: [],
        });
        this.addNodes(seed.name, capacity.desired, seed.podsPerNode ?? 0);
    }

    has(name: string): boolean {
        this.refresh(name);
        return this.nodegroups.has(name);
    }

    get(name: string): Nodegroup | undefined {
        this.refresh(name);
        const ng = this.nodegroups.get(name);
        return ng ? { ...ng } : undefined;
    }

    nodesOf(name: string): ClusterNode[] {
        return [...this.nodes.values()].filter((n) => n.nodegroup === name).map((n) => ({ ...n }));
    }

    podsOn(nodegroup: string): PodRef[] {
        const nodeNames = new Set(this.nodesOf(nodegroup).map((n) => n.name));
        return [...this.pods.values()].filter((p) => nodeNames.has(p.nodeName)).map((p) => ({ ...p }));
    }

    addPod(
        nodeName: string,
        name: string,
        options: { blocked?: boolean; terminating?: boolean; namespace?: string } = {},
    ): void {
        const namespace = options.namespace ?? 'default';
        this.pods.set(`${namespace}/${name}`, {
            name,
            namespace,
            nodeName,
            daemonSet: false,
            mirror: false,
            terminal: false,
            terminating: options.terminating ?? false,
            blocked: options.blocked ?? false,
        });
    }

    /** The pod ran to completion; it no longer needs evicting */
    completePod(namespace: string, name: string): void {
        const pod = this.pods.get(`${namespace}/${name}`);
        if (pod) {
            pod.terminal = true;
        }
    }

    setLifecycle(name: string, lifecycle: Nodegroup['lifecycle'], issues: string[] = []): void {
        const ng = this.nodegroups.get(name);
        if (ng) {
            ng.lifecycle = lifecycle;
            ng.issues = issues;
        }
    }

    // =========================================================================
    // NodegroupApi
    // =========================================================================

    async listNodegroups(): Promise<string[]> {
        for (const name of [...this.nodegroups.keys()]) {
            this.refresh(name);
        }
        return [...this.nodegroups.keys()].sort();
    }

    async describeNodegroup(name: string): Promise<Nodegroup | undefined> {
        return this.get(name);
    }

    async createNodegroup(spec: NodegroupSpec, requestToken: string): Promise<void> {
        if (this.nodegroups.has(spec.name)) {
            throw new ConflictError(`nodegroup ${spec.name}: ResourceInUseException`);
        }
        this.calls.push(`create ${spec.name} ${spec.releaseVersion} (${requestToken})`);
        this.nodegroups.set(spec.name, {
            name: spec.name,
            role: spec.role,
            amiFamily: spec.amiFamily,
            releaseVersion: spec.releaseVersion,
            kubernetesVersion: spec.kubernetesVersion,
            capacity: spec.capacity,
            placement: spec.placement,
            instanceTypes: spec.instanceTypes,
            subnets: spec.subnets,
            nodeRole: spec.nodeRole,
            labels: spec.labels,
            tags: {
                [ROLLOVER_TAGS.managed]: 'true',
                [ROLLOVER_TAGS.role]: spec.role,
                [ROLLOVER_TAGS.amiFamily]: spec.amiFamily,
                [ROLLOVER_TAGS.release]: spec.releaseVersion,
                [ROLLOVER_TAGS.placement]: spec.placement,
            },
            managed: true,
            lifecycle: 'Provisioning',
            issues: [],
            readyAt: this.clock.now().getTime() + this.provisionMs,
        });
    }

    async deleteNodegroup(name: string): Promise<boolean> {
        const ng = this.nodegroups.get(name);
        if (!ng) {
            return false;
        }
        this.calls.push(`delete ${name}`);
        ng.lifecycle = 'Deleting';
        ng.deletedAt = this.clock.now().getTime() + this.deleteMs;
        return true;
    }

    async updateNodegroupRelease(name: string, releaseVersion: string): Promise<string> {
        const ng = this.nodegroups.get(name);
        // Like EKS, the update leaves the creation-time tags alone
        if (ng) {
            ng.releaseVersion = releaseVersion;
        }
        this.calls.push(`update ${name} ${releaseVersion}`);
        return 'update-1';
    }

    // =========================================================================
    // WorkloadApi
    // =========================================================================

    async listNodes(nodegroup: string): Promise<ClusterNode[]> {
        this.refresh(nodegroup);
        return this.nodesOf(nodegroup).map((n) => ({ ...n, podCount: 0 }));
    }

    async setSchedulable(nodeName: string, schedulable: boolean): Promise<void> {
        const node = this.nodes.get(nodeName);
        if (node) {
            node.schedulable = schedulable;
        }
        this.calls.push(`${schedulable ? 'uncordon' : 'cordon'} ${nodeName}`);
    }

    async listPods(nodeName: string): Promise<PodRef[]> {
        return [...this.pods.values()]
            .filter((p) => p.nodeName === nodeName)
            .map(({ blocked: _blocked, ...pod }) => pod);
    }

    async evictPod(pod: PodRef): Promise<EvictionOutcome> {
        const key = `${pod.namespace}/${pod.name}`;
        const stored = this.pods.get(key);
        if (!stored) {
            return 'gone';
        }
        if (stored.blocked) {
            return 'blocked';
        }
        this.pods.delete(key);
        this.calls.push(`evict ${key}`);
        return 'evicted';
    }

    // =========================================================================
    // SIMULATION
    // =========================================================================

    private addNodes(nodegroup: string, count: number, podsPerNode: number): void {
        for (let i = 1; i <= count; i++) {
            const nodeName = `${nodegroup}-node-${i}`;
            this.nodes.set(nodeName, { name: nodeName, nodegroup, ready: true, schedulable: true, podCount: 0 });
            this.pods.set(`kube-system/aws-node-${nodeName}`, {
                name: `aws-node-${nodeName}`,
                namespace: 'kube-system',
                nodeName,
                daemonSet: true,
                mirror: false,
                terminal: false,
                terminating: false,
                blocked: false,
            });
            for (let p = 1; p <= podsPerNode; p++) {
                this.addPod(nodeName, `app-${i}-${p}`);
            }
        }
    }

    /** Apply time-based provider progress */
    private refresh(name: string): void {
        const ng = this.nodegroups.get(name);
        if (!ng) {
            return;
        }
        const now = this.clock.now().getTime();

        if (ng.lifecycle === 'Provisioning' && ng.readyAt !== undefined && now >= ng.readyAt) {
            if (this.failProvisioning) {
                ng.lifecycle = 'Failed';
                ng.issues = ['NodeCreationFailure: Instances failed to join the kubernetes cluster'];
            } else if (!this.stuckProvisioning) {
                ng.lifecycle = 'Healthy';
                this.addNodes(name, ng.capacity.desired, 0);
            }
            ng.readyAt = undefined;
        }

        if (ng.lifecycle === 'Deleting' && ng.deletedAt !== undefined && now >= ng.deletedAt) {
            this.nodegroups.delete(name);
            for (const node of this.nodesOf(name)) {
                this.nodes.delete(node.name);
                for (const [key, pod] of this.pods) {
                    if (pod.nodeName === node.name) this.pods.delete(key);
                }
            }
        }
    }
}
