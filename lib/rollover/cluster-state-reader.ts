/**
 * @format
 * Cluster State Reader
 *
 * Read-only view of the cluster. Node membership and pod counts are read
 * fresh on every call and never cached between passes.
 */

import type { Clock } from '../utilities/clock';

import { NotFoundError } from './errors';
import type { NodegroupApi, WorkloadApi } from './ports';
import type { ClusterNode, ClusterSnapshot, Nodegroup, PodRef } from './types';

/** Pods a drain has to move; everything else stays or recreates itself */
export function isEvictable(pod: PodRef): boolean {
    return !pod.daemonSet && !pod.mirror && !pod.terminal && !pod.terminating;
}

export class ClusterStateReader {
    constructor(
        private readonly nodegroups: NodegroupApi,
        private readonly workloads: WorkloadApi,
        private readonly clock: Clock,
    ) {}

    /**
     * Every nodegroup in the cluster at one point in time.
     */
    async snapshot(): Promise<ClusterSnapshot> {
        const takenAt = this.clock.now().toISOString();
        const names = await this.nodegroups.listNodegroups();
        const described = await Promise.all(names.map((name) => this.describeWithNodes(name)));
        return {
            takenAt,
            nodegroups: described.filter((ng): ng is Nodegroup => ng !== undefined),
        };
    }

    /**
     * @throws NotFoundError if the nodegroup does not exist
     */
    async describe(name: string): Promise<Nodegroup> {
        const nodegroup = await this.describeWithNodes(name);
        if (!nodegroup) {
            throw new NotFoundError(`nodegroup ${name}`);
        }
        return nodegroup;
    }

    /** Nodes of one nodegroup with evictable pod counts */
    async listNodes(name: string): Promise<ClusterNode[]> {
        const nodes = await this.workloads.listNodes(name);
        return Promise.all(
            nodes.map(async (node) => {
                const pods = await this.workloads.listPods(node.name);
                return { ...node, podCount: pods.filter(isEvictable).length };
            }),
        );
    }

    private async describeWithNodes(name: string): Promise<Nodegroup | undefined> {
        const nodegroup = await this.nodegroups.describeNodegroup(name);
        if (!nodegroup || nodegroup.lifecycle !== 'Healthy') {
            return nodegroup;
        }

        // EKS keeps reporting ACTIVE while the controller drains a nodegroup
        const nodes = await this.workloads.listNodes(name);
        if (nodes.length > 0 && nodes.every((n) => !n.schedulable)) {
            return { ...nodegroup, lifecycle: 'Draining' };
        }
        return nodegroup;
    }
}
