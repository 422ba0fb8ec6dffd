/**
 * @format
 * External API Ports
 *
 * The controller talks to the cluster only through these two interfaces.
 * `EksNodegroupApi` and `KubernetesWorkloadApi` are the production
 * implementations; tests run against in-process fakes.
 */

import type { ClusterNode, Nodegroup, NodegroupSpec, PodRef } from './types';

/**
 * Cluster provisioning API (EKS managed nodegroups).
 *
 * Implementations translate provider errors into the rollover taxonomy:
 * unreachable/throttled → ClusterUnreachableError, in-use → ConflictError.
 */
export interface NodegroupApi {
    listNodegroups(): Promise<string[]>;
    /** Undefined when the nodegroup does not exist */
    describeNodegroup(name: string): Promise<Nodegroup | undefined>;
    /**
     * Request creation. The request token makes provider-side retries of
     * the same request idempotent.
     */
    createNodegroup(spec: NodegroupSpec, requestToken: string): Promise<void>;
    /** Request deletion; resolves false when the nodegroup was already gone */
    deleteNodegroup(name: string): Promise<boolean>;
    /** Start an in-place release update; resolves to the provider update id */
    updateNodegroupRelease(name: string, releaseVersion: string): Promise<string>;
}

export type EvictionOutcome = 'evicted' | 'blocked' | 'gone';

/**
 * Workload orchestration API (Kubernetes core/v1).
 */
export interface WorkloadApi {
    /** Nodes labelled as members of the nodegroup, pod counts left at 0 */
    listNodes(nodegroup: string): Promise<ClusterNode[]>;
    setSchedulable(nodeName: string, schedulable: boolean): Promise<void>;
    listPods(nodeName: string): Promise<PodRef[]>;
    /**
     * Evict through the eviction subresource so disruption budgets apply.
     * `blocked` means a budget refused the eviction for now.
     */
    evictPod(pod: PodRef): Promise<EvictionOutcome>;
}
