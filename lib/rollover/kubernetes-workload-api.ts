/**
 * @format
 * Kubernetes Workload API
 *
 * Production `WorkloadApi` over the core/v1 API. Nodes are found through the
 * label EKS puts on every member of a managed nodegroup; pods are evicted via
 * the eviction subresource so PodDisruptionBudgets apply.
 */

import { CoreV1Api, HttpError, KubeConfig, PatchUtils, type V1Node, type V1Pod } from '@kubernetes/client-node';

import { EKS_NODEGROUP_LABEL, MIRROR_POD_ANNOTATION } from '../config/defaults';
import logger from '../utilities/logger';

import { ClusterUnreachableError, NotFoundError, type RolloverError } from './errors';
import type { EvictionOutcome, WorkloadApi } from './ports';
import type { ClusterNode, PodRef } from './types';

/** Eviction refused because it would violate a disruption budget */
const TOO_MANY_REQUESTS = 429;
const NOT_FOUND = 404;

/**
 * Build a KubeConfig from an explicit path, or the default lookup
 * (KUBECONFIG, ~/.kube/config, in-cluster service account).
 */
export function loadKubeConfig(kubeconfigPath?: string): KubeConfig {
    const kc = new KubeConfig();
    if (kubeconfigPath) {
        kc.loadFromFile(kubeconfigPath);
    } else {
        kc.loadFromDefault();
    }
    return kc;
}

function statusOf(error: unknown): number | undefined {
    return error instanceof HttpError ? error.statusCode : undefined;
}

function classifyKubeError(error: unknown, resource: string): RolloverError {
    const status = statusOf(error);
    if (status === NOT_FOUND) {
        return new NotFoundError(resource);
    }
    const message = error instanceof Error ? error.message : String(error);
    return new ClusterUnreachableError(`${resource}: ${status ?? 'network'}: ${message}`, { cause: error });
}

export class KubernetesWorkloadApi implements WorkloadApi {
    private readonly core: CoreV1Api;

    constructor(kubeConfig: KubeConfig) {
        this.core = kubeConfig.makeApiClient(CoreV1Api);
    }

    async listNodes(nodegroup: string): Promise<ClusterNode[]> {
        try {
            const { body } = await this.core.listNode(
                undefined,
                undefined,
                undefined,
                undefined,
                `${EKS_NODEGROUP_LABEL}=${nodegroup}`,
            );
            return body.items.map((node) => toClusterNode(node, nodegroup));
        } catch (error) {
            throw classifyKubeError(error, `nodes of ${nodegroup}`);
        }
    }

    async setSchedulable(nodeName: string, schedulable: boolean): Promise<void> {
        const patch = [{ op: 'add', path: '/spec/unschedulable', value: !schedulable }];
        try {
            await this.core.patchNode(nodeName, patch, undefined, undefined, undefined, undefined, undefined, {
                headers: { 'Content-Type': PatchUtils.PATCH_FORMAT_JSON_PATCH },
            });
        } catch (error) {
            throw classifyKubeError(error, `node ${nodeName}`);
        }
    }

    async listPods(nodeName: string): Promise<PodRef[]> {
        try {
            const { body } = await this.core.listPodForAllNamespaces(
                undefined,
                undefined,
                `spec.nodeName=${nodeName}`,
            );
            return body.items.map((pod) => toPodRef(pod, nodeName));
        } catch (error) {
            throw classifyKubeError(error, `pods on ${nodeName}`);
        }
    }

    async evictPod(pod: PodRef): Promise<EvictionOutcome> {
        try {
            await this.core.createNamespacedPodEviction(pod.name, pod.namespace, {
                apiVersion: 'policy/v1',
                kind: 'Eviction',
                metadata: { name: pod.name, namespace: pod.namespace },
            });
            return 'evicted';
        } catch (error) {
            const status = statusOf(error);
            if (status === TOO_MANY_REQUESTS) {
                logger.debug(`Eviction of ${pod.namespace}/${pod.name} blocked by a disruption budget`);
                return 'blocked';
            }
            if (status === NOT_FOUND) {
                return 'gone';
            }
            throw classifyKubeError(error, `pod ${pod.namespace}/${pod.name}`);
        }
    }
}

// =============================================================================
// MAPPING
// =============================================================================

function toClusterNode(node: V1Node, nodegroup: string): ClusterNode {
    const ready = (node.status?.conditions ?? []).some((c) => c.type === 'Ready' && c.status === 'True');
    return {
        name: node.metadata?.name ?? '',
        nodegroup,
        ready,
        schedulable: node.spec?.unschedulable !== true,
        podCount: 0,
    };
}

function toPodRef(pod: V1Pod, nodeName: string): PodRef {
    const phase = pod.status?.phase;
    return {
        name: pod.metadata?.name ?? '',
        namespace: pod.metadata?.namespace ?? 'default',
        nodeName,
        daemonSet: (pod.metadata?.ownerReferences ?? []).some((ref) => ref.kind === 'DaemonSet'),
        mirror: pod.metadata?.annotations?.[MIRROR_POD_ANNOTATION] !== undefined,
        terminal: phase === 'Succeeded' || phase === 'Failed',
        terminating: pod.metadata?.deletionTimestamp !== undefined,
    };
}
