/**
 * @format
 * Drain Coordinator
 *
 * Cordon and drain the nodes of a nodegroup. Evictions go through the
 * eviction API; a budget that refuses an eviction is waited out until the
 * grace period ends, and never overridden.
 */

import { DRAIN_POLL_INTERVAL_MS } from '../config/defaults';
import { type Clock, elapsedSince, throwIfCancelled } from '../utilities/clock';
import logger from '../utilities/logger';

import { isEvictable } from './cluster-state-reader';
import { DrainTimeoutError } from './errors';
import type { WorkloadApi } from './ports';
import type { PodRef } from './types';

export interface DrainCoordinatorOptions {
    readonly pollIntervalMs?: number;
}

export interface DrainResult {
    readonly evicted: number;
    readonly rounds: number;
}

function podKey(pod: PodRef): string {
    return `${pod.namespace}/${pod.name}`;
}

export class DrainCoordinator {
    private readonly pollIntervalMs: number;

    constructor(
        private readonly workloads: WorkloadApi,
        private readonly clock: Clock,
        options: DrainCoordinatorOptions = {},
    ) {
        this.pollIntervalMs = options.pollIntervalMs ?? DRAIN_POLL_INTERVAL_MS;
    }

    /** Mark every node of the nodegroup unschedulable */
    async cordon(nodegroup: string): Promise<number> {
        return this.setSchedulable(nodegroup, false);
    }

    /** Make every node of the nodegroup schedulable again */
    async uncordon(nodegroup: string): Promise<number> {
        return this.setSchedulable(nodegroup, true);
    }

    private async setSchedulable(nodegroup: string, schedulable: boolean): Promise<number> {
        const nodes = await this.workloads.listNodes(nodegroup);
        const pending = nodes.filter((n) => n.schedulable !== schedulable);
        for (const node of pending) {
            await this.workloads.setSchedulable(node.name, schedulable);
        }
        logger.debug(
            `${schedulable ? 'Uncordoned' : 'Cordoned'} ${pending.length}/${nodes.length} node(s) of ${nodegroup}`,
        );
        return pending.length;
    }

    /** Evictable pods still running on the nodegroup's nodes */
    async remainingPods(nodegroup: string): Promise<PodRef[]> {
        const nodes = await this.workloads.listNodes(nodegroup);
        const perNode = await Promise.all(nodes.map((n) => this.workloads.listPods(n.name)));
        return perNode.flat().filter(isEvictable);
    }

    /**
     * Evict every evictable pod, retrying blocked evictions until none
     * remain or the grace period, counted from `startedAt`, expires.
     *
     * @throws DrainTimeoutError naming the pods left after the grace period
     * @throws CancelledError when the signal aborts
     */
    async drain(
        nodegroup: string,
        gracePeriodMs: number,
        signal?: AbortSignal,
        startedAt = this.clock.now().toISOString(),
    ): Promise<DrainResult> {
        let evicted = 0;

        for (let round = 1; ; round++) {
            throwIfCancelled(signal, `drain ${nodegroup}`);

            const pods = await this.remainingPods(nodegroup);
            if (pods.length === 0) {
                logger.info(`Drained ${nodegroup}: ${evicted} pod(s) evicted in ${round} round(s)`);
                return { evicted, rounds: round };
            }

            let blocked = 0;
            for (const pod of pods) {
                throwIfCancelled(signal, `drain ${nodegroup}`);
                const outcome = await this.workloads.evictPod(pod);
                if (outcome === 'evicted') {
                    evicted++;
                } else if (outcome === 'blocked') {
                    blocked++;
                }
            }
            const elapsed = elapsedSince(this.clock, startedAt);
            if (elapsed >= gracePeriodMs) {
                const remaining = await this.remainingPods(nodegroup);
                if (remaining.length === 0) {
                    return { evicted, rounds: round };
                }
                throw new DrainTimeoutError(nodegroup, remaining.map(podKey), gracePeriodMs);
            }
            if (blocked > 0) {
                logger.verbose(`${blocked} eviction(s) on ${nodegroup} blocked by disruption budgets, retrying`);
            }
            await this.clock.sleep(Math.min(this.pollIntervalMs, gracePeriodMs - elapsed), signal);
        }
    }
}
