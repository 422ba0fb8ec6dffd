/**
 * @format
 * Nodegroup Lifecycle Driver
 *
 * Idempotent create/delete and bounded waits over the `NodegroupApi`.
 * Provider operations are not atomic: a nodegroup may be created and never
 * become healthy. The driver reports that as `PartialFailure` and never
 * recreates or rolls back on its own.
 */

import { STATUS_POLL_INTERVAL_MS } from '../config/defaults';
import { type Clock, elapsedSince, throwIfCancelled } from '../utilities/clock';
import logger from '../utilities/logger';
import { createRequestToken } from '../utilities/naming';

import { ConflictError, NotFoundError, PartialFailure, TimeoutError } from './errors';
import type { NodegroupApi, WorkloadApi } from './ports';
import type { Nodegroup, NodegroupSpec } from './types';

/**
 * Differences between an observed nodegroup and the nodegroup spec it should match.
 * Empty when they agree on every field `create` is idempotent over.
 */
export function specDifferences(nodegroup: Nodegroup, spec: NodegroupSpec): string[] {
    const differences: string[] = [];
    const compare = (field: string, actual: unknown, expected: unknown): void => {
        if (actual !== expected) {
            differences.push(`${field}: ${String(actual)} != ${String(expected)}`);
        }
    };

    compare('role', nodegroup.role, spec.role);
    compare('amiFamily', nodegroup.amiFamily, spec.amiFamily);
    compare('releaseVersion', nodegroup.releaseVersion, spec.releaseVersion);
    compare('capacity.desired', nodegroup.capacity.desired, spec.capacity.desired);
    compare('capacity.min', nodegroup.capacity.min, spec.capacity.min);
    compare('capacity.max', nodegroup.capacity.max, spec.capacity.max);
    compare('placement', nodegroup.placement, spec.placement);
    compare('instanceTypes', [...nodegroup.instanceTypes].sort().join(','), [...spec.instanceTypes].sort().join(','));
    return differences;
}

export interface NodegroupDriverOptions {
    readonly pollIntervalMs?: number;
}

export class NodegroupDriver {
    private readonly pollIntervalMs: number;

    constructor(
        private readonly nodegroups: NodegroupApi,
        private readonly workloads: WorkloadApi,
        private readonly clock: Clock,
        options: NodegroupDriverOptions = {},
    ) {
        this.pollIntervalMs = options.pollIntervalMs ?? STATUS_POLL_INTERVAL_MS;
    }

    // =========================================================================
    // CREATE
    // =========================================================================

    /**
     * Create the nodegroup unless a matching one already exists.
     *
     * @throws ConflictError if a same-name nodegroup has a different spec
     * @throws PartialFailure if a same-name nodegroup exists in Failed
     */
    async create(spec: NodegroupSpec): Promise<string> {
        const existing = await this.nodegroups.describeNodegroup(spec.name);
        if (existing) {
            this.assertReusable(existing, spec);
            logger.debug(`Nodegroup ${spec.name} already exists (${existing.lifecycle}), not re-creating`);
            return spec.name;
        }

        try {
            await this.nodegroups.createNodegroup(spec, createRequestToken(spec.name, spec.releaseVersion));
        } catch (error) {
            // Lost a create race: accept the winner if it is the same nodegroup
            if (error instanceof ConflictError) {
                const winner = await this.nodegroups.describeNodegroup(spec.name);
                if (winner) {
                    this.assertReusable(winner, spec);
                    return spec.name;
                }
            }
            throw error;
        }

        logger.info(`Requested nodegroup ${spec.name} (${spec.amiFamily} ${spec.releaseVersion})`);
        return spec.name;
    }

    private assertReusable(existing: Nodegroup, spec: NodegroupSpec): void {
        if (existing.lifecycle === 'Failed') {
            throw new PartialFailure(
                spec.name,
                `Nodegroup ${spec.name} exists but failed: ${existing.issues.join('; ') || 'no issues reported'}`,
            );
        }
        if (existing.lifecycle === 'Deleting' || existing.lifecycle === 'Deleted') {
            throw new ConflictError(`Nodegroup ${spec.name} is being deleted`);
        }
        const differences = specDifferences(existing, spec);
        if (differences.length > 0) {
            throw new ConflictError(`Nodegroup ${spec.name} exists with a different spec (${differences.join(', ')})`);
        }
    }

    // =========================================================================
    // WAITS
    // =========================================================================

    /**
     * Wait until the provider reports the nodegroup active and `desired`
     * nodes are Ready and schedulable. The timeout runs from `startedAt`,
     * so a wait resumed by a later pass keeps the budget it already used.
     *
     * @throws TimeoutError, PartialFailure, NotFoundError or CancelledError
     */
    async waitHealthy(
        name: string,
        timeoutMs: number,
        signal?: AbortSignal,
        startedAt = this.clock.now().toISOString(),
    ): Promise<Nodegroup> {
        for (;;) {
            throwIfCancelled(signal, `waitHealthy ${name}`);

            const nodegroup = await this.nodegroups.describeNodegroup(name);
            if (!nodegroup) {
                throw new NotFoundError(`nodegroup ${name}`);
            }
            if (nodegroup.lifecycle === 'Failed') {
                throw new PartialFailure(
                    name,
                    `Nodegroup ${name} failed while provisioning: ${nodegroup.issues.join('; ') || 'no issues reported'}`,
                );
            }

            let progress = `status ${nodegroup.lifecycle}`;
            if (nodegroup.lifecycle === 'Healthy') {
                const nodes = await this.workloads.listNodes(name);
                const ready = nodes.filter((n) => n.ready && n.schedulable).length;
                if (ready >= nodegroup.capacity.desired) {
                    return nodegroup;
                }
                progress = `${ready}/${nodegroup.capacity.desired} nodes ready`;
            }

            const elapsed = elapsedSince(this.clock, startedAt);
            if (elapsed >= timeoutMs) {
                throw new TimeoutError(`waitHealthy ${name}`, timeoutMs, progress);
            }
            logger.verbose(`Waiting for ${name} to become healthy (${progress})`);
            await this.clock.sleep(Math.min(this.pollIntervalMs, timeoutMs - elapsed), signal);
        }
    }

    /**
     * Wait until the nodegroup no longer exists.
     *
     * @throws TimeoutError, PartialFailure or CancelledError
     */
    async waitDeleted(
        name: string,
        timeoutMs: number,
        signal?: AbortSignal,
        startedAt = this.clock.now().toISOString(),
    ): Promise<void> {
        for (;;) {
            throwIfCancelled(signal, `waitDeleted ${name}`);

            const nodegroup = await this.nodegroups.describeNodegroup(name);
            if (!nodegroup || nodegroup.lifecycle === 'Deleted') {
                return;
            }
            if (nodegroup.lifecycle === 'Failed') {
                throw new PartialFailure(
                    name,
                    `Deletion of ${name} failed: ${nodegroup.issues.join('; ') || 'no issues reported'}`,
                );
            }

            const elapsed = elapsedSince(this.clock, startedAt);
            if (elapsed >= timeoutMs) {
                throw new TimeoutError(`waitDeleted ${name}`, timeoutMs, `status ${nodegroup.lifecycle}`);
            }
            await this.clock.sleep(Math.min(this.pollIntervalMs, timeoutMs - elapsed), signal);
        }
    }

    // =========================================================================
    // DELETE / UPDATE
    // =========================================================================

    /**
     * Delete the nodegroup. Absent or already-deleting nodegroups succeed.
     *
     * @throws ConflictError for nodegroups the controller does not manage
     */
    async delete(name: string): Promise<void> {
        const nodegroup = await this.nodegroups.describeNodegroup(name);
        if (!nodegroup || nodegroup.lifecycle === 'Deleted') {
            logger.debug(`Nodegroup ${name} already deleted`);
            return;
        }
        if (nodegroup.lifecycle === 'Deleting') {
            logger.debug(`Nodegroup ${name} already deleting`);
            return;
        }
        if (!nodegroup.managed) {
            throw new ConflictError(`Refusing to delete unmanaged nodegroup ${name}`);
        }

        const requested = await this.nodegroups.deleteNodegroup(name);
        if (requested) {
            logger.info(`Requested deletion of nodegroup ${name}`);
        }
    }

    /**
     * Start an in-place release update of a managed nodegroup.
     *
     * @returns the provider update id
     */
    async updateRelease(name: string, releaseVersion: string): Promise<string> {
        const nodegroup = await this.nodegroups.describeNodegroup(name);
        if (!nodegroup) {
            throw new NotFoundError(`nodegroup ${name}`);
        }
        if (!nodegroup.managed) {
            throw new ConflictError(`Refusing to update unmanaged nodegroup ${name}`);
        }
        const updateId = await this.nodegroups.updateNodegroupRelease(name, releaseVersion);
        logger.info(`Started in-place update of ${name} to ${releaseVersion} (update ${updateId})`);
        return updateId;
    }
}
