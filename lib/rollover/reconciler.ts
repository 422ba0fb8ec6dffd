/**
 * @format
 * Reconciler
 *
 * One pass for one role:
 *
 * 1. Take the role lock (held elsewhere → `skipped`)
 * 2. Advance the role's active plan, if there is one
 * 3. Otherwise compare the live nodegroup with the resolved target and,
 *    when they differ, update in place or start a new plan
 *
 * A pass never throws: every outcome, including errors, is returned as a
 * `PassResult` for the scheduler, CLI and Lambda to report.
 */

import type { AmiFamilyRegistry } from '../config/ami-families';
import type { Clock } from '../utilities/clock';
import logger from '../utilities/logger';
import { nextNodegroupName } from '../utilities/naming';

import type { ClusterStateReader } from './cluster-state-reader';
import { CancelledError, ConfigurationError, ResolutionError, VersionConflictError, errorMessage } from './errors';
import type { NodegroupDriver } from './nodegroup-driver';
import type { PlanStore } from './plan-store';
import type { RoleLock } from './role-lock';
import { type AdvanceStop, type RolloverStateMachine, isActivePlan, isHalted } from './state-machine';
import type { TargetResolver } from './target-resolver';
import type { Nodegroup, NodegroupSpec, RoleConfig, RolloverPhase, RolloverPlan } from './types';

// =============================================================================
// RESULTS
// =============================================================================

export type PassOutcome =
    | 'skipped'
    | 'awaiting-operator'
    | 'backoff'
    | 'observing'
    | 'complete'
    | 'paused'
    | 'failed'
    | 'no-source'
    | 'ambiguous'
    | 'busy'
    | 'up-to-date'
    | 'updated-in-place'
    | 'conflict'
    | 'cancelled'
    | 'error';

export interface PassResult {
    readonly role: string;
    readonly outcome: PassOutcome;
    readonly phase?: RolloverPhase;
    readonly detail?: string;
}

/** Anything that can run a pass; the scheduler depends only on this */
export interface PassRunner {
    reconcile(role: string, signal?: AbortSignal): Promise<PassResult>;
}

const OUTCOME_BY_STOP: Readonly<Record<AdvanceStop, PassOutcome>> = {
    complete: 'complete',
    paused: 'paused',
    failed: 'failed',
    backoff: 'backoff',
    observing: 'observing',
};

// =============================================================================
// TARGET SPEC
// =============================================================================

/**
 * Spec of the nodegroup that replaces `source`: the source's shape with the
 * role's overrides applied, on the target family and release.
 */
export function deriveTargetSpec(
    source: Nodegroup,
    role: RoleConfig,
    family: { readonly name: string; readonly namePrefix: string },
    releaseVersion: string,
): NodegroupSpec {
    if (!source.nodeRole) {
        throw new ConfigurationError(`Nodegroup ${source.name} reports no node IAM role to reuse`);
    }
    return {
        name: nextNodegroupName(source.name, family.namePrefix, role.role),
        role: role.role,
        amiFamily: family.name,
        releaseVersion,
        kubernetesVersion: source.kubernetesVersion,
        capacity: role.capacity ?? source.capacity,
        placement: role.placement ?? source.placement,
        instanceTypes: role.instanceTypes ?? source.instanceTypes,
        subnets: source.subnets,
        nodeRole: source.nodeRole,
        labels: { ...source.labels, ...role.labels },
        sshKeyName: role.sshKeyName,
    };
}

// =============================================================================
// RECONCILER
// =============================================================================

export interface ReconcilerDependencies {
    readonly roles: readonly RoleConfig[];
    readonly families: AmiFamilyRegistry;
    readonly store: PlanStore;
    readonly lock: RoleLock;
    readonly reader: ClusterStateReader;
    readonly resolver: TargetResolver;
    readonly driver: NodegroupDriver;
    readonly machine: RolloverStateMachine;
    readonly clock: Clock;
}

export class Reconciler implements PassRunner {
    constructor(private readonly deps: ReconcilerDependencies) {}

    roleNames(): string[] {
        return this.deps.roles.map((r) => r.role);
    }

    async reconcile(role: string, signal?: AbortSignal): Promise<PassResult> {
        const config = this.deps.roles.find((r) => r.role === role);
        if (!config) {
            return { role, outcome: 'error', detail: `Role '${role}' is not declared` };
        }

        let acquired: boolean;
        try {
            acquired = await this.deps.lock.tryAcquire(role);
        } catch (error) {
            return this.failedPass(role, error);
        }
        if (!acquired) {
            logger.roleDebug(role, 'Another pass holds the role lock, skipping');
            return { role, outcome: 'skipped', detail: 'role lock held' };
        }

        try {
            return await this.runPass(config, signal);
        } catch (error) {
            return this.failedPass(role, error);
        } finally {
            await this.deps.lock.release(role).catch((error: unknown) => {
                logger.roleError(role, `Could not release role lock: ${errorMessage(error)}`);
            });
        }
    }

    private failedPass(role: string, error: unknown): PassResult {
        if (error instanceof VersionConflictError) {
            logger.roleWarn(role, 'Plan changed under this pass, yielding to the other writer');
            return { role, outcome: 'conflict', detail: error.message };
        }
        if (error instanceof CancelledError) {
            logger.roleWarn(role, 'Pass cancelled; plan stays at its last committed phase');
            return { role, outcome: 'cancelled', detail: error.message };
        }
        logger.roleError(role, `Pass failed: ${errorMessage(error)}`);
        return { role, outcome: 'error', detail: errorMessage(error) };
    }

    private async runPass(config: RoleConfig, signal?: AbortSignal): Promise<PassResult> {
        const { role } = config;
        const existing = await this.deps.store.getPlan(role);

        if (existing && isActivePlan(existing)) {
            if (isHalted(existing)) {
                return {
                    role,
                    outcome: 'awaiting-operator',
                    phase: existing.phase,
                    detail: existing.lastError?.message,
                };
            }
            return this.advance(existing, signal);
        }

        return this.detect(config, existing, signal);
    }

    private async advance(plan: RolloverPlan, signal?: AbortSignal): Promise<PassResult> {
        const { plan: after, stop } = await this.deps.machine.advance(plan, signal);
        return {
            role: plan.role,
            outcome: OUTCOME_BY_STOP[stop],
            phase: after.phase,
            detail: stop === 'backoff' ? `next attempt at ${after.nextAttemptAt}` : after.lastError?.message,
        };
    }

    /**
     * Look for drift between the live nodegroup and the role's target.
     */
    private async detect(
        config: RoleConfig,
        previous: RolloverPlan | undefined,
        signal?: AbortSignal,
    ): Promise<PassResult> {
        const { role } = config;
        const { families, reader, resolver, store } = this.deps;

        const snapshot = await reader.snapshot();
        const candidates = snapshot.nodegroups.filter(
            (ng) => ng.managed && ng.role === role && ng.lifecycle !== 'Deleting' && ng.lifecycle !== 'Deleted',
        );

        if (candidates.length === 0) {
            logger.roleWarn(role, 'No managed nodegroup found; the first nodegroup of a role is never created here');
            return { role, outcome: 'no-source' };
        }
        if (candidates.length > 1) {
            const names = candidates.map((ng) => ng.name).join(', ');
            logger.roleWarn(role, `Several managed nodegroups (${names}); waiting for one to remain`);
            return { role, outcome: 'ambiguous', detail: names };
        }

        const [source] = candidates;
        if (source.lifecycle !== 'Healthy') {
            return { role, outcome: 'busy', detail: `${source.name} is ${source.lifecycle}` };
        }
        if (!source.kubernetesVersion) {
            throw new ResolutionError(`Nodegroup ${source.name} reports no Kubernetes version`);
        }

        const declared = await store.getTarget(role);
        const familyName = declared?.amiFamily ?? config.amiFamily;
        const pinned = declared ? declared.pinnedRelease : config.pinnedRelease;
        const family = families.get(familyName);

        const release = await resolver.resolve(familyName, {
            kubernetesVersion: source.kubernetesVersion,
            pinned,
            signal,
        });

        if (source.amiFamily === familyName && source.releaseVersion === release) {
            logger.roleDebug(role, `${source.name} already runs ${familyName} ${release}`);
            return { role, outcome: 'up-to-date', detail: `${source.name} ${release}` };
        }

        if (config.strategy === 'in-place' && source.amiFamily === familyName) {
            const updateId = await this.deps.driver.updateRelease(source.name, release);
            return {
                role,
                outcome: 'updated-in-place',
                detail: `${source.name} ${source.releaseVersion} → ${release} (update ${updateId})`,
            };
        }

        const target = deriveTargetSpec(source, config, family, release);
        const at = this.deps.clock.now().toISOString();
        const plan: RolloverPlan = {
            role,
            source: source.name,
            target,
            phase: 'Idle',
            version: 0,
            attempts: 0,
            createdAt: at,
            updatedAt: at,
            phaseEnteredAt: at,
            history: [
                {
                    phase: 'Idle',
                    at,
                    detail: `${source.name} (${source.amiFamily} ${source.releaseVersion}) → ${target.name} (${familyName} ${release})`,
                },
            ],
        };

        // Replaces the previous, finished plan; conflicts with a concurrent creator
        const stored = await store.putPlan(plan, previous?.version ?? 0);
        logger.roleInfo(role, `New plan: ${source.name} → ${target.name} (${familyName} ${release})`);

        return this.advance(stored, signal);
    }
}
