/**
 * @format
 * Operator Actions
 *
 * The manual controls around the automated loop: declare a role's target,
 * inspect plans, resume a Paused or Failed plan, abort an active one.
 *
 * Actions that change a plan take the role lock first, so they never race
 * a running pass, and write through the same version check as the loop.
 */

import type { AmiFamilyRegistry } from '../config/ami-families';
import type { Clock } from '../utilities/clock';
import logger from '../utilities/logger';

import type { DrainCoordinator } from './drain-coordinator';
import { ConfigurationError, ConflictError, NotFoundError } from './errors';
import type { NodegroupApi } from './ports';
import type { PlanStore } from './plan-store';
import type { RoleLock } from './role-lock';
import { isActivePlan, isHalted, transition } from './state-machine';
import type { RoleConfig, RoleTarget, RolloverPhase, RolloverPlan } from './types';

/** Phases after which the source may have cordoned nodes */
const SOURCE_CORDONED: readonly RolloverPhase[] = ['SourceCordoned', 'SourceDrained'];

export interface RoleStatus {
    readonly role: string;
    readonly config?: RoleConfig;
    readonly target?: RoleTarget;
    readonly plan?: RolloverPlan;
    readonly active: boolean;
}

export interface OperatorDependencies {
    readonly roles: readonly RoleConfig[];
    readonly families: AmiFamilyRegistry;
    readonly store: PlanStore;
    readonly lock: RoleLock;
    readonly nodegroups: NodegroupApi;
    readonly drain: DrainCoordinator;
    readonly clock: Clock;
}

export class OperatorActions {
    constructor(private readonly deps: OperatorDependencies) {}

    /**
     * Override the configured family (and optionally pin a release) for a
     * role. Takes effect when the role has no active plan.
     */
    async declareTarget(role: string, amiFamily: string, pinnedRelease?: string): Promise<RoleTarget> {
        if (!this.deps.roles.some((r) => r.role === role)) {
            throw new ConfigurationError(`Role '${role}' is not declared in the roles file`);
        }
        if (!this.deps.families.has(amiFamily)) {
            throw new ConfigurationError(
                `Unknown AMI family '${amiFamily}' (known: ${this.deps.families.names().join(', ')})`,
            );
        }
        const target: RoleTarget = {
            role,
            amiFamily,
            pinnedRelease,
            declaredAt: this.deps.clock.now().toISOString(),
        };
        await this.deps.store.putTarget(target);
        logger.roleInfo(role, `Target declared: ${amiFamily}${pinnedRelease ? ` pinned to ${pinnedRelease}` : ''}`);
        return target;
    }

    async inspect(role: string): Promise<RoleStatus> {
        const [plan, target] = await Promise.all([this.deps.store.getPlan(role), this.deps.store.getTarget(role)]);
        return {
            role,
            config: this.deps.roles.find((r) => r.role === role),
            target,
            plan,
            active: plan !== undefined && isActivePlan(plan),
        };
    }

    /** Status of every declared role, plus any role that only has a stored plan */
    async list(): Promise<RoleStatus[]> {
        const plans = await this.deps.store.listPlans();
        const roles = new Set([...this.deps.roles.map((r) => r.role), ...plans.map((p) => p.role)]);
        return Promise.all([...roles].sort().map((role) => this.inspect(role)));
    }

    /**
     * Return a Paused or Failed plan to the phase it stopped in with a
     * fresh attempt budget.
     */
    async resume(role: string): Promise<RolloverPlan> {
        return this.withLock(role, async () => {
            const plan = await this.activePlan(role);
            if (!isHalted(plan) || !plan.haltedIn) {
                throw new ConflictError(`Plan for role ${role} is ${plan.phase}; only Paused or Failed plans resume`);
            }
            const at = this.deps.clock.now().toISOString();
            const resumed = transition(plan, plan.haltedIn, at, `resumed by operator from ${plan.phase}`);
            const stored = await this.deps.store.putPlan(resumed, plan.version);
            logger.roleInfo(role, `Plan resumed in ${stored.phase}`);
            return stored;
        });
    }

    /**
     * Mark the active plan inactive. A cordoned source that still exists is
     * uncordoned; the target nodegroup is left for the operator.
     */
    async abort(role: string): Promise<RolloverPlan> {
        return this.withLock(role, async () => {
            const plan = await this.activePlan(role);
            const stoppedIn = plan.haltedIn ?? plan.phase;

            if (SOURCE_CORDONED.includes(stoppedIn) && (await this.deps.nodegroups.describeNodegroup(plan.source))) {
                const uncordoned = await this.deps.drain.uncordon(plan.source);
                logger.roleInfo(role, `Uncordoned ${uncordoned} node(s) of ${plan.source}`);
            }

            const at = this.deps.clock.now().toISOString();
            const aborted: RolloverPlan = {
                ...plan,
                abortedAt: at,
                updatedAt: at,
                history: [...plan.history, { phase: plan.phase, at, detail: 'aborted by operator' }],
            };
            const stored = await this.deps.store.putPlan(aborted, plan.version);
            logger.roleWarn(role, `Plan aborted in ${plan.phase}; ${plan.target.name} was not deleted`);
            return stored;
        });
    }

    private async activePlan(role: string): Promise<RolloverPlan> {
        const plan = await this.deps.store.getPlan(role);
        if (!plan || !isActivePlan(plan)) {
            throw new NotFoundError(`active plan for role ${role}`);
        }
        return plan;
    }

    private async withLock<T>(role: string, action: () => Promise<T>): Promise<T> {
        if (!(await this.deps.lock.tryAcquire(role))) {
            throw new ConflictError(`A pass for role ${role} is running; try again when it finishes`);
        }
        try {
            return await action();
        } finally {
            await this.deps.lock.release(role);
        }
    }
}
