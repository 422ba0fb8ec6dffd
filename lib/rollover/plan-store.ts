/**
 * @format
 * Plan Store
 *
 * One plan record and one optional target declaration per role. Every plan
 * write is a compare-and-swap on the record's version counter; a write
 * against a stale version fails with VersionConflictError.
 */

import { VersionConflictError } from './errors';
import type { RoleTarget, RolloverPlan } from './types';

export interface PlanStore {
    getPlan(role: string): Promise<RolloverPlan | undefined>;
    listPlans(): Promise<RolloverPlan[]>;
    /**
     * Store `plan` if the current record is at `expectedVersion` (0: no
     * record yet). Resolves to the stored plan at `expectedVersion + 1`.
     *
     * @throws VersionConflictError when the stored version differs
     */
    putPlan(plan: RolloverPlan, expectedVersion: number): Promise<RolloverPlan>;
    getTarget(role: string): Promise<RoleTarget | undefined>;
    putTarget(target: RoleTarget): Promise<void>;
}

/**
 * Process-local store for tests and single-instance runs.
 */
export class InMemoryPlanStore implements PlanStore {
    private readonly plans = new Map<string, RolloverPlan>();
    private readonly targets = new Map<string, RoleTarget>();

    async getPlan(role: string): Promise<RolloverPlan | undefined> {
        return this.plans.get(role);
    }

    async listPlans(): Promise<RolloverPlan[]> {
        return [...this.plans.values()].sort((a, b) => a.role.localeCompare(b.role));
    }

    async putPlan(plan: RolloverPlan, expectedVersion: number): Promise<RolloverPlan> {
        const current = this.plans.get(plan.role)?.version ?? 0;
        if (current !== expectedVersion) {
            throw new VersionConflictError(plan.role, expectedVersion);
        }
        const stored = { ...plan, version: expectedVersion + 1 };
        this.plans.set(plan.role, stored);
        return stored;
    }

    async getTarget(role: string): Promise<RoleTarget | undefined> {
        return this.targets.get(role);
    }

    async putTarget(target: RoleTarget): Promise<void> {
        this.targets.set(target.role, target);
    }
}
