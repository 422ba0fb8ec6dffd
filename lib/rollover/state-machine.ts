/**
 * @format
 * Rollover State Machine
 *
 * Drives one plan through its phases, persisting every completed step
 * before starting the next so a restarted controller resumes from the last
 * committed phase.
 *
 *   Idle → TargetCreated → TargetHealthy → SourceCordoned → SourceDrained → SourceDeleted → Complete
 *
 * A drain that runs past its grace period pauses the plan in
 * SourceCordoned or SourceDrained.
 * Failed is reachable from every active phase. Paused and Failed plans wait
 * for an operator `resume`, which returns them to the phase they stopped in.
 *
 * The graph has no edge into SourceCordoned from before TargetHealthy, so
 * the source never loses capacity before its replacement is serving.
 */

import type { RolloverConfigs } from '../config/rollover/configurations';
import { type Clock, elapsedSince, throwIfCancelled } from '../utilities/clock';
import logger from '../utilities/logger';
import { backoffDelay } from '../utilities/retry';

import type { DrainCoordinator } from './drain-coordinator';
import {
    CancelledError,
    DrainTimeoutError,
    InvalidTransitionError,
    VersionConflictError,
    errorMessage,
    isRolloverError,
} from './errors';
import type { NodegroupDriver } from './nodegroup-driver';
import type { PlanStore } from './plan-store';
import type { ActivePhase, PlanError, RolloverPhase, RolloverPlan } from './types';

// =============================================================================
// TRANSITION GRAPH
// =============================================================================

const RESUMABLE: readonly RolloverPhase[] = [
    'Idle',
    'TargetCreated',
    'TargetHealthy',
    'SourceCordoned',
    'SourceDrained',
    'SourceDeleted',
];

export const VALID_TRANSITIONS: Readonly<Record<RolloverPhase, readonly RolloverPhase[]>> = {
    Idle: ['TargetCreated', 'Failed'],
    TargetCreated: ['TargetHealthy', 'Failed'],
    TargetHealthy: ['SourceCordoned', 'Failed'],
    SourceCordoned: ['SourceDrained', 'Paused', 'Failed'],
    SourceDrained: ['SourceDeleted', 'Paused', 'Failed'],
    SourceDeleted: ['Complete', 'Failed'],
    Complete: [],
    Paused: ['SourceCordoned', 'SourceDrained', 'Failed'],
    Failed: RESUMABLE,
};

const NEXT_PHASE: Readonly<Record<ActivePhase, RolloverPhase>> = {
    Idle: 'TargetCreated',
    TargetCreated: 'TargetHealthy',
    TargetHealthy: 'SourceCordoned',
    SourceCordoned: 'SourceDrained',
    SourceDrained: 'SourceDeleted',
    SourceDeleted: 'Complete',
};

export function canTransition(from: RolloverPhase, to: RolloverPhase): boolean {
    return VALID_TRANSITIONS[from].includes(to);
}

export function isActivePhase(phase: RolloverPhase): phase is ActivePhase {
    return phase in NEXT_PHASE;
}

/** Paused or Failed: nothing happens until an operator acts */
export function isHalted(plan: RolloverPlan): boolean {
    return plan.phase === 'Paused' || plan.phase === 'Failed';
}

/** A plan that still owns its role: not Complete and not aborted */
export function isActivePlan(plan: RolloverPlan): boolean {
    return plan.phase !== 'Complete' && plan.abortedAt === undefined;
}

/**
 * Move a plan to `to`, resetting the attempt budget.
 *
 * @throws InvalidTransitionError for edges outside the graph
 */
export function transition(plan: RolloverPlan, to: RolloverPhase, at: string, detail?: string): RolloverPlan {
    if (!canTransition(plan.phase, to)) {
        throw new InvalidTransitionError(plan.phase, to);
    }
    return {
        ...plan,
        phase: to,
        attempts: 0,
        nextAttemptAt: undefined,
        lastError: undefined,
        haltedIn: undefined,
        updatedAt: at,
        phaseEnteredAt: at,
        history: [...plan.history, detail ? { phase: to, at, detail } : { phase: to, at }],
    };
}

function toPlanError(error: unknown, phase: RolloverPhase, at: string): PlanError {
    return {
        name: error instanceof Error ? error.name : 'Error',
        message: errorMessage(error),
        at,
        phase,
    };
}

// =============================================================================
// STATE MACHINE
// =============================================================================

export type AdvanceStop = 'complete' | 'paused' | 'failed' | 'backoff' | 'observing';

export interface AdvanceResult {
    readonly plan: RolloverPlan;
    readonly stop: AdvanceStop;
}

type StepResult =
    | { readonly kind: 'advanced'; readonly detail?: string; readonly targetHealthySince?: string }
    | { readonly kind: 'observing'; readonly remainingMs: number };

export interface StateMachineDependencies {
    readonly store: PlanStore;
    readonly driver: NodegroupDriver;
    readonly drain: DrainCoordinator;
    readonly clock: Clock;
    readonly settings: RolloverConfigs;
}

export class RolloverStateMachine {
    constructor(private readonly deps: StateMachineDependencies) {}

    /**
     * Advance `plan` as far as it can go in this pass.
     *
     * @throws VersionConflictError if another writer changed the plan
     * @throws CancelledError if the signal aborted; nothing of the
     * interrupted step is persisted
     */
    async advance(plan: RolloverPlan, signal?: AbortSignal): Promise<AdvanceResult> {
        let current = plan;

        for (;;) {
            const phase = current.phase;
            if (phase === 'Complete') return { plan: current, stop: 'complete' };
            if (phase === 'Paused') return { plan: current, stop: 'paused' };
            if (phase === 'Failed') return { plan: current, stop: 'failed' };
            if (current.nextAttemptAt && elapsedSince(this.deps.clock, current.nextAttemptAt) < 0) {
                return { plan: current, stop: 'backoff' };
            }

            throwIfCancelled(signal, `step ${phase} of ${current.role}`);

            let result: StepResult;
            try {
                result = await this.step(current, phase, signal);
            } catch (error) {
                if (error instanceof CancelledError || error instanceof VersionConflictError) {
                    throw error;
                }
                current = await this.recordFailure(current, phase, error);
                continue;
            }

            if (result.kind === 'observing') {
                logger.roleInfo(
                    current.role,
                    `Observing ${current.target.name}: ${Math.ceil(result.remainingMs / 1000)}s of the window left`,
                );
                return { plan: current, stop: 'observing' };
            }

            const to = NEXT_PHASE[phase];
            const at = this.now();
            const next = transition(current, to, at, result.detail);
            current = await this.commit(
                result.targetHealthySince ? { ...next, targetHealthySince: result.targetHealthySince } : next,
                current.version,
            );
            logger.roleInfo(current.role, `${phase} → ${to}${result.detail ? ` (${result.detail})` : ''}`);
        }
    }

    // =========================================================================
    // STEPS
    // =========================================================================

    private async step(plan: RolloverPlan, phase: ActivePhase, signal?: AbortSignal): Promise<StepResult> {
        const { driver, drain, settings } = this.deps;
        const { target, source } = plan;
        const { timeouts } = settings;
        // Waits resume across passes; a retry starts a fresh budget
        const attemptStart = plan.nextAttemptAt ?? plan.phaseEnteredAt;

        switch (phase) {
            case 'Idle': {
                await driver.create(target);
                return { kind: 'advanced', detail: `${target.name} ${target.releaseVersion}` };
            }

            case 'TargetCreated': {
                await driver.waitHealthy(target.name, timeouts.healthTimeoutMs, signal, attemptStart);
                return { kind: 'advanced', detail: target.name, targetHealthySince: this.now() };
            }

            case 'TargetHealthy': {
                const since = plan.targetHealthySince ?? plan.phaseEnteredAt;
                const remainingMs = timeouts.observationWindowMs - elapsedSince(this.deps.clock, since);
                if (remainingMs > 0) {
                    return { kind: 'observing', remainingMs };
                }
                const windowClosedAt = new Date(
                    new Date(since).getTime() + timeouts.observationWindowMs,
                ).toISOString();
                await driver.waitHealthy(
                    target.name,
                    timeouts.healthTimeoutMs,
                    signal,
                    plan.nextAttemptAt ?? windowClosedAt,
                );
                const cordoned = await drain.cordon(source);
                return { kind: 'advanced', detail: `${source}, ${cordoned} node(s)` };
            }

            case 'SourceCordoned': {
                const drained = await drain.drain(source, timeouts.drainGracePeriodMs, signal, attemptStart);
                return { kind: 'advanced', detail: `${source}, ${drained.evicted} pod(s) evicted` };
            }

            case 'SourceDrained': {
                await driver.waitHealthy(target.name, timeouts.healthTimeoutMs, signal, attemptStart);
                const remaining = await drain.remainingPods(source);
                if (remaining.length > 0) {
                    logger.roleWarn(plan.role, `${remaining.length} pod(s) reappeared on ${source}, draining again`);
                    await drain.cordon(source);
                    await drain.drain(source, timeouts.drainGracePeriodMs, signal, attemptStart);
                }
                await driver.delete(source);
                return { kind: 'advanced', detail: source };
            }

            case 'SourceDeleted': {
                await driver.waitDeleted(source, timeouts.deleteTimeoutMs, signal, attemptStart);
                return { kind: 'advanced', detail: `${target.name} serving ${plan.role}` };
            }
        }
    }

    // =========================================================================
    // FAILURE HANDLING
    // =========================================================================

    /**
     * Drain timeouts pause the plan. Retryable errors back off until the
     * attempt budget runs out; anything else fails the plan. Completed
     * side effects are never rolled back.
     */
    private async recordFailure(plan: RolloverPlan, phase: ActivePhase, error: unknown): Promise<RolloverPlan> {
        const at = this.now();
        const lastError = toPlanError(error, phase, at);
        const attempts = plan.attempts + 1;
        const { retry } = this.deps.settings;

        if (error instanceof DrainTimeoutError) {
            logger.roleWarn(plan.role, `Pausing: ${error.message}`);
            const paused = transition(plan, 'Paused', at, error.message);
            return this.commit({ ...paused, haltedIn: phase, lastError, attempts }, plan.version);
        }

        if (isRolloverError(error) && error.retryable && attempts < retry.maxAttempts) {
            const delayMs = backoffDelay(attempts, retry);
            logger.roleWarn(
                plan.role,
                `${phase} attempt ${attempts}/${retry.maxAttempts} failed (${lastError.message}), retrying in ${Math.round(delayMs / 1000)}s`,
            );
            return this.commit(
                {
                    ...plan,
                    attempts,
                    lastError,
                    nextAttemptAt: new Date(new Date(at).getTime() + delayMs).toISOString(),
                    updatedAt: at,
                },
                plan.version,
            );
        }

        logger.roleError(plan.role, `Plan failed in ${phase}: ${lastError.name}: ${lastError.message}`);
        const failed = transition(plan, 'Failed', at, `${lastError.name} in ${phase}`);
        return this.commit({ ...failed, haltedIn: phase, lastError, attempts }, plan.version);
    }

    private commit(plan: RolloverPlan, expectedVersion: number): Promise<RolloverPlan> {
        return this.deps.store.putPlan(plan, expectedVersion);
    }

    private now(): string {
        return this.deps.clock.now().toISOString();
    }
}
