/**
 * @format
 * Scheduler
 *
 * Runs one pass per role on an interval, and on demand through `trigger`.
 * Each role has its own in-flight pass: a slow drain of one role never
 * delays another, and a role whose previous pass is still running is
 * skipped rather than queued.
 */

import logger from '../utilities/logger';

import { errorMessage } from './errors';
import type { PassResult, PassRunner } from './reconciler';

export interface SchedulerOptions {
    readonly intervalMs: number;
    /** Called with the results of every tick */
    readonly onTick?: (results: readonly PassResult[]) => void;
}

export class Scheduler {
    private readonly inFlight = new Map<string, Promise<PassResult>>();
    private readonly controller = new AbortController();
    private timer: NodeJS.Timeout | undefined;

    constructor(
        private readonly runner: PassRunner,
        private readonly roles: readonly string[],
        private readonly options: SchedulerOptions,
    ) {}

    get running(): boolean {
        return this.timer !== undefined;
    }

    /** Start the interval, running a first tick immediately */
    start(): void {
        if (this.timer || this.controller.signal.aborted) {
            return;
        }
        logger.info(`Scheduler started: ${this.roles.length} role(s) every ${this.options.intervalMs / 1000}s`);
        this.timer = setInterval(() => this.runTick(), this.options.intervalMs);
        this.runTick();
    }

    /**
     * Abort in-flight passes and wait for them to settle. Plans stay at their
     * last committed phase.
     */
    async stop(): Promise<void> {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = undefined;
        }
        this.controller.abort();
        await Promise.allSettled([...this.inFlight.values()]);
        logger.info('Scheduler stopped');
    }

    /** One pass for every role not already in flight */
    tick(): Promise<PassResult[]> {
        return this.trigger();
    }

    /**
     * Run passes now for one role, or for every role.
     */
    async trigger(role?: string): Promise<PassResult[]> {
        const roles = role === undefined ? this.roles : this.roles.filter((r) => r === role);
        if (role !== undefined && roles.length === 0) {
            return [{ role, outcome: 'error', detail: `Role '${role}' is not scheduled` }];
        }
        return Promise.all(roles.map((r) => this.runRole(r)));
    }

    isInFlight(role: string): boolean {
        return this.inFlight.has(role);
    }

    private runTick(): void {
        this.tick()
            .then((results) => this.options.onTick?.(results))
            .catch((error: unknown) => logger.error(`Scheduler tick failed: ${errorMessage(error)}`));
    }

    private runRole(role: string): Promise<PassResult> {
        if (this.controller.signal.aborted) {
            return Promise.resolve({ role, outcome: 'cancelled', detail: 'scheduler stopped' });
        }
        if (this.inFlight.has(role)) {
            logger.roleDebug(role, 'Previous pass still running, skipping');
            return Promise.resolve({ role, outcome: 'skipped', detail: 'previous pass still running' });
        }

        const pass = this.runner.reconcile(role, this.controller.signal).finally(() => {
            this.inFlight.delete(role);
        });
        this.inFlight.set(role, pass);
        return pass;
    }
}
