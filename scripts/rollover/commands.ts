/**
 * Rollover CLI Commands
 *
 * Command implementations behind the `nodegroup-rollover` CLI. Each takes
 * a ready Controller so it can run against fakes in tests.
 */

import type { Controller } from '../../lib/rollover/controller';
import type { RoleStatus } from '../../lib/rollover/operator';
import type { PassResult } from '../../lib/rollover/reconciler';
import logger from '../../lib/utilities/logger';

// =============================================================================
// Formatting
// =============================================================================

const STATUS_HEADERS = ['Role', 'Family', 'Phase', 'Source', 'Target', 'Attempts', 'Last error'];

/** One status table row per role */
export function statusRow(status: RoleStatus): string[] {
  const family = status.target?.amiFamily ?? status.config?.amiFamily ?? '-';
  const plan = status.plan;
  if (!plan) {
    return [status.role, family, 'no plan', '-', '-', '-', '-'];
  }
  const phase = plan.abortedAt ? `${plan.phase} (aborted)` : plan.phase;
  return [
    status.role,
    family,
    phase,
    plan.source,
    `${plan.target.name} (${plan.target.releaseVersion})`,
    String(plan.attempts),
    plan.lastError ? `${plan.lastError.name}: ${plan.lastError.message}` : '-',
  ];
}

export function passRow(result: PassResult): string[] {
  return [result.role, result.outcome, result.phase ?? '-', result.detail ?? '-'];
}

/** Outcomes that make a one-shot run exit non-zero */
export function hasFailures(results: readonly PassResult[]): boolean {
  return results.some((r) => r.outcome === 'error' || r.outcome === 'failed');
}

// =============================================================================
// Commands
// =============================================================================

export async function reconcileCommand(controller: Controller, role?: string): Promise<PassResult[]> {
  logger.header(`Reconcile ${controller.config.clusterName}`);
  const roles = role ? [role] : controller.reconciler.roleNames();

  const results: PassResult[] = [];
  for (const r of roles) {
    logger.task(`Reconciling ${r}...`);
    results.push(await controller.reconciler.reconcile(r));
  }

  logger.table(['Role', 'Outcome', 'Phase', 'Detail'], results.map(passRow));
  return results;
}

export async function statusCommand(controller: Controller, role?: string, json = false): Promise<RoleStatus[]> {
  const statuses = role ? [await controller.operator.inspect(role)] : await controller.operator.list();

  if (json) {
    console.log(JSON.stringify(statuses, null, 2));
    return statuses;
  }

  logger.header(`Rollover status: ${controller.config.clusterName}`);
  logger.table(STATUS_HEADERS, statuses.map(statusRow));

  const plan = role ? statuses[0]?.plan : undefined;
  if (plan) {
    logger.info('History:');
    for (const entry of plan.history) {
      logger.keyValue(entry.at, `${entry.phase}${entry.detail ? `: ${entry.detail}` : ''}`);
    }
  }
  return statuses;
}

export async function declareCommand(
  controller: Controller,
  role: string,
  family: string,
  release?: string,
): Promise<void> {
  const target = await controller.operator.declareTarget(role, family, release);
  logger.success(`Role ${target.role} now targets ${target.amiFamily}${release ? ` ${release}` : ''}`);
}

export async function resumeCommand(controller: Controller, role: string): Promise<void> {
  const plan = await controller.operator.resume(role);
  logger.success(`Plan for ${role} resumed in ${plan.phase}`);
}

export async function abortCommand(controller: Controller, role: string): Promise<void> {
  const plan = await controller.operator.abort(role);
  logger.success(`Plan for ${role} aborted in ${plan.phase}`);
  logger.warn(`${plan.target.name} was left in place; delete it manually if it is not wanted`);
}

/**
 * Run the scheduler until SIGINT/SIGTERM, then stop it cleanly.
 */
export async function runCommand(controller: Controller): Promise<void> {
  const { scheduler, config } = controller;

  logger.header(`Nodegroup rollover controller: ${config.clusterName}`);
  logger.keyValue('Environment', config.environment);
  logger.keyValue('Region', config.region);
  logger.keyValue('Plan store', config.planStore === 'memory' ? 'in-memory' : config.planTableName);
  logger.keyValue('Roles', controller.reconciler.roleNames().join(', '));

  await new Promise<void>((resolve) => {
    const shutdown = (signal: string): void => {
      logger.warn(`${signal} received, stopping after in-flight steps are cancelled`);
      scheduler.stop().then(resolve, (error: unknown) => {
        logger.error(`Scheduler did not stop cleanly: ${String(error)}`);
        resolve();
      });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
    scheduler.start();
  });
}
