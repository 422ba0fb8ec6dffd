/**
 * @format
 * Scheduled Reconciliation Lambda Handler
 *
 * Invoked by an EventBridge schedule. Runs one pass per declared role and
 * reports the outcomes. Passes are cancelled shortly before the function
 * times out; plans stay at their last committed phase and the next
 * invocation resumes them.
 *
 * Environment Variables:
 * - CLUSTER_NAME: EKS cluster to manage (required)
 * - PLAN_TABLE_NAME: DynamoDB table holding plans, targets and locks
 * - ROLES_FILE: Roles file bundled with the function
 * - DEPLOY_ENVIRONMENT: development, staging or production
 */

import { Context, ScheduledEvent } from 'aws-lambda';

import { loadControllerConfig } from '../../lib/config/rollover';
import { type Controller, createController } from '../../lib/rollover/controller';
import type { PassResult } from '../../lib/rollover/reconciler';
import logger from '../../lib/utilities/logger';

/** Time left for the last writes after passes are cancelled */
const SHUTDOWN_MARGIN_MS = 30_000;

/** Outcomes that mean the pass itself went wrong */
const FAILED_OUTCOMES: ReadonlySet<PassResult['outcome']> = new Set(['error', 'failed']);

interface HandlerResponse {
    statusCode: number;
    body: string;
}

let controller: Controller | undefined;

/** Reuse the controller across warm invocations */
function getController(): Controller {
    controller ??= createController(loadControllerConfig());
    return controller;
}

export const handler = async (event: ScheduledEvent, context: Context): Promise<HandlerResponse> => {
    logger.info(`Reconciliation triggered by ${event.source} at ${event.time}`);

    let active: Controller;
    try {
        active = getController();
    } catch (error) {
        logger.error(`Controller configuration invalid: ${String(error)}`);
        return { statusCode: 500, body: JSON.stringify({ error: String(error) }) };
    }

    const abort = new AbortController();
    const deadline = setTimeout(
        () => abort.abort(),
        Math.max(0, context.getRemainingTimeInMillis() - SHUTDOWN_MARGIN_MS),
    );

    const results: PassResult[] = [];
    try {
        // Sequential: one Lambda invocation, one role at a time
        for (const role of active.reconciler.roleNames()) {
            results.push(await active.reconciler.reconcile(role, abort.signal));
        }
    } finally {
        clearTimeout(deadline);
    }

    for (const result of results) {
        logger.keyValue(result.role, `${result.outcome}${result.phase ? ` (${result.phase})` : ''}`);
    }

    const failed = results.some((r) => FAILED_OUTCOMES.has(r.outcome));
    return {
        statusCode: failed ? 500 : 200,
        body: JSON.stringify({ cluster: active.config.clusterName, results }),
    };
};
