/**
 * @format
 * Rollover Controller Configuration
 *
 * Reads from environment variables (after `.env` has been loaded by the
 * entry point) with defaults suitable for local development.
 *
 * | Variable            | Default                     |
 * |---------------------|-----------------------------|
 * | DEPLOY_ENVIRONMENT  | development                 |
 * | CLUSTER_NAME        | (required)                  |
 * | AWS_REGION          | eu-west-1                   |
 * | PLAN_STORE          | dynamodb                    |
 * | PLAN_TABLE_NAME     | nodegroup-rollover-plans    |
 * | ROLES_FILE          | config/roles.yaml           |
 * | KUBECONFIG          | kubeconfig default lookup   |
 * | CONTROLLER_INSTANCE_ID | `<HOSTNAME>-<uuid v4>` |
 */

import { v4 as uuidv4 } from 'uuid';

import { DEFAULT_PLAN_TABLE, DEFAULT_REGION, DEFAULT_ROLES_FILE } from '../defaults';
import { Environment, parseEnvironment } from '../environments';
import { ConfigurationError } from '../../rollover/errors';
import { collectErrors, validateDuration } from '../../utilities/validation';

import { getRolloverConfigs, type RolloverConfigs } from './configurations';
import { loadRoleDeclarations, type RoleDeclarations } from './roles';

export type PlanStoreKind = 'dynamodb' | 'memory';

export interface ControllerConfig {
    readonly environment: Environment;
    readonly clusterName: string;
    readonly region: string;
    readonly planStore: PlanStoreKind;
    readonly planTableName: string;
    readonly rolesFile: string;
    readonly kubeconfigPath?: string;
    /** Identifies this controller instance as a lock holder */
    readonly instanceId: string;
    readonly settings: RolloverConfigs;
    readonly declarations: RoleDeclarations;
}

function parsePlanStore(value: string | undefined): PlanStoreKind {
    const kind = value ?? 'dynamodb';
    if (kind !== 'dynamodb' && kind !== 'memory') {
        throw new ConfigurationError(`PLAN_STORE must be 'dynamodb' or 'memory' (got '${kind}')`);
    }
    return kind;
}

/**
 * Check settings that would otherwise surface as confusing runtime behaviour.
 */
export function validateSettings(settings: RolloverConfigs): void {
    const errors = collectErrors([
        validateDuration('reconcile interval', settings.reconcileIntervalMs),
        validateDuration('health timeout', settings.timeouts.healthTimeoutMs),
        validateDuration('drain grace period', settings.timeouts.drainGracePeriodMs),
        validateDuration('delete timeout', settings.timeouts.deleteTimeoutMs),
        validateDuration('lock TTL', settings.lockTtlMs),
        validateDuration('poll interval', settings.pollIntervalMs),
    ]);
    if (!Number.isInteger(settings.retry.maxAttempts) || settings.retry.maxAttempts < 1) {
        errors.push('max attempts must be a positive integer');
    }
    if (settings.timeouts.observationWindowMs < 0) {
        errors.push('observation window cannot be negative');
    }
    if (errors.length > 0) {
        throw new ConfigurationError(`Invalid controller settings: ${errors.join('; ')}`);
    }
}

/**
 * Build the controller configuration from the environment.
 *
 * @throws ConfigurationError when required values are missing or invalid
 */
export function loadControllerConfig(env: NodeJS.ProcessEnv = process.env): ControllerConfig {
    const environment = parseEnvironment(env.DEPLOY_ENVIRONMENT);

    const clusterName = env.CLUSTER_NAME;
    if (!clusterName) {
        throw new ConfigurationError('CLUSTER_NAME is required');
    }

    const settings = getRolloverConfigs(environment, env);
    validateSettings(settings);

    const rolesFile = env.ROLES_FILE ?? DEFAULT_ROLES_FILE;

    return {
        environment,
        clusterName,
        region: env.AWS_REGION ?? DEFAULT_REGION,
        planStore: parsePlanStore(env.PLAN_STORE),
        planTableName: env.PLAN_TABLE_NAME ?? DEFAULT_PLAN_TABLE,
        rolesFile,
        kubeconfigPath: env.KUBECONFIG || undefined,
        // Lambda containers share hostnames and pids; the suffix keeps lock owners apart
        instanceId: env.CONTROLLER_INSTANCE_ID ?? `${env.HOSTNAME ?? 'controller'}-${uuidv4()}`,
        settings,
        declarations: loadRoleDeclarations(rolesFile),
    };
}

export { getRolloverConfigs, type RolloverConfigs } from './configurations';
export { parseRoleDeclarations, loadRoleDeclarations, type RoleDeclarations } from './roles';
