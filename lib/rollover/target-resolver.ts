/**
 * @format
 * Target Resolver
 *
 * Answers "which release should this family run?" from the SSM release
 * feed, or returns the pinned release untouched.
 */

import { GetParameterCommand, SSMClient } from '@aws-sdk/client-ssm';

import type { AmiFamilyRegistry } from '../config/ami-families';
import { RESOLVE_BASE_DELAY_MS, RESOLVE_MAX_ATTEMPTS } from '../config/defaults';
import type { Clock } from '../utilities/clock';
import logger from '../utilities/logger';
import { withRetry } from '../utilities/retry';

import { isAwsNotFound } from './aws-errors';
import { ResolutionError, isRolloverError } from './errors';

export interface ResolveOptions {
    readonly kubernetesVersion: string;
    /** Returned as-is when set; the feed is not consulted */
    readonly pinned?: string;
    readonly signal?: AbortSignal;
}

export interface TargetResolverOptions {
    readonly maxAttempts?: number;
    readonly baseDelayMs?: number;
    readonly maxDelayMs?: number;
}

export class TargetResolver {
    private readonly maxAttempts: number;
    private readonly baseDelayMs: number;
    private readonly maxDelayMs: number;

    constructor(
        private readonly ssm: SSMClient,
        private readonly families: AmiFamilyRegistry,
        private readonly clock: Clock,
        options: TargetResolverOptions = {},
    ) {
        this.maxAttempts = options.maxAttempts ?? RESOLVE_MAX_ATTEMPTS;
        this.baseDelayMs = options.baseDelayMs ?? RESOLVE_BASE_DELAY_MS;
        this.maxDelayMs = options.maxDelayMs ?? this.baseDelayMs * 8;
    }

    /**
     * Latest eligible release of `family` for a Kubernetes version.
     *
     * @throws ResolutionError when the feed stays unreachable over all
     * attempts, or publishes no eligible value
     */
    async resolve(family: string, options: ResolveOptions): Promise<string> {
        if (options.pinned) {
            return options.pinned;
        }

        if (!this.families.has(family)) {
            throw new ResolutionError(`Unknown AMI family '${family}'`);
        }
        const config = this.families.get(family);
        const parameter = config.releaseParameter(options.kubernetesVersion);

        const release = await withRetry(() => this.readParameter(parameter), {
            maxAttempts: this.maxAttempts,
            baseDelayMs: this.baseDelayMs,
            maxDelayMs: this.maxDelayMs,
            clock: this.clock,
            signal: options.signal,
            onRetry: (error, attempt, delayMs) =>
                logger.warn(
                    `Release feed ${parameter} attempt ${attempt} failed (${String(error)}), retrying in ${delayMs}ms`,
                ),
        });

        if (!config.releasePattern.test(release)) {
            throw new ResolutionError(`Release '${release}' from ${parameter} is not an eligible ${family} release`);
        }

        logger.debug(`Resolved ${family} for Kubernetes ${options.kubernetesVersion}: ${release}`);
        return release;
    }

    private async readParameter(name: string): Promise<string> {
        try {
            const response = await this.ssm.send(new GetParameterCommand({ Name: name }));
            const value = response.Parameter?.Value?.trim();
            if (!value) {
                throw new ResolutionError(`Release feed ${name} is empty`);
            }
            return value;
        } catch (error) {
            if (isRolloverError(error)) {
                throw error;
            }
            if (isAwsNotFound(error)) {
                throw new ResolutionError(`Release feed ${name} does not exist`, { cause: error });
            }
            throw new ResolutionError(`Release feed ${name} unreachable: ${String(error)}`, { cause: error });
        }
    }
}
