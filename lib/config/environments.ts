/**
 * @format
 * Deployment Environments
 *
 * The controller runs once per cluster, and each cluster belongs to one of
 * these environments. The environment selects the controller defaults in
 * `rollover/configurations.ts` and the default log level.
 */

export enum Environment {
    DEVELOPMENT = 'development',
    STAGING = 'staging',
    PRODUCTION = 'production',
}

/** String union of all environment values */
export type EnvironmentName = `${Environment}`;

const ENVIRONMENT_VALUES: readonly string[] = Object.values(Environment);

/**
 * Type guard for environment strings read from env vars or CLI flags.
 */
export function isEnvironment(value: string): value is Environment {
    return ENVIRONMENT_VALUES.includes(value);
}

/**
 * Parse an environment name, falling back to development when unset.
 *
 * @throws Error if the value is set but not a known environment
 */
export function parseEnvironment(value: string | undefined): Environment {
    if (!value) {
        return Environment.DEVELOPMENT;
    }
    const normalised = value.toLowerCase();
    if (!isEnvironment(normalised)) {
        throw new Error(
            `Unknown environment '${value}'. Expected one of: ${ENVIRONMENT_VALUES.join(', ')}`,
        );
    }
    return normalised;
}
