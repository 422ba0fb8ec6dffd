/**
 * @format
 * Role Declarations
 *
 * Parses the roles file (YAML) that declares which worker roles the
 * controller manages and which AMI family each should run. Custom AMI
 * families may be declared in the same file.
 *
 * @example
 * ```yaml
 * families:
 *   - name: wolfi
 *     namePrefix: wolfi
 *     launchTemplateName: wolfi-eks-nodes
 * roles:
 *   - role: workers
 *     amiFamily: chainguard
 *     strategy: replace
 *     capacity: { desired: 3, min: 2, max: 6 }
 * ```
 */

import { readFileSync } from 'fs';

import { parse } from 'yaml';

import { ConfigurationError } from '../../rollover/errors';
import type { Capacity, Placement, RoleConfig, RolloverStrategy } from '../../rollover/types';
import { collectErrors, validateCapacity, validateRoleName } from '../../utilities/validation';
import { AmiFamilyRegistry, customFamily, type AmiFamilyConfig } from '../ami-families';

export interface RoleDeclarations {
    readonly roles: readonly RoleConfig[];
    readonly families: AmiFamilyRegistry;
}

// =============================================================================
// FIELD READERS
// =============================================================================

type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requiredString(fields: Fields, key: string, where: string): string {
    const value = fields[key];
    if (typeof value !== 'string' || value.length === 0) {
        throw new ConfigurationError(`${where}: '${key}' must be a non-empty string`);
    }
    return value;
}

function optionalString(fields: Fields, key: string, where: string): string | undefined {
    const value = fields[key];
    if (value === undefined) return undefined;
    if (typeof value === 'number') return String(value);
    if (typeof value !== 'string') {
        throw new ConfigurationError(`${where}: '${key}' must be a string`);
    }
    return value;
}

function optionalStringList(fields: Fields, key: string, where: string): string[] | undefined {
    const value = fields[key];
    if (value === undefined) return undefined;
    if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
        throw new ConfigurationError(`${where}: '${key}' must be a list of strings`);
    }
    return value;
}

function optionalStringMap(fields: Fields, key: string, where: string): Record<string, string> | undefined {
    const value = fields[key];
    if (value === undefined) return undefined;
    if (!isRecord(value)) {
        throw new ConfigurationError(`${where}: '${key}' must be a map of strings`);
    }
    const result: Record<string, string> = {};
    for (const [k, v] of Object.entries(value)) {
        if (typeof v !== 'string') {
            throw new ConfigurationError(`${where}: '${key}.${k}' must be a string`);
        }
        result[k] = v;
    }
    return result;
}

function optionalCapacity(fields: Fields, where: string): Capacity | undefined {
    const value = fields.capacity;
    if (value === undefined) return undefined;
    if (!isRecord(value)) {
        throw new ConfigurationError(`${where}: 'capacity' must be a map`);
    }
    const read = (k: string): number => {
        const n = value[k];
        if (typeof n !== 'number') {
            throw new ConfigurationError(`${where}: 'capacity.${k}' must be a number`);
        }
        return n;
    };
    const capacity = { desired: read('desired'), min: read('min'), max: read('max') };
    const result = validateCapacity(capacity);
    if (!result.valid) {
        throw new ConfigurationError(`${where}: ${result.error}`);
    }
    return capacity;
}

function readStrategy(fields: Fields, where: string): RolloverStrategy {
    const value = fields.strategy ?? 'replace';
    if (value !== 'replace' && value !== 'in-place') {
        throw new ConfigurationError(`${where}: 'strategy' must be 'replace' or 'in-place'`);
    }
    return value;
}

function readPlacement(fields: Fields, where: string): Placement | undefined {
    const value = fields.placement;
    if (value === undefined) return undefined;
    if (value !== 'private' && value !== 'public') {
        throw new ConfigurationError(`${where}: 'placement' must be 'private' or 'public'`);
    }
    return value;
}

// =============================================================================
// PARSING
// =============================================================================

function parseFamily(entry: unknown, index: number): AmiFamilyConfig {
    const where = `families[${index}]`;
    if (!isRecord(entry)) {
        throw new ConfigurationError(`${where}: must be a map`);
    }
    return customFamily({
        name: requiredString(entry, 'name', where),
        namePrefix: requiredString(entry, 'namePrefix', where),
        launchTemplateName: requiredString(entry, 'launchTemplateName', where),
        releaseParameter: optionalString(entry, 'releaseParameter', where),
    });
}

function parseRole(entry: unknown, index: number, families: AmiFamilyRegistry): RoleConfig {
    const where = `roles[${index}]`;
    if (!isRecord(entry)) {
        throw new ConfigurationError(`${where}: must be a map`);
    }

    const role = requiredString(entry, 'role', where);
    const amiFamily = requiredString(entry, 'amiFamily', where);
    const errors = collectErrors([validateRoleName(role)]);
    if (!families.has(amiFamily)) {
        errors.push(`unknown AMI family '${amiFamily}' (known: ${families.names().join(', ')})`);
    }
    if (errors.length > 0) {
        throw new ConfigurationError(`${where}: ${errors.join('; ')}`);
    }

    return {
        role,
        amiFamily,
        pinnedRelease: optionalString(entry, 'pinnedRelease', where),
        strategy: readStrategy(entry, where),
        capacity: optionalCapacity(entry, where),
        instanceTypes: optionalStringList(entry, 'instanceTypes', where),
        placement: readPlacement(entry, where),
        labels: optionalStringMap(entry, 'labels', where),
        sshKeyName: optionalString(entry, 'sshKeyName', where),
    };
}

/**
 * Parse role declarations from YAML text.
 *
 * @throws ConfigurationError on malformed or inconsistent declarations
 */
export function parseRoleDeclarations(text: string): RoleDeclarations {
    let document: unknown;
    try {
        document = parse(text);
    } catch (error) {
        throw new ConfigurationError(`Roles file is not valid YAML: ${String(error)}`, { cause: error });
    }
    if (!isRecord(document)) {
        throw new ConfigurationError('Roles file must be a map with a `roles` list');
    }

    const rawFamilies = document.families ?? [];
    if (!Array.isArray(rawFamilies)) {
        throw new ConfigurationError('`families` must be a list');
    }
    const families = new AmiFamilyRegistry(rawFamilies.map(parseFamily));

    const rawRoles = document.roles;
    if (!Array.isArray(rawRoles) || rawRoles.length === 0) {
        throw new ConfigurationError('`roles` must be a non-empty list');
    }
    const roles = rawRoles.map((entry, i) => parseRole(entry, i, families));

    const seen = new Set<string>();
    for (const { role } of roles) {
        if (seen.has(role)) {
            throw new ConfigurationError(`Role '${role}' is declared more than once`);
        }
        seen.add(role);
    }

    return { roles, families };
}

/**
 * Read and parse the roles file.
 */
export function loadRoleDeclarations(path: string): RoleDeclarations {
    let text: string;
    try {
        text = readFileSync(path, 'utf-8');
    } catch (error) {
        throw new ConfigurationError(`Cannot read roles file ${path}: ${String(error)}`, { cause: error });
    }
    return parseRoleDeclarations(text);
}
