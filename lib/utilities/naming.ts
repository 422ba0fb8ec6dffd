/**
 * @format
 * Naming Utilities
 *
 * Nodegroup names and persisted record keys are derived from here.
 *
 * Nodegroup name pattern: {familyPrefix}-{generation}-{role}
 *   e.g. amazon-1-workers, cgr-1-workers, cgr-2-workers
 *
 * The generation increments while a role stays within one AMI family and
 * restarts at 1 when the family changes.
 */

// =============================================================================
// NODEGROUP NAMES
// =============================================================================

const NODEGROUP_NAME_PATTERN = /^([a-z0-9]+)-(\d+)-([a-z0-9][a-z0-9-]*)$/;

/** EKS nodegroup names are limited to 63 characters */
export const MAX_NODEGROUP_NAME_LENGTH = 63;

export interface ParsedNodegroupName {
    readonly prefix: string;
    readonly generation: number;
    readonly role: string;
}

/**
 * Build a nodegroup name.
 *
 * @example
 * nodegroupName('cgr', 1, 'workers') // → 'cgr-1-workers'
 */
export function nodegroupName(prefix: string, generation: number, role: string): string {
    return `${prefix}-${generation}-${role}`;
}

/**
 * Split a generated nodegroup name into its parts. Names not following the
 * pattern (e.g. hand-created nodegroups) return undefined.
 */
export function parseNodegroupName(name: string): ParsedNodegroupName | undefined {
    const match = NODEGROUP_NAME_PATTERN.exec(name);
    if (!match) {
        return undefined;
    }
    return {
        prefix: match[1],
        generation: parseInt(match[2], 10),
        role: match[3],
    };
}

/**
 * Name of the nodegroup that replaces `sourceName` for `role`.
 *
 * @example
 * nextNodegroupName('amazon-1-workers', 'cgr', 'workers') // → 'cgr-1-workers'
 * nextNodegroupName('cgr-1-workers', 'cgr', 'workers')    // → 'cgr-2-workers'
 */
export function nextNodegroupName(sourceName: string, targetPrefix: string, role: string): string {
    const parsed = parseNodegroupName(sourceName);
    const generation = parsed && parsed.prefix === targetPrefix ? parsed.generation + 1 : 1;
    return nodegroupName(targetPrefix, generation, role);
}

/**
 * Deterministic client request token for a create call, so a retried
 * request for the same nodegroup and release is deduplicated by EKS.
 */
export function createRequestToken(name: string, releaseVersion: string): string {
    return `${name}-${releaseVersion}`.replace(/[^A-Za-z0-9-]/g, '-').slice(0, 64);
}

// =============================================================================
// PERSISTED RECORD KEYS
// =============================================================================

export type RecordKind = 'PLAN' | 'TARGET' | 'LOCK';

/**
 * DynamoDB key of a per-role record: pk ROLE#{role}, sk {kind}.
 */
export function roleRecordKey(role: string, kind: RecordKind): { pk: string; sk: RecordKind } {
    return { pk: `ROLE#${role}`, sk: kind };
}
