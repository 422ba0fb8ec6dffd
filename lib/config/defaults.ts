/**
 * @format
 * Default Configuration Values
 *
 * Centralized defaults shared by the controller, its AWS adapters and the CLI.
 * Uses UPPER_CASE for global constants.
 */

// =============================================================================
// Global Constants - Immutable compile-time values
// =============================================================================

/** Default AWS region if not specified */
export const DEFAULT_REGION = 'eu-west-1';

/** Default DynamoDB table holding rollover plans */
export const DEFAULT_PLAN_TABLE = 'nodegroup-rollover-plans';

/** Default path of the role declarations file */
export const DEFAULT_ROLES_FILE = 'config/roles.yaml';

/** Label EKS puts on every node of a managed nodegroup */
export const EKS_NODEGROUP_LABEL = 'eks.amazonaws.com/nodegroup';

/** Annotation the kubelet sets on static (mirror) pods */
export const MIRROR_POD_ANNOTATION = 'kubernetes.io/config.mirror';

// =============================================================================
// Ownership Tags
// =============================================================================

/**
 * Tags written on every nodegroup the controller creates.
 * Only nodegroups carrying `managed=true` are ever mutated. Family and
 * placement are read back from tags. The release tag records the release
 * at creation and is only consulted when EKS reports neither a release
 * version nor a launch template version.
 */
export const ROLLOVER_TAGS = {
    managed: 'nodegroup-rollover/managed',
    role: 'nodegroup-rollover/role',
    amiFamily: 'nodegroup-rollover/ami-family',
    release: 'nodegroup-rollover/release',
    placement: 'nodegroup-rollover/placement',
} as const;

/** Node label carrying the worker role, mirrored from the role tag */
export const ROLE_LABEL = 'node.kubernetes.io/role';

// =============================================================================
// Timing Defaults (milliseconds unless stated)
// =============================================================================

/** Poll interval for nodegroup status while waiting for health or deletion */
export const STATUS_POLL_INTERVAL_MS = 15_000;

/** Poll interval while waiting for evicted pods to leave a node */
export const DRAIN_POLL_INTERVAL_MS = 5_000;

/** Attempts made against the release feed within one pass */
export const RESOLVE_MAX_ATTEMPTS = 3;

/** First backoff delay for release feed retries */
export const RESOLVE_BASE_DELAY_MS = 2_000;
