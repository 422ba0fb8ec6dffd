/**
 * @format
 * Rollover Domain Types
 *
 * Shared model for nodegroups, nodes, plans and role declarations.
 */

// =============================================================================
// NODEGROUPS
// =============================================================================

export type NodegroupLifecycle =
    | 'Provisioning'
    | 'Healthy'
    | 'Draining'
    | 'Deleting'
    | 'Deleted'
    | 'Failed';

export type Placement = 'private' | 'public';

export interface Capacity {
    readonly desired: number;
    readonly min: number;
    readonly max: number;
}

/**
 * A nodegroup as observed in the cluster.
 */
export interface Nodegroup {
    readonly name: string;
    /** Worker role, from the role tag; undefined for unmanaged nodegroups */
    readonly role?: string;
    readonly amiFamily: string;
    readonly releaseVersion: string;
    readonly kubernetesVersion?: string;
    readonly capacity: Capacity;
    readonly placement: Placement;
    readonly instanceTypes: readonly string[];
    readonly subnets: readonly string[];
    readonly nodeRole?: string;
    readonly labels: Readonly<Record<string, string>>;
    readonly tags: Readonly<Record<string, string>>;
    /** True when tagged as owned by the controller */
    readonly managed: boolean;
    readonly lifecycle: NodegroupLifecycle;
    /** Provider-reported health issues, if any */
    readonly issues: readonly string[];
}

/**
 * Desired shape of a nodegroup the controller creates.
 */
export interface NodegroupSpec {
    readonly name: string;
    readonly role: string;
    readonly amiFamily: string;
    readonly releaseVersion: string;
    readonly kubernetesVersion?: string;
    readonly capacity: Capacity;
    readonly placement: Placement;
    readonly instanceTypes: readonly string[];
    readonly subnets: readonly string[];
    readonly nodeRole: string;
    readonly labels: Readonly<Record<string, string>>;
    readonly sshKeyName?: string;
}

/**
 * A worker node, read fresh for each decision and never persisted.
 */
export interface ClusterNode {
    readonly name: string;
    readonly nodegroup: string;
    readonly ready: boolean;
    readonly schedulable: boolean;
    readonly podCount: number;
}

/**
 * A pod as the drain logic sees it.
 */
export interface PodRef {
    readonly name: string;
    readonly namespace: string;
    readonly nodeName: string;
    /** Owned by a DaemonSet; recreated on every node, never evicted */
    readonly daemonSet: boolean;
    /** Static pod mirrored from the kubelet; cannot be evicted */
    readonly mirror: boolean;
    /** Succeeded or Failed; nothing left to move */
    readonly terminal: boolean;
    /** Deletion already requested; the pod is on its way out */
    readonly terminating: boolean;
}

export interface ClusterSnapshot {
    readonly takenAt: string;
    readonly nodegroups: readonly Nodegroup[];
}

// =============================================================================
// PLANS
// =============================================================================

export const ROLLOVER_PHASES = [
    'Idle',
    'TargetCreated',
    'TargetHealthy',
    'SourceCordoned',
    'SourceDrained',
    'SourceDeleted',
    'Complete',
    'Paused',
    'Failed',
] as const;

export type RolloverPhase = (typeof ROLLOVER_PHASES)[number];

/** Phases the state machine executes a step from */
export type ActivePhase = Exclude<RolloverPhase, 'Complete' | 'Paused' | 'Failed'>;

export interface PlanError {
    readonly name: string;
    readonly message: string;
    readonly at: string;
    readonly phase: RolloverPhase;
}

export interface PhaseTransition {
    readonly phase: RolloverPhase;
    readonly at: string;
    readonly detail?: string;
}

/**
 * Persisted progress of one role's migration from `source` to `target`.
 */
export interface RolloverPlan {
    readonly role: string;
    readonly source: string;
    readonly target: NodegroupSpec;
    readonly phase: RolloverPhase;
    /** Optimistic concurrency counter; incremented by every write */
    readonly version: number;
    /** Failed attempts at the step out of the current phase */
    readonly attempts: number;
    readonly createdAt: string;
    readonly updatedAt: string;
    readonly phaseEnteredAt: string;
    /** When the target was first observed fully healthy */
    readonly targetHealthySince?: string;
    /** Earliest time the next retry may run */
    readonly nextAttemptAt?: string;
    readonly lastError?: PlanError;
    /** Phase a Paused or Failed plan stopped in; resume returns here */
    readonly haltedIn?: ActivePhase;
    readonly abortedAt?: string;
    readonly history: readonly PhaseTransition[];
}

// =============================================================================
// ROLES
// =============================================================================

export type RolloverStrategy = 'replace' | 'in-place';

/**
 * A logical worker role and the image it should run.
 */
export interface RoleConfig {
    readonly role: string;
    readonly amiFamily: string;
    /** Pin to this release instead of following the feed */
    readonly pinnedRelease?: string;
    /**
     * `replace` provisions a new nodegroup and retires the old one;
     * `in-place` updates same-family releases through EKS itself.
     */
    readonly strategy: RolloverStrategy;
    /** Overrides applied on top of the source nodegroup's shape */
    readonly capacity?: Capacity;
    readonly instanceTypes?: readonly string[];
    readonly placement?: Placement;
    readonly labels?: Readonly<Record<string, string>>;
    readonly sshKeyName?: string;
}

/**
 * Operator-declared target for a role, overriding the configured default.
 */
export interface RoleTarget {
    readonly role: string;
    readonly amiFamily: string;
    readonly pinnedRelease?: string;
    readonly declaredAt: string;
}
