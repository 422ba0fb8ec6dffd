/**
 * @format
 * Centralized SSM Parameter Path Patterns
 *
 * Single source of truth for the SSM parameters read as AMI release feeds.
 *
 * Path Conventions:
 * - EKS optimized AMIs:  /aws/service/eks/optimized-ami/{k8sVersion}/...
 * - Bottlerocket:        /aws/service/bottlerocket/aws-k8s-{k8sVersion}/...
 * - Custom AMI families: /nodegroup-rollover/{family}/{k8sVersion}/release
 *
 * @example
 * ```typescript
 * import { eksOptimizedReleasePath } from '../config/ssm-paths';
 *
 * eksOptimizedReleasePath('1.29', 'amazon-linux-2')
 * // → '/aws/service/eks/optimized-ami/1.29/amazon-linux-2/recommended/release_version'
 * ```
 */

// =============================================================================
// PUBLIC AWS PARAMETERS
// =============================================================================

/**
 * Recommended release version of an EKS optimized AMI variant.
 *
 * @param variant - Path segment of the variant, e.g. 'amazon-linux-2' or
 *   'amazon-linux-2023/x86_64/standard'
 */
export function eksOptimizedReleasePath(kubernetesVersion: string, variant: string): string {
    return `/aws/service/eks/optimized-ami/${kubernetesVersion}/${variant}/recommended/release_version`;
}

/**
 * Latest Bottlerocket image version for a Kubernetes minor version.
 */
export function bottlerocketReleasePath(kubernetesVersion: string, arch: 'x86_64' | 'arm64' = 'x86_64'): string {
    return `/aws/service/bottlerocket/aws-k8s-${kubernetesVersion}/${arch}/latest/image_version`;
}

// =============================================================================
// CUSTOM AMI PARAMETERS
// =============================================================================

/** Prefix under which custom image pipelines publish releases */
export const CUSTOM_RELEASE_PREFIX = '/nodegroup-rollover';

/**
 * Release published by a custom image pipeline. The value is the launch
 * template version that boots the new image.
 */
export function customReleasePath(family: string, kubernetesVersion: string): string {
    return `${CUSTOM_RELEASE_PREFIX}/${family}/${kubernetesVersion}/release`;
}
