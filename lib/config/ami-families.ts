/**
 * @format
 * AMI Family Registry
 *
 * Each family names the machine image lineage a nodegroup boots from, the
 * EKS AMI type used to launch it, the SSM parameter that publishes its
 * releases and the prefix used in generated nodegroup names.
 *
 * Custom families (amiType CUSTOM) are launched through a named launch
 * template whose version number *is* the release.
 */

import {
    bottlerocketReleasePath,
    customReleasePath,
    eksOptimizedReleasePath,
} from './ssm-paths';

// =============================================================================
// TYPE DEFINITIONS
// =============================================================================

/** EKS AMI types the controller knows how to launch */
export type SupportedAmiType =
    | 'AL2_x86_64'
    | 'AL2_ARM_64'
    | 'AL2023_x86_64_STANDARD'
    | 'AL2023_ARM_64_STANDARD'
    | 'BOTTLEROCKET_x86_64'
    | 'BOTTLEROCKET_ARM_64'
    | 'CUSTOM';

export interface AmiFamilyConfig {
    /** Family identifier used in role declarations, e.g. 'chainguard' */
    readonly name: string;
    /** Prefix of generated nodegroup names, e.g. 'cgr' → cgr-1-workers */
    readonly namePrefix: string;
    readonly amiType: SupportedAmiType;
    /** Release feed parameter for a Kubernetes minor version */
    readonly releaseParameter: (kubernetesVersion: string) => string;
    /** Values from the feed that do not match are not eligible */
    readonly releasePattern: RegExp;
    /** Launch template carrying the custom AMI (CUSTOM families only) */
    readonly launchTemplateName?: string;
}

// =============================================================================
// BUILT-IN FAMILIES
// =============================================================================

const EKS_RELEASE_PATTERN = /^\d+\.\d+\.\d+-\d{8}$/;

export const BUILT_IN_FAMILIES: Readonly<Record<string, AmiFamilyConfig>> = {
    'amazon-linux-2': {
        name: 'amazon-linux-2',
        namePrefix: 'amazon',
        amiType: 'AL2_x86_64',
        releaseParameter: (k8s) => eksOptimizedReleasePath(k8s, 'amazon-linux-2'),
        releasePattern: EKS_RELEASE_PATTERN,
    },
    'amazon-linux-2023': {
        name: 'amazon-linux-2023',
        namePrefix: 'al2023',
        amiType: 'AL2023_x86_64_STANDARD',
        releaseParameter: (k8s) => eksOptimizedReleasePath(k8s, 'amazon-linux-2023/x86_64/standard'),
        releasePattern: EKS_RELEASE_PATTERN,
    },
    bottlerocket: {
        name: 'bottlerocket',
        namePrefix: 'br',
        amiType: 'BOTTLEROCKET_x86_64',
        releaseParameter: (k8s) => bottlerocketReleasePath(k8s),
        releasePattern: /^\d+\.\d+\.\d+(-[0-9a-f]+)?$/,
    },
    chainguard: {
        name: 'chainguard',
        namePrefix: 'cgr',
        amiType: 'CUSTOM',
        releaseParameter: (k8s) => customReleasePath('chainguard', k8s),
        releasePattern: /^\d+$/,
        launchTemplateName: 'chainguard-eks-nodes',
    },
};

/**
 * Declaration of an additional custom family, as read from the roles file.
 */
export interface CustomFamilyDeclaration {
    readonly name: string;
    readonly namePrefix: string;
    readonly launchTemplateName: string;
    /** Parameter path template; `{kubernetesVersion}` is substituted */
    readonly releaseParameter?: string;
}

/**
 * Build a family from a roles-file declaration. Custom families always
 * launch through a launch template, so releases are version numbers.
 */
export function customFamily(declaration: CustomFamilyDeclaration): AmiFamilyConfig {
    const template = declaration.releaseParameter;
    return {
        name: declaration.name,
        namePrefix: declaration.namePrefix,
        amiType: 'CUSTOM',
        releaseParameter: template
            ? (k8s) => template.split('{kubernetesVersion}').join(k8s)
            : (k8s) => customReleasePath(declaration.name, k8s),
        releasePattern: /^\d+$/,
        launchTemplateName: declaration.launchTemplateName,
    };
}

/**
 * Family lookup over the built-ins plus any custom declarations.
 * A custom declaration with a built-in name replaces the built-in.
 */
export class AmiFamilyRegistry {
    private readonly families: Map<string, AmiFamilyConfig>;

    constructor(custom: readonly AmiFamilyConfig[] = []) {
        this.families = new Map(Object.entries(BUILT_IN_FAMILIES));
        for (const family of custom) {
            this.families.set(family.name, family);
        }
    }

    has(name: string): boolean {
        return this.families.has(name);
    }

    /**
     * @throws Error if the family is unknown
     */
    get(name: string): AmiFamilyConfig {
        const family = this.families.get(name);
        if (!family) {
            throw new Error(`Unknown AMI family '${name}'. Known families: ${this.names().join(', ')}`);
        }
        return family;
    }

    names(): string[] {
        return [...this.families.keys()].sort();
    }
}
