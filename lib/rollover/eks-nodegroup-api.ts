/**
 * @format
 * EKS Nodegroup API
 *
 * Production `NodegroupApi` over EKS managed nodegroups.
 *
 * Status mapping:
 *
 *   | EKS status                               | Lifecycle    |
 *   |------------------------------------------|--------------|
 *   | CREATING, UPDATING                       | Provisioning |
 *   | ACTIVE                                   | Healthy      |
 *   | DELETING                                 | Deleting     |
 *   | CREATE_FAILED, DELETE_FAILED, DEGRADED   | Failed       |
 *
 * Launch-template (CUSTOM) families are created from the family's launch
 * template at the version named by the release; EKS reports no release
 * version for them, so family and release are read back from tags.
 */

import {
    CreateNodegroupCommand,
    DeleteNodegroupCommand,
    DescribeNodegroupCommand,
    EKSClient,
    ListNodegroupsCommand,
    UpdateNodegroupVersionCommand,
    type Nodegroup as EksNodegroup,
} from '@aws-sdk/client-eks';

import type { AmiFamilyRegistry } from '../config/ami-families';
import { ROLE_LABEL, ROLLOVER_TAGS } from '../config/defaults';
import logger from '../utilities/logger';

import { classifyAwsError, isAwsNotFound } from './aws-errors';
import type { NodegroupApi } from './ports';
import type { Nodegroup, NodegroupLifecycle, NodegroupSpec, Placement } from './types';

const LIFECYCLE_BY_STATUS: Record<string, NodegroupLifecycle> = {
    CREATING: 'Provisioning',
    UPDATING: 'Provisioning',
    ACTIVE: 'Healthy',
    DELETING: 'Deleting',
    CREATE_FAILED: 'Failed',
    DELETE_FAILED: 'Failed',
    DEGRADED: 'Failed',
};

export class EksNodegroupApi implements NodegroupApi {
    constructor(
        private readonly client: EKSClient,
        private readonly clusterName: string,
        private readonly families: AmiFamilyRegistry,
    ) {}

    async listNodegroups(): Promise<string[]> {
        const names: string[] = [];
        let nextToken: string | undefined;
        try {
            do {
                const page = await this.client.send(
                    new ListNodegroupsCommand({ clusterName: this.clusterName, nextToken }),
                );
                names.push(...(page.nodegroups ?? []));
                nextToken = page.nextToken;
            } while (nextToken);
        } catch (error) {
            throw classifyAwsError(error, `cluster ${this.clusterName}`);
        }
        return names;
    }

    async describeNodegroup(name: string): Promise<Nodegroup | undefined> {
        try {
            const response = await this.client.send(
                new DescribeNodegroupCommand({ clusterName: this.clusterName, nodegroupName: name }),
            );
            return response.nodegroup ? this.toNodegroup(response.nodegroup) : undefined;
        } catch (error) {
            if (isAwsNotFound(error)) {
                return undefined;
            }
            throw classifyAwsError(error, `nodegroup ${name}`);
        }
    }

    async createNodegroup(spec: NodegroupSpec, requestToken: string): Promise<void> {
        const family = this.families.get(spec.amiFamily);
        const custom = family.amiType === 'CUSTOM';

        logger.debug(`CreateNodegroup ${spec.name} (${spec.amiFamily} ${spec.releaseVersion}, token ${requestToken})`);

        try {
            await this.client.send(
                new CreateNodegroupCommand({
                    clusterName: this.clusterName,
                    nodegroupName: spec.name,
                    clientRequestToken: requestToken,
                    scalingConfig: {
                        desiredSize: spec.capacity.desired,
                        minSize: spec.capacity.min,
                        maxSize: spec.capacity.max,
                    },
                    subnets: [...spec.subnets],
                    instanceTypes: [...spec.instanceTypes],
                    nodeRole: spec.nodeRole,
                    amiType: custom ? undefined : family.amiType,
                    releaseVersion: custom ? undefined : spec.releaseVersion,
                    version: custom ? undefined : spec.kubernetesVersion,
                    launchTemplate: custom
                        ? { name: family.launchTemplateName, version: spec.releaseVersion }
                        : undefined,
                    remoteAccess: !custom && spec.sshKeyName ? { ec2SshKey: spec.sshKeyName } : undefined,
                    labels: { ...spec.labels, [ROLE_LABEL]: spec.role },
                    tags: {
                        [ROLLOVER_TAGS.managed]: 'true',
                        [ROLLOVER_TAGS.role]: spec.role,
                        [ROLLOVER_TAGS.amiFamily]: spec.amiFamily,
                        [ROLLOVER_TAGS.release]: spec.releaseVersion,
                        [ROLLOVER_TAGS.placement]: spec.placement,
                    },
                }),
            );
        } catch (error) {
            throw classifyAwsError(error, `nodegroup ${spec.name}`);
        }
    }

    async deleteNodegroup(name: string): Promise<boolean> {
        try {
            await this.client.send(
                new DeleteNodegroupCommand({ clusterName: this.clusterName, nodegroupName: name }),
            );
            return true;
        } catch (error) {
            // Idempotency: a nodegroup that is already gone counts as deleted
            if (isAwsNotFound(error)) {
                return false;
            }
            throw classifyAwsError(error, `nodegroup ${name}`);
        }
    }

    async updateNodegroupRelease(name: string, releaseVersion: string): Promise<string> {
        const current = await this.describeNodegroup(name);
        const family = current ? this.families.get(current.amiFamily) : undefined;
        const custom = family?.amiType === 'CUSTOM';

        try {
            const response = await this.client.send(
                new UpdateNodegroupVersionCommand({
                    clusterName: this.clusterName,
                    nodegroupName: name,
                    releaseVersion: custom ? undefined : releaseVersion,
                    launchTemplate: custom
                        ? { name: family?.launchTemplateName, version: releaseVersion }
                        : undefined,
                    // Respect Pod Disruption Budgets
                    force: false,
                }),
            );
            return response.update?.id ?? 'unknown';
        } catch (error) {
            throw classifyAwsError(error, `nodegroup ${name}`);
        }
    }

    // =========================================================================
    // MAPPING
    // =========================================================================

    private toNodegroup(ng: EksNodegroup): Nodegroup {
        const tags = ng.tags ?? {};

        return {
            name: ng.nodegroupName ?? '',
            role: tags[ROLLOVER_TAGS.role],
            amiFamily: tags[ROLLOVER_TAGS.amiFamily] ?? this.familyFromAmiType(ng.amiType),
            // In-place updates leave the creation-time release tag behind
            releaseVersion:
                (ng.amiType === 'CUSTOM' ? ng.launchTemplate?.version : ng.releaseVersion) ??
                tags[ROLLOVER_TAGS.release] ??
                'unknown',
            kubernetesVersion: ng.version,
            capacity: {
                desired: ng.scalingConfig?.desiredSize ?? 0,
                min: ng.scalingConfig?.minSize ?? 0,
                max: ng.scalingConfig?.maxSize ?? 0,
            },
            placement: toPlacement(tags[ROLLOVER_TAGS.placement]),
            instanceTypes: ng.instanceTypes ?? [],
            subnets: ng.subnets ?? [],
            nodeRole: ng.nodeRole,
            labels: ng.labels ?? {},
            tags,
            managed: tags[ROLLOVER_TAGS.managed] === 'true',
            lifecycle: LIFECYCLE_BY_STATUS[ng.status ?? 'CREATING'] ?? 'Provisioning',
            issues: (ng.health?.issues ?? []).map((i) => `${i.code ?? 'Unknown'}: ${i.message ?? ''}`.trim()),
        };
    }

    private familyFromAmiType(amiType: string | undefined): string {
        const match = this.families
            .names()
            .map((n) => this.families.get(n))
            .find((f) => f.amiType !== 'CUSTOM' && f.amiType === amiType);
        return match?.name ?? amiType ?? 'unknown';
    }
}

function toPlacement(value: string | undefined): Placement {
    return value === 'public' ? 'public' : 'private';
}
