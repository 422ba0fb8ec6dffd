/**
 * @format
 * DynamoDB Plan Store
 *
 * Single-table layout:
 *
 *   | pk           | sk     | attributes                                 |
 *   |--------------|--------|--------------------------------------------|
 *   | ROLE#workers | PLAN   | version, phase, plan (map), updatedAt      |
 *   | ROLE#workers | TARGET | amiFamily, pinnedRelease, declaredAt       |
 *   | ROLE#workers | LOCK   | owner, expiresAt (see role-lock.ts)        |
 *
 * `version` and `phase` are kept at the top level so conditions and
 * console queries can read them without unpacking the plan. Plans carry
 * optional fields, so the document client must be created with
 * `removeUndefinedValues` (see `createDocumentClient`).
 */

import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
    DynamoDBDocumentClient,
    GetCommand,
    PutCommand,
    ScanCommand,
} from '@aws-sdk/lib-dynamodb';

import { roleRecordKey } from '../utilities/naming';

import { classifyAwsError } from './aws-errors';
import { ConflictError, VersionConflictError } from './errors';
import type { PlanStore } from './plan-store';
import { ROLLOVER_PHASES, type RoleTarget, type RolloverPhase, type RolloverPlan } from './types';

const CONDITIONAL_CHECK_FAILED = 'ConditionalCheckFailedException';

// =============================================================================
// ITEM NARROWING
// =============================================================================

type Item = Record<string, unknown>;

function isItem(value: unknown): value is Item {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPhase(value: unknown): value is RolloverPhase {
    return ROLLOVER_PHASES.some((phase) => phase === value);
}

/**
 * Structural check of a stored plan. Fields the controller always writes
 * are required; optional fields are trusted as written.
 */
function isStoredPlan(value: unknown): value is RolloverPlan {
    return (
        isItem(value) &&
        typeof value.role === 'string' &&
        typeof value.source === 'string' &&
        isItem(value.target) &&
        typeof value.target.name === 'string' &&
        isPhase(value.phase) &&
        typeof value.attempts === 'number' &&
        Array.isArray(value.history)
    );
}

function planFromItem(item: Item | undefined): RolloverPlan | undefined {
    if (!item) {
        return undefined;
    }
    const { plan, version } = item;
    if (!isStoredPlan(plan) || typeof version !== 'number') {
        throw new ConflictError(`Malformed plan record ${String(item.pk)}`);
    }
    return { ...plan, version };
}

function targetFromItem(role: string, item: Item | undefined): RoleTarget | undefined {
    if (!item || typeof item.amiFamily !== 'string' || typeof item.declaredAt !== 'string') {
        return undefined;
    }
    return {
        role,
        amiFamily: item.amiFamily,
        pinnedRelease: typeof item.pinnedRelease === 'string' ? item.pinnedRelease : undefined,
        declaredAt: item.declaredAt,
    };
}

/**
 * Document client with the marshalling options the stores rely on.
 */
export function createDocumentClient(client: DynamoDBClient): DynamoDBDocumentClient {
    return DynamoDBDocumentClient.from(client, {
        marshallOptions: { removeUndefinedValues: true },
    });
}

// =============================================================================
// STORE
// =============================================================================

export class DynamoDbPlanStore implements PlanStore {
    constructor(
        private readonly docClient: DynamoDBDocumentClient,
        private readonly tableName: string,
    ) {}

    async getPlan(role: string): Promise<RolloverPlan | undefined> {
        try {
            const result = await this.docClient.send(
                new GetCommand({
                    TableName: this.tableName,
                    Key: roleRecordKey(role, 'PLAN'),
                    ConsistentRead: true,
                }),
            );
            return planFromItem(result.Item);
        } catch (error) {
            throw classifyAwsError(error, `plan for role ${role}`);
        }
    }

    async listPlans(): Promise<RolloverPlan[]> {
        const plans: RolloverPlan[] = [];
        let startKey: Item | undefined;
        try {
            do {
                const page = await this.docClient.send(
                    new ScanCommand({
                        TableName: this.tableName,
                        FilterExpression: 'sk = :sk',
                        ExpressionAttributeValues: { ':sk': 'PLAN' },
                        ExclusiveStartKey: startKey,
                        ConsistentRead: true,
                    }),
                );
                for (const item of page.Items ?? []) {
                    const plan = planFromItem(item);
                    if (plan) plans.push(plan);
                }
                startKey = page.LastEvaluatedKey;
            } while (startKey);
        } catch (error) {
            throw classifyAwsError(error, `plan table ${this.tableName}`);
        }
        return plans.sort((a, b) => a.role.localeCompare(b.role));
    }

    async putPlan(plan: RolloverPlan, expectedVersion: number): Promise<RolloverPlan> {
        const version = expectedVersion + 1;
        const stored = { ...plan, version };
        const first = expectedVersion === 0;

        try {
            await this.docClient.send(
                new PutCommand({
                    TableName: this.tableName,
                    Item: {
                        ...roleRecordKey(plan.role, 'PLAN'),
                        version,
                        phase: plan.phase,
                        updatedAt: plan.updatedAt,
                        plan: stored,
                    },
                    ConditionExpression: first ? 'attribute_not_exists(pk)' : '#version = :expected',
                    ExpressionAttributeNames: first ? undefined : { '#version': 'version' },
                    ExpressionAttributeValues: first ? undefined : { ':expected': expectedVersion },
                }),
            );
        } catch (error) {
            if (error instanceof Error && error.name === CONDITIONAL_CHECK_FAILED) {
                throw new VersionConflictError(plan.role, expectedVersion);
            }
            throw classifyAwsError(error, `plan for role ${plan.role}`);
        }
        return stored;
    }

    async getTarget(role: string): Promise<RoleTarget | undefined> {
        try {
            const result = await this.docClient.send(
                new GetCommand({ TableName: this.tableName, Key: roleRecordKey(role, 'TARGET') }),
            );
            return targetFromItem(role, result.Item);
        } catch (error) {
            throw classifyAwsError(error, `target for role ${role}`);
        }
    }

    async putTarget(target: RoleTarget): Promise<void> {
        try {
            await this.docClient.send(
                new PutCommand({
                    TableName: this.tableName,
                    Item: {
                        ...roleRecordKey(target.role, 'TARGET'),
                        amiFamily: target.amiFamily,
                        pinnedRelease: target.pinnedRelease,
                        declaredAt: target.declaredAt,
                    },
                }),
            );
        } catch (error) {
            throw classifyAwsError(error, `target for role ${target.role}`);
        }
    }
}
