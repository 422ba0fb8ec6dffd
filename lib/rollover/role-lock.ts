/**
 * @format
 * Role Lock
 *
 * Advisory per-role lock held for the duration of one reconciliation pass.
 * The in-process lock serves a single controller; the DynamoDB lease lets
 * several instances share a cluster. A lease whose holder died expires
 * after its TTL and can then be taken over.
 */

import { DeleteCommand, type DynamoDBDocumentClient, PutCommand } from '@aws-sdk/lib-dynamodb';

import type { Clock } from '../utilities/clock';
import logger from '../utilities/logger';
import { roleRecordKey } from '../utilities/naming';

import { classifyAwsError } from './aws-errors';

export interface RoleLock {
    /** Resolves false when another holder has the role */
    tryAcquire(role: string): Promise<boolean>;
    release(role: string): Promise<void>;
}

export class InMemoryRoleLock implements RoleLock {
    private readonly held = new Set<string>();

    async tryAcquire(role: string): Promise<boolean> {
        if (this.held.has(role)) {
            return false;
        }
        this.held.add(role);
        return true;
    }

    async release(role: string): Promise<void> {
        this.held.delete(role);
    }

    isHeld(role: string): boolean {
        return this.held.has(role);
    }
}

const CONDITIONAL_CHECK_FAILED = 'ConditionalCheckFailedException';

function isConditionFailure(error: unknown): boolean {
    return error instanceof Error && error.name === CONDITIONAL_CHECK_FAILED;
}

/**
 * Lease item `pk=ROLE#<role>, sk=LOCK` in the plan table.
 */
export class DynamoDbRoleLock implements RoleLock {
    constructor(
        private readonly docClient: DynamoDBDocumentClient,
        private readonly tableName: string,
        private readonly owner: string,
        private readonly ttlMs: number,
        private readonly clock: Clock,
    ) {}

    async tryAcquire(role: string): Promise<boolean> {
        const now = this.clock.now().getTime();
        try {
            await this.docClient.send(
                new PutCommand({
                    TableName: this.tableName,
                    Item: {
                        ...roleRecordKey(role, 'LOCK'),
                        owner: this.owner,
                        expiresAt: now + this.ttlMs,
                        // DynamoDB TTL attribute (seconds)
                        ttl: Math.ceil((now + this.ttlMs) / 1000),
                    },
                    ConditionExpression: 'attribute_not_exists(pk) OR expiresAt < :now OR #owner = :owner',
                    ExpressionAttributeNames: { '#owner': 'owner' },
                    ExpressionAttributeValues: { ':now': now, ':owner': this.owner },
                }),
            );
            return true;
        } catch (error) {
            if (isConditionFailure(error)) {
                return false;
            }
            throw classifyAwsError(error, `lock for role ${role}`);
        }
    }

    async release(role: string): Promise<void> {
        try {
            await this.docClient.send(
                new DeleteCommand({
                    TableName: this.tableName,
                    Key: roleRecordKey(role, 'LOCK'),
                    ConditionExpression: '#owner = :owner',
                    ExpressionAttributeNames: { '#owner': 'owner' },
                    ExpressionAttributeValues: { ':owner': this.owner },
                }),
            );
        } catch (error) {
            if (isConditionFailure(error)) {
                logger.warn(`Lock for role ${role} expired and was taken over before release`);
                return;
            }
            throw classifyAwsError(error, `lock for role ${role}`);
        }
    }
}
