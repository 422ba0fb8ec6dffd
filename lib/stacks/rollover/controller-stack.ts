/**
 * @format
 * Rollover Controller Stack
 *
 * Deploys the scheduled form of the controller:
 *
 *   EventBridge (rate) → Lambda (lambda/rollover/reconcile.ts)
 *     → DynamoDB (plans, declared targets, role locks)
 *     → EKS / SSM / Kubernetes API
 *
 * The schedule follows the environment's reconcile interval. The function
 * timeout never exceeds that interval, so two scheduled invocations only
 * overlap through the role locks.
 */

import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import * as eks from 'aws-cdk-lib/aws-eks';
import * as events from 'aws-cdk-lib/aws-events';
import * as targets from 'aws-cdk-lib/aws-events-targets';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as lambdaNode from 'aws-cdk-lib/aws-lambda-nodejs';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as cdk from 'aws-cdk-lib/core';

import { Construct } from 'constructs';
import * as path from 'path';

import type { Environment } from '../../config/environments';
import { getRolloverConfigs } from '../../config/rollover/configurations';
import { CUSTOM_RELEASE_PREFIX } from '../../config/ssm-paths';

/** Project root, where the Lambda entry and the roles file live */
const PROJECT_ROOT = path.join(__dirname, '..', '..', '..');

/** Longest timeout Lambda allows */
const LAMBDA_MAX_TIMEOUT = cdk.Duration.minutes(15);

/** Name of the roles file inside the bundle */
const BUNDLED_ROLES_FILE = 'roles.yaml';
const BUNDLED_KUBECONFIG = 'kubeconfig.yaml';

// =============================================================================
// PROPS
// =============================================================================

export interface RolloverControllerStackProps extends cdk.StackProps {
    /** Name prefix for resources (e.g. 'nodegroup-rollover-development') */
    readonly namePrefix: string;
    /** Environment whose reconcile interval and timeouts apply */
    readonly environment: Environment;
    /** EKS cluster whose nodegroups are rolled over */
    readonly clusterName: string;
    /** Roles file copied into the bundle, relative to the project root */
    readonly rolesFile?: string;
    /** Kubeconfig copied into the bundle, relative to the project root */
    readonly kubeconfigFile?: string;
    /** Lambda memory in MB */
    readonly lambdaMemoryMb?: number;
    /** CloudWatch log retention */
    readonly logRetention: logs.RetentionDays;
    /** Removal policy for the plan table and log group */
    readonly removalPolicy: cdk.RemovalPolicy;
}

// =============================================================================
// STACK
// =============================================================================

/**
 * Creates:
 * - DynamoDB table for plans, targets and locks (`pk`/`sk`, TTL on `ttl`)
 * - Lambda running one reconciliation pass per declared role
 * - EventBridge rule invoking it at the reconcile interval
 * - EKS access entry letting the function cordon nodes and evict pods
 */
export class RolloverControllerStack extends cdk.Stack {
    public readonly planTable: dynamodb.TableV2;
    public readonly reconcileFunction: lambdaNode.NodejsFunction;
    public readonly scheduleRule: events.Rule;

    constructor(scope: Construct, id: string, props: RolloverControllerStackProps) {
        super(scope, id, props);

        const { namePrefix, clusterName } = props;
        const settings = getRolloverConfigs(props.environment, {});
        const interval = cdk.Duration.millis(settings.reconcileIntervalMs);
        const timeout = cdk.Duration.millis(
            Math.min(settings.reconcileIntervalMs, LAMBDA_MAX_TIMEOUT.toMilliseconds()),
        );

        // =================================================================
        // DynamoDB - Plan Table
        //
        // pk: ROLE#<role>
        // sk: PLAN | TARGET | LOCK
        //
        // Expired lock leases are removed through the `ttl` attribute.
        // =================================================================
        this.planTable = new dynamodb.TableV2(this, 'PlanTable', {
            tableName: `${namePrefix}-plans`,
            partitionKey: { name: 'pk', type: dynamodb.AttributeType.STRING },
            sortKey: { name: 'sk', type: dynamodb.AttributeType.STRING },
            billing: dynamodb.Billing.onDemand(),
            timeToLiveAttribute: 'ttl',
            pointInTimeRecoverySpecification: {
                pointInTimeRecoveryEnabled: true,
            },
            removalPolicy: props.removalPolicy,
        });

        // =================================================================
        // Lambda - Scheduled Reconciliation
        // =================================================================
        const role = new iam.Role(this, 'ReconcileRole', {
            roleName: `${namePrefix}-reconcile`,
            assumedBy: new iam.ServicePrincipal('lambda.amazonaws.com'),
            managedPolicies: [
                iam.ManagedPolicy.fromAwsManagedPolicyName('service-role/AWSLambdaBasicExecutionRole'),
            ],
        });

        const rolesFile = props.rolesFile ?? 'config/roles.yaml';
        const { kubeconfigFile } = props;

        this.reconcileFunction = new lambdaNode.NodejsFunction(this, 'ReconcileFunction', {
            functionName: `${namePrefix}-reconcile`,
            runtime: lambda.Runtime.NODEJS_20_X,
            entry: path.join(PROJECT_ROOT, 'lambda', 'rollover', 'reconcile.ts'),
            handler: 'handler',
            role,
            memorySize: props.lambdaMemoryMb ?? 512,
            timeout,
            environment: {
                CLUSTER_NAME: clusterName,
                DEPLOY_ENVIRONMENT: props.environment,
                PLAN_STORE: 'dynamodb',
                PLAN_TABLE_NAME: this.planTable.tableName,
                ROLES_FILE: BUNDLED_ROLES_FILE,
                ...(kubeconfigFile ? { KUBECONFIG: BUNDLED_KUBECONFIG } : {}),
            },
            description: `Nodegroup rollover reconciliation for ${clusterName}`,
            logGroup: new logs.LogGroup(this, 'ReconcileLogGroup', {
                logGroupName: `/aws/lambda/${namePrefix}-reconcile`,
                retention: props.logRetention,
                removalPolicy: props.removalPolicy,
            }),
            bundling: {
                minify: true,
                sourceMap: true,
                externalModules: [
                    // AWS SDK v3 is included in the Lambda runtime
                    '@aws-sdk/*',
                ],
                commandHooks: {
                    beforeBundling: () => [],
                    beforeInstall: () => [],
                    afterBundling: (inputDir: string, outputDir: string): string[] => [
                        `cp ${inputDir}/${rolesFile} ${outputDir}/${BUNDLED_ROLES_FILE}`,
                        ...(kubeconfigFile
                            ? [`cp ${inputDir}/${kubeconfigFile} ${outputDir}/${BUNDLED_KUBECONFIG}`]
                            : []),
                    ],
                },
            },
        });

        // =================================================================
        // IAM - Nodegroups, release feeds and plan table
        // =================================================================
        const clusterArn = `arn:aws:eks:${this.region}:${this.account}:cluster/${clusterName}`;
        const nodegroupArn = `arn:aws:eks:${this.region}:${this.account}:nodegroup/${clusterName}/*`;

        this.reconcileFunction.addToRolePolicy(new iam.PolicyStatement({
            sid: 'ManageNodegroups',
            effect: iam.Effect.ALLOW,
            actions: [
                'eks:ListNodegroups',
                'eks:DescribeNodegroup',
                'eks:CreateNodegroup',
                'eks:DeleteNodegroup',
                'eks:UpdateNodegroupVersion',
                'eks:TagResource',
            ],
            resources: [clusterArn, nodegroupArn],
        }));

        // CreateNodegroup hands the source's node role to EKS
        this.reconcileFunction.addToRolePolicy(new iam.PolicyStatement({
            sid: 'PassNodeRole',
            effect: iam.Effect.ALLOW,
            actions: ['iam:PassRole'],
            resources: ['*'],
            conditions: {
                StringEquals: { 'iam:PassedToService': 'eks.amazonaws.com' },
            },
        }));

        this.reconcileFunction.addToRolePolicy(new iam.PolicyStatement({
            sid: 'ReadReleaseFeeds',
            effect: iam.Effect.ALLOW,
            actions: ['ssm:GetParameter'],
            resources: [
                `arn:aws:ssm:${this.region}::parameter/aws/service/*`,
                `arn:aws:ssm:${this.region}:${this.account}:parameter${CUSTOM_RELEASE_PREFIX}/*`,
            ],
        }));

        this.planTable.grantReadWriteData(this.reconcileFunction);

        // =================================================================
        // EKS Access Entry - cordon, evict and list pods
        // =================================================================
        new eks.CfnAccessEntry(this, 'ReconcileAccessEntry', {
            clusterName,
            principalArn: role.roleArn,
            type: 'STANDARD',
            accessPolicies: [{
                policyArn: 'arn:aws:eks::aws:cluster-access-policy/AmazonEKSClusterAdminPolicy',
                accessScope: { type: 'cluster' },
            }],
        });

        // =================================================================
        // EventBridge - Reconcile Schedule
        // =================================================================
        this.scheduleRule = new events.Rule(this, 'ReconcileSchedule', {
            ruleName: `${namePrefix}-reconcile`,
            description: `Run nodegroup rollover passes for ${clusterName}`,
            schedule: events.Schedule.rate(interval),
            targets: [new targets.LambdaFunction(this.reconcileFunction)],
        });

        // =================================================================
        // Stack Outputs
        // =================================================================
        new cdk.CfnOutput(this, 'PlanTableName', {
            value: this.planTable.tableName,
            description: 'Rollover plan table name',
        });

        new cdk.CfnOutput(this, 'ReconcileFunctionName', {
            value: this.reconcileFunction.functionName,
            description: 'Scheduled reconciliation Lambda function name',
        });
    }
}
