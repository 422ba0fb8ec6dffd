#!/usr/bin/env node
/**
 * @format
 * CDK Entry Point
 *
 * Synthesizes the rollover controller stack for one environment.
 *
 * Usage:
 *   CLUSTER_NAME=main npx cdk synth -c environment=staging
 *   CLUSTER_NAME=main npx cdk deploy -c environment=production
 */

import * as logs from 'aws-cdk-lib/aws-logs';
import * as cdk from 'aws-cdk-lib/core';
import * as dotenv from 'dotenv';

import { Environment, parseEnvironment } from '../lib/config/environments';
import { RolloverControllerStack } from '../lib/stacks/rollover/controller-stack';

dotenv.config();

const app = new cdk.App();

const environmentContext: unknown = app.node.tryGetContext('environment');
const environment = parseEnvironment(
    typeof environmentContext === 'string' ? environmentContext : process.env.DEPLOY_ENVIRONMENT,
);

const clusterName = process.env.CLUSTER_NAME;
if (!clusterName) {
    throw new Error('CLUSTER_NAME is required. Use: CLUSTER_NAME=<cluster> npx cdk synth -c environment=<env>');
}

const isProduction = environment === Environment.PRODUCTION;
const namePrefix = `nodegroup-rollover-${environment}`;

new RolloverControllerStack(app, `NodegroupRollover-${environment}`, {
    namePrefix,
    environment,
    clusterName,
    rolesFile: process.env.ROLES_FILE,
    kubeconfigFile: process.env.BUNDLED_KUBECONFIG,
    logRetention: isProduction ? logs.RetentionDays.THREE_MONTHS : logs.RetentionDays.ONE_WEEK,
    removalPolicy: isProduction ? cdk.RemovalPolicy.RETAIN : cdk.RemovalPolicy.DESTROY,
    env: {
        account: process.env.CDK_DEFAULT_ACCOUNT,
        region: process.env.CDK_DEFAULT_REGION,
    },
});
