#!/usr/bin/env node

/**
 * Nodegroup Rollover CLI
 *
 * Usage:
 *   npm run rollover -- run                         # Long-running controller
 *   npm run rollover -- reconcile workers           # One pass
 *   npm run rollover -- status [role] [--json]
 *   npm run rollover -- declare workers chainguard --release 4
 *   npm run rollover -- resume workers
 *   npm run rollover -- abort workers
 */

import { Command } from 'commander';
import * as dotenv from 'dotenv';

import { loadControllerConfig } from '../../lib/config/rollover';
import { type Controller, createController } from '../../lib/rollover/controller';
import { errorMessage } from '../../lib/rollover/errors';
import logger from '../../lib/utilities/logger';

import {
  abortCommand,
  declareCommand,
  hasFailures,
  reconcileCommand,
  resumeCommand,
  runCommand,
  statusCommand,
} from './commands';

// Load environment variables from .env file
dotenv.config();

interface GlobalOptions {
  environment?: string;
  cluster?: string;
  rolesFile?: string;
  memory?: boolean;
}

const program = new Command();

program
  .name('nodegroup-rollover')
  .description('Roll EKS managed nodegroups to a new AMI family or release')
  .version('1.0.0')
  .option('-e, --environment <env>', 'Environment (development, staging, production)')
  .option('-c, --cluster <name>', 'EKS cluster name (overrides CLUSTER_NAME)')
  .option('-r, --roles-file <path>', 'Roles file (overrides ROLES_FILE)')
  .option('--memory', 'Keep plans in memory instead of DynamoDB');

/**
 * Apply global options to the environment, then build the controller.
 */
function controllerFromOptions(): Controller {
  const options = program.opts<GlobalOptions>();
  if (options.environment) process.env.DEPLOY_ENVIRONMENT = options.environment;
  if (options.cluster) process.env.CLUSTER_NAME = options.cluster;
  if (options.rolesFile) process.env.ROLES_FILE = options.rolesFile;
  if (options.memory) process.env.PLAN_STORE = 'memory';

  const config = loadControllerConfig();
  logger.setEnvironment(config.environment);
  return createController(config);
}

// =============================================================================
// COMMANDS
// =============================================================================

program
  .command('run')
  .description('Run the controller loop until interrupted')
  .action(async () => {
    await runCommand(controllerFromOptions());
  });

program
  .command('reconcile')
  .description('Run one reconciliation pass for a role, or for every role')
  .argument('[role]', 'Role to reconcile')
  .action(async (role?: string) => {
    const results = await reconcileCommand(controllerFromOptions(), role);
    if (hasFailures(results)) {
      process.exitCode = 1;
    }
  });

program
  .command('status')
  .description('Show plans per role')
  .argument('[role]', 'Show one role with its phase history')
  .option('--json', 'Print JSON instead of a table')
  .action(async (role: string | undefined, options: { json?: boolean }) => {
    await statusCommand(controllerFromOptions(), role, options.json ?? false);
  });

program
  .command('declare')
  .description('Declare the AMI family (and optionally a pinned release) a role should run')
  .argument('<role>', 'Role name')
  .argument('<family>', 'AMI family (amazon-linux-2, amazon-linux-2023, bottlerocket, chainguard, ...)')
  .option('--release <version>', 'Pin to this release instead of following the feed')
  .action(async (role: string, family: string, options: { release?: string }) => {
    await declareCommand(controllerFromOptions(), role, family, options.release);
  });

program
  .command('resume')
  .description('Resume a Paused or Failed plan from the phase it stopped in')
  .argument('<role>', 'Role name')
  .action(async (role: string) => {
    await resumeCommand(controllerFromOptions(), role);
  });

program
  .command('abort')
  .description('Abort the active plan; the source is uncordoned, the target is kept')
  .argument('<role>', 'Role name')
  .action(async (role: string) => {
    await abortCommand(controllerFromOptions(), role);
  });

// Parse and execute
program.parseAsync().catch((error: unknown) => {
  logger.error(errorMessage(error));
  process.exit(1);
});
