/**
 * @format
 * Nodegroup Rollover - Library Entry Point
 */

// Configuration
export * from './config/environments';
export * from './config/defaults';
export * from './config/ami-families';
export * from './config/rollover';

// Controller
export * from './rollover/errors';
export * from './rollover/types';
export * from './rollover/ports';
export * from './rollover/plan-store';
export * from './rollover/role-lock';
export * from './rollover/state-machine';
export * from './rollover/reconciler';
export * from './rollover/scheduler';
export * from './rollover/operator';
export * from './rollover/controller';

// Utilities
export * from './utilities/naming';
export * from './utilities/validation';
export { default as logger, LogLevel } from './utilities/logger';
