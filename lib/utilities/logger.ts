/**
 * Logger Utility
 *
 * Styled console logging for the controller, its CLI and its Lambda handler.
 *
 * Log levels control verbosity per environment:
 *
 *   | Level   | Shown in prod/staging | Shown in dev |
 *   |---------|-----------------------|--------------|
 *   | error   | ✓                     | ✓            |
 *   | warn    | ✓                     | ✓            |
 *   | info    | ✓                     | ✓            |
 *   | verbose | ✗                     | ✓            |
 *   | debug   | ✗                     | ✓            |
 *
 * The level is determined by:
 *   1. LOG_LEVEL env var (explicit override)
 *   2. DEPLOY_ENVIRONMENT env var (auto: production/staging → info, else → debug)
 *   3. Fallback: debug (local development assumed)
 */

import chalk from 'chalk';

// =============================================================================
// Log Levels
// =============================================================================

export enum LogLevel {
  SILENT = -1,
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  VERBOSE = 3,
  DEBUG = 4,
}

const LOG_LEVEL_MAP: Record<string, LogLevel> = {
  silent: LogLevel.SILENT,
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  verbose: LogLevel.VERBOSE,
  debug: LogLevel.DEBUG,
};

/**
 * Resolve the active log level from environment.
 */
function resolveLogLevel(): LogLevel {
  const explicit = process.env.LOG_LEVEL?.toLowerCase();
  if (explicit && explicit in LOG_LEVEL_MAP) {
    return LOG_LEVEL_MAP[explicit];
  }

  const env = process.env.DEPLOY_ENVIRONMENT?.toLowerCase();
  if (env === 'production' || env === 'staging') {
    return LogLevel.INFO;
  }

  return LogLevel.DEBUG;
}

let currentLevel = resolveLogLevel();

/** Prefix identifying the role a line belongs to */
function scoped(role: string, message: string): string {
  return `${chalk.magenta(`[${role}]`)} ${message}`;
}

// =============================================================================
// Logger
// =============================================================================

const logger = {
  // ---------------------------------------------------------------------------
  // Level management
  // ---------------------------------------------------------------------------

  /** Override the current log level programmatically */
  setLevel: (level: LogLevel): void => {
    currentLevel = level;
  },

  /**
   * Set log level from deployment environment string.
   * Call this early in main() after parsing the CLI environment arg.
   */
  setEnvironment: (environment: string): void => {
    // Respect explicit LOG_LEVEL override
    if (process.env.LOG_LEVEL) return;

    const env = environment.toLowerCase();
    currentLevel = env === 'production' || env === 'staging' ? LogLevel.INFO : LogLevel.DEBUG;
  },

  // ---------------------------------------------------------------------------
  // Core output (error, warn, success, header)
  // ---------------------------------------------------------------------------

  header: (message: string): void => {
    if (currentLevel < LogLevel.INFO) return;
    console.log();
    console.log(chalk.bold.cyan(`━━━ ${message} ━━━`));
    console.log();
  },

  success: (message: string): void => {
    if (currentLevel >= LogLevel.INFO) {
      console.log(chalk.green('✓'), message);
    }
  },

  warn: (message: string): void => {
    if (currentLevel >= LogLevel.WARN) {
      console.log(chalk.yellow('⚠'), message);
    }
  },

  error: (message: string): void => {
    if (currentLevel >= LogLevel.ERROR) {
      console.log(chalk.red('✗'), message);
    }
  },

  // ---------------------------------------------------------------------------
  // Info level
  // ---------------------------------------------------------------------------

  info: (message: string): void => {
    if (currentLevel >= LogLevel.INFO) {
      console.log(chalk.blue('ℹ'), message);
    }
  },

  task: (message: string): void => {
    if (currentLevel >= LogLevel.INFO) {
      console.log(chalk.cyan('→'), message);
    }
  },

  keyValue: (key: string, value: string): void => {
    if (currentLevel >= LogLevel.INFO) {
      console.log(`  ${chalk.dim(key + ':')} ${value}`);
    }
  },

  // ---------------------------------------------------------------------------
  // Role-scoped output (controller passes)
  // ---------------------------------------------------------------------------

  roleInfo: (role: string, message: string): void => {
    if (currentLevel >= LogLevel.INFO) {
      console.log(chalk.blue('ℹ'), scoped(role, message));
    }
  },

  roleWarn: (role: string, message: string): void => {
    if (currentLevel >= LogLevel.WARN) {
      console.log(chalk.yellow('⚠'), scoped(role, message));
    }
  },

  roleError: (role: string, message: string): void => {
    if (currentLevel >= LogLevel.ERROR) {
      console.log(chalk.red('✗'), scoped(role, message));
    }
  },

  roleDebug: (role: string, message: string): void => {
    if (currentLevel >= LogLevel.DEBUG) {
      console.log(chalk.gray('⊡'), scoped(role, chalk.dim(message)));
    }
  },

  // ---------------------------------------------------------------------------
  // Verbose level (dev only: polling progress)
  // ---------------------------------------------------------------------------

  verbose: (message: string): void => {
    if (currentLevel >= LogLevel.VERBOSE) {
      console.log(chalk.gray('⋯'), message);
    }
  },

  // ---------------------------------------------------------------------------
  // Debug level (dev only)
  // ---------------------------------------------------------------------------

  debug: (message: string): void => {
    if (currentLevel >= LogLevel.DEBUG) {
      console.log(chalk.gray('⊡'), chalk.dim(message));
    }
  },

  // ---------------------------------------------------------------------------
  // Table (always shown, CLI status output)
  // ---------------------------------------------------------------------------

  table: (headers: string[], rows: string[][]): void => {
    const colWidths = headers.map((h, i) =>
      Math.max(h.length, ...rows.map((r) => (r[i] || '').length))
    );

    const separator = colWidths.map((w) => '─'.repeat(w + 2)).join('┼');
    const headerRow = headers
      .map((h, i) => h.padEnd(colWidths[i]))
      .join(' │ ');

    console.log();
    console.log(chalk.dim('┌─' + separator + '─┐'));
    console.log(chalk.dim('│ ') + chalk.bold(headerRow) + chalk.dim(' │'));
    console.log(chalk.dim('├─' + separator + '─┤'));

    rows.forEach((row) => {
      const rowStr = row
        .map((cell, i) => (cell || '').padEnd(colWidths[i]))
        .join(' │ ');
      console.log(chalk.dim('│ ') + rowStr + chalk.dim(' │'));
    });

    console.log(chalk.dim('└─' + separator + '─┘'));
    console.log();
  },
};

export default logger;
