/**
 * Command context and exit codes
 *
 * @module cli/lib/context
 */

import { createLogger, type Logger, type LogLevel } from '../../core/utils/logger.js';
import type { CLIConfig } from './config.js';
import type { CLILogger } from './logger.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  /** Finished, but some data sets or gates failed */
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// Context
// ============================================================================

export interface CommandContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
}

/**
 * CLI log level for the resolved verbosity flags
 */
export function cliLogLevel(config: Pick<CLIConfig, 'verbose' | 'quiet'>): LogLevel {
  if (config.verbose) return 'debug';
  return config.quiet ? 'warn' : 'info';
}

/**
 * Logger for an engine component run by a command. Per-data-set progress
 * only shows with --verbose.
 */
export function engineLogger(config: Pick<CLIConfig, 'verbose' | 'quiet'>, module: string): Logger {
  const level: LogLevel = config.verbose ? 'debug' : config.quiet ? 'error' : 'warn';
  return createLogger({ module }, level);
}
