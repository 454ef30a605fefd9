/**
 * CLI Logging
 *
 * Progress and diagnostics for the running command, on stderr. Human lines
 * read `cytogate analyze: WARN message (key=value ...)`; with --json each
 * entry is one JSON object carrying the command name and elapsed time.
 *
 * @module cli/lib/logger
 */

import type { LogLevel, LogMetadata } from '../../core/utils/logger.js';

export interface CLILoggerConfig {
  /** Minimum level written */
  readonly level: LogLevel;
  /** One JSON object per entry instead of a human line */
  readonly json: boolean;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class CLILogger {
  private command: string | null = null;
  private startTime = Date.now();

  constructor(private readonly config: CLILoggerConfig) {}

  get level(): LogLevel {
    return this.config.level;
  }

  format(level: LogLevel, message: string, metadata: LogMetadata = {}, timestamp = new Date().toISOString()): string {
    if (this.config.json) {
      return JSON.stringify({
        timestamp,
        level,
        ...(this.command === null ? {} : { command: this.command }),
        message,
        ...metadata,
      });
    }

    const scope = this.command === null ? 'cytogate' : `cytogate ${this.command}`;
    const label = level === 'info' ? '' : `${level.toUpperCase()} `;
    const fields = Object.entries(metadata)
      .map(([key, value]) => `${key}=${typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value)}`)
      .join(' ');
    return `${scope}: ${label}${message}${fields ? ` (${fields})` : ''}`;
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.write('error', message, metadata);
  }

  /**
   * Tag later entries with `command` and restart the elapsed-time clock
   */
  commandStart(command: string, options?: LogMetadata): void {
    this.command = command;
    this.startTime = Date.now();
    this.debug('Started', options);
  }

  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const fields = { duration_ms: Date.now() - this.startTime, ...metadata };
    if (success) {
      this.info('Done', fields);
    } else {
      this.error('Failed', fields);
    }
  }

  private write(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.config.level]) return;
    console.error(this.format(level, message, metadata));
  }
}

export function createCLILogger(config: Partial<CLILoggerConfig> = {}): CLILogger {
  return new CLILogger({
    level: config.level ?? 'info',
    json: config.json ?? false,
  });
}
