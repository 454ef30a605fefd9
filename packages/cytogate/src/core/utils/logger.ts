/**
 * Structured logging for engine components
 *
 * Every level writes to stderr; stdout belongs to command output, which may
 * be JSON, NDJSON or CSV.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'pretty' | 'json';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export interface LoggerOptions {
  readonly level: LogLevel;
  readonly service: string;
  readonly format: LogFormat;
  /** Fields attached to every entry */
  readonly context?: LogMetadata;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  constructor(private readonly options: LoggerOptions) {}

  get level(): LogLevel {
    return this.options.level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.options.level];
  }

  /**
   * Logger sharing this one's settings, with `context` added to every entry
   */
  child(context: LogMetadata): Logger {
    return new Logger({ ...this.options, context: { ...this.options.context, ...context } });
  }

  format(level: LogLevel, message: string, metadata?: LogMetadata, timestamp = new Date().toISOString()): string {
    const { service, format, context } = this.options;
    const fields: LogMetadata = { ...context, ...metadata };

    if (format === 'json') {
      return JSON.stringify({ timestamp, level, service, message, ...fields });
    }
    const suffix = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';
    return `[${timestamp}] ${level.toUpperCase()} ${service}: ${message}${suffix}`;
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

  private write(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.isEnabled(level)) return;
    console.error(this.format(level, message, metadata));
  }
}

const getLogLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return 'info';
};

const getLogFormat = (): LogFormat => (process.env.NODE_ENV === 'production' ? 'json' : 'pretty');

export const logger = new Logger({
  level: getLogLevel(),
  service: 'cytogate',
  format: getLogFormat(),
});

/**
 * Logger for one engine component
 *
 * `context.module` names the service (`cytogate:<module>`); any other fields
 * are attached to every entry. `level` overrides LOG_LEVEL.
 */
export function createLogger(context: LogMetadata, level?: LogLevel): Logger {
  const { module: name, ...fields } = context;
  return new Logger({
    level: level ?? getLogLevel(),
    service: `cytogate:${typeof name === 'string' ? name : 'unknown'}`,
    format: getLogFormat(),
    context: fields,
  });
}
