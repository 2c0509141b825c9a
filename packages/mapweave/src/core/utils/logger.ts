/**
 * Structured logging utility for mapweave
 *
 * Console-backed logger with levels, timestamps and contextual metadata.
 * Pretty lines in development, one JSON object per line in production.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

/**
 * What pipelines need from a logger
 *
 * Satisfied by both `Logger` and the CLI logger.
 */
export interface PipelineLogger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;
}

export interface LoggerConfig {
  readonly level: LogLevel;
  readonly service: string;
  readonly pretty: boolean;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger implements PipelineLogger {
  constructor(private readonly config: LoggerConfig) {}

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.config.level];
  }

  private formatMessage(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const timestamp = new Date().toISOString();
    const hasMetadata = metadata !== undefined && Object.keys(metadata).length > 0;

    if (this.config.pretty) {
      const metaStr = hasMetadata ? ` ${JSON.stringify(metadata)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.config.service}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.config.service,
      message,
      ...(hasMetadata ? metadata : {}),
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('debug')) return;
    console.debug(this.formatMessage('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('info')) return;
    console.info(this.formatMessage('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('warn')) return;
    console.warn(this.formatMessage('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('error')) return;
    console.error(this.formatMessage('error', message, metadata));
  }
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const level = value?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return undefined;
}

const getLogLevel = (): LogLevel => parseLogLevel(process.env.LOG_LEVEL) ?? 'info';

export const logger = new Logger({
  level: getLogLevel(),
  service: 'mapweave',
  pretty: process.env.NODE_ENV !== 'production',
});

/**
 * Create a logger namespaced to a module, e.g. `mapweave:points`
 */
export function createLogger(context: { readonly module?: string }): Logger {
  return new Logger({
    level: getLogLevel(),
    service: `mapweave:${context.module ?? 'unknown'}`,
    pretty: process.env.NODE_ENV !== 'production',
  });
}

/**
 * Logger that drops everything; for callers that opt out of logging
 */
export const silentLogger: PipelineLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
