/**
 * Mapweave CLI Structured Logging
 *
 * JSON output for machine consumption and coloured lines for interactive
 * use. Every entry carries a timestamp, the command context and any context
 * bound through `child()`.
 *
 * @module cli/lib/logger
 */

import type { LogLevel, LogMetadata, PipelineLogger } from '../../core/utils/logger.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Structured log entry for JSON output
 */
export interface StructuredLogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly message: string;
  readonly command?: string;
  readonly duration_ms?: number;
  readonly [key: string]: unknown;
}

/**
 * Logger configuration
 */
export interface CLILoggerConfig {
  /** Minimum log level to output */
  readonly level: LogLevel;
  /** Output as JSON */
  readonly json: boolean;
  /** Command name for context */
  readonly command?: string;
  readonly service?: string;
  /** Metadata merged into every entry */
  readonly context?: LogMetadata;
}

// ============================================================================
// Constants
// ============================================================================

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

// ============================================================================
// CLI Logger Class
// ============================================================================

export class CLILogger implements PipelineLogger {
  private readonly config: CLILoggerConfig;
  private startTime: number;
  private commandContext: string | null;

  constructor(config: CLILoggerConfig) {
    this.config = {
      service: 'mapweave',
      ...config,
    };
    this.commandContext = config.command ?? null;
    this.startTime = Date.now();
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private mergeMetadata(metadata?: LogMetadata): LogMetadata {
    return { ...this.config.context, ...metadata };
  }

  private formatJson(level: LogLevel, message: string, metadata: LogMetadata): string {
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.config.service ? { service: this.config.service } : {}),
      ...(this.commandContext ? { command: this.commandContext } : {}),
      ...metadata,
    };
    return JSON.stringify(entry);
  }

  private formatHuman(level: LogLevel, message: string, metadata: LogMetadata): string {
    let line = `${COLORS.dim}${new Date().toISOString()}${COLORS.reset} `;
    line += `${LEVEL_COLORS[level]}${LEVEL_LABELS[level]}${COLORS.reset} `;
    line += message;

    const entries = Object.entries(metadata);
    if (entries.length > 0) {
      const metaStr = entries
        .map(([key, value]) => {
          const valueStr = typeof value === 'object' ? JSON.stringify(value) : String(value);
          return `${COLORS.cyan}${key}${COLORS.reset}=${valueStr}`;
        })
        .join(' ');
      line += ` ${COLORS.dim}(${metaStr})${COLORS.reset}`;
    }

    return line;
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(level)) return;

    const merged = this.mergeMetadata(metadata);
    const formatted = this.config.json
      ? this.formatJson(level, message, merged)
      : this.formatHuman(level, message, merged);

    switch (level) {
      case 'debug':
        console.debug(formatted);
        break;
      case 'info':
        console.info(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      case 'error':
        console.error(formatted);
        break;
    }
  }

  /**
   * Set command context for subsequent log entries
   */
  setCommand(command: string): void {
    this.commandContext = command;
    this.startTime = Date.now();
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }

  commandStart(command: string, options?: LogMetadata): void {
    this.setCommand(command);
    this.info(`Starting ${command}`, options);
  }

  /**
   * Log command completion with duration
   */
  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const durationMs = Date.now() - this.startTime;
    const baseMetadata = { duration_ms: durationMs, ...metadata };
    const elapsed = formatDuration(durationMs);

    if (success) {
      this.info(`Command completed in ${elapsed}`, baseMetadata);
    } else {
      this.error(`Command failed after ${elapsed}`, baseMetadata);
    }
  }

  /**
   * Print rows as an aligned table, or one JSON array in JSON mode
   */
  table(data: readonly Record<string, unknown>[], columns?: readonly string[]): void {
    if (this.config.json) {
      console.log(JSON.stringify(data));
      return;
    }

    const first = data[0];
    if (first === undefined) {
      this.info('No data to display');
      return;
    }

    const cols = columns ?? Object.keys(first);
    const widths = new Map<string, number>();
    for (const col of cols) {
      let width = col.length;
      for (const row of data) {
        width = Math.max(width, String(row[col] ?? '').length);
      }
      widths.set(col, width);
    }

    const pad = (col: string, value: string): string => value.padEnd(widths.get(col) ?? 0);
    console.log(cols.map((col) => pad(col, col)).join(' | '));
    console.log(cols.map((col) => '-'.repeat(widths.get(col) ?? 0)).join('-+-'));
    for (const row of data) {
      console.log(cols.map((col) => pad(col, String(row[col] ?? ''))).join(' | '));
    }
  }

  /**
   * Create a child logger whose entries carry additional context
   */
  child(context: LogMetadata): CLILogger {
    const childLogger = new CLILogger({
      ...this.config,
      context: { ...this.config.context, ...context },
    });
    childLogger.commandContext = this.commandContext;
    childLogger.startTime = this.startTime;
    return childLogger;
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createCLILogger(config: Partial<CLILoggerConfig> = {}): CLILogger {
  return new CLILogger({
    level: config.level ?? 'info',
    json: config.json ?? false,
    command: config.command,
    service: config.service ?? 'mapweave',
    context: config.context,
  });
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds for display
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(1);
    return `${minutes}m ${seconds}s`;
  }
}
