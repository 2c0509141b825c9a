/**
 * CLI Global Context
 *
 * Config and logger built once by the program's preAction hook and read by
 * every command action.
 *
 * @module cli/lib/context
 */

import { loadConfig, validateConfig, type MapweaveConfig } from './config.js';
import { createCLILogger, type CLILogger } from './logger.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  PARTIAL: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// Global State
// ============================================================================

export interface GlobalContext {
  readonly config: MapweaveConfig;
  readonly logger: CLILogger;
  readonly startTime: number;
}

export type GlobalOptions = {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly config?: string;
  readonly outDir?: string;
};

let globalContext: GlobalContext | null = null;

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

export function hasGlobalContext(): boolean {
  return globalContext !== null;
}

/**
 * Load and validate config, then build the logger
 *
 * @throws Error on a missing or invalid config
 */
export async function initializeContext(options: GlobalOptions): Promise<GlobalContext> {
  const startTime = Date.now();

  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      outDir: options.outDir,
    },
  });
  validateConfig(config);

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  globalContext = { config, logger, startTime };
  return globalContext;
}

/**
 * Exit code for a run where `failed` of `total` pipelines failed
 */
export function exitCodeFor(failed: number, total: number): ExitCode {
  if (failed === 0) return EXIT_CODES.SUCCESS;
  return failed < total ? EXIT_CODES.PARTIAL : EXIT_CODES.ERRORS;
}

/**
 * Parse a positive integer option value
 *
 * @throws Error naming the option when the value is not a positive integer
 */
export function parsePositiveInt(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Parse an integer option value
 */
export function parseInteger(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}
