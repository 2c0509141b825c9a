#!/usr/bin/env tsx
/**
 * Mapweave CLI Entry Point
 *
 * Builds point-cluster and choropleth map documents from tabular data and
 * country geometry.
 *
 * @module mapweave-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { registerCommands } from '../src/cli/commands/index.js';
import {
  EXIT_CODES,
  getGlobalContext,
  hasGlobalContext,
  initializeContext,
  type GlobalOptions,
} from '../src/cli/lib/context.js';

// ============================================================================
// CLI Setup
// ============================================================================

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = join(__dirname, '..', 'package.json');
  return PackageJsonSchema.parse(JSON.parse(readFileSync(packageJsonPath, 'utf-8'))).version;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('mapweave')
    .description('Mapweave CLI - point-cluster and choropleth maps from tabular data')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .mapweaverc)')
    .option('--out-dir <dir>', 'Directory for generated map documents')
    .hook('preAction', async (thisCommand) => {
      const options = thisCommand.opts<GlobalOptions>();
      try {
        await initializeContext(options);
      } catch (error) {
        console.error(
          `Configuration error: ${error instanceof Error ? error.message : String(error)}`
        );
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerCommands(program);

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (hasGlobalContext()) {
      const { logger, startTime } = getGlobalContext();
      logger.error('Command failed', {
        error: error instanceof Error ? error.message : String(error),
        duration_ms: Date.now() - startTime,
      });
    } else {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exit(EXIT_CODES.ERRORS);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
