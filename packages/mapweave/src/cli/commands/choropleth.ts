/**
 * Choropleth Command
 *
 * Usage:
 *   mapweave choropleth <csv> <geojson> [options]
 *
 * Options:
 *   --geojson-id-field <prop>   Feature property to join on
 *   --country-field <column>    Column holding the country key
 *   --value-field <column>      Column holding the value
 *   --strict                    Fail when any key matches no feature
 *   --out <file>                Output file
 */

import type { Command } from 'commander';
import { isolatePipeline } from '../../pipelines/runner.js';
import { EXIT_CODES, getGlobalContext } from '../lib/context.js';
import {
  CHOROPLETH_MAP_FILENAME,
  createJoinJob,
  outputPath,
  withJoinFlags,
  type JoinFlags,
} from '../lib/jobs.js';

interface ChoroplethOptions extends JoinFlags {
  readonly out?: string;
}

export function registerChoroplethCommand(parent: Command): void {
  parent
    .command('choropleth <csv> <geojson>')
    .description('Join an aggregate table to country boundaries and shade them')
    .option('--geojson-id-field <prop>', 'Feature property to join on')
    .option('--country-field <column>', 'Column holding the country key')
    .option('--value-field <column>', 'Column holding the value')
    .option('--strict', 'Fail when any key matches no feature')
    .option('-o, --out <file>', `Output file (default: <out-dir>/${CHOROPLETH_MAP_FILENAME})`)
    .action(async (csv: string, geojson: string, options: ChoroplethOptions) => {
      process.exitCode = await executeChoropleth(csv, geojson, options);
    });
}

async function executeChoropleth(
  csv: string,
  geojson: string,
  options: ChoroplethOptions
): Promise<number> {
  const context = getGlobalContext();
  const config = withJoinFlags(context.config, options);
  const { logger } = context;

  logger.commandStart('choropleth', { csv, geojson, strictness: config.join.strictness });

  const outcome = await isolatePipeline(
    'join',
    createJoinJob(
      csv,
      geojson,
      outputPath(config, CHOROPLETH_MAP_FILENAME, options.out),
      config,
      logger
    ),
    logger
  );

  if (outcome.ok && config.json) {
    const { binding, evaluation } = outcome.value;
    console.log(
      JSON.stringify({
        success: true,
        keyOn: binding.keyOn,
        mode: binding.mode,
        matched: evaluation.matchedKeys.length,
        unmatched: evaluation.unmatchedKeys,
      })
    );
  }

  logger.commandEnd(outcome.ok);
  return outcome.ok ? EXIT_CODES.SUCCESS : EXIT_CODES.ERRORS;
}
