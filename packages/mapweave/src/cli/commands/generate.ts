/**
 * Generate Command
 *
 * Runs the point and join pipelines side by side and writes both map
 * documents into the out-dir. A failure in one pipeline is reported and does
 * not stop the other.
 *
 * Usage:
 *   mapweave generate --points-csv <file> --aggregate-csv <file> --geojson <file>
 *     [--geojson-id-field <prop>] [--country-field <column>] [--value-field <column>] [--strict]
 *
 * Exit codes: 0 both succeeded, 1 one failed, 2 all failed.
 */

import type { Command } from 'commander';
import { countFailures, runPipelines, type PipelineJobs } from '../../pipelines/runner.js';
import { exitCodeFor, EXIT_CODES, getGlobalContext } from '../lib/context.js';
import {
  CHOROPLETH_MAP_FILENAME,
  createJoinJob,
  createPointJob,
  outputPath,
  POINT_MAP_FILENAME,
  withJoinFlags,
  type JoinFlags,
} from '../lib/jobs.js';

interface GenerateOptions extends JoinFlags {
  readonly pointsCsv?: string;
  readonly aggregateCsv?: string;
  readonly geojson?: string;
}

export function registerGenerateCommand(parent: Command): void {
  parent
    .command('generate')
    .description('Generate the point-cluster and choropleth map documents')
    .option('--points-csv <file>', 'Point-level incidents CSV/TSV')
    .option('--aggregate-csv <file>', 'Country aggregates CSV/TSV')
    .option('--geojson <file>', 'Country boundaries GeoJSON')
    .option('--geojson-id-field <prop>', 'Feature property to join on')
    .option('--country-field <column>', 'Column holding the country key')
    .option('--value-field <column>', 'Column holding the value')
    .option('--strict', 'Fail the join when any key matches no feature')
    .action(async (options: GenerateOptions) => {
      process.exitCode = await executeGenerate(options);
    });
}

async function executeGenerate(options: GenerateOptions): Promise<number> {
  const context = getGlobalContext();
  const config = withJoinFlags(context.config, options);
  const { logger } = context;

  if (options.aggregateCsv !== undefined && options.geojson === undefined) {
    logger.error('--aggregate-csv requires --geojson');
    return EXIT_CODES.CONFIG_ERROR;
  }
  if (options.pointsCsv === undefined && options.aggregateCsv === undefined) {
    logger.error('Nothing to generate: pass --points-csv and/or --aggregate-csv with --geojson');
    return EXIT_CODES.CONFIG_ERROR;
  }

  logger.commandStart('generate', { ...options });

  const jobs: PipelineJobs = {
    ...(options.pointsCsv !== undefined
      ? {
          point: createPointJob(
            options.pointsCsv,
            outputPath(config, POINT_MAP_FILENAME),
            config,
            logger.child({ pipeline: 'point' })
          ),
        }
      : {}),
    ...(options.aggregateCsv !== undefined && options.geojson !== undefined
      ? {
          join: createJoinJob(
            options.aggregateCsv,
            options.geojson,
            outputPath(config, CHOROPLETH_MAP_FILENAME),
            config,
            logger.child({ pipeline: 'join' })
          ),
        }
      : {}),
  };

  const result = await runPipelines(jobs, logger);
  const total = [result.point, result.join].filter((outcome) => outcome !== undefined).length;
  const failed = countFailures(result);

  logger.commandEnd(failed === 0, { pipelines: total, failed });
  return exitCodeFor(failed, total);
}
