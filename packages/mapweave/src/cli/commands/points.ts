/**
 * Points Command
 *
 * Usage:
 *   mapweave points <csv> [--max-points <n>] [--seed <n>] [--out <file>]
 */

import type { Command } from 'commander';
import { isolatePipeline } from '../../pipelines/runner.js';
import {
  EXIT_CODES,
  getGlobalContext,
  parseInteger,
  parsePositiveInt,
} from '../lib/context.js';
import type { MapweaveConfig } from '../lib/config.js';
import { createPointJob, outputPath, POINT_MAP_FILENAME } from '../lib/jobs.js';

interface PointsOptions {
  readonly maxPoints?: number;
  readonly seed?: number;
  readonly out?: string;
}

export function registerPointsCommand(parent: Command): void {
  parent
    .command('points <csv>')
    .description('Build a clustered point map from a point-level table')
    .option('--max-points <n>', 'Sampling cap', (value: string) =>
      parsePositiveInt('--max-points', value)
    )
    .option('--seed <n>', 'Sampling seed', (value: string) => parseInteger('--seed', value))
    .option('-o, --out <file>', `Output file (default: <out-dir>/${POINT_MAP_FILENAME})`)
    .action(async (csv: string, options: PointsOptions) => {
      process.exitCode = await executePoints(csv, options);
    });
}

async function executePoints(csv: string, options: PointsOptions): Promise<number> {
  const context = getGlobalContext();
  const config: MapweaveConfig = {
    ...context.config,
    points: {
      ...context.config.points,
      maxPoints: options.maxPoints ?? context.config.points.maxPoints,
      seed: options.seed ?? context.config.points.seed,
    },
  };
  const { logger } = context;

  logger.commandStart('points', { csv, maxPoints: config.points.maxPoints, seed: config.points.seed });

  const outcome = await isolatePipeline(
    'point',
    createPointJob(csv, outputPath(config, POINT_MAP_FILENAME, options.out), config, logger),
    logger
  );

  if (outcome.ok && config.json) {
    const { plot } = outcome.value;
    console.log(
      JSON.stringify({
        success: true,
        points: plot.points.length,
        dropped: plot.droppedCount,
        sampled: plot.sampled,
        center: plot.center,
      })
    );
  }

  logger.commandEnd(outcome.ok);
  return outcome.ok ? EXIT_CODES.SUCCESS : EXIT_CODES.ERRORS;
}
