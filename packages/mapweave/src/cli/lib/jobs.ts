/**
 * Pipeline jobs for CLI commands
 *
 * Wraps read → pipeline → write into thunks the runner can isolate, with
 * pipeline options taken from the loaded config.
 *
 * @module cli/lib/jobs
 */

import { resolve } from 'node:path';
import { atomicWriteJSON } from '../../core/utils/atomic-write.js';
import type { PipelineLogger } from '../../core/utils/logger.js';
import { loadGeometryCollection } from '../../geometry/loader.js';
import {
  runJoinPipeline,
  type JoinPipelineOptions,
  type JoinPipelineResult,
} from '../../pipelines/join-pipeline.js';
import {
  runPointPipeline,
  type PointPipelineOptions,
  type PointPipelineResult,
} from '../../pipelines/point-pipeline.js';
import { readTabularFile } from '../../tabular/reader.js';
import { resolveOutDir, type MapweaveConfig } from './config.js';

export const POINT_MAP_FILENAME = 'point_map.json';
export const CHOROPLETH_MAP_FILENAME = 'choropleth_map.json';

export function pointPipelineOptions(
  config: MapweaveConfig,
  logger: PipelineLogger
): PointPipelineOptions {
  return {
    candidates: config.candidates,
    maxPoints: config.points.maxPoints,
    seed: config.points.seed,
    document: {
      zoom: config.points.zoom,
      tiles: config.points.tiles,
      layerName: config.points.layerName,
      disableClusteringAtZoom: config.points.disableClusteringAtZoom,
    },
    logger,
  };
}

/** Join flags shared by `choropleth` and `generate` */
export interface JoinFlags {
  readonly geojsonIdField?: string;
  readonly countryField?: string;
  readonly valueField?: string;
  readonly strict?: boolean;
}

/**
 * Config with command-line join flags laid over it; unset flags keep the config
 */
export function withJoinFlags(config: MapweaveConfig, flags: JoinFlags): MapweaveConfig {
  return {
    ...config,
    join: {
      ...config.join,
      geojsonIdField: flags.geojsonIdField ?? config.join.geojsonIdField,
      countryField: flags.countryField ?? config.join.countryField,
      valueField: flags.valueField ?? config.join.valueField,
      strictness: flags.strict ? 'require-all-keys' : config.join.strictness,
    },
  };
}

export function joinPipelineOptions(
  config: MapweaveConfig,
  logger: PipelineLogger
): JoinPipelineOptions {
  return {
    candidates: config.candidates,
    countryField: config.join.countryField,
    valueField: config.join.valueField,
    geojsonIdField: config.join.geojsonIdField,
    idPriority: config.idPriority,
    strictness: config.join.strictness,
    duplicateKeys: config.join.duplicateKeys,
    document: {
      legendName: config.join.legendName,
      tiles: config.join.tiles,
    },
    logger,
  };
}

/**
 * Output path: explicit file, or the default name inside the out-dir
 */
export function outputPath(config: MapweaveConfig, fileName: string, explicit?: string): string {
  return explicit ? resolve(explicit) : resolve(resolveOutDir(config), fileName);
}

export function createPointJob(
  csvPath: string,
  outPath: string,
  config: MapweaveConfig,
  logger: PipelineLogger
): () => Promise<PointPipelineResult> {
  return async () => {
    const records = await readTabularFile(csvPath);
    const result = runPointPipeline(records, pointPipelineOptions(config, logger));
    await atomicWriteJSON(outPath, result.document);
    logger.info('Wrote point map', { path: outPath, points: result.plot.points.length });
    return result;
  };
}

export function createJoinJob(
  csvPath: string,
  geojsonPath: string,
  outPath: string,
  config: MapweaveConfig,
  logger: PipelineLogger
): () => Promise<JoinPipelineResult> {
  return async () => {
    const [records, collection] = await Promise.all([
      readTabularFile(csvPath),
      loadGeometryCollection(geojsonPath),
    ]);
    const result = runJoinPipeline(records, collection, joinPipelineOptions(config, logger));
    await atomicWriteJSON(outPath, result.document);
    logger.info('Wrote choropleth map', {
      path: outPath,
      matched: result.evaluation.matchedKeys.length,
    });
    return result;
  };
}
