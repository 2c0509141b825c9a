/**
 * Point Pipeline
 *
 * Record set → resolved lat/lon (and optional category) → filtered, sampled,
 * centered points → clustered point map document.
 */

import type {
  ColumnRoleAssignment,
  PointPlot,
  RoleCandidateTable,
  TabularRecordSet,
} from '../core/types.js';
import { createLogger, type PipelineLogger } from '../core/utils/logger.js';
import { buildPointPlot, type SamplingOptions } from '../points/sampling.js';
import {
  buildPointMapDocument,
  type PointDocumentOptions,
  type PointMapDocument,
} from '../render/map-document.js';
import { SchemaResolver } from '../schema/resolver.js';

export interface PointPipelineOptions extends SamplingOptions {
  /** Candidate table for role inference */
  readonly candidates?: RoleCandidateTable;
  readonly document?: PointDocumentOptions;
  readonly logger?: PipelineLogger;
}

export interface PointPipelineResult {
  readonly assignment: ColumnRoleAssignment;
  readonly plot: PointPlot;
  readonly document: PointMapDocument;
}

/**
 * Run the point pipeline over an already-read record set
 *
 * @throws SchemaResolutionError when latitude or longitude is unresolved
 * @throws EmptyDatasetError when no record has both coordinates
 * @throws CoordinateParseError when a retained coordinate is not numeric
 */
export function runPointPipeline(
  recordSet: TabularRecordSet,
  options: PointPipelineOptions = {}
): PointPipelineResult {
  const log = options.logger ?? createLogger({ module: 'points' });
  const resolver = new SchemaResolver(options.candidates);

  const { assignment, required } = resolver.resolvePointRoles(recordSet.schema);
  const category = assignment.columns.category;
  log.info('Resolved point columns', {
    latitude: required.latitude,
    longitude: required.longitude,
    category: category ?? null,
  });

  const plot = buildPointPlot(
    recordSet,
    { latitude: required.latitude, longitude: required.longitude, category },
    { maxPoints: options.maxPoints, seed: options.seed }
  );

  if (plot.droppedCount > 0) {
    log.info('Dropped records without coordinates', { dropped: plot.droppedCount });
  }
  if (plot.sampled) {
    log.info('Sampled points', {
      retained: plot.points.length,
      available: recordSet.records.length - plot.droppedCount,
    });
  }
  log.debug('Map center', { lat: plot.center[0], lon: plot.center[1] });

  return { assignment, plot, document: buildPointMapDocument(plot, options.document) };
}
