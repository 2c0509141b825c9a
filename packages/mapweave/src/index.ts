/**
 * mapweave - point-cluster and choropleth maps from tabular data
 *
 * - Heuristic column-role resolution against candidate tables
 * - Coordinate filtering, seeded uniform sampling and median centering
 * - Join key reconciliation between aggregate tables and country geometry
 * - Serializable map documents for both map kinds
 *
 * @packageDocumentation
 */

// Core types and errors
export type {
  AggregateRow,
  BindingSource,
  CandidateMatch,
  ColumnRole,
  ColumnRoleAssignment,
  DuplicateKeyPolicy,
  GeometryCollection,
  GeometryFeature,
  JoinKeyBinding,
  JoinMode,
  JoinStrictness,
  LatLon,
  PointPlot,
  RenderablePoint,
  RoleCandidates,
  RoleCandidateTable,
  ScalarValue,
  TabularRecord,
  TabularRecordSet,
} from './core/types.js';
export { ALL_COLUMN_ROLES } from './core/types.js';
export {
  CoordinateParseError,
  EmptyDatasetError,
  isMapweaveError,
  JoinMismatchError,
  MalformedGeometryError,
  MapweaveError,
  SchemaResolutionError,
  TabularReadError,
  type MapweaveErrorCode,
} from './core/errors.js';

// Schema resolution
export {
  DEFAULT_ID_PRIORITY,
  DEFAULT_NAME_PROPERTY,
  DEFAULT_ROLE_CANDIDATES,
  mergeCandidateTables,
} from './schema/candidates.js';
export {
  findCandidateColumn,
  JOIN_REQUIRED_ROLES,
  POINT_REQUIRED_ROLES,
  requireRoles,
  resolveColumnRoles,
  SchemaResolver,
  type ResolveOptions,
} from './schema/resolver.js';

// Points
export {
  buildPointPlot,
  DEFAULT_MAX_POINTS,
  DEFAULT_SAMPLE_SEED,
  dropIncompleteRecords,
  medianCenter,
  sampleUniform,
  type PointColumns,
  type SamplingOptions,
} from './points/sampling.js';

// Join
export { bindKeyColumn, reconcileJoinKey, type ReconcileOptions } from './join/key-reconciler.js';
export { projectAggregate, type AggregateColumns } from './join/projection.js';
export {
  evaluateJoin,
  foldAggregateRows,
  toNumericValue,
  type JoinEvaluation,
  type JoinEvaluationOptions,
} from './join/join-evaluator.js';
export { locatorProperty, readLocator, toLocator } from './join/locator.js';

// Readers
export {
  MISSING_VALUE_MARKERS,
  parseDelimited,
  readTabularFile,
  type DelimitedFormat,
} from './tabular/reader.js';
export { parseNumericText } from './core/utils/numeric.js';
export { loadGeometryCollection, parseGeometryCollection } from './geometry/loader.js';

// Rendering
export { clusterPoints, PointClusterIndex, type ClusterOptions, type MarkerGroup } from './render/cluster.js';
export {
  buildChoroplethDocument,
  buildPointMapDocument,
  createFillScale,
  FILL_COLOR_PROPERTY,
  FILL_VALUE_PROPERTY,
  type ChoroplethDocument,
  type PointMapDocument,
} from './render/map-document.js';

// Pipelines
export { runPointPipeline, type PointPipelineOptions, type PointPipelineResult } from './pipelines/point-pipeline.js';
export { runJoinPipeline, type JoinPipelineOptions, type JoinPipelineResult } from './pipelines/join-pipeline.js';
export {
  countFailures,
  isolatePipeline,
  runPipelines,
  type PipelineJobs,
  type PipelineOutcome,
  type PipelineRunResult,
} from './pipelines/runner.js';

// Utilities
export { atomicWriteFile, atomicWriteJSON } from './core/utils/atomic-write.js';
export { createLogger, Logger, logger, silentLogger, type PipelineLogger } from './core/utils/logger.js';
