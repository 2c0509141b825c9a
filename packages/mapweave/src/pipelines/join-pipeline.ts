/**
 * Aggregate-Join Pipeline
 *
 * Record set → resolved country_key/value → (country_key, value) projection →
 * join key binding against the geometry → per-feature values → choropleth
 * document.
 */

import type {
  AggregateRow,
  ColumnRoleAssignment,
  DuplicateKeyPolicy,
  GeometryCollection,
  JoinKeyBinding,
  JoinStrictness,
  RoleCandidateTable,
  TabularRecordSet,
} from '../core/types.js';
import { createLogger, type PipelineLogger } from '../core/utils/logger.js';
import { evaluateJoin, type JoinEvaluation } from '../join/join-evaluator.js';
import { bindKeyColumn, reconcileJoinKey } from '../join/key-reconciler.js';
import { projectAggregate } from '../join/projection.js';
import {
  buildChoroplethDocument,
  type ChoroplethDocument,
  type ChoroplethDocumentOptions,
} from '../render/map-document.js';
import { SchemaResolver } from '../schema/resolver.js';

export interface JoinPipelineOptions {
  readonly candidates?: RoleCandidateTable;
  /** Column holding the country key; bypasses inference */
  readonly countryField?: string;
  /** Column holding the value; bypasses inference */
  readonly valueField?: string;
  /** Feature property to join on; bypasses the key reconciler's inference */
  readonly geojsonIdField?: string;
  readonly idPriority?: readonly string[];
  readonly nameProperty?: string;
  /** Default: 'best-effort' */
  readonly strictness?: JoinStrictness;
  /** Default: 'last' */
  readonly duplicateKeys?: DuplicateKeyPolicy;
  readonly document?: ChoroplethDocumentOptions;
  readonly logger?: PipelineLogger;
}

export interface JoinPipelineResult {
  readonly assignment: ColumnRoleAssignment;
  readonly binding: JoinKeyBinding;
  readonly projection: readonly AggregateRow[];
  readonly evaluation: JoinEvaluation;
  readonly document: ChoroplethDocument;
}

/**
 * Run the join pipeline over an already-read record set and geometry
 *
 * @throws SchemaResolutionError when country_key or value is unresolved
 * @throws JoinMismatchError under 'require-all-keys' with unmatched keys
 */
export function runJoinPipeline(
  recordSet: TabularRecordSet,
  collection: GeometryCollection,
  options: JoinPipelineOptions = {}
): JoinPipelineResult {
  const log = options.logger ?? createLogger({ module: 'join' });
  const resolver = new SchemaResolver(options.candidates);

  const overrides = {
    ...(options.countryField ? { country_key: options.countryField } : {}),
    ...(options.valueField ? { value: options.valueField } : {}),
  };
  const { assignment, required } = resolver.resolveJoinRoles(recordSet.schema, overrides);
  log.info('Resolved aggregate columns', {
    country: required.country_key,
    value: required.value,
  });

  if (collection.features.length === 0) {
    log.warn('Geometry collection has no features; nothing can be shaded');
  }

  const binding = bindKeyColumn(
    reconcileJoinKey(collection, {
      idProperty: options.geojsonIdField,
      idPriority: options.idPriority,
      nameProperty: options.nameProperty,
    }),
    required.country_key
  );

  if (binding.mode === 'name-fallback') {
    log.warn('No identifier property found; matching on display name', { keyOn: binding.keyOn });
  } else {
    log.info('Matching rows to features', { keyOn: binding.keyOn, source: binding.source });
  }

  const projection = projectAggregate(recordSet, required);
  const evaluation = evaluateJoin(collection, binding, projection, {
    strictness: options.strictness,
    duplicateKeys: options.duplicateKeys,
  });

  if (evaluation.unmatchedKeys.length > 0) {
    log.warn('Keys without a matching feature', {
      unmatched: evaluation.unmatchedKeys.length,
      matched: evaluation.matchedKeys.length,
      mode: binding.mode,
    });
  }
  if (evaluation.nonNumericRows > 0 || evaluation.keylessRows > 0) {
    log.info('Skipped rows without a key or numeric value', {
      nonNumeric: evaluation.nonNumericRows,
      keyless: evaluation.keylessRows,
    });
  }

  return {
    assignment,
    binding,
    projection,
    evaluation,
    document: buildChoroplethDocument(collection, binding, evaluation, options.document),
  };
}
