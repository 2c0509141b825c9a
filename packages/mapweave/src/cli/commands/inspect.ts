/**
 * Inspect Command
 *
 * Shows how a table's columns resolve to roles and, given a geometry file,
 * which property the join would key on and how many keys match. Writes
 * nothing.
 *
 * Usage:
 *   mapweave inspect <csv> [--geojson <file>]
 */

import type { Command } from 'commander';
import {
  ALL_COLUMN_ROLES,
  type ColumnRole,
  type GeometryCollection,
  type JoinKeyBinding,
  type TabularRecordSet,
} from '../../core/types.js';
import { loadGeometryCollection } from '../../geometry/loader.js';
import { evaluateJoin } from '../../join/join-evaluator.js';
import { bindKeyColumn, reconcileJoinKey } from '../../join/key-reconciler.js';
import { projectAggregate } from '../../join/projection.js';
import { SchemaResolver } from '../../schema/resolver.js';
import { readTabularFile } from '../../tabular/reader.js';
import type { MapweaveConfig } from '../lib/config.js';
import { EXIT_CODES, getGlobalContext } from '../lib/context.js';

interface InspectOptions {
  readonly geojson?: string;
}

export interface RoleReportRow {
  readonly role: ColumnRole;
  readonly column: string | null;
}

export interface JoinReport {
  readonly binding: JoinKeyBinding;
  readonly features: number;
  readonly matched: number;
  readonly unmatchedKeys: readonly string[];
  readonly unmatchedFeatures: number;
}

export interface InspectReport {
  readonly rows: number;
  readonly schema: readonly string[];
  readonly roles: readonly RoleReportRow[];
  /** Absent without geometry, null when country_key or value is unresolved */
  readonly join?: JoinReport | null;
}

/**
 * Build the report without throwing on unresolved roles
 */
export function buildInspectReport(
  recordSet: TabularRecordSet,
  collection: GeometryCollection | undefined,
  config: Pick<MapweaveConfig, 'candidates' | 'idPriority' | 'join'>
): InspectReport {
  const resolver = new SchemaResolver(config.candidates);
  const overrides = {
    ...(config.join.countryField ? { country_key: config.join.countryField } : {}),
    ...(config.join.valueField ? { value: config.join.valueField } : {}),
  };
  const assignment = resolver.resolve(recordSet.schema, ALL_COLUMN_ROLES, overrides);
  const roles = ALL_COLUMN_ROLES.map((role) => ({
    role,
    column: assignment.columns[role] ?? null,
  }));

  const base = { rows: recordSet.records.length, schema: recordSet.schema, roles };
  if (collection === undefined) {
    return base;
  }

  const countryKey = assignment.columns.country_key;
  const value = assignment.columns.value;
  if (countryKey === undefined || value === undefined) {
    return { ...base, join: null };
  }

  const binding = bindKeyColumn(
    reconcileJoinKey(collection, {
      idProperty: config.join.geojsonIdField,
      idPriority: config.idPriority,
    }),
    countryKey
  );
  const evaluation = evaluateJoin(
    collection,
    binding,
    projectAggregate(recordSet, { country_key: countryKey, value }),
    { duplicateKeys: config.join.duplicateKeys }
  );

  return {
    ...base,
    join: {
      binding,
      features: collection.features.length,
      matched: evaluation.matchedKeys.length,
      unmatchedKeys: evaluation.unmatchedKeys,
      unmatchedFeatures: evaluation.unmatchedFeatures,
    },
  };
}

export function registerInspectCommand(parent: Command): void {
  parent
    .command('inspect <csv>')
    .description('Show resolved column roles and join key matching')
    .option('--geojson <file>', 'Geometry to test the join against')
    .action(async (csv: string, options: InspectOptions) => {
      process.exitCode = await executeInspect(csv, options);
    });
}

async function executeInspect(csv: string, options: InspectOptions): Promise<number> {
  const { config, logger } = getGlobalContext();

  const [recordSet, collection] = await Promise.all([
    readTabularFile(csv),
    options.geojson !== undefined ? loadGeometryCollection(options.geojson) : undefined,
  ]);
  const report = buildInspectReport(recordSet, collection, config);

  if (config.json) {
    console.log(JSON.stringify(report, null, 2));
    return EXIT_CODES.SUCCESS;
  }

  console.log(`\n${csv}: ${report.rows} rows, ${report.schema.length} columns\n`);
  logger.table(
    report.roles.map((row) => ({ role: row.role, column: row.column ?? '(unresolved)' })),
    ['role', 'column']
  );

  if (report.join === null) {
    console.log('\nJoin: country_key or value unresolved');
  } else if (report.join !== undefined) {
    const { binding, features, matched, unmatchedKeys, unmatchedFeatures } = report.join;
    console.log(`\nJoin: ${binding.mode} on ${binding.keyOn} (${binding.source})`);
    console.log(`  Features: ${features}`);
    console.log(`  Matched keys: ${matched}`);
    console.log(`  Features without value: ${unmatchedFeatures}`);
    if (unmatchedKeys.length > 0) {
      console.log(`  Unmatched keys: ${unmatchedKeys.join(', ')}`);
    }
  }

  return EXIT_CODES.SUCCESS;
}
