/**
 * Aggregate Projection
 *
 * Two-column (country_key, value) view of a record set, row order preserved.
 * Duplicate keys pass through untouched; folding them is the join
 * evaluator's job (see DuplicateKeyPolicy).
 */

import type { AggregateRow, TabularRecordSet } from '../core/types.js';

export interface AggregateColumns {
  readonly country_key: string;
  readonly value: string;
}

export function projectAggregate(
  recordSet: TabularRecordSet,
  columns: AggregateColumns
): readonly AggregateRow[] {
  return recordSet.records.map((record) => ({
    country_key: record[columns.country_key] ?? null,
    value: record[columns.value] ?? null,
  }));
}
