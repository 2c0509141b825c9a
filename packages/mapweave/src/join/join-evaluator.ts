/**
 * Join Evaluation
 *
 * Folds the aggregate projection into per-key values and measures how well the
 * keys line up with the features addressed by a binding. Under the default
 * best-effort strictness mismatches are only reported; `require-all-keys`
 * turns any unmatched tabular key into a JoinMismatchError.
 */

import { JoinMismatchError } from '../core/errors.js';
import type {
  AggregateRow,
  DuplicateKeyPolicy,
  GeometryCollection,
  JoinKeyBinding,
  JoinStrictness,
  ScalarValue,
} from '../core/types.js';
import { parseNumericText } from '../core/utils/numeric.js';
import { keyString, readLocator } from './locator.js';

export interface JoinEvaluationOptions {
  /** Default: 'best-effort' */
  readonly strictness?: JoinStrictness;
  /** Default: 'last' */
  readonly duplicateKeys?: DuplicateKeyPolicy;
}

export interface JoinEvaluation {
  /** Numeric value per tabular key, after duplicate folding */
  readonly valuesByKey: ReadonlyMap<string, number>;
  /** Tabular keys that address at least one feature */
  readonly matchedKeys: readonly string[];
  /** Tabular keys that address no feature */
  readonly unmatchedKeys: readonly string[];
  /** Features that received no value */
  readonly unmatchedFeatures: number;
  /** Keyed rows skipped for a null or non-numeric value */
  readonly nonNumericRows: number;
  /** Rows skipped for a null key */
  readonly keylessRows: number;
}

/**
 * Parse an aggregate value; numeric strings count, anything else does not
 */
export function toNumericValue(value: ScalarValue): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  return typeof value === 'string' ? parseNumericText(value) : undefined;
}

/**
 * Fold rows into a key → value map under a duplicate-key policy
 */
export function foldAggregateRows(
  rows: readonly AggregateRow[],
  policy: DuplicateKeyPolicy = 'last'
): {
  readonly valuesByKey: Map<string, number>;
  readonly nonNumericRows: number;
  readonly keylessRows: number;
} {
  const valuesByKey = new Map<string, number>();
  let nonNumericRows = 0;
  let keylessRows = 0;

  for (const row of rows) {
    const key = keyString(row.country_key);
    if (key === undefined) {
      keylessRows++;
      continue;
    }
    const value = toNumericValue(row.value);
    if (value === undefined) {
      nonNumericRows++;
      continue;
    }

    const previous = valuesByKey.get(key);
    valuesByKey.set(key, policy === 'sum' && previous !== undefined ? previous + value : value);
  }

  return { valuesByKey, nonNumericRows, keylessRows };
}

/**
 * Evaluate a join between aggregate rows and a geometry collection
 *
 * @throws JoinMismatchError under 'require-all-keys' when any key is unmatched
 */
export function evaluateJoin(
  collection: GeometryCollection,
  binding: JoinKeyBinding,
  rows: readonly AggregateRow[],
  options: JoinEvaluationOptions = {}
): JoinEvaluation {
  const { valuesByKey, nonNumericRows, keylessRows } = foldAggregateRows(
    rows,
    options.duplicateKeys
  );

  const featureKeys = new Set<string>();
  let unmatchedFeatures = 0;
  for (const feature of collection.features) {
    const key = readLocator(feature, binding.keyOn);
    if (key !== undefined) featureKeys.add(key);
    if (key === undefined || !valuesByKey.has(key)) unmatchedFeatures++;
  }

  const matchedKeys: string[] = [];
  const unmatchedKeys: string[] = [];
  for (const key of valuesByKey.keys()) {
    (featureKeys.has(key) ? matchedKeys : unmatchedKeys).push(key);
  }

  if (options.strictness === 'require-all-keys' && unmatchedKeys.length > 0) {
    throw new JoinMismatchError(unmatchedKeys, binding.keyOn);
  }

  return {
    valuesByKey,
    matchedKeys,
    unmatchedKeys,
    unmatchedFeatures,
    nonNumericRows,
    keylessRows,
  };
}
