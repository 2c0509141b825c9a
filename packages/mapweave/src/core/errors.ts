/**
 * Mapweave Error Types
 *
 * Each error is fatal to the pipeline that raised it and to nothing else.
 * `code` and `details` feed structured logging at the pipeline boundary.
 *
 * These are deterministic data-shape problems; none of them is retried.
 */

import type { ColumnRole } from './types.js';

export type MapweaveErrorCode =
  | 'SCHEMA_RESOLUTION'
  | 'EMPTY_DATASET'
  | 'MALFORMED_GEOMETRY'
  | 'COORDINATE_PARSE'
  | 'JOIN_MISMATCH'
  | 'TABULAR_READ';

/**
 * Base class for all mapweave failures
 */
export abstract class MapweaveError extends Error {
  abstract readonly code: MapweaveErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Structured fields for log metadata
   */
  abstract get details(): Record<string, unknown>;
}

/**
 * Required role(s) could not be resolved from the schema
 *
 * RECOVERY:
 * - Rename the column, or
 * - Pass an explicit override (--country-field / --value-field), or
 * - Extend the candidate table in .mapweaverc
 */
export class SchemaResolutionError extends MapweaveError {
  readonly code = 'SCHEMA_RESOLUTION';

  /**
   * @param unresolvedRoles - Required roles left without a column
   * @param schema - Columns actually present
   * @param reason - Extra context, e.g. an override naming a missing column
   */
  constructor(
    public readonly unresolvedRoles: readonly ColumnRole[],
    public readonly schema: readonly string[],
    reason?: string
  ) {
    super(
      `Could not resolve column role(s) ${unresolvedRoles.join(', ')}` +
        `${reason ? ` (${reason})` : ''}. ` +
        `Columns present: ${schema.length > 0 ? schema.join(', ') : '(none)'}`
    );
  }

  get details(): Record<string, unknown> {
    return { unresolvedRoles: this.unresolvedRoles, schema: this.schema };
  }
}

/**
 * Nothing left to center on or plot after filtering
 */
export class EmptyDatasetError extends MapweaveError {
  readonly code = 'EMPTY_DATASET';

  constructor(
    public readonly totalRecords: number,
    public readonly columns: readonly string[]
  ) {
    super(
      `No records left after dropping rows with missing ${columns.join('/')} ` +
        `(${totalRecords} read)`
    );
  }

  get details(): Record<string, unknown> {
    return { totalRecords: this.totalRecords, columns: this.columns };
  }
}

/**
 * Geometry document does not have the expected feature list
 */
export class MalformedGeometryError extends MapweaveError {
  readonly code = 'MALFORMED_GEOMETRY';

  constructor(
    message: string,
    public readonly path: string,
    public readonly source?: string
  ) {
    super(source ? `${message} in ${source}` : message);
  }

  get details(): Record<string, unknown> {
    return { path: this.path, ...(this.source ? { source: this.source } : {}) };
  }
}

/**
 * Retained record has a coordinate that is present but not numeric
 */
export class CoordinateParseError extends MapweaveError {
  readonly code = 'COORDINATE_PARSE';

  constructor(
    public readonly column: string,
    public readonly rowIndex: number,
    public readonly rawValue: string
  ) {
    super(`Column '${column}' row ${rowIndex}: '${rawValue}' is not a number`);
  }

  get details(): Record<string, unknown> {
    return { column: this.column, rowIndex: this.rowIndex, rawValue: this.rawValue };
  }
}

/**
 * Strict join requested and some tabular keys matched no feature
 */
export class JoinMismatchError extends MapweaveError {
  readonly code = 'JOIN_MISMATCH';

  constructor(
    public readonly unmatchedKeys: readonly string[],
    public readonly keyOn: string
  ) {
    const shown = unmatchedKeys.slice(0, 10);
    const more = unmatchedKeys.length > shown.length ? ` and ${unmatchedKeys.length - shown.length} more` : '';
    super(
      `${unmatchedKeys.length} key(s) matched no feature on ${keyOn}: ${shown.join(', ')}${more}`
    );
  }

  get details(): Record<string, unknown> {
    return { unmatchedCount: this.unmatchedKeys.length, keyOn: this.keyOn };
  }
}

/**
 * Delimited file could not be read as a table
 */
export class TabularReadError extends MapweaveError {
  readonly code = 'TABULAR_READ';

  constructor(
    message: string,
    public readonly source?: string
  ) {
    super(source ? `${message}: ${source}` : message);
  }

  get details(): Record<string, unknown> {
    return this.source ? { source: this.source } : {};
  }
}

/**
 * Narrow an unknown thrown value to a mapweave error
 */
export function isMapweaveError(error: unknown): error is MapweaveError {
  return error instanceof MapweaveError;
}
