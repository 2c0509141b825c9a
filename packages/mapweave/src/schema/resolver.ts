/**
 * Schema Resolver
 *
 * Infers which columns of a record set play which semantic role by scanning
 * ordered candidate lists against the schema.
 *
 * RULES:
 * - Roles resolve in the order requested; candidates scan most-likely-first
 * - First candidate present in the schema wins
 * - A column claimed by an earlier role is skipped, the scan continues
 * - No match leaves the role unresolved (absent from the assignment)
 * - Overrides bypass inference and are claimed before any candidate scan
 *
 * Pure: depends only on the schema and the injected candidate table.
 */

import { SchemaResolutionError } from '../core/errors.js';
import {
  ALL_COLUMN_ROLES,
  type ColumnRole,
  type ColumnRoleAssignment,
  type RoleCandidateTable,
  type RoleCandidates,
} from '../core/types.js';
import { DEFAULT_ROLE_CANDIDATES } from './candidates.js';

/**
 * Roles each pipeline cannot run without
 */
export const POINT_REQUIRED_ROLES = ['latitude', 'longitude'] as const;
export const JOIN_REQUIRED_ROLES = ['country_key', 'value'] as const;

export interface ResolveOptions {
  /** Candidate table (default: DEFAULT_ROLE_CANDIDATES) */
  readonly candidates?: RoleCandidateTable;
  /** Explicit role → column choices that skip inference */
  readonly overrides?: Readonly<Partial<Record<ColumnRole, string>>>;
}

/**
 * Find the first unclaimed schema column matching a role's candidates
 */
export function findCandidateColumn(
  schema: readonly string[],
  entry: RoleCandidates,
  claimed: ReadonlySet<string>
): string | undefined {
  for (const candidate of entry.candidates) {
    if (entry.match === 'exact') {
      if (schema.includes(candidate) && !claimed.has(candidate)) {
        return candidate;
      }
      continue;
    }

    const folded = candidate.toLowerCase();
    const column = schema.find((c) => c.toLowerCase() === folded && !claimed.has(c));
    if (column !== undefined) {
      return column;
    }
  }
  return undefined;
}

/**
 * Resolve column roles for a schema
 *
 * @param schema - Column names in header order
 * @param roles - Roles to resolve, in resolution order
 * @throws SchemaResolutionError when an override names a column not in the schema
 */
export function resolveColumnRoles(
  schema: readonly string[],
  roles: readonly ColumnRole[] = ALL_COLUMN_ROLES,
  options: ResolveOptions = {}
): ColumnRoleAssignment {
  const table = options.candidates ?? DEFAULT_ROLE_CANDIDATES;
  const overrides = options.overrides ?? {};
  const columns: Partial<Record<ColumnRole, string>> = {};
  const claimed = new Set<string>();

  // Overrides first so inference never steals their columns
  for (const role of roles) {
    const column = overrides[role];
    if (column === undefined) continue;
    if (!schema.includes(column)) {
      throw new SchemaResolutionError([role], schema, `override '${column}' is not a column`);
    }
    columns[role] = column;
    claimed.add(column);
  }

  for (const role of roles) {
    if (columns[role] !== undefined) continue;
    const column = findCandidateColumn(schema, table[role], claimed);
    if (column !== undefined) {
      columns[role] = column;
      claimed.add(column);
    }
  }

  return { columns, schema };
}

/**
 * Assert required roles are resolved and return them as a total mapping
 *
 * @throws SchemaResolutionError naming every unresolved required role
 */
export function requireRoles<R extends ColumnRole>(
  assignment: ColumnRoleAssignment,
  required: readonly R[]
): Record<R, string> {
  const resolved: Partial<Record<R, string>> = {};
  const missing: R[] = [];

  for (const role of required) {
    const column = assignment.columns[role];
    if (column === undefined) {
      missing.push(role);
    } else {
      resolved[role] = column;
    }
  }

  if (missing.length > 0 || !isComplete(resolved, required)) {
    throw new SchemaResolutionError(missing, assignment.schema);
  }
  return resolved;
}

function isComplete<R extends ColumnRole>(
  resolved: Partial<Record<R, string>>,
  required: readonly R[]
): resolved is Record<R, string> {
  return required.every((role) => resolved[role] !== undefined);
}

/**
 * Resolver bound to one candidate table
 *
 * Lets tests and config supply alternate priority lists without touching
 * module state.
 */
export class SchemaResolver {
  constructor(private readonly candidates: RoleCandidateTable = DEFAULT_ROLE_CANDIDATES) {}

  resolve(
    schema: readonly string[],
    roles: readonly ColumnRole[] = ALL_COLUMN_ROLES,
    overrides?: Readonly<Partial<Record<ColumnRole, string>>>
  ): ColumnRoleAssignment {
    return resolveColumnRoles(schema, roles, { candidates: this.candidates, overrides });
  }

  /**
   * Resolve the point-pipeline roles (latitude, longitude, category)
   */
  resolvePointRoles(schema: readonly string[]): {
    readonly assignment: ColumnRoleAssignment;
    readonly required: Record<'latitude' | 'longitude', string>;
  } {
    const assignment = this.resolve(schema, ['latitude', 'longitude', 'category']);
    return { assignment, required: requireRoles(assignment, POINT_REQUIRED_ROLES) };
  }

  /**
   * Resolve the join-pipeline roles (country_key, value)
   */
  resolveJoinRoles(
    schema: readonly string[],
    overrides?: Readonly<Partial<Record<ColumnRole, string>>>
  ): {
    readonly assignment: ColumnRoleAssignment;
    readonly required: Record<'country_key' | 'value', string>;
  } {
    const assignment = this.resolve(schema, ['country_key', 'value'], overrides);
    return { assignment, required: requireRoles(assignment, JOIN_REQUIRED_ROLES) };
  }
}
