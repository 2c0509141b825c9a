/**
 * Mapweave Core Types
 *
 * Data model shared by the schema resolver, key reconciler, point sampler and
 * the two pipelines. Everything here is treated as immutable once constructed:
 * filtering or sampling a record set produces a new set.
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no loose casts.
 */

import type { Feature, FeatureCollection, Geometry, GeoJsonProperties } from 'geojson';

// ============================================================================
// Tabular Data
// ============================================================================

/**
 * Cell value after delimited-text conversion
 */
export type ScalarValue = number | string | null;

/**
 * One row, keyed by column name
 */
export type TabularRecord = Readonly<Record<string, ScalarValue>>;

/**
 * Ordered records sharing one schema
 *
 * The schema is the header row, in file order.
 */
export interface TabularRecordSet {
  readonly schema: readonly string[];
  readonly records: readonly TabularRecord[];
}

// ============================================================================
// Geometry
// ============================================================================

/**
 * Feature whose geometry payload the core never inspects
 */
export type GeometryFeature = Feature<Geometry | null, GeoJsonProperties>;

/**
 * Ordered, index-addressable features
 */
export type GeometryCollection = FeatureCollection<Geometry | null, GeoJsonProperties>;

// ============================================================================
// Column Roles
// ============================================================================

/**
 * Semantic purpose a column can serve
 */
export type ColumnRole = 'latitude' | 'longitude' | 'category' | 'country_key' | 'value';

export const ALL_COLUMN_ROLES: readonly ColumnRole[] = [
  'latitude',
  'longitude',
  'category',
  'country_key',
  'value',
] as const;

/**
 * How candidate names are compared with schema columns
 */
export type CandidateMatch = 'exact' | 'case-insensitive';

/**
 * Ordered candidates for a single role, most likely first
 */
export interface RoleCandidates {
  readonly candidates: readonly string[];
  readonly match: CandidateMatch;
}

/**
 * Candidate names per role
 */
export type RoleCandidateTable = Readonly<Record<ColumnRole, RoleCandidates>>;

/**
 * Resolved role → column mapping
 *
 * Unresolved roles are absent from `columns`.
 */
export interface ColumnRoleAssignment {
  readonly columns: Readonly<Partial<Record<ColumnRole, string>>>;
  readonly schema: readonly string[];
}

// ============================================================================
// Join
// ============================================================================

/**
 * exact-id: features addressed by an identifier property
 * name-fallback: features addressed by their display name, exact string match only
 */
export type JoinMode = 'exact-id' | 'name-fallback';

/**
 * Where the identifier property came from
 */
export type BindingSource = 'caller' | 'inferred' | 'fallback';

/**
 * Identifying property chosen for a geometry collection
 *
 * `keyOn` is the path the renderer uses verbatim to read the key from each feature.
 */
export interface JoinKeyBinding {
  readonly mode: JoinMode;
  readonly property: string;
  readonly keyOn: string;
  readonly source: BindingSource;
  /** Tabular column the binding is joined against, once known */
  readonly keyColumn?: string;
}

/**
 * What to do when tabular keys have no matching feature
 */
export type JoinStrictness = 'best-effort' | 'require-all-keys';

/**
 * How rows sharing a key fold into one feature value
 */
export type DuplicateKeyPolicy = 'last' | 'sum';

/**
 * Minimal two-column projection handed to the renderer
 */
export interface AggregateRow {
  readonly country_key: ScalarValue;
  readonly value: ScalarValue;
}

// ============================================================================
// Points
// ============================================================================

/**
 * Point ready for the clustering collaborator
 */
export interface RenderablePoint {
  readonly lat: number;
  readonly lon: number;
  readonly label?: string;
}

/**
 * Map centre as [lat, lon]
 */
export type LatLon = readonly [number, number];

/**
 * Output of the point sampling policy
 */
export interface PointPlot {
  readonly points: readonly RenderablePoint[];
  readonly center: LatLon;
  /** Records dropped for a null or missing coordinate */
  readonly droppedCount: number;
  /** True when the cap triggered sampling */
  readonly sampled: boolean;
}
