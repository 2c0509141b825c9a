/**
 * Default Candidate Tables
 *
 * Ordered column-name candidates per role and the identifier-property priority
 * used by the key reconciler. Callers inject replacements through resolver and
 * reconciler options; these constants are frozen and never mutated.
 */

import type { ColumnRole, RoleCandidateTable, RoleCandidates } from '../core/types.js';

const roleCandidates: RoleCandidateTable = {
  latitude: {
    candidates: ['lat', 'latitude', 'y', 'y_coord', 'ycoord', 'Latitude', 'LAT'],
    match: 'exact',
  },
  longitude: {
    candidates: ['lon', 'lng', 'longitude', 'x', 'x_coord', 'xcoord', 'Longitude', 'LON'],
    match: 'exact',
  },
  category: {
    candidates: ['category', 'Category', 'crime_type', 'offense'],
    match: 'exact',
  },
  country_key: {
    candidates: ['country', 'country_name', 'origin', 'iso_a3', 'iso3', 'iso'],
    match: 'case-insensitive',
  },
  value: {
    candidates: ['value', 'count', 'immigrants', 'migration', 'num'],
    match: 'case-insensitive',
  },
};

export const DEFAULT_ROLE_CANDIDATES: RoleCandidateTable = Object.freeze(roleCandidates);

/**
 * ISO-3 spellings first, generic `id` last
 */
export const DEFAULT_ID_PRIORITY: readonly string[] = Object.freeze([
  'iso_a3',
  'ISO_A3',
  'iso3',
  'ISO3',
  'ADM0_A3',
  'adm0_a3',
  'id',
]);

/** Display-name property used by name-fallback joins */
export const DEFAULT_NAME_PROPERTY = 'name';

/**
 * Overlay per-role replacements onto a base table
 *
 * Roles not present in `overrides` keep the base entry.
 */
export function mergeCandidateTables(
  base: RoleCandidateTable,
  overrides: Readonly<Partial<Record<ColumnRole, RoleCandidates>>>
): RoleCandidateTable {
  return Object.freeze({
    latitude: overrides.latitude ?? base.latitude,
    longitude: overrides.longitude ?? base.longitude,
    category: overrides.category ?? base.category,
    country_key: overrides.country_key ?? base.country_key,
    value: overrides.value ?? base.value,
  });
}
