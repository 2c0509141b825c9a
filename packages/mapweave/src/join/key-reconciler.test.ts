/**
 * Tests for join key reconciliation
 */

import { describe, it, expect } from 'vitest';
import type { GeometryCollection } from '../core/types.js';
import { bindKeyColumn, reconcileJoinKey } from './key-reconciler.js';

function collection(...properties: ({ [key: string]: unknown } | null)[]): GeometryCollection {
  return {
    type: 'FeatureCollection',
    features: properties.map((props) => ({ type: 'Feature', properties: props, geometry: null })),
  };
}

describe('reconcileJoinKey', () => {
  it('infers an identifier property from the priority list', () => {
    expect(reconcileJoinKey(collection({ ADM0_A3: 'DEU', name: 'Germany' }))).toEqual({
      mode: 'exact-id',
      property: 'ADM0_A3',
      keyOn: 'feature.properties.ADM0_A3',
      source: 'inferred',
    });
  });

  it('follows priority order rather than property order', () => {
    const binding = reconcileJoinKey(collection({ id: 5, iso_a3: 'DEU' }));
    expect(binding.property).toBe('iso_a3');
  });

  it('falls back to the display name without an identifier', () => {
    expect(reconcileJoinKey(collection({ pop: 83, name: 'Germany' }))).toEqual({
      mode: 'name-fallback',
      property: 'name',
      keyOn: 'feature.properties.name',
      source: 'fallback',
    });
  });

  it('uses a caller-supplied property without checking it', () => {
    expect(reconcileJoinKey(collection({ name: 'Germany' }), { idProperty: 'GID_0' })).toEqual({
      mode: 'exact-id',
      property: 'GID_0',
      keyOn: 'feature.properties.GID_0',
      source: 'caller',
    });
  });

  it('ignores an empty caller-supplied property', () => {
    const binding = reconcileJoinKey(collection({ iso3: 'DEU' }), { idProperty: '' });
    expect(binding.source).toBe('inferred');
  });

  it('inspects only the first feature', () => {
    const binding = reconcileJoinKey(collection({ name: 'Germany' }, { iso_a3: 'FRA' }));
    expect(binding.mode).toBe('name-fallback');
  });

  it('falls back for an empty collection or null properties', () => {
    expect(reconcileJoinKey(collection()).mode).toBe('name-fallback');
    expect(reconcileJoinKey(collection(null)).mode).toBe('name-fallback');
  });

  it('takes an alternate priority list and name property', () => {
    const features = collection({ GID_0: 'DEU', NAME_EN: 'Germany' });

    expect(reconcileJoinKey(features, { idPriority: ['GID_0'] }).keyOn).toBe(
      'feature.properties.GID_0'
    );
    expect(reconcileJoinKey(features, { idPriority: [], nameProperty: 'NAME_EN' }).keyOn).toBe(
      'feature.properties.NAME_EN'
    );
  });
});

describe('bindKeyColumn', () => {
  it('returns a new binding carrying the tabular key column', () => {
    const binding = reconcileJoinKey(collection({ iso3: 'DEU' }));
    const bound = bindKeyColumn(binding, 'country');

    expect(bound.keyColumn).toBe('country');
    expect(binding.keyColumn).toBeUndefined();
  });
});
