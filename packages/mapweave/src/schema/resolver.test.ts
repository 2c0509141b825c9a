/**
 * Tests for column role resolution
 */

import { describe, it, expect } from 'vitest';
import { SchemaResolutionError } from '../core/errors.js';
import { DEFAULT_ROLE_CANDIDATES, mergeCandidateTables } from './candidates.js';
import {
  findCandidateColumn,
  JOIN_REQUIRED_ROLES,
  requireRoles,
  resolveColumnRoles,
  SchemaResolver,
} from './resolver.js';

describe('resolveColumnRoles', () => {
  it('resolves a capitalised incident schema', () => {
    const assignment = resolveColumnRoles(['Latitude', 'Longitude', 'offense', 'report_id']);

    expect(assignment.columns).toEqual({
      latitude: 'Latitude',
      longitude: 'Longitude',
      category: 'offense',
    });
    expect(assignment.schema).toEqual(['Latitude', 'Longitude', 'offense', 'report_id']);
  });

  it('prefers the earliest candidate over schema order', () => {
    const assignment = resolveColumnRoles(['y', 'lat'], ['latitude']);
    expect(assignment.columns.latitude).toBe('lat');
  });

  it('skips a column already claimed by an earlier role', () => {
    const candidates = mergeCandidateTables(DEFAULT_ROLE_CANDIDATES, {
      latitude: { candidates: ['a', 'b'], match: 'exact' },
      longitude: { candidates: ['a', 'c'], match: 'exact' },
    });

    const assignment = resolveColumnRoles(['a', 'c'], ['latitude', 'longitude'], { candidates });

    expect(assignment.columns).toEqual({ latitude: 'a', longitude: 'c' });
  });

  it('matches country and value candidates case-insensitively', () => {
    const assignment = resolveColumnRoles(['COUNTRY', 'Count'], ['country_key', 'value']);
    expect(assignment.columns).toEqual({ country_key: 'COUNTRY', value: 'Count' });
  });

  it('matches coordinate candidates exactly', () => {
    const assignment = resolveColumnRoles(['LATITUDE', 'lon'], ['latitude', 'longitude']);
    expect(assignment.columns).toEqual({ longitude: 'lon' });
  });

  it('leaves every role unresolved for an empty schema', () => {
    expect(resolveColumnRoles([]).columns).toEqual({});
  });

  it('claims override columns before inference', () => {
    const assignment = resolveColumnRoles(['country', 'total'], ['country_key', 'value'], {
      overrides: { value: 'total' },
    });
    expect(assignment.columns).toEqual({ country_key: 'country', value: 'total' });
  });

  it('keeps inference away from an overridden column', () => {
    const assignment = resolveColumnRoles(['country', 'origin', 'value'], ['country_key', 'value'], {
      overrides: { value: 'country' },
    });
    expect(assignment.columns).toEqual({ country_key: 'origin', value: 'country' });
  });

  it('rejects an override naming a missing column', () => {
    expect(() =>
      resolveColumnRoles(['country', 'value'], ['country_key'], { overrides: { country_key: 'nation' } })
    ).toThrow(SchemaResolutionError);
  });
});

describe('findCandidateColumn', () => {
  it('returns the first unclaimed case-insensitive match in schema order', () => {
    const column = findCandidateColumn(
      ['Country', 'COUNTRY'],
      { candidates: ['country'], match: 'case-insensitive' },
      new Set(['Country'])
    );
    expect(column).toBe('COUNTRY');
  });
});

describe('requireRoles', () => {
  it('returns a total mapping when every role resolved', () => {
    const assignment = resolveColumnRoles(['iso3', 'num'], ['country_key', 'value']);
    expect(requireRoles(assignment, JOIN_REQUIRED_ROLES)).toEqual({ country_key: 'iso3', value: 'num' });
  });

  it('names every missing role and the columns present', () => {
    const assignment = resolveColumnRoles(['a', 'b'], ['latitude', 'longitude']);

    try {
      requireRoles(assignment, ['latitude', 'longitude']);
      expect.unreachable('requireRoles should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaResolutionError);
      if (error instanceof SchemaResolutionError) {
        expect(error.unresolvedRoles).toEqual(['latitude', 'longitude']);
        expect(error.message).toBe(
          'Could not resolve column role(s) latitude, longitude. Columns present: a, b'
        );
        expect(error.code).toBe('SCHEMA_RESOLUTION');
      }
    }
  });
});

describe('SchemaResolver', () => {
  it('resolves point roles with an optional category', () => {
    const { assignment, required } = new SchemaResolver().resolvePointRoles(['lat', 'lng']);
    expect(required).toEqual({ latitude: 'lat', longitude: 'lng' });
    expect(assignment.columns.category).toBeUndefined();
  });

  it('uses an injected candidate table', () => {
    const resolver = new SchemaResolver(
      mergeCandidateTables(DEFAULT_ROLE_CANDIDATES, {
        country_key: { candidates: ['nation'], match: 'case-insensitive' },
      })
    );
    const { required } = resolver.resolveJoinRoles(['Nation', 'value']);
    expect(required).toEqual({ country_key: 'Nation', value: 'value' });
  });

  it('throws when join roles are missing', () => {
    expect(() => new SchemaResolver().resolveJoinRoles(['region', 'total'])).toThrow(
      'Could not resolve column role(s) country_key, value. Columns present: region, total'
    );
  });
});
