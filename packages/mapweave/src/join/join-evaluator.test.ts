/**
 * Tests for projection, duplicate folding and join evaluation
 */

import { describe, it, expect } from 'vitest';
import { JoinMismatchError } from '../core/errors.js';
import type { GeometryCollection, JoinKeyBinding } from '../core/types.js';
import { evaluateJoin, foldAggregateRows, toNumericValue } from './join-evaluator.js';
import { locatorProperty, readLocator } from './locator.js';
import { projectAggregate } from './projection.js';

const byName: JoinKeyBinding = {
  mode: 'name-fallback',
  property: 'name',
  keyOn: 'feature.properties.name',
  source: 'fallback',
};

function named(...names: (string | number)[]): GeometryCollection {
  return {
    type: 'FeatureCollection',
    features: names.map((name) => ({ type: 'Feature', properties: { name }, geometry: null })),
  };
}

describe('projectAggregate', () => {
  it('keeps row order and duplicate keys', () => {
    const rows = projectAggregate(
      {
        schema: ['origin', 'num', 'note'],
        records: [
          { origin: 'DEU', num: 1, note: 'x' },
          { origin: 'FRA', num: null, note: 'y' },
          { origin: 'DEU', num: 3, note: 'z' },
        ],
      },
      { country_key: 'origin', value: 'num' }
    );

    expect(rows).toEqual([
      { country_key: 'DEU', value: 1 },
      { country_key: 'FRA', value: null },
      { country_key: 'DEU', value: 3 },
    ]);
  });
});

describe('toNumericValue', () => {
  it('parses numbers and numeric text only', () => {
    expect(toNumericValue(4)).toBe(4);
    expect(toNumericValue('12')).toBe(12);
    expect(toNumericValue(' ')).toBeUndefined();
    expect(toNumericValue('many')).toBeUndefined();
    expect(toNumericValue(null)).toBeUndefined();
    expect(toNumericValue(Number.POSITIVE_INFINITY)).toBeUndefined();
    expect(toNumericValue('0x10')).toBeUndefined();
    expect(toNumericValue('1,200')).toBeUndefined();
  });
});

describe('foldAggregateRows', () => {
  const rows = [
    { country_key: 'DEU', value: 1 },
    { country_key: null, value: 7 },
    { country_key: 'DEU', value: 2 },
    { country_key: 'FRA', value: 'n/a' },
  ];

  it('keeps the last value for a repeated key by default', () => {
    const { valuesByKey, nonNumericRows, keylessRows } = foldAggregateRows(rows);
    expect([...valuesByKey]).toEqual([['DEU', 2]]);
    expect(nonNumericRows).toBe(1);
    expect(keylessRows).toBe(1);
  });

  it('sums repeated keys under the sum policy', () => {
    expect(foldAggregateRows(rows, 'sum').valuesByKey.get('DEU')).toBe(3);
  });
});

describe('evaluateJoin', () => {
  it('matches tabular keys to feature names verbatim', () => {
    const evaluation = evaluateJoin(named('Germany', 'France'), byName, [
      { country_key: 'Germany', value: 10 },
      { country_key: 'Atlantis', value: 3 },
      { country_key: 'france', value: 4 },
    ]);

    expect(evaluation.matchedKeys).toEqual(['Germany']);
    expect(evaluation.unmatchedKeys).toEqual(['Atlantis', 'france']);
    expect(evaluation.unmatchedFeatures).toBe(1);
    expect(evaluation.nonNumericRows).toBe(0);
    expect(evaluation.keylessRows).toBe(0);
  });

  it('compares numeric keys through their string form', () => {
    const evaluation = evaluateJoin(named(276), byName, [{ country_key: 276, value: 1 }]);
    expect(evaluation.matchedKeys).toEqual(['276']);
  });

  it('throws under require-all-keys when a key is unmatched', () => {
    expect(() =>
      evaluateJoin(named('Germany'), byName, [{ country_key: 'Atlantis', value: 3 }], {
        strictness: 'require-all-keys',
      })
    ).toThrow('1 key(s) matched no feature on feature.properties.name: Atlantis');
  });

  it('passes under require-all-keys when every key matches', () => {
    const evaluation = evaluateJoin(
      named('Germany', 'France'),
      byName,
      [{ country_key: 'Germany', value: 3 }],
      { strictness: 'require-all-keys' }
    );
    expect(evaluation.unmatchedKeys).toEqual([]);
  });
});

describe('JoinMismatchError', () => {
  it('lists the first ten keys and counts the rest', () => {
    const keys = Array.from({ length: 12 }, (_, i) => `K${i}`);
    const error = new JoinMismatchError(keys, 'feature.properties.iso3');

    expect(error.message).toBe(
      '12 key(s) matched no feature on feature.properties.iso3: ' +
        'K0, K1, K2, K3, K4, K5, K6, K7, K8, K9 and 2 more'
    );
    expect(error.details).toEqual({ unmatchedCount: 12, keyOn: 'feature.properties.iso3' });
  });
});

describe('locators', () => {
  it('reads scalar properties as strings', () => {
    const [feature] = named(42).features;
    expect(feature && readLocator(feature, 'feature.properties.name')).toBe('42');
  });

  it('rejects locators outside feature.properties', () => {
    expect(() => locatorProperty('feature.id')).toThrow("Unsupported key_on locator: 'feature.id'");
    expect(() => locatorProperty('feature.properties.')).toThrow(
      "Unsupported key_on locator: 'feature.properties.'"
    );
  });
});
