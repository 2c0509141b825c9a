/**
 * CLI Command Tests
 *
 * Covers the pieces commands are built from: the inspect report, pipeline
 * jobs writing documents to disk, and exit-code mapping.
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, readdir, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { buildInspectReport } from '../../cli/commands/inspect.js';
import { DEFAULT_CONFIG, type MapweaveConfig } from '../../cli/lib/config.js';
import { exitCodeFor, parseInteger, parsePositiveInt } from '../../cli/lib/context.js';
import { createJoinJob, createPointJob, outputPath, withJoinFlags } from '../../cli/lib/jobs.js';
import { atomicWriteJSON } from '../../core/utils/atomic-write.js';
import { silentLogger } from '../../core/utils/logger.js';
import { loadGeometryCollection } from '../../geometry/loader.js';
import { parseDelimited } from '../../tabular/reader.js';

const fixture = (name: string): string =>
  fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

const config: MapweaveConfig = { ...DEFAULT_CONFIG, verbose: false, json: false, configPath: null };

describe('buildInspectReport', () => {
  it('lists every role with its column or null', () => {
    const report = buildInspectReport(parseDelimited('Country,Immigrants\nDEU,1'), undefined, config);

    expect(report.rows).toBe(1);
    expect(report.roles).toEqual([
      { role: 'latitude', column: null },
      { role: 'longitude', column: null },
      { role: 'category', column: null },
      { role: 'country_key', column: 'Country' },
      { role: 'value', column: 'Immigrants' },
    ]);
    expect(report.join).toBeUndefined();
  });

  it('reports join matching against geometry', async () => {
    const countries = await loadGeometryCollection(fixture('countries.geojson'));
    const report = buildInspectReport(
      parseDelimited('Country,Immigrants\nDEU,120\nXKX,5'),
      countries,
      config
    );

    expect(report.join).toEqual({
      binding: {
        mode: 'exact-id',
        property: 'ADM0_A3',
        keyOn: 'feature.properties.ADM0_A3',
        source: 'inferred',
        keyColumn: 'Country',
      },
      features: 3,
      matched: 1,
      unmatchedKeys: ['XKX'],
      unmatchedFeatures: 2,
    });
  });

  it('reports a null join when aggregate roles are unresolved', async () => {
    const countries = await loadGeometryCollection(fixture('countries.geojson'));
    const report = buildInspectReport(parseDelimited('lat,lon\n1,2'), countries, config);

    expect(report.join).toBeNull();
  });
});

describe('pipeline jobs', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'mapweave-jobs-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the point map document', async () => {
    const outPath = join(dir, 'out', 'point_map.json');
    const result = await createPointJob(fixture('incidents.csv'), outPath, config, silentLogger)();

    const written: unknown = JSON.parse(await readFile(outPath, 'utf-8'));
    expect(written).toMatchObject({ kind: 'point-cluster', view: { center: [41.88, -87.63] } });
    expect(result.plot.points).toHaveLength(3);
  });

  it('writes the choropleth document', async () => {
    const outPath = join(dir, 'choropleth_map.json');
    await createJoinJob(
      fixture('aggregates.csv'),
      fixture('countries.geojson'),
      outPath,
      config,
      silentLogger
    )();

    const written: unknown = JSON.parse(await readFile(outPath, 'utf-8'));
    expect(written).toMatchObject({
      kind: 'choropleth',
      keyOn: 'feature.properties.ADM0_A3',
      legend: { domain: [80, 120] },
    });
  });

  it('puts default file names inside the out-dir', () => {
    expect(outputPath({ ...config, paths: { outDir: dir } }, 'point_map.json')).toBe(
      join(dir, 'point_map.json')
    );
    expect(outputPath(config, 'point_map.json', join(dir, 'custom.json'))).toBe(
      join(dir, 'custom.json')
    );
  });
});

describe('withJoinFlags', () => {
  it('lays command-line join flags over the config', () => {
    const flagged = withJoinFlags(
      { ...config, join: { ...config.join, countryField: 'origin', valueField: 'count' } },
      { geojsonIdField: 'ISO_N3', valueField: 'total', strict: true }
    );

    expect(flagged.join).toMatchObject({
      geojsonIdField: 'ISO_N3',
      countryField: 'origin',
      valueField: 'total',
      strictness: 'require-all-keys',
    });
  });

  it('keeps the config when no flag is given', () => {
    expect(withJoinFlags(config, {}).join).toEqual(config.join);
  });
});

describe('atomicWriteJSON', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'mapweave-write-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('creates parent directories and leaves no temp file', async () => {
    const target = join(dir, 'a', 'b', 'doc.json');
    await atomicWriteJSON(target, { kind: 'choropleth' });

    expect(await readFile(target, 'utf-8')).toBe('{\n  "kind": "choropleth"\n}');
    expect(await readdir(join(dir, 'a', 'b'))).toEqual(['doc.json']);
  });
});

describe('exit codes and option parsing', () => {
  it('maps failures to exit codes', () => {
    expect(exitCodeFor(0, 2)).toBe(0);
    expect(exitCodeFor(1, 2)).toBe(1);
    expect(exitCodeFor(2, 2)).toBe(2);
    expect(exitCodeFor(1, 1)).toBe(2);
  });

  it('parses integer options', () => {
    expect(parsePositiveInt('--max-points', '25')).toBe(25);
    expect(() => parsePositiveInt('--max-points', '0')).toThrow(
      '--max-points must be a positive integer, got "0"'
    );
    expect(parseInteger('--seed', '-3')).toBe(-3);
    expect(() => parseInteger('--seed', '1.5')).toThrow('--seed must be an integer, got "1.5"');
  });
});
