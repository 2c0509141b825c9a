/**
 * CLI Configuration Tests
 *
 * Config files are written to a temporary directory and always passed
 * explicitly, so no .mapweaverc above the working directory leaks in.
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  DEFAULT_CONFIG,
  loadConfig,
  parseConfigFile,
  resolveOutDir,
  validateConfig,
} from '../../cli/lib/config.js';
import { DEFAULT_ROLE_CANDIDATES } from '../../schema/candidates.js';

const CONFIG_YAML = `
version: 1
points:
  max_points: 500
  seed: 7
join:
  strictness: require-all-keys
  duplicate_keys: sum
roles:
  country_key:
    candidates: [nation]
    match: case-insensitive
id_priority: [GID_0]
paths:
  out_dir: maps
`;

const ENV_NAMES = [
  'CONFIG',
  'MAX_POINTS',
  'SEED',
  'STRICTNESS',
  'GEOJSON_ID_FIELD',
  'COUNTRY_FIELD',
  'VALUE_FIELD',
  'OUT_DIR',
  'VERBOSE',
  'JSON',
];

describe('parseConfigFile', () => {
  it('parses YAML into the file schema', () => {
    const parsed = parseConfigFile(CONFIG_YAML, '.mapweaverc');

    expect(parsed.points).toEqual({ max_points: 500, seed: 7 });
    expect(parsed.roles?.country_key).toEqual({ candidates: ['nation'], match: 'case-insensitive' });
    expect(parsed.id_priority).toEqual(['GID_0']);
  });

  it('defaults candidate matching to exact', () => {
    const parsed = parseConfigFile('roles:\n  latitude:\n    candidates: [breite]\n', 'cfg');
    expect(parsed.roles?.latitude).toEqual({ candidates: ['breite'], match: 'exact' });
  });

  it('treats an empty file as no settings', () => {
    expect(parseConfigFile('', 'cfg')).toEqual({});
  });

  it('names the invalid key', () => {
    expect(() => parseConfigFile('join:\n  strictness: sometimes\n', 'cfg.yaml')).toThrow(
      /^Invalid config cfg\.yaml at join\.strictness: /
    );
  });
});

describe('loadConfig', () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    for (const name of ENV_NAMES) {
      vi.stubEnv(`MAPWEAVE_${name}`, '');
    }
    dir = await mkdtemp(join(tmpdir(), 'mapweave-config-'));
    configPath = join(dir, '.mapweaverc');
    await writeFile(configPath, CONFIG_YAML, 'utf-8');
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(dir, { recursive: true, force: true });
  });

  it('merges the file over the defaults', async () => {
    const config = await loadConfig({ configPath });

    expect(config.configPath).toBe(configPath);
    expect(config.points.maxPoints).toBe(500);
    expect(config.points.seed).toBe(7);
    expect(config.points.tiles).toBe('CartoDB dark_matter');
    expect(config.join.strictness).toBe('require-all-keys');
    expect(config.join.duplicateKeys).toBe('sum');
    expect(config.candidates.country_key).toEqual({ candidates: ['nation'], match: 'case-insensitive' });
    expect(config.candidates.latitude).toEqual(DEFAULT_ROLE_CANDIDATES.latitude);
    expect(config.idPriority).toEqual(['GID_0']);
    expect(config.verbose).toBe(false);
  });

  it('lets environment variables override the file', async () => {
    vi.stubEnv('MAPWEAVE_SEED', '42');
    vi.stubEnv('MAPWEAVE_STRICTNESS', 'best-effort');

    const config = await loadConfig({ configPath });

    expect(config.points.seed).toBe(42);
    expect(config.join.strictness).toBe('best-effort');
  });

  it('lets command-line options override the environment', async () => {
    vi.stubEnv('MAPWEAVE_MAX_POINTS', '300');

    const config = await loadConfig({ configPath, overrides: { maxPoints: 10, json: true } });

    expect(config.points.maxPoints).toBe(10);
    expect(config.json).toBe(true);
  });

  it('rejects an unknown strictness in the environment', async () => {
    vi.stubEnv('MAPWEAVE_STRICTNESS', 'lenient');
    await expect(loadConfig({ configPath })).rejects.toThrow(
      'Invalid MAPWEAVE_STRICTNESS: lenient. Must be one of: best-effort, require-all-keys'
    );
  });

  it('fails for a missing explicit config file', async () => {
    await expect(loadConfig({ configPath: join(dir, 'absent.yaml') })).rejects.toThrow(
      `Config file not found: ${join(dir, 'absent.yaml')}`
    );
  });

  it('resolves the out-dir beside the config file', async () => {
    const config = await loadConfig({ configPath });
    expect(resolveOutDir(config)).toBe(join(dir, 'maps'));
  });
});

describe('validateConfig', () => {
  const base = { ...DEFAULT_CONFIG, verbose: false, json: false, configPath: null };

  it('accepts the defaults', () => {
    expect(() => validateConfig(base)).not.toThrow();
  });

  it('rejects an unsupported version', () => {
    expect(() => validateConfig({ ...base, version: 2 })).toThrow(
      'Unsupported config version: 2. Expected 1.'
    );
  });

  it('rejects a cap below one or a fractional seed', () => {
    expect(() => validateConfig({ ...base, points: { ...base.points, maxPoints: 0 } })).toThrow(
      'max_points must be a positive integer, got 0'
    );
    expect(() => validateConfig({ ...base, points: { ...base.points, seed: 1.5 } })).toThrow(
      'seed must be an integer, got 1.5'
    );
  });
});
