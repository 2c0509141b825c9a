/**
 * Mapweave CLI Configuration Management
 *
 * Loads configuration from .mapweaverc (YAML) with environment variable
 * overrides and defaults. The candidate tables used by the schema resolver and
 * key reconciler are part of this configuration, so alternate priority lists
 * are injected rather than patched into module state.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (MAPWEAVE_*)
 * 3. Config file (.mapweaverc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type {
  ColumnRole,
  DuplicateKeyPolicy,
  JoinStrictness,
  RoleCandidateTable,
  RoleCandidates,
} from '../../core/types.js';
import { DEFAULT_MAX_POINTS, DEFAULT_SAMPLE_SEED } from '../../points/sampling.js';
import {
  DEFAULT_ID_PRIORITY,
  DEFAULT_ROLE_CANDIDATES,
  mergeCandidateTables,
} from '../../schema/candidates.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface PointsConfig {
  readonly maxPoints: number;
  readonly seed: number;
  readonly zoom: number;
  readonly tiles: string;
  readonly disableClusteringAtZoom: number;
  readonly layerName: string;
}

export interface JoinConfig {
  readonly geojsonIdField?: string;
  readonly countryField?: string;
  readonly valueField?: string;
  readonly strictness: JoinStrictness;
  readonly duplicateKeys: DuplicateKeyPolicy;
  readonly legendName: string;
  readonly tiles: string;
}

export interface PathsConfig {
  /** Directory generated map documents are written to */
  readonly outDir: string;
}

/**
 * Full CLI configuration
 */
export interface MapweaveConfig {
  readonly version: number;
  readonly points: PointsConfig;
  readonly join: JoinConfig;
  /** Role candidate table after config-file overrides */
  readonly candidates: RoleCandidateTable;
  /** Identifier property priority for the key reconciler */
  readonly idPriority: readonly string[];
  readonly paths: PathsConfig;

  // Runtime flags
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

// ============================================================================
// Config File Schema
// ============================================================================

const StrictnessSchema = z.enum(['best-effort', 'require-all-keys']);
const DuplicateKeysSchema = z.enum(['last', 'sum']);

const RoleCandidatesSchema = z.object({
  candidates: z.array(z.string().min(1)).min(1),
  match: z.enum(['exact', 'case-insensitive']).default('exact'),
});

const ConfigFileSchema = z.object({
  version: z.number().int().optional(),
  points: z
    .object({
      max_points: z.number(),
      seed: z.number(),
      zoom: z.number(),
      tiles: z.string(),
      disable_clustering_at_zoom: z.number(),
      layer_name: z.string(),
    })
    .partial()
    .optional(),
  join: z
    .object({
      geojson_id_field: z.string(),
      country_field: z.string(),
      value_field: z.string(),
      strictness: StrictnessSchema,
      duplicate_keys: DuplicateKeysSchema,
      legend_name: z.string(),
      tiles: z.string(),
    })
    .partial()
    .optional(),
  roles: z
    .object({
      latitude: RoleCandidatesSchema,
      longitude: RoleCandidatesSchema,
      category: RoleCandidatesSchema,
      country_key: RoleCandidatesSchema,
      value: RoleCandidatesSchema,
    })
    .partial()
    .optional(),
  id_priority: z.array(z.string().min(1)).min(1).optional(),
  paths: z.object({ out_dir: z.string() }).partial().optional(),
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<MapweaveConfig, 'verbose' | 'json' | 'configPath'> = {
  version: 1,
  points: {
    maxPoints: DEFAULT_MAX_POINTS,
    seed: DEFAULT_SAMPLE_SEED,
    zoom: 12,
    tiles: 'CartoDB dark_matter',
    disableClusteringAtZoom: 16,
    layerName: 'Incidents',
  },
  join: {
    strictness: 'best-effort',
    duplicateKeys: 'last',
    legendName: 'Value',
    tiles: 'CartoDB positron',
  },
  candidates: DEFAULT_ROLE_CANDIDATES,
  idPriority: DEFAULT_ID_PRIORITY,
  paths: {
    outDir: 'outputs',
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = ['.mapweaverc', '.mapweaverc.yaml', '.mapweaverc.yml', '.mapweaverc.json'];

/**
 * Find config file in current directory or parent directories
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);
  const root = resolve('/');

  while (dir !== root) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    dir = resolve(dir, '..');
  }

  return null;
}

/**
 * Parse and validate config file content
 *
 * @throws Error naming the first invalid key
 */
export function parseConfigFile(content: string, filePath: string): ConfigFile {
  // YAML is a superset of JSON, so one parser covers every supported name
  const raw: unknown = parseYaml(content);
  const result = ConfigFileSchema.safeParse(raw ?? {});

  if (!result.success) {
    const issue = result.error.errors[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new Error(`Invalid config ${filePath} at ${where}: ${issue?.message ?? 'unknown error'}`);
  }
  return result.data;
}

function readConfigFile(filePath: string): ConfigFile {
  return parseConfigFile(readFileSync(filePath, 'utf-8'), filePath);
}

/**
 * Get environment variable with prefix
 */
function getEnvVar(name: string): string | undefined {
  const value = process.env[`MAPWEAVE_${name}`];
  return value === '' ? undefined : value;
}

function getEnvBool(name: string): boolean | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvNumber(name: string): number | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  const num = Number(value);
  return Number.isNaN(num) ? undefined : num;
}

function getEnvStrictness(): JoinStrictness | undefined {
  const value = getEnvVar('STRICTNESS');
  if (value === undefined) return undefined;
  const parsed = StrictnessSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(
      `Invalid MAPWEAVE_STRICTNESS: ${value}. Must be one of: ${StrictnessSchema.options.join(', ')}`
    );
  }
  return parsed.data;
}

function roleOverrides(
  roles: ConfigFile['roles']
): Partial<Record<ColumnRole, RoleCandidates>> {
  return roles ?? {};
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    outDir?: string;
    maxPoints?: number;
    seed?: number;
    geojsonIdField?: string;
    countryField?: string;
    valueField?: string;
    strictness?: JoinStrictness;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws Error for a missing explicit config file or invalid contents
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<MapweaveConfig> {
  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  if (options.configPath) {
    configPath = resolve(options.configPath);
    if (!existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    fileConfig = readConfigFile(configPath);
  } else {
    const envConfigPath = getEnvVar('CONFIG');
    if (envConfigPath) {
      configPath = resolve(envConfigPath);
      if (existsSync(configPath)) {
        fileConfig = readConfigFile(configPath);
      }
    } else {
      configPath = findConfigFile(process.cwd());
      if (configPath) {
        fileConfig = readConfigFile(configPath);
      }
    }
  }

  const o = options.overrides ?? {};
  const points = fileConfig.points ?? {};
  const joinFile = fileConfig.join ?? {};

  const config: MapweaveConfig = {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    points: {
      maxPoints:
        o.maxPoints ?? getEnvNumber('MAX_POINTS') ?? points.max_points ?? DEFAULT_CONFIG.points.maxPoints,
      seed: o.seed ?? getEnvNumber('SEED') ?? points.seed ?? DEFAULT_CONFIG.points.seed,
      zoom: points.zoom ?? DEFAULT_CONFIG.points.zoom,
      tiles: points.tiles ?? DEFAULT_CONFIG.points.tiles,
      disableClusteringAtZoom:
        points.disable_clustering_at_zoom ?? DEFAULT_CONFIG.points.disableClusteringAtZoom,
      layerName: points.layer_name ?? DEFAULT_CONFIG.points.layerName,
    },

    join: {
      geojsonIdField:
        o.geojsonIdField ?? getEnvVar('GEOJSON_ID_FIELD') ?? joinFile.geojson_id_field,
      countryField: o.countryField ?? getEnvVar('COUNTRY_FIELD') ?? joinFile.country_field,
      valueField: o.valueField ?? getEnvVar('VALUE_FIELD') ?? joinFile.value_field,
      strictness:
        o.strictness ?? getEnvStrictness() ?? joinFile.strictness ?? DEFAULT_CONFIG.join.strictness,
      duplicateKeys: joinFile.duplicate_keys ?? DEFAULT_CONFIG.join.duplicateKeys,
      legendName: joinFile.legend_name ?? DEFAULT_CONFIG.join.legendName,
      tiles: joinFile.tiles ?? DEFAULT_CONFIG.join.tiles,
    },

    candidates: mergeCandidateTables(DEFAULT_CONFIG.candidates, roleOverrides(fileConfig.roles)),
    idPriority: fileConfig.id_priority ?? DEFAULT_CONFIG.idPriority,

    paths: {
      outDir: o.outDir ?? getEnvVar('OUT_DIR') ?? fileConfig.paths?.out_dir ?? DEFAULT_CONFIG.paths.outDir,
    },

    verbose: o.verbose ?? getEnvBool('VERBOSE') ?? false,
    json: o.json ?? getEnvBool('JSON') ?? false,
    configPath,
  };

  return config;
}

/**
 * Resolve the output directory against the config file's directory (or cwd)
 */
export function resolveOutDir(config: MapweaveConfig): string {
  const basePath = config.configPath ? resolve(config.configPath, '..') : process.cwd();
  return resolve(basePath, config.paths.outDir);
}

/**
 * Validate configuration
 *
 * @throws Error if configuration is invalid
 */
export function validateConfig(config: MapweaveConfig): void {
  if (config.version !== 1) {
    throw new Error(`Unsupported config version: ${config.version}. Expected 1.`);
  }

  if (!Number.isInteger(config.points.maxPoints) || config.points.maxPoints < 1) {
    throw new Error(`max_points must be a positive integer, got ${config.points.maxPoints}`);
  }

  if (!Number.isInteger(config.points.seed)) {
    throw new Error(`seed must be an integer, got ${config.points.seed}`);
  }

  if (config.points.zoom < 0 || config.points.disableClusteringAtZoom < 1) {
    throw new Error('zoom must be >= 0 and disable_clustering_at_zoom >= 1');
  }
}
