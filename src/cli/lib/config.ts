/**
 * Census Geocoder CLI Configuration Management
 *
 * Loads configuration from .census-geocoderrc (YAML) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (CENSUS_GEOCODER_*)
 * 3. Config file (.census-geocoderrc or --config path)
 * 4. Default values
 *
 * Example .census-geocoderrc:
 *
 *   version: 1
 *   paths:
 *     data: ./census-data
 *   defaults:
 *     geo_level: tract
 *     concurrency: 8
 *     variables: [P1_001N]
 *     acs_variables: [B19013_001E]
 *   datasets:
 *     pl_columns: catalog
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from '../../core/types/errors.js';
import { GEO_LEVELS, isGeoLevel, type GeoLevel } from '../../core/types/geography.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Which PL 94-171 columns the provider keeps in memory
 */
export type PlColumnSet = 'catalog' | 'all';

export interface PathsConfig {
  /** Root of the per-state data directories */
  readonly data: string;
}

export interface DefaultsConfig {
  readonly geoLevel: GeoLevel;
  /** Batch worker count */
  readonly concurrency: number;
  /** PL 94-171 codes joined when a command names none */
  readonly variables: readonly string[];
  /** ACS codes joined when a command names none */
  readonly acsVariables: readonly string[];
}

export interface DatasetsConfig {
  readonly plColumns: PlColumnSet;
  /** Directory for per-state block R-tree files; in memory when null */
  readonly spatialIndexDir: string | null;
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  readonly version: number;
  readonly paths: PathsConfig;
  readonly defaults: DefaultsConfig;
  readonly datasets: DatasetsConfig;

  // Runtime overrides (from CLI flags)
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

const ConfigFileSchema = z
  .object({
    version: z.number().int().optional(),
    paths: z.object({ data: z.string().optional() }).strict().optional(),
    defaults: z
      .object({
        geo_level: z.enum(['state', 'county', 'tract', 'block_group', 'block']).optional(),
        concurrency: z.number().int().positive().max(64).optional(),
        variables: z.array(z.string()).optional(),
        acs_variables: z.array(z.string()).optional(),
      })
      .strict()
      .optional(),
    datasets: z
      .object({
        pl_columns: z.enum(['catalog', 'all']).optional(),
        spatial_index_dir: z.string().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'json' | 'configPath'> = {
  version: 1,
  paths: {
    data: './census-data',
  },
  defaults: {
    geoLevel: 'block',
    concurrency: 4,
    variables: [],
    acsVariables: [],
  },
  datasets: {
    plColumns: 'catalog',
    spatialIndexDir: null,
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

export const ENV_PREFIX = 'CENSUS_GEOCODER_';

const CONFIG_FILE_NAMES = [
  '.census-geocoderrc',
  '.census-geocoderrc.yaml',
  '.census-geocoderrc.yml',
  '.census-geocoderrc.json',
];

/**
 * Find config file in a directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);
  const root = resolve('/');

  while (true) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    if (dir === root) return null;
    dir = resolve(dir, '..');
  }
}

/**
 * Parse and validate a config file (YAML; JSON is valid YAML)
 *
 * @throws ConfigurationError when the file is not valid YAML or fails validation
 */
export function parseConfigFile(filePath: string): ConfigFile {
  const content = readFileSync(filePath, 'utf-8');

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigurationError(
      `Cannot parse config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  // An empty file parses to null
  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join('.');
    throw new ConfigurationError(
      `Invalid config file ${filePath}: ${field}: ${issue.message}`,
      field
    );
  }
  return parsed.data;
}

type Env = Readonly<Record<string, string | undefined>>;

function getEnvVar(env: Env, name: string): string | undefined {
  const value = env[`${ENV_PREFIX}${name}`];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function getEnvBool(env: Env, name: string): boolean | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvNumber(env: Env, name: string): number | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  const num = parseInt(value, 10);
  if (isNaN(num)) {
    throw new ConfigurationError(`${ENV_PREFIX}${name} must be a number, got "${value}"`, name);
  }
  return num;
}

function getEnvList(env: Env, name: string): string[] | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function getEnvGeoLevel(env: Env): GeoLevel | undefined {
  const value = getEnvVar(env, 'LEVEL');
  if (value === undefined) return undefined;
  if (!isGeoLevel(value)) {
    throw new ConfigurationError(
      `${ENV_PREFIX}LEVEL must be one of ${GEO_LEVELS.join(', ')}, got "${value}"`,
      'LEVEL'
    );
  }
  return value;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** Directory the config file search starts from (default: cwd) */
  readonly cwd?: string;
  /** Environment (default: process.env) */
  readonly env?: Env;
  /** CLI flag overrides */
  readonly overrides?: {
    readonly verbose?: boolean;
    readonly json?: boolean;
    readonly dataDir?: string;
    readonly geoLevel?: GeoLevel;
    readonly concurrency?: number;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigurationError for an unreadable or invalid source
 */
export function loadConfig(options: LoadConfigOptions = {}): CLIConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  if (options.configPath) {
    configPath = resolve(cwd, options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`, 'config');
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    const envConfigPath = getEnvVar(env, 'CONFIG');
    if (envConfigPath) {
      configPath = resolve(cwd, envConfigPath);
      if (!existsSync(configPath)) {
        throw new ConfigurationError(`Config file not found: ${configPath}`, 'config');
      }
      fileConfig = parseConfigFile(configPath);
    } else {
      configPath = findConfigFile(cwd);
      if (configPath) {
        fileConfig = parseConfigFile(configPath);
      }
    }
  }

  const overrides = options.overrides ?? {};

  const config: CLIConfig = {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    paths: {
      data:
        overrides.dataDir ??
        getEnvVar(env, 'DATA_DIR') ??
        fileConfig.paths?.data ??
        DEFAULT_CONFIG.paths.data,
    },

    defaults: {
      geoLevel:
        overrides.geoLevel ??
        getEnvGeoLevel(env) ??
        fileConfig.defaults?.geo_level ??
        DEFAULT_CONFIG.defaults.geoLevel,
      concurrency:
        overrides.concurrency ??
        getEnvNumber(env, 'CONCURRENCY') ??
        fileConfig.defaults?.concurrency ??
        DEFAULT_CONFIG.defaults.concurrency,
      variables:
        getEnvList(env, 'VARIABLES') ??
        fileConfig.defaults?.variables ??
        DEFAULT_CONFIG.defaults.variables,
      acsVariables:
        getEnvList(env, 'ACS_VARIABLES') ??
        fileConfig.defaults?.acs_variables ??
        DEFAULT_CONFIG.defaults.acsVariables,
    },

    datasets: {
      plColumns: fileConfig.datasets?.pl_columns ?? DEFAULT_CONFIG.datasets.plColumns,
      spatialIndexDir:
        fileConfig.datasets?.spatial_index_dir ?? DEFAULT_CONFIG.datasets.spatialIndexDir,
    },

    verbose: overrides.verbose ?? getEnvBool(env, 'VERBOSE') ?? false,
    json: overrides.json ?? getEnvBool(env, 'JSON') ?? false,
    configPath,
  };

  validateConfig(config);
  return config;
}

/**
 * Resolve a configured path against the config file's directory (or cwd)
 */
export function resolveConfigPath(
  config: CLIConfig,
  path: string,
  cwd: string = process.cwd()
): string {
  const basePath = config.configPath ? resolve(config.configPath, '..') : cwd;
  return resolve(basePath, path);
}

/**
 * Validate configuration
 *
 * @throws ConfigurationError if configuration is invalid
 */
export function validateConfig(config: CLIConfig): void {
  if (config.version !== 1) {
    throw new ConfigurationError(
      `Unsupported config version: ${config.version}. Expected 1.`,
      'version'
    );
  }

  const { concurrency } = config.defaults;
  if (!Number.isInteger(concurrency) || concurrency <= 0 || concurrency > 64) {
    throw new ConfigurationError('Concurrency must be between 1 and 64', 'concurrency');
  }

  if (config.paths.data.trim().length === 0) {
    throw new ConfigurationError('Data directory must not be empty', 'paths.data');
  }
}
