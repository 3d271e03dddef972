/**
 * Geocoder wiring for CLI commands
 *
 * @module cli/lib/session
 */

import { mkdirSync } from 'node:fs';
import { InvalidArgumentError } from 'commander';
import { resolveVariables } from '../../census/variables.js';
import { GEO_LEVELS, isGeoLevel, type GeoLevel } from '../../core/types/geography.js';
import { FileDatasetProvider } from '../../data/dataset-provider.js';
import { StateDatasetCache } from '../../services/dataset-cache.js';
import { CensusGeocoder } from '../../services/geocoder.js';
import { resolveConfigPath, type CLIConfig } from './config.js';
import type { CLILogger } from './logger.js';
import { isOutputFormat, OUTPUT_FORMATS, type OutputFormat } from './output.js';

/**
 * Geocoder plus the provider behind it, shared by one command run
 */
export interface GeocoderSession {
  readonly geocoder: CensusGeocoder;
  readonly provider: FileDatasetProvider;
  readonly cache: StateDatasetCache;
  close(): Promise<void>;
}

/**
 * What a geocoding command runs against
 */
export interface CommandDeps {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
  readonly session: GeocoderSession;
}

export interface CommandResult {
  readonly success: boolean;
}

/**
 * Build a geocoder over the configured data directory
 */
export function openSession(config: CLIConfig, cwd: string = process.cwd()): GeocoderSession {
  const provider = new FileDatasetProvider(
    resolveConfigPath(config, config.paths.data, cwd),
    config.datasets.plColumns === 'all' ? { plColumns: 'all' } : {}
  );

  let spatialIndexDir: string | undefined;
  if (config.datasets.spatialIndexDir !== null) {
    spatialIndexDir = resolveConfigPath(config, config.datasets.spatialIndexDir, cwd);
    mkdirSync(spatialIndexDir, { recursive: true });
  }

  const cache = new StateDatasetCache(provider, spatialIndexDir ? { spatialIndexDir } : {});
  const geocoder = new CensusGeocoder({
    cache,
    defaultGeoLevel: config.defaults.geoLevel,
    concurrency: config.defaults.concurrency,
  });

  return {
    geocoder,
    provider,
    cache,
    close: () => cache.clear(),
  };
}

/**
 * Variable flags shared by lookup, batch and coords
 */
export interface VariableFlags {
  readonly variables?: readonly string[];
  readonly groups?: readonly string[];
  readonly acs?: readonly string[];
  readonly acsGroups?: readonly string[];
}

/**
 * Codes a command joins: the flags when any is given, else the configured defaults
 *
 * @throws ConfigurationError for an unknown group or malformed code
 */
export function selectedVariables(flags: VariableFlags, config: CLIConfig): string[] {
  const given =
    (flags.variables?.length ?? 0) +
    (flags.groups?.length ?? 0) +
    (flags.acs?.length ?? 0) +
    (flags.acsGroups?.length ?? 0);

  const selection =
    given > 0
      ? resolveVariables({
          variables: flags.variables,
          groups: flags.groups,
          acsVariables: flags.acs,
          acsGroups: flags.acsGroups,
        })
      : resolveVariables({
          variables: config.defaults.variables,
          acsVariables: config.defaults.acsVariables,
        });

  return [...selection.pl, ...selection.acs];
}

// ============================================================================
// Option parsers
// ============================================================================

export function parseGeoLevelOption(value: string): GeoLevel {
  if (!isGeoLevel(value)) {
    throw new InvalidArgumentError(`Expected one of ${GEO_LEVELS.join(', ')}.`);
  }
  return value;
}

export function parseFormatOption(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new InvalidArgumentError(`Expected one of ${OUTPUT_FORMATS.join(', ')}.`);
  }
  return value;
}

export function parseIntegerOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Expected an integer.');
  }
  return parsed;
}

export function parseCoordinateOption(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Expected a decimal coordinate.');
  }
  return parsed;
}
