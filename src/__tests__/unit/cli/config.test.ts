/**
 * CLI configuration tests: precedence, validation, path resolution
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  DEFAULT_CONFIG,
  findConfigFile,
  loadConfig,
  resolveConfigPath,
} from '../../../cli/lib/config.js';
import { ConfigurationError } from '../../../core/types/errors.js';
import { makeTempDir, removeTempDir } from '../../fixtures/census-fixtures.js';

const RC_FILE = `version: 1
paths:
  data: ./state-data
defaults:
  geo_level: tract
  concurrency: 8
  variables: [P1_001N]
datasets:
  pl_columns: all
`;

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir('census-geocoder-config-');
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('falls back to defaults without a config file or environment', () => {
    const config = loadConfig({ cwd: dir, env: {} });

    expect(config.paths).toEqual(DEFAULT_CONFIG.paths);
    expect(config.defaults).toEqual(DEFAULT_CONFIG.defaults);
    expect(config.datasets).toEqual({ plColumns: 'catalog', spatialIndexDir: null });
    expect(config.verbose).toBe(false);
    expect(config.json).toBe(false);
    expect(config.configPath).toBeNull();
  });

  it('reads the rc file found in the working directory', () => {
    writeFileSync(join(dir, '.census-geocoderrc'), RC_FILE);

    const config = loadConfig({ cwd: dir, env: {} });

    expect(config.configPath).toBe(join(dir, '.census-geocoderrc'));
    expect(config.paths.data).toBe('./state-data');
    expect(config.defaults).toEqual({
      geoLevel: 'tract',
      concurrency: 8,
      variables: ['P1_001N'],
      acsVariables: [],
    });
    expect(config.datasets.plColumns).toBe('all');
  });

  it('lets the environment override the file and flags override both', () => {
    writeFileSync(join(dir, '.census-geocoderrc'), RC_FILE);
    const env = {
      CENSUS_GEOCODER_CONCURRENCY: '16',
      CENSUS_GEOCODER_LEVEL: 'county',
      CENSUS_GEOCODER_DATA_DIR: '/srv/census',
      CENSUS_GEOCODER_ACS_VARIABLES: 'B19013_001E, B01003_001E',
      CENSUS_GEOCODER_VERBOSE: '1',
    };

    const fromEnv = loadConfig({ cwd: dir, env });
    const fromFlags = loadConfig({
      cwd: dir,
      env,
      overrides: { concurrency: 2, geoLevel: 'block', dataDir: './here', verbose: false },
    });

    expect(fromEnv.defaults.concurrency).toBe(16);
    expect(fromEnv.defaults.geoLevel).toBe('county');
    expect(fromEnv.paths.data).toBe('/srv/census');
    expect(fromEnv.defaults.acsVariables).toEqual(['B19013_001E', 'B01003_001E']);
    expect(fromEnv.defaults.variables).toEqual(['P1_001N']);
    expect(fromEnv.verbose).toBe(true);

    expect(fromFlags.defaults.concurrency).toBe(2);
    expect(fromFlags.defaults.geoLevel).toBe('block');
    expect(fromFlags.paths.data).toBe('./here');
    expect(fromFlags.verbose).toBe(false);
  });

  it('treats blank environment values as unset', () => {
    const config = loadConfig({ cwd: dir, env: { CENSUS_GEOCODER_CONCURRENCY: '  ' } });

    expect(config.defaults.concurrency).toBe(4);
  });

  it('loads an explicit config path relative to cwd', () => {
    writeFileSync(join(dir, 'custom.yaml'), 'version: 1\ndefaults:\n  geo_level: state\n');

    const config = loadConfig({ cwd: dir, env: {}, configPath: 'custom.yaml' });

    expect(config.configPath).toBe(join(dir, 'custom.yaml'));
    expect(config.defaults.geoLevel).toBe('state');
  });

  it('loads the config path named by the environment', () => {
    writeFileSync(join(dir, 'env.yml'), 'paths:\n  data: /data/census\n');

    const config = loadConfig({ cwd: dir, env: { CENSUS_GEOCODER_CONFIG: 'env.yml' } });

    expect(config.paths.data).toBe('/data/census');
  });

  it('rejects a missing explicit config file', () => {
    expect(() => loadConfig({ cwd: dir, env: {}, configPath: 'nope.yaml' })).toThrow(
      `Config file not found: ${join(dir, 'nope.yaml')}`
    );
  });

  it('rejects an unsupported version', () => {
    writeFileSync(join(dir, '.census-geocoderrc'), 'version: 2\n');

    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(
      'Unsupported config version: 2. Expected 1.'
    );
  });

  it('rejects unknown keys and out-of-range values in the file', () => {
    writeFileSync(join(dir, '.census-geocoderrc'), 'defaults:\n  levels: tract\n');
    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(ConfigurationError);

    writeFileSync(join(dir, '.census-geocoderrc'), 'defaults:\n  concurrency: 500\n');
    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(/defaults\.concurrency/);
  });

  it('rejects malformed YAML', () => {
    writeFileSync(join(dir, '.census-geocoderrc'), 'paths: [unclosed\n');

    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(/Cannot parse config file/);
  });

  it('accepts an empty rc file', () => {
    writeFileSync(join(dir, '.census-geocoderrc'), '');

    expect(loadConfig({ cwd: dir, env: {} }).defaults.geoLevel).toBe('block');
  });

  it('rejects a non-numeric concurrency from the environment', () => {
    expect(() =>
      loadConfig({ cwd: dir, env: { CENSUS_GEOCODER_CONCURRENCY: 'many' } })
    ).toThrow('CENSUS_GEOCODER_CONCURRENCY must be a number, got "many"');
  });

  it('rejects an unknown level from the environment', () => {
    expect(() => loadConfig({ cwd: dir, env: { CENSUS_GEOCODER_LEVEL: 'city' } })).toThrow(
      'CENSUS_GEOCODER_LEVEL must be one of state, county, tract, block_group, block, got "city"'
    );
  });

  it('rejects a concurrency override out of range', () => {
    expect(() => loadConfig({ cwd: dir, env: {}, overrides: { concurrency: 0 } })).toThrow(
      'Concurrency must be between 1 and 64'
    );
  });
});

describe('config paths', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir('census-geocoder-config-');
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('finds an rc file in a parent directory', () => {
    const child = join(dir, 'nested', 'deeper');
    mkdirSync(child, { recursive: true });
    writeFileSync(join(dir, '.census-geocoderrc.yaml'), 'version: 1\n');

    expect(findConfigFile(child)).toBe(join(dir, '.census-geocoderrc.yaml'));
  });

  it('resolves data paths against the config file directory', () => {
    writeFileSync(join(dir, '.census-geocoderrc'), RC_FILE);
    const config = loadConfig({ cwd: dir, env: {} });

    expect(resolveConfigPath(config, config.paths.data, '/elsewhere')).toBe(
      join(dir, 'state-data')
    );
  });

  it('resolves against cwd without a config file', () => {
    const config = loadConfig({ cwd: dir, env: {} });

    expect(resolveConfigPath(config, 'census-data', '/work')).toBe('/work/census-data');
  });
});
