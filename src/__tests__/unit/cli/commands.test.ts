/**
 * CLI command tests against a fixture data directory
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse } from 'csv-parse/sync';
import { batchCommand } from '../../../cli/commands/batch.js';
import { coordsCommand } from '../../../cli/commands/coords.js';
import { collectStateInfo, formatSize } from '../../../cli/commands/info.js';
import { lookupCommand } from '../../../cli/commands/lookup.js';
import { listVariables } from '../../../cli/commands/variables.js';
import { loadConfig, type CLIConfig } from '../../../cli/lib/config.js';
import { createCLILogger } from '../../../cli/lib/logger.js';
import { openSession, type CommandDeps, type GeocoderSession } from '../../../cli/lib/session.js';
import { FileDatasetProvider } from '../../../data/dataset-provider.js';
import {
  BLOCK_EAST,
  BLOCK_MIDDLE,
  TRACT_EAST,
  TRACT_WEST,
  makeTempDir,
  removeTempDir,
  writeFixtureState,
} from '../../fixtures/census-fixtures.js';

const INPUT_CSV = [
  'id,address',
  '1,"123 Main St, Los Angeles, CA"',
  '2,"50 N Broadway, Los Angeles, CA"',
  '3,"123 Elm St, Los Angeles, CA"',
  '',
].join('\n');

describe('CLI commands', () => {
  let dataDir: string;
  let workDir: string;
  let config: CLIConfig;
  let session: GeocoderSession;
  let deps: CommandDeps;
  let logLines: string[];
  let stdout: string[];

  beforeAll(() => {
    dataDir = makeTempDir();
    workDir = makeTempDir('census-geocoder-work-');
    writeFixtureState(dataDir);
    config = loadConfig({ cwd: workDir, env: {}, overrides: { dataDir } });
    session = openSession(config, workDir);
  });

  afterAll(async () => {
    await session.close();
    removeTempDir(dataDir);
    removeTempDir(workDir);
  });

  beforeEach(() => {
    logLines = [];
    stdout = [];
    deps = {
      config,
      session,
      logger: createCLILogger({ json: true, level: 'debug', write: (line) => logLines.push(line) }),
    };
    vi.spyOn(console, 'log').mockImplementation((line: unknown) => {
      stdout.push(String(line));
    });
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('batch', () => {
    it('writes one CSV row per input row with the input columns first', async () => {
      const inputPath = join(workDir, 'addresses.csv');
      const outputPath = join(workDir, 'geocoded.csv');
      writeFileSync(inputPath, INPUT_CSV);

      const result = await batchCommand(
        inputPath,
        outputPath,
        { addressColumn: 'address', level: 'tract', variables: ['P1_001N'] },
        deps
      );

      expect(result).toEqual({ success: true });
      const rows: string[][] = parse(readFileSync(outputPath, 'utf-8'));
      const [header, ...data] = rows;
      const column = (name: string): number => header.indexOf(name);

      expect(header.slice(0, 3)).toEqual(['id', 'address', 'input_address']);
      expect(header[header.length - 1]).toBe('P1_001N');
      expect(data.map((row) => row[column('id')])).toEqual(['1', '2', '3']);
      expect(data.map((row) => row[column('geoid')])).toEqual([TRACT_WEST, TRACT_EAST, '']);
      expect(data.map((row) => row[column('P1_001N')])).toEqual(['200', '40', '']);
      expect(data[2][column('unmatched_reason')]).toBe('no_match');
      expect(stdout).toContain('Matched: 2/3 (66.7%)');
    });

    it('writes ndjson records carrying their input row', async () => {
      const inputPath = join(workDir, 'addresses-nd.csv');
      const outputPath = join(workDir, 'geocoded.ndjson');
      writeFileSync(inputPath, INPUT_CSV);

      await batchCommand(inputPath, outputPath, { addressColumn: 'address', level: 'block' }, deps);

      const records: unknown[] = readFileSync(outputPath, 'utf-8')
        .trim()
        .split('\n')
        .map((line) => JSON.parse(line));

      expect(records).toHaveLength(3);
      expect(records[1]).toMatchObject({
        geoid: BLOCK_EAST,
        input: { id: '2', address: '50 N Broadway, Los Angeles, CA' },
      });
    });

    it('fails when the address column is missing', async () => {
      const inputPath = join(workDir, 'no-address.csv');
      writeFileSync(inputPath, 'id,street\n1,Main\n');

      const result = await batchCommand(
        inputPath,
        join(workDir, 'unused.csv'),
        { addressColumn: 'address' },
        deps
      );

      expect(result).toEqual({ success: false });
      expect(console.error).toHaveBeenCalledWith(
        `Error: Column 'address' not found in ${inputPath}`
      );
    });

    it('rejects when the output file cannot be created', async () => {
      const inputPath = join(workDir, 'addresses-unwritable.csv');
      const outputPath = join(workDir, 'missing-dir', 'out.csv');
      writeFileSync(inputPath, INPUT_CSV);

      await expect(
        batchCommand(inputPath, outputPath, { addressColumn: 'address' }, deps)
      ).rejects.toThrow(/ENOENT/);
      expect(existsSync(outputPath)).toBe(false);
    });

    it('logs progress at the requested interval', async () => {
      const inputPath = join(workDir, 'progress.csv');
      writeFileSync(inputPath, INPUT_CSV);

      await batchCommand(
        inputPath,
        join(workDir, 'progress.json'),
        { addressColumn: 'address', progressEvery: 2 },
        deps
      );

      const progress = logLines
        .map((line): unknown => JSON.parse(line))
        .filter((entry) => typeof entry === 'object' && entry !== null && 'percent' in entry);
      expect(progress).toEqual([
        expect.objectContaining({ message: 'Progress', current: 2, total: 3, percent: 67 }),
      ]);
    });
  });

  describe('lookup', () => {
    it('prints the result as JSON by default', async () => {
      await lookupCommand('250 Main St, Los Angeles, CA', { level: 'block' }, deps);

      expect(JSON.parse(stdout.join('\n'))).toMatchObject({
        geoid: BLOCK_MIDDLE,
        geoLevel: 'block',
      });
    });

    it('succeeds for an unmatched address and logs a warning', async () => {
      const result = await lookupCommand('Main St, Los Angeles, CA', {}, deps);

      expect(result).toEqual({ success: true });
      expect(logLines.some((line) => line.includes('Address not matched'))).toBe(true);
    });
  });

  describe('coords', () => {
    it('searches every state on disk when no state is given', async () => {
      await coordsCommand(34.05, -118.245, { level: 'tract' }, deps);

      expect(JSON.parse(stdout.join('\n'))).toMatchObject({ geoid: TRACT_WEST });
    });

    it('reports no containment outside every block', async () => {
      await coordsCommand(40.7, -74.0, {}, deps);

      expect(JSON.parse(stdout.join('\n'))).toMatchObject({
        matchType: 'unmatched',
        unmatchedReason: 'no_containment',
        inputAddress: '40.7,-74',
      });
    });
  });

  describe('info', () => {
    it('inventories each state directory', async () => {
      const states = await collectStateInfo(new FileDatasetProvider(dataDir));

      expect(states).toHaveLength(1);
      expect(states[0]).toMatchObject({
        stateFips: '06',
        name: 'California',
        addressRanges: true,
        blocks: true,
        pl94171: true,
        acs5: true,
      });
      expect(states[0].bytes).toBeGreaterThan(0);
    });
  });
});

describe('listVariables', () => {
  it('filters by table prefix and names the table', () => {
    const listing = listVariables({ table: 'h1' });

    expect(listing.dataset).toBe('pl94171');
    expect(listing.variables.map((variable) => variable.code)).toEqual([
      'H1_001N',
      'H1_002N',
      'H1_003N',
    ]);
    expect(listing.variables[0].table).toBe('Housing Units');
  });

  it('ends the group list with default and all', () => {
    const groups = listVariables({ acs: true }).groups.map((group) => group.group);

    expect(groups.slice(-2)).toEqual(['default', 'all']);
  });
});

describe('formatSize', () => {
  it('scales to the largest unit under 1024', () => {
    expect(formatSize(512)).toBe('512.0 B');
    expect(formatSize(1536)).toBe('1.5 KB');
    expect(formatSize(5 * 1024 * 1024)).toBe('5.0 MB');
  });
});
