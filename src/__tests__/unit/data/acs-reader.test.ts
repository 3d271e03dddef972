/**
 * ACS extract reader tests
 */

import { describe, it, expect } from 'vitest';
import { Readable } from 'node:stream';
import { parseAcsExtract } from '../../../data/acs-reader.js';
import { parseCensusNumber } from '../../../data/delimited.js';
import { ACS_FIXTURE_CSV, TRACT_EAST, TRACT_WEST } from '../../fixtures/census-fixtures.js';

function streamOf(content: string): Readable {
  return Readable.from([Buffer.from(content)]);
}

describe('parseAcsExtract', () => {
  it('keeps ACS variable columns and strips GEO_ID prefixes', async () => {
    const table = await parseAcsExtract(streamOf(ACS_FIXTURE_CSV), 'acs5.csv');

    expect(table.dataset).toBe('acs5');
    expect(table.level).toBe('tract');
    expect(table.variables).toEqual(['B19013_001E', 'B01003_001E']);
    expect(table.rows.get(TRACT_WEST)).toEqual([85000, 2100]);
    expect(table.rows.get('06037')).toEqual([76367, 10014009]);
  });

  it('turns suppression sentinels into null', async () => {
    const table = await parseAcsExtract(streamOf(ACS_FIXTURE_CSV), 'acs5.csv');

    expect(table.rows.get(TRACT_EAST)).toEqual([null, 1500]);
  });

  it('accepts a BOM, a GEO_ID header and lower-case codes', async () => {
    const csv = '\uFEFFgeo_id,b19013_001e,state\n06037207301,91000,06\n';

    const table = await parseAcsExtract(streamOf(csv), 'api.csv');

    expect(table.variables).toEqual(['B19013_001E']);
    expect(table.rows.get(TRACT_WEST)).toEqual([91000]);
  });

  it('skips rows whose GEOID is not a summary level', async () => {
    const csv = 'GEOID,B19013_001E\n0603720730,1\n06037207301,2\n';

    const table = await parseAcsExtract(streamOf(csv), 'acs5.csv');

    expect([...table.rows.keys()]).toEqual([TRACT_WEST]);
  });

  it('rejects an extract without a GEOID column', async () => {
    await expect(parseAcsExtract(streamOf('NAME,B19013_001E\nx,1\n'), 'acs5.csv')).rejects.toThrow(
      'No GEOID column in acs5.csv'
    );
  });

  it('rejects an empty extract', async () => {
    await expect(parseAcsExtract(streamOf(''), 'empty.csv')).rejects.toThrow(
      'Empty ACS extract: empty.csv'
    );
  });
});

describe('parseCensusNumber', () => {
  it('parses numbers', () => {
    expect(parseCensusNumber('42')).toBe(42);
    expect(parseCensusNumber(' 0.35 ')).toBe(0.35);
    expect(parseCensusNumber('-5')).toBe(-5);
  });

  it('returns null for blanks, text and sentinels', () => {
    expect(parseCensusNumber(undefined)).toBeNull();
    expect(parseCensusNumber('')).toBeNull();
    expect(parseCensusNumber('N/A')).toBeNull();
    expect(parseCensusNumber('-666666666')).toBeNull();
    expect(parseCensusNumber('-222222222')).toBeNull();
  });
});
