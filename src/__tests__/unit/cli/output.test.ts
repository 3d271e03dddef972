/**
 * CLI output formatting tests
 */

import { describe, it, expect } from 'vitest';
import {
  RESULT_COLUMNS,
  escapeCSV,
  flattenResult,
  formatCsv,
  formatNdjson,
  formatOutput,
  formatResults,
  formatTable,
  isOutputFormat,
  resultColumns,
  type TableColumn,
} from '../../../cli/lib/output.js';
import { unmatchedResult } from '../../../services/geocoder.js';
import type { GeocodeResult } from '../../../core/types/result.js';

const COLUMNS: readonly TableColumn[] = [
  { key: 'name', header: 'Name' },
  { key: 'count', header: 'Count', align: 'right' },
];

const MATCHED: GeocodeResult = {
  inputAddress: '123 Main St, Los Angeles, CA',
  parsedAddress: null,
  matchedStreet: 'MAIN ST',
  latitude: 34.05,
  longitude: -118.2554,
  matchType: 'exact',
  matchScore: 1,
  unmatchedReason: null,
  segmentId: '1101',
  side: 'L',
  geoLevel: 'tract',
  geoid: '06037207301',
  stateFips: '06',
  countyFips: '037',
  tract: '207301',
  blockGroup: null,
  block: null,
  variables: { P1_001N: 200, B19013_001E: null },
};

describe('formatTable', () => {
  it('pads columns to the widest cell', () => {
    const output = formatTable(
      [
        { name: 'tract', count: 12 },
        { name: 'county', count: 3 },
      ],
      COLUMNS
    );

    expect(output.split('\n')).toEqual([
      'Name   | Count',
      '-------+------',
      'tract  |    12',
      'county |     3',
    ]);
  });

  it('truncates cells wider than a fixed width', () => {
    const output = formatTable([{ name: 'block_group' }], [{ key: 'name', header: 'N', width: 5 }]);

    expect(output.split('\n')[2]).toBe('bloc~');
  });

  it('reports an empty table', () => {
    expect(formatTable([], COLUMNS)).toBe('No entries found.');
  });
});

describe('CSV output', () => {
  it('escapes delimiters, quotes and line breaks', () => {
    expect(escapeCSV('plain')).toBe('plain');
    expect(escapeCSV('Los Angeles, CA')).toBe('"Los Angeles, CA"');
    expect(escapeCSV('the "main" street')).toBe('"the ""main"" street"');
    expect(escapeCSV('two\nlines')).toBe('"two\nlines"');
  });

  it('writes a header and one line per row with empty cells for nulls', () => {
    expect(
      formatCsv(
        [
          { name: 'a, b', count: 1 },
          { name: 'c', count: null },
        ],
        COLUMNS
      )
    ).toBe('Name,Count\n"a, b",1\nc,');
  });
});

describe('formatOutput', () => {
  it('renders json and ndjson', () => {
    const rows = [{ name: 'a' }, { name: 'b' }];

    expect(formatOutput(rows, 'json', COLUMNS)).toBe(JSON.stringify(rows, null, 2));
    expect(formatOutput(rows, 'ndjson', COLUMNS)).toBe('{"name":"a"}\n{"name":"b"}');
    expect(formatNdjson([])).toBe('');
  });

  it('recognizes the output formats', () => {
    expect(isOutputFormat('csv')).toBe(true);
    expect(isOutputFormat('xml')).toBe(false);
    expect(isOutputFormat(3)).toBe(false);
  });
});

describe('geocode result output', () => {
  it('appends one column per variable code', () => {
    const columns = resultColumns(['P1_001N', 'B19013_001E']);

    expect(columns).toHaveLength(RESULT_COLUMNS.length + 2);
    expect(columns.slice(-2).map((column) => column.header)).toEqual(['P1_001N', 'B19013_001E']);
  });

  it('flattens variables beside the scalar fields', () => {
    const row = flattenResult(MATCHED);

    expect(row.geoid).toBe('06037207301');
    expect(row.P1_001N).toBe(200);
    expect(row.B19013_001E).toBeNull();
    expect(row.error).toBeNull();
  });

  it('flattens a row error to its message', () => {
    const failed: GeocodeResult = {
      ...unmatchedResult('1 Elm St', 'block', { pl: [], acs: [] }, 'dataset_unavailable'),
      error: { code: 'DATASET_UNAVAILABLE', message: 'No data for state 36' },
    };

    expect(flattenResult(failed).error).toBe('No data for state 36');
  });

  it('writes CSV rows in result column order', () => {
    const csv = formatResults([MATCHED], 'csv', ['P1_001N', 'B19013_001E']);
    const [header, line] = csv.split('\n');

    expect(header).toBe(
      'input_address,matched_street,latitude,longitude,match_type,match_score,unmatched_reason,' +
        'geo_level,geoid,state_fips,county_fips,tract,block_group,block,error,P1_001N,B19013_001E'
    );
    expect(line).toBe(
      '"123 Main St, Los Angeles, CA",MAIN ST,34.05,-118.2554,exact,1,,tract,06037207301,06,037,207301,,,,200,'
    );
  });

  it('keeps the nested shape for json', () => {
    expect(JSON.parse(formatResults([MATCHED], 'json', []))).toEqual([MATCHED]);
  });
});
