/**
 * ACS 5-year extract reader
 *
 * Reads a comma-separated extract with a header row: one GEOID column
 * (`GEOID`, or `GEO_ID` in Census API form such as "1400000US06037123400")
 * followed by variable columns such as B19013_001E. Columns that are not
 * ACS variable codes (NAME, state, county, ...) are ignored.
 *
 * Rows are normally tracts; county and state rows may appear alongside and
 * are kept under their own GEOIDs.
 */

import { ACS_VARIABLE_PATTERN } from '../census/variables.js';
import type { CensusTableData, CensusValue } from '../core/types/dataset.js';
import { levelFromGeoid, stripGeoIdPrefix } from '../core/geoid.js';
import { createLogger } from '../core/utils/logger.js';
import { forEachDelimitedRow, parseCensusNumber } from './delimited.js';

const logger = createLogger({ module: 'acs-reader' });

const GEOID_HEADERS = ['GEOID', 'GEO_ID'];

/**
 * Parse an ACS extract
 *
 * @param label - Source name for log and error messages
 * @throws Error when the header has no GEOID column
 */
export async function parseAcsExtract(
  source: NodeJS.ReadableStream,
  label: string
): Promise<CensusTableData> {
  let geoidColumn = -1;
  let picks: Array<readonly [number, number]> = [];
  const variables: string[] = [];
  const rows = new Map<string, CensusValue[]>();
  let skipped = 0;

  await forEachDelimitedRow(source, { bom: true, trim: true }, (row) => {
    if (geoidColumn < 0) {
      const header = row.map((cell) => cell.toUpperCase());
      geoidColumn = header.findIndex((cell) => GEOID_HEADERS.includes(cell));
      if (geoidColumn < 0) {
        throw new Error(`No GEOID column in ${label}`);
      }
      picks = [];
      header.forEach((cell, position) => {
        if (ACS_VARIABLE_PATTERN.test(cell)) {
          picks.push([position, variables.length]);
          variables.push(cell);
        }
      });
      return;
    }

    const geoid = stripGeoIdPrefix(row[geoidColumn] ?? '');
    if (levelFromGeoid(geoid) === null) {
      skipped++;
      return;
    }

    const values = new Array<CensusValue>(variables.length).fill(null);
    for (const [from, to] of picks) {
      values[to] = parseCensusNumber(row[from]);
    }
    rows.set(geoid, values);
  });

  if (geoidColumn < 0) {
    throw new Error(`Empty ACS extract: ${label}`);
  }

  logger.info('ACS extract parsed', {
    source: label,
    rowCount: rows.size,
    variableCount: variables.length,
    skippedRows: skipped,
  });

  return { dataset: 'acs5', level: 'tract', variables, rows };
}
