/**
 * PL 94-171 Legacy Format Parser
 *
 * Reads the 2020 redistricting data summary file as published per state
 * (`xx2020.pl.zip`, or its extracted contents):
 *
 *   xxgeo2020.pl     geographic header, one row per geography
 *   xx000012020.pl   segment 1: P1, P2
 *   xx000022020.pl   segment 2: P3, P4, H1
 *   xx000032020.pl   segment 3: P5
 *
 * All files are pipe-delimited, unquoted, latin-1. Geography and segment
 * rows join on LOGRECNO. Only block rows (SUMLEV 750) are kept.
 *
 * Reference:
 * https://www2.census.gov/programs-surveys/decennial/2020/technical-documentation/complete-tech-docs/summary-file/2020Census_PL94_171Redistricting_StatesTechDoc_English.pdf
 */

import { createReadStream } from 'node:fs';
import JSZip from 'jszip';
import type { CensusTableData, CensusValue } from '../core/types/dataset.js';
import { SUMMARY_LEVEL_CODES } from '../core/types/geography.js';
import { isBlockGeoid, stripGeoIdPrefix } from '../core/geoid.js';
import { createLogger } from '../core/utils/logger.js';
import { forEachDelimitedRow, parseCensusNumber } from './delimited.js';

const logger = createLogger({ module: 'pl94171-parser' });

/** Geographic header columns (0-based) */
const GEO_COLUMNS = {
  sumlev: 2,
  logrecno: 7,
  geoid: 8,
  geocode: 9,
} as const;

/** Segment files: FILEID|STUSAB|CHARITER|CIFSN|LOGRECNO|values... */
const SEGMENT_LOGRECNO_COLUMN = 4;
const SEGMENT_VALUE_OFFSET = 5;

function tableColumns(table: string, count: number): string[] {
  return Array.from({ length: count }, (_, i) => `${table}_${String(i + 1).padStart(3, '0')}N`);
}

/**
 * Variable columns per segment number, in file order
 */
export const PL_SEGMENT_COLUMNS: ReadonlyMap<number, readonly string[]> = new Map([
  [1, [...tableColumns('P1', 71), ...tableColumns('P2', 73)]],
  [2, [...tableColumns('P3', 71), ...tableColumns('P4', 73), ...tableColumns('H1', 3)]],
  [3, tableColumns('P5', 10)],
]);

/**
 * Every variable code the legacy files carry
 */
export const PL_ALL_COLUMNS: readonly string[] = [...PL_SEGMENT_COLUMNS.values()].flat();

/**
 * Openers for the geo header and each present segment
 */
export interface PlFileSource {
  /** Label for log and error messages */
  readonly label: string;
  readonly geo: () => NodeJS.ReadableStream;
  readonly segments: ReadonlyMap<number, () => NodeJS.ReadableStream>;
}

const DELIMITED_OPTIONS = {
  delimiter: '|',
  quote: false,
  encoding: 'latin1',
} as const;

const GEO_FILE_SUFFIX = 'geo2020.pl';

function segmentFileSuffix(segment: number): string {
  return `${String(segment).padStart(5, '0')}2020.pl`;
}

/**
 * Source over extracted files in a directory listing
 *
 * @param files - Absolute paths of the directory's files
 * @returns Source, or null when no geographic header is present
 */
export function plSourceFromFiles(files: readonly string[]): PlFileSource | null {
  const geoPath = files.find((file) => file.toLowerCase().endsWith(GEO_FILE_SUFFIX));
  if (geoPath === undefined) return null;

  const prefix = geoPath.slice(0, -GEO_FILE_SUFFIX.length);
  const segments = new Map<number, () => NodeJS.ReadableStream>();
  for (const segment of PL_SEGMENT_COLUMNS.keys()) {
    const expected = `${prefix}${segmentFileSuffix(segment)}`.toLowerCase();
    const path = files.find((file) => file.toLowerCase() === expected);
    if (path !== undefined) {
      segments.set(segment, () => createReadStream(path));
    }
  }

  return { label: geoPath, geo: () => createReadStream(geoPath), segments };
}

/**
 * Source over the entries of a `xx2020.pl.zip` archive
 *
 * @returns Source, or null when the archive has no geographic header
 */
export async function plSourceFromZip(data: Buffer, label: string): Promise<PlFileSource | null> {
  const zip = await JSZip.loadAsync(data);
  const names = Object.keys(zip.files).filter((name) => !zip.files[name].dir);

  const geoName = names.find((name) => name.toLowerCase().endsWith(GEO_FILE_SUFFIX));
  if (geoName === undefined) return null;

  const open = (name: string) => (): NodeJS.ReadableStream =>
    zip.files[name].nodeStream('nodebuffer');

  const prefix = geoName.slice(0, -GEO_FILE_SUFFIX.length).toLowerCase();
  const segments = new Map<number, () => NodeJS.ReadableStream>();
  for (const segment of PL_SEGMENT_COLUMNS.keys()) {
    const expected = `${prefix}${segmentFileSuffix(segment)}`;
    const name = names.find((entry) => entry.toLowerCase() === expected);
    if (name !== undefined) {
      segments.set(segment, open(name));
    }
  }

  return { label, geo: open(geoName), segments };
}

/**
 * Parse block-level PL 94-171 counts
 *
 * @param columns - Variable codes to keep; segments carrying none are not read
 * @throws Error on a malformed block GEOID or a requested segment that is missing
 */
export async function parsePl94171(
  source: PlFileSource,
  columns: readonly string[]
): Promise<CensusTableData> {
  const startTime = Date.now();
  const summaryLevel = SUMMARY_LEVEL_CODES.block;

  const blockByLogrecno = new Map<string, string>();
  await forEachDelimitedRow(source.geo(), DELIMITED_OPTIONS, (row) => {
    if (row[GEO_COLUMNS.sumlev] !== summaryLevel) return;

    const geocode =
      (row[GEO_COLUMNS.geocode] ?? '').trim() || stripGeoIdPrefix(row[GEO_COLUMNS.geoid] ?? '');
    if (!isBlockGeoid(geocode)) {
      throw new Error(`Invalid block GEOID in ${source.label}: "${geocode}"`);
    }
    blockByLogrecno.set(row[GEO_COLUMNS.logrecno], geocode);
  });

  const wanted = new Set(columns);
  const variables = PL_ALL_COLUMNS.filter((code) => wanted.has(code));
  const outputIndex = new Map(variables.map((code, index) => [code, index]));

  const rows = new Map<string, CensusValue[]>();
  for (const geoid of blockByLogrecno.values()) {
    rows.set(geoid, new Array<CensusValue>(variables.length).fill(null));
  }

  for (const [segment, segmentColumns] of PL_SEGMENT_COLUMNS) {
    // [position in segment row, position in output row]
    const picks: Array<readonly [number, number]> = [];
    segmentColumns.forEach((code, position) => {
      const target = outputIndex.get(code);
      if (target !== undefined) picks.push([SEGMENT_VALUE_OFFSET + position, target]);
    });
    if (picks.length === 0) continue;

    const open = source.segments.get(segment);
    if (open === undefined) {
      throw new Error(`Segment ${segment} missing from ${source.label}`);
    }

    await forEachDelimitedRow(open(), DELIMITED_OPTIONS, (row) => {
      const geoid = blockByLogrecno.get(row[SEGMENT_LOGRECNO_COLUMN]);
      if (geoid === undefined) return;
      const values = rows.get(geoid);
      if (values === undefined) return;
      for (const [from, to] of picks) {
        values[to] = parseCensusNumber(row[from]);
      }
    });
  }

  logger.info('PL 94-171 blocks parsed', {
    source: source.label,
    blockCount: rows.size,
    variableCount: variables.length,
    durationMs: Date.now() - startTime,
  });

  return { dataset: 'pl94171', level: 'block', variables, rows };
}
