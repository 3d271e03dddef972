/**
 * Output Formatting for CLI Commands
 *
 * Supports: table, json, ndjson, csv formats
 *
 * @module cli/lib/output
 */

import type { GeocodeResult } from '../../core/types/result.js';

/**
 * Output format options
 */
export type OutputFormat = 'table' | 'json' | 'ndjson' | 'csv';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json', 'ndjson', 'csv'];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === 'string' && OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Column definition for table and CSV output
 */
export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly width?: number;
  readonly align?: 'left' | 'right';
  readonly formatter?: (value: unknown) => string;
}

/**
 * Flat row shape shared by the table and CSV formats
 */
export type OutputRow = Readonly<Record<string, unknown>>;

function cellText(column: TableColumn, row: OutputRow): string {
  const value = row[column.key];
  return column.formatter ? column.formatter(value) : String(value ?? '');
}

/**
 * Format data as a table
 */
export function formatTable(data: readonly OutputRow[], columns: readonly TableColumn[]): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const widths = columns.map((col) => {
    if (col.width) return col.width;
    const maxDataWidth = Math.max(...data.map((row) => cellText(col, row).length));
    return Math.max(col.header.length, maxDataWidth);
  });

  const headerRow = columns
    .map((col, i) => padCell(col.header, widths[i], col.align ?? 'left'))
    .join(' | ');

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  const dataRows = data.map((row) =>
    columns.map((col, i) => padCell(cellText(col, row), widths[i], col.align ?? 'left')).join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

function padCell(value: string, width: number, align: 'left' | 'right'): string {
  const truncated = value.length > width ? value.slice(0, width - 1) + '~' : value;
  return align === 'right' ? truncated.padStart(width) : truncated.padEnd(width);
}

/**
 * Format data as JSON
 */
export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Format data as NDJSON
 */
export function formatNdjson<T>(data: readonly T[]): string {
  return data.map((item) => JSON.stringify(item)).join('\n');
}

/**
 * Format data as CSV
 */
export function formatCsv(data: readonly OutputRow[], columns: readonly TableColumn[]): string {
  return [formatCsvHeader(columns), ...data.map((row) => formatCsvRow(row, columns))].join('\n');
}

/**
 * CSV header line
 */
export function formatCsvHeader(columns: readonly TableColumn[]): string {
  return columns.map((c) => escapeCSV(c.header)).join(',');
}

/**
 * One CSV data line
 */
export function formatCsvRow(row: OutputRow, columns: readonly TableColumn[]): string {
  return columns.map((col) => escapeCSV(cellText(col, row))).join(',');
}

/**
 * Escape a value for CSV output
 */
export function escapeCSV(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Format data in the specified format
 */
export function formatOutput(
  data: readonly OutputRow[],
  format: OutputFormat,
  columns: readonly TableColumn[]
): string {
  switch (format) {
    case 'json':
      return formatJson(data);
    case 'ndjson':
      return formatNdjson(data);
    case 'csv':
      return formatCsv(data, columns);
    case 'table':
      return formatTable(data, columns);
  }
}

// ============================================================================
// Geocode results
// ============================================================================

/**
 * Result fields written before the variable columns, in order
 */
export const RESULT_COLUMNS: readonly TableColumn[] = [
  { key: 'inputAddress', header: 'input_address' },
  { key: 'matchedStreet', header: 'matched_street' },
  { key: 'latitude', header: 'latitude', align: 'right' },
  { key: 'longitude', header: 'longitude', align: 'right' },
  { key: 'matchType', header: 'match_type' },
  { key: 'matchScore', header: 'match_score', align: 'right' },
  { key: 'unmatchedReason', header: 'unmatched_reason' },
  { key: 'geoLevel', header: 'geo_level' },
  { key: 'geoid', header: 'geoid' },
  { key: 'stateFips', header: 'state_fips' },
  { key: 'countyFips', header: 'county_fips' },
  { key: 'tract', header: 'tract' },
  { key: 'blockGroup', header: 'block_group' },
  { key: 'block', header: 'block' },
  { key: 'error', header: 'error' },
];

/**
 * Result columns followed by one column per variable code
 */
export function resultColumns(variableCodes: readonly string[]): TableColumn[] {
  return [
    ...RESULT_COLUMNS,
    ...variableCodes.map((code) => ({ key: code, header: code, align: 'right' as const })),
  ];
}

/**
 * Flatten a result into one row: scalar fields, then each variable under its code
 */
export function flattenResult(result: GeocodeResult): OutputRow {
  return {
    inputAddress: result.inputAddress,
    matchedStreet: result.matchedStreet,
    latitude: result.latitude,
    longitude: result.longitude,
    matchType: result.matchType,
    matchScore: result.matchScore,
    unmatchedReason: result.unmatchedReason,
    geoLevel: result.geoLevel,
    geoid: result.geoid,
    stateFips: result.stateFips,
    countyFips: result.countyFips,
    tract: result.tract,
    blockGroup: result.blockGroup,
    block: result.block,
    error: result.error?.message ?? null,
    ...result.variables,
  };
}

/**
 * Format geocode results; json and ndjson keep the nested result shape
 */
export function formatResults(
  results: readonly GeocodeResult[],
  format: OutputFormat,
  variableCodes: readonly string[]
): string {
  switch (format) {
    case 'json':
      return formatJson(results);
    case 'ndjson':
      return formatNdjson(results);
    case 'csv':
      return formatCsv(results.map(flattenResult), resultColumns(variableCodes));
    case 'table':
      return formatTable(results.map(flattenResult), resultColumns(variableCodes));
  }
}

/**
 * Print output to stdout
 */
export function printOutput(output: string): void {
  console.log(output);
}

/**
 * Print error to stderr
 */
export function printError(message: string): void {
  console.error(`Error: ${message}`);
}
