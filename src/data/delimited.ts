/**
 * Delimited-text helpers shared by the PL 94-171 and ACS readers
 */

import { parse, type Options } from 'csv-parse';
import type { CensusValue } from '../core/types/dataset.js';

/**
 * Census API sentinels for suppressed or unavailable estimates
 * (-222222222, -333333333, -555555555, -666666666, -888888888, -999999999)
 */
const SENTINEL_CEILING = -222222222;

function isStringRow(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((cell) => typeof cell === 'string');
}

/**
 * Stream rows of a delimited source, invoking `onRow` for each
 *
 * Source stream errors reject the returned promise.
 */
export async function forEachDelimitedRow(
  source: NodeJS.ReadableStream,
  options: Options,
  onRow: (row: readonly string[]) => void
): Promise<void> {
  const parser = parse({ relax_column_count: true, ...options });
  source.on('error', (error: Error) => parser.destroy(error));

  for await (const record of source.pipe(parser)) {
    const row: unknown = record;
    if (isStringRow(row)) {
      onRow(row);
    }
  }
}

/**
 * Parse a census cell
 *
 * @returns Number, or null for blanks, non-numeric text and sentinel values
 */
export function parseCensusNumber(raw: string | undefined): CensusValue {
  if (raw === undefined) return null;
  const trimmed = raw.trim();
  if (trimmed.length === 0) return null;

  const value = Number(trimmed);
  if (!Number.isFinite(value) || value <= SENTINEL_CEILING) {
    return null;
  }
  return value;
}
