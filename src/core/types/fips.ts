/**
 * FIPS Code Mappings and Utilities
 *
 * US state FIPS code conversions. Includes 50 states + DC + 5 territories.
 *
 * Source: US Census Bureau FIPS codes
 * https://www.census.gov/library/reference/code-lists/ansi.html
 */

import { z } from 'zod';
import { readDataFile } from '../utils/data-files.js';

const StateRowSchema = z.object({
  fips: z.string().regex(/^\d{2}$/),
  abbr: z.string().regex(/^[A-Z]{2}$/),
  name: z.string().min(1),
});

const STATES = readDataFile('states.json', z.array(StateRowSchema));

/**
 * State FIPS code → State name
 */
export const STATE_FIPS_TO_NAME: Readonly<Record<string, string>> = Object.fromEntries(
  STATES.map((row) => [row.fips, row.name])
);

/**
 * State abbreviation → FIPS code
 */
export const STATE_ABBR_TO_FIPS: Readonly<Record<string, string>> = Object.fromEntries(
  STATES.map((row) => [row.abbr, row.fips])
);

/**
 * State FIPS code → abbreviation
 */
export const STATE_FIPS_TO_ABBR: Readonly<Record<string, string>> = Object.fromEntries(
  STATES.map((row) => [row.fips, row.abbr])
);

const STATE_NAME_TO_FIPS: ReadonlyMap<string, string> = new Map(
  STATES.map((row) => [row.name.toUpperCase(), row.fips])
);

/**
 * Get state name from FIPS code
 *
 * @example
 * getStateNameFromFips('06') // 'California'
 * getStateNameFromFips('99') // null
 */
export function getStateNameFromFips(fips: string): string | null {
  return STATE_FIPS_TO_NAME[fips] ?? null;
}

/**
 * Get FIPS code from state abbreviation
 *
 * @example
 * getFipsFromStateAbbr('CA') // '06'
 * getFipsFromStateAbbr('XX') // null
 */
export function getFipsFromStateAbbr(abbr: string): string | null {
  return STATE_ABBR_TO_FIPS[abbr.toUpperCase()] ?? null;
}

/**
 * Get USPS abbreviation from FIPS code
 */
export function getStateAbbrFromFips(fips: string): string | null {
  return STATE_FIPS_TO_ABBR[fips] ?? null;
}

/**
 * Resolve a FIPS code, USPS abbreviation or state name to a 2-digit FIPS code
 *
 * @example
 * normalizeState('CA')         // '06'
 * normalizeState('california') // '06'
 * normalizeState('6')          // '06'
 * normalizeState('Atlantis')   // null
 */
export function normalizeState(input: string): string | null {
  const value = input.trim().replace(/\./g, '');
  if (value.length === 0) return null;

  if (/^\d{1,2}$/.test(value)) {
    const fips = value.padStart(2, '0');
    return STATE_FIPS_TO_NAME[fips] !== undefined ? fips : null;
  }

  const upper = value.toUpperCase().replace(/\s+/g, ' ');
  return STATE_ABBR_TO_FIPS[upper] ?? STATE_NAME_TO_FIPS.get(upper) ?? null;
}
