/**
 * Token Normalizer
 *
 * Turns labeled address tokens into the canonical key the range matcher
 * compares on. The same rules canonicalize TIGER FULLNAME values, so both
 * sides of the comparison share one convention:
 *
 *   "123 North Main Street" → { streetName: "MAIN", streetType: "ST", directional: "N", houseNumber: 123 }
 *   "W First Ave"           → { streetName: "1ST",  streetType: "AVE", directional: "W" }
 *
 * Street types map to USPS Publication 28 abbreviations (data/street-types.json).
 */

import { z } from 'zod';
import type { AddressToken, NormalizedKey } from '../core/types/address.js';
import { normalizeState } from '../core/types/fips.js';
import { readDataFile } from '../core/utils/data-files.js';

/**
 * Street type spelling → canonical abbreviation
 */
const STREET_TYPES: Readonly<Record<string, string>> = readDataFile(
  'street-types.json',
  z.record(z.string(), z.string())
);

/**
 * Directional spelling → canonical abbreviation
 */
const DIRECTIONALS: Readonly<Record<string, string>> = {
  N: 'N',
  S: 'S',
  E: 'E',
  W: 'W',
  NE: 'NE',
  NW: 'NW',
  SE: 'SE',
  SW: 'SW',
  NO: 'N',
  SO: 'S',
  NORTH: 'N',
  SOUTH: 'S',
  EAST: 'E',
  WEST: 'W',
  NORTHEAST: 'NE',
  NORTHWEST: 'NW',
  SOUTHEAST: 'SE',
  SOUTHWEST: 'SW',
};

/**
 * Spelled-out ordinals → numeric form used by TIGER
 */
const ORDINALS: Readonly<Record<string, string>> = {
  FIRST: '1ST',
  SECOND: '2ND',
  THIRD: '3RD',
  FOURTH: '4TH',
  FIFTH: '5TH',
  SIXTH: '6TH',
  SEVENTH: '7TH',
  EIGHTH: '8TH',
  NINTH: '9TH',
  TENTH: '10TH',
  ELEVENTH: '11TH',
  TWELFTH: '12TH',
};

export type NormalizeResult =
  | { readonly ok: true; readonly key: NormalizedKey }
  | { readonly ok: false; readonly reason: 'incomplete_address'; readonly detail: string };

/**
 * Street label split into its comparable parts
 */
export interface StreetLabel {
  readonly streetName: string;
  readonly streetType: string | null;
  readonly directional: string | null;
}

/**
 * Uppercase, strip punctuation except hyphens, collapse whitespace
 */
export function cleanText(value: string): string {
  return value
    .toUpperCase()
    .replace(/[^\w\s-]/g, '')
    .replace(/_/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Canonical street type abbreviation, or null if the word is not a street type
 */
export function canonicalStreetType(value: string): string | null {
  return STREET_TYPES[cleanText(value)] ?? null;
}

/**
 * Canonical directional abbreviation, or null if the word is not a directional
 */
export function canonicalDirectional(value: string): string | null {
  return DIRECTIONALS[cleanText(value)] ?? null;
}

/**
 * Normalize a base street name (no type, no directional)
 */
export function normalizeStreetName(value: string): string {
  return cleanText(value)
    .split(' ')
    .filter((word) => word.length > 0)
    .map((word) => ORDINALS[word] ?? word)
    .join(' ');
}

/**
 * Leading integer of a house number token
 *
 * @example
 * parseHouseNumber('123')     // 123
 * parseHouseNumber('123A')    // 123
 * parseHouseNumber('123-125') // 123
 * parseHouseNumber('A12')     // null
 */
export function parseHouseNumber(value: string): number | null {
  const match = /^\s*(\d+)/.exec(value);
  if (!match) return null;
  const parsed = Number.parseInt(match[1], 10);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

/**
 * First five digits of a ZIP or ZIP+4
 */
export function normalizeZip(value: string | undefined | null): string | null {
  if (!value) return null;
  const match = /^\s*(\d{5})/.exec(String(value));
  return match ? match[1] : null;
}

/**
 * Split a full street label ("N Main St", "Main St W", "W 1st Ave") into
 * base name, type and directional.
 *
 * A leading or trailing directional is taken only when a name word remains;
 * a trailing street type likewise ("North St" keeps NORTH as its name).
 */
export function splitStreetLabel(label: string): StreetLabel {
  const words = cleanText(label).split(' ').filter((word) => word.length > 0);
  let directional: string | null = null;
  let streetType: string | null = null;

  if (words.length > 1) {
    const leading = DIRECTIONALS[words[0]];
    if (leading && !isTypeOnlyRemainder(words.slice(1))) {
      directional = leading;
      words.shift();
    }
  }

  if (directional === null && words.length > 1) {
    const trailing = DIRECTIONALS[words[words.length - 1]];
    if (trailing && !isTypeOnlyRemainder(words.slice(0, -1))) {
      directional = trailing;
      words.pop();
    }
  }

  if (words.length > 1) {
    const type = STREET_TYPES[words[words.length - 1]];
    if (type) {
      streetType = type;
      words.pop();
    }
  }

  return {
    streetName: words.map((word) => ORDINALS[word] ?? word).join(' '),
    streetType,
    directional,
  };
}

function isTypeOnlyRemainder(words: readonly string[]): boolean {
  return words.length === 1 && STREET_TYPES[words[0]] !== undefined;
}

/**
 * Normalize parsed address tokens into a matching key.
 *
 * @param token - Labeled tokens from the tokenizer
 * @param stateHint - State to assume when the address names none (FIPS, USPS code or name)
 */
export function normalizeAddress(token: AddressToken, stateHint?: string | null): NormalizeResult {
  if (!token.houseNumber || token.houseNumber.trim().length === 0) {
    return { ok: false, reason: 'incomplete_address', detail: 'missing house number' };
  }
  if (!token.streetName || cleanText(token.streetName).length === 0) {
    return { ok: false, reason: 'incomplete_address', detail: 'missing street name' };
  }

  const houseNumber = parseHouseNumber(token.houseNumber);
  if (houseNumber === null) {
    return {
      ok: false,
      reason: 'incomplete_address',
      detail: `non-numeric house number "${token.houseNumber}"`,
    };
  }

  const directionalToken = token.preDirectional ?? token.postDirectional;
  const directional = directionalToken ? canonicalDirectional(directionalToken) : null;
  const streetType = token.streetType
    ? canonicalStreetType(token.streetType) ?? cleanText(token.streetType)
    : null;

  const stateSource = token.state ?? stateHint ?? null;
  const stateFips = stateSource ? normalizeState(stateSource) : null;

  return {
    ok: true,
    key: {
      stateFips,
      streetName: normalizeStreetName(token.streetName),
      streetType,
      directional,
      houseNumber,
      zip: normalizeZip(token.zip),
    },
  };
}
