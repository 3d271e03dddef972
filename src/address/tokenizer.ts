/**
 * Rule-based US address tokenizer
 *
 * Splits free text into labeled tokens:
 *
 *   "123 N Main St Apt 4, Los Angeles, CA 90012"
 *   → { houseNumber: "123", preDirectional: "N", streetName: "MAIN", streetType: "ST",
 *       occupancyType: "APT", occupancyId: "4", city: "LOS ANGELES", state: "CA", zip: "90012" }
 *
 * Comma-separated input is read as "street line, [unit,] city, state zip".
 * Without commas, ZIP and state are taken from the end and any words after
 * the street type become the city. Without commas or a ZIP, a trailing state
 * is taken only when a street type and city words come before it, so
 * "123 Oak Ct" keeps CT as the street type.
 *
 * Conflicting repeated labels (two ZIP codes, two states, two unit
 * designators) yield `ambiguous_parse` instead of a guess.
 */

import type { AddressToken } from '../core/types/address.js';
import { normalizeState } from '../core/types/fips.js';
import { canonicalDirectional, canonicalStreetType } from './normalizer.js';

export type TokenizeFailureReason = 'incomplete_address' | 'ambiguous_parse';

export type TokenizeResult =
  | { readonly ok: true; readonly token: AddressToken }
  | { readonly ok: false; readonly reason: TokenizeFailureReason; readonly detail: string };

/**
 * Text → labeled tokens
 */
export interface AddressTokenizer {
  tokenize(text: string): TokenizeResult;
}

type MutableToken = { -readonly [K in keyof AddressToken]: AddressToken[K] };

const OCCUPANCY_TYPES: ReadonlySet<string> = new Set([
  '#',
  'APT',
  'APARTMENT',
  'BLDG',
  'BUILDING',
  'DEPT',
  'FL',
  'FLOOR',
  'LOT',
  'RM',
  'ROOM',
  'SPC',
  'SPACE',
  'STE',
  'SUITE',
  'TRLR',
  'UNIT',
]);

const ZIP_PATTERN = /^\d{5}(?:-\d{4})?$/;
const HOUSE_NUMBER_PATTERN = /^\d+[A-Z]?(?:-\d+[A-Z]?)?$/;
const FRACTION_PATTERN = /^\d\/\d$/;

function splitWords(text: string): string[] {
  return text
    .toUpperCase()
    .replace(/\./g, '')
    .replace(/#/g, ' # ')
    .replace(/[^\w\s#/-]/g, ' ')
    .split(/\s+/)
    .filter((word) => word.length > 0);
}

function ambiguous(detail: string): TokenizeResult {
  return { ok: false, reason: 'ambiguous_parse', detail };
}

function isStateAbbreviation(word: string): boolean {
  return word.length === 2 && /^[A-Z]{2}$/.test(word) && normalizeState(word) !== null;
}

/**
 * Remove a trailing state (1-3 words) from `words`, leaving at least
 * `minRemaining` words behind.
 */
function takeTrailingState(words: string[], minRemaining: number): string | null {
  for (let n = 3; n >= 1; n--) {
    if (words.length - n < minRemaining) continue;
    const candidate = words.slice(words.length - n).join(' ');
    if (/\d/.test(candidate)) continue;
    if (normalizeState(candidate) !== null) {
      words.splice(words.length - n, n);
      return candidate;
    }
  }
  return null;
}

/**
 * Whether a street type appears after the house number with at least one
 * word following it.
 */
function hasWordsAfterStreetType(words: readonly string[]): boolean {
  const start = words.length > 0 && HOUSE_NUMBER_PATTERN.test(words[0]) ? 1 : 0;
  for (let i = start + 1; i < words.length - 1; i++) {
    if (OCCUPANCY_TYPES.has(words[i])) return false;
    if (canonicalStreetType(words[i]) !== null) return true;
  }
  return false;
}

interface Occupancy {
  readonly occupancyType: string;
  readonly occupancyId?: string;
}

function parseOccupancy(words: readonly string[]): Occupancy | null {
  if (words.length === 0 || !OCCUPANCY_TYPES.has(words[0])) return null;
  return words.length > 1
    ? { occupancyType: words[0], occupancyId: words.slice(1).join(' ') }
    : { occupancyType: words[0] };
}

/**
 * Label the words of the street line.
 *
 * @param collectCity - Treat words after the street type as the city
 */
function parseStreetLine(
  words: readonly string[],
  collectCity: boolean,
  fields: MutableToken
): TokenizeResult | null {
  let index = 0;

  if (words.length > 0 && HOUSE_NUMBER_PATTERN.test(words[0])) {
    fields.houseNumber = words[0];
    index = 1;
    if (words.length > 1 && FRACTION_PATTERN.test(words[1])) {
      fields.houseNumber = `${words[0]} ${words[1]}`;
      index = 2;
    }
  }

  let occupancyIndex = words.length;
  for (let i = index; i < words.length; i++) {
    if (OCCUPANCY_TYPES.has(words[i])) {
      occupancyIndex = i;
      break;
    }
  }

  const leftover: string[] = [];
  if (occupancyIndex < words.length) {
    if (fields.occupancyType !== undefined) {
      return ambiguous('repeated unit designator');
    }
    fields.occupancyType = words[occupancyIndex];
    const idWord = words[occupancyIndex + 1];
    if (idWord !== undefined && !OCCUPANCY_TYPES.has(idWord)) {
      fields.occupancyId = idWord;
    }
    const afterUnit = words.slice(occupancyIndex + (fields.occupancyId ? 2 : 1));
    if (afterUnit.some((word) => OCCUPANCY_TYPES.has(word))) {
      return ambiguous('repeated unit designator');
    }
    leftover.push(...afterUnit);
  }

  const core = words.slice(index, occupancyIndex);

  if (
    core.length >= 2 &&
    canonicalDirectional(core[0]) !== null &&
    !(core.length === 2 && canonicalStreetType(core[1]) !== null)
  ) {
    fields.preDirectional = core.shift();
  }

  let nameWords: string[] = core;
  if (collectCity) {
    const typeIndex = core.findIndex((word, i) => i >= 1 && canonicalStreetType(word) !== null);
    if (typeIndex >= 1) {
      fields.streetType = core[typeIndex];
      nameWords = core.slice(0, typeIndex);
      const rest = core.slice(typeIndex + 1);
      if (rest.length > 0 && canonicalDirectional(rest[0]) !== null && fields.preDirectional === undefined) {
        fields.postDirectional = rest.shift();
      }
      leftover.unshift(...rest);
    }
  } else {
    if (
      core.length >= 2 &&
      canonicalDirectional(core[core.length - 1]) !== null &&
      (core.length >= 3 || canonicalStreetType(core[0]) === null)
    ) {
      fields.postDirectional = core.pop();
    }
    if (core.length >= 2 && canonicalStreetType(core[core.length - 1]) !== null) {
      fields.streetType = core.pop();
    }
    nameWords = core;
  }

  if (nameWords.length > 0) {
    fields.streetName = nameWords.join(' ');
  } else if (fields.preDirectional !== undefined) {
    fields.streetName = fields.preDirectional;
    delete fields.preDirectional;
  }

  if (collectCity && leftover.length > 0 && fields.city === undefined) {
    fields.city = leftover.join(' ');
  }

  return null;
}

/**
 * Tokenize a free-text US address
 */
export function tokenizeAddress(text: string): TokenizeResult {
  const parts = text
    .split(',')
    .map(splitWords)
    .filter((words) => words.length > 0);

  if (parts.length === 0) {
    return { ok: false, reason: 'incomplete_address', detail: 'empty address' };
  }

  const fields: MutableToken = {};
  const hasLocalityParts = parts.length > 1;
  const last = parts[parts.length - 1];

  // ZIP
  const zips: string[] = [];
  while (last.length > (hasLocalityParts ? 0 : 1) && ZIP_PATTERN.test(last[last.length - 1])) {
    const zip = last.pop();
    if (zip !== undefined) zips.unshift(zip);
  }
  if (zips.length > 1) {
    return ambiguous(`repeated ZIP code: ${zips.join(', ')}`);
  }
  if (zips.length === 1) {
    fields.zip = zips[0];
  }

  // State
  if (hasLocalityParts || zips.length > 0) {
    const state = takeTrailingState(last, hasLocalityParts ? 0 : 2);
    if (state !== null) {
      fields.state = state;
      if (hasLocalityParts && last.length > 0 && isStateAbbreviation(last[last.length - 1])) {
        return ambiguous(`repeated state: ${last[last.length - 1]}, ${state}`);
      }
    }
  } else {
    const remaining = [...last];
    const state = takeTrailingState(remaining, 2);
    if (state !== null && hasWordsAfterStreetType(remaining)) {
      last.splice(remaining.length);
      fields.state = state;
    }
  }

  // City and unit parts
  if (hasLocalityParts) {
    let cityIndex = parts.length - 1;
    if (last.length > 0) {
      fields.city = last.join(' ');
    } else if (parts.length >= 3 && parseOccupancy(parts[parts.length - 2]) === null) {
      cityIndex = parts.length - 2;
      fields.city = parts[cityIndex].join(' ');
    }

    for (const middle of parts.slice(1, cityIndex)) {
      const occupancy = parseOccupancy(middle);
      if (occupancy === null) continue;
      if (fields.occupancyType !== undefined) {
        return ambiguous('repeated unit designator');
      }
      fields.occupancyType = occupancy.occupancyType;
      if (occupancy.occupancyId !== undefined) {
        fields.occupancyId = occupancy.occupancyId;
      }
    }
  }

  const failure = parseStreetLine(parts[0], !hasLocalityParts, fields);
  if (failure !== null) {
    return failure;
  }

  return { ok: true, token: fields };
}

/**
 * Default tokenizer used by the geocoder
 */
export class RuleBasedTokenizer implements AddressTokenizer {
  tokenize(text: string): TokenizeResult {
    return tokenizeAddress(text);
  }
}
