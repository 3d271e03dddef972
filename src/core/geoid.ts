/**
 * GEOID parsing and truncation
 *
 * Pure string operations over the 15-digit block GEOID.
 */

import { GEOID_LENGTH, type GeoLevel } from './types/geography.js';

/**
 * Components of a block GEOID.
 *
 * Field naming follows the result record: `countyFips`, `tractGeoid` and
 * `blockGroupGeoid` are full prefixes; `county`, `tract`, `blockGroup` and
 * `block` are the local codes within their parent.
 */
export interface GeoidComponents {
  readonly geoid: string;
  /** 2-digit state FIPS */
  readonly state: string;
  /** 3-digit county code within the state */
  readonly county: string;
  /** 5-digit county FIPS (state + county) */
  readonly countyFips: string;
  /** 6-digit tract code within the county */
  readonly tract: string;
  /** 11-digit tract GEOID */
  readonly tractGeoid: string;
  /** 1-digit block group code within the tract */
  readonly blockGroup: string;
  /** 12-digit block group GEOID */
  readonly blockGroupGeoid: string;
  /** 4-digit block code within the tract */
  readonly block: string;
  /** 15-digit block GEOID */
  readonly blockGeoid: string;
}

const BLOCK_GEOID_PATTERN = /^\d{15}$/;

/**
 * True when the value is a 15-digit block GEOID
 */
export function isBlockGeoid(value: string): boolean {
  return BLOCK_GEOID_PATTERN.test(value);
}

/**
 * Split a 15-digit block GEOID into its hierarchy
 *
 * @returns Components, or null if the value is not a block GEOID
 */
export function parseBlockGeoid(geoid: string): GeoidComponents | null {
  if (!isBlockGeoid(geoid)) {
    return null;
  }

  return {
    geoid,
    state: geoid.slice(0, 2),
    county: geoid.slice(2, 5),
    countyFips: geoid.slice(0, 5),
    tract: geoid.slice(5, 11),
    tractGeoid: geoid.slice(0, 11),
    blockGroup: geoid.slice(11, 12),
    blockGroupGeoid: geoid.slice(0, 12),
    block: geoid.slice(11, 15),
    blockGeoid: geoid,
  };
}

/**
 * Truncate a GEOID to the prefix that identifies the given level
 */
export function truncateGeoid(geoid: string, level: GeoLevel): string {
  return geoid.slice(0, GEOID_LENGTH[level]);
}

/**
 * Infer the summary level from a GEOID's length
 */
export function levelFromGeoid(geoid: string): GeoLevel | null {
  if (!/^\d+$/.test(geoid)) return null;

  switch (geoid.length) {
    case 2:
      return 'state';
    case 5:
      return 'county';
    case 11:
      return 'tract';
    case 12:
      return 'block_group';
    case 15:
      return 'block';
    default:
      return null;
  }
}

/**
 * Strip the summary-level prefix from a Census "GEO_ID" value
 * (e.g. "7500000US060371234001001" → "060371234001001")
 */
export function stripGeoIdPrefix(value: string): string {
  const marker = value.indexOf('US');
  return marker >= 0 ? value.slice(marker + 2) : value;
}
