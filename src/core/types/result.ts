/**
 * Geocode Result Types
 */

import type { AddressToken, Side } from './address.js';
import type { CensusValue } from './dataset.js';
import type { ErrorInfo } from './errors.js';
import type { GeoLevel } from './geography.js';

/**
 * How the coordinate was obtained
 * - exact: house number falls inside a matched segment's range
 * - interpolated: placed on the nearest range of a matched street
 * - unmatched: no coordinate
 */
export type MatchType = 'exact' | 'interpolated' | 'unmatched';

/**
 * Why a lookup produced no geography. Pipeline-local failures are return
 * states; dataset reasons appear only on batch rows.
 */
export type UnmatchedReason =
  | 'incomplete_address'
  | 'ambiguous_parse'
  | 'unknown_state'
  | 'no_match'
  | 'no_containment'
  | 'dataset_unavailable'
  | 'dataset_corrupt'
  | 'error';

/**
 * Output record for one address (or coordinate) lookup
 */
export interface GeocodeResult {
  readonly inputAddress: string;
  readonly parsedAddress: AddressToken | null;
  readonly matchedStreet: string | null;
  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly matchType: MatchType;
  /** 0..1; 0 when unmatched */
  readonly matchScore: number;
  readonly unmatchedReason: UnmatchedReason | null;
  readonly segmentId: string | null;
  readonly side: Side | null;
  readonly geoLevel: GeoLevel;
  /** Block GEOID truncated to geoLevel */
  readonly geoid: string | null;
  readonly stateFips: string | null;
  /** 5-digit county FIPS */
  readonly countyFips: string | null;
  /** 11-digit tract GEOID */
  readonly tract: string | null;
  /** 12-digit block group GEOID */
  readonly blockGroup: string | null;
  /** 4-digit block code (geoid[11:15]); only at block level */
  readonly block: string | null;
  readonly variables: Readonly<Record<string, CensusValue>>;
  /** Set on batch rows whose lookup failed for a systemic reason */
  readonly error?: ErrorInfo;
}

/**
 * Variable selection split by family
 */
export interface VariableSelection {
  readonly pl: readonly string[];
  readonly acs: readonly string[];
}
