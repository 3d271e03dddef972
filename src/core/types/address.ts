/**
 * Address Types
 *
 * Labeled tokens from the tokenizer, the canonical key the matcher compares
 * on, and the street-segment records loaded from TIGER ADDRFEAT.
 */

/**
 * Labeled fields of a parsed address. Absent fields mean the input did not
 * carry that information; they are not errors by themselves.
 */
export interface AddressToken {
  readonly houseNumber?: string;
  readonly preDirectional?: string;
  readonly streetName?: string;
  readonly streetType?: string;
  readonly postDirectional?: string;
  readonly occupancyType?: string;
  readonly occupancyId?: string;
  readonly city?: string;
  readonly state?: string;
  readonly zip?: string;
}

/**
 * Canonical comparison key.
 *
 * Street type and directional use USPS abbreviations (ST, AVE, N, SW),
 * the same convention TIGER uses in FULLNAME.
 */
export interface NormalizedKey {
  /** 2-digit state FIPS, or null when neither the address nor a hint names a state */
  readonly stateFips: string | null;
  readonly streetName: string;
  readonly streetType: string | null;
  readonly directional: string | null;
  readonly houseNumber: number;
  readonly zip: string | null;
}

/**
 * Address parity declared for one side of a segment
 * - O: odd numbers only
 * - E: even numbers only
 * - B: both
 */
export type Parity = 'O' | 'E' | 'B';

/**
 * Side of the street relative to segment digitizing direction
 */
export type Side = 'L' | 'R';

/**
 * One street segment with its house-number ranges.
 *
 * Ranges are inclusive and may be descending. A null bound means the side
 * carries no addresses.
 */
export interface AddressRangeRecord {
  /** TIGER LINEARID (or a synthetic id) */
  readonly segmentId: string;
  /** Normalized base name, e.g. "MAIN" */
  readonly streetName: string;
  readonly streetType: string | null;
  readonly directional: string | null;
  /** Source label, e.g. "N Main St" */
  readonly fullName: string;
  readonly leftFrom: number | null;
  readonly leftTo: number | null;
  readonly rightFrom: number | null;
  readonly rightTo: number | null;
  /** Declared parity; null means infer from the range endpoints */
  readonly leftParity: Parity | null;
  readonly rightParity: Parity | null;
  readonly leftZip: string | null;
  readonly rightZip: string | null;
  readonly startLon: number;
  readonly startLat: number;
  readonly endLon: number;
  readonly endLat: number;
  /** Full segment polyline ([lon, lat] vertices) when the source has one */
  readonly path: ReadonlyArray<readonly [number, number]> | null;
  /** Side block GEOIDs, when the source carries them */
  readonly leftGeoidTractBlock: string | null;
  readonly rightGeoidTractBlock: string | null;
}
