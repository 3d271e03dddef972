/**
 * Address-Range Matcher
 *
 * Finds the street segment (and side) whose house-number range contains a
 * normalized address.
 *
 * MATCH LADDER (first tier with a containing range wins):
 * 1. exact               name + type + directional      ceiling 1.0
 * 2. type_relaxed        name + directional             ceiling 0.9
 * 3. directional_relaxed name + type                    ceiling 0.8
 *
 * Within a tier:
 * - ZIP narrowing: when the key has a ZIP and any candidate carries it on
 *   either side, only those candidates are considered
 * - Containment respects parity (declared O/E/B, else inferred from the
 *   range endpoints)
 * - Tightest span wins, then record insertion order, then left side
 *
 * FALLBACK:
 * When no tier contains the number but some tier has same-street
 * candidates, the nearest range (by distance to its closest endpoint) in the
 * highest such tier is returned as `interpolated` with a reduced score.
 */

import type {
  AddressRangeRecord,
  NormalizedKey,
  Parity,
  Side,
} from '../core/types/address.js';

export type MatchTier = 'exact' | 'type_relaxed' | 'directional_relaxed';

/**
 * Score ceiling per tier. Tunable; not part of any output contract.
 */
export const MATCH_SCORE_CEILINGS: Readonly<Record<MatchTier, number>> = {
  exact: 1.0,
  type_relaxed: 0.9,
  directional_relaxed: 0.8,
};

/**
 * Multiplier applied to the tier ceiling for nearest-range fallbacks
 */
export const FALLBACK_SCORE_FACTOR = 0.75;

const TIER_ORDER: readonly MatchTier[] = ['exact', 'type_relaxed', 'directional_relaxed'];

export interface RangeMatch {
  readonly record: AddressRangeRecord;
  readonly side: Side;
  readonly rangeFrom: number;
  readonly rangeTo: number;
  readonly tier: MatchTier;
  readonly matchType: 'exact' | 'interpolated';
  readonly score: number;
}

export type RangeMatchResult =
  | { readonly ok: true; readonly match: RangeMatch }
  | { readonly ok: false; readonly reason: 'no_match' };

interface SideRange {
  readonly position: number;
  readonly record: AddressRangeRecord;
  readonly side: Side;
  readonly from: number;
  readonly to: number;
  readonly parity: Parity | null;
}

/**
 * Whether a house number's parity is allowed on a side
 *
 * Declared parity wins. Without one, a range whose endpoints share parity
 * admits only that parity; a mixed range admits both.
 */
export function parityAllows(
  houseNumber: number,
  parity: Parity | null,
  from: number,
  to: number
): boolean {
  const houseIsOdd = Math.abs(houseNumber % 2) === 1;
  switch (parity) {
    case 'B':
      return true;
    case 'O':
      return houseIsOdd;
    case 'E':
      return !houseIsOdd;
    case null: {
      const fromIsOdd = Math.abs(from % 2) === 1;
      const toIsOdd = Math.abs(to % 2) === 1;
      return fromIsOdd === toIsOdd ? houseIsOdd === fromIsOdd : true;
    }
  }
}

function tierAccepts(tier: MatchTier, key: NormalizedKey, record: AddressRangeRecord): boolean {
  switch (tier) {
    case 'exact':
      return record.streetType === key.streetType && record.directional === key.directional;
    case 'type_relaxed':
      return record.directional === key.directional;
    case 'directional_relaxed':
      return record.streetType === key.streetType;
  }
}

function sideRanges(record: AddressRangeRecord, position: number): SideRange[] {
  const ranges: SideRange[] = [];
  if (record.leftFrom !== null && record.leftTo !== null) {
    ranges.push({
      position,
      record,
      side: 'L',
      from: record.leftFrom,
      to: record.leftTo,
      parity: record.leftParity,
    });
  }
  if (record.rightFrom !== null && record.rightTo !== null) {
    ranges.push({
      position,
      record,
      side: 'R',
      from: record.rightFrom,
      to: record.rightTo,
      parity: record.rightParity,
    });
  }
  return ranges;
}

function span(range: SideRange): number {
  return Math.abs(range.to - range.from);
}

function distanceOutside(houseNumber: number, range: SideRange): number {
  const low = Math.min(range.from, range.to);
  const high = Math.max(range.from, range.to);
  if (houseNumber < low) return low - houseNumber;
  if (houseNumber > high) return houseNumber - high;
  return 0;
}

function compareRanges(a: SideRange, b: SideRange): number {
  return (
    span(a) - span(b) ||
    a.position - b.position ||
    (a.side === b.side ? 0 : a.side === 'L' ? -1 : 1)
  );
}

/**
 * Per-state index over address-range records, keyed by normalized street name.
 * Read-only after construction.
 */
export class AddressRangeIndex {
  private readonly records: readonly AddressRangeRecord[];
  private readonly byStreetName: ReadonlyMap<string, readonly number[]>;

  constructor(records: readonly AddressRangeRecord[]) {
    this.records = records;

    const index = new Map<string, number[]>();
    records.forEach((record, position) => {
      if (record.streetName.length === 0) return;
      const positions = index.get(record.streetName);
      if (positions) {
        positions.push(position);
      } else {
        index.set(record.streetName, [position]);
      }
    });
    this.byStreetName = index;
  }

  /** Number of indexed segments */
  get size(): number {
    return this.records.length;
  }

  /** Number of distinct street names */
  get streetCount(): number {
    return this.byStreetName.size;
  }

  /**
   * Match a normalized key against the index
   */
  match(key: NormalizedKey): RangeMatchResult {
    const positions = this.byStreetName.get(key.streetName);
    if (!positions || positions.length === 0) {
      return { ok: false, reason: 'no_match' };
    }

    let fallbackTier: MatchTier | null = null;
    let fallbackRanges: SideRange[] = [];

    for (const tier of TIER_ORDER) {
      const candidates = this.narrowByZip(
        positions.filter((position) => tierAccepts(tier, key, this.records[position])),
        key.zip
      );
      if (candidates.length === 0) continue;

      const ranges = candidates.flatMap((position) => sideRanges(this.records[position], position));
      const containing = ranges
        .filter(
          (range) =>
            distanceOutside(key.houseNumber, range) === 0 &&
            parityAllows(key.houseNumber, range.parity, range.from, range.to)
        )
        .sort(compareRanges);

      if (containing.length > 0) {
        return { ok: true, match: this.toMatch(containing[0], tier, 'exact') };
      }

      if (fallbackTier === null && ranges.length > 0) {
        fallbackTier = tier;
        fallbackRanges = ranges;
      }
    }

    if (fallbackTier === null) {
      return { ok: false, reason: 'no_match' };
    }

    const houseNumber = key.houseNumber;
    const nearest = [...fallbackRanges].sort(
      (a, b) =>
        distanceOutside(houseNumber, a) - distanceOutside(houseNumber, b) ||
        Number(!parityAllows(houseNumber, a.parity, a.from, a.to)) -
          Number(!parityAllows(houseNumber, b.parity, b.from, b.to)) ||
        compareRanges(a, b)
    )[0];

    return { ok: true, match: this.toMatch(nearest, fallbackTier, 'interpolated') };
  }

  private narrowByZip(positions: readonly number[], zip: string | null): readonly number[] {
    if (zip === null) return positions;
    const withZip = positions.filter((position) => {
      const record = this.records[position];
      return record.leftZip === zip || record.rightZip === zip;
    });
    return withZip.length > 0 ? withZip : positions;
  }

  private toMatch(
    range: SideRange,
    tier: MatchTier,
    matchType: 'exact' | 'interpolated'
  ): RangeMatch {
    const ceiling = MATCH_SCORE_CEILINGS[tier];
    return {
      record: range.record,
      side: range.side,
      rangeFrom: range.from,
      rangeTo: range.to,
      tier,
      matchType,
      score: matchType === 'exact' ? ceiling : ceiling * FALLBACK_SCORE_FACTOR,
    };
  }
}
