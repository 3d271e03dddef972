/**
 * Address Interpolator
 *
 * Places a house number along its matched segment in proportion to its
 * position within the side's numeric range.
 *
 *   t = (house - from) / (to - from), clamped to [0, 1]
 *   t = 0.5 when from == to
 *
 * With only endpoints, the point is linear between start and end. When the
 * record carries the full polyline, the point is placed at fraction t of the
 * line's length.
 */

import * as turf from '@turf/turf';
import type { AddressRangeRecord } from '../core/types/address.js';

export interface InterpolatedPoint {
  readonly lon: number;
  readonly lat: number;
  /** Fractional position along the segment, in [0, 1] */
  readonly t: number;
}

/**
 * Fractional position of a house number within [from, to]
 */
export function rangeFraction(houseNumber: number, from: number, to: number): number {
  if (from === to) {
    return 0.5;
  }
  const t = (houseNumber - from) / (to - from);
  return Math.min(1, Math.max(0, t));
}

/**
 * Interpolate a coordinate for a house number on a matched segment side
 */
export function interpolate(
  record: AddressRangeRecord,
  rangeFrom: number,
  rangeTo: number,
  houseNumber: number
): InterpolatedPoint {
  const t = rangeFraction(houseNumber, rangeFrom, rangeTo);

  if (record.path !== null && record.path.length > 2) {
    const [lon, lat] = alongPath(record.path, t);
    return { lon, lat, t };
  }

  return {
    lon: record.startLon + t * (record.endLon - record.startLon),
    lat: record.startLat + t * (record.endLat - record.startLat),
    t,
  };
}

function alongPath(path: ReadonlyArray<readonly [number, number]>, t: number): [number, number] {
  const line = turf.lineString(path.map(([lon, lat]) => [lon, lat]));
  const total = turf.length(line, { units: 'kilometers' });
  if (total === 0) {
    return [path[0][0], path[0][1]];
  }
  const [lon, lat] = turf.along(line, total * t, { units: 'kilometers' }).geometry.coordinates;
  return [lon, lat];
}
