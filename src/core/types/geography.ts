/**
 * Census Geography Types
 *
 * Summary levels, GEOID widths and coordinate primitives shared by the
 * spatial resolver, the census joiner and the orchestrator.
 *
 * GEOID CONTRACT:
 * A 15-digit block GEOID is the single source of truth. Its prefixes of
 * length 2/5/11/12/15 identify the containing state, county, tract,
 * block group and block. Downstream consumers key on GEOID length.
 */

import type { Polygon, MultiPolygon } from 'geojson';

/**
 * Census summary levels supported for output
 */
export type GeoLevel = 'state' | 'county' | 'tract' | 'block_group' | 'block';

/**
 * All geo levels, coarsest first
 */
export const GEO_LEVELS: readonly GeoLevel[] = [
  'state',
  'county',
  'tract',
  'block_group',
  'block',
] as const;

/**
 * GEOID prefix length per summary level
 */
export const GEOID_LENGTH: Readonly<Record<GeoLevel, number>> = {
  state: 2,
  county: 5,
  tract: 11,
  block_group: 12,
  block: 15,
};

/**
 * Census summary level codes (legacy PL 94-171 SUMLEV field)
 */
export const SUMMARY_LEVEL_CODES: Readonly<Record<GeoLevel, string>> = {
  state: '040',
  county: '050',
  tract: '140',
  block_group: '150',
  block: '750',
};

/**
 * Type guard for geo level strings coming from config, CLI flags or callers
 */
export function isGeoLevel(value: unknown): value is GeoLevel {
  return typeof value === 'string' && (GEO_LEVELS as readonly string[]).includes(value);
}

/**
 * Geographic coordinate (WGS84)
 */
export interface LatLng {
  readonly lat: number;
  readonly lng: number;
}

/**
 * Bounding box [minLon, minLat, maxLon, maxLat]
 */
export type BBox = readonly [number, number, number, number];

/**
 * Polygon ring ([lng, lat] positions, closed)
 */
export type PolygonRing = ReadonlyArray<readonly number[]>;

/**
 * One census block with its boundary
 */
export interface BlockPolygon {
  /** 15-digit block GEOID (GEOID20) */
  readonly geoid: string;
  readonly geometry: Polygon | MultiPolygon;
  readonly bbox: BBox;
}

/**
 * Check whether a point lies inside (or on the edge of) a bounding box
 */
export function isPointInBBox(point: LatLng, bbox: BBox): boolean {
  const [minLon, minLat, maxLon, maxLat] = bbox;
  return (
    point.lng >= minLon &&
    point.lng <= maxLon &&
    point.lat >= minLat &&
    point.lat <= maxLat
  );
}
