/**
 * Point-in-Polygon Engine
 *
 * Ray-casting containment test for census block boundaries.
 *
 * - Points on an edge or vertex (within tolerance) count as inside, so a
 *   point on a shared block edge is contained by both neighbours and the
 *   caller breaks the tie.
 * - Interior rings are holes.
 * - MultiPolygon contains the point if any member polygon does.
 */

import type { Polygon, MultiPolygon, Position } from 'geojson';
import type { BlockPolygon, LatLng, PolygonRing } from '../core/types/geography.js';
import { isPointInBBox } from '../core/types/geography.js';

/**
 * Default boundary tolerance in degrees (~0.1 mm)
 */
export const BOUNDARY_TOLERANCE = 1e-9;

export class PointInPolygonEngine {
  constructor(private readonly tolerance: number = BOUNDARY_TOLERANCE) {}

  /**
   * Test if point is inside polygon or on its boundary
   *
   * @param point - Lat/lng coordinates
   * @param polygon - GeoJSON Polygon or MultiPolygon ([lng, lat] order)
   */
  isPointInPolygon(point: LatLng, polygon: Polygon | MultiPolygon): boolean {
    if (this.isPointOnBoundary(point, polygon)) {
      return true;
    }

    if (polygon.type === 'Polygon') {
      return this.testPolygon(point, polygon.coordinates);
    }
    return polygon.coordinates.some((polygonCoords) => this.testPolygon(point, polygonCoords));
  }

  /**
   * GEOIDs of all blocks containing the point, ascending
   */
  findContainingBlocks(point: LatLng, blocks: Iterable<BlockPolygon>): string[] {
    const geoids: string[] = [];
    for (const block of blocks) {
      if (!isPointInBBox(point, block.bbox)) continue;
      if (this.isPointInPolygon(point, block.geometry)) {
        geoids.push(block.geoid);
      }
    }
    return geoids.sort();
  }

  /**
   * Test if point lies on any ring of the polygon, within tolerance
   */
  isPointOnBoundary(point: LatLng, polygon: Polygon | MultiPolygon): boolean {
    const rings: Position[][] =
      polygon.type === 'Polygon' ? polygon.coordinates : polygon.coordinates.flat();
    return rings.some((ring) => this.isPointOnRing(point, ring));
  }

  /**
   * Structural checks for a polygon ring
   *
   * @returns Validation errors (empty if valid)
   */
  validateRing(ring: PolygonRing): string[] {
    const errors: string[] = [];

    if (ring.length < 4) {
      errors.push(`Ring has ${ring.length} points, minimum 4 required (triangle + closure)`);
      return errors;
    }

    const first = ring[0];
    const last = ring[ring.length - 1];
    if (first[0] !== last[0] || first[1] !== last[1]) {
      errors.push('Ring is not closed (first point != last point)');
    }

    return errors;
  }

  /**
   * Inside exterior ring and outside every hole
   */
  private testPolygon(point: LatLng, coordinates: Position[][]): boolean {
    if (coordinates.length === 0 || !this.testRing(point, coordinates[0])) {
      return false;
    }
    for (let i = 1; i < coordinates.length; i++) {
      if (this.testRing(point, coordinates[i])) {
        return false;
      }
    }
    return true;
  }

  /**
   * Odd number of eastward ray crossings = inside
   */
  private testRing(point: LatLng, ring: PolygonRing): boolean {
    let intersections = 0;
    const px = point.lng;
    const py = point.lat;

    for (let i = 0; i < ring.length - 1; i++) {
      const [x1, y1] = ring[i];
      const [x2, y2] = ring[i + 1];

      // Horizontal edges are parallel to the ray
      if (y1 === y2) continue;

      // Half-open interval so a vertex on the ray is counted once
      if (py < Math.min(y1, y2) || py >= Math.max(y1, y2)) continue;

      const xIntersection = x1 + ((py - y1) / (y2 - y1)) * (x2 - x1);
      if (xIntersection > px) {
        intersections++;
      }
    }

    return intersections % 2 === 1;
  }

  private isPointOnRing(point: LatLng, ring: PolygonRing): boolean {
    for (let i = 0; i < ring.length - 1; i++) {
      const [x1, y1] = ring[i];
      const [x2, y2] = ring[i + 1];
      if (pointToSegmentDistance(point.lng, point.lat, x1, y1, x2, y2) <= this.tolerance) {
        return true;
      }
    }
    return false;
  }
}

/**
 * Distance from a point to a line segment (planar, in degrees)
 */
function pointToSegmentDistance(
  px: number,
  py: number,
  x1: number,
  y1: number,
  x2: number,
  y2: number
): number {
  const dx = x2 - x1;
  const dy = y2 - y1;
  const lengthSquared = dx * dx + dy * dy;

  if (lengthSquared === 0) {
    return Math.hypot(px - x1, py - y1);
  }

  const t = Math.max(0, Math.min(1, ((px - x1) * dx + (py - y1) * dy) / lengthSquared));
  return Math.hypot(px - (x1 + t * dx), py - (y1 + t * dy));
}
