/**
 * Point-in-polygon engine tests
 */

import { describe, it, expect } from 'vitest';
import type { MultiPolygon, Polygon } from 'geojson';
import { PointInPolygonEngine } from '../../../services/pip-engine.js';
import { rectangleBlock } from '../../fixtures/census-fixtures.js';

const SQUARE: Polygon = {
  type: 'Polygon',
  coordinates: [
    [
      [0, 0],
      [10, 0],
      [10, 10],
      [0, 10],
      [0, 0],
    ],
  ],
};

const SQUARE_WITH_HOLE: Polygon = {
  type: 'Polygon',
  coordinates: [
    SQUARE.coordinates[0],
    [
      [4, 4],
      [6, 4],
      [6, 6],
      [4, 6],
      [4, 4],
    ],
  ],
};

describe('PointInPolygonEngine', () => {
  const engine = new PointInPolygonEngine();

  describe('isPointInPolygon', () => {
    it('contains interior points', () => {
      expect(engine.isPointInPolygon({ lat: 5, lng: 5 }, SQUARE)).toBe(true);
      expect(engine.isPointInPolygon({ lat: 0.5, lng: 9.5 }, SQUARE)).toBe(true);
    });

    it('excludes exterior points', () => {
      expect(engine.isPointInPolygon({ lat: 5, lng: 11 }, SQUARE)).toBe(false);
      expect(engine.isPointInPolygon({ lat: -1, lng: 5 }, SQUARE)).toBe(false);
    });

    it('counts edges and vertices as inside', () => {
      expect(engine.isPointInPolygon({ lat: 0, lng: 5 }, SQUARE)).toBe(true);
      expect(engine.isPointInPolygon({ lat: 5, lng: 10 }, SQUARE)).toBe(true);
      expect(engine.isPointInPolygon({ lat: 10, lng: 10 }, SQUARE)).toBe(true);
    });

    it('treats interior rings as holes', () => {
      expect(engine.isPointInPolygon({ lat: 5, lng: 5 }, SQUARE_WITH_HOLE)).toBe(false);
      expect(engine.isPointInPolygon({ lat: 2, lng: 2 }, SQUARE_WITH_HOLE)).toBe(true);
      // The hole's edge is a boundary of the polygon
      expect(engine.isPointInPolygon({ lat: 5, lng: 4 }, SQUARE_WITH_HOLE)).toBe(true);
    });

    it('contains a point in any member of a MultiPolygon', () => {
      const multi: MultiPolygon = {
        type: 'MultiPolygon',
        coordinates: [
          SQUARE.coordinates,
          [
            [
              [20, 20],
              [30, 20],
              [30, 30],
              [20, 30],
              [20, 20],
            ],
          ],
        ],
      };

      expect(engine.isPointInPolygon({ lat: 25, lng: 25 }, multi)).toBe(true);
      expect(engine.isPointInPolygon({ lat: 15, lng: 15 }, multi)).toBe(false);
    });

    it('applies the configured tolerance to boundaries', () => {
      const loose = new PointInPolygonEngine(0.01);
      const point = { lat: 5, lng: 10.005 };

      expect(engine.isPointInPolygon(point, SQUARE)).toBe(false);
      expect(loose.isPointInPolygon(point, SQUARE)).toBe(true);
    });
  });

  describe('findContainingBlocks', () => {
    it('returns every block sharing an edge point, ascending', () => {
      const blocks = [
        rectangleBlock('060010001002001', 1, 0, 2, 1),
        rectangleBlock('060010001001001', 0, 0, 1, 1),
        rectangleBlock('060010001003001', 5, 5, 6, 6),
      ];

      expect(engine.findContainingBlocks({ lat: 0.5, lng: 1 }, blocks)).toEqual([
        '060010001001001',
        '060010001002001',
      ]);
      expect(engine.findContainingBlocks({ lat: 0.5, lng: 1.5 }, blocks)).toEqual([
        '060010001002001',
      ]);
      expect(engine.findContainingBlocks({ lat: 3, lng: 3 }, blocks)).toEqual([]);
    });
  });

  describe('validateRing', () => {
    it('accepts a closed ring', () => {
      expect(engine.validateRing(SQUARE.coordinates[0])).toEqual([]);
    });

    it('rejects rings with too few points', () => {
      expect(
        engine.validateRing([
          [0, 0],
          [1, 1],
          [0, 0],
        ])
      ).toEqual(['Ring has 3 points, minimum 4 required (triangle + closure)']);
    });

    it('rejects open rings', () => {
      expect(
        engine.validateRing([
          [0, 0],
          [1, 0],
          [1, 1],
          [0, 1],
        ])
      ).toEqual(['Ring is not closed (first point != last point)']);
    });
  });
});
