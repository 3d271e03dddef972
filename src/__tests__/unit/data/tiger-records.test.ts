/**
 * TIGER/Line record mapper tests
 */

import { describe, it, expect } from 'vitest';
import { toAddressRangeRecord, toBlockPolygon } from '../../../data/tiger-records.js';
import type { RawFeature } from '../../../data/feature-reader.js';

function addrfeat(
  properties: Record<string, unknown>,
  geometry: unknown = {
    type: 'LineString',
    coordinates: [
      [-118.259, 34.05],
      [-118.251, 34.05],
    ],
  }
): RawFeature {
  return {
    properties: {
      LINEARID: '1101',
      FULLNAME: 'N Main St',
      LFROMHN: '101',
      LTOHN: '199',
      RFROMHN: '100',
      RTOHN: '198',
      ZIPL: '90012',
      ZIPR: '90012-1234',
      PARITYL: 'O',
      PARITYR: 'E',
      GEOIDL: '060372073011001',
      GEOIDR: '06037207301',
      ...properties,
    },
    geometry,
  };
}

describe('toAddressRangeRecord', () => {
  it('maps an ADDRFEAT feature', () => {
    expect(toAddressRangeRecord(addrfeat({}), 'fallback')).toEqual({
      segmentId: '1101',
      streetName: 'MAIN',
      streetType: 'ST',
      directional: 'N',
      fullName: 'N Main St',
      leftFrom: 101,
      leftTo: 199,
      rightFrom: 100,
      rightTo: 198,
      leftParity: 'O',
      rightParity: 'E',
      leftZip: '90012',
      rightZip: '90012',
      startLon: -118.259,
      startLat: 34.05,
      endLon: -118.251,
      endLat: 34.05,
      path: null,
      leftGeoidTractBlock: '060372073011001',
      rightGeoidTractBlock: null,
    });
  });

  it('uses the fallback id when LINEARID is missing', () => {
    const record = toAddressRangeRecord(addrfeat({ LINEARID: null }), 'file.geojson#3');

    expect(record?.segmentId).toBe('file.geojson#3');
  });

  it('keeps a side only when both of its bounds are present', () => {
    const record = toAddressRangeRecord(addrfeat({ RFROMHN: '', RTOHN: '198' }), 'x');

    expect(record?.rightFrom).toBeNull();
    expect(record?.rightTo).toBeNull();
    expect(record?.leftFrom).toBe(101);
  });

  it('skips features without a usable range, label or line', () => {
    expect(
      toAddressRangeRecord(addrfeat({ LFROMHN: null, RFROMHN: null }), 'x')
    ).toBeNull();
    expect(toAddressRangeRecord(addrfeat({ FULLNAME: '  ' }), 'x')).toBeNull();
    expect(
      toAddressRangeRecord(addrfeat({}, { type: 'Point', coordinates: [0, 0] }), 'x')
    ).toBeNull();
  });

  it('keeps the polyline when it has interior vertices', () => {
    const record = toAddressRangeRecord(
      addrfeat(
        {},
        {
          type: 'MultiLineString',
          coordinates: [
            [
              [0, 0],
              [1, 0],
            ],
            [
              [1, 0],
              [1, 1],
            ],
          ],
        }
      ),
      'x'
    );

    expect(record?.path).toEqual([
      [0, 0],
      [1, 0],
      [1, 0],
      [1, 1],
    ]);
    expect(record?.endLon).toBe(1);
    expect(record?.endLat).toBe(1);
  });

  it('ignores unknown parity codes', () => {
    expect(toAddressRangeRecord(addrfeat({ PARITYL: 'X' }), 'x')?.leftParity).toBeNull();
  });
});

describe('toBlockPolygon', () => {
  const square = {
    type: 'Polygon',
    coordinates: [
      [
        [-118.26, 34.04],
        [-118.25, 34.04],
        [-118.25, 34.06],
        [-118.26, 34.06],
        [-118.26, 34.04],
      ],
    ],
  };

  it('maps a TABBLOCK20 feature with its bounding box', () => {
    const block = toBlockPolygon({ properties: { GEOID20: '060372073011001' }, geometry: square });

    expect(block?.geoid).toBe('060372073011001');
    expect(block?.bbox).toEqual([-118.26, 34.04, -118.25, 34.06]);
    expect(block?.geometry.type).toBe('Polygon');
  });

  it('accepts a GEOID property when GEOID20 is absent', () => {
    const block = toBlockPolygon({ properties: { GEOID: '060372073011002' }, geometry: square });

    expect(block?.geoid).toBe('060372073011002');
  });

  it('throws for a malformed GEOID', () => {
    expect(() => toBlockPolygon({ properties: { GEOID20: '0603720730' }, geometry: square })).toThrow(
      'Invalid block GEOID: 0603720730'
    );
    expect(() => toBlockPolygon({ properties: {}, geometry: square })).toThrow(
      'Invalid block GEOID: (missing)'
    );
  });

  it('throws for an unclosed ring', () => {
    const open = {
      type: 'Polygon',
      coordinates: [
        [
          [0, 0],
          [1, 0],
          [1, 1],
          [0, 1],
        ],
      ],
    };

    expect(() => toBlockPolygon({ properties: { GEOID20: '060372073011001' }, geometry: open })).toThrow(
      'Block 060372073011001: Ring is not closed (first point != last point)'
    );
  });

  it('returns null for a feature without areal geometry', () => {
    expect(
      toBlockPolygon({ properties: { GEOID20: '060372073011001' }, geometry: null })
    ).toBeNull();
  });
});
