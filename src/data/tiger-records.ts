/**
 * TIGER/Line record mappers
 *
 * ADDRFEAT (address range features) → AddressRangeRecord
 * TABBLOCK20 (2020 tabulation blocks) → BlockPolygon
 *
 * Field reference:
 * https://www2.census.gov/geo/pdfs/maps-data/data/tiger/tgrshp2020/TGRSHP2020_TechDoc.pdf
 */

import * as turf from '@turf/turf';
import type { MultiPolygon, Polygon } from 'geojson';
import { z } from 'zod';
import { normalizeZip, parseHouseNumber, splitStreetLabel } from '../address/normalizer.js';
import type { AddressRangeRecord, Parity } from '../core/types/address.js';
import type { BBox, BlockPolygon } from '../core/types/geography.js';
import { isBlockGeoid } from '../core/geoid.js';
import { PointInPolygonEngine } from '../services/pip-engine.js';
import type { RawFeature } from './feature-reader.js';

const PositionSchema = z.array(z.number()).min(2);

const LineGeometrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('LineString'), coordinates: z.array(PositionSchema) }),
  z.object({ type: z.literal('MultiLineString'), coordinates: z.array(z.array(PositionSchema)) }),
]);

const AreaGeometrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Polygon'), coordinates: z.array(z.array(PositionSchema)) }),
  z.object({
    type: z.literal('MultiPolygon'),
    coordinates: z.array(z.array(z.array(PositionSchema))),
  }),
]);

const ringValidator = new PointInPolygonEngine();

/**
 * Property value as trimmed text, or null when absent or blank
 */
function textProperty(properties: Readonly<Record<string, unknown>>, name: string): string | null {
  const value = properties[name];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function houseNumberProperty(
  properties: Readonly<Record<string, unknown>>,
  name: string
): number | null {
  const text = textProperty(properties, name);
  return text === null ? null : parseHouseNumber(text);
}

function parityProperty(
  properties: Readonly<Record<string, unknown>>,
  name: string
): Parity | null {
  const value = textProperty(properties, name)?.toUpperCase();
  return value === 'O' || value === 'E' || value === 'B' ? value : null;
}

function geoidProperty(
  properties: Readonly<Record<string, unknown>>,
  name: string
): string | null {
  const value = textProperty(properties, name);
  return value !== null && isBlockGeoid(value) ? value : null;
}

/**
 * Vertices of a line geometry; MultiLineString parts are concatenated
 */
function linePath(geometry: unknown): Array<readonly [number, number]> | null {
  const parsed = LineGeometrySchema.safeParse(geometry);
  if (!parsed.success) {
    return null;
  }
  const positions =
    parsed.data.type === 'LineString' ? parsed.data.coordinates : parsed.data.coordinates.flat();
  const path = positions.map(([lon, lat]): readonly [number, number] => [lon, lat]);
  return path.length >= 2 ? path : null;
}

/**
 * Map one ADDRFEAT feature to an address-range record
 *
 * @param fallbackId - Segment id used when the feature has no LINEARID
 * @returns Record, or null when the feature has no street label, no usable
 *   line geometry or no complete range on either side
 */
export function toAddressRangeRecord(
  feature: RawFeature,
  fallbackId: string
): AddressRangeRecord | null {
  const { properties } = feature;

  const fullName = textProperty(properties, 'FULLNAME');
  if (fullName === null) return null;

  const label = splitStreetLabel(fullName);
  if (label.streetName.length === 0) return null;

  const path = linePath(feature.geometry);
  if (path === null) return null;

  const leftFrom = houseNumberProperty(properties, 'LFROMHN');
  const leftTo = houseNumberProperty(properties, 'LTOHN');
  const rightFrom = houseNumberProperty(properties, 'RFROMHN');
  const rightTo = houseNumberProperty(properties, 'RTOHN');

  const hasLeft = leftFrom !== null && leftTo !== null;
  const hasRight = rightFrom !== null && rightTo !== null;
  if (!hasLeft && !hasRight) return null;

  const [startLon, startLat] = path[0];
  const [endLon, endLat] = path[path.length - 1];

  return {
    segmentId: textProperty(properties, 'LINEARID') ?? fallbackId,
    streetName: label.streetName,
    streetType: label.streetType,
    directional: label.directional,
    fullName,
    leftFrom: hasLeft ? leftFrom : null,
    leftTo: hasLeft ? leftTo : null,
    rightFrom: hasRight ? rightFrom : null,
    rightTo: hasRight ? rightTo : null,
    leftParity: parityProperty(properties, 'PARITYL'),
    rightParity: parityProperty(properties, 'PARITYR'),
    leftZip: normalizeZip(textProperty(properties, 'ZIPL')),
    rightZip: normalizeZip(textProperty(properties, 'ZIPR')),
    startLon,
    startLat,
    endLon,
    endLat,
    path: path.length > 2 ? path : null,
    leftGeoidTractBlock: geoidProperty(properties, 'GEOIDL'),
    rightGeoidTractBlock: geoidProperty(properties, 'GEOIDR'),
  };
}

function toBBox(geometry: Polygon | MultiPolygon): BBox {
  const box = turf.bbox(geometry);
  // 3D boxes are [minX, minY, minZ, maxX, maxY, maxZ]
  return box.length === 6 ? [box[0], box[1], box[3], box[4]] : [box[0], box[1], box[2], box[3]];
}

/**
 * Map one TABBLOCK20 feature to a block polygon
 *
 * @returns Block, or null when the feature has no areal geometry
 * @throws Error when the GEOID is not 15 digits or a ring is malformed
 */
export function toBlockPolygon(feature: RawFeature): BlockPolygon | null {
  const geoid = textProperty(feature.properties, 'GEOID20') ?? textProperty(feature.properties, 'GEOID');
  if (geoid === null || !isBlockGeoid(geoid)) {
    throw new Error(`Invalid block GEOID: ${geoid ?? '(missing)'}`);
  }

  const parsed = AreaGeometrySchema.safeParse(feature.geometry);
  if (!parsed.success) {
    return null;
  }
  const geometry: Polygon | MultiPolygon = parsed.data;

  const rings = geometry.type === 'Polygon' ? geometry.coordinates : geometry.coordinates.flat();
  for (const ring of rings) {
    const errors = ringValidator.validateRing(ring);
    if (errors.length > 0) {
      throw new Error(`Block ${geoid}: ${errors.join('; ')}`);
    }
  }

  return { geoid, geometry, bbox: toBBox(geometry) };
}
