/**
 * Feature Reader
 *
 * Reads TIGER/Line feature files into plain property/geometry pairs:
 * - ZIP (or gzipped ZIP) archives holding .shp/.dbf, as published by the Census Bureau
 * - Bare .shp files with a sibling .dbf
 * - GeoJSON FeatureCollection exports
 *
 * Geometry is left untyped here; record mappers validate it.
 */

import { readFile } from 'node:fs/promises';
import { gunzipSync } from 'node:zlib';
import type { Feature, Geometry, GeoJsonProperties } from 'geojson';
import JSZip from 'jszip';
import * as shapefile from 'shapefile';
import { z } from 'zod';
import { createLogger } from '../core/utils/logger.js';

const logger = createLogger({ module: 'feature-reader' });

/**
 * Feature with unvalidated geometry
 */
export interface RawFeature {
  readonly properties: Readonly<Record<string, unknown>>;
  readonly geometry: unknown;
}

/**
 * File extensions the reader understands
 */
export const FEATURE_FILE_EXTENSIONS: readonly string[] = ['.zip', '.shp', '.geojson', '.json'];

const FeatureCollectionSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(
    z.object({
      type: z.literal('Feature'),
      properties: z.record(z.string(), z.unknown()).nullable(),
      geometry: z.unknown(),
    })
  ),
});

/**
 * Read all features from a file, dispatching on its extension
 */
export async function readFeatureFile(path: string): Promise<RawFeature[]> {
  const lowerPath = path.toLowerCase();

  if (lowerPath.endsWith('.zip') || lowerPath.endsWith('.gz')) {
    return readShapefileArchive(await readFile(path));
  }

  if (lowerPath.endsWith('.shp')) {
    const [shpBuffer, dbfBuffer] = await Promise.all([
      readFile(path),
      readFile(`${path.slice(0, -4)}.dbf`),
    ]);
    return readShapefile(shpBuffer, dbfBuffer);
  }

  if (lowerPath.endsWith('.geojson') || lowerPath.endsWith('.json')) {
    return parseGeoJson(await readFile(path, 'utf-8'));
  }

  throw new Error(`Unsupported feature file: ${path}`);
}

/**
 * Parse a GeoJSON FeatureCollection
 */
export function parseGeoJson(content: string): RawFeature[] {
  const parsed = FeatureCollectionSchema.safeParse(JSON.parse(content));
  if (!parsed.success) {
    throw new Error(`Invalid GeoJSON FeatureCollection: ${parsed.error.message}`);
  }
  return parsed.data.features.map((feature) => ({
    properties: feature.properties ?? {},
    geometry: feature.geometry,
  }));
}

/**
 * Read features from .shp and .dbf buffers
 */
export async function readShapefile(shpBuffer: Buffer, dbfBuffer: Buffer): Promise<RawFeature[]> {
  const features: RawFeature[] = [];

  try {
    const source = await shapefile.open(shpBuffer, dbfBuffer, { encoding: 'utf-8' });

    let result = await source.read();
    while (!result.done) {
      if (result.value) {
        features.push(toRawFeature(result.value));
      }
      result = await source.read();
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Shapefile parsing failed', {
      error: message,
      shpSize: shpBuffer.length,
      dbfSize: dbfBuffer.length,
    });
    throw new Error(`Failed to parse shapefile: ${message}`);
  }

  logger.debug('Shapefile read', { featureCount: features.length });
  return features;
}

/**
 * Read features from a shapefile archive (ZIP or gzipped ZIP)
 */
export async function readShapefileArchive(data: Buffer): Promise<RawFeature[]> {
  if (data.length === 0) {
    throw new Error('Empty shapefile archive');
  }

  const { shpBuffer, dbfBuffer } = await extractShapefileComponents(data);
  return readShapefile(shpBuffer, dbfBuffer);
}

function toRawFeature(feature: Feature<Geometry, GeoJsonProperties>): RawFeature {
  return {
    properties: feature.properties ?? {},
    geometry: feature.geometry,
  };
}

/**
 * Extract .shp and .dbf from an archive, detected by magic bytes:
 * - ZIP: 0x50 0x4B (PK)
 * - GZIP: 0x1F 0x8B
 */
async function extractShapefileComponents(
  data: Buffer
): Promise<{ shpBuffer: Buffer; dbfBuffer: Buffer }> {
  const isGzip = data[0] === 0x1f && data[1] === 0x8b;
  const isZip = data[0] === 0x50 && data[1] === 0x4b;

  if (isGzip) {
    return extractFromZip(gunzipSync(data));
  }
  if (isZip) {
    return extractFromZip(data);
  }
  throw new Error('Unknown archive format (expected ZIP or GZIP)');
}

async function extractFromZip(data: Buffer): Promise<{ shpBuffer: Buffer; dbfBuffer: Buffer }> {
  const zip = await JSZip.loadAsync(data);

  let shpBuffer: Buffer | null = null;
  let dbfBuffer: Buffer | null = null;

  for (const [filename, file] of Object.entries(zip.files)) {
    if (file.dir) continue;

    const lowerName = filename.toLowerCase();
    if (lowerName.endsWith('.shp')) {
      shpBuffer = await file.async('nodebuffer');
    } else if (lowerName.endsWith('.dbf')) {
      dbfBuffer = await file.async('nodebuffer');
    }
  }

  if (!shpBuffer) {
    throw new Error('No .shp file found in archive');
  }
  if (!dbfBuffer) {
    throw new Error('No .dbf file found in archive');
  }

  return { shpBuffer, dbfBuffer };
}
