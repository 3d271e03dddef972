/**
 * Feature reader tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import JSZip from 'jszip';
import {
  parseGeoJson,
  readFeatureFile,
  readShapefileArchive,
} from '../../../data/feature-reader.js';
import { makeTempDir, removeTempDir } from '../../fixtures/census-fixtures.js';

const COLLECTION = JSON.stringify({
  type: 'FeatureCollection',
  features: [
    {
      type: 'Feature',
      properties: { FULLNAME: 'Main St' },
      geometry: { type: 'Point', coordinates: [-118.25, 34.05] },
    },
    {
      type: 'Feature',
      properties: null,
      geometry: null,
    },
  ],
});

describe('parseGeoJson', () => {
  it('returns properties and raw geometry per feature', () => {
    expect(parseGeoJson(COLLECTION)).toEqual([
      {
        properties: { FULLNAME: 'Main St' },
        geometry: { type: 'Point', coordinates: [-118.25, 34.05] },
      },
      { properties: {}, geometry: null },
    ]);
  });

  it('rejects documents that are not a FeatureCollection', () => {
    expect(() => parseGeoJson('{"type":"Feature"}')).toThrow('Invalid GeoJSON FeatureCollection');
  });
});

describe('readFeatureFile', () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) removeTempDir(dir);
    dir = null;
  });

  it('reads .geojson files', async () => {
    dir = makeTempDir();
    const path = join(dir, 'ranges.geojson');
    writeFileSync(path, COLLECTION);

    const features = await readFeatureFile(path);

    expect(features).toHaveLength(2);
    expect(features[0].properties).toEqual({ FULLNAME: 'Main St' });
  });

  it('rejects unsupported extensions', async () => {
    await expect(readFeatureFile('/tmp/blocks.kml')).rejects.toThrow(
      'Unsupported feature file: /tmp/blocks.kml'
    );
  });
});

describe('readShapefileArchive', () => {
  it('rejects an empty archive', async () => {
    await expect(readShapefileArchive(Buffer.alloc(0))).rejects.toThrow('Empty shapefile archive');
  });

  it('rejects data that is neither ZIP nor GZIP', async () => {
    await expect(readShapefileArchive(Buffer.from('not an archive'))).rejects.toThrow(
      'Unknown archive format (expected ZIP or GZIP)'
    );
  });

  it('requires a .shp and a .dbf member', async () => {
    const zip = new JSZip();
    zip.file('tl_2020_06037_addrfeat.dbf', 'x');
    const data = await zip.generateAsync({ type: 'nodebuffer' });

    await expect(readShapefileArchive(data)).rejects.toThrow('No .shp file found in archive');
  });
});
