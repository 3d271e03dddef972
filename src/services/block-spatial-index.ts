/**
 * Block Spatial Index
 *
 * SQLite R-tree over block bounding boxes, with exact point-in-polygon
 * containment on the shortlist.
 *
 * ARCHITECTURE:
 * - R-tree virtual table: one row per block (rowid = position + 1)
 * - Polygons stay in memory; the R-tree only prunes
 * - Query pattern: R-tree filter → point-in-polygon on candidates
 *
 * A point on a shared boundary is contained by every adjacent block; the
 * lexicographically smallest GEOID wins so repeated queries agree.
 */

import Database from 'better-sqlite3';
import type { BlockPolygon, LatLng } from '../core/types/geography.js';
import { createLogger } from '../core/utils/logger.js';
import { PointInPolygonEngine } from './pip-engine.js';

const logger = createLogger({ module: 'block-spatial-index' });

export interface BlockSpatialIndexOptions {
  /** SQLite database path, rebuilt on open; in-memory when omitted */
  readonly dbPath?: string;
  /** Boundary tolerance in degrees */
  readonly tolerance?: number;
}

interface CandidateRow {
  readonly id: number;
}

function isCandidateRow(row: unknown): row is CandidateRow {
  return (
    typeof row === 'object' &&
    row !== null &&
    'id' in row &&
    typeof row.id === 'number'
  );
}

export class BlockSpatialIndex {
  private readonly db: Database.Database;
  private readonly blocks: readonly BlockPolygon[];
  private readonly engine: PointInPolygonEngine;
  private readonly candidateQuery: Database.Statement;

  constructor(blocks: readonly BlockPolygon[], options: BlockSpatialIndexOptions = {}) {
    this.blocks = blocks;
    this.engine = new PointInPolygonEngine(options.tolerance);
    this.db = new Database(options.dbPath ?? ':memory:');

    this.createSchema();
    this.insertBlocks();

    this.candidateQuery = this.db.prepare(`
      SELECT id FROM rtree_index
      WHERE min_lon <= ? AND max_lon >= ?
        AND min_lat <= ? AND max_lat >= ?
    `);

    logger.debug('Block spatial index built', {
      blockCount: blocks.length,
      dbPath: options.dbPath ?? ':memory:',
    });
  }

  /** Number of indexed blocks */
  get size(): number {
    return this.blocks.length;
  }

  /**
   * Containing block GEOID for a coordinate
   *
   * @returns 15-digit GEOID, or null when no indexed block contains the point
   */
  resolve(point: LatLng): string | null {
    const containing = this.findContaining(point);
    return containing.length > 0 ? containing[0] : null;
  }

  /**
   * All containing block GEOIDs, ascending
   */
  findContaining(point: LatLng): string[] {
    const rows: unknown[] = this.candidateQuery.all(point.lng, point.lng, point.lat, point.lat);
    const candidates: BlockPolygon[] = [];
    for (const row of rows) {
      if (isCandidateRow(row)) {
        const block = this.blocks[row.id - 1];
        if (block !== undefined) candidates.push(block);
      }
    }
    return this.engine.findContainingBlocks(point, candidates);
  }

  close(): void {
    this.db.close();
  }

  private createSchema(): void {
    this.db.exec(`
      CREATE VIRTUAL TABLE IF NOT EXISTS rtree_index USING rtree(
        id,         -- position + 1
        min_lon,
        max_lon,
        min_lat,
        max_lat
      );
      DELETE FROM rtree_index;
    `);
  }

  private insertBlocks(): void {
    const insert = this.db.prepare(`
      INSERT INTO rtree_index (id, min_lon, max_lon, min_lat, max_lat)
      VALUES (?, ?, ?, ?, ?)
    `);

    const insertAll = this.db.transaction((blocks: readonly BlockPolygon[]) => {
      blocks.forEach((block, position) => {
        const [minLon, minLat, maxLon, maxLat] = block.bbox;
        insert.run(position + 1, minLon, maxLon, minLat, maxLat);
      });
    });

    insertAll(this.blocks);
  }
}
