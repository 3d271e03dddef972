/**
 * State Dataset Cache
 *
 * Builds each state's read-only lookup structures once and shares them
 * across all lookups for that state.
 *
 * - Street ranges and block polygons load together on first use of a state
 * - Census tables load separately, the first time a lookup asks for that
 *   family, so geocoding without variables never reads census files
 * - Concurrent first requests for the same key share one in-flight load
 * - A failed load is evicted so a later request retries it
 * - A census code the cached table lacks, and that was never asked of the
 *   provider, reloads the table with that code added
 */

import { join } from 'node:path';
import type { VariableDataset } from '../core/types/dataset.js';
import { createLogger } from '../core/utils/logger.js';
import type { DatasetProvider } from '../data/dataset-provider.js';
import { AddressRangeIndex } from './address-range-matcher.js';
import { BlockSpatialIndex } from './block-spatial-index.js';
import { CensusVariableTable } from './census-joiner.js';

const logger = createLogger({ module: 'dataset-cache' });

/**
 * Street and block indexes for one state
 */
export interface StateDataset {
  readonly stateFips: string;
  readonly ranges: AddressRangeIndex;
  readonly blocks: BlockSpatialIndex;
}

/**
 * Cached census table and the extra codes its load asked for
 */
interface TableEntry {
  readonly table: CensusVariableTable | null;
  readonly requested: ReadonlySet<string>;
}

export interface StateDatasetCacheOptions {
  /** Directory for per-state R-tree files (`<fips>-blocks.sqlite`); in memory when omitted */
  readonly spatialIndexDir?: string;
  /** Point-in-polygon boundary tolerance in degrees */
  readonly tolerance?: number;
}

/**
 * Keyed promise map that runs each load at most once while it is pending
 * or after it has succeeded
 */
class SingleFlight<T> {
  private readonly entries = new Map<string, Promise<T>>();
  private readonly attempts = new Map<string, number>();

  get(key: string, load: () => Promise<T>): Promise<T> {
    const existing = this.entries.get(key);
    if (existing) {
      return existing;
    }

    this.attempts.set(key, (this.attempts.get(key) ?? 0) + 1);
    const promise = load().catch((error: unknown) => {
      this.entries.delete(key);
      throw error;
    });
    this.entries.set(key, promise);
    return promise;
  }

  /**
   * Drop a settled entry so the next request loads again; a newer entry under the key is kept
   */
  evict(key: string, promise: Promise<T>): void {
    if (this.entries.get(key) === promise) {
      this.entries.delete(key);
    }
  }

  attemptCount(key: string): number {
    return this.attempts.get(key) ?? 0;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  values(): Array<Promise<T>> {
    return [...this.entries.values()];
  }

  clear(): void {
    this.entries.clear();
    this.attempts.clear();
  }
}

export class StateDatasetCache {
  private readonly states = new SingleFlight<StateDataset>();
  private readonly tables = new SingleFlight<TableEntry>();
  /** Extra codes asked of the provider per table key */
  private readonly requestedCodes = new Map<string, Set<string>>();

  constructor(
    private readonly provider: DatasetProvider,
    private readonly options: StateDatasetCacheOptions = {}
  ) {}

  /**
   * Street and block indexes for a state, loading them on first use
   *
   * @throws DatasetUnavailableError | DatasetCorruptError from the provider
   */
  get(stateFips: string): Promise<StateDataset> {
    return this.states.get(stateFips, () => this.loadState(stateFips));
  }

  /**
   * Census table for a state and family, loading it on first use
   *
   * @param codes - Codes the caller will read; one the table lacks is requested from the provider
   * @returns Table, or null when the provider has none
   */
  async getCensusTable(
    stateFips: string,
    dataset: VariableDataset,
    codes: readonly string[] = []
  ): Promise<CensusVariableTable | null> {
    const key = `${stateFips}:${dataset}`;
    const pending = this.tables.get(key, () => this.loadTable(stateFips, dataset, key));
    const entry = await pending;
    if (entry.table === null) return null;

    const table = entry.table;
    const missing = codes.filter((code) => !table.hasVariable(code) && !entry.requested.has(code));
    if (missing.length === 0) return table;

    logger.info('Reloading census table for additional codes', { stateFips, dataset, missing });
    const requested = this.requestedCodes.get(key) ?? new Set<string>();
    for (const code of missing) requested.add(code);
    this.requestedCodes.set(key, requested);
    this.tables.evict(key, pending);
    return this.getCensusTable(stateFips, dataset, codes);
  }

  /**
   * Number of street/block load attempts made for a state
   */
  loadCount(stateFips: string): number {
    return this.states.attemptCount(stateFips);
  }

  /**
   * Number of load attempts made for a census table
   */
  tableLoadCount(stateFips: string, dataset: VariableDataset): number {
    return this.tables.attemptCount(`${stateFips}:${dataset}`);
  }

  /**
   * States whose street/block load is pending or complete
   */
  getCacheStats(): { states: string[]; tables: string[] } {
    return { states: this.states.keys().sort(), tables: this.tables.keys().sort() };
  }

  /**
   * Release SQLite handles and forget every cached state
   */
  async clear(): Promise<void> {
    const loads = await Promise.allSettled(this.states.values());
    for (const load of loads) {
      if (load.status === 'fulfilled') {
        load.value.blocks.close();
      }
    }
    this.states.clear();
    this.tables.clear();
    this.requestedCodes.clear();
  }

  private async loadState(stateFips: string): Promise<StateDataset> {
    const startTime = Date.now();
    logger.info('Loading state datasets', { stateFips });

    const [records, polygons] = await Promise.all([
      this.provider.loadAddressRanges(stateFips),
      this.provider.loadBlockPolygons(stateFips),
    ]);

    const dataset: StateDataset = {
      stateFips,
      ranges: new AddressRangeIndex(records),
      blocks: new BlockSpatialIndex(polygons, {
        ...(this.options.spatialIndexDir !== undefined
          ? { dbPath: join(this.options.spatialIndexDir, `${stateFips}-blocks.sqlite`) }
          : {}),
        ...(this.options.tolerance !== undefined ? { tolerance: this.options.tolerance } : {}),
      }),
    };

    logger.info('State datasets ready', {
      stateFips,
      segmentCount: dataset.ranges.size,
      streetCount: dataset.ranges.streetCount,
      blockCount: dataset.blocks.size,
      durationMs: Date.now() - startTime,
    });

    return dataset;
  }

  private async loadTable(
    stateFips: string,
    dataset: VariableDataset,
    key: string
  ): Promise<TableEntry> {
    const requested = new Set(this.requestedCodes.get(key));
    const data = await this.provider.loadCensusTable(stateFips, dataset, [...requested]);
    if (data === null) {
      logger.warn('Census table not available', { stateFips, dataset });
      return { table: null, requested };
    }
    return { table: new CensusVariableTable(data), requested };
  }
}
