/**
 * State dataset cache tests: single-flight loads, eviction, lazy tables
 */

import { describe, it, expect, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { isDatasetUnavailableError } from '../../../core/types/errors.js';
import { StateDatasetCache } from '../../../services/dataset-cache.js';
import {
  BLOCK_WEST,
  fixtureProvider,
  makeKey,
  makeTempDir,
  removeTempDir,
} from '../../fixtures/census-fixtures.js';

describe('StateDatasetCache', () => {
  const caches: StateDatasetCache[] = [];
  const tempDirs: string[] = [];

  function track(cache: StateDatasetCache): StateDatasetCache {
    caches.push(cache);
    return cache;
  }

  afterEach(async () => {
    for (const cache of caches.splice(0)) await cache.clear();
    for (const dir of tempDirs.splice(0)) removeTempDir(dir);
  });

  it('builds the street and block indexes for a state', async () => {
    const cache = track(new StateDatasetCache(fixtureProvider()));

    const dataset = await cache.get('06');

    expect(dataset.stateFips).toBe('06');
    expect(dataset.ranges.size).toBe(3);
    expect(dataset.ranges.streetCount).toBe(2);
    expect(dataset.blocks.size).toBe(3);
    expect(dataset.ranges.match(makeKey()).ok).toBe(true);
    expect(dataset.blocks.resolve({ lat: 34.05, lng: -118.255 })).toBe(BLOCK_WEST);
  });

  it('shares one load between concurrent first requests', async () => {
    const provider = fixtureProvider({ delayMs: 20 });
    const cache = track(new StateDatasetCache(provider));

    const datasets = await Promise.all([cache.get('06'), cache.get('06'), cache.get('06')]);

    expect(datasets[1]).toBe(datasets[0]);
    expect(datasets[2]).toBe(datasets[0]);
    expect(cache.loadCount('06')).toBe(1);
    expect(provider.callCount('ranges:06')).toBe(1);
    expect(provider.callCount('blocks:06')).toBe(1);
  });

  it('reuses a completed load', async () => {
    const provider = fixtureProvider();
    const cache = track(new StateDatasetCache(provider));

    const first = await cache.get('06');
    const second = await cache.get('06');

    expect(second).toBe(first);
    expect(cache.loadCount('06')).toBe(1);
  });

  it('evicts a failed load so the next request retries', async () => {
    const provider = fixtureProvider();
    provider.failNextLoads = 1;
    const cache = track(new StateDatasetCache(provider));

    await expect(cache.get('06')).rejects.toThrow('Simulated read failure');
    expect(cache.getCacheStats().states).toEqual([]);

    const dataset = await cache.get('06');

    expect(dataset.ranges.size).toBe(3);
    expect(cache.loadCount('06')).toBe(2);
  });

  it('propagates a missing state as DatasetUnavailableError', async () => {
    const cache = track(new StateDatasetCache(fixtureProvider()));

    const error: unknown = await cache.get('36').catch((caught: unknown) => caught);

    expect(isDatasetUnavailableError(error)).toBe(true);
  });

  it('loads census tables lazily and once per family', async () => {
    const provider = fixtureProvider({ delayMs: 5 });
    const cache = track(new StateDatasetCache(provider));

    await cache.get('06');
    expect(provider.callCount('pl94171:06')).toBe(0);
    expect(cache.tableLoadCount('06', 'pl94171')).toBe(0);

    const [table, again] = await Promise.all([
      cache.getCensusTable('06', 'pl94171'),
      cache.getCensusTable('06', 'pl94171'),
    ]);

    expect(again).toBe(table);
    expect(table?.lookup(BLOCK_WEST, 'P1_001N')).toBe(120);
    expect(cache.tableLoadCount('06', 'pl94171')).toBe(1);
    expect(cache.tableLoadCount('06', 'acs5')).toBe(0);
    expect(cache.getCacheStats()).toEqual({ states: ['06'], tables: ['06:pl94171'] });
  });

  it('reloads a table once for a code it lacks', async () => {
    const provider = fixtureProvider();
    const cache = track(new StateDatasetCache(provider));

    await cache.getCensusTable('06', 'pl94171', ['P1_001N']);
    const widened = await cache.getCensusTable('06', 'pl94171', ['P1_001N', 'P1_026N']);
    const again = await cache.getCensusTable('06', 'pl94171', ['P1_026N']);

    expect(again).toBe(widened);
    expect(widened?.lookup(BLOCK_WEST, 'P1_001N')).toBe(120);
    expect(provider.columnRequests).toEqual([[], ['P1_026N']]);
    expect(cache.tableLoadCount('06', 'pl94171')).toBe(2);
  });

  it('shares one widening reload between concurrent requests', async () => {
    const provider = fixtureProvider({ delayMs: 5 });
    const cache = track(new StateDatasetCache(provider));
    await cache.getCensusTable('06', 'pl94171');

    const [first, second] = await Promise.all([
      cache.getCensusTable('06', 'pl94171', ['P2_001N']),
      cache.getCensusTable('06', 'pl94171', ['P2_001N']),
    ]);

    expect(second).toBe(first);
    expect(provider.columnRequests).toEqual([[], ['P2_001N']]);
  });

  it('caches an absent census table as null', async () => {
    const provider = fixtureProvider({ acs: false });
    const cache = track(new StateDatasetCache(provider));

    expect(await cache.getCensusTable('06', 'acs5')).toBeNull();
    expect(await cache.getCensusTable('06', 'acs5')).toBeNull();
    expect(provider.callCount('acs5:06')).toBe(1);
  });

  it('writes per-state R-tree files under the spatial index directory', async () => {
    const dir = makeTempDir();
    tempDirs.push(dir);
    const cache = track(new StateDatasetCache(fixtureProvider(), { spatialIndexDir: dir }));

    await cache.get('06');

    expect(existsSync(join(dir, '06-blocks.sqlite'))).toBe(true);
  });

  it('forgets every state on clear', async () => {
    const cache = new StateDatasetCache(fixtureProvider());
    await cache.get('06');
    await cache.getCensusTable('06', 'acs5');

    await cache.clear();

    expect(cache.getCacheStats()).toEqual({ states: [], tables: [] });
    expect(cache.loadCount('06')).toBe(0);
  });
});
