/**
 * Census Geocoder
 *
 * Drives one address through the offline pipeline:
 *
 *   tokenize → normalize → match range → interpolate → resolve block → join variables
 *
 * Any stage that cannot proceed returns an `unmatched` result naming the
 * reason. Only systemic failures (a state's datasets missing or unreadable)
 * are thrown, and batch mode turns those into per-row errors as well.
 *
 * @example
 * ```typescript
 * const cache = new StateDatasetCache(new FileDatasetProvider('./census-data'));
 * const geocoder = new CensusGeocoder({ cache });
 *
 * const result = await geocoder.geocode('123 Main St, Los Angeles, CA 90012', {
 *   geoLevel: 'tract',
 *   variables: ['P1_001N', 'B19013_001E'],
 * });
 * console.log(result.geoid, result.variables);
 * ```
 */

import { RuleBasedTokenizer, type AddressTokenizer } from '../address/tokenizer.js';
import { normalizeAddress } from '../address/normalizer.js';
import { splitVariables } from '../census/variables.js';
import type { AddressToken } from '../core/types/address.js';
import type { CensusValue, VariableDataset } from '../core/types/dataset.js';
import {
  DatasetUnavailableError,
  isDatasetCorruptError,
  isDatasetUnavailableError,
  toErrorInfo,
} from '../core/types/errors.js';
import { normalizeState } from '../core/types/fips.js';
import type { GeoLevel } from '../core/types/geography.js';
import type {
  GeocodeResult,
  UnmatchedReason,
  VariableSelection,
} from '../core/types/result.js';
import { parseBlockGeoid, truncateGeoid } from '../core/geoid.js';
import { mapOrderedStream, mapWithConcurrency } from '../core/utils/concurrency.js';
import { createLogger } from '../core/utils/logger.js';
import { joinVariables, nullVariables, type CensusVariableTable } from './census-joiner.js';
import type { StateDatasetCache } from './dataset-cache.js';
import { interpolate } from './interpolator.js';

const logger = createLogger({ module: 'geocoder' });

export const DEFAULT_GEO_LEVEL: GeoLevel = 'block';
export const DEFAULT_CONCURRENCY = 4;

export interface CensusGeocoderOptions {
  readonly cache: StateDatasetCache;
  readonly tokenizer?: AddressTokenizer;
  /** Level used when a call names none */
  readonly defaultGeoLevel?: GeoLevel;
  /** Batch worker count */
  readonly concurrency?: number;
}

export interface LookupOptions {
  readonly geoLevel?: GeoLevel;
  /** PL 94-171 and ACS codes, in any mix */
  readonly variables?: readonly string[];
  /** State assumed when an address names none (FIPS, USPS code or name) */
  readonly stateHint?: string;
}

export interface BatchOptions extends LookupOptions {
  /** Overrides the geocoder's batch worker count */
  readonly concurrency?: number;
}

interface ResolvedLookup {
  readonly geoLevel: GeoLevel;
  readonly selection: VariableSelection;
  readonly stateHint: string | null;
}

/**
 * Fields of a located result, before variables are attached
 */
interface Placement {
  readonly inputAddress: string;
  readonly parsedAddress: AddressToken | null;
  readonly matchedStreet: string | null;
  readonly latitude: number;
  readonly longitude: number;
  readonly matchType: 'exact' | 'interpolated';
  readonly matchScore: number;
  readonly segmentId: string | null;
  readonly side: 'L' | 'R' | null;
  readonly blockGeoid: string;
}

/**
 * Fields an unmatched result may still carry
 */
export type UnmatchedDetails = Partial<
  Pick<
    GeocodeResult,
    'parsedAddress' | 'matchedStreet' | 'latitude' | 'longitude' | 'stateFips' | 'error'
  >
>;

function freezeResult(result: GeocodeResult): GeocodeResult {
  Object.freeze(result.variables);
  if (result.parsedAddress) Object.freeze(result.parsedAddress);
  return Object.freeze(result);
}

/**
 * Result for a lookup that produced no geography
 */
export function unmatchedResult(
  inputAddress: string,
  geoLevel: GeoLevel,
  selection: VariableSelection,
  reason: UnmatchedReason,
  partial: UnmatchedDetails = {}
): GeocodeResult {
  return freezeResult({
    inputAddress,
    parsedAddress: partial.parsedAddress ?? null,
    matchedStreet: partial.matchedStreet ?? null,
    latitude: partial.latitude ?? null,
    longitude: partial.longitude ?? null,
    matchType: 'unmatched',
    matchScore: 0,
    unmatchedReason: reason,
    segmentId: null,
    side: null,
    geoLevel,
    geoid: null,
    stateFips: partial.stateFips ?? null,
    countyFips: null,
    tract: null,
    blockGroup: null,
    block: null,
    variables: nullVariables(selection),
    ...(partial.error ? { error: partial.error } : {}),
  });
}

export class CensusGeocoder {
  private readonly cache: StateDatasetCache;
  private readonly tokenizer: AddressTokenizer;
  private readonly defaultGeoLevel: GeoLevel;
  private readonly concurrency: number;

  constructor(options: CensusGeocoderOptions) {
    this.cache = options.cache;
    this.tokenizer = options.tokenizer ?? new RuleBasedTokenizer();
    this.defaultGeoLevel = options.defaultGeoLevel ?? DEFAULT_GEO_LEVEL;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  }

  /**
   * Geocode one address
   *
   * @throws ConfigurationError for a malformed variable code
   * @throws DatasetUnavailableError | DatasetCorruptError when the state's data cannot be used
   */
  async geocode(address: string, options: LookupOptions = {}): Promise<GeocodeResult> {
    return this.runAddress(address, this.resolveLookup(options));
  }

  /**
   * Geocode many addresses. Output order and length match the input.
   *
   * Row failures, systemic ones included, are reported on the row.
   *
   * @throws ConfigurationError for a malformed variable code, before any row runs
   */
  async geocodeBatch(
    addresses: readonly string[],
    options: BatchOptions = {}
  ): Promise<GeocodeResult[]> {
    const lookup = this.resolveLookup(options);
    const startTime = Date.now();

    const results = await mapWithConcurrency(
      addresses,
      options.concurrency ?? this.concurrency,
      (address, index) => this.runRow(address, index, lookup)
    );

    logger.info('Batch complete', {
      rowCount: results.length,
      matched: results.filter((result) => result.matchType !== 'unmatched').length,
      durationMs: Date.now() - startTime,
    });

    return results;
  }

  /**
   * Streaming batch: yields results in input order while later rows run.
   * Rows not yet started when the consumer stops are never run.
   *
   * @throws ConfigurationError for a malformed variable code, before any row runs
   */
  geocodeStream(
    addresses: readonly string[],
    options: BatchOptions = {}
  ): AsyncGenerator<GeocodeResult, void, undefined> {
    const lookup = this.resolveLookup(options);
    return mapOrderedStream(addresses, options.concurrency ?? this.concurrency, (address, index) =>
      this.runRow(address, index, lookup)
    );
  }

  /**
   * Resolve a coordinate to its block and join variables
   *
   * @param state - State whose blocks are searched (FIPS, USPS code or name)
   * @throws ConfigurationError for a malformed variable code
   * @throws DatasetUnavailableError | DatasetCorruptError when the state's data cannot be used
   */
  async lookupCoordinates(
    latitude: number,
    longitude: number,
    state: string,
    options: Omit<LookupOptions, 'stateHint'> = {}
  ): Promise<GeocodeResult> {
    const lookup = this.resolveLookup(options);
    const inputAddress = `${latitude},${longitude}`;

    const stateFips = normalizeState(state);
    if (stateFips === null) {
      return unmatchedResult(inputAddress, lookup.geoLevel, lookup.selection, 'unknown_state');
    }

    const dataset = await this.cache.get(stateFips);
    const blockGeoid = dataset.blocks.resolve({ lat: latitude, lng: longitude });
    if (blockGeoid === null) {
      return unmatchedResult(inputAddress, lookup.geoLevel, lookup.selection, 'no_containment', {
        latitude,
        longitude,
        stateFips,
      });
    }

    return this.buildResult(
      {
        inputAddress,
        parsedAddress: null,
        matchedStreet: null,
        latitude,
        longitude,
        matchType: 'exact',
        matchScore: 1,
        segmentId: null,
        side: null,
        blockGeoid,
      },
      lookup
    );
  }

  /**
   * Load a state's street and block data ahead of use
   *
   * @returns The state's 2-digit FIPS code
   * @throws DatasetUnavailableError when the state is unknown or its data is missing
   */
  async loadState(state: string): Promise<string> {
    const stateFips = normalizeState(state);
    if (stateFips === null) {
      throw new DatasetUnavailableError(`Unknown state: ${state}`, {
        stateFips: state,
        kind: 'address-ranges',
      });
    }
    await this.cache.get(stateFips);
    return stateFips;
  }

  private resolveLookup(options: LookupOptions): ResolvedLookup {
    return {
      geoLevel: options.geoLevel ?? this.defaultGeoLevel,
      selection: splitVariables(options.variables ?? []),
      stateHint: options.stateHint ?? null,
    };
  }

  /**
   * Batch row: systemic failures become an error on the row
   */
  private async runRow(
    address: string,
    index: number,
    lookup: ResolvedLookup
  ): Promise<GeocodeResult> {
    try {
      return await this.runAddress(address, lookup);
    } catch (error) {
      const info = toErrorInfo(error);
      const reason: UnmatchedReason = isDatasetUnavailableError(error)
        ? 'dataset_unavailable'
        : isDatasetCorruptError(error)
          ? 'dataset_corrupt'
          : 'error';

      logger.warn('Batch row failed', { row: index, code: info.code, error: info.message });
      return unmatchedResult(address, lookup.geoLevel, lookup.selection, reason, { error: info });
    }
  }

  private async runAddress(address: string, lookup: ResolvedLookup): Promise<GeocodeResult> {
    const { geoLevel, selection } = lookup;

    const tokens = this.tokenizer.tokenize(address);
    if (!tokens.ok) {
      logger.debug('Tokenize failed', { address, reason: tokens.reason, detail: tokens.detail });
      return unmatchedResult(address, geoLevel, selection, tokens.reason);
    }
    const parsedAddress = tokens.token;

    const normalized = normalizeAddress(parsedAddress, lookup.stateHint);
    if (!normalized.ok) {
      logger.debug('Normalize failed', { address, detail: normalized.detail });
      return unmatchedResult(address, geoLevel, selection, normalized.reason, { parsedAddress });
    }
    const key = normalized.key;

    if (key.stateFips === null) {
      return unmatchedResult(address, geoLevel, selection, 'unknown_state', { parsedAddress });
    }
    const stateFips = key.stateFips;

    const dataset = await this.cache.get(stateFips);

    const matched = dataset.ranges.match(key);
    if (!matched.ok) {
      logger.debug('No range match', { address, streetName: key.streetName, stateFips });
      return unmatchedResult(address, geoLevel, selection, 'no_match', {
        parsedAddress,
        stateFips,
      });
    }
    const match = matched.match;

    const point = interpolate(match.record, match.rangeFrom, match.rangeTo, key.houseNumber);
    const blockGeoid = dataset.blocks.resolve({ lat: point.lat, lng: point.lon });
    if (blockGeoid === null) {
      logger.debug('No containing block', { address, lon: point.lon, lat: point.lat });
      return unmatchedResult(address, geoLevel, selection, 'no_containment', {
        parsedAddress,
        matchedStreet: match.record.fullName,
        latitude: point.lat,
        longitude: point.lon,
        stateFips,
      });
    }

    return this.buildResult(
      {
        inputAddress: address,
        parsedAddress,
        matchedStreet: match.record.fullName,
        latitude: point.lat,
        longitude: point.lon,
        matchType: match.matchType,
        matchScore: match.score,
        segmentId: match.record.segmentId,
        side: match.side,
        blockGeoid,
      },
      lookup
    );
  }

  private async buildResult(placement: Placement, lookup: ResolvedLookup): Promise<GeocodeResult> {
    const { geoLevel, selection } = lookup;
    const components = parseBlockGeoid(placement.blockGeoid);
    if (components === null) {
      throw new Error(`Spatial index returned a malformed block GEOID: ${placement.blockGeoid}`);
    }

    const stateFips = components.state;
    const [pl, acs] = await Promise.all([
      this.tableFor(stateFips, 'pl94171', selection.pl),
      this.tableFor(stateFips, 'acs5', selection.acs),
    ]);

    const variables: Record<string, CensusValue> = joinVariables({
      blockGeoid: placement.blockGeoid,
      level: geoLevel,
      variables: selection,
      pl,
      acs,
    });

    return freezeResult({
      inputAddress: placement.inputAddress,
      parsedAddress: placement.parsedAddress,
      matchedStreet: placement.matchedStreet,
      latitude: placement.latitude,
      longitude: placement.longitude,
      matchType: placement.matchType,
      matchScore: placement.matchScore,
      unmatchedReason: null,
      segmentId: placement.segmentId,
      side: placement.side,
      geoLevel,
      geoid: truncateGeoid(placement.blockGeoid, geoLevel),
      stateFips,
      countyFips: components.countyFips,
      tract: components.tractGeoid,
      blockGroup: components.blockGroupGeoid,
      // 4-digit block code only when the caller asked for blocks
      block: geoLevel === 'block' ? components.block : null,
      variables,
    });
  }

  /**
   * Census table for a family, or null when no code of that family was requested
   *
   * @throws DatasetUnavailableError when PL 94-171 codes are requested and the state has no PL data
   */
  private async tableFor(
    stateFips: string,
    dataset: VariableDataset,
    codes: readonly string[]
  ): Promise<CensusVariableTable | null> {
    if (codes.length === 0) return null;

    const table = await this.cache.getCensusTable(stateFips, dataset, codes);
    if (table === null && dataset === 'pl94171') {
      throw new DatasetUnavailableError(`No PL 94-171 data for state ${stateFips}`, {
        stateFips,
        kind: 'pl94171',
      });
    }
    return table;
  }
}
