/**
 * census-geocoder - offline US address to Census 2020 geography
 *
 * Provides:
 * - Address tokenizing and normalization
 * - TIGER/Line address-range matching and interpolation
 * - Block resolution by point-in-polygon over an R-tree
 * - PL 94-171 and ACS 5-year variable joins at any summary level
 *
 * @packageDocumentation
 */

// Orchestrator
export {
  CensusGeocoder,
  DEFAULT_CONCURRENCY,
  DEFAULT_GEO_LEVEL,
  unmatchedResult,
  type BatchOptions,
  type CensusGeocoderOptions,
  type LookupOptions,
  type UnmatchedDetails,
} from './services/geocoder.js';

// Datasets
export {
  StateDatasetCache,
  type StateDataset,
  type StateDatasetCacheOptions,
} from './services/dataset-cache.js';
export {
  FileDatasetProvider,
  type DatasetInventory,
  type DatasetProvider,
  type FileDatasetProviderOptions,
} from './data/dataset-provider.js';
export { PL_ALL_COLUMNS, parsePl94171, type PlFileSource } from './data/pl94171-parser.js';
export { parseAcsExtract } from './data/acs-reader.js';

// Pipeline stages
export {
  RuleBasedTokenizer,
  tokenizeAddress,
  type AddressTokenizer,
  type TokenizeResult,
} from './address/tokenizer.js';
export { normalizeAddress, type NormalizeResult } from './address/normalizer.js';
export {
  AddressRangeIndex,
  MATCH_SCORE_CEILINGS,
  type MatchTier,
  type RangeMatch,
  type RangeMatchResult,
} from './services/address-range-matcher.js';
export { interpolate, type InterpolatedPoint } from './services/interpolator.js';
export { BlockSpatialIndex, type BlockSpatialIndexOptions } from './services/block-spatial-index.js';
export { PointInPolygonEngine } from './services/pip-engine.js';
export { CensusVariableTable, joinVariables, valueAtLevel } from './services/census-joiner.js';

// Variable catalog
export {
  ACS_CATALOG,
  PL_CATALOG,
  classifyVariable,
  describeVariable,
  getGroupVariables,
  resolveVariables,
  splitVariables,
  type VariableCatalog,
  type VariableRequest,
} from './census/variables.js';

// GEOIDs and FIPS
export { parseBlockGeoid, truncateGeoid, levelFromGeoid, type GeoidComponents } from './core/geoid.js';
export { normalizeState, getStateNameFromFips, getStateAbbrFromFips } from './core/types/fips.js';

// Types and errors
export type { AddressRangeRecord, AddressToken, NormalizedKey, Parity, Side } from './core/types/address.js';
export type { CensusTableData, CensusValue, DatasetKind, VariableDataset } from './core/types/dataset.js';
export { GEO_LEVELS, isGeoLevel, type BlockPolygon, type GeoLevel, type LatLng } from './core/types/geography.js';
export type { GeocodeResult, MatchType, UnmatchedReason, VariableSelection } from './core/types/result.js';
export {
  ConfigurationError,
  DatasetCorruptError,
  DatasetUnavailableError,
  isConfigurationError,
  isDatasetCorruptError,
  isDatasetError,
  isDatasetUnavailableError,
  type ErrorInfo,
} from './core/types/errors.js';
export { setLogLevel, type LogLevel } from './core/utils/logger.js';
