/**
 * Per-state dataset types
 */

import type { GeoLevel } from './geography.js';

/**
 * Dataset kinds a provider can supply for one state
 */
export type DatasetKind = 'address-ranges' | 'block-polygons' | 'pl94171' | 'acs5';

/**
 * Census variable families
 * - pl94171: decennial redistricting counts, native at block level
 * - acs5: ACS 5-year estimates, native at tract level
 */
export type VariableDataset = 'pl94171' | 'acs5';

/**
 * Value cell of a census table. Null means suppressed or not reported.
 */
export type CensusValue = number | null;

/**
 * Raw census table as produced by a provider
 */
export interface CensusTableData {
  readonly dataset: VariableDataset;
  /** Native summary level of the rows */
  readonly level: GeoLevel;
  /** Variable codes present as columns */
  readonly variables: readonly string[];
  /** GEOID → values aligned with `variables` */
  readonly rows: ReadonlyMap<string, readonly CensusValue[]>;
}
