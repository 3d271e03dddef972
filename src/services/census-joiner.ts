/**
 * Census Joiner
 *
 * GEOID-keyed join of a matched block against cached census tables.
 *
 * AGGREGATION POLICY (per variable family):
 * - PL 94-171 counts are native at block level. At a coarser level they are
 *   summed over every block sharing the level's GEOID prefix. Null cells
 *   are skipped; a prefix with no reported value yields null.
 * - ACS estimates (medians, rates, counts alike) are never summed. They are
 *   looked up at their native tract level for block, block group and tract
 *   requests, and at the requested prefix for county and state, which
 *   resolves only when the table carries rows at that level.
 *
 * Codes absent from a table, and tables that were never loaded, join as null.
 */

import { GEOID_LENGTH, type GeoLevel } from '../core/types/geography.js';
import type {
  CensusTableData,
  CensusValue,
  VariableDataset,
} from '../core/types/dataset.js';
import type { VariableSelection } from '../core/types/result.js';

/**
 * Read-only census table with sorted keys for prefix scans
 */
export class CensusVariableTable {
  readonly dataset: VariableDataset;
  readonly level: GeoLevel;
  private readonly columns: ReadonlyMap<string, number>;
  private readonly rows: ReadonlyMap<string, readonly CensusValue[]>;
  private readonly sortedKeys: readonly string[];

  constructor(data: CensusTableData) {
    this.dataset = data.dataset;
    this.level = data.level;
    this.columns = new Map(data.variables.map((code, index) => [code, index]));
    this.rows = data.rows;
    this.sortedKeys = [...data.rows.keys()].sort();
  }

  /** Number of rows */
  get size(): number {
    return this.rows.size;
  }

  /** Variable codes carried by the table */
  get variables(): string[] {
    return [...this.columns.keys()];
  }

  hasVariable(code: string): boolean {
    return this.columns.has(code);
  }

  /**
   * Value for one GEOID, or null when the row or code is absent
   */
  lookup(geoid: string, code: string): CensusValue {
    const column = this.columns.get(code);
    if (column === undefined) return null;
    return this.rows.get(geoid)?.[column] ?? null;
  }

  /**
   * Sum of a variable over all native-level rows whose GEOID starts with `prefix`
   *
   * @returns Sum of non-null values, or null if no row reports a value
   */
  sumByPrefix(prefix: string, code: string): CensusValue {
    const nativeLength = GEOID_LENGTH[this.level];
    let total: number | null = null;

    for (let i = this.lowerBound(prefix); i < this.sortedKeys.length; i++) {
      const key = this.sortedKeys[i];
      if (!key.startsWith(prefix)) break;
      if (key.length !== nativeLength) continue;

      const value = this.lookup(key, code);
      if (value !== null) {
        total = (total ?? 0) + value;
      }
    }

    return total;
  }

  private lowerBound(prefix: string): number {
    let low = 0;
    let high = this.sortedKeys.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.sortedKeys[mid] < prefix) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low;
  }
}

export interface JoinRequest {
  /** 15-digit block GEOID of the matched location */
  readonly blockGeoid: string;
  /** Requested output level */
  readonly level: GeoLevel;
  readonly variables: VariableSelection;
  readonly pl: CensusVariableTable | null;
  readonly acs: CensusVariableTable | null;
}

/**
 * Value of one variable for a block at the requested level
 *
 * @param aggregate - Sum native rows when the level is coarser than the table's
 */
export function valueAtLevel(
  table: CensusVariableTable,
  blockGeoid: string,
  level: GeoLevel,
  code: string,
  aggregate: boolean
): CensusValue {
  if (!table.hasVariable(code)) {
    return null;
  }

  const nativeLength = GEOID_LENGTH[table.level];
  const requestedLength = GEOID_LENGTH[level];

  if (requestedLength >= nativeLength) {
    return table.lookup(blockGeoid.slice(0, nativeLength), code);
  }

  const prefix = blockGeoid.slice(0, requestedLength);
  return aggregate ? table.sumByPrefix(prefix, code) : table.lookup(prefix, code);
}

/**
 * Join requested variables for a matched block
 */
export function joinVariables(request: JoinRequest): Record<string, CensusValue> {
  const values: Record<string, CensusValue> = {};

  for (const code of request.variables.pl) {
    values[code] = request.pl
      ? valueAtLevel(request.pl, request.blockGeoid, request.level, code, true)
      : null;
  }

  for (const code of request.variables.acs) {
    values[code] = request.acs
      ? valueAtLevel(request.acs, request.blockGeoid, request.level, code, false)
      : null;
  }

  return values;
}

/**
 * All requested variables set to null (unmatched rows)
 */
export function nullVariables(selection: VariableSelection): Record<string, CensusValue> {
  const values: Record<string, CensusValue> = {};
  for (const code of [...selection.pl, ...selection.acs]) {
    values[code] = null;
  }
  return values;
}
