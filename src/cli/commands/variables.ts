/**
 * Variables Command
 *
 * List cataloged census variables and variable groups.
 *
 * Usage:
 *   census-geocoder variables [--acs] [--table <prefix>] [--format table|json]
 *
 * @module cli/commands/variables
 */

import {
  ACS_CATALOG,
  ALL_GROUP,
  DEFAULT_GROUP,
  PL_CATALOG,
  tableTitle,
} from '../../census/variables.js';
import {
  formatJson,
  formatOutput,
  printOutput,
  type OutputFormat,
  type OutputRow,
  type TableColumn,
} from '../lib/output.js';
import type { CommandResult } from '../lib/session.js';

export interface VariablesOptions {
  /** List ACS 5-year variables instead of PL 94-171 */
  readonly acs?: boolean;
  /** Only codes starting with this table prefix, e.g. P1 or B19 */
  readonly table?: string;
  readonly format?: OutputFormat;
}

const VARIABLE_COLUMNS: readonly TableColumn[] = [
  { key: 'code', header: 'Code' },
  { key: 'table', header: 'Table', width: 28 },
  { key: 'description', header: 'Description' },
];

const GROUP_COLUMNS: readonly TableColumn[] = [
  { key: 'group', header: 'Group' },
  { key: 'count', header: 'Variables', align: 'right' },
  { key: 'description', header: 'Description' },
];

export interface VariableListing {
  readonly dataset: string;
  readonly variables: ReadonlyArray<{
    readonly code: string;
    readonly table: string | null;
    readonly description: string;
  }>;
  readonly groups: ReadonlyArray<{
    readonly group: string;
    readonly count: number;
    readonly description: string;
  }>;
}

/**
 * Catalog rows for one family, optionally filtered by table prefix
 */
export function listVariables(options: Pick<VariablesOptions, 'acs' | 'table'>): VariableListing {
  const catalog = options.acs ? ACS_CATALOG : PL_CATALOG;
  const prefix = options.table?.toUpperCase();

  const variables = Object.entries(catalog.variables)
    .filter(([code]) => prefix === undefined || code.startsWith(prefix))
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([code, description]) => ({ code, table: tableTitle(catalog, code), description }));

  const groups = [
    ...Object.entries(catalog.groups).map(([group, entry]) => ({
      group,
      count: entry.variables.length,
      description: entry.description,
    })),
    {
      group: DEFAULT_GROUP,
      count: catalog.defaults.length,
      description: 'Commonly requested variables',
    },
    {
      group: ALL_GROUP,
      count: Object.keys(catalog.variables).length,
      description: 'Every cataloged variable',
    },
  ];

  return { dataset: catalog.dataset, variables, groups };
}

export async function variablesCommand(options: VariablesOptions): Promise<CommandResult> {
  const listing = listVariables(options);
  const format = options.format ?? 'table';

  if (format === 'json') {
    printOutput(formatJson(listing));
    return { success: true };
  }

  const variableRows: OutputRow[] = [...listing.variables];
  printOutput(formatOutput(variableRows, format, VARIABLE_COLUMNS));

  if (format === 'table') {
    const groupRows: OutputRow[] = [...listing.groups];
    printOutput('');
    printOutput(formatOutput(groupRows, format, GROUP_COLUMNS));
  }
  return { success: true };
}
