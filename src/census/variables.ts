/**
 * Census variable catalog
 *
 * PL 94-171 and ACS 5-year variable descriptions and named groups, loaded
 * from data/variables/*.json.
 *
 * Reference:
 * https://www.census.gov/programs-surveys/decennial-census/about/rdo/summary-files.html
 * https://www.census.gov/programs-surveys/acs/technical-documentation/table-shells.html
 */

import { z } from 'zod';
import type { VariableDataset } from '../core/types/dataset.js';
import { ConfigurationError } from '../core/types/errors.js';
import type { VariableSelection } from '../core/types/result.js';
import { readDataFile } from '../core/utils/data-files.js';

/**
 * PL 94-171 codes: tables P1-P5 and H1, e.g. P1_001N
 */
export const PL_VARIABLE_PATTERN = /^(?:P[1-5]|H1)_\d{3}N$/;

/**
 * ACS detailed and collapsed tables, estimate or margin, e.g. B19013_001E
 */
export const ACS_VARIABLE_PATTERN = /^[BC]\d{5}[A-Z]?_\d{3}[EM]$/;

/**
 * Group name that selects every cataloged variable of a family
 */
export const ALL_GROUP = 'all';

/**
 * Group name that selects the family's default variables
 */
export const DEFAULT_GROUP = 'default';

const CatalogFileSchema = z.object({
  tables: z.record(z.string(), z.string()),
  variables: z.record(z.string(), z.string()),
  groups: z.record(
    z.string(),
    z.object({
      description: z.string(),
      variables: z.array(z.string()),
    })
  ),
  defaults: z.array(z.string()),
});

export type VariableCatalogData = z.infer<typeof CatalogFileSchema>;

export interface VariableCatalog extends VariableCatalogData {
  readonly dataset: VariableDataset;
}

function loadCatalog(dataset: VariableDataset): VariableCatalog {
  const data = readDataFile(`variables/${dataset}.json`, CatalogFileSchema);
  return { dataset, ...data };
}

export const PL_CATALOG: VariableCatalog = loadCatalog('pl94171');
export const ACS_CATALOG: VariableCatalog = loadCatalog('acs5');

/**
 * Variable family of a code, or null if it matches neither pattern
 */
export function classifyVariable(code: string): VariableDataset | null {
  if (PL_VARIABLE_PATTERN.test(code)) return 'pl94171';
  if (ACS_VARIABLE_PATTERN.test(code)) return 'acs5';
  return null;
}

/**
 * Variables of a named group
 *
 * @throws ConfigurationError for an unknown group
 */
export function getGroupVariables(catalog: VariableCatalog, group: string): readonly string[] {
  if (group === ALL_GROUP) {
    return Object.keys(catalog.variables);
  }
  if (group === DEFAULT_GROUP) {
    return catalog.defaults;
  }
  const entry = catalog.groups[group];
  if (!entry) {
    const valid = [...Object.keys(catalog.groups), DEFAULT_GROUP, ALL_GROUP].join(', ');
    throw new ConfigurationError(
      `Unknown ${catalog.dataset === 'acs5' ? 'ACS ' : ''}variable group: ${group}. Valid groups: ${valid}`,
      'groups'
    );
  }
  return entry.variables;
}

/**
 * Split codes into PL and ACS families
 *
 * @throws ConfigurationError for a code that matches neither family
 */
export function splitVariables(codes: readonly string[]): VariableSelection {
  const pl = new Set<string>();
  const acs = new Set<string>();

  for (const raw of codes) {
    const code = raw.trim().toUpperCase();
    switch (classifyVariable(code)) {
      case 'pl94171':
        pl.add(code);
        break;
      case 'acs5':
        acs.add(code);
        break;
      case null:
        throw new ConfigurationError(`Unrecognized census variable code: ${raw}`, 'variables');
    }
  }

  return { pl: [...pl].sort(), acs: [...acs].sort() };
}

export interface VariableRequest {
  /** Explicit codes of either family */
  readonly variables?: readonly string[];
  /** PL 94-171 group names */
  readonly groups?: readonly string[];
  /** Explicit ACS codes */
  readonly acsVariables?: readonly string[];
  /** ACS group names */
  readonly acsGroups?: readonly string[];
}

/**
 * Expand groups and explicit codes into a sorted, de-duplicated selection
 */
export function resolveVariables(request: VariableRequest): VariableSelection {
  const codes: string[] = [
    ...(request.variables ?? []),
    ...(request.acsVariables ?? []),
  ];
  for (const group of request.groups ?? []) {
    codes.push(...getGroupVariables(PL_CATALOG, group));
  }
  for (const group of request.acsGroups ?? []) {
    codes.push(...getGroupVariables(ACS_CATALOG, group));
  }
  return splitVariables(codes);
}

/**
 * Title of the table a code belongs to, e.g. "Income" for B19013_001E
 */
export function tableTitle(catalog: VariableCatalog, code: string): string | null {
  const table = Object.keys(catalog.tables).find((prefix) => code.startsWith(prefix));
  return table === undefined ? null : catalog.tables[table];
}

/**
 * Human-readable description of a code, or null if not cataloged
 */
export function describeVariable(code: string): string | null {
  return PL_CATALOG.variables[code] ?? ACS_CATALOG.variables[code] ?? null;
}
