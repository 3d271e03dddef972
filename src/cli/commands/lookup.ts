/**
 * Lookup Command
 *
 * Geocode a single address and print the result.
 *
 * Usage:
 *   census-geocoder lookup "<address>" [options]
 *
 * Options:
 *   -l, --level <level>       state|county|tract|block_group|block
 *   -v, --variables <codes>   PL 94-171 or ACS codes
 *   -g, --groups <names>      PL 94-171 variable groups
 *   --acs <codes>             ACS codes
 *   --acs-groups <names>      ACS variable groups
 *   --state <state>           State assumed when the address names none
 *   --format <fmt>            json|ndjson|csv|table (default: json)
 *
 * @module cli/commands/lookup
 */

import type { GeoLevel } from '../../core/types/geography.js';
import { formatJson, formatResults, printOutput, type OutputFormat } from '../lib/output.js';
import {
  selectedVariables,
  type CommandDeps,
  type CommandResult,
  type VariableFlags,
} from '../lib/session.js';

export interface LookupOptions extends VariableFlags {
  readonly level?: GeoLevel;
  readonly state?: string;
  readonly format?: OutputFormat;
}

export async function lookupCommand(
  address: string,
  options: LookupOptions,
  deps: CommandDeps
): Promise<CommandResult> {
  const { config, logger, session } = deps;
  logger.commandStart('lookup', { address });

  const variables = selectedVariables(options, config);
  const result = await session.geocoder.geocode(address, {
    geoLevel: options.level ?? config.defaults.geoLevel,
    variables,
    ...(options.state ? { stateHint: options.state } : {}),
  });

  if (result.matchType === 'unmatched') {
    logger.warn('Address not matched', { reason: result.unmatchedReason });
  }

  const format = options.format ?? 'json';
  printOutput(format === 'json' ? formatJson(result) : formatResults([result], format, variables));
  logger.commandEnd(true, { matchType: result.matchType });
  return { success: true };
}
