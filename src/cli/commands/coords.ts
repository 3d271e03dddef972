/**
 * Coords Command
 *
 * Resolve a latitude/longitude to its census block. Without --state, every
 * state present in the data directory is searched in FIPS order.
 *
 * Usage:
 *   census-geocoder coords <lat> <lon> [options]
 *
 * @module cli/commands/coords
 */

import { isDatasetError } from '../../core/types/errors.js';
import type { GeoLevel } from '../../core/types/geography.js';
import type { GeocodeResult } from '../../core/types/result.js';
import { unmatchedResult } from '../../services/geocoder.js';
import { splitVariables } from '../../census/variables.js';
import { formatJson, formatResults, printOutput, type OutputFormat } from '../lib/output.js';
import {
  selectedVariables,
  type CommandDeps,
  type CommandResult,
  type VariableFlags,
} from '../lib/session.js';

export interface CoordsOptions extends VariableFlags {
  readonly level?: GeoLevel;
  readonly state?: string;
  readonly format?: OutputFormat;
}

export async function coordsCommand(
  latitude: number,
  longitude: number,
  options: CoordsOptions,
  deps: CommandDeps
): Promise<CommandResult> {
  const { config, logger, session } = deps;
  logger.commandStart('coords', { latitude, longitude, state: options.state });

  const variables = selectedVariables(options, config);
  const geoLevel = options.level ?? config.defaults.geoLevel;
  const lookup = { geoLevel, variables };

  let result: GeocodeResult | null = null;
  if (options.state) {
    result = await session.geocoder.lookupCoordinates(latitude, longitude, options.state, lookup);
  } else {
    const states = await session.provider.listStates();
    logger.debug('Searching states', { states });
    for (const stateFips of states) {
      let candidate: GeocodeResult;
      try {
        candidate = await session.geocoder.lookupCoordinates(latitude, longitude, stateFips, lookup);
      } catch (error) {
        if (!isDatasetError(error)) throw error;
        logger.warn('Skipping state', { stateFips, error: error.message });
        continue;
      }
      if (candidate.matchType !== 'unmatched') {
        result = candidate;
        break;
      }
    }
  }

  if (result === null) {
    result = unmatchedResult(
      `${latitude},${longitude}`,
      geoLevel,
      splitVariables(variables),
      'no_containment',
      { latitude, longitude }
    );
  }

  if (result.matchType === 'unmatched') {
    logger.warn('No census block found for these coordinates', {
      reason: result.unmatchedReason,
    });
  }

  const format = options.format ?? 'json';
  printOutput(format === 'json' ? formatJson(result) : formatResults([result], format, variables));
  logger.commandEnd(true, { matchType: result.matchType });
  return { success: true };
}
