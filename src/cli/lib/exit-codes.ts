/**
 * CLI exit codes
 *
 * @module cli/lib/exit-codes
 */

import { isConfigurationError, isDatasetError } from '../../core/types/errors.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  DATA_UNAVAILABLE: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code for an error that ended a command
 */
export function exitCodeForError(error: unknown): ExitCode {
  if (isConfigurationError(error)) return EXIT_CODES.CONFIG_ERROR;
  if (isDatasetError(error)) return EXIT_CODES.DATA_UNAVAILABLE;
  return EXIT_CODES.ERRORS;
}
