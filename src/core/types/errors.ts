/**
 * Census Geocoder Error Types
 *
 * Systemic failures only. A single address that cannot be parsed, matched
 * or placed is an ordinary return state (see UnmatchedReason), never an
 * exception.
 *
 * - DatasetUnavailableError: a required file for a state is not on disk.
 *   Callers may trigger a download and retry.
 * - DatasetCorruptError: the file exists but cannot be read as expected.
 * - ConfigurationError: invalid configuration or variable selection.
 */

import type { DatasetKind } from './dataset.js';

/**
 * Stable error codes surfaced in batch rows and CLI output
 */
export type GeocoderErrorCode =
  | 'DATASET_UNAVAILABLE'
  | 'DATASET_CORRUPT'
  | 'CONFIGURATION_ERROR';

/**
 * Dataset context attached to dataset errors
 */
export interface DatasetErrorDetails {
  readonly stateFips: string;
  readonly kind: DatasetKind;
  /** File or directory the provider looked at */
  readonly path?: string;
}

/**
 * Required dataset is missing for a state.
 *
 * @example
 * ```typescript
 * throw new DatasetUnavailableError(
 *   'No ADDRFEAT data for state 06',
 *   { stateFips: '06', kind: 'address-ranges', path: '/data/06/addrfeat' }
 * );
 * ```
 */
export class DatasetUnavailableError extends Error {
  public readonly name = 'DatasetUnavailableError' as const;
  public readonly code = 'DATASET_UNAVAILABLE' as const;

  constructor(
    message: string,
    public readonly details: DatasetErrorDetails
  ) {
    super(message);
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, DatasetUnavailableError.prototype);
  }

  get stateFips(): string {
    return this.details.stateFips;
  }

  get kind(): DatasetKind {
    return this.details.kind;
  }

  toLogString(): string {
    const parts = [
      `DatasetUnavailableError: ${this.message}`,
      `  State FIPS: ${this.stateFips}`,
      `  Dataset: ${this.kind}`,
    ];
    if (this.details.path) {
      parts.push(`  Path: ${this.details.path}`);
    }
    return parts.join('\n');
  }
}

/**
 * Dataset file is present but unreadable or structurally invalid
 */
export class DatasetCorruptError extends Error {
  public readonly name = 'DatasetCorruptError' as const;
  public readonly code = 'DATASET_CORRUPT' as const;

  constructor(
    message: string,
    public readonly details: DatasetErrorDetails,
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
    Object.setPrototypeOf(this, DatasetCorruptError.prototype);
  }

  get stateFips(): string {
    return this.details.stateFips;
  }

  get kind(): DatasetKind {
    return this.details.kind;
  }
}

/**
 * Invalid configuration, geo level or variable selection
 */
export class ConfigurationError extends Error {
  public readonly name = 'ConfigurationError' as const;
  public readonly code = 'CONFIGURATION_ERROR' as const;

  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Type guard for DatasetUnavailableError
 */
export function isDatasetUnavailableError(error: unknown): error is DatasetUnavailableError {
  return (
    error instanceof Error &&
    error.name === 'DatasetUnavailableError' &&
    'details' in error &&
    typeof error.details === 'object' &&
    error.details !== null &&
    'stateFips' in error.details
  );
}

/**
 * Type guard for DatasetCorruptError
 */
export function isDatasetCorruptError(error: unknown): error is DatasetCorruptError {
  return (
    error instanceof Error &&
    error.name === 'DatasetCorruptError' &&
    'details' in error &&
    typeof error.details === 'object' &&
    error.details !== null
  );
}

/**
 * Type guard for ConfigurationError
 */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof Error && error.name === 'ConfigurationError';
}

/**
 * Errors that make a state's data unusable
 */
export function isDatasetError(
  error: unknown
): error is DatasetUnavailableError | DatasetCorruptError {
  return isDatasetUnavailableError(error) || isDatasetCorruptError(error);
}

/**
 * Serializable error summary carried on batch rows
 */
export interface ErrorInfo {
  readonly code: GeocoderErrorCode | 'INTERNAL_ERROR';
  readonly message: string;
}

/**
 * Convert any thrown value into an ErrorInfo
 */
export function toErrorInfo(error: unknown): ErrorInfo {
  if (isDatasetError(error) || isConfigurationError(error)) {
    return { code: error.code, message: error.message };
  }
  return {
    code: 'INTERNAL_ERROR',
    message: error instanceof Error ? error.message : String(error),
  };
}
