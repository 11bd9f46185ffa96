/**
 * @fileoverview Error taxonomy for the sampling pipeline
 * @module runtime/errors
 *
 * Each pipeline step raises one of these classes. The CLI matches on
 * `code` to pick the log message; every code maps to exit status 1.
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard error codes for pipeline failures
 */
export const ErrorCodes = {
  /** Sample fraction or column list rejected before any I/O */
  INVALID_PARAMETER: 'INVALID_PARAMETER',
  /** Input path does not exist */
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',
  /** A target column is absent from the loaded table */
  COLUMN_NOT_FOUND: 'COLUMN_NOT_FOUND',
  /** Reading, decoding or parsing the input failed */
  DATA_LOAD_ERROR: 'DATA_LOAD_ERROR',
  /** Sampling or value substitution failed */
  ANONYMIZATION_ERROR: 'ANONYMIZATION_ERROR',
  /** Serializing or writing the output failed */
  DATA_SAVE_ERROR: 'DATA_SAVE_ERROR',
  /** Anything not covered above */
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// =============================================================================
// Base Error
// =============================================================================

export class SamplerError extends Error {
  /**
   * @param code - Error code
   * @param message - Error message
   * @param cause - Underlying failure, if any
   */
  constructor(
    public readonly code: ErrorCode,
    message: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'SamplerError';
  }

  toJSON(): { code: ErrorCode; message: string } {
    return { code: this.code, message: this.message };
  }
}

// =============================================================================
// Concrete Errors
// =============================================================================

export class InvalidParameterError extends SamplerError {
  constructor(message: string) {
    super(ErrorCodes.INVALID_PARAMETER, message);
    this.name = 'InvalidParameterError';
  }
}

export class InputFileNotFoundError extends SamplerError {
  constructor(public readonly path: string) {
    super(ErrorCodes.FILE_NOT_FOUND, `Input file not found: ${path}`);
    this.name = 'InputFileNotFoundError';
  }
}

export class ColumnNotFoundError extends SamplerError {
  constructor(public readonly column: string) {
    super(ErrorCodes.COLUMN_NOT_FOUND, `Column '${column}' not found in the input file.`);
    this.name = 'ColumnNotFoundError';
  }
}

export class DataLoadError extends SamplerError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCodes.DATA_LOAD_ERROR, `Error loading data: ${message}`, cause);
    this.name = 'DataLoadError';
  }
}

export class AnonymizationError extends SamplerError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCodes.ANONYMIZATION_ERROR, `Error anonymizing data: ${message}`, cause);
    this.name = 'AnonymizationError';
  }
}

export class DataSaveError extends SamplerError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCodes.DATA_SAVE_ERROR, `Error saving data: ${message}`, cause);
    this.name = 'DataSaveError';
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Message of an arbitrary thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wraps anything that is not already a SamplerError as an unexpected failure
 */
export function toSamplerError(error: unknown): SamplerError {
  if (error instanceof SamplerError) {
    return error;
  }
  return new SamplerError(
    ErrorCodes.UNEXPECTED_ERROR,
    `An unexpected error occurred: ${errorMessage(error)}`,
    error
  );
}
