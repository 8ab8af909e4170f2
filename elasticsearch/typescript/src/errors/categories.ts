/**
 * Concrete bulk loader errors.
 */

import { BulkLoaderError, BulkLoaderErrorCode } from './error.js';

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Invalid or incomplete configuration.
 */
export class ConfigurationError extends BulkLoaderError {
  constructor(message: string, cause?: unknown) {
    super({
      code: BulkLoaderErrorCode.ConfigurationError,
      message: `Configuration error: ${message}`,
      cause,
    });
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Dataset Errors
// ============================================================================

/**
 * A row has no usable value in the identifier field.
 */
export class MissingIdFieldError extends BulkLoaderError {
  constructor(idField: string, rowNumber: number, reason: string) {
    super({
      code: BulkLoaderErrorCode.MissingIdField,
      message: `Row ${rowNumber} has no usable identifier in field '${idField}': ${reason}`,
      details: { idField, rowNumber },
    });
    this.name = 'MissingIdFieldError';
  }
}

/**
 * The identifier field is not unique across the dataset.
 */
export class DuplicateIdError extends BulkLoaderError {
  constructor(idField: string, duplicates: string[]) {
    super({
      code: BulkLoaderErrorCode.DuplicateId,
      message: `Identifier field '${idField}' has duplicate values: ${duplicates.join(', ')}`,
      details: { idField, duplicates },
    });
    this.name = 'DuplicateIdError';
  }
}

/**
 * Tabular input could not be turned into rows.
 */
export class DatasetError extends BulkLoaderError {
  constructor(message: string, cause?: unknown) {
    super({
      code: BulkLoaderErrorCode.DatasetError,
      message: `Dataset error: ${message}`,
      cause,
    });
    this.name = 'DatasetError';
  }
}

/**
 * Type guard to check if an error is a ConfigurationError.
 */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
