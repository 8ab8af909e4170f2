/**
 * Error codes raised by the bulk loader.
 */
export enum BulkLoaderErrorCode {
  ConfigurationError = 'CONFIGURATION_ERROR',
  MissingIdField = 'MISSING_ID_FIELD',
  DuplicateId = 'DUPLICATE_ID',
  DatasetError = 'DATASET_ERROR',
}

/**
 * Base error class for errors raised by the bulk loader itself.
 *
 * Errors returned by Elasticsearch (missing index, existing index, connection
 * failures) are not wrapped; they reach the caller as the client library
 * raised them. See `engine.ts` for helpers that inspect those.
 */
export class BulkLoaderError extends Error {
  /**
   * Stable error code (e.g., 'CONFIGURATION_ERROR', 'MISSING_ID_FIELD')
   */
  public readonly code: BulkLoaderErrorCode;

  /**
   * Additional error details
   */
  public readonly details?: Record<string, unknown>;

  constructor(options: {
    code: BulkLoaderErrorCode;
    message: string;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'BulkLoaderError';
    this.code = options.code;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Returns a string representation of the error
   */
  toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  /**
   * Returns a JSON representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}
