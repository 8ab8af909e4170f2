/**
 * Error classes and engine error helpers.
 */

export { BulkLoaderError, BulkLoaderErrorCode } from './error.js';

export {
  ConfigurationError,
  MissingIdFieldError,
  DuplicateIdError,
  DatasetError,
  isConfigurationError,
} from './categories.js';

export type { EngineErrorDescription } from './engine.js';
export {
  describeEngineError,
  isResourceAlreadyExistsError,
  isIndexNotFoundError,
} from './engine.js';
