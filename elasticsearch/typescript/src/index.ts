/**
 * Elasticsearch Bulk Loader
 *
 * Loads tabular datasets into Elasticsearch: index creation with fixed
 * shard/replica settings, existence checks, confirmed deletion, and concurrent
 * bulk insertion of rows as documents.
 *
 * @module elasticsearch-bulk-loader
 */

// ============================================================================
// Configuration
// ============================================================================

export type { ElasticsearchConfig, BulkConfig, Environment } from './config/index.js';
export {
  ElasticsearchConfigBuilder,
  mergeBulkConfig,
  SecretString,
  sanitizeConfigForLogging,
  loadConfigFromEnv,
  loadDotEnv,
  validateConfig,
  DEFAULT_NODE,
  DEFAULT_USERNAME,
  DEFAULT_INDEX_SETTINGS,
  DEFAULT_BULK_CONFIG,
} from './config/index.js';

// ============================================================================
// Error Handling
// ============================================================================

export type { EngineErrorDescription } from './errors/index.js';
export {
  BulkLoaderError,
  BulkLoaderErrorCode,
  ConfigurationError,
  MissingIdFieldError,
  DuplicateIdError,
  DatasetError,
  isConfigurationError,
  describeEngineError,
  isResourceAlreadyExistsError,
  isIndexNotFoundError,
} from './errors/index.js';

// ============================================================================
// Types
// ============================================================================

export type {
  FieldValue,
  Row,
  Dataset,
  IndexDocument,
  IndexMappings,
  IndexSettings,
  BulkItemOutcome,
  BulkIndexStats,
  BulkInsertReport,
  ClusterInfo,
} from './types/index.js';
export { CREATED_STATUS } from './types/index.js';

// ============================================================================
// Documents and Datasets
// ============================================================================

export * from './documents/index.js';
export * from './dataset/index.js';

// ============================================================================
// Confirmation
// ============================================================================

export * from './confirm/index.js';

// ============================================================================
// Observability
// ============================================================================

export * from './observability/index.js';

// ============================================================================
// Client
// ============================================================================

export * from './client/index.js';

// ============================================================================
// Loader
// ============================================================================

export * from './loader/index.js';
