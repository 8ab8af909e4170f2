/**
 * Default configuration values for the bulk loader.
 * @module config/defaults
 */

import type { BulkConfig } from './config.js';

/**
 * Default Elasticsearch endpoint (a local single-node cluster with security on).
 */
export const DEFAULT_NODE = 'https://localhost:9200';

/**
 * Built-in superuser of a fresh Elasticsearch install.
 */
export const DEFAULT_USERNAME = 'elastic';

/**
 * Default request timeout in milliseconds.
 */
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

/**
 * Default number of retries for a failed request.
 */
export const DEFAULT_MAX_RETRIES = 3;

/**
 * Shard and replica settings applied to every index the loader creates.
 */
export const DEFAULT_INDEX_SETTINGS = {
  number_of_shards: 1,
  number_of_replicas: 1,
} as const;

/**
 * Creates the default bulk configuration.
 *
 * @returns Default bulk configuration with:
 * - concurrency: 5 (bulk requests in flight)
 * - flushBytes: 5000000 (payload size that triggers a flush)
 * - retries: 3 (per document, on 429 responses)
 * - refreshOnCompletion: false
 */
export function createDefaultBulkConfig(): BulkConfig {
  return {
    concurrency: 5,
    flushBytes: 5_000_000,
    retries: 3,
    refreshOnCompletion: false,
  };
}

/**
 * Default bulk configuration instance.
 */
export const DEFAULT_BULK_CONFIG: Readonly<BulkConfig> = createDefaultBulkConfig();
