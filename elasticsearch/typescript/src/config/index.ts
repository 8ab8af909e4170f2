/**
 * Bulk loader configuration.
 */

export type { ElasticsearchConfig, BulkConfig } from './config.js';
export { ElasticsearchConfigBuilder, mergeBulkConfig, sanitizeConfigForLogging } from './config.js';
export { SecretString } from './secret.js';

export {
  DEFAULT_NODE,
  DEFAULT_USERNAME,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_INDEX_SETTINGS,
  DEFAULT_BULK_CONFIG,
  createDefaultBulkConfig,
} from './defaults.js';

export type { Environment } from './environment.js';
export { loadConfigFromEnv, loadDotEnv } from './environment.js';

export { validateConfig } from './validation.js';
