export type {
  BulkLoaderOptions,
  FromEnvOptions,
  BulkInsertOptions,
  DeleteIndexOptions,
} from './bulk-loader.js';
export { BulkLoader, deletionPrompt } from './bulk-loader.js';
