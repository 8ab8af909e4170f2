export type { IndexClient, BulkIndexOptions } from './types.js';
export type { IndexActionMeta } from './actions.js';
export {
  ActionRegistry,
  BatchOutcomes,
  actionBytes,
  batchDocuments,
  toDropTarget,
  toSuccessOutcome,
} from './actions.js';
export { ElasticsearchIndexClient, buildClientOptions } from './elasticsearch.js';
