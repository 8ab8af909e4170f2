/**
 * Core data types: rows, datasets, documents and bulk outcomes.
 * @module types
 */

import type { estypes } from '@elastic/elasticsearch';

// ============================================================================
// Rows and Datasets
// ============================================================================

/**
 * A single cell value. Nested arrays and objects are stored as-is.
 */
export type FieldValue =
  | string
  | number
  | boolean
  | null
  | FieldValue[]
  | { [key: string]: FieldValue };

/**
 * One record of a tabular dataset, keyed by column name.
 */
export type Row = Record<string, FieldValue>;

/**
 * Ordered rows sharing a common identifier field.
 *
 * Arrays can be iterated more than once; a generator can not, so a loader
 * call that needs two passes (see `checkDuplicateIds`) copies it first.
 */
export type Dataset = Iterable<Row>;

// ============================================================================
// Documents
// ============================================================================

/**
 * Document in bulk wire shape.
 */
export interface IndexDocument<TSource extends Row = Row> {
  /** Target index. */
  _index: string;
  /** String form of the row's identifier value. */
  _id: string;
  /** Full row. */
  _source: TSource;
}

/**
 * Index mappings supplied when creating an index.
 */
export type IndexMappings = estypes.MappingTypeMapping;

/**
 * Index settings sent with a create request.
 */
export type IndexSettings = estypes.IndicesIndexSettings;

// ============================================================================
// Bulk Outcomes
// ============================================================================

/**
 * Outcome of one document in a bulk request.
 *
 * A `status` of 201 means the document was created. 200 means an existing
 * document with the same id was overwritten. Anything else is a failure; 0
 * means the batch's request got no HTTP response at all.
 */
export interface BulkItemOutcome {
  index: string;
  id?: string;
  status: number;
  /** Engine result string ('created', 'updated', ...) when acknowledged. */
  result?: string;
  /** Engine error when the document was rejected. */
  error?: estypes.ErrorCause | null;
  /** True when the document was dropped after the helper retried it. */
  retried?: boolean;
}

/**
 * Counters of one bulkIndex run. Per-document results go to `onItem`.
 */
export interface BulkIndexStats {
  /** Documents read from the source and sent. */
  total: number;
  /** Documents resent after a 429. */
  retried: number;
}

/**
 * Summary of a bulkInsert call.
 */
export interface BulkInsertReport {
  index: string;
  /** Documents submitted. */
  total: number;
  /** Documents acknowledged with status 201. */
  created: number;
  /** Documents that overwrote an existing id (status 200). */
  updated: number;
  /** Documents the engine rejected. */
  failed: number;
  /** Documents the helper had to resend. */
  retried: number;
  durationMs: number;
}

/**
 * Cluster identity returned when connecting.
 */
export interface ClusterInfo {
  name: string;
  clusterName: string;
  version: string;
}

/**
 * HTTP status the engine returns for a newly created document.
 */
export const CREATED_STATUS = 201;
