/**
 * The index operations the bulk loader needs from a search engine client.
 *
 * @module client/types
 */

import type {
  BulkIndexStats,
  BulkItemOutcome,
  ClusterInfo,
  IndexDocument,
  IndexMappings,
  IndexSettings,
} from '../types/index.js';

/**
 * Options for one bulk indexing run.
 */
export interface BulkIndexOptions {
  /** Batches kept in flight. */
  concurrency: number;
  /** Payload size, in bytes, at which a batch is sent. */
  flushBytes: number;
  /** Retries per document for 429 responses. */
  retries: number;
  /** Refresh the affected indices when every batch is acknowledged. */
  refreshOnCompletion: boolean;
  /** Called once per document with the engine's verdict. */
  onItem: (outcome: BulkItemOutcome) => void;
}

/**
 * Minimal index client interface for loader operations.
 */
export interface IndexClient {
  /**
   * Returns cluster identity. Fails if the cluster cannot be reached.
   */
  info(): Promise<ClusterInfo>;

  indexExists(index: string): Promise<boolean>;

  /**
   * Creates an index. Fails with the engine's error if it already exists.
   */
  createIndex(index: string, settings: IndexSettings, mappings: IndexMappings): Promise<void>;

  deleteIndex(index: string): Promise<void>;

  /**
   * Indexes documents concurrently. Resolves once every batch has been
   * acknowledged or has failed; per-document failures, including every
   * document of a failed request, go to `onItem`. An error thrown by
   * `documents` is rethrown after the batches already sent are answered.
   */
  bulkIndex(documents: AsyncIterable<IndexDocument>, options: BulkIndexOptions): Promise<BulkIndexStats>;

  close(): Promise<void>;
}
