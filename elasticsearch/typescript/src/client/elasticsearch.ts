/**
 * IndexClient backed by the official Elasticsearch client.
 *
 * Index management methods are single calls into `@elastic/elasticsearch` and
 * engine errors propagate unchanged. Bulk indexing batches documents itself so
 * that one failed request only fails its own documents.
 *
 * @module client/elasticsearch
 */

import { readFileSync } from 'fs';
import { Client } from '@elastic/elasticsearch';
import type { ClientOptions } from '@elastic/elasticsearch';
import type { ElasticsearchConfig } from '../config/index.js';
import { ConfigurationError } from '../errors/index.js';
import type {
  BulkIndexStats,
  ClusterInfo,
  IndexDocument,
  IndexMappings,
  IndexSettings,
  Row,
} from '../types/index.js';
import type { BulkIndexOptions, IndexClient } from './types.js';
import {
  ActionRegistry,
  BatchOutcomes,
  batchDocuments,
  toDropTarget,
  toSuccessOutcome,
} from './actions.js';

/**
 * Maps loader configuration to client options.
 *
 * @throws {ConfigurationError} If the CA certificate cannot be read
 */
export function buildClientOptions(config: ElasticsearchConfig): ClientOptions {
  const options: ClientOptions = {
    node: config.node,
    auth: {
      username: config.username,
      password: config.password.expose(),
    },
    requestTimeout: config.requestTimeoutMs,
    maxRetries: config.maxRetries,
    tls: {
      rejectUnauthorized: config.verifyCerts,
    },
  };

  if (config.caCertPath) {
    let ca: Buffer;
    try {
      ca = readFileSync(config.caCertPath);
    } catch (error) {
      throw new ConfigurationError(`Cannot read CA certificate at ${config.caCertPath}`, error);
    }
    options.tls = { ca, rejectUnauthorized: config.verifyCerts };
  }

  return options;
}

/**
 * Elasticsearch implementation of IndexClient.
 *
 * @example
 * ```typescript
 * const client = ElasticsearchIndexClient.fromConfig(config);
 * const exists = await client.indexExists('products');
 * ```
 */
export class ElasticsearchIndexClient implements IndexClient {
  private readonly client: Client;

  constructor(client: Client) {
    this.client = client;
  }

  /**
   * Creates the underlying client. No request is sent until the first call.
   */
  static fromConfig(config: ElasticsearchConfig): ElasticsearchIndexClient {
    return new ElasticsearchIndexClient(new Client(buildClientOptions(config)));
  }

  /**
   * Gets the underlying client for operations not wrapped here.
   */
  getDriverClient(): Client {
    return this.client;
  }

  async info(): Promise<ClusterInfo> {
    const response = await this.client.info();
    return {
      name: response.name,
      clusterName: response.cluster_name,
      version: response.version.number,
    };
  }

  async indexExists(index: string): Promise<boolean> {
    return this.client.indices.exists({ index });
  }

  async createIndex(index: string, settings: IndexSettings, mappings: IndexMappings): Promise<void> {
    await this.client.indices.create({ index, settings, mappings });
  }

  async deleteIndex(index: string): Promise<void> {
    await this.client.indices.delete({ index });
  }

  /**
   * Sends documents in batches of about `flushBytes`, each through its own
   * `client.helpers.bulk` run, with up to `concurrency` batches in flight.
   *
   * A batch whose request fails is reported document by document through
   * `onItem` and the other batches carry on. If `documents` throws, no new
   * batch is started and the error is rethrown once the batches already sent
   * have been answered.
   */
  async bulkIndex(
    documents: AsyncIterable<IndexDocument>,
    options: BulkIndexOptions
  ): Promise<BulkIndexStats> {
    const stats: BulkIndexStats = { total: 0, retried: 0 };
    const indices = new Set<string>();
    const batches = batchDocuments(documents, options.flushBytes)[Symbol.asyncIterator]();
    const sourceErrors: unknown[] = [];

    const nextBatch = async (): Promise<IndexDocument[] | undefined> => {
      try {
        const next = await batches.next();
        return next.done ? undefined : next.value;
      } catch (error) {
        sourceErrors.push(error);
        return undefined;
      }
    };

    const worker = async (): Promise<void> => {
      let batch = await nextBatch();
      while (batch) {
        stats.total += batch.length;
        for (const document of batch) {
          indices.add(document._index);
        }
        stats.retried += await this.sendBatch(batch, options);
        batch = await nextBatch();
      }
    };

    const workers: Promise<void>[] = [];
    for (let i = 0; i < Math.max(1, options.concurrency); i++) {
      workers.push(worker());
    }
    await Promise.all(workers);

    if (sourceErrors.length > 0) {
      throw sourceErrors[0];
    }
    if (options.refreshOnCompletion && indices.size > 0) {
      await this.client.indices.refresh({ index: [...indices] });
    }
    return stats;
  }

  /**
   * Runs the bulk helper over one batch.
   *
   * @returns Number of documents the helper retried after a 429
   */
  private async sendBatch(batch: IndexDocument[], options: BulkIndexOptions): Promise<number> {
    const registry = new ActionRegistry();
    const outcomes = new BatchOutcomes(batch, options.onItem);

    try {
      const batchStats = await this.client.helpers.bulk<Row>({
        datasource: registry.track(batch),
        concurrency: 1,
        flushBytes: options.flushBytes,
        retries: options.retries,
        onDocument: (source) => ({ index: registry.actionFor(source) }),
        onDrop: (dropped) => {
          outcomes.report({
            ...toDropTarget(dropped.operation),
            status: dropped.status,
            error: dropped.error,
            retried: dropped.retried,
          });
        },
        onSuccess: ({ result }) => {
          const outcome = toSuccessOutcome(result);
          if (outcome) {
            outcomes.report(outcome);
          }
        },
      });
      return batchStats.retry;
    } catch (error) {
      outcomes.fail(error);
      return 0;
    }
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
