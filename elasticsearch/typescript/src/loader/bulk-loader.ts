/**
 * Bulk loader: index management and concurrent bulk insertion of datasets.
 *
 * @module loader/bulk-loader
 */

import type { BulkConfig, ElasticsearchConfig, Environment } from '../config/index.js';
import {
  DEFAULT_BULK_CONFIG,
  DEFAULT_INDEX_SETTINGS,
  loadConfigFromEnv,
  loadDotEnv,
  mergeBulkConfig,
  sanitizeConfigForLogging,
} from '../config/index.js';
import type { IndexClient } from '../client/index.js';
import { ElasticsearchIndexClient } from '../client/index.js';
import type { ConfirmationPolicy } from '../confirm/index.js';
import { createConsoleConfirmation } from '../confirm/index.js';
import { generateDocuments, findDuplicateIds, toAsyncDocuments } from '../documents/index.js';
import { DuplicateIdError, isResourceAlreadyExistsError, describeEngineError } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import { ConsoleLogger, logError, logOperation } from '../observability/index.js';
import type {
  BulkInsertReport,
  BulkItemOutcome,
  Dataset,
  IndexDocument,
  IndexMappings,
  Row,
} from '../types/index.js';
import { CREATED_STATUS } from '../types/index.js';

/**
 * Options for constructing a BulkLoader.
 */
export interface BulkLoaderOptions {
  /** Defaults to a ConsoleLogger at 'info'. */
  logger?: Logger;
  /** Asked before an index is deleted. Defaults to a terminal prompt. */
  confirm?: ConfirmationPolicy;
  /** Bulk defaults for every bulkInsert call. */
  bulk?: Partial<BulkConfig>;
}

/**
 * Options for BulkLoader.fromEnv.
 */
export interface FromEnvOptions extends BulkLoaderOptions {
  /** Path of the `.env` file to load. Defaults to `.env` in the working directory. */
  envFile?: string;
  /** Variables to read instead of `process.env`. No `.env` file is loaded when set. */
  env?: Environment;
}

/**
 * Per-call overrides for bulkInsert.
 */
export interface BulkInsertOptions extends Partial<BulkConfig> {
  /**
   * Reject the dataset before sending anything if an identifier repeats.
   * When false (the default) later rows overwrite earlier ones.
   */
  checkDuplicateIds?: boolean;
}

/**
 * Options for deleteIndex.
 */
export interface DeleteIndexOptions {
  /** Skip the confirmation prompt. */
  force?: boolean;
}

/**
 * Prompt shown before an index is deleted.
 */
export function deletionPrompt(index: string): string {
  return `WARNING: Being asked to delete ${index}, is this correct? (y/n) `;
}

/**
 * Loads tabular datasets into Elasticsearch indices.
 *
 * @example
 * ```typescript
 * const loader = await BulkLoader.fromEnv();
 *
 * if (!(await loader.indexExists('stocks'))) {
 *   await loader.createIndex('stocks', { properties: { SNo: { type: 'integer' } } });
 * }
 * await loader.bulkInsert('stocks', rows, 'SNo');
 * await loader.close();
 * ```
 */
export class BulkLoader {
  private readonly client: IndexClient;
  private readonly logger: Logger;
  private readonly confirm: ConfirmationPolicy;
  private readonly bulkConfig: BulkConfig;

  constructor(client: IndexClient, options: BulkLoaderOptions = {}) {
    this.client = client;
    this.logger = options.logger ?? new ConsoleLogger();
    this.confirm = options.confirm ?? createConsoleConfirmation();
    this.bulkConfig = mergeBulkConfig(DEFAULT_BULK_CONFIG, options.bulk);
  }

  /**
   * Connects to the cluster described by `config` and checks that it answers.
   *
   * @throws The client's connection or authentication error, unchanged
   */
  static async connect(config: ElasticsearchConfig, options: BulkLoaderOptions = {}): Promise<BulkLoader> {
    const logger = options.logger ?? new ConsoleLogger(config.logLevel);
    logger.debug('Connecting to Elasticsearch', sanitizeConfigForLogging(config));

    return BulkLoader.open(ElasticsearchIndexClient.fromConfig(config), {
      ...options,
      logger,
      bulk: mergeBulkConfig(config.bulk, options.bulk),
    });
  }

  /**
   * Loads `.env`, reads the ELASTIC_* variables and connects.
   *
   * @throws {ConfigurationError} If a variable is missing or invalid
   */
  static async fromEnv(options: FromEnvOptions = {}): Promise<BulkLoader> {
    const { env, envFile, ...loaderOptions } = options;
    if (env === undefined) {
      loadDotEnv(envFile);
    }
    const config = loadConfigFromEnv(env).build();
    return BulkLoader.connect(config, loaderOptions);
  }

  /**
   * Wraps an existing client and checks that the cluster answers. The client
   * is closed if it does not.
   */
  static async open(client: IndexClient, options: BulkLoaderOptions = {}): Promise<BulkLoader> {
    const loader = new BulkLoader(client, options);
    try {
      const info = await client.info();
      loader.logger.info('Connected to Elasticsearch', {
        cluster: info.clusterName,
        node: info.name,
        version: info.version,
      });
    } catch (error) {
      loader.logger.error('Elasticsearch connection failed', { ...describeEngineError(error) });
      await client.close();
      throw error;
    }
    return loader;
  }

  /**
   * Yields one document per row, lazily and in dataset order.
   */
  generateDocuments<TRow extends Row>(
    index: string,
    dataset: Iterable<TRow>,
    idField: string
  ): Generator<IndexDocument<TRow>, void, undefined> {
    return generateDocuments(index, dataset, idField);
  }

  /**
   * Inserts every row of `dataset` into `index`, using the value of `idField`
   * as the document id.
   *
   * Batches are sent concurrently. A document that is not created (rejected,
   * or overwriting an existing id) is logged at warn level and counted; it
   * never fails the call or stops other batches. Resolves once every batch
   * has been acknowledged or has failed.
   *
   * @throws {MissingIdFieldError} If a row has no usable identifier
   * @throws {DuplicateIdError} If `checkDuplicateIds` is set and an id repeats
   */
  async bulkInsert(
    index: string,
    dataset: Dataset,
    idField: string,
    options: BulkInsertOptions = {}
  ): Promise<BulkInsertReport> {
    const { checkDuplicateIds = false, ...overrides } = options;
    const bulk = mergeBulkConfig(this.bulkConfig, overrides);

    let rows: Dataset = dataset;
    if (checkDuplicateIds) {
      rows = Array.from(dataset);
      const duplicates = findDuplicateIds(rows, idField);
      if (duplicates.length > 0) {
        throw new DuplicateIdError(idField, duplicates);
      }
    }

    const report: BulkInsertReport = {
      index,
      total: 0,
      created: 0,
      updated: 0,
      failed: 0,
      retried: 0,
      durationMs: 0,
    };

    const onItem = (outcome: BulkItemOutcome): void => {
      if (outcome.status === CREATED_STATUS) {
        report.created++;
        return;
      }
      if (outcome.status >= 200 && outcome.status < 300 && !outcome.error) {
        report.updated++;
      } else {
        report.failed++;
      }
      this.logger.warn('Bulk insert item was not created', { ...outcome });
    };

    const started = Date.now();
    try {
      const stats = await this.client.bulkIndex(
        toAsyncDocuments(generateDocuments(index, rows, idField)),
        { ...bulk, onItem }
      );
      report.total = stats.total;
      report.retried = stats.retried;
    } catch (error) {
      logError(this.logger, 'bulkInsert', index, error);
      throw error;
    }
    report.durationMs = Date.now() - started;

    logOperation(this.logger, 'bulkInsert', index, report.durationMs, {
      total: report.total,
      created: report.created,
      updated: report.updated,
      failed: report.failed,
    });

    return report;
  }

  /**
   * Creates `index` with one shard, one replica and the given mappings.
   *
   * @throws The engine's `resource_already_exists_exception` if the name is taken
   */
  async createIndex(index: string, mappings: IndexMappings): Promise<void> {
    const settings = { ...DEFAULT_INDEX_SETTINGS };
    const started = Date.now();
    try {
      await this.client.createIndex(index, settings, mappings);
    } catch (error) {
      if (isResourceAlreadyExistsError(error)) {
        this.logger.error('Index already exists', { index });
      } else {
        logError(this.logger, 'createIndex', index, error);
      }
      throw error;
    }
    logOperation(this.logger, 'createIndex', index, Date.now() - started, { settings });
  }

  async indexExists(index: string): Promise<boolean> {
    return this.client.indexExists(index);
  }

  /**
   * Deletes `index` after the confirmation policy agrees.
   *
   * @returns False, with nothing deleted, when the operator declines
   */
  async deleteIndex(index: string, options: DeleteIndexOptions = {}): Promise<boolean> {
    if (!options.force) {
      const confirmed = await this.confirm(deletionPrompt(index));
      if (!confirmed) {
        this.logger.info(`Interrupted deletion of ${index}.`, { index });
        return false;
      }
    }

    const started = Date.now();
    try {
      await this.client.deleteIndex(index);
    } catch (error) {
      logError(this.logger, 'deleteIndex', index, error);
      throw error;
    }
    logOperation(this.logger, 'deleteIndex', index, Date.now() - started);
    return true;
  }

  /**
   * Closes the client session.
   */
  async close(): Promise<void> {
    await this.client.close();
  }
}
