/**
 * Configuration types and builder for the Elasticsearch bulk loader.
 * @module config
 */

import type { LogLevel } from '../observability/index.js';
import { ConfigurationError } from '../errors/index.js';
import {
  DEFAULT_NODE,
  DEFAULT_USERNAME,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_MAX_RETRIES,
  createDefaultBulkConfig,
} from './defaults.js';
import { SecretString } from './secret.js';
import { validateConfig } from './validation.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Batching settings for bulkInsert.
 */
export interface BulkConfig {
  /** Number of batches kept in flight. */
  concurrency: number;
  /** Payload size, in bytes, at which a batch is sent. */
  flushBytes: number;
  /** Retries per document for 429 responses. */
  retries: number;
  /** Refresh the target index once every batch is acknowledged. */
  refreshOnCompletion: boolean;
}

/**
 * Applies `overrides` on top of `base`. A key that is absent or explicitly
 * undefined keeps the base value.
 */
export function mergeBulkConfig(base: BulkConfig, overrides: Partial<BulkConfig> = {}): BulkConfig {
  return {
    concurrency: overrides.concurrency ?? base.concurrency,
    flushBytes: overrides.flushBytes ?? base.flushBytes,
    retries: overrides.retries ?? base.retries,
    refreshOnCompletion: overrides.refreshOnCompletion ?? base.refreshOnCompletion,
  };
}

/**
 * Bulk loader configuration.
 */
export interface ElasticsearchConfig {
  /**
   * Elasticsearch endpoint.
   * @default 'https://localhost:9200'
   */
  node: string;

  /**
   * Basic auth username.
   * @default 'elastic'
   */
  username: string;

  /**
   * Basic auth password. Never logged.
   */
  password: SecretString;

  /**
   * Path to the CA certificate used to verify the cluster's TLS certificate.
   */
  caCertPath?: string;

  /**
   * Reject server certificates that do not verify.
   * @default true
   */
  verifyCerts: boolean;

  /**
   * Request timeout in milliseconds.
   * @default 30000
   */
  requestTimeoutMs: number;

  /**
   * Retries for a failed request.
   * @default 3
   */
  maxRetries: number;

  /**
   * Bulk helper settings.
   */
  bulk: BulkConfig;

  /**
   * Minimum level written by the default console logger.
   * @default 'info'
   */
  logLevel: LogLevel;
}

// ============================================================================
// Configuration Builder
// ============================================================================

/**
 * Fluent builder for ElasticsearchConfig objects.
 */
export class ElasticsearchConfigBuilder {
  private node: string = DEFAULT_NODE;
  private username: string = DEFAULT_USERNAME;
  private password?: SecretString;
  private caCertPath?: string;
  private verifyCerts = true;
  private requestTimeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS;
  private maxRetries: number = DEFAULT_MAX_RETRIES;
  private bulk: BulkConfig = createDefaultBulkConfig();
  private logLevel: LogLevel = 'info';

  /**
   * Sets the Elasticsearch endpoint.
   * @param node - Endpoint URL (e.g., "https://localhost:9200")
   */
  withNode(node: string): this {
    if (!node || node.trim().length === 0) {
      throw new ConfigurationError('Node URL cannot be empty');
    }
    this.node = node.trim();
    return this;
  }

  /**
   * Sets basic auth credentials.
   */
  withBasicAuth(username: string, password: string): this {
    return this.withUsername(username).withPassword(password);
  }

  /**
   * Sets the username, keeping the current password.
   */
  withUsername(username: string): this {
    if (!username || username.trim().length === 0) {
      throw new ConfigurationError('Username cannot be empty');
    }
    this.username = username.trim();
    return this;
  }

  /**
   * Sets the password, keeping the current username.
   */
  withPassword(password: string): this {
    if (!password) {
      throw new ConfigurationError('Password cannot be empty');
    }
    this.password = new SecretString(password);
    return this;
  }

  /**
   * Sets the CA certificate path for TLS verification.
   */
  withCaCertPath(caCertPath: string): this {
    if (!caCertPath || caCertPath.trim().length === 0) {
      throw new ConfigurationError('CA certificate path cannot be empty');
    }
    this.caCertPath = caCertPath.trim();
    return this;
  }

  /**
   * Enables or disables TLS certificate verification.
   */
  withVerifyCerts(verifyCerts: boolean): this {
    this.verifyCerts = verifyCerts;
    return this;
  }

  /**
   * Sets the request timeout.
   * @param timeoutMs - Timeout in milliseconds
   */
  withRequestTimeout(timeoutMs: number): this {
    this.requestTimeoutMs = timeoutMs;
    return this;
  }

  /**
   * Sets the maximum number of retries.
   */
  withMaxRetries(maxRetries: number): this {
    this.maxRetries = maxRetries;
    return this;
  }

  /**
   * Overrides bulk settings. Undefined fields are ignored.
   */
  withBulkConfig(config: Partial<BulkConfig>): this {
    this.bulk = mergeBulkConfig(this.bulk, config);
    return this;
  }

  /**
   * Sets the minimum log level.
   */
  withLogLevel(logLevel: LogLevel): this {
    this.logLevel = logLevel;
    return this;
  }

  /**
   * Builds and validates the configuration.
   * @throws ConfigurationError if a value is invalid or the password is missing
   */
  build(): ElasticsearchConfig {
    if (!this.password) {
      throw new ConfigurationError('No password configured (ELASTIC_PASSWORD or withPassword required)');
    }

    const config: ElasticsearchConfig = {
      node: this.node,
      username: this.username,
      password: this.password,
      caCertPath: this.caCertPath,
      verifyCerts: this.verifyCerts,
      requestTimeoutMs: this.requestTimeoutMs,
      maxRetries: this.maxRetries,
      bulk: { ...this.bulk },
      logLevel: this.logLevel,
    };

    validateConfig(config);
    return config;
  }

  /**
   * Creates a builder from an existing config.
   */
  static from(config: ElasticsearchConfig): ElasticsearchConfigBuilder {
    const builder = new ElasticsearchConfigBuilder();
    builder.node = config.node;
    builder.username = config.username;
    builder.password = config.password;
    builder.caCertPath = config.caCertPath;
    builder.verifyCerts = config.verifyCerts;
    builder.requestTimeoutMs = config.requestTimeoutMs;
    builder.maxRetries = config.maxRetries;
    builder.bulk = { ...config.bulk };
    builder.logLevel = config.logLevel;
    return builder;
  }
}

/**
 * Returns a copy of the configuration that is safe to log.
 */
export function sanitizeConfigForLogging(config: ElasticsearchConfig): Record<string, unknown> {
  return {
    node: config.node,
    username: config.username,
    password: '[REDACTED]',
    caCertPath: config.caCertPath,
    verifyCerts: config.verifyCerts,
    requestTimeoutMs: config.requestTimeoutMs,
    maxRetries: config.maxRetries,
    bulk: { ...config.bulk },
    logLevel: config.logLevel,
  };
}
