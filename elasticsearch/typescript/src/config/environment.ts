/**
 * Environment variable loading for bulk loader configuration.
 * @module config/environment
 */

import dotenv from 'dotenv';
import { ElasticsearchConfigBuilder } from './config.js';
import { ConfigurationError } from '../errors/index.js';
import { isLogLevel } from '../observability/index.js';

export type Environment = Record<string, string | undefined>;

/**
 * Loads a `.env` file into `process.env`. Variables already set are kept.
 *
 * @param path - Path to the file (defaults to `.env` in the working directory)
 * @returns True when a file was read
 */
export function loadDotEnv(path?: string): boolean {
  const result = dotenv.config(path === undefined ? {} : { path });
  return result.error === undefined;
}

/**
 * Creates a configuration builder from environment variables.
 *
 * Environment variables:
 * - ELASTIC_URL: Endpoint URL (default "https://localhost:9200")
 * - ELASTIC_USERNAME: Basic auth username (default "elastic")
 * - ELASTIC_PASSWORD: Basic auth password (required at build time)
 * - ELASTIC_CERT: Path to the CA certificate
 * - ELASTIC_VERIFY_CERTS: Verify TLS certificates (true/false)
 * - ELASTIC_REQUEST_TIMEOUT_MS: Request timeout in milliseconds
 * - ELASTIC_MAX_RETRIES: Maximum retry attempts
 * - ELASTIC_BULK_CONCURRENCY: Bulk requests in flight
 * - ELASTIC_BULK_FLUSH_BYTES: Bulk flush threshold in bytes
 * - ELASTIC_BULK_RETRIES: Per-document retries on 429
 * - ELASTIC_LOG_LEVEL: error, warn, info, debug or trace
 *
 * @param env - Variables to read (defaults to `process.env`)
 * @returns A builder pre-configured from the environment
 * @throws {ConfigurationError} If a variable holds an invalid value
 */
export function loadConfigFromEnv(env: Environment = process.env): ElasticsearchConfigBuilder {
  const builder = new ElasticsearchConfigBuilder();

  const node = env.ELASTIC_URL;
  if (node) {
    builder.withNode(node);
  }

  const username = env.ELASTIC_USERNAME;
  if (username) {
    builder.withUsername(username);
  }

  const password = env.ELASTIC_PASSWORD;
  if (password) {
    builder.withPassword(password);
  }

  const caCertPath = env.ELASTIC_CERT;
  if (caCertPath) {
    builder.withCaCertPath(caCertPath);
  }

  const verifyCerts = env.ELASTIC_VERIFY_CERTS;
  if (verifyCerts !== undefined && verifyCerts !== '') {
    builder.withVerifyCerts(parseBoolean('ELASTIC_VERIFY_CERTS', verifyCerts));
  }

  const timeout = env.ELASTIC_REQUEST_TIMEOUT_MS;
  if (timeout) {
    builder.withRequestTimeout(parseInteger('ELASTIC_REQUEST_TIMEOUT_MS', timeout));
  }

  const maxRetries = env.ELASTIC_MAX_RETRIES;
  if (maxRetries) {
    builder.withMaxRetries(parseInteger('ELASTIC_MAX_RETRIES', maxRetries));
  }

  const concurrency = env.ELASTIC_BULK_CONCURRENCY;
  if (concurrency) {
    builder.withBulkConfig({ concurrency: parseInteger('ELASTIC_BULK_CONCURRENCY', concurrency) });
  }

  const flushBytes = env.ELASTIC_BULK_FLUSH_BYTES;
  if (flushBytes) {
    builder.withBulkConfig({ flushBytes: parseInteger('ELASTIC_BULK_FLUSH_BYTES', flushBytes) });
  }

  const bulkRetries = env.ELASTIC_BULK_RETRIES;
  if (bulkRetries) {
    builder.withBulkConfig({ retries: parseInteger('ELASTIC_BULK_RETRIES', bulkRetries) });
  }

  const logLevel = env.ELASTIC_LOG_LEVEL;
  if (logLevel) {
    const level = logLevel.toLowerCase();
    if (!isLogLevel(level)) {
      throw new ConfigurationError(`Invalid ELASTIC_LOG_LEVEL environment variable: ${logLevel}`);
    }
    builder.withLogLevel(level);
  }

  return builder;
}

function parseInteger(name: string, value: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new ConfigurationError(`Invalid ${name} environment variable: ${value}`);
  }
  return parsed;
}

function parseBoolean(name: string, value: string): boolean {
  switch (value.toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new ConfigurationError(`Invalid ${name} environment variable: ${value}`);
  }
}
