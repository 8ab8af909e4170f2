/**
 * Tests for bulk loader configuration.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  ElasticsearchConfigBuilder,
  SecretString,
  mergeBulkConfig,
  sanitizeConfigForLogging,
  loadConfigFromEnv,
  loadDotEnv,
  DEFAULT_NODE,
  DEFAULT_USERNAME,
} from '../index.js';
import { ConfigurationError } from '../../errors/index.js';

describe('SecretString', () => {
  it('should hide value in toString()', () => {
    const secret = new SecretString('test-secret');
    expect(secret.toString()).toBe('[REDACTED]');
  });

  it('should hide value in JSON', () => {
    const secret = new SecretString('test-secret');
    expect(JSON.stringify({ password: secret })).toBe('{"password":"[REDACTED]"}');
  });

  it('should expose value with expose()', () => {
    const secret = new SecretString('test-secret');
    expect(secret.expose()).toBe('test-secret');
  });
});

describe('ElasticsearchConfigBuilder', () => {
  describe('defaults', () => {
    it('should apply defaults when only the password is set', () => {
      const config = new ElasticsearchConfigBuilder().withPassword('test-secret').build();

      expect(config.node).toBe(DEFAULT_NODE);
      expect(config.node).toBe('https://localhost:9200');
      expect(config.username).toBe(DEFAULT_USERNAME);
      expect(config.username).toBe('elastic');
      expect(config.password.expose()).toBe('test-secret');
      expect(config.caCertPath).toBeUndefined();
      expect(config.verifyCerts).toBe(true);
      expect(config.requestTimeoutMs).toBe(30000);
      expect(config.maxRetries).toBe(3);
      expect(config.bulk).toEqual({
        concurrency: 5,
        flushBytes: 5_000_000,
        retries: 3,
        refreshOnCompletion: false,
      });
      expect(config.logLevel).toBe('info');
    });
  });

  describe('overrides', () => {
    it('should apply every setter', () => {
      const config = new ElasticsearchConfigBuilder()
        .withNode('http://es.internal.test:9200')
        .withBasicAuth('loader', 'test-secret')
        .withCaCertPath('/etc/certs/ca.crt')
        .withVerifyCerts(false)
        .withRequestTimeout(5000)
        .withMaxRetries(0)
        .withBulkConfig({ concurrency: 2 })
        .withBulkConfig({ refreshOnCompletion: true })
        .withLogLevel('debug')
        .build();

      expect(config.node).toBe('http://es.internal.test:9200');
      expect(config.username).toBe('loader');
      expect(config.password.expose()).toBe('test-secret');
      expect(config.caCertPath).toBe('/etc/certs/ca.crt');
      expect(config.verifyCerts).toBe(false);
      expect(config.requestTimeoutMs).toBe(5000);
      expect(config.maxRetries).toBe(0);
      expect(config.bulk).toEqual({
        concurrency: 2,
        flushBytes: 5_000_000,
        retries: 3,
        refreshOnCompletion: true,
      });
      expect(config.logLevel).toBe('debug');
    });

    it('should ignore bulk settings passed as undefined', () => {
      const config = new ElasticsearchConfigBuilder()
        .withPassword('test-secret')
        .withBulkConfig({ concurrency: 2 })
        .withBulkConfig({ concurrency: undefined, retries: undefined })
        .build();

      expect(config.bulk).toEqual({
        concurrency: 2,
        flushBytes: 5_000_000,
        retries: 3,
        refreshOnCompletion: false,
      });
    });

    it('should copy an existing config with from()', () => {
      const original = new ElasticsearchConfigBuilder()
        .withPassword('test-secret')
        .withBulkConfig({ concurrency: 8 })
        .build();

      const copy = ElasticsearchConfigBuilder.from(original).withNode('https://other.test:9200').build();

      expect(copy.node).toBe('https://other.test:9200');
      expect(copy.password.expose()).toBe('test-secret');
      expect(copy.bulk.concurrency).toBe(8);
      expect(original.node).toBe('https://localhost:9200');
    });
  });

  describe('validation', () => {
    it('should throw ConfigurationError without a password', () => {
      expect(() => new ElasticsearchConfigBuilder().build()).toThrow(ConfigurationError);
      expect(() => new ElasticsearchConfigBuilder().build()).toThrow(
        'Configuration error: No password configured (ELASTIC_PASSWORD or withPassword required)'
      );
    });

    it('should throw ConfigurationError for empty setter values', () => {
      expect(() => new ElasticsearchConfigBuilder().withNode('')).toThrow(ConfigurationError);
      expect(() => new ElasticsearchConfigBuilder().withUsername('')).toThrow(ConfigurationError);
      expect(() => new ElasticsearchConfigBuilder().withPassword('')).toThrow(ConfigurationError);
      expect(() => new ElasticsearchConfigBuilder().withCaCertPath('')).toThrow(ConfigurationError);
    });

    it('should reject a node URL that does not parse', () => {
      const builder = new ElasticsearchConfigBuilder().withPassword('test-secret').withNode('not a url');
      expect(() => builder.build()).toThrow('Configuration error: Invalid node URL: not a url');
    });

    it('should reject a non-HTTP node URL', () => {
      const builder = new ElasticsearchConfigBuilder()
        .withPassword('test-secret')
        .withNode('ftp://localhost:9200');
      expect(() => builder.build()).toThrow(
        'Configuration error: Node URL must use http: or https: protocol'
      );
    });

    it('should reject a non-positive timeout', () => {
      const builder = new ElasticsearchConfigBuilder().withPassword('test-secret').withRequestTimeout(0);
      expect(() => builder.build()).toThrow('Configuration error: Request timeout must be positive');
    });

    it('should reject negative retries', () => {
      const builder = new ElasticsearchConfigBuilder().withPassword('test-secret').withMaxRetries(-1);
      expect(() => builder.build()).toThrow(ConfigurationError);
    });

    it('should reject invalid bulk settings', () => {
      const zeroConcurrency = new ElasticsearchConfigBuilder()
        .withPassword('test-secret')
        .withBulkConfig({ concurrency: 0 });
      expect(() => zeroConcurrency.build()).toThrow(
        'Configuration error: Bulk concurrency must be a positive integer'
      );

      const fractionalFlush = new ElasticsearchConfigBuilder()
        .withPassword('test-secret')
        .withBulkConfig({ flushBytes: 1.5 });
      expect(() => fractionalFlush.build()).toThrow(
        'Configuration error: Bulk flushBytes must be a positive integer'
      );

      const negativeRetries = new ElasticsearchConfigBuilder()
        .withPassword('test-secret')
        .withBulkConfig({ retries: -1 });
      expect(() => negativeRetries.build()).toThrow(
        'Configuration error: Bulk retries must be a non-negative integer'
      );
    });
  });
});

describe('mergeBulkConfig', () => {
  const base = { concurrency: 5, flushBytes: 100, retries: 3, refreshOnCompletion: false };

  it('should apply defined overrides', () => {
    expect(mergeBulkConfig(base, { flushBytes: 1, refreshOnCompletion: true })).toEqual({
      concurrency: 5,
      flushBytes: 1,
      retries: 3,
      refreshOnCompletion: true,
    });
  });

  it('should keep base values for undefined overrides', () => {
    expect(mergeBulkConfig(base, { concurrency: undefined, retries: 0 })).toEqual({
      concurrency: 5,
      flushBytes: 100,
      retries: 0,
      refreshOnCompletion: false,
    });
  });

  it('should return a copy of base without overrides', () => {
    const merged = mergeBulkConfig(base);

    expect(merged).toEqual(base);
    expect(merged).not.toBe(base);
  });
});

describe('sanitizeConfigForLogging', () => {
  it('should redact the password and keep everything else', () => {
    const config = new ElasticsearchConfigBuilder().withPassword('test-secret').build();
    const sanitized = sanitizeConfigForLogging(config);

    expect(sanitized.password).toBe('[REDACTED]');
    expect(sanitized.node).toBe('https://localhost:9200');
    expect(sanitized.username).toBe('elastic');
    expect(JSON.stringify(sanitized)).not.toContain('test-secret');
  });
});

describe('loadConfigFromEnv', () => {
  it('should read every ELASTIC_* variable', () => {
    const config = loadConfigFromEnv({
      ELASTIC_URL: 'https://es.internal.test:9200',
      ELASTIC_USERNAME: 'loader',
      ELASTIC_PASSWORD: 'test-secret',
      ELASTIC_CERT: '/etc/certs/ca.crt',
      ELASTIC_VERIFY_CERTS: 'false',
      ELASTIC_REQUEST_TIMEOUT_MS: '5000',
      ELASTIC_MAX_RETRIES: '1',
      ELASTIC_BULK_CONCURRENCY: '8',
      ELASTIC_BULK_FLUSH_BYTES: '1000',
      ELASTIC_BULK_RETRIES: '0',
      ELASTIC_LOG_LEVEL: 'DEBUG',
    }).build();

    expect(config.node).toBe('https://es.internal.test:9200');
    expect(config.username).toBe('loader');
    expect(config.password.expose()).toBe('test-secret');
    expect(config.caCertPath).toBe('/etc/certs/ca.crt');
    expect(config.verifyCerts).toBe(false);
    expect(config.requestTimeoutMs).toBe(5000);
    expect(config.maxRetries).toBe(1);
    expect(config.bulk).toEqual({
      concurrency: 8,
      flushBytes: 1000,
      retries: 0,
      refreshOnCompletion: false,
    });
    expect(config.logLevel).toBe('debug');
  });

  it('should fall back to defaults for unset variables', () => {
    const config = loadConfigFromEnv({ ELASTIC_PASSWORD: 'test-secret' }).build();

    expect(config.node).toBe('https://localhost:9200');
    expect(config.username).toBe('elastic');
    expect(config.verifyCerts).toBe(true);
  });

  it('should keep the username when the password is missing', () => {
    const builder = loadConfigFromEnv({ ELASTIC_USERNAME: 'loader' });
    const config = builder.withPassword('test-secret').build();

    expect(config.username).toBe('loader');
  });

  it('should fail to build without ELASTIC_PASSWORD', () => {
    expect(() => loadConfigFromEnv({}).build()).toThrow(ConfigurationError);
  });

  it('should accept 1 and 0 for ELASTIC_VERIFY_CERTS', () => {
    const on = loadConfigFromEnv({ ELASTIC_PASSWORD: 'test-secret', ELASTIC_VERIFY_CERTS: '1' }).build();
    const off = loadConfigFromEnv({ ELASTIC_PASSWORD: 'test-secret', ELASTIC_VERIFY_CERTS: '0' }).build();

    expect(on.verifyCerts).toBe(true);
    expect(off.verifyCerts).toBe(false);
  });

  it('should reject an invalid boolean', () => {
    expect(() => loadConfigFromEnv({ ELASTIC_VERIFY_CERTS: 'maybe' })).toThrow(
      'Configuration error: Invalid ELASTIC_VERIFY_CERTS environment variable: maybe'
    );
  });

  it('should reject an invalid number', () => {
    expect(() => loadConfigFromEnv({ ELASTIC_MAX_RETRIES: 'many' })).toThrow(
      'Configuration error: Invalid ELASTIC_MAX_RETRIES environment variable: many'
    );
  });

  it('should reject an unknown log level', () => {
    expect(() => loadConfigFromEnv({ ELASTIC_LOG_LEVEL: 'verbose' })).toThrow(
      'Configuration error: Invalid ELASTIC_LOG_LEVEL environment variable: verbose'
    );
  });
});

describe('loadDotEnv', () => {
  const variable = 'BULK_LOADER_DOTENV_TEST';
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'bulk-loader-env-'));
  });

  afterEach(() => {
    delete process.env[variable];
    rmSync(dir, { recursive: true, force: true });
  });

  it('should load variables from the given file', () => {
    const file = join(dir, '.env');
    writeFileSync(file, `${variable}=from-file\n`);

    expect(loadDotEnv(file)).toBe(true);
    expect(process.env[variable]).toBe('from-file');
  });

  it('should keep variables that are already set', () => {
    const file = join(dir, '.env');
    writeFileSync(file, `${variable}=from-file\n`);
    process.env[variable] = 'from-process';

    loadDotEnv(file);

    expect(process.env[variable]).toBe('from-process');
  });

  it('should return false when the file does not exist', () => {
    expect(loadDotEnv(join(dir, 'missing.env'))).toBe(false);
    expect(process.env[variable]).toBeUndefined();
  });
});
