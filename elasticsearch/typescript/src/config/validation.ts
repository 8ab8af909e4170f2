/**
 * Configuration validation for the bulk loader.
 * @module config/validation
 */

import { z } from 'zod';
import { SecretString } from './secret.js';
import type { ElasticsearchConfig } from './config.js';
import { ConfigurationError } from '../errors/index.js';
import { isLogLevel } from '../observability/index.js';
import type { LogLevel } from '../observability/index.js';

const nodeSchema = z.string().superRefine((node, ctx) => {
  let url: URL;
  try {
    url = new URL(node);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid node URL: ${node}` });
    return;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Node URL must use http: or https: protocol' });
  }
});

const bulkConfigSchema = z.object({
  concurrency: z
    .number()
    .int('Bulk concurrency must be a positive integer')
    .positive('Bulk concurrency must be a positive integer'),
  flushBytes: z
    .number()
    .int('Bulk flushBytes must be a positive integer')
    .positive('Bulk flushBytes must be a positive integer'),
  retries: z
    .number()
    .int('Bulk retries must be a non-negative integer')
    .nonnegative('Bulk retries must be a non-negative integer'),
  refreshOnCompletion: z.boolean(),
});

/**
 * Zod schema for configuration validation.
 */
const configSchema = z.object({
  node: nodeSchema,
  username: z.string().trim().min(1, 'Username must be a non-empty string'),
  password: z
    .instanceof(SecretString)
    .refine((password) => password.expose().length > 0, 'Password must be a non-empty string'),
  caCertPath: z.string().trim().min(1, 'CA certificate path cannot be empty string').optional(),
  verifyCerts: z.boolean(),
  requestTimeoutMs: z
    .number()
    .finite('Request timeout must be positive')
    .positive('Request timeout must be positive'),
  maxRetries: z
    .number()
    .int('Max retries must be a non-negative integer')
    .nonnegative('Max retries must be a non-negative integer'),
  bulk: bulkConfigSchema,
  logLevel: z.custom<LogLevel>(
    (value) => typeof value === 'string' && isLogLevel(value),
    'Unknown log level'
  ),
});

/**
 * Validates bulk loader configuration.
 *
 * @throws {ConfigurationError} If configuration is invalid
 */
export function validateConfig(config: ElasticsearchConfig): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => issue.message);
    throw new ConfigurationError(issues.join(', '));
  }
}
