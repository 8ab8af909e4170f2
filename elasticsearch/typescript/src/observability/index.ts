/**
 * Observability exports.
 */

export type { Logger, LogLevel, LogContext } from './logging.js';
export {
  ConsoleLogger,
  NoopLogger,
  LOG_LEVELS,
  isLogLevel,
  logOperation,
  logError,
} from './logging.js';
