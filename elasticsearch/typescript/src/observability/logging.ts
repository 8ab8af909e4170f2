/**
 * Structured logging for bulk loader operations.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
}

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const CONSOLE_METHOD: Record<LogLevel, 'error' | 'warn' | 'log' | 'debug'> = {
  error: 'error',
  warn: 'warn',
  info: 'log',
  debug: 'debug',
  trace: 'debug',
};

/**
 * Default loader logger. Writes `[<ISO time>] [<LEVEL>] <message> <context>`
 * lines, the context as JSON, to the console method matching the level.
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;

  constructor(minLevel: LogLevel = 'info') {
    this.minLevel = minLevel;
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.write('trace', message, context);
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}`;
    console[CONSOLE_METHOD[level]](context ? `${line} ${JSON.stringify(context)}` : line);
  }
}

/**
 * Silences a loader, e.g. `new BulkLoader(client, { logger: new NoopLogger() })`
 * in scripts that only read the returned report.
 */
export class NoopLogger implements Logger {
  error(_message: string, _context?: LogContext): void {}

  warn(_message: string, _context?: LogContext): void {}

  info(_message: string, _context?: LogContext): void {}

  debug(_message: string, _context?: LogContext): void {}

  trace(_message: string, _context?: LogContext): void {}
}

/**
 * Logs a completed index operation with its duration.
 */
export function logOperation(
  logger: Logger,
  operation: string,
  index: string,
  durationMs: number,
  context: LogContext = {}
): void {
  logger.info(`Elasticsearch operation completed`, {
    operation,
    index,
    durationMs,
    ...context,
  });
}

/**
 * Logs a failed index operation.
 */
export function logError(logger: Logger, operation: string, index: string, error: unknown): void {
  if (error instanceof Error) {
    logger.error(`Elasticsearch operation failed`, {
      operation,
      index,
      errorName: error.name,
      errorMessage: error.message,
      stack: error.stack,
    });
    return;
  }

  logger.error(`Elasticsearch operation failed`, {
    operation,
    index,
    errorMessage: String(error),
  });
}
