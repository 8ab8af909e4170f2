/**
 * Inspection helpers for errors raised by Elasticsearch.
 *
 * `ResponseError` from the client exposes `statusCode` and a `body` of the form
 * `{ error: { type, reason }, status }`; connection errors carry neither. The
 * helpers read those shapes structurally so they also work on stand-ins.
 */

/**
 * Loggable summary of an engine error.
 */
export interface EngineErrorDescription {
  name: string;
  message: string;
  statusCode?: number;
  type?: string;
  reason?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readStatusCode(error: Record<string, unknown>): number | undefined {
  if (typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  const meta = error.meta;
  if (isRecord(meta) && typeof meta.statusCode === 'number') {
    return meta.statusCode;
  }
  return undefined;
}

function readErrorCause(error: Record<string, unknown>): Record<string, unknown> | undefined {
  const body = error.body;
  if (isRecord(body) && isRecord(body.error)) {
    return body.error;
  }
  return undefined;
}

/**
 * Extracts status code, error type and reason from an engine error.
 */
export function describeEngineError(error: unknown): EngineErrorDescription {
  if (!isRecord(error)) {
    return { name: 'UnknownError', message: String(error) };
  }

  const description: EngineErrorDescription = {
    name: typeof error.name === 'string' ? error.name : 'UnknownError',
    message: typeof error.message === 'string' ? error.message : String(error),
  };

  const statusCode = readStatusCode(error);
  if (statusCode !== undefined) {
    description.statusCode = statusCode;
  }

  const cause = readErrorCause(error);
  if (cause) {
    if (typeof cause.type === 'string') {
      description.type = cause.type;
    }
    if (typeof cause.reason === 'string') {
      description.reason = cause.reason;
    }
  }

  return description;
}

/**
 * True when the engine refused to create an index because the name is taken.
 */
export function isResourceAlreadyExistsError(error: unknown): boolean {
  return describeEngineError(error).type === 'resource_already_exists_exception';
}

/**
 * True when the engine reported that the addressed index does not exist.
 */
export function isIndexNotFoundError(error: unknown): boolean {
  return describeEngineError(error).type === 'index_not_found_exception';
}
