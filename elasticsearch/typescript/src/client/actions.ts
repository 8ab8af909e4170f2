/**
 * Bookkeeping between documents and the bulk actions that index them.
 *
 * Documents are cut into batches by payload size and each batch goes through
 * its own bulk helper run. The helper sends each datasource item as the
 * document body and asks for its action separately, so the registry remembers
 * which `_index`/`_id` each `_source` belongs to. Items the helper reports back
 * are deserialized copies, so outcomes are read from the response item or the
 * action line instead.
 *
 * @module client/actions
 */

import { describeEngineError } from '../errors/index.js';
import type { BulkItemOutcome, IndexDocument, Row } from '../types/index.js';

/**
 * Metadata line of an `index` bulk action.
 */
export interface IndexActionMeta {
  _index: string;
  _id: string;
}

export class ActionRegistry {
  private readonly actions = new WeakMap<Row, IndexActionMeta>();

  /**
   * Returns the `_source` of every document, recording its action first.
   */
  track(documents: readonly IndexDocument[]): Row[] {
    return documents.map((document) => {
      this.actions.set(document._source, { _index: document._index, _id: document._id });
      return document._source;
    });
  }

  /**
   * @throws {Error} If `source` was not returned by `track`
   */
  actionFor(source: Row): IndexActionMeta {
    const action = this.actions.get(source);
    if (!action) {
      throw new Error('Bulk helper asked for the action of an unknown document');
    }
    return action;
  }
}

/**
 * Size of a document's two NDJSON lines in a bulk request body.
 */
export function actionBytes(document: IndexDocument): number {
  const action = JSON.stringify({ index: { _index: document._index, _id: document._id } });
  return Buffer.byteLength(action) + Buffer.byteLength(JSON.stringify(document._source)) + 2;
}

/**
 * Groups documents into batches of at least `flushBytes` bytes, the last one
 * possibly smaller. An error from `documents` ends the iteration; documents
 * read before it and not yet yielded are discarded.
 */
export async function* batchDocuments(
  documents: AsyncIterable<IndexDocument>,
  flushBytes: number
): AsyncGenerator<IndexDocument[], void, undefined> {
  let batch: IndexDocument[] = [];
  let bytes = 0;

  for await (const document of documents) {
    batch.push(document);
    bytes += actionBytes(document);
    if (bytes >= flushBytes) {
      yield batch;
      batch = [];
      bytes = 0;
    }
  }

  if (batch.length > 0) {
    yield batch;
  }
}

function targetKey(index: string, id: string | undefined): string {
  return `${index}\u0000${id ?? ''}`;
}

/**
 * Forwards the outcomes of one batch and remembers which documents have not
 * been answered yet.
 */
export class BatchOutcomes {
  private readonly pending = new Map<string, { index: string; id: string; count: number }>();
  private readonly onItem: (outcome: BulkItemOutcome) => void;
  private settled = false;

  constructor(documents: readonly IndexDocument[], onItem: (outcome: BulkItemOutcome) => void) {
    this.onItem = onItem;
    for (const document of documents) {
      const key = targetKey(document._index, document._id);
      const entry = this.pending.get(key);
      if (entry) {
        entry.count++;
      } else {
        this.pending.set(key, { index: document._index, id: document._id, count: 1 });
      }
    }
  }

  /**
   * Forwards an outcome reported by the engine. Ignored once the batch has
   * been failed.
   */
  report(outcome: BulkItemOutcome): void {
    if (this.settled) {
      return;
    }
    const key = targetKey(outcome.index, outcome.id);
    const entry = this.pending.get(key);
    if (entry) {
      entry.count--;
      if (entry.count === 0) {
        this.pending.delete(key);
      }
    }
    this.onItem(outcome);
  }

  /**
   * Reports every unanswered document as failed with the request's error.
   * Status 0 means the engine sent no HTTP response.
   */
  fail(error: unknown): void {
    if (this.settled) {
      return;
    }
    this.settled = true;

    const description = describeEngineError(error);
    const cause = {
      type: description.type ?? description.name,
      reason: description.reason ?? description.message,
    };
    for (const entry of this.pending.values()) {
      for (let i = 0; i < entry.count; i++) {
        this.onItem({
          index: entry.index,
          id: entry.id,
          status: description.statusCode ?? 0,
          error: cause,
        });
      }
    }
    this.pending.clear();
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Reads the outcome of a successful bulk item.
 *
 * Accepts the response item itself or its `{ index: item }` container, the
 * two shapes `onSuccess` has received across client releases.
 *
 * @returns Undefined when neither shape matches
 */
export function toSuccessOutcome(result: unknown): BulkItemOutcome | undefined {
  const item = isRecord(result) && isRecord(result.index) ? result.index : result;
  if (!isRecord(item) || typeof item._index !== 'string' || typeof item.status !== 'number') {
    return undefined;
  }
  return {
    index: item._index,
    id: typeof item._id === 'string' ? item._id : undefined,
    status: item.status,
    result: typeof item.result === 'string' ? item.result : undefined,
  };
}

/**
 * Reads the target of a dropped operation from its action line, e.g.
 * `{ index: { _index: 'test', _id: '1' } }`.
 */
export function toDropTarget(operation: unknown): { index: string; id?: string } {
  const meta = isRecord(operation) ? Object.values(operation)[0] : undefined;
  if (!isRecord(meta)) {
    return { index: '' };
  }
  return {
    index: typeof meta._index === 'string' ? meta._index : '',
    id: typeof meta._id === 'string' ? meta._id : undefined,
  };
}
