/**
 * Turns dataset rows into bulk documents.
 *
 * @module documents/generator
 */

import type { Dataset, FieldValue, IndexDocument, Row } from '../types/index.js';
import { MissingIdFieldError } from '../errors/index.js';

/**
 * Converts an identifier cell to a document id.
 *
 * @param value - Cell value of the identifier field
 * @param idField - Identifier field name, for the error message
 * @param rowNumber - 1-based row number, for the error message
 * @throws {MissingIdFieldError} If the value is missing, null or not a scalar
 */
export function toDocumentId(value: FieldValue | undefined, idField: string, rowNumber: number): string {
  if (value === undefined) {
    throw new MissingIdFieldError(idField, rowNumber, 'field is missing');
  }
  if (value === null) {
    throw new MissingIdFieldError(idField, rowNumber, 'value is null');
  }
  if (typeof value === 'object') {
    throw new MissingIdFieldError(idField, rowNumber, 'value is not a scalar');
  }
  return String(value);
}

/**
 * Yields one document per row, in dataset order.
 *
 * The sequence is lazy and not cached: rows are read as the caller pulls, and
 * iterating again means calling this function again with the same dataset.
 *
 * @example
 * ```typescript
 * const docs = [...generateDocuments('test', [{ SNo: 1, name: 'a' }], 'SNo')];
 * // [{ _index: 'test', _id: '1', _source: { SNo: 1, name: 'a' } }]
 * ```
 */
export function* generateDocuments<TRow extends Row = Row>(
  index: string,
  dataset: Iterable<TRow>,
  idField: string
): Generator<IndexDocument<TRow>, void, undefined> {
  let rowNumber = 0;
  for (const row of dataset) {
    rowNumber++;
    yield {
      _index: index,
      _id: toDocumentId(row[idField], idField, rowNumber),
      _source: { ...row },
    };
  }
}

/**
 * Adapts a synchronous document sequence to the async iterable bulkIndex
 * consumes.
 */
export async function* toAsyncDocuments<T>(documents: Iterable<T>): AsyncGenerator<T, void, undefined> {
  for (const document of documents) {
    yield document;
  }
}

/**
 * Identifier values that occur more than once, in first-seen order.
 */
export function findDuplicateIds(dataset: Dataset, idField: string): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();

  let rowNumber = 0;
  for (const row of dataset) {
    rowNumber++;
    const id = toDocumentId(row[idField], idField, rowNumber);
    if (seen.has(id)) {
      duplicates.add(id);
    } else {
      seen.add(id);
    }
  }

  return [...duplicates];
}
