/**
 * Builders for in-memory tabular datasets.
 *
 * @module dataset/tabular
 */

import { readFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { FieldValue, Row } from '../types/index.js';
import { DatasetError } from '../errors/index.js';

/**
 * Options for reading a CSV file.
 */
export interface CsvDatasetOptions {
  /** Field delimiter. Default: ',' */
  delimiter?: string;
  /** Convert numeric cells to numbers. Default: true */
  castNumbers?: boolean;
  /** File encoding. Default: 'utf8' */
  encoding?: BufferEncoding;
}

const fieldValueSchema: z.ZodType<FieldValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(fieldValueSchema),
    z.record(fieldValueSchema),
  ])
);

const recordsSchema = z.array(z.record(fieldValueSchema));

/**
 * Converts a column-oriented table into rows.
 *
 * @example
 * ```typescript
 * datasetFromColumns({ SNo: [1, 2], name: ['a', 'b'] });
 * // [{ SNo: 1, name: 'a' }, { SNo: 2, name: 'b' }]
 * ```
 *
 * @throws {DatasetError} If the columns differ in length
 */
export function datasetFromColumns(columns: Record<string, readonly FieldValue[]>): Row[] {
  const names = Object.keys(columns);
  if (names.length === 0) {
    return [];
  }

  const lengths = new Set(names.map((name) => columns[name].length));
  if (lengths.size > 1) {
    throw new DatasetError(
      `Columns must have the same length, got ${names.map((name) => `${name}=${columns[name].length}`).join(', ')}`
    );
  }

  const rowCount = columns[names[0]].length;
  const rows: Row[] = [];
  for (let i = 0; i < rowCount; i++) {
    const row: Row = {};
    for (const name of names) {
      row[name] = columns[name][i];
    }
    rows.push(row);
  }
  return rows;
}

/**
 * Parses CSV text with a header row into rows.
 *
 * @throws {DatasetError} If the text is not valid CSV
 */
export function parseCsvDataset(text: string, options: CsvDatasetOptions = {}): Row[] {
  let records: unknown;
  try {
    records = parse(text, {
      columns: true,
      skip_empty_lines: true,
      delimiter: options.delimiter ?? ',',
      cast: options.castNumbers ?? true,
    });
  } catch (error) {
    throw new DatasetError(error instanceof Error ? error.message : String(error), error);
  }

  const result = recordsSchema.safeParse(records);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new DatasetError(`Unexpected CSV record shape: ${issues.join(', ')}`);
  }
  return result.data;
}

/**
 * Reads a CSV file with a header row into rows.
 *
 * @throws {DatasetError} If the file cannot be read or parsed
 */
export async function readCsvDataset(path: string, options: CsvDatasetOptions = {}): Promise<Row[]> {
  let text: string;
  try {
    text = await readFile(path, { encoding: options.encoding ?? 'utf8' });
  } catch (error) {
    throw new DatasetError(`Cannot read ${path}`, error);
  }
  return parseCsvDataset(text, options);
}
