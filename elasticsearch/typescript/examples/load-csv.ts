/**
 * Load a CSV file into an index
 *
 * Creates the index when it is missing, inserts every row using the value
 * of the identifier column as the document id, and prints the outcome.
 *
 * ## Usage
 *
 * Put the connection settings in `.env` (see `.env.example`), then:
 * ```bash
 * npx tsx examples/load-csv.ts stocks.csv stocks SNo
 * ```
 *
 * Pass `--recreate` as a fourth argument to delete the index first. You will
 * be asked to confirm on the terminal.
 */

import {
  BulkLoader,
  BulkLoaderError,
  ConsoleLogger,
  describeEngineError,
  readCsvDataset,
} from '../src/index.js';

async function main() {
  const [file, index, idField, flag] = process.argv.slice(2);
  if (!file || !index || !idField) {
    console.error('Usage: load-csv.ts <file.csv> <index> <id-field> [--recreate]');
    process.exitCode = 1;
    return;
  }

  const rows = await readCsvDataset(file);
  console.log(`Read ${rows.length} rows from ${file}\n`);

  const loader = await BulkLoader.fromEnv({ logger: new ConsoleLogger('info') });

  try {
    if (flag === '--recreate' && (await loader.indexExists(index))) {
      const deleted = await loader.deleteIndex(index);
      if (!deleted) {
        return;
      }
    }

    if (!(await loader.indexExists(index))) {
      await loader.createIndex(index, {});
    }

    const report = await loader.bulkInsert(index, rows, idField);

    console.log('\nBulk insert:');
    console.log(`  Rows:     ${report.total}`);
    console.log(`  Created:  ${report.created}`);
    console.log(`  Updated:  ${report.updated}`);
    console.log(`  Failed:   ${report.failed}`);
    console.log(`  Duration: ${report.durationMs}ms`);
  } finally {
    await loader.close();
  }
}

main().catch((error: unknown) => {
  if (error instanceof BulkLoaderError) {
    console.error(error.toString());
  } else {
    const { name, message, statusCode } = describeEngineError(error);
    console.error(`${name}${statusCode === undefined ? '' : ` (${statusCode})`}: ${message}`);
  }
  process.exitCode = 1;
});
