export type { CsvDatasetOptions } from './tabular.js';
export { datasetFromColumns, parseCsvDataset, readCsvDataset } from './tabular.js';
