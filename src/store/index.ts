export { RecordStore, type LoadSource, type RecordStoreOptions } from './record-store.js';
export { LoadError, UpdateError, isLoadError, type LoadErrorReason, type UpdateErrorReason } from './errors.js';
export { COLUMNS, REQUIRED_COLUMNS, parseLicenseCsv, toCsv, type ParsedDataset } from './schema.js';
export { parseCsv, stringifyCsv, csvEscape, type CsvTable } from './csv.js';
