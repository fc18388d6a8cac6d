export * from './csv.js';
export * from './table-reader.js';
export * from './report-writer.js';
