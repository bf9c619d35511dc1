/**
 * @tallycheck/connector-file
 *
 * File-based grid sources for Excel and CSV workbooks, and the CSV writer
 * used for mismatch exports
 */

export { BaseFileSource, trimGrid } from './base-file-source.js';
export type { FileSourceConfig } from './base-file-source.js';

export { CsvSource, createCsvSource } from './csv-source.js';
export type { CsvSourceConfig } from './csv-source.js';

export { ExcelSource, createExcelSource, toCellValue } from './excel-source.js';
export type { ExcelSourceConfig } from './excel-source.js';

export { createGridSource } from './source-factory.js';
export type { GridSourceOptions } from './source-factory.js';

export { toCsv, writeCsvFile } from './csv-export.js';
export type { ExportValue, CsvExportOptions } from './csv-export.js';

// Re-export core types for convenience
export type {
  IGridSource,
  GridSourceConfig,
  SourceState,
  Grid,
  GridInfo,
  CellValue,
} from '@tallycheck/core';
