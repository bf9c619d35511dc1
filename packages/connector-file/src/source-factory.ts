/**
 * Pick a grid source by file extension
 */

import { basename, extname } from 'node:path';
import type { IGridSource } from '@tallycheck/core';
import { SourceError } from '@tallycheck/core';
import { createExcelSource } from './excel-source.js';
import { createCsvSource } from './csv-source.js';

export interface GridSourceOptions {
  /** Source id (default: file name) */
  id?: string;
  /** Excel: sheet name or 1-based position */
  sheet?: string | number;
  /** CSV: delimiter (default: ',' or tab for .tsv) */
  delimiter?: string;
  /** CSV: character encoding */
  encoding?: BufferEncoding;
}

/**
 * Create the grid source matching the file's extension
 * @throws SourceError for formats without a reader
 */
export function createGridSource(
  filePath: string,
  options: GridSourceOptions = {}
): IGridSource {
  const name = basename(filePath);
  const id = options.id ?? name;
  const extension = extname(filePath).toLowerCase();

  switch (extension) {
    case '.xlsx':
    case '.xlsm':
      return createExcelSource({ id, name, filePath, sheet: options.sheet });

    case '.csv':
    case '.txt':
      return createCsvSource({
        id,
        name,
        filePath,
        delimiter: options.delimiter,
        encoding: options.encoding,
      });

    case '.tsv':
      return createCsvSource({
        id,
        name,
        filePath,
        delimiter: options.delimiter ?? '\t',
        encoding: options.encoding,
      });

    default:
      throw new SourceError({
        code: 'UNSUPPORTED_FORMAT',
        message: `Unsupported workbook format: ${extension || '(no extension)'}`,
        sourceId: id,
        suggestion: 'Save the workbook as .xlsx or .csv and try again.',
      });
  }
}
