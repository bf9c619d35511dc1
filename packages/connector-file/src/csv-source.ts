/**
 * CSV Grid Source
 * Reads delimited text into a raw grid of string cells
 */

import { parse } from 'csv-parse/sync';
import type { CellValue } from '@tallycheck/core';
import { BaseFileSource, type FileSourceConfig } from './base-file-source.js';

export interface CsvSourceConfig extends FileSourceConfig {
  type: 'csv';
  /** CSV delimiter (default: ',') */
  delimiter?: string;
}

export class CsvSource extends BaseFileSource<CsvSourceConfig> {
  constructor(config: Omit<CsvSourceConfig, 'type'> & { type?: 'csv' }) {
    super({ ...config, type: 'csv' });
  }

  protected async parseContent(content: Buffer): Promise<CellValue[][]> {
    const text = content.toString(this.config.encoding ?? 'utf-8');

    // No casting: numeric interpretation belongs to the engine
    const rows: string[][] = parse(text, {
      delimiter: this.config.delimiter ?? ',',
      // Row numbers follow the file
      skip_empty_lines: false,
      relax_column_count: true,
      bom: true,
      cast: false,
    });

    return rows;
  }
}

/**
 * Factory function to create a CSV grid source
 */
export function createCsvSource(
  config: Omit<CsvSourceConfig, 'type'>
): CsvSource {
  return new CsvSource(config);
}
