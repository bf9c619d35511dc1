/**
 * Excel Grid Source
 * Reads .xlsx workbooks into a raw grid of cells
 */

import ExcelJS from 'exceljs';
import type { CellValue } from '@tallycheck/core';
import { SourceError } from '@tallycheck/core';
import { BaseFileSource, type FileSourceConfig } from './base-file-source.js';

export interface ExcelSourceConfig extends FileSourceConfig {
  type: 'excel';
  /** Sheet name or 1-based position (default: first sheet) */
  sheet?: string | number;
}

/**
 * Flatten an exceljs cell value to a plain cell
 */
export function toCellValue(value: ExcelJS.CellValue): CellValue {
  if (value === null || value === undefined) {
    return null;
  }

  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }

  // Formula results
  if ('formula' in value || 'sharedFormula' in value) {
    return toCellValue(value.result);
  }

  // Rich text
  if ('richText' in value) {
    return value.richText.map((rt) => rt.text).join('');
  }

  // Hyperlinks
  if ('hyperlink' in value) {
    return value.text;
  }

  // #N/A, #DIV/0! and friends carry no value
  return null;
}

export class ExcelSource extends BaseFileSource<ExcelSourceConfig> {
  constructor(config: Omit<ExcelSourceConfig, 'type'> & { type?: 'excel' }) {
    super({ ...config, type: 'excel' });
  }

  protected async parseContent(content: Buffer): Promise<CellValue[][]> {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.load(content);

    const sheet = this.getSheet(workbook);
    if (!sheet) {
      throw new SourceError({
        code: 'SHEET_NOT_FOUND',
        message: `Sheet not found: ${this.config.sheet ?? 'first sheet'}`,
        sourceId: this.config.id,
        suggestion: 'Check that the sheet name or position is correct.',
        context: { sheets: workbook.worksheets.map((ws) => ws.name) },
      });
    }

    const rows: CellValue[][] = [];
    for (let r = 1; r <= sheet.rowCount; r++) {
      const row = sheet.getRow(r);
      const cells: CellValue[] = [];
      for (let c = 1; c <= row.cellCount; c++) {
        cells.push(toCellValue(row.getCell(c).value));
      }
      rows.push(cells);
    }

    return rows;
  }

  private getSheet(workbook: ExcelJS.Workbook): ExcelJS.Worksheet | undefined {
    const { sheet } = this.config;

    if (typeof sheet === 'string') {
      return workbook.getWorksheet(sheet);
    }

    if (typeof sheet === 'number') {
      return workbook.worksheets[sheet - 1];
    }

    // Default: first sheet
    return workbook.worksheets[0];
  }
}

/**
 * Factory function to create an Excel grid source
 */
export function createExcelSource(
  config: Omit<ExcelSourceConfig, 'type'>
): ExcelSource {
  return new ExcelSource(config);
}
