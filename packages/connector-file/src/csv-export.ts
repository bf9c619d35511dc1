/**
 * CSV export of tabular report rows
 */

import { writeFile } from 'node:fs/promises';
import { stringify } from 'csv-stringify/sync';
import { SourceError } from '@tallycheck/core';

/** A single exported value; null is written as an empty field */
export type ExportValue = string | number | null;

export interface CsvExportOptions {
  /** Column order and header names */
  columns: readonly string[];
}

const FORMULA_ESCAPE_PREFIX = "'";

/**
 * Mitigate CSV/Excel formula injection by prefixing text values that start
 * with =, +, -, or @ (after optional whitespace)
 */
function sanitizeFormulaValue(value: ExportValue): ExportValue {
  if (typeof value !== 'string') return value;
  if (value.startsWith(FORMULA_ESCAPE_PREFIX)) return value;
  return /^[\t\r\n ]*[=+\-@]/.test(value) ? `${FORMULA_ESCAPE_PREFIX}${value}` : value;
}

/**
 * Serialize rows to CSV text with a header line
 */
export function toCsv(
  rows: ReadonlyArray<Readonly<Record<string, ExportValue>>>,
  options: CsvExportOptions
): string {
  const records = rows.map((row) =>
    options.columns.map((column) => sanitizeFormulaValue(row[column] ?? null))
  );

  return stringify(records, {
    header: true,
    columns: [...options.columns],
  });
}

/**
 * Write rows to a CSV file
 * @throws SourceError if the file cannot be written
 */
export async function writeCsvFile(
  filePath: string,
  rows: ReadonlyArray<Readonly<Record<string, ExportValue>>>,
  options: CsvExportOptions
): Promise<void> {
  try {
    await writeFile(filePath, toCsv(rows, options), 'utf-8');
  } catch (error) {
    throw new SourceError({
      code: 'WRITE_FAILED',
      message: `Failed to write export: ${error instanceof Error ? error.message : String(error)}`,
      suggestion: 'Check that the export directory exists and is writable.',
      cause: error instanceof Error ? error : undefined,
      context: { filePath },
    });
  }
}
