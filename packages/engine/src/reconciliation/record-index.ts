/**
 * Record Index
 *
 * Reads named line items from one side of the grid. The right side is
 * held in a RecordIndex keyed by normalized name; the left side is read
 * into an ordered list.
 */

import { cellText, getCell } from '@tallycheck/core';
import type { Grid, SideColumns } from '@tallycheck/core';
import { parseNumber } from '../parsing/index.js';
import type {
  EmptyCellPolicy,
  LedgerRecord,
  RowRange,
} from '../types/index.js';

export interface RecordReadOptions {
  /** Rows up to and including this one are skipped */
  headerRow?: number | null;
  /** Inclusive grid row bounds */
  rowRange?: RowRange;
  /** Default: "unparseable" */
  emptyCellPolicy?: EmptyCellPolicy;
}

/**
 * Lookup key for a line-item name
 */
export function normalizeKey(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Read one line item, or null when the name cell is blank
 */
export function readRecord(
  grid: Grid,
  row: number,
  columns: SideColumns,
  emptyCellPolicy: EmptyCellPolicy = 'unparseable'
): LedgerRecord | null {
  const displayName = cellText(getCell(grid, row, columns.name));
  if (!displayName) {
    return null;
  }

  return Object.freeze({
    sourceRowIndex: row,
    displayName,
    normalizedKey: normalizeKey(displayName),
    budget: parseNumber(getCell(grid, row, columns.budget), { emptyCellPolicy }),
    actual: parseNumber(getCell(grid, row, columns.actual), { emptyCellPolicy }),
  });
}

/**
 * Line items in sheet order, skipping header rows and blank names
 */
export function collectRecords(
  grid: Grid,
  columns: SideColumns,
  options: RecordReadOptions = {}
): LedgerRecord[] {
  const firstDataRow =
    options.headerRow === null || options.headerRow === undefined
      ? 0
      : options.headerRow + 1;
  const start = Math.max(options.rowRange?.start ?? 0, firstDataRow);
  const end = Math.min(options.rowRange?.end ?? grid.length - 1, grid.length - 1);

  const records: LedgerRecord[] = [];
  for (let row = start; row <= end; row++) {
    const record = readRecord(grid, row, columns, options.emptyCellPolicy);
    if (record) {
      records.push(record);
    }
  }
  return records;
}

/**
 * Line items keyed by normalized name. A later row with the same name
 * replaces the earlier one but keeps its place in iteration order.
 */
export class RecordIndex implements Iterable<[string, LedgerRecord]> {
  private readonly records = new Map<string, LedgerRecord>();
  private superseded = 0;

  /**
   * Index one side of the grid
   */
  static build(
    grid: Grid,
    columns: SideColumns,
    options: RecordReadOptions = {}
  ): RecordIndex {
    return RecordIndex.fromRecords(collectRecords(grid, columns, options));
  }

  static fromRecords(records: Iterable<LedgerRecord>): RecordIndex {
    const index = new RecordIndex();
    for (const record of records) {
      index.add(record);
    }
    return index;
  }

  private add(record: LedgerRecord): void {
    if (this.records.has(record.normalizedKey)) {
      this.superseded++;
    }
    this.records.set(record.normalizedKey, record);
  }

  get(key: string): LedgerRecord | undefined {
    return this.records.get(key);
  }

  /** Number of distinct names */
  get size(): number {
    return this.records.size;
  }

  /** Rows replaced by a later row with the same name */
  get supersededCount(): number {
    return this.superseded;
  }

  [Symbol.iterator](): IterableIterator<[string, LedgerRecord]> {
    return this.records.entries();
  }
}
