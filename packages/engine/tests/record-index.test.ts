import { describe, expect, it } from 'vitest';
import { collectRecords, normalizeKey, RecordIndex } from '../src/index.js';

const columns = { name: 0, budget: 1, actual: 2 };

const grid = [
  ['Item', 'Budget', 'Actual'],
  ['Rent', '500', '480'],
  ['', '1', '2'],
  ['  Travel ', '(120)', 'abc'],
  ['rent', '510', ''],
  [null, null, null],
  ['Meals', 40, undefined],
];

describe('normalizeKey', () => {
  it('trims and lowercases', () => {
    expect(normalizeKey('  Office Supplies ')).toBe('office supplies');
  });
});

describe('RecordIndex', () => {
  it('indexes named rows below the header', () => {
    const index = RecordIndex.build(grid, columns, { headerRow: 0 });

    expect(index.size).toBe(3);
    expect([...index].map(([key]) => key)).toEqual(['rent', 'travel', 'meals']);
    expect(index.get('item')).toBeUndefined();
    expect(index.get('travel')).toEqual({
      sourceRowIndex: 3,
      displayName: 'Travel',
      normalizedKey: 'travel',
      budget: -120,
      actual: null,
    });
  });

  it('keeps the last row for a repeated name', () => {
    const index = RecordIndex.build(grid, columns, { headerRow: 0 });

    expect(index.supersededCount).toBe(1);
    expect(index.get('rent')).toEqual({
      sourceRowIndex: 4,
      displayName: 'rent',
      normalizedKey: 'rent',
      budget: 510,
      actual: null,
    });
  });

  it('reads blank figures as zero under the zero policy', () => {
    const index = RecordIndex.build(grid, columns, {
      headerRow: 0,
      emptyCellPolicy: 'zero',
    });

    expect(index.get('rent')?.actual).toBe(0);
    expect(index.get('meals')?.actual).toBe(0);
    expect(index.get('travel')?.actual).toBeNull();
  });

  it('freezes records', () => {
    const index = RecordIndex.build(grid, columns);
    const record = index.get('meals');
    expect(record).toBeDefined();
    expect(Object.isFrozen(record)).toBe(true);
  });

  it('converts non-text name cells to text', () => {
    const index = RecordIndex.build([[2024, '1', '2']], columns);
    expect(index.get('2024')?.displayName).toBe('2024');
  });
});

describe('collectRecords', () => {
  it('lists records in sheet order, duplicates included', () => {
    const records = collectRecords(grid, columns, { headerRow: 0 });
    expect(records.map((r) => r.sourceRowIndex)).toEqual([1, 3, 4, 6]);
  });

  it('reads row 0 as data without a header', () => {
    const records = collectRecords(grid, columns);
    expect(records[0]).toEqual({
      sourceRowIndex: 0,
      displayName: 'Item',
      normalizedKey: 'item',
      budget: null,
      actual: null,
    });
  });

  it('limits records to an inclusive row range', () => {
    const records = collectRecords(grid, columns, {
      headerRow: 0,
      rowRange: { start: 3, end: 4 },
    });
    expect(records.map((r) => r.displayName)).toEqual(['Travel', 'rent']);
  });

  it('never reads header rows or rows past the grid', () => {
    const records = collectRecords(grid, columns, {
      headerRow: 1,
      rowRange: { start: 0, end: 99 },
    });
    expect(records.map((r) => r.sourceRowIndex)).toEqual([3, 4, 6]);
  });
});
