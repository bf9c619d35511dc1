import { describe, expect, it } from 'vitest';
import {
  cellText,
  columnIndexFromLetter,
  columnLetter,
  columnMappingSchema,
  describeGrid,
  formatIssues,
  rowRangeSchema,
  SourceError,
} from '../src/index.js';

describe('columnLetter', () => {
  it('names single and double letter columns', () => {
    expect(columnLetter(0)).toBe('A');
    expect(columnLetter(25)).toBe('Z');
    expect(columnLetter(26)).toBe('AA');
    expect(columnLetter(27)).toBe('AB');
    expect(columnLetter(701)).toBe('ZZ');
    expect(columnLetter(702)).toBe('AAA');
  });

  it('inverts through columnIndexFromLetter', () => {
    expect(columnIndexFromLetter('A')).toBe(0);
    expect(columnIndexFromLetter('g')).toBe(6);
    expect(columnIndexFromLetter(' AB ')).toBe(27);
    expect(columnIndexFromLetter('ZZ')).toBe(701);
  });

  it('rejects text that is not a column letter', () => {
    expect(columnIndexFromLetter('')).toBeNull();
    expect(columnIndexFromLetter('A1')).toBeNull();
    expect(columnIndexFromLetter('Budget')).toBeNull();
  });
});

describe('cell helpers', () => {
  it('extracts trimmed text from every cell kind', () => {
    expect(cellText('  Rent ')).toBe('Rent');
    expect(cellText(2024)).toBe('2024');
    expect(cellText(null)).toBe('');
    expect(cellText(undefined)).toBe('');
    expect(cellText(true)).toBe('true');
    expect(cellText(new Date('2024-03-01T00:00:00.000Z'))).toBe('2024-03-01T00:00:00.000Z');
    expect(cellText(new Date('not a date'))).toBe('');
  });

  it('measures ragged grids by their widest row', () => {
    expect(describeGrid([['a'], ['a', 'b', 'c'], []])).toEqual({
      rowCount: 3,
      columnCount: 3,
    });
    expect(describeGrid([])).toEqual({ rowCount: 0, columnCount: 0 });
  });
});

describe('schemas', () => {
  it('rejects negative column indices with a readable path', () => {
    const result = columnMappingSchema.safeParse({
      left: { name: 0, budget: 1, actual: -1 },
      right: { name: 4, budget: 5, actual: 6 },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatIssues('Invalid mapping', result.error)).toBe(
        'Invalid mapping:\n- left.actual: Number must be greater than or equal to 0'
      );
    }
  });

  it('rejects a row range whose start is after its end', () => {
    expect(rowRangeSchema.safeParse({ start: 5, end: 2 }).success).toBe(false);
    expect(rowRangeSchema.safeParse({ start: 2, end: 2 }).success).toBe(true);
    expect(rowRangeSchema.safeParse({ end: 2 }).success).toBe(true);
  });
});

describe('SourceError', () => {
  it('formats an actionable message', () => {
    const error = new SourceError({
      code: 'NOT_FOUND',
      message: 'File not found: book.xlsx',
      sourceId: 'book',
      suggestion: 'Check the path.',
    });

    expect(error.toActionableMessage()).toBe(
      'Error [NOT_FOUND]: File not found: book.xlsx\nSource: book\nSuggested action: Check the path.'
    );
    expect(error.toJSON()).toMatchObject({ code: 'NOT_FOUND', sourceId: 'book' });
  });
});
