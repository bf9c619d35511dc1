import { describe, expect, it } from 'vitest';
import {
  buildColumnLabels,
  detectHeaderRow,
  parseNumber,
  ReconciliationError,
  resolveColumnRef,
} from '../src/index.js';

describe('parseNumber', () => {
  it('reads plain and formatted numbers', () => {
    expect(parseNumber('1,234.50')).toBe(1234.5);
    expect(parseNumber('$ 1,000')).toBe(1000);
    expect(parseNumber('-500')).toBe(-500);
    expect(parseNumber('+.5')).toBe(0.5);
    expect(parseNumber('7.')).toBe(7);
    expect(parseNumber('12%')).toBe(12);
    expect(parseNumber('  42  ')).toBe(42);
  });

  it('reads parentheses as negatives', () => {
    expect(parseNumber('(1,234.50)')).toBe(-1234.5);
    expect(parseNumber(' (500) ')).toBe(-500);
    expect(parseNumber('($75)')).toBe(-75);
    expect(parseNumber('(-5)')).toBe(5);
  });

  it('negates exactly what the inner text parses to', () => {
    for (const inner of ['1,234', '0.25', '+8', '3.']) {
      expect(parseNumber(`(${inner})`)).toBe(-(parseNumber(inner) ?? NaN));
    }
  });

  it('returns null for text that is not a number', () => {
    expect(parseNumber('n/a')).toBeNull();
    expect(parseNumber('1.2.3')).toBeNull();
    expect(parseNumber('1-2')).toBeNull();
    expect(parseNumber('-')).toBeNull();
    expect(parseNumber('()')).toBeNull();
    expect(parseNumber('(abc)')).toBeNull();
    expect(parseNumber('(5')).toBeNull();
  });

  it('passes finite numeric cells through', () => {
    expect(parseNumber(42)).toBe(42);
    expect(parseNumber(-0.5)).toBe(-0.5);
    expect(parseNumber(Number.NaN)).toBeNull();
    expect(parseNumber(Number.POSITIVE_INFINITY)).toBeNull();
  });

  it('never reads booleans or dates as numbers', () => {
    expect(parseNumber(true)).toBeNull();
    expect(parseNumber(new Date('2024-01-31T00:00:00Z'))).toBeNull();
  });

  it('applies the empty cell policy to blank cells only', () => {
    expect(parseNumber(null)).toBeNull();
    expect(parseNumber(undefined)).toBeNull();
    expect(parseNumber('   ')).toBeNull();

    expect(parseNumber(null, { emptyCellPolicy: 'zero' })).toBe(0);
    expect(parseNumber(undefined, { emptyCellPolicy: 'zero' })).toBe(0);
    expect(parseNumber('  ', { emptyCellPolicy: 'zero' })).toBe(0);
    expect(parseNumber('tbd', { emptyCellPolicy: 'zero' })).toBeNull();
  });
});

describe('detectHeaderRow', () => {
  it('detects a text header above numeric rows', () => {
    const grid = [
      ['Item', 'Budget', 'Actual', '', 'Item', 'Budget', 'Actual'],
      ['Rent', '500', '480', '', 'Rent', '500', '480'],
      ['Travel', '120', '130', '', 'Travel', '120', '125'],
    ];
    expect(detectHeaderRow(grid)).toBe(0);
  });

  it('allows one numeric cell in the header row', () => {
    const grid = [
      ['Item', 2024, 'Budget'],
      ['Rent', 500, 480],
      ['Travel', 1, 2],
    ];
    expect(detectHeaderRow(grid)).toBe(0);
  });

  it('returns null when row 0 is data', () => {
    const grid = [
      ['Rent', 500, 480],
      ['Travel', 120, 130],
    ];
    expect(detectHeaderRow(grid)).toBeNull();
  });

  it('returns null when the rows below are mostly text', () => {
    const grid = [
      ['Item', 'Budget'],
      ['Rent', '500'],
      ['Travel', '120'],
    ];
    expect(detectHeaderRow(grid)).toBeNull();
  });

  it('returns null for grids with fewer than two rows', () => {
    expect(detectHeaderRow([])).toBeNull();
    expect(detectHeaderRow([['Item', 'Budget', 'Actual']])).toBeNull();
  });

  it('only checks the given columns', () => {
    const grid = [
      ['Item', 'Budget', 'Actual', 9, 9],
      ['Rent', '500', '480', 'x', 'y'],
    ];
    expect(detectHeaderRow(grid)).toBeNull();
    expect(detectHeaderRow(grid, [0, 1, 2])).toBe(0);
  });

  it('only scans the leading rows', () => {
    const grid = [
      ['Item', 'Budget', 'Actual'],
      ['Rent', '500', '480'],
      ['note', '', ''],
      ['note', '', ''],
    ];
    expect(detectHeaderRow(grid)).toBeNull();
    expect(detectHeaderRow(grid, undefined, 2)).toBe(0);
  });
});

describe('buildColumnLabels', () => {
  it('uses column letters without a header row', () => {
    expect(buildColumnLabels([['a', 'b', 'c']], null)).toEqual(['A', 'B', 'C']);
  });

  it('names blank headers and numbers repeats', () => {
    const grid = [['Item', 'Budget', '', 'Budget', 'Item', 'Budget']];
    expect(buildColumnLabels(grid, 0)).toEqual([
      'Item',
      'Budget',
      'Column_C',
      'Budget_1',
      'Item_1',
      'Budget_2',
    ]);
  });

  it('covers the full grid width when the header row is short', () => {
    const grid = [['Item'], ['Rent', 500, 480]];
    expect(buildColumnLabels(grid, 0)).toEqual(['Item', 'Column_B', 'Column_C']);
  });
});

describe('resolveColumnRef', () => {
  const labels = ['Item', 'Budget', 'Actual', 'Net'];

  it('resolves labels exactly, then ignoring case', () => {
    expect(resolveColumnRef('Budget', labels)).toBe(1);
    expect(resolveColumnRef('actual', labels)).toBe(2);
    expect(resolveColumnRef('net', labels)).toBe(3);
  });

  it('resolves numbers and column letters', () => {
    expect(resolveColumnRef(5, labels)).toBe(5);
    expect(resolveColumnRef('2', labels)).toBe(2);
    expect(resolveColumnRef('C', labels)).toBe(2);
    expect(resolveColumnRef('ab', labels)).toBe(27);
  });

  it('throws INVALID_COLUMN for unknown references', () => {
    for (const ref of ['Unknown Thing', -1, 1.5]) {
      let caught: unknown;
      try {
        resolveColumnRef(ref, labels);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(ReconciliationError);
      expect(caught).toMatchObject({ code: 'INVALID_COLUMN' });
    }
  });
});
