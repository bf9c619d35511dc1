import { describe, expect, it } from 'vitest';
import { SourceError } from '@tallycheck/core';
import { Logger, toLoggable } from '../src/index.js';

function capture() {
  const lines: string[] = [];
  return { lines, sink: (line: string) => lines.push(line) };
}

describe('Logger', () => {
  it('writes text lines with fields', () => {
    const { lines, sink } = capture();
    new Logger({ sink }).info('Loaded workbook', { rows: 3, file: 'book.csv' });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] INFO Loaded workbook rows=3 file=book\.csv\n$/
    );
  });

  it('drops records below the configured level', () => {
    const { lines, sink } = capture();
    const logger = new Logger({ level: 'warn', sink });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown too');

    expect(lines).toHaveLength(2);
  });

  it('writes JSON records with child fields', () => {
    const { lines, sink } = capture();
    const logger = new Logger({ format: 'json', sink }).child({ run: 'r1' });

    logger.info('Validation complete', { checked: 2 });

    const record: unknown = JSON.parse(lines[0] ?? '');
    expect(record).toMatchObject({
      level: 'info',
      msg: 'Validation complete',
      run: 'r1',
      checked: 2,
    });
  });
});

describe('toLoggable', () => {
  it('serializes errors through toJSON when present', () => {
    const error = new SourceError({
      code: 'NOT_FOUND',
      message: 'File not found',
      sourceId: 'book.csv',
    });

    expect(toLoggable({ error })).toMatchObject({
      error: { name: 'SourceError', code: 'NOT_FOUND', message: 'File not found' },
    });
    expect(toLoggable(new Error('boom'))).toEqual({ name: 'Error', message: 'boom' });
  });

  it('renders dates as ISO strings', () => {
    expect(toLoggable(new Date('2024-03-01T00:00:00.000Z'))).toBe('2024-03-01T00:00:00.000Z');
  });
});
