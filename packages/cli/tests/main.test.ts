import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { main, USAGE } from '../src/index.js';

const MISMATCHED = [
  'Item,Budget,Actual,,Item,Budget,Actual',
  'Salaries,"1,000",950,,Salaries,1000,900',
  'Rent,(500),500,,Rnt,500,500',
  '',
].join('\n');

const BALANCED = [
  'Salaries,1000,950,,Salaries,1000,950',
  'Rent,500,500,,rent,500,500.004',
  '',
].join('\n');

describe('main', () => {
  let dir: string;
  let stdout: string[];
  let stderr: string[];

  const io = {
    stdout: (text: string) => {
      stdout.push(text);
    },
    stderr: (text: string) => {
      stderr.push(text);
    },
  };

  function writeBook(name: string, content: string): string {
    const path = join(dir, name);
    writeFileSync(path, content, 'utf-8');
    return path;
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tallycheck-cli-'));
    stdout = [];
    stderr = [];
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('exits 0 when every line item agrees', async () => {
    const book = writeBook('balanced.csv', BALANCED);

    expect(await main([book], io)).toBe(0);

    const lines = stdout.join('').split('\n');
    expect(lines).toContain('- Total line items checked: 2');
    expect(lines).toContain('- Needing attention: 0');
    expect(lines).toContain('All line items agree.');
  });

  it('exits 1 and writes the mismatch export', async () => {
    const book = writeBook('book.csv', MISMATCHED);
    const exportPath = join(dir, 'mismatches.csv');

    expect(await main([book, '--header', 'auto', '--export', exportPath], io)).toBe(1);

    expect(readFileSync(exportPath, 'utf-8').split('\n')).toEqual([
      'Left Row,Left Name,Left Budget,Left Actual,Right Row,Right Name,Right Budget,Right Actual,Notes',
      '1,Salaries,1000,950,1,Salaries,1000,900,"Actual mismatch: left 950, right 900 (difference 50)"',
      '2,Rent,-500,500,2,Rnt,500,500,"Fuzzy match ""Rnt"" (score 0.86) | Budget mismatch: left -500, right 500 (difference 1000)"',
      '',
    ]);

    const lines = stdout.join('').split('\n');
    expect(lines).toContain('Header row: 0');
    expect(lines).toContain('- Needing attention: 2');
    expect(stderr.join('')).toContain('INFO Wrote mismatch export source=book.csv file=');
  });

  it('prints the report as JSON', async () => {
    const book = writeBook('book.csv', MISMATCHED);

    expect(await main([book, '--header', '0', '--json', '--log-level', 'error'], io)).toBe(1);

    const report: unknown = JSON.parse(stdout.join(''));
    expect(report).toMatchObject({
      headerRow: 0,
      source: { name: 'book.csv', type: 'csv' },
      summary: { checked: 2, needsAttention: 2, exactMatches: 1, fuzzyMatches: 1 },
    });
    expect(stderr).toEqual([]);
  });

  it('skips the detected header row when numbers sit in mapped header cells', async () => {
    const book = writeBook(
      'labelled.csv',
      ['Item,2023,Actual,,Item,Budget,2024', 'Rent,500,480,,Rent,500,480', ''].join('\n')
    );

    expect(await main([book, '--header', 'auto'], io)).toBe(0);

    const lines = stdout.join('').split('\n');
    expect(lines).toContain('Header row: 0');
    expect(lines).toContain('- Total line items checked: 1');
    expect(lines).toContain('All line items agree.');
  });

  it('resolves columns by header label from a config file', async () => {
    const book = writeBook('book.csv', MISMATCHED);
    const config = writeBook(
      'tally.json',
      JSON.stringify({
        source: { filePath: book },
        columns: {
          left: { name: 'Item', budget: 'Budget', actual: 'Actual' },
          right: { name: 'Item_1', budget: 'Budget_1', actual: 'Actual_1' },
        },
        header: 'auto',
        tolerance: 100,
        fuzzyThreshold: 0.9,
        output: { showAll: true },
      })
    );

    expect(await main(['--config', config], io)).toBe(1);

    const lines = stdout.join('').split('\n');
    expect(lines).toContain('- Exact matches: 1');
    expect(lines).toContain('- Unmatched: 1');
    expect(lines).toContain('**Salaries** (row 1) ↔ Salaries (row 1, exact)');
    expect(lines).toContain('**Rent** (row 2) ↔ no match [needs attention]');
  });

  it('exits 2 when the workbook is missing', async () => {
    expect(await main([join(dir, 'missing.csv')], io)).toBe(2);

    const output = stderr.join('');
    expect(output).toContain('ERROR Validation failed');
    expect(output).toContain('Error [NOT_FOUND]:');
    expect(stdout).toEqual([]);
  });

  it('exits 2 when a mapped column is outside the sheet', async () => {
    const book = writeBook('narrow.csv', 'Rent,500,480\n');

    expect(await main([book], io)).toBe(2);
    expect(stderr.join('')).toContain('Error [COLUMN_OUT_OF_RANGE]:');
  });

  it('exits 2 with usage for bad flags', async () => {
    expect(await main(['book.csv', '--bogus'], io)).toBe(2);

    const output = stderr.join('');
    expect(output).toContain('Error [CONFIG]: Unknown option: --bogus');
    expect(output).toContain(USAGE);
  });

  it('prints usage for --help', async () => {
    expect(await main(['--help'], io)).toBe(0);
    expect(stdout).toEqual([USAGE]);
  });
});
