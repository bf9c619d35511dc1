import { describe, expect, it } from 'vitest';
import { ConfigError, parseArgs } from '../src/index.js';

function errorFrom(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('parseArgs', () => {
  it('reads the workbook and every flag', () => {
    const args = parseArgs([
      './book.xlsx',
      '--config',
      'tally.json',
      '--sheet',
      '2',
      '--left',
      'Item, Budget, Actual',
      '--right=E,F,G',
      '--tolerance',
      '0.5',
      '--threshold',
      '0.75',
      '--algorithm',
      'levenshtein',
      '--header',
      'AUTO',
      '--start-row',
      '1',
      '--end-row',
      '40',
      '--empty-cells',
      'zero',
      '--flag-indeterminate',
      '--export',
      'out.csv',
      '--json',
      '--all',
      '--log-level',
      'debug',
    ]);

    expect(args.workbook).toBe('./book.xlsx');
    expect(args.configPath).toBe('tally.json');
    expect(args.help).toBe(false);
    expect(args.overrides.source?.sheet).toBe(2);
    expect(args.overrides.columns).toEqual({
      left: { name: 'Item', budget: 'Budget', actual: 'Actual' },
      right: { name: 'E', budget: 'F', actual: 'G' },
    });
    expect(args.overrides.tolerance).toBe(0.5);
    expect(args.overrides.fuzzyThreshold).toBe(0.75);
    expect(args.overrides.similarityAlgorithm).toBe('levenshtein');
    expect(args.overrides.header).toBe('auto');
    expect(args.overrides.rows).toEqual({ start: 1, end: 40 });
    expect(args.overrides.emptyCells).toBe('zero');
    expect(args.overrides.flagIndeterminate).toBe(true);
    expect(args.overrides.output).toEqual({ exportPath: 'out.csv', format: 'json', showAll: true });
    expect(args.overrides.logging?.level).toBe('debug');
  });

  it('reads a numeric header row', () => {
    expect(parseArgs(['book.csv', '--header', '2']).overrides.header).toBe(2);
  });

  it('recognizes help', () => {
    expect(parseArgs(['-h']).help).toBe(true);
    expect(parseArgs(['--help']).help).toBe(true);
  });

  it('rejects malformed input', () => {
    const cases: Array<[string[], string]> = [
      [['book.csv', '--bogus'], 'Unknown option: --bogus'],
      [['book.csv', '--tolerance'], 'Missing value for --tolerance'],
      [['book.csv', '--tolerance', 'lots'], '--tolerance expects a number, got "lots"'],
      [
        ['book.csv', '--left', 'A,B'],
        '--left expects three comma-separated columns (name,budget,actual), got "A,B"',
      ],
      [['a.csv', 'b.csv'], 'Expected a single workbook path, got 2: a.csv, b.csv'],
    ];

    for (const [argv, message] of cases) {
      const error = errorFrom(() => parseArgs(argv));
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({ message });
    }
  });

  it('validates flag values against the config schema', () => {
    const error = errorFrom(() => parseArgs(['book.csv', '--threshold', '2']));
    expect(error).toBeInstanceOf(ConfigError);
    expect(error instanceof Error ? error.message.split('\n')[0] : '').toBe(
      'Invalid command-line options:'
    );
  });
});
