/**
 * Command-line argument parsing
 */

import { ConfigError, parseConfig } from './config.js';
import type { ConfigFile } from './config.js';

export interface ParsedArgs {
  /** Workbook path given as the positional argument */
  workbook?: string;
  /** --config file */
  configPath?: string;
  help: boolean;
  /** Settings given as flags, shaped like the config file */
  overrides: ConfigFile;
}

const VALUE_FLAGS = new Set([
  '--config',
  '--sheet',
  '--delimiter',
  '--left',
  '--right',
  '--tolerance',
  '--threshold',
  '--algorithm',
  '--header',
  '--start-row',
  '--end-row',
  '--empty-cells',
  '--export',
  '--log-level',
  '--log-format',
]);

const SWITCH_FLAGS = new Set(['--flag-indeterminate', '--json', '--all', '--help', '-h']);

function toNumber(flag: string, text: string | undefined): number | undefined {
  if (text === undefined) return undefined;
  const value = Number(text);
  if (text.trim() === '' || Number.isNaN(value)) {
    throw new ConfigError(`${flag} expects a number, got "${text}"`);
  }
  return value;
}

function parseSide(
  flag: string,
  text: string | undefined
): { name: string; budget: string; actual: string } | undefined {
  if (text === undefined) return undefined;
  const [name, budget, actual, ...rest] = text.split(',').map((part) => part.trim());
  if (!name || !budget || !actual || rest.length > 0) {
    throw new ConfigError(
      `${flag} expects three comma-separated columns (name,budget,actual), got "${text}"`
    );
  }
  return { name, budget, actual };
}

function parseHeader(text: string | undefined): string | number | undefined {
  if (text === undefined) return undefined;
  return /^\d+$/.test(text.trim()) ? Number(text) : text.trim().toLowerCase();
}

function parseSheet(text: string | undefined): string | number | undefined {
  if (text === undefined) return undefined;
  return /^\d+$/.test(text.trim()) ? Number(text) : text;
}

/**
 * Parse argv (without the node and script entries)
 * @throws ConfigError for unknown flags, missing values or bad values
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const values = new Map<string, string>();
  const switches = new Set<string>();
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq === -1 ? arg : arg.slice(0, eq);

    if (VALUE_FLAGS.has(flag)) {
      const value = eq === -1 ? argv[++i] : arg.slice(eq + 1);
      if (value === undefined) {
        throw new ConfigError(`Missing value for ${flag}`);
      }
      values.set(flag, value);
    } else if (SWITCH_FLAGS.has(flag)) {
      switches.add(flag);
    } else if (arg.startsWith('-') && arg.length > 1) {
      throw new ConfigError(`Unknown option: ${arg}`);
    } else {
      positionals.push(arg);
    }
  }

  if (positionals.length > 1) {
    throw new ConfigError(
      `Expected a single workbook path, got ${positionals.length}: ${positionals.join(', ')}`
    );
  }

  const raw = {
    source: {
      sheet: parseSheet(values.get('--sheet')),
      delimiter: values.get('--delimiter'),
    },
    columns: {
      left: parseSide('--left', values.get('--left')),
      right: parseSide('--right', values.get('--right')),
    },
    tolerance: toNumber('--tolerance', values.get('--tolerance')),
    fuzzyThreshold: toNumber('--threshold', values.get('--threshold')),
    similarityAlgorithm: values.get('--algorithm'),
    header: parseHeader(values.get('--header')),
    rows: {
      start: toNumber('--start-row', values.get('--start-row')),
      end: toNumber('--end-row', values.get('--end-row')),
    },
    emptyCells: values.get('--empty-cells'),
    flagIndeterminate: switches.has('--flag-indeterminate') ? true : undefined,
    output: {
      exportPath: values.get('--export'),
      format: switches.has('--json') ? 'json' : undefined,
      showAll: switches.has('--all') ? true : undefined,
    },
    logging: {
      level: values.get('--log-level'),
      format: values.get('--log-format'),
    },
  };

  return {
    workbook: positionals[0],
    configPath: values.get('--config'),
    help: switches.has('--help') || switches.has('-h'),
    overrides: parseConfig(raw, 'Invalid command-line options'),
  };
}
