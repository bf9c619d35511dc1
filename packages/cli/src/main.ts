import { parseArgs } from './args.js';
import { ConfigError, loadConfig, mergeConfig } from './config.js';
import type { ConfigFile } from './config.js';
import { Logger } from './logger.js';
import { exitCodeFor, runValidation } from './run.js';
import { resolveSettings } from './settings.js';

export const USAGE = `Usage: tallycheck <workbook> [options]

Compares the budget and actual figures of two line-item lists that sit
side by side in one sheet (by default A-C on the left, E-G on the right).

Options:
  --config <file>            JSON config file; flags override it
  --sheet <name|number>      Excel sheet (default: first sheet)
  --delimiter <char>         CSV delimiter
  --left <name,budget,actual>   Left columns as letters, numbers or header labels
  --right <name,budget,actual>  Right columns
  --tolerance <n>            Largest difference still counted as agreement (default: 0.01)
  --threshold <n>            Lowest similarity accepted for a fuzzy name match (default: 0.6)
  --algorithm <name>         sequence_ratio | levenshtein | jaro_winkler | dice_sorensen
  --header <auto|none|row>   Header handling (default: none)
  --start-row <n>            First left-side row to check (0-based)
  --end-row <n>              Last left-side row to check (0-based, inclusive)
  --empty-cells <policy>     unparseable | zero (default: unparseable)
  --flag-indeterminate       Count unparseable figures as needing attention
  --export <file>            Write items needing attention to a CSV file
  --json                     Print the report as JSON
  --all                      List every line item, not only those needing attention
  --log-level <level>        debug | info | warn | error (default: info)
  --log-format <format>      text | json (default: text)
  -h, --help                 Show this help

Exit codes: 0 nothing needs attention, 1 something does, 2 the run failed.
`;

export interface MainIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

function hasActionableMessage(error: unknown): error is { toActionableMessage(): string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'toActionableMessage' in error &&
    typeof error.toActionableMessage === 'function'
  );
}

function describeError(error: unknown): string {
  if (hasActionableMessage(error)) return error.toActionableMessage();
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Run the CLI and return its exit code
 */
export async function main(argv: readonly string[], io: MainIO): Promise<number> {
  let logger = new Logger({ sink: io.stderr });

  try {
    const args = parseArgs(argv);
    if (args.help) {
      io.stdout(USAGE);
      return 0;
    }

    const fileConfig: ConfigFile = args.configPath ? await loadConfig(args.configPath) : {};
    const config = mergeConfig(fileConfig, args.overrides);

    logger = new Logger({
      level: config.logging?.level,
      format: config.logging?.format,
      sink: io.stderr,
    });

    const settings = resolveSettings(config, args.workbook);
    const report = await runValidation(settings, { logger, stdout: io.stdout });
    return exitCodeFor(report);
  } catch (error) {
    logger.error('Validation failed', { error });
    io.stderr(`${describeError(error)}\n`);
    if (error instanceof ConfigError) {
      io.stderr(`\n${USAGE}`);
    }
    return 2;
  }
}
