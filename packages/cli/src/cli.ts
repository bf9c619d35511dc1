#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   tallycheck ./budget.xlsx --header auto --export ./mismatches.csv
 */

import { main } from './main.js';

process.exitCode = await main(process.argv.slice(2), {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
});
