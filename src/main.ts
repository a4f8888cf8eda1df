#!/usr/bin/env node

/**
 * CLI entry point
 *
 * Usage:
 *   deck-progress-report -c collection.anki2 -d 1612345678901
 *   deck-progress-report -c collection.anki2 -d 1612345678901 -t template.html -o report.html
 */

import { consoleOutput, runCli } from './app/run-cli.js';
import { systemClock } from './app/run-deck-report.js';

const main = async (): Promise<number> =>
  runCli(process.argv.slice(2), process.env, { output: consoleOutput, clock: systemClock });

await main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
