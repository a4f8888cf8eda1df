/**
 * Command-line flow: flags and environment in, console lines and an exit
 * code out. `main.ts` binds it to the process.
 */

import { createConfig, parseCliArgs, parseEnv, USAGE } from '../infra/config/index.js';
import { createLogger } from '../infra/logger/index.js';
import { formatSummaryLine, getExitCodeForError, type Clock } from '../modules/deck-report/index.js';

import { runDeckReport } from './run-deck-report.js';

export const EXIT_USAGE = 64;

export interface CliOutput {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

export interface RunCliDeps {
  output: CliOutput;
  clock: Clock;
}

export const consoleOutput: CliOutput = {
  stdout: (line) => {
    console.log(line);
  },
  stderr: (line) => {
    console.error(line);
  },
};

export const runCli = async (
  argv: readonly string[],
  env: NodeJS.ProcessEnv,
  deps: RunCliDeps
): Promise<number> => {
  const { output, clock } = deps;

  const argsResult = parseCliArgs(argv);
  if (argsResult.isErr()) {
    output.stderr(argsResult.error.message);
    output.stderr(USAGE);
    return EXIT_USAGE;
  }

  const args = argsResult.value;
  if (args.help) {
    output.stdout(USAGE);
    return 0;
  }

  const configResult = parseEnv(env).andThen((parsed) => createConfig(parsed, args));
  if (configResult.isErr()) {
    output.stderr(configResult.error.message);
    return EXIT_USAGE;
  }

  const config = configResult.value;
  const logger = createLogger({
    level: config.logger.level,
    pretty: config.logger.pretty,
  });

  logger.debug({ report: config.report }, 'Resolved configuration');

  const result = await runDeckReport(config.report, { logger, clock });
  if (result.isErr()) {
    output.stderr(`Error: ${result.error.message}`);
    return getExitCodeForError(result.error);
  }

  const summary = result.value;
  output.stdout(formatSummaryLine(summary.stats));
  output.stdout(`wrote generated html to ${summary.outputPath}`);

  return 0;
};
