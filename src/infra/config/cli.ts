/**
 * Command line flags
 *
 * Every flag takes a value except --help. Flags override the matching
 * environment variables (see env.ts).
 */

import { err, ok, type Result } from 'neverthrow';

import { createConfigError, type ConfigError } from '../../common/types/errors.js';

export interface CliArgs {
  collectionPath?: string;
  deckId?: string;
  templatePath?: string;
  outputPath?: string;
  lookupUrlBase?: string;
  help: boolean;
}

type ValueFlag = Exclude<keyof CliArgs, 'help'>;

const VALUE_FLAGS: Record<string, ValueFlag> = {
  '-c': 'collectionPath',
  '--collection-path': 'collectionPath',
  '-d': 'deckId',
  '--deck-id': 'deckId',
  '-t': 'templatePath',
  '--template': 'templatePath',
  '-o': 'outputPath',
  '--output': 'outputPath',
  '--lookup-url': 'lookupUrlBase',
};

export const USAGE = `Usage: deck-progress-report -c <collection> -d <deck-id> [options]

Options:
  -c, --collection-path <path>  SQLite collection database (env COLLECTION_PATH)
  -d, --deck-id <id>            Deck to report on (env DECK_ID)
  -t, --template <path>         HTML template (env TEMPLATE_PATH, default ./template.html)
  -o, --output <path>           Generated HTML file (env OUTPUT_PATH, default ./core2300.html)
      --lookup-url <url>        Prefix of each card's lookup link (env LOOKUP_URL_BASE)
  -h, --help                    Show this message`;

/**
 * Parse command line arguments (without the node binary and script path).
 * Accepts both `--flag value` and `--flag=value`.
 */
export function parseCliArgs(argv: readonly string[]): Result<CliArgs, ConfigError> {
  const args: CliArgs = { help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) {
      continue;
    }

    if (arg === '-h' || arg === '--help') {
      args.help = true;
      continue;
    }

    const eqIndex = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eqIndex === -1 ? arg : arg.slice(0, eqIndex);
    const field = VALUE_FLAGS[flag];

    if (field === undefined) {
      return err(createConfigError(`Unknown argument: ${arg}`));
    }

    let value: string | undefined;
    if (eqIndex !== -1) {
      value = arg.slice(eqIndex + 1);
    } else {
      value = argv[i + 1];
      i++;
    }

    if (value === undefined || value === '') {
      return err(createConfigError(`Missing value for ${flag}`, field));
    }

    args[field] = value;
  }

  return ok(args);
}
