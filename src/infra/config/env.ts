/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { err, ok, type Result } from 'neverthrow';

import { createConfigError, type ConfigError } from '../../common/types/errors.js';

import type { CliArgs } from './cli.js';

export const DEFAULT_TEMPLATE_PATH = './template.html';
export const DEFAULT_OUTPUT_PATH = './core2300.html';
export const DEFAULT_LOOKUP_URL_BASE = 'https://jisho.org/search/';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Report inputs; the matching CLI flags take precedence
  COLLECTION_PATH: Type.Optional(Type.String({ minLength: 1 })),
  DECK_ID: Type.Optional(Type.String({ minLength: 1 })),
  TEMPLATE_PATH: Type.String({ minLength: 1, default: DEFAULT_TEMPLATE_PATH }),
  OUTPUT_PATH: Type.String({ minLength: 1, default: DEFAULT_OUTPUT_PATH }),
  LOOKUP_URL_BASE: Type.String({ default: DEFAULT_LOOKUP_URL_BASE }),
});

export type Env = Static<typeof EnvSchema>;

const emptyToUndefined = (value: string | undefined): string | undefined =>
  value === undefined || value === '' ? undefined : value;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Result<Env, ConfigError> => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    COLLECTION_PATH: emptyToUndefined(env['COLLECTION_PATH']),
    DECK_ID: emptyToUndefined(env['DECK_ID']),
    TEMPLATE_PATH: emptyToUndefined(env['TEMPLATE_PATH']) ?? DEFAULT_TEMPLATE_PATH,
    OUTPUT_PATH: emptyToUndefined(env['OUTPUT_PATH']) ?? DEFAULT_OUTPUT_PATH,
    LOOKUP_URL_BASE: env['LOOKUP_URL_BASE'] ?? DEFAULT_LOOKUP_URL_BASE,
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    return err(createConfigError(`Invalid environment configuration: ${errorMessages}`));
  }

  return ok(rawEnv);
};

/**
 * Create a typed configuration object from environment and CLI flags.
 * Flags win over environment variables; collection path and deck id are required.
 */
export const createConfig = (env: Env, args: CliArgs): Result<AppConfig, ConfigError> => {
  const collectionPath = args.collectionPath ?? env.COLLECTION_PATH;
  const deckId = args.deckId ?? env.DECK_ID;

  if (collectionPath === undefined) {
    return err(
      createConfigError(
        'Missing collection path (--collection-path or COLLECTION_PATH)',
        'collectionPath'
      )
    );
  }

  if (deckId === undefined) {
    return err(createConfigError('Missing deck id (--deck-id or DECK_ID)', 'deckId'));
  }

  return ok({
    logger: {
      level: env.LOG_LEVEL,
      pretty: env.NODE_ENV === 'development',
    },
    report: {
      collectionPath,
      deckId,
      templatePath: args.templatePath ?? env.TEMPLATE_PATH,
      outputPath: args.outputPath ?? env.OUTPUT_PATH,
      lookupUrlBase: args.lookupUrlBase ?? env.LOOKUP_URL_BASE,
    },
  });
};

export interface AppConfig {
  logger: {
    level: Env['LOG_LEVEL'];
    pretty: boolean;
  };
  report: {
    /** SQLite collection file, opened read-only */
    collectionPath: string;
    /** Opaque deck identifier, passed through to the query unvalidated */
    deckId: string;
    templatePath: string;
    outputPath: string;
    /** Prefix of each card's lookup link; the term is appended verbatim */
    lookupUrlBase: string;
  };
}
