import { describe, it, expect } from 'vitest';

import { createConfig, parseEnv, type Env } from '@/infra/config/env.js';

const baseEnv = (): Env => parseEnv({})._unsafeUnwrap();

describe('parseEnv', () => {
  it('applies defaults', () => {
    expect(parseEnv({})._unsafeUnwrap()).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      COLLECTION_PATH: undefined,
      DECK_ID: undefined,
      TEMPLATE_PATH: './template.html',
      OUTPUT_PATH: './core2300.html',
      LOOKUP_URL_BASE: 'https://jisho.org/search/',
    });
  });

  it('treats empty paths as unset', () => {
    const env = parseEnv({ TEMPLATE_PATH: '', DECK_ID: '' })._unsafeUnwrap();

    expect(env.TEMPLATE_PATH).toBe('./template.html');
    expect(env.DECK_ID).toBeUndefined();
  });

  it('rejects an unknown log level', () => {
    const error = parseEnv({ LOG_LEVEL: 'loud' })._unsafeUnwrapErr();

    expect(error.type).toBe('ConfigError');
    expect(error.message).toMatch(/^Invalid environment configuration: \/LOG_LEVEL: /);
  });
});

describe('createConfig', () => {
  it('requires a collection path', () => {
    const error = createConfig(baseEnv(), { help: false, deckId: '1' })._unsafeUnwrapErr();

    expect(error).toEqual({
      type: 'ConfigError',
      message: 'Missing collection path (--collection-path or COLLECTION_PATH)',
      field: 'collectionPath',
    });
  });

  it('requires a deck id', () => {
    const error = createConfig(baseEnv(), { help: false, collectionPath: 'c' })._unsafeUnwrapErr();

    expect(error.field).toBe('deckId');
  });

  it('falls back to environment and defaults', () => {
    const env = parseEnv({
      COLLECTION_PATH: '/data/collection.anki2',
      DECK_ID: '1001',
      NODE_ENV: 'production',
      LOG_LEVEL: 'warn',
    })._unsafeUnwrap();

    expect(createConfig(env, { help: false })._unsafeUnwrap()).toEqual({
      logger: { level: 'warn', pretty: false },
      report: {
        collectionPath: '/data/collection.anki2',
        deckId: '1001',
        templatePath: './template.html',
        outputPath: './core2300.html',
        lookupUrlBase: 'https://jisho.org/search/',
      },
    });
  });

  it('prefers flags over environment', () => {
    const env = parseEnv({
      COLLECTION_PATH: 'env.anki2',
      DECK_ID: '1',
      OUTPUT_PATH: 'env.html',
    })._unsafeUnwrap();

    const config = createConfig(env, {
      help: false,
      collectionPath: 'flag.anki2',
      deckId: '2',
      outputPath: 'flag.html',
    })._unsafeUnwrap();

    expect(config.report.collectionPath).toBe('flag.anki2');
    expect(config.report.deckId).toBe('2');
    expect(config.report.outputPath).toBe('flag.html');
    expect(config.report.templatePath).toBe('./template.html');
  });
});
