import Database from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';

import type { CollectionDatabase } from './collection/types.js';

export type CollectionDbClient = Kysely<CollectionDatabase>;

/**
 * Open a collection database read-only.
 * Throws when the file does not exist or is not a SQLite database.
 */
export const createCollectionClient = (filePath: string): CollectionDbClient => {
  const database = new Database(filePath, { readonly: true, fileMustExist: true });

  return new Kysely<CollectionDatabase>({
    dialect: new SqliteDialect({ database }),
  });
};

/**
 * Run `fn` with a client that is destroyed afterwards, on success and on failure.
 */
export const withCollectionClient = async <T>(
  client: CollectionDbClient,
  fn: (db: CollectionDbClient) => Promise<T>
): Promise<T> => {
  try {
    return await fn(client);
  } finally {
    await client.destroy();
  }
};

export type { CollectionDatabase, Cards, Notes } from './collection/types.js';
