/**
 * Card Source Repository - Kysely Implementation
 *
 * Streams a deck's cards out of the SQLite collection, one note row per card.
 */

import { Type } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { sql } from 'kysely';
import { ok, err, type Result } from 'neverthrow';

import { createDataAccessError, type DataAccessError } from '../../core/errors.js';

import type { CardSource } from '../../core/ports.js';
import type { RawCardRow } from '../../core/types.js';
import type { CollectionDbClient } from '@/infra/database/client.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface CardSourceRepoOptions {
  db: CollectionDbClient;
  logger: Logger;
}

const CardRowSchema = Type.Object({
  flds: Type.String(),
  queue: Type.Integer(),
  reps: Type.Integer({ minimum: 0 }),
  lapses: Type.Integer({ minimum: 0 }),
});

const rowValidator = TypeCompiler.Compile(CardRowSchema);

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

class KyselyCardSourceRepo implements CardSource {
  private readonly db: CollectionDbClient;
  private readonly log: Logger;

  constructor(options: CardSourceRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ module: 'card-source-repo' });
  }

  async *streamCards(deckId: string): AsyncGenerator<Result<RawCardRow, DataAccessError>> {
    // Deck ids are opaque strings; SQLite applies the column's integer
    // affinity to the bound value when comparing.
    const query = this.db
      .selectFrom('cards')
      .innerJoin('notes', 'notes.id', 'cards.nid')
      .select(['notes.flds', 'cards.queue', 'cards.reps', 'cards.lapses'])
      .where('cards.did', '=', sql<number>`${deckId}`)
      .orderBy('notes.id')
      .orderBy('cards.id');

    let position = 0;

    try {
      for await (const row of query.stream()) {
        const decoded = this.decodeRow(row, position);
        yield decoded;
        if (decoded.isErr()) {
          return;
        }
        position += 1;
      }
    } catch (error) {
      this.log.error({ err: error, deckId }, 'Failed to query deck cards');
      yield err(createDataAccessError(`Failed to query cards of deck ${deckId}`, error));
    }
  }

  private decodeRow(row: unknown, position: number): Result<RawCardRow, DataAccessError> {
    if (!rowValidator.Check(row)) {
      const details = [...rowValidator.Errors(row)]
        .map((error) => `${error.path}: ${error.message}`)
        .join(', ');
      return err(
        createDataAccessError(`Undecodable card row at position ${String(position)}: ${details}`)
      );
    }

    return ok({
      rawFields: row.flds,
      stateCode: row.queue,
      reps: row.reps,
      lapses: row.lapses,
    });
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makeCardSourceRepo = (options: CardSourceRepoOptions): CardSource => {
  return new KyselyCardSourceRepo(options);
};
