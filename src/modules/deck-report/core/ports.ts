/**
 * Deck Report Module - Ports (Interfaces)
 *
 * What the report needs from the outside world, not how it is provided.
 */

import type { DataAccessError, OutputIOError, TemplateIOError } from './errors.js';
import type { RawCardRow } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Ordered source of raw card rows.
 */
export interface CardSource {
  /**
   * Stream the cards of a deck, ordered by note id.
   * The sequence is finite and can be consumed once. A failure is yielded as
   * an `err` item and ends the sequence.
   */
  streamCards(deckId: string): AsyncIterable<Result<RawCardRow, DataAccessError>>;
}

export interface TemplateStore {
  /** Read the whole template as UTF-8 text */
  readTemplate(path: string): Promise<Result<string, TemplateIOError>>;
}

export interface ReportWriter {
  /** Replace the file at `path` with `content`; never leaves a partial file */
  writeReport(path: string, content: string): Promise<Result<void, OutputIOError>>;
}

export interface Clock {
  now(): Date;
}
