/**
 * Deck Report Module - Record Extractor
 *
 * Pure mapping from stored rows to cards.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createInvalidStateCodeError,
  createMalformedRecordError,
  type ExtractionError,
  type InvalidStateCodeError,
} from './errors.js';
import {
  FIELD_SEPARATOR,
  MIN_CARD_FIELDS,
  type Card,
  type CardFace,
  type CardFields,
  type LearningState,
  type RawCardRow,
} from './types.js';

/**
 * Queue codes of the collection schema. Code 3 is the day-learning queue,
 * reported together with intraday learning.
 */
const STATE_BY_CODE: ReadonlyMap<number, LearningState> = new Map([
  [0, 'new'],
  [1, 'learning'],
  [2, 'review'],
  [3, 'learning'],
]);

/**
 * Classifies a raw state code. Unknown codes (suspended, buried, or
 * anything else) are an error, never a fallback state.
 */
export function classifyStateCode(code: number): Result<LearningState, InvalidStateCodeError> {
  const state = STATE_BY_CODE.get(code);
  if (state === undefined) {
    return err(createInvalidStateCodeError(code));
  }
  return ok(state);
}

/**
 * Splits a stored field blob. Fields are kept verbatim.
 */
export function splitFields(rawFields: string): string[] {
  return rawFields.split(FIELD_SEPARATOR);
}

/**
 * Inverse of splitFields.
 */
export function joinFields(fields: readonly string[]): string {
  return fields.join(FIELD_SEPARATOR);
}

function hasCardFields(fields: readonly string[]): fields is CardFields {
  return fields.length >= MIN_CARD_FIELDS;
}

/**
 * Converts one raw row into a card.
 */
export function extractCard(row: RawCardRow): Result<Card, ExtractionError> {
  const stateResult = classifyStateCode(row.stateCode);
  if (stateResult.isErr()) {
    return err(stateResult.error);
  }

  const fields = splitFields(row.rawFields);
  if (!hasCardFields(fields)) {
    return err(createMalformedRecordError(fields.length, MIN_CARD_FIELDS));
  }

  return ok({
    fields,
    state: stateResult.value,
    reps: row.reps,
    lapses: row.lapses,
  });
}

export function getCardFace(card: Card): CardFace {
  const [term, annotation, translation] = card.fields;
  return { term, annotation, translation };
}
