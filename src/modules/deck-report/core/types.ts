/**
 * Deck Report Module - Domain Types
 */

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Separator between note fields in the stored blob (ASCII unit separator) */
export const FIELD_SEPARATOR = '\x1f';

/** Fields addressed by role: term, annotation, translation */
export const MIN_CARD_FIELDS = 3;

// ─────────────────────────────────────────────────────────────────────────────
// Raw Records
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One row as read from the collection, before classification.
 */
export interface RawCardRow {
  /** Note fields joined by FIELD_SEPARATOR */
  rawFields: string;
  /** Scheduling queue code */
  stateCode: number;
  reps: number;
  lapses: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Cards
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Learning state of a card.
 * Only `review` counts as learned.
 */
export type LearningState = 'new' | 'learning' | 'review';

/**
 * Note fields with at least the three role-addressed entries.
 */
export type CardFields = readonly [string, string, string, ...string[]];

export interface Card {
  readonly fields: CardFields;
  readonly state: LearningState;
  readonly reps: number;
  readonly lapses: number;
}

/**
 * Role-addressed view of a card's first three fields.
 */
export interface CardFace {
  term: string;
  annotation: string;
  translation: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Aggregates
// ─────────────────────────────────────────────────────────────────────────────

export interface AggregateStats {
  readonly total: number;
  /** Cards in the `review` state */
  readonly learned: number;
  /** learned / total * 100, or null for an empty deck */
  readonly learnedPercentage: number | null;
  readonly byState: Readonly<Record<LearningState, number>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Rendering
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Token name to substitution value.
 */
export type TokenMap = ReadonlyMap<string, string>;

export interface FragmentOptions {
  /** Prefix of the lookup link; the term is appended as-is */
  lookupUrlBase: string;
}

/**
 * Outcome of a successful report run.
 */
export interface ReportSummary {
  stats: AggregateStats;
  outputPath: string;
  /** Placeholders left literal because no token matched them */
  unresolvedPlaceholders: string[];
}
