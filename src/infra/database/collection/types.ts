/**
 * Flashcard collection schema (SQLite)
 *
 * Only the columns the report reads are declared.
 */

// Cards Table
export interface Cards {
  id: number;
  nid: number; // notes.id
  did: number; // deck id
  queue: number; // scheduling queue, see classifyStateCode
  reps: number;
  lapses: number;
}

// Notes Table
export interface Notes {
  id: number;
  flds: string; // fields joined by U+001F
}

export interface CollectionDatabase {
  cards: Cards;
  notes: Notes;
}
