/**
 * Builds SQLite collection files for repository and end-to-end tests.
 */

import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import Database from 'better-sqlite3';

export interface NoteFixture {
  id: number;
  flds: string;
}

export interface CardFixture {
  id: number;
  nid: number;
  did: number;
  queue: number | string;
  reps: number | string;
  lapses: number;
}

export const makeTempDir = async (prefix = 'deck-report-'): Promise<string> => {
  return mkdtemp(path.join(tmpdir(), prefix));
};

/**
 * Writes a collection with the subset of the schema the report reads.
 */
export const writeCollection = (
  filePath: string,
  notes: NoteFixture[],
  cards: CardFixture[]
): void => {
  const db = new Database(filePath);

  try {
    db.exec(`
      CREATE TABLE notes (id INTEGER PRIMARY KEY, flds TEXT NOT NULL);
      CREATE TABLE cards (
        id INTEGER PRIMARY KEY,
        nid INTEGER NOT NULL,
        did INTEGER NOT NULL,
        queue INTEGER NOT NULL,
        reps INTEGER NOT NULL,
        lapses INTEGER NOT NULL
      );
    `);

    const insertNote = db.prepare('INSERT INTO notes (id, flds) VALUES (@id, @flds)');
    const insertCard = db.prepare(
      'INSERT INTO cards (id, nid, did, queue, reps, lapses) VALUES (@id, @nid, @did, @queue, @reps, @lapses)'
    );

    db.transaction(() => {
      for (const note of notes) {
        insertNote.run(note);
      }
      for (const card of cards) {
        insertCard.run(card);
      }
    })();
  } finally {
    db.close();
  }
};

/**
 * The two-card sample deck (id 1001) plus a card in another deck.
 */
export const writeSampleCollection = (filePath: string): void => {
  writeCollection(
    filePath,
    [
      { id: 1, flds: '日本\x1fにほん\x1fJapan' },
      { id: 2, flds: '猫\x1fねこ\x1fcat' },
      { id: 3, flds: '犬\x1fいぬ\x1fdog' },
    ],
    [
      { id: 11, nid: 1, did: 1001, queue: 2, reps: 5, lapses: 0 },
      { id: 12, nid: 2, did: 1001, queue: 0, reps: 0, lapses: 0 },
      { id: 13, nid: 3, did: 2002, queue: 2, reps: 9, lapses: 3 },
    ]
  );
};
