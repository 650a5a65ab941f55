import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { SCHEMA_SQL } from './schema.js';

export type KitpoolDatabase = Database.Database;

/**
 * Open (creating when needed) the SQLite database and apply the schema.
 * `:memory:` gives a private throwaway database, used by tests.
 */
export function openDatabase(path: string): KitpoolDatabase {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);
  if (path !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  db.exec(SCHEMA_SQL);
  return db;
}
