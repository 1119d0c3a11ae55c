import { readFileSync } from 'node:fs';
import Database from 'better-sqlite3';

export type DB = Database.Database;

const schemaPath = new URL('../schema.sql', import.meta.url);

/**
 * Open the SQLite database and apply the schema.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(path: string): DB {
  const db = new Database(path);
  db.pragma('foreign_keys = ON');
  if (path !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.exec(readFileSync(schemaPath, 'utf8'));
  return db;
}
