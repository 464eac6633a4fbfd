import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { StoreUnavailableError } from '../../core/errors';

export type SqliteDatabase = Database.Database;

export const IN_MEMORY = ':memory:';

const SCHEMA = [
  `CREATE TABLE IF NOT EXISTS books (
    id TEXT PRIMARY KEY,
    isbn TEXT,
    title TEXT NOT NULL DEFAULT '',
    status TEXT NOT NULL DEFAULT 'Available' CHECK (status IN ('Available', 'Borrowed', 'Reserved')),
    holder_id TEXT,
    holder_name TEXT,
    reserved_id TEXT,
    reserved_name TEXT,
    updated_at TEXT NOT NULL
  );`,
  `CREATE TABLE IF NOT EXISTS users (
    id TEXT PRIMARY KEY,
    display_name TEXT NOT NULL,
    secret TEXT NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );`,
  `CREATE TABLE IF NOT EXISTS waitlist (
    sequence INTEGER PRIMARY KEY AUTOINCREMENT,
    id TEXT NOT NULL UNIQUE,
    book_id TEXT NOT NULL REFERENCES books(id),
    student_id TEXT NOT NULL,
    enqueued_at TEXT NOT NULL
  );`,
  'CREATE INDEX IF NOT EXISTS idx_waitlist_book ON waitlist(book_id, sequence);',
  `CREATE TABLE IF NOT EXISTS transactions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    occurred_at TEXT NOT NULL,
    action TEXT NOT NULL CHECK (action IN ('Borrow', 'Return')),
    book_id TEXT NOT NULL,
    student_id TEXT NOT NULL
  );`,
  'CREATE INDEX IF NOT EXISTS idx_transactions_book ON transactions(book_id);',
].join('\n');

// Open (creating if needed) the lending database and apply the schema
// ':memory:' gives a private database, used by tests
export function openDatabase(databasePath: string): SqliteDatabase {
  try {
    if (databasePath !== IN_MEMORY) {
      fs.mkdirSync(path.dirname(path.resolve(databasePath)), { recursive: true });
    }

    const db = new Database(databasePath);
    if (databasePath !== IN_MEMORY) {
      db.pragma('journal_mode = WAL');
    }
    db.pragma('foreign_keys = ON');
    db.pragma('busy_timeout = 5000');
    db.exec(SCHEMA);
    return db;
  } catch (error) {
    throw new StoreUnavailableError(`open ${databasePath}`, error);
  }
}

// Run a driver call, surfacing any failure as StoreUnavailableError
export const guard = async <T>(operation: string, fn: () => T): Promise<T> => {
  try {
    return fn();
  } catch (error) {
    throw new StoreUnavailableError(operation, error);
  }
};

export const ping = (db: SqliteDatabase): Promise<void> =>
  guard('ping', () => {
    db.prepare('SELECT 1').get();
  });
