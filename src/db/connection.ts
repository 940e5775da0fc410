/**
 * tapdeck — Database connection
 *
 * Opens the store file, verifies it and brings the schema up to date.
 * The returned handle is owned by the caller and passed to every component.
 */

import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { migrateDatabase } from './migrate.js';
import { StoreCorruptedError } from '../types/errors.js';

export const IN_MEMORY = ':memory:';

/**
 * Open (creating if needed) the store at `dbPath`.
 *
 * File databases run in WAL mode so reader connections are never blocked by
 * an in-flight append. An unreadable file or a failed integrity check is
 * fatal: nothing is partially recovered.
 *
 * @throws StoreCorruptedError
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }

  let db: Database.Database | undefined;
  try {
    db = new Database(dbPath);
    if (dbPath !== IN_MEMORY) {
      db.pragma('journal_mode = WAL');
      db.pragma('busy_timeout = 5000');
    }

    const check = db.prepare<[], { quick_check: string }>('PRAGMA quick_check').get();
    if (check?.quick_check !== 'ok') {
      throw new Error(`integrity check failed: ${check?.quick_check ?? 'no result'}`);
    }

    migrateDatabase(db);
    return db;
  } catch (error) {
    db?.close();
    const message = error instanceof Error ? error.message : String(error);
    throw new StoreCorruptedError(dbPath, message, { cause: error });
  }
}
