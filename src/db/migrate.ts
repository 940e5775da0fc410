import type Database from 'better-sqlite3';
import { SCHEMA_SQL } from './schema.js';
import {
  getSchemaVersion,
  setSchemaVersion,
  runMigrations,
  LATEST_VERSION,
} from './migrations/index.js';

/** Names of the user tables currently present in the database. */
function userTables(db: Database.Database): string[] {
  return db
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%'",
    )
    .all()
    .map((r) => r.name);
}

/**
 * Migrate the database to the latest schema version.
 *
 * - New database (no tables): runs full schema SQL and sets version.
 * - Store from before user_version was tracked (version 0, has `transactions`):
 *   runs incremental migrations.
 * - Already up-to-date: re-runs the IF NOT EXISTS schema, otherwise a no-op.
 *
 * @throws Error when the file holds tables but none of them is `transactions`.
 *         The caller decides whether that is fatal.
 */
export function migrateDatabase(db: Database.Database): void {
  db.pragma('foreign_keys = ON');

  const currentVersion = getSchemaVersion(db);

  if (currentVersion >= LATEST_VERSION) {
    db.exec(SCHEMA_SQL);
    return;
  }

  const tables = userTables(db);

  if (tables.length === 0) {
    db.exec(SCHEMA_SQL);
    setSchemaVersion(db, LATEST_VERSION);
    return;
  }

  if (!tables.includes('transactions')) {
    throw new Error(`not a tapdeck store (tables: ${tables.join(', ')})`);
  }

  runMigrations(db, currentVersion);
}
