/**
 * Migration v1: Add findings table
 *
 * Stores created before analysis results were persisted only have the
 * transactions table. This adds the findings cache and the timestamp index.
 */

import type Database from 'better-sqlite3';
import type { Migration } from './index.js';

const migration: Migration = {
  version: 1,
  description: 'Add findings table',
  up(db: Database.Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS findings (
        id              INTEGER PRIMARY KEY AUTOINCREMENT,
        transaction_id  INTEGER NOT NULL,
        rule            TEXT NOT NULL,
        category        TEXT NOT NULL,
        severity        TEXT NOT NULL,
        message         TEXT NOT NULL,
        created_at      TEXT NOT NULL,
        FOREIGN KEY (transaction_id) REFERENCES transactions(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_findings_transaction ON findings(transaction_id);
      CREATE INDEX IF NOT EXISTS idx_transactions_timestamp ON transactions(timestamp);
    `);
  },
};

export default migration;
