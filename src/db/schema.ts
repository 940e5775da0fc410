/**
 * tapdeck — SQLite schema
 *
 * This schema is the single source of truth for the database structure.
 * Header mappings are stored as JSON text; bodies as text.
 */

export const SCHEMA_SQL = `
PRAGMA foreign_keys = ON;

-- ============================================================
-- 捕捉済みトランザクション
-- ============================================================
CREATE TABLE IF NOT EXISTS transactions (
  id                INTEGER PRIMARY KEY AUTOINCREMENT,  -- never reused
  timestamp         REAL NOT NULL,                      -- seconds since epoch
  method            TEXT NOT NULL,
  url               TEXT NOT NULL,
  host              TEXT NOT NULL,
  path              TEXT NOT NULL,
  protocol          TEXT NOT NULL,                      -- "http" | "https"
  request_headers   TEXT NOT NULL DEFAULT '{}',
  request_body      TEXT NOT NULL DEFAULT '',
  response_status   INTEGER,                            -- NULL: no response arrived
  response_headers  TEXT,
  response_body     TEXT,
  duration          REAL NOT NULL DEFAULT 0,            -- seconds
  analyzed          INTEGER NOT NULL DEFAULT 0,
  notes             TEXT
);

CREATE INDEX IF NOT EXISTS idx_transactions_host      ON transactions(host);
CREATE INDEX IF NOT EXISTS idx_transactions_timestamp ON transactions(timestamp);

-- ============================================================
-- 解析結果（オンデマンド計算のキャッシュ）
-- ============================================================
CREATE TABLE IF NOT EXISTS findings (
  id              INTEGER PRIMARY KEY AUTOINCREMENT,
  transaction_id  INTEGER NOT NULL,
  rule            TEXT NOT NULL,
  category        TEXT NOT NULL,                        -- "security" | "performance" | "best_practice"
  severity        TEXT NOT NULL,                        -- "info" | "warning" | "high"
  message         TEXT NOT NULL,
  created_at      TEXT NOT NULL,
  FOREIGN KEY (transaction_id) REFERENCES transactions(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_findings_transaction ON findings(transaction_id);
` as const;
