import type Database from 'better-sqlite3';
import type { Finding, FindingCategory, Severity } from '../../types/entities.js';
import { FINDING_CATEGORIES, SEVERITIES } from '../../types/entities.js';

/**
 * Raw row shape returned by better-sqlite3 for the `findings` table.
 * Column names are snake_case as defined in the schema.
 */
interface FindingRow {
  id: number;
  transaction_id: number;
  rule: string;
  category: string;
  severity: string;
  message: string;
  created_at: string;
}

function toCategory(value: string): FindingCategory | undefined {
  return FINDING_CATEGORIES.find((c) => c === value);
}

function toSeverity(value: string): Severity | undefined {
  return SEVERITIES.find((s) => s === value);
}

/**
 * Maps a snake_case DB row to a camelCase Finding entity.
 * Rows whose category or severity is outside the known set map to undefined.
 */
function rowToFinding(row: FindingRow): Finding | undefined {
  const category = toCategory(row.category);
  const severity = toSeverity(row.severity);
  if (category === undefined || severity === undefined) {
    return undefined;
  }
  return {
    transactionId: row.transaction_id,
    rule: row.rule,
    category,
    severity,
    message: row.message,
  };
}

/**
 * Repository for the `findings` table.
 *
 * Findings are a cache of analyzer output; rows cascade away with their
 * transaction, so they never outlive it.
 */
export class FindingRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /** Replace every stored finding of one transaction in a single SQLite transaction. */
  replaceForTransaction(transactionId: number, findings: readonly Finding[]): void {
    const del = this.db.prepare<[number]>('DELETE FROM findings WHERE transaction_id = ?');
    const insert = this.db.prepare<[number, string, string, string, string, string]>(
      `INSERT INTO findings (transaction_id, rule, category, severity, message, created_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
    );
    const now = new Date().toISOString();

    const run = this.db.transaction(() => {
      del.run(transactionId);
      for (const f of findings) {
        insert.run(transactionId, f.rule, f.category, f.severity, f.message, now);
      }
    });
    run();
  }

  /**
   * Return stored findings for a transaction in insertion order.
   * Rows with an unknown category or severity are skipped.
   */
  findByTransactionId(transactionId: number): Finding[] {
    const stmt = this.db.prepare<[number], FindingRow>(
      `SELECT id, transaction_id, rule, category, severity, message, created_at
       FROM findings
       WHERE transaction_id = ?
       ORDER BY id`,
    );
    return stmt.all(transactionId).flatMap((row) => {
      const finding = rowToFinding(row);
      return finding ? [finding] : [];
    });
  }

  /**
   * Count stored findings per severity. Severities with no rows report 0;
   * rows with an unknown category or severity are not counted.
   */
  countBySeverity(): Record<Severity, number> {
    const known = FINDING_CATEGORIES.map(() => '?').join(', ');
    const rows = this.db
      .prepare<string[], { severity: string; cnt: number }>(
        `SELECT severity, COUNT(*) AS cnt FROM findings
         WHERE category IN (${known})
         GROUP BY severity`,
      )
      .all(...FINDING_CATEGORIES);
    const counts: Record<Severity, number> = { info: 0, warning: 0, high: 0 };
    for (const row of rows) {
      const severity = toSeverity(row.severity);
      if (severity !== undefined) {
        counts[severity] += row.cnt;
      }
    }
    return counts;
  }
}
