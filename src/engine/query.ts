/**
 * tapdeck — Query Engine
 *
 * Lazy, restartable, scope-aware reads over the transaction store.
 * Every read-side component (analyzer, exporter, automation scanner,
 * CLI, MCP tools) goes through one QueryEngine so that a scope
 * restriction applies to all of them.
 */

import type Database from 'better-sqlite3';
import type { Transaction } from '../types/entities.js';
import {
  UNSCOPED,
  parseCriteria,
  type HostScope,
  type ParsedCriteria,
  type QueryCriteria,
  type TrafficStats,
} from '../types/query.js';
import { NotFoundError } from '../types/errors.js';
import {
  TRANSACTION_COLUMNS,
  rowToTransaction,
  type TransactionRow,
} from '../db/repository/transaction-repository.js';
import { buildWhereClause, type SqlParam } from '../db/repository/criteria-sql.js';

export interface QueryEngineOptions {
  scope?: HostScope;
  /** Rows fetched per keyset page. */
  pageSize?: number;
}

export class QueryEngine {
  private readonly db: Database.Database;
  readonly scope: HostScope;
  private readonly pageSize: number;

  constructor(db: Database.Database, options: QueryEngineOptions = {}) {
    this.db = db;
    this.scope = options.scope ?? UNSCOPED;
    this.pageSize = options.pageSize ?? 200;
  }

  /**
   * Matching transactions, most recent first.
   *
   * Criteria are validated eagerly, so an unsupported key fails here rather
   * than on first iteration. The returned iterable re-runs the query every
   * time it is iterated and fetches keyset pages on demand; no cursor is
   * held open between pages.
   *
   * @throws InvalidQueryError
   */
  find(criteria: QueryCriteria = {}): Iterable<Transaction> {
    const parsed = parseCriteria(criteria);
    return {
      [Symbol.iterator]: () => this.iterate(parsed),
    };
  }

  /** Materialize `find` into an array. */
  all(criteria: QueryCriteria = {}): Transaction[] {
    return [...this.find(criteria)];
  }

  /**
   * Scoped lookup by id.
   *
   * @throws NotFoundError when absent or outside the scope
   */
  get(id: number): Transaction {
    const where = buildWhereClause({}, this.scope);
    const clause = where.sql === '' ? 'WHERE id = ?' : `${where.sql} AND id = ?`;
    const row = this.db
      .prepare<SqlParam[], TransactionRow>(
        `SELECT ${TRANSACTION_COLUMNS} FROM transactions ${clause}`,
      )
      .get(...where.params, id);
    if (row === undefined) {
      throw new NotFoundError('Transaction', id);
    }
    return rowToTransaction(row);
  }

  /**
   * Aggregate statistics over the matching transactions.
   *
   * @throws InvalidQueryError
   */
  aggregate(criteria: QueryCriteria = {}, top = 10): TrafficStats {
    const where = buildWhereClause(parseCriteria(criteria), this.scope);
    const from = `FROM transactions ${where.sql}`;

    const totals = this.db
      .prepare<
        SqlParam[],
        {
          total: number;
          hosts: number;
          avg: number | null;
          min: number | null;
          max: number | null;
        }
      >(
        `SELECT COUNT(*) AS total, COUNT(DISTINCT LOWER(host)) AS hosts,
                AVG(duration) AS avg, MIN(duration) AS min, MAX(duration) AS max
         ${from}`,
      )
      .get(...where.params);

    const methods = this.db
      .prepare<SqlParam[], { method: string; count: number }>(
        `SELECT UPPER(method) AS method, COUNT(*) AS count ${from}
         GROUP BY UPPER(method) ORDER BY count DESC, method`,
      )
      .all(...where.params);

    const statusCodes = this.db
      .prepare<SqlParam[], { status: number | null; count: number }>(
        `SELECT response_status AS status, COUNT(*) AS count ${from}
         GROUP BY response_status ORDER BY count DESC, status`,
      )
      .all(...where.params);

    const topHosts = this.db
      .prepare<SqlParam[], { host: string; count: number }>(
        `SELECT LOWER(host) AS host, COUNT(*) AS count ${from}
         GROUP BY LOWER(host) ORDER BY count DESC, host LIMIT ?`,
      )
      .all(...where.params, top);

    const slowest = this.db
      .prepare<SqlParam[], { id: number; method: string; url: string; duration: number }>(
        `SELECT id, method, url, duration ${from} ORDER BY duration DESC, id DESC LIMIT ?`,
      )
      .all(...where.params, top);

    return {
      total: totals?.total ?? 0,
      uniqueHosts: totals?.hosts ?? 0,
      avgDuration: totals?.avg ?? 0,
      minDuration: totals?.min ?? 0,
      maxDuration: totals?.max ?? 0,
      methods,
      statusCodes,
      topHosts,
      slowest,
    };
  }

  private *iterate(criteria: ParsedCriteria): Generator<Transaction> {
    let remaining = criteria.limit ?? Number.POSITIVE_INFINITY;
    let beforeId: number | undefined;

    while (remaining > 0) {
      const where = buildWhereClause(criteria, this.scope, { beforeId });
      const size = Math.min(this.pageSize, remaining);
      const rows = this.db
        .prepare<SqlParam[], TransactionRow>(
          `SELECT ${TRANSACTION_COLUMNS} FROM transactions ${where.sql} ORDER BY id DESC LIMIT ?`,
        )
        .all(...where.params, size);

      for (const row of rows) {
        yield rowToTransaction(row);
      }

      remaining -= rows.length;
      if (rows.length < size) {
        return;
      }
      beforeId = rows[rows.length - 1].id;
    }
  }
}
