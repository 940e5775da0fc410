/**
 * tapdeck — TransactionRepository
 *
 * transactions テーブルへの追記・参照・注記・一括削除を提供する。
 * snake_case (DB) ↔ camelCase (TypeScript) の変換を内部で行う。
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { HeaderMap, Transaction } from '../../types/entities.js';
import {
  CreateTransactionInputSchema,
  type CreateTransactionInput,
  type ValidTransactionInput,
} from '../../types/repository.js';
import { UNSCOPED, parseCriteria, type HostScope, type QueryCriteria } from '../../types/query.js';
import { NotFoundError, ValidationError, describeIssues } from '../../types/errors.js';
import { DEFAULT_MAX_BODY_BYTES, truncateBody } from '../../utils/body.js';
import { buildWhereClause, type SqlParam } from './criteria-sql.js';

// ---------------------------------------------------------------------------
// DB row 型
// ---------------------------------------------------------------------------

/** better-sqlite3 から返る transactions テーブルの行形状 */
export interface TransactionRow {
  id: number;
  timestamp: number;
  method: string;
  url: string;
  host: string;
  path: string;
  protocol: string;
  request_headers: string;
  request_body: string;
  response_status: number | null;
  response_headers: string | null;
  response_body: string | null;
  duration: number;
  analyzed: number;
  notes: string | null;
}

export const TRANSACTION_COLUMNS =
  'id, timestamp, method, url, host, path, protocol, request_headers, request_body, response_status, response_headers, response_body, duration, analyzed, notes';

// ---------------------------------------------------------------------------
// Row → Transaction 変換
// ---------------------------------------------------------------------------

const StoredHeadersSchema = z.record(z.string(), z.unknown());

/**
 * Parse a stored header blob. Non-string values are stringified; a blob that
 * is not a JSON object yields an empty mapping so readers never throw on it.
 */
function parseHeaders(text: string): HeaderMap {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return {};
  }
  const parsed = StoredHeadersSchema.safeParse(raw);
  if (!parsed.success) {
    return {};
  }
  const headers: HeaderMap = {};
  for (const [key, value] of Object.entries(parsed.data)) {
    headers[key] = typeof value === 'string' ? value : JSON.stringify(value);
  }
  return headers;
}

/** snake_case DB row を camelCase Transaction にマッピング */
export function rowToTransaction(row: TransactionRow): Transaction {
  return {
    id: row.id,
    timestamp: row.timestamp,
    method: row.method,
    url: row.url,
    host: row.host,
    path: row.path,
    protocol: row.protocol === 'http' ? 'http' : 'https',
    requestHeaders: parseHeaders(row.request_headers),
    requestBody: row.request_body,
    responseStatus: row.response_status,
    responseHeaders: row.response_headers === null ? null : parseHeaders(row.response_headers),
    responseBody: row.response_body,
    duration: row.duration,
    analyzed: row.analyzed !== 0,
    notes: row.notes,
  };
}

// ---------------------------------------------------------------------------
// TransactionRepository
// ---------------------------------------------------------------------------

export interface TransactionRepositoryOptions {
  /** Body size ceiling in bytes. */
  maxBodyBytes?: number;
}

/**
 * transactions テーブルのリポジトリ。
 *
 * - append は Zod で検証し、失敗時は何も書き込まずに ValidationError
 * - id は AUTOINCREMENT で単調増加、clear() 後も再利用されない
 * - clear() は単一トランザクションで全件削除（findings は CASCADE）
 */
export class TransactionRepository {
  private readonly db: Database.Database;
  private readonly maxBodyBytes: number;

  private readonly insertStmt: Database.Statement<SqlParam[]>;
  private readonly selectByIdStmt: Database.Statement<[number], TransactionRow>;
  private readonly updateNotesStmt: Database.Statement<[string | null, number]>;
  private readonly markAnalyzedStmt: Database.Statement<[number]>;
  private readonly countStmt: Database.Statement<[], { cnt: number }>;
  private readonly deleteAllStmt: Database.Statement<[]>;

  constructor(db: Database.Database, options: TransactionRepositoryOptions = {}) {
    this.db = db;
    this.maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;

    this.insertStmt = this.db.prepare<SqlParam[]>(
      `INSERT INTO transactions (timestamp, method, url, host, path, protocol, request_headers, request_body, response_status, response_headers, response_body, duration, analyzed, notes)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    );

    this.selectByIdStmt = this.db.prepare<[number], TransactionRow>(
      `SELECT ${TRANSACTION_COLUMNS} FROM transactions WHERE id = ?`,
    );

    this.updateNotesStmt = this.db.prepare<[string | null, number]>(
      'UPDATE transactions SET notes = ? WHERE id = ?',
    );

    this.markAnalyzedStmt = this.db.prepare<[number]>(
      'UPDATE transactions SET analyzed = 1 WHERE id = ?',
    );

    this.countStmt = this.db.prepare<[], { cnt: number }>(
      'SELECT COUNT(*) AS cnt FROM transactions',
    );

    this.deleteAllStmt = this.db.prepare<[]>('DELETE FROM transactions');
  }

  /**
   * Validate, apply the body ceiling and insert one transaction.
   *
   * @throws ValidationError when method, url or host is missing or any field is malformed
   */
  append(input: CreateTransactionInput): Transaction {
    const valid = this.validate(input);
    const result = this.insertStmt.run(
      valid.timestamp,
      valid.method,
      valid.url,
      valid.host,
      valid.path,
      valid.protocol,
      JSON.stringify(valid.requestHeaders),
      valid.requestBody,
      valid.responseStatus,
      valid.responseHeaders === null ? null : JSON.stringify(valid.responseHeaders),
      valid.responseBody,
      valid.duration,
      valid.analyzed ? 1 : 0,
      valid.notes,
    );
    return { id: Number(result.lastInsertRowid), ...valid };
  }

  /**
   * Append several transactions atomically: either every input is stored
   * or, on the first invalid one, none is.
   */
  appendMany(inputs: readonly CreateTransactionInput[]): Transaction[] {
    const run = this.db.transaction((batch: readonly CreateTransactionInput[]) =>
      batch.map((input) => this.append(input)),
    );
    return run(inputs);
  }

  /** Find a Transaction by id. Returns undefined if not found. */
  findById(id: number): Transaction | undefined {
    const row = this.selectByIdStmt.get(id);
    return row ? rowToTransaction(row) : undefined;
  }

  /** @throws NotFoundError */
  get(id: number): Transaction {
    const tx = this.findById(id);
    if (tx === undefined) {
      throw new NotFoundError('Transaction', id);
    }
    return tx;
  }

  /**
   * Most-recent-first page of transactions matching `filter`.
   *
   * @throws InvalidQueryError for unsupported filter keys
   */
  list(
    filter: QueryCriteria = {},
    limit = 50,
    offset = 0,
    scope: HostScope = UNSCOPED,
  ): Transaction[] {
    const criteria = parseCriteria(filter);
    const where = buildWhereClause(criteria, scope);
    const effectiveLimit = Math.min(limit, criteria.limit ?? limit);
    return this.db
      .prepare<SqlParam[], TransactionRow>(
        `SELECT ${TRANSACTION_COLUMNS} FROM transactions ${where.sql} ORDER BY id DESC LIMIT ? OFFSET ?`,
      )
      .all(...where.params, effectiveLimit, offset)
      .map(rowToTransaction);
  }

  /** @throws NotFoundError */
  updateNotes(id: number, text: string | null): void {
    if (this.updateNotesStmt.run(text, id).changes === 0) {
      throw new NotFoundError('Transaction', id);
    }
  }

  /** @throws NotFoundError */
  markAnalyzed(id: number): void {
    if (this.markAnalyzedStmt.run(id).changes === 0) {
      throw new NotFoundError('Transaction', id);
    }
  }

  count(): number {
    return this.countStmt.get()?.cnt ?? 0;
  }

  /** Remove every transaction (all-or-nothing). Returns the number removed. */
  clear(): number {
    const run = this.db.transaction(() => this.deleteAllStmt.run().changes);
    return run();
  }

  private validate(input: CreateTransactionInput): ValidTransactionInput {
    const parsed = CreateTransactionInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError('Invalid transaction', describeIssues(parsed.error));
    }
    const valid = parsed.data;
    return {
      ...valid,
      requestBody: truncateBody(valid.requestBody, this.maxBodyBytes),
      responseBody:
        valid.responseBody === null ? null : truncateBody(valid.responseBody, this.maxBodyBytes),
    };
  }
}
