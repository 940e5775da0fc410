/**
 * tapdeck — Ingest Engine
 *
 * キャプチャエンジンが出力するレコード（NDJSON フィード）、JSON エクスポート、
 * HAR を読み込み、TransactionRepository に追記する。
 * 文字列を受け取るコア関数はファイルシステム非依存でテストから直接呼び出せる。
 * ingestFile() はファイル読み込みの薄いラッパー。
 */

import fs from 'node:fs';
import readline from 'node:readline';
import { z } from 'zod';
import type { HeaderMap, Transaction } from '../types/entities.js';
import { PROTOCOLS } from '../types/entities.js';
import type { CreateTransactionInput } from '../types/repository.js';
import { ValidationError, describeIssues } from '../types/errors.js';
import type { TransactionRepository } from '../db/repository/transaction-repository.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { splitUrl } from '../utils/url.js';

export const INGEST_FORMATS = ['ndjson', 'json', 'har'] as const;
export type IngestFormat = (typeof INGEST_FORMATS)[number];

export interface IngestSummary {
  ingested: number;
  invalid: number;
  ids: number[];
}

// ============================================================
// キャプチャレコード
// ============================================================

const HeaderMapSchema = z.record(z.string(), z.string());

/**
 * One record from the capture feed. Same shape as a JSON export entry;
 * an `id` from an export is accepted and ignored.
 */
export const CaptureRecordSchema = z
  .object({
    id: z.number().optional(),
    timestamp: z.number(),
    method: z.string(),
    url: z.string(),
    host: z.string(),
    path: z.string().optional(),
    protocol: z.enum(PROTOCOLS).optional(),
    request_headers: HeaderMapSchema.default({}),
    request_body: z.string().default(''),
    response_status: z.number().int().nullable().default(null),
    response_headers: HeaderMapSchema.nullable().default(null),
    response_body: z.string().nullable().default(null),
    duration: z.number().default(0),
    analyzed: z.boolean().default(false),
    notes: z.string().nullable().default(null),
  })
  .strict();

export type CaptureRecord = z.input<typeof CaptureRecordSchema>;

/**
 * Convert a capture record into a repository input.
 *
 * @throws ValidationError
 */
export function recordToInput(raw: unknown): CreateTransactionInput {
  const parsed = CaptureRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError('Invalid capture record', describeIssues(parsed.error));
  }
  const record = parsed.data;
  const derived =
    record.path === undefined || record.protocol === undefined ? splitUrl(record.url) : undefined;

  return {
    timestamp: record.timestamp,
    method: record.method,
    url: record.url,
    host: record.host,
    path: record.path ?? derived?.path ?? '/',
    protocol: record.protocol ?? derived?.protocol ?? 'https',
    requestHeaders: record.request_headers,
    requestBody: record.request_body,
    responseStatus: record.response_status,
    responseHeaders: record.response_headers,
    responseBody: record.response_body,
    duration: record.duration,
    analyzed: record.analyzed,
    notes: record.notes,
  };
}

/** @throws ValidationError */
export function ingestRecord(repo: TransactionRepository, record: unknown): Transaction {
  return repo.append(recordToInput(record));
}

/**
 * Consume the capture engine's NDJSON feed. Blank lines are ignored; a line
 * that is not JSON or not a valid record is counted and logged, and the
 * stream continues.
 */
export async function ingestLines(
  repo: TransactionRepository,
  lines: AsyncIterable<string> | Iterable<string>,
  logger: Logger = getLogger(),
): Promise<IngestSummary> {
  const summary: IngestSummary = { ingested: 0, invalid: 0, ids: [] };
  let lineNo = 0;

  for await (const line of lines) {
    lineNo++;
    if (line.trim() === '') {
      continue;
    }
    try {
      const tx = ingestRecord(repo, JSON.parse(line));
      summary.ingested++;
      summary.ids.push(tx.id);
    } catch (error) {
      summary.invalid++;
      logger.warn(
        { line: lineNo, err: error instanceof Error ? error.message : String(error) },
        'capture record rejected',
      );
    }
  }

  logger.info({ ingested: summary.ingested, invalid: summary.invalid }, 'capture feed consumed');
  return summary;
}

function parseJson(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ValidationError(`Invalid ${what}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
}

/**
 * Import a JSON export. All records are stored or, if any is invalid, none.
 *
 * @throws ValidationError
 */
export function importJsonExport(repo: TransactionRepository, text: string): Transaction[] {
  const parsed = z.array(z.unknown()).safeParse(parseJson(text, 'JSON export'));
  if (!parsed.success) {
    throw new ValidationError('Invalid JSON export', ['top level must be an array']);
  }
  return repo.appendMany(parsed.data.map(recordToInput));
}

// ============================================================
// HAR
// ============================================================

const HarNameValueSchema = z.object({ name: z.string(), value: z.string() });

const HarEntrySchema = z.object({
  startedDateTime: z.string(),
  time: z.number().default(0),
  request: z.object({
    method: z.string(),
    url: z.string(),
    headers: z.array(HarNameValueSchema).default([]),
    postData: z.object({ text: z.string().optional() }).optional(),
  }),
  response: z
    .object({
      status: z.number().int(),
      headers: z.array(HarNameValueSchema).default([]),
      content: z.object({ text: z.string().optional() }).optional(),
    })
    .optional(),
  comment: z.string().optional(),
});

const HarSchema = z.object({
  log: z.object({ entries: z.array(HarEntrySchema) }),
});

type HarEntryInput = z.output<typeof HarEntrySchema>;

/** Repeated names are joined with ", ". */
function headerMap(pairs: ReadonlyArray<{ name: string; value: string }>): HeaderMap {
  const headers: HeaderMap = {};
  for (const { name, value } of pairs) {
    headers[name] = name in headers ? `${headers[name]}, ${value}` : value;
  }
  return headers;
}

function harEntryToInput(entry: HarEntryInput): CreateTransactionInput {
  const parts = splitUrl(entry.request.url);
  const response =
    entry.response !== undefined && entry.response.status > 0 ? entry.response : undefined;

  return {
    timestamp: Date.parse(entry.startedDateTime) / 1000,
    method: entry.request.method,
    url: entry.request.url,
    host: parts.host,
    path: parts.path,
    protocol: parts.protocol,
    requestHeaders: headerMap(entry.request.headers),
    requestBody: entry.request.postData?.text ?? '',
    responseStatus: response?.status ?? null,
    responseHeaders: response ? headerMap(response.headers) : null,
    responseBody: response ? (response.content?.text ?? '') : null,
    duration: Math.max(0, entry.time) / 1000,
    notes: entry.comment ?? null,
  };
}

/**
 * Import a HAR 1.2 document. Entries without a response (status 0) are
 * stored with a null response. All-or-nothing.
 *
 * @throws ValidationError
 */
export function importHar(repo: TransactionRepository, text: string): Transaction[] {
  const parsed = HarSchema.safeParse(parseJson(text, 'HAR'));
  if (!parsed.success) {
    throw new ValidationError('Invalid HAR', describeIssues(parsed.error));
  }
  return repo.appendMany(parsed.data.log.entries.map(harEntryToInput));
}

// ============================================================
// ファイル
// ============================================================

/**
 * Ingest a file in one of the supported formats.
 *
 * @throws ValidationError for malformed json/har documents
 */
export async function ingestFile(
  repo: TransactionRepository,
  filePath: string,
  format: IngestFormat,
  logger: Logger = getLogger(),
): Promise<IngestSummary> {
  if (format === 'ndjson') {
    const lines = readline.createInterface({
      input: fs.createReadStream(filePath, { encoding: 'utf8' }),
      crlfDelay: Infinity,
    });
    return ingestLines(repo, lines, logger);
  }

  const text = await fs.promises.readFile(filePath, 'utf8');
  const stored = format === 'har' ? importHar(repo, text) : importJsonExport(repo, text);
  return { ingested: stored.length, invalid: 0, ids: stored.map((tx) => tx.id) };
}
