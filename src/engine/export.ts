/**
 * tapdeck — Export Formatter
 *
 * クエリ結果をインターチェンジ形式（フラット JSON / HAR 1.2）に
 * ストリーミング変換する。イテラブルは一件ずつ消費され、
 * 全件をメモリに載せることはない。
 */

import fs from 'node:fs';
import { STATUS_CODES } from 'node:http';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { HeaderMap, Transaction } from '../types/entities.js';
import { capturedSize } from '../utils/body.js';
import { getHeader } from '../utils/headers.js';

export const EXPORT_FORMATS = ['json', 'har'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

// ============================================================
// JSON
// ============================================================

/** Flat snake_case record; the same shape the capture feed and importers take. */
export interface TransactionRecord {
  id: number;
  timestamp: number;
  method: string;
  url: string;
  host: string;
  path: string;
  protocol: string;
  request_headers: HeaderMap;
  request_body: string;
  response_status: number | null;
  response_headers: HeaderMap | null;
  response_body: string | null;
  duration: number;
  analyzed: boolean;
  notes: string | null;
}

export function toRecord(tx: Transaction): TransactionRecord {
  return {
    id: tx.id,
    timestamp: tx.timestamp,
    method: tx.method,
    url: tx.url,
    host: tx.host,
    path: tx.path,
    protocol: tx.protocol,
    request_headers: tx.requestHeaders,
    request_body: tx.requestBody,
    response_status: tx.responseStatus,
    response_headers: tx.responseHeaders,
    response_body: tx.responseBody,
    duration: tx.duration,
    analyzed: tx.analyzed,
    notes: tx.notes,
  };
}

// ============================================================
// HAR 1.2
// ============================================================

export interface HarNameValue {
  name: string;
  value: string;
}

export interface HarEntry {
  startedDateTime: string;
  time: number;
  request: {
    method: string;
    url: string;
    httpVersion: string;
    cookies: HarNameValue[];
    headers: HarNameValue[];
    queryString: HarNameValue[];
    postData?: { mimeType: string; text: string };
    headersSize: number;
    bodySize: number;
  };
  response: {
    status: number;
    statusText: string;
    httpVersion: string;
    cookies: HarNameValue[];
    headers: HarNameValue[];
    content: { size: number; mimeType: string; text: string };
    redirectURL: string;
    headersSize: number;
    bodySize: number;
  };
  cache: Record<string, never>;
  timings: {
    blocked: number;
    dns: number;
    connect: number;
    ssl: number;
    send: number;
    wait: number;
    receive: number;
  };
  comment?: string;
  _transactionId: number;
}

export const HAR_CREATOR = { name: 'tapdeck', version: '0.1.0' };

function nameValues(headers: HeaderMap | null): HarNameValue[] {
  return Object.entries(headers ?? {}).map(([name, value]) => ({ name, value }));
}

function parseCookies(header: string | undefined): HarNameValue[] {
  if (header === undefined) {
    return [];
  }
  return header
    .split(';')
    .map((pair) => pair.trim())
    .filter((pair) => pair.length > 0)
    .map((pair) => {
      const eq = pair.indexOf('=');
      return eq < 0
        ? { name: pair, value: '' }
        : { name: pair.slice(0, eq).trim(), value: pair.slice(eq + 1).trim() };
    });
}

function queryString(url: string): HarNameValue[] {
  try {
    return [...new URL(url).searchParams].map(([name, value]) => ({ name, value }));
  } catch {
    return [];
  }
}

export function toHarEntry(tx: Transaction): HarEntry {
  const timeMs = tx.duration * 1000;
  const hasResponse = tx.responseStatus !== null;
  const responseBody = tx.responseBody ?? '';

  const entry: HarEntry = {
    startedDateTime: new Date(tx.timestamp * 1000).toISOString(),
    time: timeMs,
    request: {
      method: tx.method,
      url: tx.url,
      httpVersion: 'HTTP/1.1',
      cookies: parseCookies(getHeader(tx.requestHeaders, 'cookie')),
      headers: nameValues(tx.requestHeaders),
      queryString: queryString(tx.url),
      headersSize: -1,
      bodySize: Buffer.byteLength(tx.requestBody, 'utf8'),
    },
    response: {
      status: tx.responseStatus ?? 0,
      statusText: hasResponse ? (STATUS_CODES[tx.responseStatus ?? 0] ?? '') : '',
      httpVersion: 'HTTP/1.1',
      cookies: [],
      headers: nameValues(tx.responseHeaders),
      content: {
        size: capturedSize(tx.responseBody),
        mimeType: getHeader(tx.responseHeaders, 'content-type') ?? '',
        text: responseBody,
      },
      redirectURL: getHeader(tx.responseHeaders, 'location') ?? '',
      headersSize: -1,
      bodySize: hasResponse ? capturedSize(tx.responseBody) : -1,
    },
    cache: {},
    timings: {
      blocked: -1,
      dns: -1,
      connect: -1,
      ssl: -1,
      send: 0,
      wait: timeMs,
      receive: 0,
    },
    _transactionId: tx.id,
  };

  if (tx.requestBody.length > 0) {
    entry.request.postData = {
      mimeType: getHeader(tx.requestHeaders, 'content-type') ?? '',
      text: tx.requestBody,
    };
  }
  if (tx.notes !== null) {
    entry.comment = tx.notes;
  }
  return entry;
}

// ============================================================
// ストリーミング
// ============================================================

function* jsonChunks(transactions: Iterable<Transaction>): Generator<string> {
  yield '[';
  let first = true;
  for (const tx of transactions) {
    yield `${first ? '\n' : ',\n'}${JSON.stringify(toRecord(tx))}`;
    first = false;
  }
  yield first ? ']\n' : '\n]\n';
}

function* harChunks(transactions: Iterable<Transaction>): Generator<string> {
  yield `{"log":{"version":"1.2","creator":${JSON.stringify(HAR_CREATOR)},"entries":[`;
  let first = true;
  for (const tx of transactions) {
    yield `${first ? '\n' : ',\n'}${JSON.stringify(toHarEntry(tx))}`;
    first = false;
  }
  yield first ? ']}}\n' : '\n]}}\n';
}

/**
 * Serialize transactions into an interchange document as a byte stream.
 * The iterable is consumed lazily as the stream is read.
 */
export function toInterchange(transactions: Iterable<Transaction>, format: ExportFormat): Readable {
  const chunks = format === 'har' ? harChunks(transactions) : jsonChunks(transactions);
  return Readable.from(chunks, { objectMode: false });
}

/**
 * Stream an export to `filePath`.
 *
 * @returns the number of transactions written
 */
export async function exportToFile(
  filePath: string,
  transactions: Iterable<Transaction>,
  format: ExportFormat,
): Promise<number> {
  let count = 0;
  function* counted(): Generator<Transaction> {
    for (const tx of transactions) {
      count++;
      yield tx;
    }
  }
  await pipeline(toInterchange(counted(), format), fs.createWriteStream(filePath));
  return count;
}
