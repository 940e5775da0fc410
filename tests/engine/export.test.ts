import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { text } from 'node:stream/consumers';
import {
  HAR_CREATOR,
  exportToFile,
  toHarEntry,
  toInterchange,
  toRecord,
} from '../../src/engine/export.js';
import { importHar, importJsonExport } from '../../src/engine/ingest.js';
import { TransactionRepository } from '../../src/db/repository/transaction-repository.js';
import { QueryEngine } from '../../src/engine/query.js';
import type { Transaction } from '../../src/types/entities.js';
import { cleanInput, cleanTransaction, memoryDb } from '../fixtures.js';

// ---------------------------------------------------------------------------
// ヘルパー
// ---------------------------------------------------------------------------

function withoutId(tx: Transaction): Omit<Transaction, 'id'> {
  const { id: _id, ...rest } = tx;
  return rest;
}

const noResponse = { responseStatus: null, responseHeaders: null, responseBody: null };

// ---------------------------------------------------------------------------
// テスト
// ---------------------------------------------------------------------------

describe('toRecord', () => {
  it('snake_case のフラットなレコードに変換する', () => {
    const record = toRecord(cleanTransaction({ id: 4, notes: 'checked' }));
    expect(record.id).toBe(4);
    expect(record.request_headers).toEqual({ Accept: 'application/json' });
    expect(record.response_status).toBe(200);
    expect(record.response_body).toBe('{"items":[]}');
    expect(record.notes).toBe('checked');
    expect(record.analyzed).toBe(false);
  });
});

describe('toHarEntry', () => {
  it('応答ありのトランザクションを HAR エントリにする', () => {
    const entry = toHarEntry(
      cleanTransaction({
        id: 7,
        duration: 0.25,
        url: 'https://api.example.com/api/v1/items?page=2&sort=asc',
        method: 'POST',
        requestHeaders: { 'Content-Type': 'application/json', Cookie: 'sid=abc; theme=dark' },
        requestBody: '{"name":"widget"}',
        notes: 'interesting',
      }),
    );

    expect(entry.startedDateTime).toBe('2023-11-14T22:13:20.000Z');
    expect(entry.time).toBe(250);
    expect(entry.timings.wait).toBe(250);
    expect(entry.request.queryString).toEqual([
      { name: 'page', value: '2' },
      { name: 'sort', value: 'asc' },
    ]);
    expect(entry.request.cookies).toEqual([
      { name: 'sid', value: 'abc' },
      { name: 'theme', value: 'dark' },
    ]);
    expect(entry.request.postData).toEqual({
      mimeType: 'application/json',
      text: '{"name":"widget"}',
    });
    expect(entry.request.bodySize).toBe(17);
    expect(entry.response.status).toBe(200);
    expect(entry.response.statusText).toBe('OK');
    expect(entry.response.content).toEqual({
      size: 12,
      mimeType: 'application/json',
      text: '{"items":[]}',
    });
    expect(entry.response.bodySize).toBe(12);
    expect(entry.comment).toBe('interesting');
    expect(entry._transactionId).toBe(7);
  });

  it('応答なしは status 0・bodySize -1、ボディなしは postData を持たない', () => {
    const entry = toHarEntry(cleanTransaction(noResponse));

    expect(entry.response.status).toBe(0);
    expect(entry.response.statusText).toBe('');
    expect(entry.response.headers).toEqual([]);
    expect(entry.response.bodySize).toBe(-1);
    expect(entry.request.postData).toBeUndefined();
    expect(entry.comment).toBeUndefined();
  });

  it('Location ヘッダを redirectURL に入れる', () => {
    const entry = toHarEntry(
      cleanTransaction({
        responseStatus: 302,
        responseHeaders: { Location: 'https://api.example.com/login' },
        responseBody: '',
      }),
    );
    expect(entry.response.statusText).toBe('Found');
    expect(entry.response.redirectURL).toBe('https://api.example.com/login');
  });
});

describe('toInterchange', () => {
  it('JSON — 空の結果は空配列', async () => {
    expect(await text(toInterchange([], 'json'))).toBe('[]\n');
  });

  it('JSON — 一行一レコードの配列', async () => {
    const out = await text(
      toInterchange([cleanTransaction({ id: 2 }), cleanTransaction({ id: 1 })], 'json'),
    );
    const lines = out.split('\n');

    expect(lines[0]).toBe('[');
    expect(lines).toHaveLength(5);
    expect(lines[4]).toBe('');
    const parsed: Array<{ id: number }> = JSON.parse(out);
    expect(parsed.map((r) => r.id)).toEqual([2, 1]);
  });

  it('HAR — log.creator とエントリを持つ', async () => {
    const out = await text(toInterchange([cleanTransaction({ id: 3 })], 'har'));
    const har: {
      log: { version: string; creator: typeof HAR_CREATOR; entries: Array<{ _transactionId: number }> };
    } = JSON.parse(out);

    expect(har.log.version).toBe('1.2');
    expect(har.log.creator).toEqual({ name: 'tapdeck', version: '0.1.0' });
    expect(har.log.entries.map((e) => e._transactionId)).toEqual([3]);
  });

  it('HAR — 空の結果', async () => {
    expect(await text(toInterchange([], 'har'))).toBe(
      '{"log":{"version":"1.2","creator":{"name":"tapdeck","version":"0.1.0"},"entries":[]}}\n',
    );
  });

  it('読み出すまでイテラブルを消費しない', async () => {
    let consumed = 0;
    function* source(): Generator<Transaction> {
      for (let id = 1; id <= 3; id++) {
        consumed++;
        yield cleanTransaction({ id });
      }
    }

    const stream = toInterchange(source(), 'json');
    expect(consumed).toBe(0);
    await text(stream);
    expect(consumed).toBe(3);
  });
});

describe('export → import round trip', () => {
  let repo: TransactionRepository;
  let query: QueryEngine;

  beforeEach(() => {
    const db = memoryDb();
    repo = new TransactionRepository(db);
    query = new QueryEngine(db);
    repo.append(cleanInput({ notes: 'first', analyzed: true }));
    repo.append(
      cleanInput({
        ...noResponse,
        method: 'POST',
        url: 'http://shop.test:8080/cart?x=1',
        host: 'shop.test:8080',
        path: '/cart?x=1',
        protocol: 'http',
        requestBody: 'qty=2',
        duration: 0.5,
      }),
    );
  });

  it('JSON — id 以外の全フィールドが保存される', async () => {
    const exported = await text(toInterchange(query.find(), 'json'));
    const target = new TransactionRepository(memoryDb());

    const imported = importJsonExport(target, exported);

    expect(imported.map(withoutId)).toEqual(query.all().map(withoutId));
  });

  it('HAR — リクエスト・応答・所要時間・注記が保存される', async () => {
    const exported = await text(toInterchange(query.find(), 'har'));
    const target = new TransactionRepository(memoryDb());

    const [noResp, full] = importHar(target, exported);

    expect(noResp.method).toBe('POST');
    expect(noResp.host).toBe('shop.test:8080');
    expect(noResp.path).toBe('/cart?x=1');
    expect(noResp.protocol).toBe('http');
    expect(noResp.requestBody).toBe('qty=2');
    expect(noResp.responseStatus).toBeNull();
    expect(noResp.responseBody).toBeNull();
    expect(noResp.duration).toBe(0.5);
    expect(full.timestamp).toBe(1_700_000_000);
    expect(full.responseStatus).toBe(200);
    expect(full.responseHeaders).toEqual(cleanInput().responseHeaders);
    expect(full.responseBody).toBe('{"items":[]}');
    expect(full.notes).toBe('first');
  });
});

describe('exportToFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tapdeck-export-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('ファイルに書き出して件数を返す', async () => {
    const file = path.join(dir, 'out.har');
    const count = await exportToFile(
      file,
      [cleanTransaction({ id: 1 }), cleanTransaction({ id: 2 })],
      'har',
    );

    expect(count).toBe(2);
    const har: { log: { entries: unknown[] } } = JSON.parse(fs.readFileSync(file, 'utf8'));
    expect(har.log.entries).toHaveLength(2);
  });
});
