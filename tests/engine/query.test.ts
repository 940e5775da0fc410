import { describe, it, expect, beforeEach } from 'vitest';
import Database from 'better-sqlite3';
import { QueryEngine } from '../../src/engine/query.js';
import { TransactionRepository } from '../../src/db/repository/transaction-repository.js';
import { InvalidQueryError, NotFoundError } from '../../src/types/errors.js';
import type { QueryCriteria } from '../../src/types/query.js';
import { cleanInput, memoryDb } from '../fixtures.js';

function ids(rows: Iterable<{ id: number }>): number[] {
  return [...rows].map((r) => r.id);
}

describe('QueryEngine', () => {
  let db: InstanceType<typeof Database>;
  let repo: TransactionRepository;
  let engine: QueryEngine;

  beforeEach(() => {
    db = memoryDb();
    repo = new TransactionRepository(db);
    engine = new QueryEngine(db, { pageSize: 2 });
  });

  // =========================================================
  // find — 遅延・再開可能
  // =========================================================

  it('find — 複数ページにまたがって新しい順に全件返す', () => {
    for (let i = 0; i < 5; i++) {
      repo.append(cleanInput({ timestamp: 1000 + i }));
    }

    expect(ids(engine.find())).toEqual([5, 4, 3, 2, 1]);
  });

  it('find — 反復するたびに最初からやり直す', () => {
    repo.append(cleanInput());
    repo.append(cleanInput());
    const result = engine.find();

    expect(ids(result)).toEqual([2, 1]);
    repo.append(cleanInput());
    expect(ids(result)).toEqual([3, 2, 1]);
  });

  it('find — 反復中の追記は現在の反復に混ざらない', () => {
    for (let i = 0; i < 5; i++) {
      repo.append(cleanInput());
    }
    const iterator = engine.find()[Symbol.iterator]();
    const first = iterator.next();
    const seen: number[] = first.done ? [] : [first.value.id];

    repo.append(cleanInput());
    for (let r = iterator.next(); !r.done; r = iterator.next()) {
      seen.push(r.value.id);
    }

    expect(seen).toEqual([5, 4, 3, 2, 1]);
  });

  it('find — limit で打ち切る', () => {
    for (let i = 0; i < 5; i++) {
      repo.append(cleanInput());
    }
    expect(ids(engine.find({ limit: 3 }))).toEqual([5, 4, 3]);
  });

  // =========================================================
  // 条件
  // =========================================================

  it('method — 大文字小文字を区別しない', () => {
    repo.append(cleanInput({ method: 'GET' }));
    repo.append(cleanInput({ method: 'post' }));

    expect(ids(engine.find({ method: 'POST' }))).toEqual([2]);
    expect(ids(engine.find({ method: 'get' }))).toEqual([1]);
  });

  it('hostSuffix — ホスト自身とサブドメインのみ一致する', () => {
    repo.append(cleanInput({ host: 'example.com' }));
    repo.append(cleanInput({ host: 'api.example.com' }));
    repo.append(cleanInput({ host: 'badexample.com' }));

    expect(ids(engine.find({ hostSuffix: 'Example.com' }))).toEqual([2, 1]);
    expect(ids(engine.find({ host: 'example.com' }))).toEqual([1]);
  });

  it('hostSuffix — ポート付きのホストも一致する', () => {
    repo.append(cleanInput({ host: 'example.com:8443' }));
    repo.append(cleanInput({ host: 'api.example.com:8080' }));
    repo.append(cleanInput({ host: 'example.com.evil.test:443' }));

    expect(ids(engine.find({ hostSuffix: 'example.com' }))).toEqual([2, 1]);
  });

  it('status — null は応答なしを選ぶ', () => {
    repo.append(cleanInput({ responseStatus: 200 }));
    repo.append(cleanInput({ responseStatus: null, responseHeaders: null, responseBody: null }));
    repo.append(cleanInput({ responseStatus: 404 }));

    expect(ids(engine.find({ status: null }))).toEqual([2]);
    expect(ids(engine.find({ status: 404 }))).toEqual([3]);
  });

  it('since / until — 両端を含む', () => {
    repo.append(cleanInput({ timestamp: 100 }));
    repo.append(cleanInput({ timestamp: 200 }));
    repo.append(cleanInput({ timestamp: 300 }));

    expect(ids(engine.find({ since: 200, until: 300 }))).toEqual([3, 2]);
    expect(ids(engine.find({ until: 100 }))).toEqual([1]);
  });

  it('text — URL・ボディ・ヘッダを大文字小文字無視で検索する', () => {
    repo.append(cleanInput({ url: 'https://api.example.com/Search?q=1' }));
    repo.append(cleanInput({ responseBody: '{"token":"abc"}' }));
    repo.append(cleanInput({ requestHeaders: { 'X-Trace': 'TRACE-42' } }));

    expect(ids(engine.find({ text: 'search' }))).toEqual([1]);
    expect(ids(engine.find({ text: 'TOKEN' }))).toEqual([2]);
    expect(ids(engine.find({ text: 'trace-42' }))).toEqual([3]);
  });

  it('text — LIKE のワイルドカードはリテラルとして扱う', () => {
    repo.append(cleanInput({ url: 'https://api.example.com/discount?v=100%' }));
    repo.append(cleanInput({ url: 'https://api.example.com/plain' }));

    expect(ids(engine.find({ text: '100%' }))).toEqual([1]);
    expect(ids(engine.find({ text: '_' }))).toEqual([]);
  });

  it('条件は AND で合成される', () => {
    repo.append(cleanInput({ method: 'GET', responseStatus: 200 }));
    repo.append(cleanInput({ method: 'GET', responseStatus: 500 }));
    repo.append(cleanInput({ method: 'POST', responseStatus: 500 }));

    expect(ids(engine.find({ method: 'GET', status: 500 }))).toEqual([2]);
  });

  // =========================================================
  // 不正な条件
  // =========================================================

  it('未知のキー — InvalidQueryError（反復前に失敗する）', () => {
    const criteria: QueryCriteria = JSON.parse('{"verb":"GET"}');
    expect(() => engine.find(criteria)).toThrow(InvalidQueryError);
  });

  it('型の誤り — InvalidQueryError', () => {
    const criteria: QueryCriteria = JSON.parse('{"status":"200"}');
    expect(() => engine.find(criteria)).toThrow(InvalidQueryError);
  });

  it('since > until — InvalidQueryError', () => {
    expect(() => engine.find({ since: 10, until: 5 })).toThrow(
      'Empty time range: since 10 > until 5',
    );
  });

  it('host と hostSuffix の併用 — InvalidQueryError', () => {
    expect(() => engine.find({ host: 'a.test', hostSuffix: 'a.test' })).toThrow(InvalidQueryError);
  });

  // =========================================================
  // スコープ
  // =========================================================

  describe('スコープ制限', () => {
    let scoped: QueryEngine;

    beforeEach(() => {
      repo.append(cleanInput({ host: 'api.example.com' }));
      repo.append(cleanInput({ host: 'tracker.other.org' }));
      repo.append(cleanInput({ host: 'example.com' }));
      scoped = new QueryEngine(db, { scope: { suffixes: ['example.com'] } });
    });

    it('find — スコープ外を返さない', () => {
      expect(ids(scoped.find())).toEqual([3, 1]);
      expect(ids(scoped.find({ host: 'tracker.other.org' }))).toEqual([]);
    });

    it('get — スコープ外の id は NotFoundError', () => {
      expect(scoped.get(1).host).toBe('api.example.com');
      expect(() => scoped.get(2)).toThrow(NotFoundError);
    });

    it('aggregate — スコープ内だけを集計する', () => {
      expect(scoped.aggregate().total).toBe(2);
    });
  });

  // =========================================================
  // get / aggregate
  // =========================================================

  it('get — 存在しない id は NotFoundError', () => {
    expect(() => engine.get(7)).toThrow('Transaction not found: 7');
  });

  it('aggregate — 件数・時間・メソッド・ステータス・ホストを集計する', () => {
    repo.append(cleanInput({ method: 'GET', host: 'a.test', duration: 1, responseStatus: 200 }));
    repo.append(cleanInput({ method: 'get', host: 'A.test', duration: 3, responseStatus: 200 }));
    repo.append(
      cleanInput({
        method: 'POST',
        host: 'b.test',
        duration: 2,
        responseStatus: null,
        responseHeaders: null,
        responseBody: null,
      }),
    );

    const stats = engine.aggregate();

    expect(stats.total).toBe(3);
    expect(stats.uniqueHosts).toBe(2);
    expect(stats.avgDuration).toBe(2);
    expect(stats.minDuration).toBe(1);
    expect(stats.maxDuration).toBe(3);
    expect(stats.methods).toEqual([
      { method: 'GET', count: 2 },
      { method: 'POST', count: 1 },
    ]);
    expect(stats.statusCodes).toEqual([
      { status: 200, count: 2 },
      { status: null, count: 1 },
    ]);
    expect(stats.topHosts).toEqual([
      { host: 'a.test', count: 2 },
      { host: 'b.test', count: 1 },
    ]);
    expect(stats.slowest.map((s) => s.id)).toEqual([2, 3, 1]);
  });

  it('aggregate — 空のストアでは 0', () => {
    const stats = engine.aggregate();
    expect(stats.total).toBe(0);
    expect(stats.avgDuration).toBe(0);
    expect(stats.methods).toEqual([]);
  });
});
