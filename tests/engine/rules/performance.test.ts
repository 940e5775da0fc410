import { describe, it, expect } from 'vitest';
import { PERFORMANCE_RULES } from '../../../src/engine/rules/performance.js';
import {
  DEFAULT_ANALYZER_OPTIONS,
  type AnalyzerOptions,
  type Rule,
} from '../../../src/engine/rules/types.js';
import type { Transaction } from '../../../src/types/entities.js';
import { truncationMarker } from '../../../src/utils/body.js';
import { cleanTransaction } from '../../fixtures.js';

function rule(id: string): Rule {
  const found = PERFORMANCE_RULES.find((r) => r.id === id);
  if (!found) {
    throw new Error(`no rule ${id}`);
  }
  return found;
}

function run(
  id: string,
  overrides: Partial<Transaction>,
  options: AnalyzerOptions = DEFAULT_ANALYZER_OPTIONS,
) {
  return rule(id).evaluate(cleanTransaction(overrides), options);
}

function responseHeadersWithout(...names: string[]): Record<string, string> {
  const headers: Record<string, string> = { ...(cleanTransaction().responseHeaders ?? {}) };
  for (const name of names) {
    delete headers[name];
  }
  return headers;
}

describe('performance rules', () => {
  it('slow-request — 閾値を超えると warning', () => {
    expect(run('slow-request', { duration: 2.5 })).toEqual([
      { severity: 'warning', message: 'Slow request: 2.50s (threshold 1s)' },
    ]);
  });

  it('slow-request — 閾値ちょうどは対象外、閾値は設定で変えられる', () => {
    expect(run('slow-request', { duration: 1 })).toEqual([]);
    expect(
      run('slow-request', { duration: 2.5 }, { ...DEFAULT_ANALYZER_OPTIONS, slowThresholdSeconds: 5 }),
    ).toEqual([]);
  });

  it('large-response — 捕捉サイズで判定する', () => {
    const options = { ...DEFAULT_ANALYZER_OPTIONS, largeResponseBytes: 10 };
    expect(run('large-response', {}, options)).toEqual([
      { severity: 'info', message: 'Large response body: 12 bytes' },
    ]);
  });

  it('large-response — 切り詰められたボディは元のサイズで判定する', () => {
    const options = { ...DEFAULT_ANALYZER_OPTIONS, largeResponseBytes: 1000 };
    expect(
      run('large-response', { responseBody: `abc${truncationMarker(5000)}` }, options),
    ).toEqual([{ severity: 'info', message: 'Large response body: 5000 bytes' }]);
  });

  it('missing-cache-headers — GET 200 でキャッシュヘッダがなければ info', () => {
    expect(
      run('missing-cache-headers', { responseHeaders: responseHeadersWithout('Cache-Control') }),
    ).toEqual([{ severity: 'info', message: 'GET 200 response carries no caching headers' }]);
  });

  it('missing-cache-headers — ETag があれば、また GET 200 以外は対象外', () => {
    const noCache = responseHeadersWithout('Cache-Control');
    expect(
      run('missing-cache-headers', { responseHeaders: { ...noCache, etag: '"v1"' } }),
    ).toEqual([]);
    expect(run('missing-cache-headers', { method: 'POST', responseHeaders: noCache })).toEqual([]);
    expect(run('missing-cache-headers', { responseStatus: 404, responseHeaders: noCache })).toEqual(
      [],
    );
  });

  it('missing-compression — 非空ボディで Content-Encoding がなければ info', () => {
    expect(
      run('missing-compression', { responseHeaders: responseHeadersWithout('Content-Encoding') }),
    ).toEqual([
      { severity: 'info', message: 'Response body is not compressed (no Content-Encoding)' },
    ]);
    expect(
      run('missing-compression', {
        responseHeaders: responseHeadersWithout('Content-Encoding'),
        responseBody: '',
      }),
    ).toEqual([]);
  });

  it('応答のないトランザクションでは応答系ルールは発火しない', () => {
    const noResponse = { responseStatus: null, responseHeaders: null, responseBody: null };
    expect(run('missing-cache-headers', noResponse)).toEqual([]);
    expect(run('missing-compression', noResponse)).toEqual([]);
    expect(
      run('large-response', noResponse, { ...DEFAULT_ANALYZER_OPTIONS, largeResponseBytes: 1 }),
    ).toEqual([]);
  });
});
