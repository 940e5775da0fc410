import { describe, it, expect } from 'vitest';
import { SECURITY_RULES, isLocalHost } from '../../../src/engine/rules/security.js';
import { DEFAULT_ANALYZER_OPTIONS, type Rule } from '../../../src/engine/rules/types.js';
import type { Transaction } from '../../../src/types/entities.js';
import { cleanTransaction } from '../../fixtures.js';

function rule(id: string): Rule {
  const found = SECURITY_RULES.find((r) => r.id === id);
  if (!found) {
    throw new Error(`no rule ${id}`);
  }
  return found;
}

function run(id: string, overrides: Partial<Transaction>) {
  return rule(id).evaluate(cleanTransaction(overrides), DEFAULT_ANALYZER_OPTIONS);
}

function withoutResponseHeader(name: string): Record<string, string> {
  const headers: Record<string, string> = { ...(cleanTransaction().responseHeaders ?? {}) };
  delete headers[name];
  return headers;
}

describe('security rules', () => {
  it('問題のないトランザクションではどのルールも発火しない', () => {
    const tx = cleanTransaction();
    for (const r of SECURITY_RULES) {
      expect(r.evaluate(tx, DEFAULT_ANALYZER_OPTIONS)).toEqual([]);
    }
  });

  // =========================================================
  // plaintext-http
  // =========================================================

  describe('plaintext-http', () => {
    it('非ローカルホストへの http は warning', () => {
      expect(
        run('plaintext-http', { protocol: 'http', url: 'http://api.example.com/api/v1/items' }),
      ).toEqual([{ severity: 'warning', message: 'Plaintext HTTP to api.example.com; use HTTPS' }]);
    });

    it('ローカルホストへの http は対象外', () => {
      expect(
        run('plaintext-http', { protocol: 'http', host: 'localhost:8080', url: 'http://localhost:8080/' }),
      ).toEqual([]);
    });

    it('isLocalHost — ループバック名とアドレスを判定する', () => {
      expect(isLocalHost('localhost')).toBe(true);
      expect(isLocalHost('app.localhost')).toBe(true);
      expect(isLocalHost('127.0.0.1:3000')).toBe(true);
      expect(isLocalHost('[::1]:3000')).toBe(true);
      expect(isLocalHost('0.0.0.0')).toBe(true);
      expect(isLocalHost('10.0.0.1')).toBe(false);
      expect(isLocalHost('localhost.example.com')).toBe(false);
    });
  });

  // =========================================================
  // ヘッダ欠落
  // =========================================================

  describe('missing security headers', () => {
    it('missing-hsts — https で HSTS がなければ warning', () => {
      expect(
        run('missing-hsts', { responseHeaders: withoutResponseHeader('Strict-Transport-Security') }),
      ).toEqual([
        { severity: 'warning', message: 'Response is missing the Strict-Transport-Security header' },
      ]);
    });

    it('missing-hsts — http では対象外', () => {
      expect(
        run('missing-hsts', {
          protocol: 'http',
          responseHeaders: withoutResponseHeader('Strict-Transport-Security'),
        }),
      ).toEqual([]);
    });

    it('ヘッダ名は大文字小文字を区別しない', () => {
      expect(
        run('missing-x-frame-options', {
          responseHeaders: { ...withoutResponseHeader('X-Frame-Options'), 'x-frame-options': 'DENY' },
        }),
      ).toEqual([]);
    });

    it('missing-x-content-type-options / missing-x-frame-options — info', () => {
      expect(
        run('missing-x-content-type-options', {
          responseHeaders: withoutResponseHeader('X-Content-Type-Options'),
        }),
      ).toEqual([
        { severity: 'info', message: 'Response is missing the X-Content-Type-Options header' },
      ]);
      expect(
        run('missing-x-frame-options', { responseHeaders: withoutResponseHeader('X-Frame-Options') }),
      ).toEqual([{ severity: 'info', message: 'Response is missing the X-Frame-Options header' }]);
    });

    it('missing-csp — HTML 応答のみ対象', () => {
      expect(run('missing-csp', {})).toEqual([]);
      expect(
        run('missing-csp', {
          responseHeaders: {
            ...withoutResponseHeader('Content-Type'),
            'Content-Type': 'text/html; charset=utf-8',
          },
        }),
      ).toEqual([{ severity: 'info', message: 'Response is missing the Content-Security-Policy header' }]);
    });

    it('応答のないトランザクションでは発火しない', () => {
      expect(
        run('missing-hsts', { responseStatus: null, responseHeaders: null, responseBody: null }),
      ).toEqual([]);
    });
  });

  // =========================================================
  // credential-in-url
  // =========================================================

  describe('credential-in-url', () => {
    it('認証情報名のクエリパラメータは high', () => {
      expect(
        run('credential-in-url', { url: 'https://api.example.com/api/v1/items?page=2&Access_Token=abc' }),
      ).toEqual([
        {
          severity: 'high',
          message: 'Credential-named query parameter "Access_Token" exposes a secret in the URL',
        },
      ]);
    });

    it('トークン形状の値は high', () => {
      expect(
        run('credential-in-url', {
          url: 'https://api.example.com/api/v1/items?ref=0123456789abcdef0123456789abcdef',
        }),
      ).toEqual([{ severity: 'high', message: 'Query parameter "ref" carries a token-shaped value' }]);
    });

    it('空の値・短い値・数字のない長い値は対象外', () => {
      expect(
        run('credential-in-url', {
          url: 'https://api.example.com/api/v1/items?password=&id=42&slug=abcdefghijklmnopqrstuvwxyzabcdefgh',
        }),
      ).toEqual([]);
    });

    it('不正な URL では例外を投げる（Analyzer が skipped として扱う）', () => {
      expect(() => run('credential-in-url', { url: 'not a url' })).toThrow();
    });
  });

  // =========================================================
  // インジェクション痕跡
  // =========================================================

  describe('injection signatures', () => {
    it('sql-injection-signature — URL エンコードされたフォームを復号して検査する', () => {
      expect(
        run('sql-injection-signature', { method: 'POST', requestBody: "user=admin'+OR+1%3D1--" }),
      ).toEqual([
        {
          severity: 'high',
          message: String.raw`Request body matches a SQL injection signature ('\s*or\s+'?\d+'?\s*=\s*'?\d+)`,
        },
      ]);
    });

    it('sql-injection-signature — UNION SELECT', () => {
      const hits = run('sql-injection-signature', {
        method: 'POST',
        requestBody: '{"q":"1 UNION ALL SELECT password FROM users"}',
      });
      expect(hits).toEqual([
        {
          severity: 'high',
          message: String.raw`Request body matches a SQL injection signature (\bunion\b[\s\S]{0,40}\bselect\b)`,
        },
      ]);
    });

    it('script-injection-signature — script タグ', () => {
      expect(
        run('script-injection-signature', {
          method: 'POST',
          requestBody: '{"comment":"<script>alert(1)</script>"}',
        }),
      ).toEqual([
        {
          severity: 'high',
          message: String.raw`Request body matches a script injection signature (<script\b)`,
        },
      ]);
    });

    it('通常の JSON ボディや復号できないボディでは発火しない', () => {
      expect(
        run('sql-injection-signature', { method: 'POST', requestBody: '{"name":"widget","qty":3}' }),
      ).toEqual([]);
      expect(
        run('script-injection-signature', { method: 'POST', requestBody: 'q=%E0%A4%A' }),
      ).toEqual([]);
    });
  });

  // =========================================================
  // basic-auth
  // =========================================================

  it('basic-auth — Basic 認証ヘッダは warning', () => {
    expect(
      run('basic-auth', { requestHeaders: { authorization: 'Basic dGVzdDp0ZXN0' } }),
    ).toEqual([
      { severity: 'warning', message: 'HTTP Basic authentication sends reusable credentials' },
    ]);
    expect(run('basic-auth', { requestHeaders: { Authorization: 'Bearer test-secret' } })).toEqual([]);
  });
});
