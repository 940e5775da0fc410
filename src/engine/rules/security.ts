/**
 * tapdeck — Security rules
 *
 * 平文通信、セキュリティヘッダ欠落、URL 内の認証情報、
 * インジェクション痕跡、Basic 認証を検出する。
 */

import { getHeader, hasHeader } from '../../utils/headers.js';
import { withResponse, type Rule, type RuleHit } from './types.js';

// ============================================================
// ヘルパー
// ============================================================

/** Loopback and `localhost` names; plaintext to these is not flagged. */
export function isLocalHost(host: string): boolean {
  let name = host.trim().toLowerCase();
  if (name.startsWith('[')) {
    name = name.slice(1, name.indexOf(']'));
  } else if (name.split(':').length === 2) {
    name = name.split(':')[0];
  }
  return (
    name === 'localhost' ||
    name.endsWith('.localhost') ||
    name === '::1' ||
    name === '0.0.0.0' ||
    /^127(\.\d{1,3}){3}$/.test(name)
  );
}

const CREDENTIAL_PARAMS = new Set([
  'password',
  'passwd',
  'pwd',
  'token',
  'access_token',
  'refresh_token',
  'id_token',
  'secret',
  'client_secret',
  'api_key',
  'apikey',
  'auth',
  'session',
  'sessionid',
]);

const HEX_TOKEN = /^[0-9a-f]{32,}$/i;
const BASE64_TOKEN = /^[A-Za-z0-9+/_-]{32,}={0,2}$/;

/** Long opaque strings: hex, or base64 mixing letters and digits. */
function looksLikeToken(value: string): boolean {
  if (HEX_TOKEN.test(value)) {
    return true;
  }
  return BASE64_TOKEN.test(value) && /[0-9]/.test(value) && /[A-Za-z]/.test(value);
}

const SQL_SIGNATURES: RegExp[] = [
  /\bunion\b[\s\S]{0,40}\bselect\b/i,
  /'\s*or\s+'?\d+'?\s*=\s*'?\d+/i,
  /'\s*or\s+'[^']*'\s*=\s*'/i,
  /;\s*(drop|delete|truncate|alter)\s+(table|from|database)\b/i,
  /\bselect\b[\s\S]{1,100}\bfrom\b[\s\S]{1,100}\bwhere\b/i,
  /\b(sleep|benchmark|pg_sleep)\s*\(\s*\d+/i,
  /\bwaitfor\s+delay\b/i,
];

const SCRIPT_SIGNATURES: RegExp[] = [
  /<script\b/i,
  /javascript\s*:/i,
  /\bon(error|load|mouseover|focus)\s*=/i,
  /<iframe\b/i,
];

/** URL-decode form bodies where possible; raw text otherwise. */
function decodedBody(body: string): string {
  try {
    return decodeURIComponent(body.replace(/\+/g, ' '));
  } catch {
    return body;
  }
}

function signatureRule(id: string, label: string, signatures: RegExp[]): Rule {
  return {
    id,
    category: 'security',
    evaluate(tx) {
      if (tx.requestBody.length === 0) {
        return [];
      }
      const body = decodedBody(tx.requestBody);
      const match = signatures.find((re) => re.test(body));
      return match
        ? [{ severity: 'high', message: `Request body matches a ${label} signature (${match.source})` }]
        : [];
    },
  };
}

function missingHeaderRule(
  id: string,
  header: string,
  severity: RuleHit['severity'],
  applies: (protocol: string, contentType: string) => boolean = () => true,
): Rule {
  return {
    id,
    category: 'security',
    evaluate: withResponse((tx) => {
      const contentType = getHeader(tx.responseHeaders, 'content-type') ?? '';
      if (!applies(tx.protocol, contentType.toLowerCase())) {
        return [];
      }
      return hasHeader(tx.responseHeaders, header)
        ? []
        : [{ severity, message: `Response is missing the ${header} header` }];
    }),
  };
}

// ============================================================
// ルール
// ============================================================

export const SECURITY_RULES: Rule[] = [
  {
    id: 'plaintext-http',
    category: 'security',
    evaluate(tx) {
      return tx.protocol === 'http' && !isLocalHost(tx.host)
        ? [{ severity: 'warning', message: `Plaintext HTTP to ${tx.host}; use HTTPS` }]
        : [];
    },
  },
  missingHeaderRule(
    'missing-hsts',
    'Strict-Transport-Security',
    'warning',
    (protocol) => protocol === 'https',
  ),
  missingHeaderRule('missing-x-content-type-options', 'X-Content-Type-Options', 'info'),
  missingHeaderRule('missing-x-frame-options', 'X-Frame-Options', 'info'),
  missingHeaderRule('missing-csp', 'Content-Security-Policy', 'info', (_protocol, contentType) =>
    contentType.startsWith('text/html'),
  ),
  {
    id: 'credential-in-url',
    category: 'security',
    evaluate(tx) {
      const hits: RuleHit[] = [];
      for (const [name, value] of new URL(tx.url).searchParams) {
        if (value === '') {
          continue;
        }
        if (CREDENTIAL_PARAMS.has(name.toLowerCase())) {
          hits.push({
            severity: 'high',
            message: `Credential-named query parameter "${name}" exposes a secret in the URL`,
          });
        } else if (looksLikeToken(value)) {
          hits.push({
            severity: 'high',
            message: `Query parameter "${name}" carries a token-shaped value`,
          });
        }
      }
      return hits;
    },
  },
  signatureRule('sql-injection-signature', 'SQL injection', SQL_SIGNATURES),
  signatureRule('script-injection-signature', 'script injection', SCRIPT_SIGNATURES),
  {
    id: 'basic-auth',
    category: 'security',
    evaluate(tx) {
      const auth = getHeader(tx.requestHeaders, 'authorization');
      return auth !== undefined && /^basic\s/i.test(auth)
        ? [{ severity: 'warning', message: 'HTTP Basic authentication sends reusable credentials' }]
        : [];
    },
  },
];
