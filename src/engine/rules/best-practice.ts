import { getHeader } from '../../utils/headers.js';
import { withResponse, type Rule } from './types.js';

const SAFE_METHODS_WITHOUT_BODY = new Set(['GET', 'HEAD']);
const STATE_CHANGING_SEGMENTS = new Set(['delete', 'remove', 'update', 'create', 'destroy']);

function pathSegments(path: string): string[] {
  const pathname = path.split(/[?#]/)[0];
  return pathname
    .split('/')
    .filter((s) => s.length > 0)
    .map((s) => s.toLowerCase());
}

export const BEST_PRACTICE_RULES: Rule[] = [
  {
    id: 'unversioned-api',
    category: 'best_practice',
    evaluate(tx) {
      const segments = pathSegments(tx.path);
      if (!segments.includes('api')) {
        return [];
      }
      return segments.some((s) => /^v\d+(\.\d+)?$/.test(s))
        ? []
        : [{ severity: 'info', message: `API path ${tx.path} has no version segment` }];
    },
  },
  {
    id: 'body-on-safe-method',
    category: 'best_practice',
    evaluate(tx) {
      const method = tx.method.toUpperCase();
      return SAFE_METHODS_WITHOUT_BODY.has(method) && tx.requestBody.length > 0
        ? [{ severity: 'warning', message: `${method} request carries a body` }]
        : [];
    },
  },
  {
    id: 'state-change-via-get',
    category: 'best_practice',
    evaluate(tx) {
      if (tx.method.toUpperCase() !== 'GET') {
        return [];
      }
      const verb = pathSegments(tx.path).find((s) => STATE_CHANGING_SEGMENTS.has(s));
      return verb
        ? [{ severity: 'info', message: `GET used for a state-changing action ("${verb}")` }]
        : [];
    },
  },
  {
    id: 'cors-wildcard',
    category: 'best_practice',
    evaluate: withResponse((tx) =>
      getHeader(tx.responseHeaders, 'Access-Control-Allow-Origin')?.trim() === '*'
        ? [{ severity: 'warning', message: 'CORS allows any origin (Access-Control-Allow-Origin: *)' }]
        : [],
    ),
  },
];
