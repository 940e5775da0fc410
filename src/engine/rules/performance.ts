import { capturedSize } from '../../utils/body.js';
import { hasHeader } from '../../utils/headers.js';
import { withResponse, type Rule } from './types.js';

const CACHE_HEADERS = ['Cache-Control', 'ETag', 'Expires', 'Last-Modified'];

export const PERFORMANCE_RULES: Rule[] = [
  {
    id: 'slow-request',
    category: 'performance',
    evaluate(tx, options) {
      return tx.duration > options.slowThresholdSeconds
        ? [
            {
              severity: 'warning',
              message: `Slow request: ${tx.duration.toFixed(2)}s (threshold ${options.slowThresholdSeconds}s)`,
            },
          ]
        : [];
    },
  },
  {
    id: 'large-response',
    category: 'performance',
    evaluate: withResponse((tx, options) => {
      const size = capturedSize(tx.responseBody);
      return size > options.largeResponseBytes
        ? [{ severity: 'info', message: `Large response body: ${size} bytes` }]
        : [];
    }),
  },
  {
    id: 'missing-cache-headers',
    category: 'performance',
    evaluate: withResponse((tx) => {
      if (tx.method.toUpperCase() !== 'GET' || tx.responseStatus !== 200) {
        return [];
      }
      return CACHE_HEADERS.some((h) => hasHeader(tx.responseHeaders, h))
        ? []
        : [{ severity: 'info', message: 'GET 200 response carries no caching headers' }];
    }),
  },
  {
    id: 'missing-compression',
    category: 'performance',
    evaluate: withResponse((tx) => {
      if (tx.responseBody === null || tx.responseBody.length === 0) {
        return [];
      }
      return hasHeader(tx.responseHeaders, 'Content-Encoding')
        ? []
        : [{ severity: 'info', message: 'Response body is not compressed (no Content-Encoding)' }];
    }),
  },
];
