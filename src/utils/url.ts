import type { Protocol } from '../types/entities.js';
import { PROTOCOLS } from '../types/entities.js';
import { ValidationError } from '../types/errors.js';

export interface UrlParts {
  /** `hostname[:port]` as it appears in the URL. */
  host: string;
  /** Path plus query string. */
  path: string;
  protocol: Protocol;
}

/** @throws ValidationError when `url` is not an absolute http(s) URL */
export function splitUrl(url: string): UrlParts {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ValidationError('Invalid URL', [`url: not an absolute URL: ${url}`]);
  }
  const scheme = parsed.protocol.replace(/:$/, '');
  const protocol = PROTOCOLS.find((p) => p === scheme);
  if (protocol === undefined) {
    throw new ValidationError('Invalid URL', [`url: unsupported scheme ${scheme}`]);
  }
  return { host: parsed.host, path: `${parsed.pathname}${parsed.search}`, protocol };
}
