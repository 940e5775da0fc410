/**
 * tapdeck — Error taxonomy
 *
 * Every error raised by the store, query, replay and automation layers
 * extends TapdeckError so callers (CLI, MCP tools) can map it to an exit
 * code or an error result by `code`.
 */

export type TapdeckErrorCode =
  | 'VALIDATION'
  | 'NOT_FOUND'
  | 'INVALID_QUERY'
  | 'NETWORK'
  | 'TRANSPORT_TIMEOUT'
  | 'AUTH_EXPIRED'
  | 'FORBIDDEN'
  | 'NO_SESSION'
  | 'STORE_CORRUPTED'
  | 'CONFIG'
  | 'USAGE';

export class TapdeckError extends Error {
  readonly code: TapdeckErrorCode;

  constructor(code: TapdeckErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TapdeckError';
    this.code = code;
  }
}

/** Malformed input to a write operation. Nothing was persisted. */
export class ValidationError extends TapdeckError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('VALIDATION', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class NotFoundError extends TapdeckError {
  constructor(what: string, id: number | string) {
    super('NOT_FOUND', `${what} not found: ${id}`);
    this.name = 'NotFoundError';
  }
}

/** Unsupported or contradictory query criteria. No rows were matched. */
export class InvalidQueryError extends TapdeckError {
  constructor(message: string) {
    super('INVALID_QUERY', message);
    this.name = 'InvalidQueryError';
  }
}

/** Transport-level failure (connect refused, DNS, reset). */
export class NetworkError extends TapdeckError {
  readonly url: string;

  constructor(
    url: string,
    message: string,
    options?: { cause?: unknown; code?: 'NETWORK' | 'TRANSPORT_TIMEOUT' },
  ) {
    super(options?.code ?? 'NETWORK', `${message} (${url})`, { cause: options?.cause });
    this.name = 'NetworkError';
    this.url = url;
  }
}

/** No response arrived within the bounded wait. Safe to retry by the caller. */
export class TransportTimeoutError extends NetworkError {
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number, options?: { cause?: unknown }) {
    super(url, `No response within ${timeoutMs}ms`, {
      cause: options?.cause,
      code: 'TRANSPORT_TIMEOUT',
    });
    this.name = 'TransportTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** 401 on a request carrying a derived credential: the session must be re-derived. */
export class AuthExpiredError extends TapdeckError {
  readonly status = 401;

  constructor(url: string) {
    super('AUTH_EXPIRED', `Credential rejected (401) by ${url}; re-derive the session`);
    this.name = 'AuthExpiredError';
  }
}

/** 403 on a request carrying a derived credential. */
export class ForbiddenError extends TapdeckError {
  readonly status = 403;

  constructor(url: string) {
    super('FORBIDDEN', `Credential refused (403) by ${url}; re-derive the session`);
    this.name = 'ForbiddenError';
  }
}

export class NoSessionFoundError extends TapdeckError {
  constructor(host: string) {
    super('NO_SESSION', `No captured request to ${host} carries a bearer credential`);
    this.name = 'NoSessionFoundError';
  }
}

/** The persisted store could not be opened or failed its integrity check. */
export class StoreCorruptedError extends TapdeckError {
  constructor(path: string, detail: string, options?: { cause?: unknown }) {
    super('STORE_CORRUPTED', `Store at ${path} is unreadable: ${detail}`, options);
    this.name = 'StoreCorruptedError';
  }
}

export class ConfigError extends TapdeckError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG', message, options);
    this.name = 'ConfigError';
  }
}

/** A command was invoked incorrectly or lacks required configuration. */
export class UsageError extends TapdeckError {
  constructor(message: string) {
    super('USAGE', message);
    this.name = 'UsageError';
  }
}

/** Flatten a ZodError into `path: message` strings. */
export function describeIssues(error: {
  issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>;
}): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}
