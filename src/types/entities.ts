/**
 * tapdeck - Entity type definitions
 *
 * These interfaces map 1:1 to the SQL tables defined in src/db/schema.ts.
 * Property names are camelCase conversions of the snake_case column names.
 *
 * Conventions:
 *   TEXT (JSON)    -> parsed mapping
 *   INTEGER        -> number
 *   REAL           -> number
 *   INTEGER 0/1    -> boolean
 *   nullable col   -> `| null`
 *   timestamp      -> float seconds since epoch
 */

// ============================================================
// transactions
// ============================================================

export const PROTOCOLS = ['http', 'https'] as const;
export type Protocol = (typeof PROTOCOLS)[number];

/** Header mapping in capture order. */
export type HeaderMap = Record<string, string>;

/** One captured HTTP(S) request/response pair. */
export interface Transaction {
  id: number;
  timestamp: number;
  method: string;
  url: string;
  host: string;
  path: string;
  protocol: Protocol;
  requestHeaders: HeaderMap;
  requestBody: string;
  /** null when the exchange failed before a response arrived. */
  responseStatus: number | null;
  responseHeaders: HeaderMap | null;
  responseBody: string | null;
  /** Seconds. */
  duration: number;
  analyzed: boolean;
  notes: string | null;
}

// ============================================================
// findings
// ============================================================

export const FINDING_CATEGORIES = ['security', 'performance', 'best_practice'] as const;
export type FindingCategory = (typeof FINDING_CATEGORIES)[number];

/** Ordered from least to most severe. */
export const SEVERITIES = ['info', 'warning', 'high'] as const;
export type Severity = (typeof SEVERITIES)[number];

/** One heuristic analysis result attached to a transaction. */
export interface Finding {
  transactionId: number;
  rule: string;
  category: FindingCategory;
  severity: Severity;
  message: string;
}
