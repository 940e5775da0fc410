/**
 * tapdeck — Analyzer rule types
 */

import type { FindingCategory, Severity, Transaction } from '../../types/entities.js';

export interface AnalyzerOptions {
  /** Requests slower than this (seconds) are flagged. */
  slowThresholdSeconds: number;
  /** Responses larger than this (bytes) are flagged. */
  largeResponseBytes: number;
}

export const DEFAULT_ANALYZER_OPTIONS: AnalyzerOptions = {
  slowThresholdSeconds: 1,
  largeResponseBytes: 1024 * 1024,
};

export interface RuleHit {
  severity: Severity;
  message: string;
}

/**
 * One heuristic check. `evaluate` may throw on malformed input; the
 * analyzer records the rule as skipped for that transaction.
 */
export interface Rule {
  id: string;
  category: FindingCategory;
  evaluate(tx: Transaction, options: AnalyzerOptions): RuleHit[];
}

/** Rule evaluation that never fires when the transaction got no response. */
export function withResponse(
  evaluate: (tx: Transaction, options: AnalyzerOptions) => RuleHit[],
): Rule['evaluate'] {
  return (tx, options) => (tx.responseStatus === null ? [] : evaluate(tx, options));
}
