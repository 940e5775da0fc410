import type { Transaction } from '../types/entities.js';

export interface TextResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

export function jsonResult(value: unknown): TextResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

/** Tool failures are reported as error results, never thrown to the client. */
export function errorResult(error: unknown): TextResult {
  const message = error instanceof Error ? error.message : String(error);
  return { content: [{ type: 'text', text: message }], isError: true };
}

export interface TransactionSummary {
  id: number;
  timestamp: number;
  method: string;
  url: string;
  status: number | null;
  duration: number;
  analyzed: boolean;
  notes: string | null;
}

/** Listing view without headers or bodies. */
export function summarizeTransaction(tx: Transaction): TransactionSummary {
  return {
    id: tx.id,
    timestamp: tx.timestamp,
    method: tx.method,
    url: tx.url,
    status: tx.responseStatus,
    duration: tx.duration,
    analyzed: tx.analyzed,
    notes: tx.notes,
  };
}
