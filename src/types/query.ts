/**
 * tapdeck — Query criteria
 *
 * 検索条件の Zod スキーマ。全ての条件は AND で合成される。
 * 未知のキーは strict() により拒否され、InvalidQueryError に変換される。
 */

import { z } from 'zod';
import { PROTOCOLS } from './entities.js';
import { InvalidQueryError, describeIssues } from './errors.js';

export const QueryCriteriaSchema = z
  .object({
    method: z.string().trim().min(1).toUpperCase().optional(),
    /** Exact host match. */
    host: z.string().trim().min(1).toLowerCase().optional(),
    /** Matches the host itself or any subdomain of it. */
    hostSuffix: z.string().trim().min(1).toLowerCase().optional(),
    /** Response status; `null` selects transactions that never got a response. */
    status: z.number().int().nullable().optional(),
    protocol: z.enum(PROTOCOLS).optional(),
    /** Inclusive lower bound, epoch seconds. */
    since: z.number().finite().optional(),
    /** Inclusive upper bound, epoch seconds. */
    until: z.number().finite().optional(),
    /** Case-insensitive substring over url, bodies and header blobs. */
    text: z.string().min(1).optional(),
    limit: z.number().int().positive().optional(),
  })
  .strict();

export type QueryCriteria = z.input<typeof QueryCriteriaSchema>;
export type ParsedCriteria = z.output<typeof QueryCriteriaSchema>;

/**
 * Restricts every read to one family of hosts. An empty suffix list
 * means "no restriction".
 */
export interface HostScope {
  suffixes: string[];
}

export const UNSCOPED: HostScope = { suffixes: [] };

/** Aggregate view over the (scoped, filtered) store. */
export interface TrafficStats {
  total: number;
  uniqueHosts: number;
  avgDuration: number;
  minDuration: number;
  maxDuration: number;
  methods: Array<{ method: string; count: number }>;
  statusCodes: Array<{ status: number | null; count: number }>;
  topHosts: Array<{ host: string; count: number }>;
  slowest: Array<{ id: number; method: string; url: string; duration: number }>;
}

/**
 * Validate raw criteria.
 *
 * @throws InvalidQueryError for unknown keys, wrong types or contradictory bounds
 */
export function parseCriteria(input: unknown): ParsedCriteria {
  const result = QueryCriteriaSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new InvalidQueryError(`Unsupported query: ${describeIssues(result.error).join('; ')}`);
  }
  const criteria = result.data;
  const { since, until } = criteria;
  if (since !== undefined && until !== undefined && since > until) {
    throw new InvalidQueryError(`Empty time range: since ${since} > until ${until}`);
  }
  if (criteria.host !== undefined && criteria.hostSuffix !== undefined) {
    throw new InvalidQueryError('host and hostSuffix cannot be combined');
  }
  return criteria;
}
