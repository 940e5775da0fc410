/**
 * tapdeck — Criteria → SQL
 *
 * ParsedCriteria と HostScope を WHERE 句とバインドパラメータに変換する。
 * 値は全てプレースホルダ経由で渡す。
 */

import type { HostScope, ParsedCriteria } from '../../types/query.js';

export type SqlParam = string | number | null;

export interface WhereClause {
  /** Either an empty string or a clause starting with `WHERE`. */
  sql: string;
  params: SqlParam[];
}

/** Escape LIKE wildcards; pair with `ESCAPE '\'`. */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (c) => `\\${c}`);
}

/** The host itself or any subdomain, with or without a `:port`. */
function hostSuffixCondition(suffix: string, params: SqlParam[]): string {
  const escaped = escapeLike(suffix);
  params.push(suffix, `%.${escaped}`, `${escaped}:%`, `%.${escaped}:%`);
  return (
    "(LOWER(host) = ? OR LOWER(host) LIKE ? ESCAPE '\\'" +
    " OR LOWER(host) LIKE ? ESCAPE '\\' OR LOWER(host) LIKE ? ESCAPE '\\')"
  );
}

/** Build the AND-composed WHERE clause for criteria confined to a scope. */
export function buildWhereClause(
  criteria: ParsedCriteria,
  scope: HostScope,
  extra: { beforeId?: number } = {},
): WhereClause {
  const conditions: string[] = [];
  const params: SqlParam[] = [];

  if (scope.suffixes.length > 0) {
    const alternatives = scope.suffixes.map((s) => hostSuffixCondition(s.toLowerCase(), params));
    conditions.push(`(${alternatives.join(' OR ')})`);
  }

  if (criteria.method !== undefined) {
    conditions.push('UPPER(method) = ?');
    params.push(criteria.method);
  }
  if (criteria.host !== undefined) {
    conditions.push('LOWER(host) = ?');
    params.push(criteria.host);
  }
  if (criteria.hostSuffix !== undefined) {
    conditions.push(hostSuffixCondition(criteria.hostSuffix, params));
  }
  if (criteria.status === null) {
    conditions.push('response_status IS NULL');
  } else if (criteria.status !== undefined) {
    conditions.push('response_status = ?');
    params.push(criteria.status);
  }
  if (criteria.protocol !== undefined) {
    conditions.push('protocol = ?');
    params.push(criteria.protocol);
  }
  if (criteria.since !== undefined) {
    conditions.push('timestamp >= ?');
    params.push(criteria.since);
  }
  if (criteria.until !== undefined) {
    conditions.push('timestamp <= ?');
    params.push(criteria.until);
  }
  if (criteria.text !== undefined) {
    const columns = ['url', 'request_body', 'response_body', 'request_headers', 'response_headers'];
    const pattern = `%${escapeLike(criteria.text)}%`;
    conditions.push(`(${columns.map((c) => `${c} LIKE ? ESCAPE '\\'`).join(' OR ')})`);
    for (let i = 0; i < columns.length; i++) {
      params.push(pattern);
    }
  }
  if (extra.beforeId !== undefined) {
    conditions.push('id < ?');
    params.push(extra.beforeId);
  }

  return {
    sql: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    params,
  };
}
