/**
 * tapdeck — Automation scan
 *
 * 捕捉済みトラフィックのスナップショットから認証セッションと
 * アクション対象を導出する純粋関数群。I/O も時刻取得も行わない。
 */

import type { Transaction } from '../../types/entities.js';
import { NoSessionFoundError } from '../../types/errors.js';
import type { AutomationProfile } from '../../config/index.js';
import { getHeader } from '../../utils/headers.js';

// ============================================================
// 型
// ============================================================

/** Authentication context re-derived from traffic. Never persisted. */
export interface SessionContext {
  bearerCredential: string;
  scopeIdentifier: string | null;
  derivedFromTransactionId: number;
  /** Epoch seconds. */
  derivedAt: number;
}

export type TargetOutcome = 'unattempted' | 'in_flight' | 'success' | 'failed' | 'skipped_dry_run';

export interface AutomationTarget {
  resourceId: string;
  partIndex: number;
  observedComplete: boolean;
  lastAttemptOutcome: TargetOutcome;
  /** URL of the most recent captured action for this resource; null when never seen. */
  url: string | null;
}

export interface ScanResult {
  session?: SessionContext;
  targets: AutomationTarget[];
}

export interface TargetSummary {
  total: number;
  complete: number;
  incomplete: number;
}

// ============================================================
// ヘルパー
// ============================================================

function hostMatches(txHost: string, profileHost: string): boolean {
  const host = txHost.toLowerCase();
  return host === profileHost || host.replace(/:\d+$/, '') === profileHost;
}

/** Most recent first: timestamp desc, then id desc. */
function byRecency(a: Transaction, b: Transaction): number {
  return b.timestamp - a.timestamp || b.id - a.id;
}

function bearerOf(tx: Transaction): string | undefined {
  const auth = getHeader(tx.requestHeaders, 'authorization');
  const match = auth === undefined ? null : /^bearer\s+(\S.*)$/i.exec(auth.trim());
  return match ? match[1].trim() : undefined;
}

/** JSON object body, or undefined for empty, unparseable or non-object bodies. */
function jsonBody(body: string): Record<string, unknown> | undefined {
  if (body.trim() === '') {
    return undefined;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return undefined;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(parsed));
}

function scopeOf(body: Record<string, unknown> | undefined, field: string): string | null {
  const value = body?.[field];
  if (typeof value === 'string' && value !== '') {
    return value;
  }
  return typeof value === 'number' ? String(value) : null;
}

function partOf(body: Record<string, unknown>, field: string): number {
  const value = body[field];
  if (typeof value === 'number' && Number.isInteger(value)) {
    return value;
  }
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    return Number(value);
  }
  return 0;
}

function isSuccessOrUnknown(status: number | null): boolean {
  return status === null || (status >= 200 && status < 300);
}

export function targetKey(resourceId: string, partIndex: number): string {
  return `${resourceId}:${partIndex}`;
}

export function compareTargets(a: AutomationTarget, b: AutomationTarget): number {
  return (
    a.resourceId.localeCompare(b.resourceId, 'en', { numeric: true }) || a.partIndex - b.partIndex
  );
}

// ============================================================
// スキャン
// ============================================================

/**
 * Derive the session and the action targets from a traffic snapshot.
 *
 * The session comes from the most recent request to the profile host
 * carrying a bearer credential. Targets are the captured action requests,
 * one per (resource id, part); their completion is whatever traffic shows.
 */
export function scanTraffic(
  snapshot: Iterable<Transaction>,
  profile: AutomationProfile,
  now: number,
): ScanResult {
  const hostTraffic = [...snapshot].filter((tx) => hostMatches(tx.host, profile.host));
  hostTraffic.sort(byRecency);

  let session: SessionContext | undefined;
  for (const tx of hostTraffic) {
    const bearer = bearerOf(tx);
    if (bearer !== undefined) {
      let scope = scopeOf(jsonBody(tx.requestBody), profile.scopeField);
      if (scope === null) {
        for (const other of hostTraffic) {
          scope = scopeOf(jsonBody(other.requestBody), profile.scopeField);
          if (scope !== null) {
            break;
          }
        }
      }
      session = {
        bearerCredential: bearer,
        scopeIdentifier: scope,
        derivedFromTransactionId: tx.id,
        derivedAt: now,
      };
      break;
    }
  }

  const pattern = new RegExp(profile.actionPathPattern);
  const targets = new Map<string, AutomationTarget>();
  for (const tx of hostTraffic) {
    if (tx.method.toUpperCase() !== profile.actionMethod) {
      continue;
    }
    const resourceId = pattern.exec(tx.path)?.[1];
    const body = jsonBody(tx.requestBody);
    if (resourceId === undefined || body === undefined) {
      continue;
    }
    const partIndex = partOf(body, profile.partField);
    const key = targetKey(resourceId, partIndex);
    const target: AutomationTarget = targets.get(key) ?? {
      resourceId,
      partIndex,
      observedComplete: false,
      lastAttemptOutcome: 'unattempted',
      url: tx.url,
    };
    if (body[profile.completeField] === true && isSuccessOrUnknown(tx.responseStatus)) {
      target.observedComplete = true;
    }
    targets.set(key, target);
  }

  return { session, targets: [...targets.values()].sort(compareTargets) };
}

/** @throws NoSessionFoundError */
export function deriveSession(
  snapshot: Iterable<Transaction>,
  profile: AutomationProfile,
  now: number,
): SessionContext {
  const { session } = scanTraffic(snapshot, profile, now);
  if (session === undefined) {
    throw new NoSessionFoundError(profile.host);
  }
  return session;
}

export function summarizeTargets(targets: readonly AutomationTarget[]): TargetSummary {
  const complete = targets.filter((t) => t.observedComplete).length;
  return { total: targets.length, complete, incomplete: targets.length - complete };
}
