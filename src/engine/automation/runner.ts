/**
 * tapdeck — Automation runner
 *
 * スキャン結果の各ターゲットに完了リクエストを送る状態機械。
 * unattempted → in_flight → success | failed | skipped_dry_run
 *
 * - 観測済みで完了しているターゲットは送らない（冪等）
 * - 401/403 でセッションを stale とし、実行を停止する
 * - ネットワーク障害はターゲット単位で記録して続行する
 * - 自動リトライはしない
 */

import { setTimeout as sleepFor } from 'node:timers/promises';
import type { AxiosInstance } from 'axios';
import type { AutomationProfile } from '../../config/index.js';
import type { HeaderMap } from '../../types/entities.js';
import {
  AuthExpiredError,
  ForbiddenError,
  NetworkError,
  NoSessionFoundError,
  ValidationError,
} from '../../types/errors.js';
import type { QueryEngine } from '../query.js';
import { createHttpClient, send } from '../http.js';
import { splitUrl } from '../../utils/url.js';
import { getLogger, type Logger } from '../../utils/logger.js';
import {
  compareTargets,
  scanTraffic,
  type AutomationTarget,
  type ScanResult,
  type SessionContext,
} from './scan.js';

export interface PlannedRequest {
  method: string;
  url: string;
  headers: HeaderMap;
  body: string;
}

export interface TargetReport extends AutomationTarget {
  /** Response status of the completion request, when one was received. */
  status?: number;
  error?: string;
  request?: PlannedRequest;
}

export interface RunOptions {
  dryRun?: boolean;
  /** Overrides the profile's delay between sends. */
  delaySeconds?: number;
  signal?: AbortSignal;
  /** Restrict the run to these resource ids. */
  resourceIds?: readonly string[];
}

export interface RunReport {
  dryRun: boolean;
  session: SessionContext;
  targets: TargetReport[];
  attempted: number;
  succeeded: number;
  failed: number;
  /** Targets skipped because traffic already shows them complete. */
  alreadyComplete: number;
  /** True once a request using the session was answered 401/403. */
  sessionStale: boolean;
  cancelled: boolean;
  /** The auth error that stopped the run, if any. */
  haltedBy?: AuthExpiredError | ForbiddenError;
}

export interface AutomationRunnerOptions {
  client?: AxiosInstance;
  logger?: Logger;
  /** Epoch seconds. */
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  await sleepFor(ms, undefined, { signal });
}

function isAbort(error: unknown, signal: AbortSignal | undefined): boolean {
  return signal?.aborted === true && error instanceof Error && error.name === 'AbortError';
}

export class AutomationRunner {
  private readonly query: QueryEngine;
  private readonly profile: AutomationProfile;
  private readonly client: AxiosInstance;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(query: QueryEngine, profile: AutomationProfile, options: AutomationRunnerOptions = {}) {
    this.query = query;
    this.profile = profile;
    this.client = options.client ?? createHttpClient();
    this.logger = options.logger ?? getLogger();
    this.now = options.now ?? (() => Date.now() / 1000);
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Fresh scan of the most recent `scanLimit` transactions to the profile host. */
  scan(): ScanResult {
    const snapshot = this.query.find({ hostSuffix: this.profile.host, limit: this.profile.scanLimit });
    return scanTraffic(snapshot, this.profile, this.now());
  }

  /**
   * The completion request for one target under `session`; undefined when
   * there is no URL to send it to.
   *
   * @throws ValidationError when the URL is not a valid http(s) URL
   */
  plan(target: AutomationTarget, session: SessionContext): PlannedRequest | undefined {
    const url =
      target.url ?? this.profile.actionUrlTemplate?.replaceAll('{resourceId}', target.resourceId);
    if (url === undefined) {
      return undefined;
    }
    splitUrl(url);
    const payload: Record<string, unknown> = {
      [this.profile.partField]: target.partIndex,
      [this.profile.completeField]: true,
    };
    if (session.scopeIdentifier !== null) {
      payload[this.profile.scopeField] = session.scopeIdentifier;
    }
    return {
      method: this.profile.actionMethod,
      url,
      headers: {
        ...this.profile.extraHeaders,
        Authorization: `Bearer ${session.bearerCredential}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(payload),
    };
  }

  /**
   * Complete every incomplete target (or the selected ones).
   *
   * @throws NoSessionFoundError when no captured request carries a bearer credential
   */
  async run(options: RunOptions = {}): Promise<RunReport> {
    const dryRun = options.dryRun ?? false;
    const delayMs = (options.delaySeconds ?? this.profile.delaySeconds) * 1000;
    const { signal } = options;

    const { session, targets: scanned } = this.scan();
    if (session === undefined) {
      throw new NoSessionFoundError(this.profile.host);
    }

    const targets: TargetReport[] = options.resourceIds
      ? this.select(scanned, options.resourceIds)
      : scanned;
    const report: RunReport = {
      dryRun,
      session,
      targets,
      attempted: 0,
      succeeded: 0,
      failed: 0,
      alreadyComplete: targets.filter((t) => t.observedComplete).length,
      sessionStale: false,
      cancelled: false,
    };

    const pending = targets.filter((t) => !t.observedComplete);
    this.logger.info(
      { host: this.profile.host, pending: pending.length, dryRun },
      'automation run started',
    );

    for (let i = 0; i < pending.length; i++) {
      if (signal?.aborted) {
        report.cancelled = true;
        break;
      }
      const target = pending[i];
      let request: PlannedRequest | undefined;
      try {
        request = this.plan(target, session);
      } catch (error) {
        if (!(error instanceof ValidationError)) {
          throw error;
        }
        target.lastAttemptOutcome = 'failed';
        target.error = error.message;
        report.failed++;
        this.logger.warn({ resourceId: target.resourceId, err: error.message }, 'action skipped');
        continue;
      }
      if (request === undefined) {
        target.lastAttemptOutcome = 'failed';
        target.error = 'no captured action URL and no actionUrlTemplate configured';
        report.failed++;
        continue;
      }
      target.request = request;

      if (dryRun) {
        target.lastAttemptOutcome = 'skipped_dry_run';
        continue;
      }

      const halt = await this.attempt(target, request, report);
      if (halt) {
        break;
      }

      if (i < pending.length - 1 && delayMs > 0) {
        try {
          await this.sleep(delayMs, signal);
        } catch (error) {
          if (!isAbort(error, signal)) {
            throw error;
          }
          report.cancelled = true;
          break;
        }
      }
    }

    this.logger.info(
      {
        attempted: report.attempted,
        succeeded: report.succeeded,
        failed: report.failed,
        sessionStale: report.sessionStale,
        cancelled: report.cancelled,
      },
      'automation run finished',
    );
    return report;
  }

  /** Send one completion request. Returns true when the run must stop. */
  private async attempt(
    target: TargetReport,
    request: PlannedRequest,
    report: RunReport,
  ): Promise<boolean> {
    target.lastAttemptOutcome = 'in_flight';
    report.attempted++;
    try {
      const response = await send(this.client, { ...request, timeoutMs: this.profile.timeoutMs });
      target.status = response.status;
      if (response.status >= 200 && response.status < 300) {
        target.lastAttemptOutcome = 'success';
        report.succeeded++;
        this.logger.info({ resourceId: target.resourceId, part: target.partIndex }, 'completed');
        return false;
      }

      target.lastAttemptOutcome = 'failed';
      report.failed++;
      if (response.status === 401 || response.status === 403) {
        const error =
          response.status === 401
            ? new AuthExpiredError(request.url)
            : new ForbiddenError(request.url);
        target.error = error.message;
        report.sessionStale = true;
        report.haltedBy = error;
        this.logger.warn({ resourceId: target.resourceId, status: response.status }, error.message);
        return true;
      }
      target.error = `HTTP ${response.status}`;
      this.logger.warn({ resourceId: target.resourceId, status: response.status }, 'action failed');
      return false;
    } catch (error) {
      if (!(error instanceof NetworkError)) {
        throw error;
      }
      target.lastAttemptOutcome = 'failed';
      target.error = error.message;
      report.failed++;
      this.logger.warn({ resourceId: target.resourceId, err: error.message }, 'action failed');
      return false;
    }
  }

  private select(scanned: AutomationTarget[], resourceIds: readonly string[]): TargetReport[] {
    const selected: TargetReport[] = [];
    for (const resourceId of new Set(resourceIds)) {
      const known = scanned.filter((t) => t.resourceId === resourceId);
      if (known.length > 0) {
        selected.push(...known);
      } else {
        selected.push({
          resourceId,
          partIndex: 0,
          observedComplete: false,
          lastAttemptOutcome: 'unattempted',
          url: null,
        });
      }
    }
    return selected.sort(compareTargets);
  }
}
