/**
 * tapdeck — Replay Engine
 *
 * 保存済みトランザクションを（任意の上書き付きで）再送し、応答を要約する。
 * ストアには書き込まない。保存したい場合は toCaptureInput() の結果を
 * 明示的に append する。
 */

import type { AxiosInstance } from 'axios';
import type { HeaderMap } from '../types/entities.js';
import type { CreateTransactionInput } from '../types/repository.js';
import type { QueryEngine } from './query.js';
import { createHttpClient, send } from './http.js';
import { mergeHeaders, omitHeaders } from '../utils/headers.js';
import { splitUrl } from '../utils/url.js';
import { getLogger, type Logger } from '../utils/logger.js';

/** Recomputed by the transport; never replayed from the capture. */
export const DROPPED_REPLAY_HEADERS = ['host', 'content-length', 'connection', 'transfer-encoding'];

export const BODY_PREVIEW_CHARS = 500;

export interface ReplayOverrides {
  url?: string;
  /** Merged case-insensitively over the captured request headers. */
  headers?: HeaderMap;
  body?: string;
}

export interface ReplayRequest {
  method: string;
  url: string;
  headers: HeaderMap;
  body: string;
}

export interface ReplayResult {
  transactionId: number;
  /** Epoch seconds when the request was sent. */
  sentAt: number;
  status: number;
  /** Seconds. */
  duration: number;
  responseSummary: {
    headers: HeaderMap;
    bodySize: number;
    bodyPreview: string;
  };
  request: ReplayRequest;
  /** Full response body, kept for toCaptureInput. */
  responseBody: string;
}

export interface ReplayEngineOptions {
  client?: AxiosInstance;
  timeoutMs?: number;
  logger?: Logger;
}

export class ReplayEngine {
  private readonly query: QueryEngine;
  private readonly client: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(query: QueryEngine, options: ReplayEngineOptions = {}) {
    this.query = query;
    this.client = options.client ?? createHttpClient();
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.logger = options.logger ?? getLogger();
  }

  /**
   * The request `replay` would send, without sending it.
   *
   * @throws NotFoundError
   * @throws ValidationError when the target URL is not a valid http(s) URL
   */
  buildRequest(id: number, overrides: ReplayOverrides = {}): ReplayRequest {
    const tx = this.query.get(id);
    const url = overrides.url ?? tx.url;
    splitUrl(url);
    const headers = mergeHeaders(tx.requestHeaders, overrides.headers ?? {});
    return {
      method: tx.method,
      url,
      headers: omitHeaders(headers, DROPPED_REPLAY_HEADERS),
      body: overrides.body ?? tx.requestBody,
    };
  }

  /**
   * Re-send a stored transaction. Non-2xx responses are results.
   *
   * @throws NotFoundError when the id is absent or outside the scope
   * @throws ValidationError
   * @throws TransportTimeoutError
   * @throws NetworkError
   */
  async replay(id: number, overrides: ReplayOverrides = {}): Promise<ReplayResult> {
    const request = this.buildRequest(id, overrides);
    const sentAt = Date.now() / 1000;
    this.logger.info({ transactionId: id, method: request.method, url: request.url }, 'replaying');

    const response = await send(this.client, { ...request, timeoutMs: this.timeoutMs });

    return {
      transactionId: id,
      sentAt,
      status: response.status,
      duration: response.duration,
      responseSummary: {
        headers: response.headers,
        bodySize: Buffer.byteLength(response.body, 'utf8'),
        bodyPreview: response.body.slice(0, BODY_PREVIEW_CHARS),
      },
      request,
      responseBody: response.body,
    };
  }
}

/**
 * Repository input recording a replay as a new transaction.
 *
 * @throws ValidationError when the replayed URL is not absolute
 */
export function toCaptureInput(result: ReplayResult): CreateTransactionInput {
  const parts = splitUrl(result.request.url);
  return {
    timestamp: result.sentAt,
    method: result.request.method,
    url: result.request.url,
    host: parts.host,
    path: parts.path,
    protocol: parts.protocol,
    requestHeaders: result.request.headers,
    requestBody: result.request.body,
    responseStatus: result.status,
    responseHeaders: result.responseSummary.headers,
    responseBody: result.responseBody,
    duration: result.duration,
    notes: `replay of #${result.transactionId}`,
  };
}
