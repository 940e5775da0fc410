/**
 * tapdeck — Outbound HTTP
 *
 * Replay と自動化が共有する axios ラッパー。
 * 非 2xx は結果として返し、例外にするのはトランスポート障害のみ。
 */

import axios, { type AxiosInstance } from 'axios';
import type { HeaderMap } from '../types/entities.js';
import { NetworkError, TransportTimeoutError } from '../types/errors.js';

export interface OutboundRequest {
  method: string;
  url: string;
  headers: HeaderMap;
  /** Sent verbatim; omitted when empty. */
  body: string;
  timeoutMs: number;
}

export interface OutboundResponse {
  status: number;
  headers: HeaderMap;
  body: string;
  /** Seconds from send to response. */
  duration: number;
}

/**
 * axios instance that resolves every status, follows no redirects and
 * passes both bodies through untouched as text.
 */
export function createHttpClient(): AxiosInstance {
  return axios.create({
    validateStatus: () => true,
    maxRedirects: 0,
    responseType: 'text',
    transformRequest: [(data: unknown) => data],
    transformResponse: [(data: unknown) => data],
  });
}

function flattenHeaders(raw: object): HeaderMap {
  const headers: HeaderMap = {};
  for (const [name, value] of Object.entries(raw)) {
    if (typeof value === 'string') {
      headers[name] = value;
    } else if (Array.isArray(value)) {
      headers[name] = value.map(String).join(', ');
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      headers[name] = String(value);
    }
  }
  return headers;
}

function bodyText(data: unknown): string {
  if (data === undefined || data === null) {
    return '';
  }
  if (typeof data === 'string') {
    return data;
  }
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  return JSON.stringify(data) ?? '';
}

/**
 * Map an axios failure that produced no response to the transport error
 * taxonomy. Anything else is returned unchanged.
 */
export function toTransportError(error: unknown, url: string, timeoutMs: number): unknown {
  if (!axios.isAxiosError(error) || error.response !== undefined) {
    return error;
  }
  if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
    return new TransportTimeoutError(url, timeoutMs, { cause: error });
  }
  return new NetworkError(url, error.message || 'Request failed', { cause: error });
}

/**
 * Send one request.
 *
 * @throws TransportTimeoutError when no response arrives within `timeoutMs`
 * @throws NetworkError for other transport failures
 */
export async function send(
  client: AxiosInstance,
  request: OutboundRequest,
): Promise<OutboundResponse> {
  const started = performance.now();
  try {
    const response = await client.request<unknown>({
      method: request.method,
      url: request.url,
      headers: request.headers,
      data: request.body.length > 0 ? request.body : undefined,
      timeout: request.timeoutMs,
    });
    return {
      status: response.status,
      headers: flattenHeaders(response.headers),
      body: bodyText(response.data),
      duration: (performance.now() - started) / 1000,
    };
  } catch (error) {
    throw toTransportError(error, request.url, request.timeoutMs);
  }
}
