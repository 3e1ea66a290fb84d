import fetch, { FetchError, RequestInit, Response } from 'node-fetch';
import { ZodError } from 'zod';
import { QueryFailure } from '../../core/interfaces/IBackendAdapter.js';
import { describeError } from '../../utils/format.js';

export type HttpTransport = (url: string, init: RequestInit) => Promise<Response>;

export const DEFAULT_REQUEST_TIMEOUT_MS = 300000;

/**
 * Non-2xx answer from a backend
 */
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly body: string
  ) {
    super(`HTTP error! status: ${status}${body ? ` - ${body.slice(0, 200)}` : ''}`);
    this.name = 'HttpError';
  }
}

/**
 * Minimal JSON-over-HTTP client shared by the backend adapters.
 * The transport is node-fetch unless a test injects its own.
 */
export class HttpClient {
  constructor(
    private readonly timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS,
    private readonly transport: HttpTransport = fetch
  ) {}

  async postJson(url: string, body: unknown, headers: Record<string, string> = {}): Promise<unknown> {
    const res = await this.transport(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...headers,
      },
      body: JSON.stringify(body),
      timeout: this.timeoutMs,
    });

    const text = await res.text();
    if (!res.ok) {
      throw new HttpError(res.status, text);
    }
    if (text.trim().length === 0) {
      return null;
    }
    const parsed: unknown = JSON.parse(text);
    return parsed;
  }
}

/**
 * Map an error thrown while talking to a backend onto the failure channel
 */
export function toQueryFailure(error: unknown): QueryFailure {
  if (error instanceof HttpError) {
    return { kind: 'http', message: error.message, retryable: true };
  }
  if (error instanceof FetchError) {
    if (error.type === 'request-timeout') {
      return { kind: 'timeout', message: error.message, retryable: true };
    }
    return { kind: 'network', message: error.message, retryable: true };
  }
  if (error instanceof ZodError) {
    const details = error.errors.map((err) => `${err.path.join('.') || 'body'}: ${err.message}`).join('; ');
    return { kind: 'backend', message: `Unexpected response body (${details})`, retryable: true };
  }
  if (error instanceof SyntaxError) {
    return { kind: 'backend', message: `Response is not valid JSON: ${error.message}`, retryable: true };
  }
  return { kind: 'exception', message: describeError(error), retryable: true };
}
