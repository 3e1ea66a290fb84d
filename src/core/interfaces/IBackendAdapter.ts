import { PromptRecord, ResponseValue } from '../entities/PromptRecord.js';

export type IssueSeverity = 'fatal' | 'advisory';

/**
 * Readiness or prompt-shape problem reported by an adapter
 */
export interface Issue {
  severity: IssueSeverity;
  message: string;
}

export type FailureKind =
  | 'unavailable' // unknown api, or adapter disabled at startup
  | 'prompt-shape'
  | 'http'
  | 'timeout'
  | 'network'
  | 'backend'
  | 'exception';

export interface QueryFailure {
  kind: FailureKind;
  message: string;
  retryable: boolean;
}

export type QueryResult =
  | { ok: true; response: ResponseValue }
  | { ok: false; failure: QueryFailure };

export function succeed(response: ResponseValue): QueryResult {
  return { ok: true, response };
}

export function fail(kind: FailureKind, message: string, retryable: boolean = true): QueryResult {
  return { ok: false, failure: { kind, message, retryable } };
}

export function fatal(message: string): Issue {
  return { severity: 'fatal', message };
}

export function advisory(message: string): Issue {
  return { severity: 'advisory', message };
}

/**
 * Capability contract every backend implements
 */
export interface IBackendAdapter {
  /** Key used in the `api` field of job records */
  readonly apiName: string;

  /** Startup readiness check; never throws */
  checkEnvironment(): Issue[];

  /** Pre-dispatch validation of one record, no network */
  checkPromptShape(record: PromptRecord): Issue[];

  /**
   * Send one request. Expected failures come back as `{ ok: false }`;
   * anything thrown is turned into a failure by the dispatcher.
   */
  query(record: PromptRecord, index: number): Promise<QueryResult>;
}
