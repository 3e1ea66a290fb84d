import { IBackendAdapter, Issue } from './IBackendAdapter.js';

export type BackendLookup =
  | { status: 'ready'; adapter: IBackendAdapter }
  | { status: 'disabled'; adapter: IBackendAdapter; issues: Issue[] }
  | { status: 'unknown' };

/**
 * Api-name to adapter mapping, resolved once at startup
 */
export interface IBackendRegistry {
  lookup(apiName: string): BackendLookup;

  /** Names of all registered adapters, enabled or not */
  apiNames(): string[];
}
