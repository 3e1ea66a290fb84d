import { IBackendAdapter, Issue } from '../../core/interfaces/IBackendAdapter.js';
import { BackendLookup, IBackendRegistry } from '../../core/interfaces/IBackendRegistry.js';
import { Logger } from '../../utils/logger.js';

export interface EnvironmentReport {
  apiName: string;
  enabled: boolean;
  issues: Issue[];
}

/**
 * Adapters keyed by api name. Every adapter's environment is checked once here;
 * an adapter with a fatal issue stays registered but disabled.
 */
export class BackendRegistry implements IBackendRegistry {
  private adapters = new Map<string, IBackendAdapter>();
  private disabled = new Map<string, Issue[]>();
  private reports: EnvironmentReport[] = [];

  constructor(adapters: IBackendAdapter[], logger?: Logger) {
    for (const adapter of adapters) {
      if (this.adapters.has(adapter.apiName)) {
        throw new Error(`Duplicate backend adapter for api '${adapter.apiName}'`);
      }
      this.adapters.set(adapter.apiName, adapter);

      const issues = adapter.checkEnvironment();
      const fatalIssues = issues.filter((issue) => issue.severity === 'fatal');
      if (fatalIssues.length > 0) {
        this.disabled.set(adapter.apiName, fatalIssues);
      }
      this.reports.push({ apiName: adapter.apiName, enabled: fatalIssues.length === 0, issues });

      for (const issue of issues) {
        if (issue.severity === 'fatal') {
          logger?.warn(`${adapter.apiName} disabled: ${issue.message}`);
        } else {
          logger?.debug(`${adapter.apiName}: ${issue.message}`);
        }
      }
    }
  }

  lookup(apiName: string): BackendLookup {
    const adapter = this.adapters.get(apiName);
    if (!adapter) {
      return { status: 'unknown' };
    }
    const issues = this.disabled.get(apiName);
    return issues ? { status: 'disabled', adapter, issues } : { status: 'ready', adapter };
  }

  apiNames(): string[] {
    return Array.from(this.adapters.keys());
  }

  /** Result of the startup environment checks */
  environmentReport(): EnvironmentReport[] {
    return [...this.reports];
  }
}
