import { PromptRecord } from '../../core/entities/PromptRecord.js';
import { IBackendAdapter, Issue, QueryResult, fail, succeed } from '../../core/interfaces/IBackendAdapter.js';
import { Clock, systemClock } from '../../utils/clock.js';
import { Env } from './environment.js';

export const TEST_RESPONSE = 'This is a test response';
export const TEST_ERROR = 'This is a test error which we should handle and return';

export interface TestBackendSettings {
  responseDelayMs: number;
}

export function readTestSettings(env: Env): TestBackendSettings {
  const delay = Number.parseInt(env.TEST_API_RESPONSE_DELAY_MS ?? '', 10);
  return { responseDelayMs: Number.isNaN(delay) ? 1000 : Math.max(0, delay) };
}

/**
 * Offline backend for trying out pipelines.
 * parameters.raise_error "True"/"False" forces the outcome, anything else fails about 1 in 5 requests;
 * parameters.raise_error_type "permanent" makes the failure non-retryable.
 */
export class TestBackend implements IBackendAdapter {
  readonly apiName = 'test';

  constructor(
    private readonly settings: TestBackendSettings = { responseDelayMs: 0 },
    private readonly clock: Clock = systemClock,
    private readonly random: () => number = Math.random
  ) {}

  checkEnvironment(): Issue[] {
    return [];
  }

  checkPromptShape(_record: PromptRecord): Issue[] {
    return [];
  }

  async query(record: PromptRecord, _index: number): Promise<QueryResult> {
    const option = record.parameters.raise_error;
    const raiseError = option === 'True' ? true : option === 'False' ? false : this.random() < 0.2;

    if (raiseError) {
      return fail('backend', TEST_ERROR, record.parameters.raise_error_type !== 'permanent');
    }

    if (this.settings.responseDelayMs > 0) {
      await this.clock.sleep(this.settings.responseDelayMs);
    }
    return succeed(TEST_RESPONSE);
  }
}
