import { z } from 'zod';
import { PromptRecord } from '../../core/entities/PromptRecord.js';
import { IBackendAdapter, Issue, QueryResult, fail, fatal, succeed } from '../../core/interfaces/IBackendAdapter.js';
import { HttpClient, toQueryFailure } from '../http/HttpClient.js';
import { Env, ScopedVariable, checkScopedValueFor, checkScopedVariable, readScopedVariable, scopedValue } from './environment.js';

export interface QuartSettings {
  endpoint: ScopedVariable;
}

export function readQuartSettings(env: Env): QuartSettings {
  return { endpoint: readScopedVariable(env, 'QUART_API_ENDPOINT') };
}

const GenerateResponseSchema = z.object({
  response: z.array(z.object({ generated_text: z.string() })).nonempty(),
});

/**
 * Self-hosted text generation server: POST <endpoint>/generate with {text, model, options}
 */
export class QuartBackend implements IBackendAdapter {
  readonly apiName = 'quart';

  constructor(
    private readonly settings: QuartSettings,
    private readonly http: HttpClient
  ) {}

  checkEnvironment(): Issue[] {
    return checkScopedVariable(this.settings.endpoint, true);
  }

  checkPromptShape(record: PromptRecord): Issue[] {
    const issues: Issue[] = [];
    if (record.shape.kind !== 'plain-text') {
      issues.push(fatal('Quart prompts must be a string'));
    }
    issues.push(...checkScopedValueFor(this.settings.endpoint, record.modelName));
    return issues;
  }

  async query(record: PromptRecord, _index: number): Promise<QueryResult> {
    const endpoint = scopedValue(this.settings.endpoint, record.modelName);
    if (!endpoint) {
      return fail('unavailable', 'QUART_API_ENDPOINT is not set', false);
    }
    if (record.shape.kind !== 'plain-text') {
      return fail('prompt-shape', 'Quart prompts must be a string', false);
    }

    try {
      const data = await this.http.postJson(`${endpoint}/generate`, {
        text: record.shape.text,
        model: record.modelName,
        options: record.parameters,
      });
      return succeed(GenerateResponseSchema.parse(data).response[0].generated_text);
    } catch (error) {
      return { ok: false, failure: toQueryFailure(error) };
    }
  }
}
