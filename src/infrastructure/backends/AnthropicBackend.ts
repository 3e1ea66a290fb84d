import { z } from 'zod';
import { ChatTurn, PromptRecord } from '../../core/entities/PromptRecord.js';
import { IBackendAdapter, Issue, QueryResult, fail, fatal, succeed } from '../../core/interfaces/IBackendAdapter.js';
import { HttpClient, toQueryFailure } from '../http/HttpClient.js';
import { sendChatPrompt } from './conversation.js';
import { Env, ScopedVariable, checkScopedValueFor, checkScopedVariable, readScopedVariable, scopedValue } from './environment.js';

export const ANTHROPIC_VERSION = '2023-06-01';
const DEFAULT_MAX_TOKENS = 1024;

export interface AnthropicSettings {
  apiKey: ScopedVariable;
  baseUrl: string;
}

export function readAnthropicSettings(env: Env): AnthropicSettings {
  return {
    apiKey: readScopedVariable(env, 'ANTHROPIC_API_KEY'),
    baseUrl: env.ANTHROPIC_API_ENDPOINT || 'https://api.anthropic.com',
  };
}

const MessagesResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
});

/**
 * Anthropic messages API. System turns are lifted into the `system` field.
 */
export class AnthropicBackend implements IBackendAdapter {
  readonly apiName = 'anthropic';

  constructor(
    private readonly settings: AnthropicSettings,
    private readonly http: HttpClient
  ) {}

  checkEnvironment(): Issue[] {
    return checkScopedVariable(this.settings.apiKey, true);
  }

  checkPromptShape(record: PromptRecord): Issue[] {
    const issues: Issue[] = [];
    if (record.shape.kind === 'multimodal-parts') {
      issues.push(fatal('Anthropic prompts must be a string or a list of turns'));
    }
    if (!record.modelName) {
      issues.push(fatal("Anthropic records need a 'model_name'"));
    }
    issues.push(...checkScopedValueFor(this.settings.apiKey, record.modelName));
    return issues;
  }

  async query(record: PromptRecord, _index: number): Promise<QueryResult> {
    const apiKey = scopedValue(this.settings.apiKey, record.modelName);
    if (!apiKey) {
      return fail('unavailable', 'ANTHROPIC_API_KEY is not set', false);
    }

    const { max_tokens: maxTokens, ...options } = record.parameters;
    const send = async (turns: ChatTurn[]): Promise<string> => {
      const system = turns.filter((turn) => turn.role === 'system').map((turn) => turn.content);
      const messages = turns.filter((turn) => turn.role !== 'system');
      const data = await this.http.postJson(
        `${this.settings.baseUrl}/v1/messages`,
        {
          ...options,
          model: record.modelName,
          max_tokens: typeof maxTokens === 'number' ? maxTokens : DEFAULT_MAX_TOKENS,
          ...(system.length > 0 ? { system: system.join('\n') } : {}),
          messages,
        },
        { 'x-api-key': apiKey, 'anthropic-version': ANTHROPIC_VERSION }
      );
      return MessagesResponseSchema.parse(data)
        .content.filter((block) => block.type === 'text')
        .map((block) => block.text ?? '')
        .join('');
    };

    try {
      return succeed(await sendChatPrompt(record.shape, send));
    } catch (error) {
      return { ok: false, failure: toQueryFailure(error) };
    }
  }
}
