import { z } from 'zod';
import { ChatTurn, ContentPart, PromptRecord } from '../../core/entities/PromptRecord.js';
import { IBackendAdapter, Issue, QueryResult, fail, fatal, succeed } from '../../core/interfaces/IBackendAdapter.js';
import { HttpClient, toQueryFailure } from '../http/HttpClient.js';
import { sendChatPrompt } from './conversation.js';
import { Env, ScopedVariable, checkScopedValueFor, checkScopedVariable, readScopedVariable, scopedValue } from './environment.js';

/**
 * Settings of an OpenAI-shaped chat/completions endpoint
 */
export interface OpenAICompatibleSettings {
  apiName: string;
  label: string;
  baseUrl: ScopedVariable; // up to and including /v1
  apiKey: ScopedVariable;
  apiKeyRequired: boolean;
  acceptsMultimodal: boolean;
  defaultModel?: string;
}

const OPENAI_DEFAULT_BASE_URL = 'https://api.openai.com/v1';

export function readOpenAISettings(env: Env): OpenAICompatibleSettings {
  const baseUrl = readScopedVariable(env, 'OPENAI_API_ENDPOINT');
  return {
    apiName: 'openai',
    label: 'OpenAI',
    baseUrl: { ...baseUrl, defaultValue: baseUrl.defaultValue ?? OPENAI_DEFAULT_BASE_URL },
    apiKey: readScopedVariable(env, 'OPENAI_API_KEY'),
    apiKeyRequired: true,
    acceptsMultimodal: true,
  };
}

/**
 * Hugging Face text-generation-inference servers expose the same
 * chat/completions route under <endpoint>/v1
 */
export function readHuggingfaceTgiSettings(env: Env): OpenAICompatibleSettings {
  const endpoint = readScopedVariable(env, 'HUGGINGFACE_TGI_API_ENDPOINT');
  const withVersion = (url: string): string => `${url.replace(/\/+$/, '')}/v1`;
  const byModel: Record<string, string> = {};
  for (const [model, url] of Object.entries(endpoint.byModel)) {
    byModel[model] = withVersion(url);
  }
  return {
    apiName: 'huggingface-tgi',
    label: 'HuggingfaceTGI',
    baseUrl: {
      name: endpoint.name,
      defaultValue: endpoint.defaultValue === undefined ? undefined : withVersion(endpoint.defaultValue),
      byModel,
    },
    apiKey: readScopedVariable(env, 'HUGGINGFACE_TGI_API_KEY'),
    apiKeyRequired: false,
    acceptsMultimodal: false,
    defaultModel: 'tgi',
  };
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .nonempty(),
});

type OpenAIMessage = ChatTurn | { role: 'user'; content: ContentPart[] };

/**
 * Adapter for OpenAI and OpenAI-shaped chat/completions endpoints.
 * Record parameters (temperature, max_tokens, ...) are sent as request fields.
 */
export class OpenAIBackend implements IBackendAdapter {
  readonly apiName: string;

  constructor(
    private readonly settings: OpenAICompatibleSettings,
    private readonly http: HttpClient
  ) {
    this.apiName = settings.apiName;
  }

  checkEnvironment(): Issue[] {
    return [
      ...checkScopedVariable(this.settings.baseUrl, true),
      ...checkScopedVariable(this.settings.apiKey, this.settings.apiKeyRequired),
    ];
  }

  checkPromptShape(record: PromptRecord): Issue[] {
    const issues: Issue[] = [];
    if (record.shape.kind === 'multimodal-parts' && !this.settings.acceptsMultimodal) {
      issues.push(fatal(`${this.settings.label} prompts must be a string or a list of turns`));
    }
    if (!record.modelName && !this.settings.defaultModel) {
      issues.push(fatal(`${this.settings.label} records need a 'model_name'`));
    }
    issues.push(...checkScopedValueFor(this.settings.baseUrl, record.modelName));
    if (this.settings.apiKeyRequired) {
      issues.push(...checkScopedValueFor(this.settings.apiKey, record.modelName));
    }
    return issues;
  }

  async query(record: PromptRecord, _index: number): Promise<QueryResult> {
    const model = record.modelName ?? this.settings.defaultModel ?? '';
    const baseUrl = scopedValue(this.settings.baseUrl, record.modelName);
    if (!baseUrl) {
      return fail('unavailable', `No ${this.settings.label} endpoint configured for model ${model}`, false);
    }
    const apiKey = scopedValue(this.settings.apiKey, record.modelName);
    const headers: Record<string, string> = apiKey ? { Authorization: `Bearer ${apiKey}` } : {};

    const complete = async (messages: OpenAIMessage[]): Promise<string> => {
      const data = await this.http.postJson(
        `${baseUrl}/chat/completions`,
        { ...record.parameters, model, messages },
        headers
      );
      return ChatCompletionSchema.parse(data).choices[0].message.content ?? '';
    };

    try {
      if (record.shape.kind === 'multimodal-parts') {
        return succeed(await complete([{ role: 'user', content: record.shape.parts }]));
      }
      return succeed(await sendChatPrompt(record.shape, complete));
    } catch (error) {
      return { ok: false, failure: toQueryFailure(error) };
    }
  }
}
