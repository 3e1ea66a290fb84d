import { z } from 'zod';
import { ChatTurn, PromptRecord } from '../../core/entities/PromptRecord.js';
import { IBackendAdapter, Issue, QueryResult, fail, fatal, succeed } from '../../core/interfaces/IBackendAdapter.js';
import { HttpClient, HttpError, toQueryFailure } from '../http/HttpClient.js';
import { sendChatPrompt } from './conversation.js';
import { Env, ScopedVariable, checkScopedValueFor, checkScopedVariable, readScopedVariable, scopedValue } from './environment.js';

export interface OllamaSettings {
  endpoint: ScopedVariable;
}

export function readOllamaSettings(env: Env): OllamaSettings {
  return { endpoint: readScopedVariable(env, 'OLLAMA_API_ENDPOINT') };
}

const GenerateResponseSchema = z.object({ response: z.string() });
const ChatResponseSchema = z.object({ message: z.object({ content: z.string() }) });

/**
 * Ollama local generation: plain text goes to /api/generate, turn lists to /api/chat.
 * Record parameters are passed through as Ollama `options`.
 */
export class OllamaBackend implements IBackendAdapter {
  readonly apiName = 'ollama';

  constructor(
    private readonly settings: OllamaSettings,
    private readonly http: HttpClient
  ) {}

  checkEnvironment(): Issue[] {
    return checkScopedVariable(this.settings.endpoint, true);
  }

  checkPromptShape(record: PromptRecord): Issue[] {
    const issues: Issue[] = [];
    if (record.shape.kind === 'multimodal-parts') {
      issues.push(fatal('Ollama prompts must be a string or a list of turns'));
    }
    if (!record.modelName) {
      issues.push(fatal("Ollama records need a 'model_name'"));
    }
    issues.push(...checkScopedValueFor(this.settings.endpoint, record.modelName));
    return issues;
  }

  async query(record: PromptRecord, _index: number): Promise<QueryResult> {
    const model = record.modelName ?? '';
    const endpoint = scopedValue(this.settings.endpoint, record.modelName);
    if (!endpoint) {
      return fail('unavailable', `No Ollama endpoint configured for model ${model}`, false);
    }

    try {
      if (record.shape.kind === 'plain-text') {
        const data = await this.http.postJson(`${endpoint}/api/generate`, {
          model,
          prompt: record.shape.text,
          stream: false,
          options: record.parameters,
        });
        return succeed(GenerateResponseSchema.parse(data).response);
      }

      const response = await sendChatPrompt(record.shape, async (messages: ChatTurn[]) => {
        const data = await this.http.postJson(`${endpoint}/api/chat`, {
          model,
          messages,
          stream: false,
          options: record.parameters,
        });
        return ChatResponseSchema.parse(data).message.content;
      });
      return succeed(response);
    } catch (error) {
      if (error instanceof HttpError && error.body.includes('try pulling it first')) {
        return fail('backend', `Model ${model} is not downloaded: ${error.message}`, false);
      }
      if (error instanceof HttpError && error.body.includes('invalid options')) {
        return fail('backend', `Invalid options for model ${model}: ${error.message}`, false);
      }
      return { ok: false, failure: toQueryFailure(error) };
    }
  }
}
