import { IBackendAdapter } from '../../core/interfaces/IBackendAdapter.js';
import { Clock, systemClock } from '../../utils/clock.js';
import { Logger } from '../../utils/logger.js';
import { HttpClient } from '../http/HttpClient.js';
import { AnthropicBackend, readAnthropicSettings } from './AnthropicBackend.js';
import { BackendRegistry } from './BackendRegistry.js';
import { Env } from './environment.js';
import { OllamaBackend, readOllamaSettings } from './OllamaBackend.js';
import { OpenAIBackend, readHuggingfaceTgiSettings, readOpenAISettings } from './OpenAIBackend.js';
import { QuartBackend, readQuartSettings } from './QuartBackend.js';
import { TestBackend, readTestSettings } from './TestBackend.js';

export interface BackendOptions {
  env: Env;
  http: HttpClient;
  clock?: Clock;
  logger?: Logger;
}

/**
 * All adapters this pipeline knows about, configured from one environment snapshot
 */
export function createBackendAdapters(options: BackendOptions): IBackendAdapter[] {
  const { env, http } = options;
  return [
    new TestBackend(readTestSettings(env), options.clock ?? systemClock),
    new OllamaBackend(readOllamaSettings(env), http),
    new OpenAIBackend(readOpenAISettings(env), http),
    new OpenAIBackend(readHuggingfaceTgiSettings(env), http),
    new AnthropicBackend(readAnthropicSettings(env), http),
    new QuartBackend(readQuartSettings(env), http),
  ];
}

export function createBackendRegistry(options: BackendOptions): BackendRegistry {
  return new BackendRegistry(createBackendAdapters(options), options.logger);
}
