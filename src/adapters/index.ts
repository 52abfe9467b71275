import type { AppConfig } from '../config';
import type { ProviderKind } from '../types';
import { AnthropicAdapter } from './anthropic';
import { GeminiAdapter } from './gemini';
import { OllamaAdapter } from './ollama';
import { OpenAICompatibleAdapter } from './openai-compatible';
import type { BackendAdapter } from './types';

export type AdapterTable = Record<ProviderKind, BackendAdapter>;

export function createAdapters(config: AppConfig): AdapterTable {
  return {
    openai: new OpenAICompatibleAdapter({
      provider: 'openai',
      baseUrl: 'https://api.openai.com/v1',
      apiKey: config.openaiApiKey
    }),
    anthropic: new AnthropicAdapter({ apiKey: config.anthropicApiKey, cacheSchema: true }),
    gemini: new GeminiAdapter({ apiKey: config.geminiApiKey }),
    openrouter: new OpenAICompatibleAdapter({
      provider: 'openrouter',
      baseUrl: 'https://openrouter.ai/api/v1',
      apiKey: config.openrouterApiKey,
      headers: {
        'X-Title': 'Model Bench Grader'
      }
    }),
    ollama: new OllamaAdapter({ baseUrl: config.ollamaBaseUrl }),
    lmstudio: new OpenAICompatibleAdapter({
      provider: 'lmstudio',
      baseUrl: config.lmstudioBaseUrl,
      warmPath: '/models'
    })
  };
}

export type { AdapterChatRequest, BackendAdapter } from './types';
