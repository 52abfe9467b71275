import type { ChatResponse, JsonSchema, ProviderKind } from '../types';
import { request } from '../transport';
import { buildUsage } from '../usage';
import type { AdapterChatRequest, BackendAdapter } from './types';
import { type ChatMessage, chatMessages, parseStructured, rewriteSchema } from './shared';

export interface OpenAICompatibleResponse {
  id?: string;
  choices?: Array<{
    message?: {
      content?: string | null;
    };
    finish_reason?: string;
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
    cost?: number;
  };
}

interface OpenAICompatibleRequest {
  model: string;
  messages: ChatMessage[];
  max_tokens?: number;
  max_completion_tokens?: number;
  temperature?: number;
  response_format?: {
    type: 'json_schema';
    json_schema: {
      name: string;
      strict: boolean;
      schema: JsonSchema;
    };
  };
}

export interface OpenAICompatibleOptions {
  provider: ProviderKind;
  baseUrl: string;
  apiKey?: string;
  headers?: Record<string, string>;
  /** GET this path on warm-up; without it warm-up is a no-op */
  warmPath?: string;
}

// o1/o3 reasoning models reject max_tokens and any temperature.
const REASONING_MODEL = /^o\d+(-|$)/;

export function isReasoningModel(provider: ProviderKind, identifier: string): boolean {
  return provider === 'openai' && REASONING_MODEL.test(identifier);
}

/**
 * Strict structured output rejects numeric bounds and open objects.
 */
export function toStrictSchema(schema: JsonSchema): JsonSchema {
  return rewriteSchema(schema, { drop: ['minimum', 'maximum'], strictObjects: true });
}

function readCompletion(
  data: OpenAICompatibleResponse,
  provider: ProviderKind
): { content: string; usage: OpenAICompatibleResponse['usage'] } {
  if (!data.choices || !Array.isArray(data.choices) || data.choices.length === 0) {
    throw new Error(`Invalid response structure from ${provider}`);
  }

  const message = data.choices[0].message;
  if (!message || typeof message.content !== 'string') {
    throw new Error(`Invalid message structure in ${provider} response`);
  }

  return { content: message.content, usage: data.usage };
}

/**
 * Adapter for every backend speaking the /chat/completions dialect:
 * OpenAI itself, OpenRouter and LM Studio.
 */
export class OpenAICompatibleAdapter implements BackendAdapter {
  readonly provider: ProviderKind;
  private readonly options: OpenAICompatibleOptions;

  constructor(options: OpenAICompatibleOptions) {
    this.provider = options.provider;
    this.options = { ...options, baseUrl: options.baseUrl.replace(/\/+$/, '') };
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { ...this.options.headers };
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }
    return headers;
  }

  async warm(_identifier: string, timeoutMs: number): Promise<boolean> {
    if (!this.options.warmPath) {
      return true;
    }

    return request(
      `${this.options.baseUrl}${this.options.warmPath}`,
      { method: 'GET', headers: this.headers(), timeoutMs },
      async () => true
    );
  }

  async chat(input: AdapterChatRequest): Promise<ChatResponse> {
    const requestStart = Date.now();
    const maxTokens = input.brief ? 256 : 1536;
    const body: OpenAICompatibleRequest = {
      model: input.identifier,
      messages: chatMessages(input.prompt, input.context)
    };

    if (isReasoningModel(this.provider, input.identifier)) {
      body.max_completion_tokens = maxTokens;
    } else {
      body.max_tokens = maxTokens;
      body.temperature = input.schema ? 0.15 : 0.45;
    }

    if (input.schema) {
      body.response_format = {
        type: 'json_schema',
        json_schema: {
          name: 'Details',
          strict: true,
          schema: toStrictSchema(input.schema)
        }
      };
    }

    const data = await request(
      `${this.options.baseUrl}/chat/completions`,
      { headers: this.headers(), body, timeoutMs: input.timeoutMs },
      async response => readCompletion((await response.json()) as OpenAICompatibleResponse, this.provider)
    );
    const totalMsec = Date.now() - requestStart;

    const usage = buildUsage(this.provider, input.identifier, {
      tokensIn: data.usage?.prompt_tokens,
      tokensOut: data.usage?.completion_tokens,
      totalMsec,
      reportedCost: data.usage?.cost
    });

    const { content } = data;
    if (input.schema) {
      return { responseText: '', structuredData: parseStructured(content), usage };
    }
    return { responseText: content, structuredData: {}, usage };
  }
}
