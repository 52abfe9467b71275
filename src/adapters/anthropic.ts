import type { ChatResponse } from '../types';
import { request } from '../transport';
import { buildUsage } from '../usage';
import type { AdapterChatRequest, BackendAdapter } from './types';
import { parseStructured } from './shared';

interface AnthropicSystemBlock {
  type: 'text';
  text: string;
  cache_control?: { type: 'ephemeral' };
}

interface AnthropicRequest {
  model: string;
  max_tokens: number;
  system?: AnthropicSystemBlock[];
  messages: Array<{ role: 'user'; content: string }>;
}

interface AnthropicResponse {
  content?: Array<{ type: string; text?: string }>;
  stop_reason?: string;
  usage?: { input_tokens?: number; output_tokens?: number };
}

export interface AnthropicOptions {
  apiKey: string;
  baseUrl?: string;
  /** Mark the schema block cacheable when a long system context precedes it */
  cacheSchema?: boolean;
}

export class AnthropicAdapter implements BackendAdapter {
  readonly provider = 'anthropic' as const;
  private readonly baseUrl: string;

  constructor(private readonly options: AnthropicOptions) {
    this.baseUrl = (options.baseUrl ?? 'https://api.anthropic.com/v1').replace(/\/+$/, '');
  }

  // The hosted API has no cold start.
  async warm(): Promise<boolean> {
    return true;
  }

  async chat(input: AdapterChatRequest): Promise<ChatResponse> {
    const requestStart = Date.now();
    const system: AnthropicSystemBlock[] = [];

    if (input.context) {
      system.push({ type: 'text', text: input.context });
    }

    if (input.schema) {
      const block: AnthropicSystemBlock = {
        type: 'text',
        text: `Please provide a JSON response matching exactly this schema:
${JSON.stringify(input.schema, null, 2)}

Your response must be valid JSON that matches the schema above.`
      };
      if (this.options.cacheSchema && input.context) {
        block.cache_control = { type: 'ephemeral' };
      }
      system.push(block);
    }

    const body: AnthropicRequest = {
      model: input.identifier,
      max_tokens: input.brief ? 512 : 3192,
      messages: [{ role: 'user', content: input.prompt }]
    };
    if (system.length > 0) {
      body.system = system;
    }

    const data = await request(
      `${this.baseUrl}/messages`,
      {
        headers: {
          'x-api-key': this.options.apiKey,
          'anthropic-version': '2023-06-01'
        },
        body,
        timeoutMs: input.timeoutMs
      },
      async response => {
        const raw = (await response.json()) as AnthropicResponse;
        const text = raw.content?.find(item => item.type === 'text')?.text;
        if (typeof text !== 'string') {
          throw new Error('Missing text block in anthropic response');
        }
        return { text, usage: raw.usage };
      }
    );

    const usage = buildUsage(this.provider, input.identifier, {
      tokensIn: data.usage?.input_tokens,
      tokensOut: data.usage?.output_tokens,
      totalMsec: Date.now() - requestStart
    });

    if (input.schema) {
      return { responseText: '', structuredData: parseStructured(data.text), usage };
    }
    return { responseText: data.text, structuredData: {}, usage };
  }
}
