import type { ChatResponse, JsonSchema } from '../types';
import { request } from '../transport';
import { buildUsage } from '../usage';
import type { AdapterChatRequest, BackendAdapter } from './types';
import { parseStructured, rewriteSchema } from './shared';

interface GeminiRequest {
  contents: Array<{ role: 'user'; parts: Array<{ text: string }> }>;
  systemInstruction?: { parts: Array<{ text: string }> };
  generationConfig: {
    maxOutputTokens: number;
    temperature: number;
    responseMimeType?: 'application/json';
    responseSchema?: JsonSchema;
  };
}

interface GeminiResponse {
  candidates?: Array<{
    content?: { parts?: Array<{ text?: string }> };
    finishReason?: string;
  }>;
  usageMetadata?: {
    promptTokenCount?: number;
    candidatesTokenCount?: number;
    totalTokenCount?: number;
  };
}

export interface GeminiOptions {
  apiKey: string;
  baseUrl?: string;
}

export class GeminiAdapter implements BackendAdapter {
  readonly provider = 'gemini' as const;
  private readonly baseUrl: string;

  constructor(private readonly options: GeminiOptions) {
    this.baseUrl = (options.baseUrl ?? 'https://generativelanguage.googleapis.com/v1beta').replace(/\/+$/, '');
  }

  async warm(): Promise<boolean> {
    return true;
  }

  async chat(input: AdapterChatRequest): Promise<ChatResponse> {
    const requestStart = Date.now();
    const body: GeminiRequest = {
      contents: [{ role: 'user', parts: [{ text: input.prompt }] }],
      generationConfig: {
        maxOutputTokens: input.brief ? 256 : 1536,
        temperature: input.schema ? 0.15 : 0.45
      }
    };

    if (input.context) {
      body.systemInstruction = { parts: [{ text: input.context }] };
    }

    if (input.schema) {
      body.generationConfig.responseMimeType = 'application/json';
      // responseSchema is an OpenAPI subset without additionalProperties
      body.generationConfig.responseSchema = rewriteSchema(input.schema, {
        drop: ['additionalProperties'],
        strictObjects: false
      });
    }

    const data = await request(
      `${this.baseUrl}/models/${encodeURIComponent(input.identifier)}:generateContent`,
      {
        headers: { 'x-goog-api-key': this.options.apiKey },
        body,
        timeoutMs: input.timeoutMs
      },
      async response => {
        const raw = (await response.json()) as GeminiResponse;
        const parts = raw.candidates?.[0]?.content?.parts;
        if (!parts || !Array.isArray(parts)) {
          throw new Error('Invalid response structure from gemini');
        }
        const text = parts.map(part => part.text ?? '').join('');
        return { text, usage: raw.usageMetadata };
      }
    );

    const usage = buildUsage(this.provider, input.identifier, {
      tokensIn: data.usage?.promptTokenCount,
      tokensOut: data.usage?.candidatesTokenCount,
      totalMsec: Date.now() - requestStart
    });

    if (input.schema) {
      return { responseText: '', structuredData: parseStructured(data.text), usage };
    }
    return { responseText: data.text, structuredData: {}, usage };
  }
}
