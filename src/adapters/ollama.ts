import type { ChatResponse, JsonSchema } from '../types';
import { UnexpectedFailureError } from '../errors';
import { readLines, request } from '../transport';
import { buildUsage, isFiniteNumber } from '../usage';
import type { AdapterChatRequest, BackendAdapter } from './types';
import { type ChatMessage, chatMessages, parseStructured } from './shared';

interface OllamaChatRequest {
  model: string;
  messages: ChatMessage[];
  stream: boolean;
  format?: JsonSchema;
  options?: { num_predict: number };
}

/** One line of the streamed /api/chat body. The final line carries the counters. */
interface OllamaChatChunk {
  message?: { role?: string; content?: string };
  done?: boolean;
  error?: string;
  prompt_eval_count?: number;
  eval_count?: number;
  /** Nanoseconds */
  total_duration?: number;
}

export interface OllamaOptions {
  baseUrl: string;
}

interface StreamedChat {
  text: string;
  final?: OllamaChatChunk;
}

async function collectStream(response: Response): Promise<StreamedChat> {
  if (!response.body) {
    throw new Error('Response body is null');
  }

  const parts: string[] = [];
  let final: OllamaChatChunk | undefined;

  for await (const line of readLines(response.body)) {
    const chunk = JSON.parse(line) as OllamaChatChunk;
    if (chunk.error) {
      throw new UnexpectedFailureError(`Ollama error: ${chunk.error}`);
    }
    if (chunk.message?.content) {
      parts.push(chunk.message.content);
    }
    if (chunk.done) {
      final = chunk;
    }
  }

  return { text: parts.join(''), final };
}

export class OllamaAdapter implements BackendAdapter {
  readonly provider = 'ollama' as const;
  private readonly baseUrl: string;

  constructor(options: OllamaOptions) {
    this.baseUrl = `${options.baseUrl.replace(/\/+$/, '')}/api`;
  }

  /**
   * An empty message list makes the server load the model without generating.
   */
  async warm(identifier: string, timeoutMs: number): Promise<boolean> {
    return request(
      `${this.baseUrl}/chat`,
      { body: { model: identifier, messages: [], stream: false }, timeoutMs },
      async response => {
        await response.text();
        return true;
      }
    );
  }

  async chat(input: AdapterChatRequest): Promise<ChatResponse> {
    const requestStart = Date.now();
    const body: OllamaChatRequest = {
      model: input.identifier,
      messages: chatMessages(input.prompt, input.context),
      stream: true
    };

    if (input.brief) {
      body.options = { num_predict: 256 };
    }
    if (input.schema) {
      body.format = input.schema;
    }

    const streamed = await request(`${this.baseUrl}/chat`, { body, timeoutMs: input.timeoutMs }, collectStream);

    const duration = streamed.final?.total_duration;
    const usage = buildUsage(this.provider, input.identifier, {
      tokensIn: streamed.final?.prompt_eval_count,
      tokensOut: streamed.final?.eval_count,
      totalMsec: isFiniteNumber(duration) ? duration / 1_000_000 : Date.now() - requestStart
    });

    if (input.schema) {
      return { responseText: '', structuredData: parseStructured(streamed.text), usage };
    }
    return { responseText: streamed.text, structuredData: {}, usage };
  }
}
