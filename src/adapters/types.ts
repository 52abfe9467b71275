import type { ChatResponse, JsonSchema, ProviderKind } from '../types';

export interface AdapterChatRequest {
  prompt: string;
  identifier: string;
  brief: boolean;
  schema?: JsonSchema;
  context?: string;
  timeoutMs: number;
}

/**
 * One inference provider. Implementations own the wire format in both
 * directions and reject only with the chat error kinds from ../errors.
 */
export interface BackendAdapter {
  readonly provider: ProviderKind;
  warm(identifier: string, timeoutMs: number): Promise<boolean>;
  chat(request: AdapterChatRequest): Promise<ChatResponse>;
}
