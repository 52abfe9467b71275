import type { AppConfig } from './config';
import { type AdapterTable, createAdapters } from './adapters';
import type { BackendAdapter } from './adapters/types';
import { UnsupportedModelError, errorMessage, toChatError } from './errors';
import { type Logger, createLogger } from './log';
import type { ChatOptions, ChatResponse, ModelDescriptor, ModelLookup, ProviderKind } from './types';

export interface Route {
  provider: ProviderKind;
  /** Identifier the provider expects, after prefix and quantization stripping */
  identifier: string;
}

export interface ResolvedModel extends Route {
  adapter: BackendAdapter;
}

const REMOTE_PREFIXES: ReadonlyArray<{ prefix: string; provider: ProviderKind; strip: boolean }> = [
  { prefix: 'gpt-', provider: 'openai', strip: false },
  { prefix: 'o1-', provider: 'openai', strip: false },
  { prefix: 'o3-', provider: 'openai', strip: false },
  { prefix: 'claude-', provider: 'anthropic', strip: false },
  { prefix: 'gemini-', provider: 'gemini', strip: false },
  { prefix: 'openrouter/', provider: 'openrouter', strip: true }
];

const LMSTUDIO_PREFIX = 'lmstudio/';

/**
 * Map a model descriptor to the provider that serves it.
 */
export function resolveRoute(descriptor: ModelDescriptor): Route {
  const { identifier } = descriptor;

  if (descriptor.backend === 'remote') {
    const match = REMOTE_PREFIXES.find(entry => identifier.startsWith(entry.prefix));
    if (!match) {
      throw new UnsupportedModelError(
        `No remote provider for identifier "${identifier}" (model ${descriptor.codename})`
      );
    }
    return {
      provider: match.provider,
      identifier: match.strip ? identifier.slice(match.prefix.length) : identifier
    };
  }

  if (identifier.startsWith(LMSTUDIO_PREFIX)) {
    return { provider: 'lmstudio', identifier: identifier.slice(LMSTUDIO_PREFIX.length) };
  }

  // "name:Q4_0" -> "name"
  const colon = identifier.lastIndexOf(':');
  return { provider: 'ollama', identifier: colon === -1 ? identifier : identifier.slice(0, colon) };
}

export interface UnifiedClientOptions {
  timeoutMs: number;
  debug?: boolean;
  logger?: Logger;
}

/**
 * Single entry point for model calls. Each codename is resolved once and the
 * route is cached for the lifetime of the client.
 */
export class UnifiedClient {
  private readonly routes = new Map<string, ResolvedModel>();
  private readonly logger: Logger;

  constructor(
    private readonly lookup: ModelLookup,
    private readonly adapters: AdapterTable,
    private readonly options: UnifiedClientOptions
  ) {
    this.logger = options.logger ?? createLogger('client', options.debug ?? false);
  }

  resolve(codename: string): ResolvedModel {
    const cached = this.routes.get(codename);
    if (cached) {
      return cached;
    }

    const descriptor = this.lookup.getModelByCodename(codename);
    if (!descriptor) {
      throw new UnsupportedModelError(`Unknown model codename: ${codename}`);
    }

    const route = resolveRoute(descriptor);
    const resolved: ResolvedModel = { ...route, adapter: this.adapters[route.provider] };
    this.routes.set(codename, resolved);
    this.logger.debug('resolved model', { codename, provider: route.provider, identifier: route.identifier });
    return resolved;
  }

  /**
   * Best-effort warm-up. Returns false instead of throwing.
   */
  async warm(codename: string): Promise<boolean> {
    try {
      const { adapter, identifier } = this.resolve(codename);
      const warmed = await adapter.warm(identifier, this.options.timeoutMs);
      this.logger.debug('warm-up finished', { codename, warmed });
      return warmed;
    } catch (error) {
      this.logger.warn(`Warm-up failed for ${codename}: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Rejects with UnsupportedModelError before any request, otherwise only
   * with a ChatError subclass.
   */
  async chat(prompt: string, codename: string, options: ChatOptions = {}): Promise<ChatResponse> {
    const { adapter, identifier, provider } = this.resolve(codename);
    const timeoutMs = options.timeoutMs ?? this.options.timeoutMs;

    this.logger.debug('chat request', {
      codename,
      provider,
      brief: options.brief ?? false,
      structured: options.schema !== undefined
    });

    try {
      const response = await adapter.chat({
        prompt,
        identifier,
        brief: options.brief ?? false,
        schema: options.schema,
        context: options.context,
        timeoutMs
      });
      this.logger.debug('chat response', { codename, ...response.usage });
      return response;
    } catch (error) {
      const chatError = toChatError(error);
      this.logger.debug('chat failed', { codename, kind: chatError.kind, message: chatError.message });
      throw chatError;
    }
  }
}

export function createClient(config: AppConfig, lookup: ModelLookup, adapters: AdapterTable = createAdapters(config)): UnifiedClient {
  return new UnifiedClient(lookup, adapters, {
    timeoutMs: config.requestTimeoutMs,
    debug: config.debug
  });
}
