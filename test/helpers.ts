import { vi } from 'vitest';
import type { AdapterChatRequest } from '../src/adapters/types';
import type {
  BenchmarkDefinition,
  BenchmarkQuestion,
  BenchmarkRegistry,
  ChatResponse,
  InsertRunResult,
  ModelDescriptor,
  ModelLookup,
  ProviderKind,
  QuestionInfo,
  QuestionResult,
  ResultStore,
  RunRecord
} from '../src/types';

export const MODELS: ModelDescriptor[] = [
  { codename: 'mini', backend: 'remote', identifier: 'gpt-4o-mini' },
  { codename: 'reasoner', backend: 'remote', identifier: 'o3-mini' },
  { codename: 'haiku', backend: 'remote', identifier: 'claude-3-5-haiku-latest' },
  { codename: 'flash', backend: 'remote', identifier: 'gemini-2.5-flash' },
  { codename: 'scout', backend: 'remote', identifier: 'openrouter/meta-llama/llama-4-scout' },
  { codename: 'mystery', backend: 'remote', identifier: 'mistral-large' },
  { codename: 'gemma', backend: 'local', identifier: 'gemma3:Q4_0', quantization: 'Q4_0' },
  { codename: 'plain-local', backend: 'local', identifier: 'phi4' },
  { codename: 'qwen-lms', backend: 'local', identifier: 'lmstudio/qwen2.5-7b-instruct' }
];

export function textResponse(responseText: string): ChatResponse {
  return {
    responseText,
    structuredData: {},
    usage: { tokensIn: 3, tokensOut: 2, cost: 0, totalMsec: 5 }
  };
}

export function structuredResponse(structuredData: Record<string, unknown>): ChatResponse {
  return {
    responseText: '',
    structuredData,
    usage: { tokensIn: 3, tokensOut: 2, cost: 0, totalMsec: 5 }
  };
}

export function fakeAdapter(provider: ProviderKind) {
  return {
    provider,
    warm: vi.fn(async (_identifier: string, _timeoutMs: number) => true),
    chat: vi.fn(async (_request: AdapterChatRequest): Promise<ChatResponse> => textResponse('ok'))
  };
}

export function fakeAdapters() {
  return {
    openai: fakeAdapter('openai'),
    anthropic: fakeAdapter('anthropic'),
    gemini: fakeAdapter('gemini'),
    openrouter: fakeAdapter('openrouter'),
    ollama: fakeAdapter('ollama'),
    lmstudio: fakeAdapter('lmstudio')
  };
}

export function fakeLookup(models: ModelDescriptor[] = MODELS) {
  return {
    getModelByCodename: vi.fn((codename: string) => models.find(model => model.codename === codename))
  } satisfies ModelLookup;
}

export function spyLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  };
}

export function question(questionId: string, info: Partial<QuestionInfo> = {}): BenchmarkQuestion {
  return {
    questionId,
    questionInfo: {
      questionText: `Question ${questionId}`,
      answerType: 'free_text',
      correctAnswer: 'yes',
      ...info
    }
  };
}

export function fakeStore(
  questions: BenchmarkQuestion[] = [],
  options: { benchmarks?: BenchmarkDefinition[]; runs?: RunRecord[]; insert?: InsertRunResult } = {}
) {
  return {
    getModelByCodename: (codename: string) => MODELS.find(model => model.codename === codename),
    loadAllQuestionsForBenchmark: vi.fn((_benchmarkId: string) => questions),
    insertRun: vi.fn(
      (_model: string, _benchmark: string, _score: number, _details: QuestionResult[]): InsertRunResult =>
        options.insert ?? { success: true, runId: 7 }
    ),
    listModels: () => MODELS,
    listRuns: () => options.runs ?? [],
    getBenchmark: (code: string) => options.benchmarks?.find(benchmark => benchmark.code === code),
    listBenchmarks: () => options.benchmarks ?? []
  } satisfies ResultStore & BenchmarkRegistry;
}
