export type BackendKind = 'local' | 'remote';

export type ProviderKind = 'openai' | 'anthropic' | 'gemini' | 'openrouter' | 'ollama' | 'lmstudio';

export interface ModelDescriptor {
  codename: string;
  backend: BackendKind;
  identifier: string;
  quantization?: string;
  displayName?: string;
}

export type AnswerType = 'free_text' | 'multiple_choice' | 'json' | 'boolean' | 'numeric';

export type JsonSchema = Record<string, unknown>;

export interface EvaluationCriteria {
  contains?: boolean;
  requiredFields?: string[];
  tolerance?: number;
}

export interface QuestionInfo {
  questionText: string;
  // Kept as a plain string: unknown types fall through to exact matching.
  answerType: string;
  correctAnswer: unknown;
  choices?: string[];
  schema?: JsonSchema;
  evaluationCriteria?: EvaluationCriteria;
  category?: string;
  difficulty?: 'easy' | 'medium' | 'hard';
}

export interface BenchmarkQuestion {
  questionId: string;
  questionInfo: QuestionInfo;
}

export interface Usage {
  tokensIn: number;
  tokensOut: number;
  cost: number;
  totalMsec: number;
}

export interface ChatResponse {
  responseText: string;
  structuredData: Record<string, unknown>;
  usage: Usage;
}

export interface ChatOptions {
  brief?: boolean;
  schema?: JsonSchema;
  context?: string;
  timeoutMs?: number;
}

export interface DebugPayload {
  prompt?: string;
  response?: unknown;
  expected?: unknown;
  isCorrect?: boolean;
  failure?: string;
  details?: string;
}

export interface QuestionResult {
  questionId: string;
  score: number;
  evalMsec: number;
  debug?: DebugPayload;
}

export interface RunRecord {
  runId: number;
  model: string;
  benchmark: string;
  score: number;
  timestamp: string;
  results: QuestionResult[];
}

export type InsertRunResult =
  | { success: true; runId: number }
  | { success: false; error: string };

export interface ModelLookup {
  getModelByCodename(codename: string): ModelDescriptor | undefined;
}

export interface ResultStore extends ModelLookup {
  loadAllQuestionsForBenchmark(benchmarkId: string): BenchmarkQuestion[];
  insertRun(model: string, benchmark: string, score: number, details: QuestionResult[]): InsertRunResult;
  listModels(): ModelDescriptor[];
  listRuns(): RunRecord[];
}

export type StrategyName = 'question_text' | 'multiple_choice' | 'unit_conversion' | 'spell_check';

export interface BenchmarkDefinition {
  code: string;
  name: string;
  description?: string;
  strategy: StrategyName;
  scoreMultiplier?: number;
  numericPartialCredit?: boolean;
}

/** Prompt text, optional response schema and optional system context for one question. */
export interface PreparedPrompt {
  prompt: string;
  schema?: JsonSchema;
  context?: string;
}

export interface BenchmarkRegistry {
  getBenchmark(code: string): BenchmarkDefinition | undefined;
  listBenchmarks(): BenchmarkDefinition[];
}
