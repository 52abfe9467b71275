import { performance } from 'perf_hooks';
import { PersistenceFailureError, TimeoutError, errorMessage } from './errors';
import { evaluateAnswer } from './evaluator';
import { type Logger, createLogger } from './log';
import type { UnifiedClient } from './router';
import { strategyFor } from './strategies';
import type {
  BenchmarkDefinition,
  BenchmarkQuestion,
  PreparedPrompt,
  QuestionResult,
  ResultStore
} from './types';

/** Returned instead of a run id when nothing could be run or stored. */
export const FAILED_RUN_ID = -1;

export type RunnerClient = Pick<UnifiedClient, 'resolve' | 'warm' | 'chat'>;

export interface RunnerDeps {
  client: RunnerClient;
  store: ResultStore;
  logger?: Logger;
}

function clampScore(score: number): number {
  if (!Number.isFinite(score)) {
    return 0;
  }
  return Math.min(100, Math.max(0, Math.round(score)));
}

/**
 * Runs one benchmark against one model: load, warm, ask every question in
 * order, score and persist.
 */
export class BenchmarkRunner {
  private readonly client: RunnerClient;
  private readonly store: ResultStore;
  private readonly logger: Logger;

  constructor(
    readonly model: string,
    readonly definition: BenchmarkDefinition,
    deps: RunnerDeps
  ) {
    this.client = deps.client;
    this.store = deps.store;
    this.logger = deps.logger ?? createLogger(`bench:${definition.code}`);
  }

  /**
   * A store failure is reported as an empty question set.
   */
  loadQuestions(): BenchmarkQuestion[] {
    try {
      return this.store.loadAllQuestionsForBenchmark(this.definition.code);
    } catch (error) {
      this.logger.error(`Failed to load questions: ${errorMessage(error)}`);
      return [];
    }
  }

  async warmUp(): Promise<boolean> {
    return this.client.warm(this.model);
  }

  preparePrompt(question: BenchmarkQuestion): PreparedPrompt {
    return strategyFor(this.definition.strategy)(question);
  }

  /**
   * Never rejects: failures become zero-score results.
   */
  async processQuestion(question: BenchmarkQuestion): Promise<QuestionResult> {
    const { questionId, questionInfo } = question;
    const prepared = this.preparePrompt(question);
    const start = performance.now();

    try {
      const response = await this.client.chat(prepared.prompt, this.model, {
        schema: prepared.schema,
        context: prepared.context
      });
      const evalMsec = Math.round(performance.now() - start);

      const answer = prepared.schema ? response.structuredData : response.responseText;
      const score = clampScore(
        evaluateAnswer(questionInfo.answerType, answer, questionInfo.correctAnswer, questionInfo.evaluationCriteria, {
          partialCredit: this.definition.numericPartialCredit ?? false
        })
      );

      this.logger.info(`${questionId}: ${score === 100 ? '✓ PASS' : `✗ ${score}`}`);

      return {
        questionId,
        score,
        evalMsec,
        debug: {
          prompt: prepared.prompt,
          response: answer,
          expected: questionInfo.correctAnswer,
          isCorrect: score === 100
        }
      };
    } catch (error) {
      const evalMsec = Math.round(performance.now() - start);
      const failure = error instanceof TimeoutError ? 'timeout' : errorMessage(error);
      this.logger.warn(`${questionId}: failed (${failure})`);

      return {
        questionId,
        score: 0,
        evalMsec,
        debug: {
          prompt: prepared.prompt,
          failure,
          details: errorMessage(error)
        }
      };
    }
  }

  calculateScore(results: QuestionResult[]): number {
    if (results.length === 0) {
      return 0;
    }

    const multiplier = this.definition.scoreMultiplier ?? 1;
    if (multiplier > 1) {
      const total = results.reduce((sum, result) => sum + result.score, 0);
      return Math.min(100, Math.floor((multiplier * total) / 100));
    }

    const correct = results.filter(result => result.score === 100).length;
    return Math.floor((100 * correct) / results.length);
  }

  saveResults(score: number, results: QuestionResult[]): number {
    try {
      const inserted = this.store.insertRun(this.model, this.definition.code, score, results);
      if (inserted.success) {
        return inserted.runId;
      }
      throw new PersistenceFailureError(inserted.error);
    } catch (error) {
      this.logger.error(`Failed to save run: ${errorMessage(error)}`);
      return FAILED_RUN_ID;
    }
  }

  /**
   * Ask the first `count` questions without persisting anything.
   */
  async runSample(count: number): Promise<QuestionResult[]> {
    const questions = this.loadQuestions().slice(0, Math.max(0, count));
    const results: QuestionResult[] = [];
    for (const question of questions) {
      results.push(await this.processQuestion(question));
    }
    return results;
  }

  /**
   * Rejects only with UnsupportedModelError, before any model call.
   */
  async run(): Promise<number> {
    this.client.resolve(this.model);

    const questions = this.loadQuestions();
    if (questions.length === 0) {
      this.logger.error(`No questions for benchmark ${this.definition.code}`);
      return FAILED_RUN_ID;
    }

    this.logger.info(`Running ${questions.length} questions against ${this.model}`);
    await this.warmUp();

    const results: QuestionResult[] = [];
    for (const question of questions) {
      results.push(await this.processQuestion(question));
    }

    const score = this.calculateScore(results);
    const runId = this.saveResults(score, results);
    this.logger.info(`Score ${score} (run ${runId})`);
    return runId;
  }
}
