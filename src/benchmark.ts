import { UnsupportedModelError, errorMessage } from './errors';
import { type Logger, createLogger } from './log';
import { BenchmarkRunner, FAILED_RUN_ID, type RunnerClient } from './runner';
import type { BenchmarkRegistry, ResultStore, RunRecord } from './types';

export interface PendingPair {
  model: string;
  benchmark: string;
}

export interface BenchmarkDeps {
  client: RunnerClient;
  store: ResultStore & BenchmarkRegistry;
  logger?: Logger;
}

export interface CliArgs {
  benchmark?: string;
  model?: string;
  missing: boolean;
}

function getValueFromArgs(args: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  const arg = args.find(value => value.startsWith(prefix));
  if (!arg) {
    return undefined;
  }

  const value = arg.slice(prefix.length).trim();
  if (value.length === 0) {
    throw new Error(`Invalid --${name} value: ${value}`);
  }
  return value;
}

export function parseArgs(args: string[]): CliArgs {
  return {
    benchmark: getValueFromArgs(args, 'benchmark'),
    model: getValueFromArgs(args, 'model'),
    missing: args.includes('--missing')
  };
}

/**
 * Run one benchmark for one model. Unknown benchmarks and unsupported models
 * yield FAILED_RUN_ID.
 */
export async function runBenchmark(code: string, model: string, deps: BenchmarkDeps): Promise<number> {
  const logger = deps.logger ?? createLogger('benchmark');
  const definition = deps.store.getBenchmark(code);
  if (!definition) {
    logger.error(`Unknown benchmark: ${code}`);
    return FAILED_RUN_ID;
  }

  const runner = new BenchmarkRunner(model, definition, {
    client: deps.client,
    store: deps.store,
    logger: deps.logger
  });

  try {
    return await runner.run();
  } catch (error) {
    if (error instanceof UnsupportedModelError) {
      logger.error(`Skipping ${code} for ${model}: ${error.message}`);
      return FAILED_RUN_ID;
    }
    throw error;
  }
}

/**
 * Every (model, benchmark) pair without a stored run, in registry order.
 */
export function findMissingPairs(models: string[], benchmarks: string[], runs: RunRecord[]): PendingPair[] {
  const completed = new Set(runs.map(run => `${run.model}\u0000${run.benchmark}`));
  const pending: PendingPair[] = [];

  for (const model of models) {
    for (const benchmark of benchmarks) {
      if (!completed.has(`${model}\u0000${benchmark}`)) {
        pending.push({ model, benchmark });
      }
    }
  }

  return pending;
}

export interface MissingRunSummary {
  pair: PendingPair;
  runId: number;
}

export async function runMissingBenchmarks(deps: BenchmarkDeps): Promise<MissingRunSummary[]> {
  const logger = deps.logger ?? createLogger('benchmark');
  const pending = findMissingPairs(
    deps.store.listModels().map(model => model.codename),
    deps.store.listBenchmarks().map(benchmark => benchmark.code),
    deps.store.listRuns()
  );

  logger.info(`${pending.length} missing runs`);

  const summaries: MissingRunSummary[] = [];
  for (const pair of pending) {
    let runId: number;
    try {
      runId = await runBenchmark(pair.benchmark, pair.model, deps);
    } catch (error) {
      logger.error(`Run ${pair.benchmark}/${pair.model} aborted: ${errorMessage(error)}`);
      runId = FAILED_RUN_ID;
    }
    summaries.push({ pair, runId });
  }
  return summaries;
}
