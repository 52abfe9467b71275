import { parseArgs, runBenchmark, runMissingBenchmarks } from './benchmark';
import { loadConfig } from './config';
import { JsonResultStore } from './loader';
import { createLogger } from './log';
import { createClient } from './router';
import { FAILED_RUN_ID } from './runner';

export * from './types';
export * from './errors';
export { BenchmarkRunner, FAILED_RUN_ID } from './runner';
export { UnifiedClient, createClient, resolveRoute } from './router';
export { evaluateAnswer, EVALUATORS } from './evaluator';
export { JsonResultStore } from './loader';
export { createAdapters } from './adapters';
export { runBenchmark, runMissingBenchmarks, findMissingPairs } from './benchmark';
export { loadConfig, configFromEnv } from './config';

/**
 * Main runner function
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger('main', config.debug);
  const args = parseArgs(process.argv.slice(2));

  const store = new JsonResultStore({ dataDir: config.dataDir, outputDir: config.outputDir });
  const client = createClient(config, store);
  const deps = { client, store, logger };

  if (args.missing) {
    const summaries = await runMissingBenchmarks(deps);
    const failed = summaries.filter(summary => summary.runId === FAILED_RUN_ID);

    console.log(`\n${'='.repeat(60)}`);
    console.log('Summary:');
    console.log(`  Runs attempted: ${summaries.length}`);
    console.log(`  Stored: ${summaries.length - failed.length}`);
    console.log(`  Failed: ${failed.length}`);
    for (const { pair } of failed) {
      console.log(`    ${pair.model} / ${pair.benchmark}`);
    }
    return;
  }

  if (!args.benchmark || !args.model) {
    console.error('Usage: benchmark --benchmark=<code> --model=<codename>');
    console.error('       benchmark --missing');
    process.exitCode = 1;
    return;
  }

  const runId = await runBenchmark(args.benchmark, args.model, deps);
  if (runId === FAILED_RUN_ID) {
    console.error(`Run of ${args.benchmark} for ${args.model} failed`);
    process.exitCode = 1;
    return;
  }

  const stored = store.listRuns().find(run => run.runId === runId);
  console.log(`\nRun ${runId}: ${args.model} scored ${stored?.score ?? '?'} on ${args.benchmark}`);
  console.log(`Results saved to: ${config.outputDir}`);
}

if (require.main === module) {
  main().catch(error => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
