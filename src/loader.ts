import * as fs from 'fs';
import * as path from 'path';
import Ajv, { type ValidateFunction } from 'ajv';
import { errorMessage } from './errors';
import type {
  BenchmarkDefinition,
  BenchmarkQuestion,
  BenchmarkRegistry,
  InsertRunResult,
  ModelDescriptor,
  QuestionResult,
  ResultStore,
  RunRecord
} from './types';

const ajv = new Ajv({ allErrors: true });
const schemaDir = path.join(__dirname, '../schemas');

function compileSchema<T>(fileName: string): ValidateFunction<T> {
  const schema = JSON.parse(fs.readFileSync(path.join(schemaDir, fileName), 'utf-8'));
  return ajv.compile<T>(schema);
}

const validateQuestion = compileSchema<BenchmarkQuestion>('question.schema.json');
const validateModels = compileSchema<ModelDescriptor[]>('model.schema.json');
const validateBenchmarks = compileSchema<BenchmarkDefinition[]>('benchmark.schema.json');
const validateRun = compileSchema<RunRecord>('run.schema.json');

function readJson(filePath: string): unknown {
  return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
}

function describeErrors(validate: ValidateFunction): string {
  return ajv.errorsText(validate.errors);
}

/**
 * Load and validate the questions of one benchmark file
 */
export function loadQuestions(filePath: string): BenchmarkQuestion[] {
  const data = readJson(filePath);
  if (!Array.isArray(data)) {
    throw new Error(`Invalid question file ${filePath}: expected an array`);
  }

  return data.map((entry: unknown, index) => {
    if (!validateQuestion(entry)) {
      throw new Error(`Invalid question #${index} in ${filePath}: ${describeErrors(validateQuestion)}`);
    }
    return entry;
  });
}

/**
 * Load and validate the model registry
 */
export function loadModels(filePath: string): ModelDescriptor[] {
  const data = readJson(filePath);
  if (!validateModels(data)) {
    throw new Error(`Invalid model registry ${filePath}: ${describeErrors(validateModels)}`);
  }
  return data;
}

/**
 * Load and validate benchmark definitions
 */
export function loadBenchmarks(filePath: string): BenchmarkDefinition[] {
  const data = readJson(filePath);
  if (!validateBenchmarks(data)) {
    throw new Error(`Invalid benchmark definitions ${filePath}: ${describeErrors(validateBenchmarks)}`);
  }
  return data;
}

/**
 * Ensure output directory exists
 */
export function ensureOutputDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

/**
 * Sanitize text for safe file names
 */
export function sanitizeFileName(value: string): string {
  return value.replace(/[\\/:*?"<>|]/g, '_');
}

/**
 * Write JSON next to its destination first, then rename over it, so readers
 * never see a partial file.
 */
export function writeJsonAtomic(filePath: string, data: unknown): void {
  ensureOutputDir(path.dirname(filePath));
  const tempPath = `${filePath}.${process.pid}.tmp`;
  fs.writeFileSync(tempPath, JSON.stringify(data, null, 2), 'utf-8');
  fs.renameSync(tempPath, filePath);
}

const RUN_FILE = /^(\d+)\.json$/;

export function parseRunFileName(fileName: string): number | undefined {
  const match = RUN_FILE.exec(fileName);
  return match ? Number.parseInt(match[1], 10) : undefined;
}

export interface JsonStorePaths {
  /** Holds models.json, benchmarks.json and questions/<code>.json */
  dataDir: string;
  /** Runs are written to <outputDir>/runs/<runId>.json */
  outputDir: string;
}

/**
 * Result store backed by JSON files. Reference data is read once and cached;
 * runs are read from disk on every call.
 */
export class JsonResultStore implements ResultStore, BenchmarkRegistry {
  private models?: ModelDescriptor[];
  private benchmarks?: BenchmarkDefinition[];
  private readonly questions = new Map<string, BenchmarkQuestion[]>();

  constructor(private readonly paths: JsonStorePaths) {}

  private get runsDir(): string {
    return path.join(this.paths.outputDir, 'runs');
  }

  listModels(): ModelDescriptor[] {
    if (!this.models) {
      this.models = loadModels(path.join(this.paths.dataDir, 'models.json'));
    }
    return this.models;
  }

  getModelByCodename(codename: string): ModelDescriptor | undefined {
    return this.listModels().find(model => model.codename === codename);
  }

  listBenchmarks(): BenchmarkDefinition[] {
    if (!this.benchmarks) {
      this.benchmarks = loadBenchmarks(path.join(this.paths.dataDir, 'benchmarks.json'));
    }
    return this.benchmarks;
  }

  getBenchmark(code: string): BenchmarkDefinition | undefined {
    return this.listBenchmarks().find(benchmark => benchmark.code === code);
  }

  /**
   * A benchmark without a question file has no questions.
   */
  loadAllQuestionsForBenchmark(benchmarkId: string): BenchmarkQuestion[] {
    const cached = this.questions.get(benchmarkId);
    if (cached) {
      return cached;
    }

    const filePath = path.join(this.paths.dataDir, 'questions', `${sanitizeFileName(benchmarkId)}.json`);
    if (!fs.existsSync(filePath)) {
      return [];
    }

    const loaded = loadQuestions(filePath);
    this.questions.set(benchmarkId, loaded);
    return loaded;
  }

  private runIds(): number[] {
    if (!fs.existsSync(this.runsDir)) {
      return [];
    }
    return fs
      .readdirSync(this.runsDir)
      .map(parseRunFileName)
      .filter((id): id is number => id !== undefined)
      .sort((a, b) => a - b);
  }

  insertRun(model: string, benchmark: string, score: number, details: QuestionResult[]): InsertRunResult {
    try {
      const ids = this.runIds();
      const runId = ids.length === 0 ? 1 : ids[ids.length - 1] + 1;
      const record: RunRecord = {
        runId,
        model,
        benchmark,
        score,
        timestamp: new Date().toISOString(),
        results: details
      };

      writeJsonAtomic(path.join(this.runsDir, `${runId}.json`), record);
      return { success: true, runId };
    } catch (error) {
      return { success: false, error: errorMessage(error) };
    }
  }

  listRuns(): RunRecord[] {
    return this.runIds().map(runId => {
      const filePath = path.join(this.runsDir, `${runId}.json`);
      const data = readJson(filePath);
      if (!validateRun(data)) {
        throw new Error(`Invalid run file ${filePath}: ${describeErrors(validateRun)}`);
      }
      return data;
    });
  }
}
