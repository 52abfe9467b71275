import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { JsonResultStore, loadQuestions, parseRunFileName, sanitizeFileName, writeJsonAtomic } from '../src/loader';
import type { QuestionResult } from '../src/types';

let tempDir: string;

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'bench-store-'));
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

function writeJson(relativePath: string, data: unknown): string {
  const filePath = path.join(tempDir, relativePath);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(data), 'utf-8');
  return filePath;
}

function storeWithData(): JsonResultStore {
  writeJson('data/models.json', [
    { codename: 'gemma', backend: 'local', identifier: 'gemma3:Q4_0', quantization: 'Q4_0' },
    { codename: 'mini', backend: 'remote', identifier: 'gpt-4o-mini' }
  ]);
  writeJson('data/benchmarks.json', [{ code: 'capitals', name: 'Capitals', strategy: 'question_text' }]);
  writeJson('data/questions/capitals.json', [
    {
      questionId: 'capitals-01',
      questionInfo: { questionText: 'Capital of France?', answerType: 'free_text', correctAnswer: 'Paris' }
    }
  ]);
  return new JsonResultStore({ dataDir: path.join(tempDir, 'data'), outputDir: path.join(tempDir, 'output') });
}

describe('loader helpers', () => {
  it('sanitizes invalid filename characters', () => {
    expect(sanitizeFileName('a/b:c*d?e"f<g>h|i\\j')).toBe('a_b_c_d_e_f_g_h_i_j');
  });

  it('parses run file names', () => {
    expect(parseRunFileName('12.json')).toBe(12);
    expect(parseRunFileName('12.json.42.tmp')).toBeUndefined();
    expect(parseRunFileName('notes.json')).toBeUndefined();
  });

  it('writes JSON without leaving a temp file', () => {
    const target = path.join(tempDir, 'nested', 'out.json');

    writeJsonAtomic(target, { a: 1 });

    expect(JSON.parse(fs.readFileSync(target, 'utf-8'))).toEqual({ a: 1 });
    expect(fs.readdirSync(path.dirname(target))).toEqual(['out.json']);
  });

  it('rejects a question that does not match the schema', () => {
    const filePath = writeJson('bad.json', [
      { questionId: 'ok', questionInfo: { questionText: 'q', answerType: 'free_text', correctAnswer: 'a' } },
      { questionId: 'broken', questionInfo: { questionText: 'q', answerType: 'free_text' } }
    ]);

    expect(() => loadQuestions(filePath)).toThrow(`Invalid question #1 in ${filePath}`);
  });

  it('rejects a question file that is not an array', () => {
    const filePath = writeJson('object.json', { questions: [] });

    expect(() => loadQuestions(filePath)).toThrow(`Invalid question file ${filePath}: expected an array`);
  });
});

describe('JsonResultStore', () => {
  it('looks up models, benchmarks and questions', () => {
    const store = storeWithData();

    expect(store.getModelByCodename('gemma')).toEqual({
      codename: 'gemma',
      backend: 'local',
      identifier: 'gemma3:Q4_0',
      quantization: 'Q4_0'
    });
    expect(store.getModelByCodename('nobody')).toBeUndefined();
    expect(store.getBenchmark('capitals')?.strategy).toBe('question_text');
    expect(store.loadAllQuestionsForBenchmark('capitals').map(entry => entry.questionId)).toEqual(['capitals-01']);
  });

  it('returns no questions for a benchmark without a file', () => {
    expect(storeWithData().loadAllQuestionsForBenchmark('unknown')).toEqual([]);
  });

  it('rejects a model registry with an unknown backend', () => {
    writeJson('data/models.json', [{ codename: 'x', backend: 'cloud', identifier: 'x' }]);
    const store = new JsonResultStore({ dataDir: path.join(tempDir, 'data'), outputDir: tempDir });

    expect(() => store.listModels()).toThrow('Invalid model registry');
  });

  it('numbers runs sequentially and reads them back', () => {
    const store = storeWithData();
    const results: QuestionResult[] = [
      { questionId: 'capitals-01', score: 100, evalMsec: 12, debug: { prompt: 'q', response: 'Paris', isCorrect: true } },
      { questionId: 'capitals-02', score: 0, evalMsec: 150000, debug: { prompt: 'q', failure: 'timeout' } }
    ];

    expect(store.insertRun('gemma', 'capitals', 50, results)).toEqual({ success: true, runId: 1 });
    expect(store.insertRun('mini', 'capitals', 100, [])).toEqual({ success: true, runId: 2 });

    const runs = store.listRuns();
    expect(runs.map(run => [run.runId, run.model, run.score])).toEqual([
      [1, 'gemma', 50],
      [2, 'mini', 100]
    ]);
    expect(runs[0].results).toEqual(results);
    expect(fs.readdirSync(path.join(tempDir, 'output', 'runs')).sort()).toEqual(['1.json', '2.json']);
  });

  it('continues numbering after existing runs', () => {
    const store = storeWithData();
    writeJson('output/runs/9.json', {
      runId: 9,
      model: 'gemma',
      benchmark: 'capitals',
      score: 0,
      timestamp: '2026-01-01T00:00:00.000Z',
      results: []
    });

    expect(store.insertRun('gemma', 'capitals', 0, [])).toEqual({ success: true, runId: 10 });
  });

  it('reports a write failure instead of throwing', () => {
    const blocker = path.join(tempDir, 'blocker');
    fs.writeFileSync(blocker, 'not a directory', 'utf-8');
    const store = new JsonResultStore({ dataDir: tempDir, outputDir: blocker });

    const inserted = store.insertRun('gemma', 'capitals', 0, []);

    expect(inserted.success).toBe(false);
  });
});

describe('bundled data', () => {
  it('passes validation and gives every benchmark questions', () => {
    const root = path.join(__dirname, '..');
    const store = new JsonResultStore({ dataDir: path.join(root, 'data'), outputDir: tempDir });

    expect(store.listModels().length).toBeGreaterThan(0);
    for (const benchmark of store.listBenchmarks()) {
      expect(store.loadAllQuestionsForBenchmark(benchmark.code).length).toBeGreaterThan(0);
    }
  });
});
