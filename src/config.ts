import * as path from 'path';
import * as dotenv from 'dotenv';

export interface AppConfig {
  openaiApiKey: string;
  anthropicApiKey: string;
  geminiApiKey: string;
  openrouterApiKey: string;
  /** Base URL of the Ollama server, without the /api suffix */
  ollamaBaseUrl: string;
  /** Base URL of the LM Studio OpenAI-compatible server, including /v1 */
  lmstudioBaseUrl: string;
  /** Hard limit for one chat call (ms) */
  requestTimeoutMs: number;
  debug: boolean;
  dataDir: string;
  outputDir: string;
}

export const DEFAULT_TIMEOUT_MS = 150_000;
// Largest delay setTimeout accepts.
export const MAX_TIMEOUT_MS = 2_147_483_647;

function parseTimeout(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_TIMEOUT_MS;
  }

  const parsed = Number.parseInt(raw, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || parsed > MAX_TIMEOUT_MS) {
    throw new Error(`Invalid BENCH_TIMEOUT_MS value: ${raw}`);
  }
  return parsed;
}

export function configFromEnv(env: NodeJS.ProcessEnv): AppConfig {
  const rootDir = path.join(__dirname, '..');

  return {
    openaiApiKey: env.OPENAI_API_KEY ?? '',
    anthropicApiKey: env.ANTHROPIC_API_KEY ?? '',
    geminiApiKey: env.GEMINI_API_KEY ?? '',
    openrouterApiKey: env.OPENROUTER_API_KEY ?? '',
    ollamaBaseUrl: (env.OLLAMA_BASE_URL ?? 'http://127.0.0.1:11434').replace(/\/+$/, ''),
    lmstudioBaseUrl: (env.LMSTUDIO_BASE_URL ?? 'http://127.0.0.1:1234/v1').replace(/\/+$/, ''),
    requestTimeoutMs: parseTimeout(env.BENCH_TIMEOUT_MS),
    debug: env.BENCH_DEBUG === '1',
    dataDir: env.BENCH_DATA_DIR ?? path.join(rootDir, 'data'),
    outputDir: env.BENCH_OUTPUT_DIR ?? path.join(rootDir, 'output')
  };
}

/**
 * Load configuration from the environment, reading .env first.
 */
export function loadConfig(): AppConfig {
  dotenv.config();
  return configFromEnv(process.env);
}
