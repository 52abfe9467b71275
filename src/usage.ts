import type { ProviderKind, Usage } from './types';

interface TokenRate {
  match: string;
  input: number;
  output: number;
}

// USD per million tokens. First match wins, so narrower names come first.
const TOKEN_RATES: TokenRate[] = [
  { match: 'gpt-4o-mini', input: 0.15, output: 0.6 },
  { match: 'gpt-4o', input: 2.5, output: 10 },
  { match: 'claude-3-haiku', input: 0.25, output: 1.25 },
  { match: 'haiku', input: 0.8, output: 4 },
  { match: 'sonnet', input: 3, output: 15 },
  { match: 'opus', input: 15, output: 75 },
  { match: 'gemini-2.5-flash', input: 0.3, output: 2.5 },
  { match: 'gemini-2.5-pro', input: 1.25, output: 10 }
];

// Local inference is priced by compute time.
export const LOCAL_COST_PER_SECOND = 0.000_05;

const LOCAL_PROVIDERS: ReadonlySet<ProviderKind> = new Set<ProviderKind>(['ollama', 'lmstudio']);

export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export interface CostInput {
  provider: ProviderKind;
  model: string;
  tokensIn: number;
  tokensOut: number;
  totalMsec: number;
}

export function estimateCost(input: CostInput): number {
  if (LOCAL_PROVIDERS.has(input.provider)) {
    return Number(((input.totalMsec / 1000) * LOCAL_COST_PER_SECOND).toFixed(6));
  }

  const modelLower = input.model.toLowerCase();
  const rate = TOKEN_RATES.find(entry => modelLower.includes(entry.match));
  if (!rate) {
    return 0;
  }

  const cost = (input.tokensIn / 1_000_000) * rate.input + (input.tokensOut / 1_000_000) * rate.output;
  return Number(cost.toFixed(6));
}

/**
 * Build a Usage value, estimating cost unless the provider reported one.
 */
export function buildUsage(
  provider: ProviderKind,
  model: string,
  counts: { tokensIn?: number; tokensOut?: number; totalMsec: number; reportedCost?: number }
): Usage {
  const tokensIn = isFiniteNumber(counts.tokensIn) ? counts.tokensIn : 0;
  const tokensOut = isFiniteNumber(counts.tokensOut) ? counts.tokensOut : 0;
  const cost = isFiniteNumber(counts.reportedCost)
    ? counts.reportedCost
    : estimateCost({ provider, model, tokensIn, tokensOut, totalMsec: counts.totalMsec });

  return { tokensIn, tokensOut, cost, totalMsec: counts.totalMsec };
}
