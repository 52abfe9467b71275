import { isDeepStrictEqual } from 'util';
import type { AnswerType, EvaluationCriteria } from './types';

export interface EvaluationInput {
  actual: unknown;
  expected: unknown;
  criteria: EvaluationCriteria;
  partialCredit: boolean;
}

/** Returns an integer score in [0, 100]. Must not throw. */
export type Evaluator = (input: EvaluationInput) => number;

const PASS = 100;
const HALF = 50;
const FAIL = 0;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asText(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

function normalized(value: unknown): string {
  return asText(value).trim().toLowerCase();
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

const freeText: Evaluator = ({ actual, expected, criteria }) => {
  const actualText = normalized(actual);
  const expectedText = normalized(expected);
  if (criteria.contains) {
    return actualText.includes(expectedText) ? PASS : FAIL;
  }
  return actualText === expectedText ? PASS : FAIL;
};

const multipleChoice: Evaluator = ({ actual, expected }) => {
  const chosen = isRecord(actual) && 'answer' in actual ? actual.answer : actual;
  return normalized(chosen) === normalized(expected) ? PASS : FAIL;
};

const structured: Evaluator = ({ actual, expected, criteria }) => {
  if (!isRecord(actual)) {
    return FAIL;
  }
  const expectedFields = isRecord(expected) ? expected : {};
  const required =
    criteria.requiredFields && criteria.requiredFields.length > 0
      ? criteria.requiredFields
      : Object.keys(expectedFields);

  for (const field of required) {
    if (!(field in actual)) {
      return FAIL;
    }
    if (!isDeepStrictEqual(actual[field], expectedFields[field])) {
      return FAIL;
    }
  }
  return PASS;
};

const booleanAnswer: Evaluator = ({ actual, expected }) => {
  const actualText = normalized(actual);
  if (actualText !== 'true' && actualText !== 'false') {
    return FAIL;
  }
  return actualText === normalized(expected) ? PASS : FAIL;
};

const numeric: Evaluator = ({ actual, expected, criteria, partialCredit }) => {
  const actualNumber = toNumber(isRecord(actual) && 'value' in actual ? actual.value : actual);
  const expectedNumber = toNumber(expected);
  if (actualNumber === undefined || expectedNumber === undefined) {
    return FAIL;
  }

  const tolerance = criteria.tolerance ?? 0;
  const difference = Math.abs(actualNumber - expectedNumber);
  if (difference <= tolerance) {
    return PASS;
  }
  if (partialCredit && difference <= tolerance * 3) {
    return HALF;
  }
  return FAIL;
};

const exactMatch: Evaluator = ({ actual, expected }) => (asText(actual).trim() === asText(expected).trim() ? PASS : FAIL);

export const EVALUATORS = {
  free_text: freeText,
  multiple_choice: multipleChoice,
  json: structured,
  boolean: booleanAnswer,
  numeric
} satisfies Record<AnswerType, Evaluator>;

function isAnswerType(value: string): value is AnswerType {
  return Object.prototype.hasOwnProperty.call(EVALUATORS, value);
}

export interface EvaluateOptions {
  partialCredit?: boolean;
}

/**
 * Score one answer. Unknown answer types fall back to exact trimmed string
 * equality.
 */
export function evaluateAnswer(
  answerType: string,
  actual: unknown,
  expected: unknown,
  criteria: EvaluationCriteria = {},
  options: EvaluateOptions = {}
): number {
  const evaluator: Evaluator = isAnswerType(answerType) ? EVALUATORS[answerType] : exactMatch;
  try {
    return evaluator({ actual, expected, criteria, partialCredit: options.partialCredit ?? false });
  } catch {
    return FAIL;
  }
}
