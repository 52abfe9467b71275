import { describe, expect, it } from 'vitest';
import { EVALUATORS, evaluateAnswer } from '../src/evaluator';

describe('free text', () => {
  it('matches a substring when contains is set', () => {
    expect(evaluateAnswer('free_text', 'The capital is Paris.', 'Paris', { contains: true })).toBe(100);
    expect(evaluateAnswer('free_text', 'the capital is PARIS', 'paris', { contains: true })).toBe(100);
    expect(evaluateAnswer('free_text', 'The capital is Lyon.', 'Paris', { contains: true })).toBe(0);
  });

  it('requires trimmed case-insensitive equality otherwise', () => {
    expect(evaluateAnswer('free_text', 'The capital is Paris.', 'Paris', { contains: false })).toBe(0);
    expect(evaluateAnswer('free_text', '  paris \n', 'Paris')).toBe(100);
  });
});

describe('multiple choice', () => {
  it('reads the answer field of an object', () => {
    expect(evaluateAnswer('multiple_choice', { answer: ' mercury ' }, 'Mercury')).toBe(100);
    expect(evaluateAnswer('multiple_choice', { answer: 'Venus' }, 'Mercury')).toBe(0);
  });

  it('compares plain values as text', () => {
    expect(evaluateAnswer('multiple_choice', 'B', 'b')).toBe(100);
    expect(evaluateAnswer('multiple_choice', 6, '6')).toBe(100);
  });

  it('fails an object without an answer field', () => {
    expect(evaluateAnswer('multiple_choice', { choice: 'Mercury' }, 'Mercury')).toBe(0);
  });
});

describe('structured answers', () => {
  const expected = { a: 1, b: 2 };

  it('checks every expected key when no fields are listed', () => {
    expect(evaluateAnswer('json', { a: 1, b: 2 }, expected)).toBe(100);
    expect(evaluateAnswer('json', { a: 1, b: 2, extra: true }, expected)).toBe(100);
    expect(evaluateAnswer('json', { a: 1 }, expected)).toBe(0);
    expect(evaluateAnswer('json', { a: 1, b: 3 }, expected)).toBe(0);
  });

  it('checks only the listed fields', () => {
    expect(evaluateAnswer('json', { a: 1, b: 99 }, expected, { requiredFields: ['a'] })).toBe(100);
    expect(evaluateAnswer('json', { b: 2 }, expected, { requiredFields: ['a'] })).toBe(0);
  });

  it('checks every expected field when the field list is empty', () => {
    expect(evaluateAnswer('json', {}, expected, { requiredFields: [] })).toBe(0);
    expect(evaluateAnswer('json', { a: 1, b: 2 }, expected, { requiredFields: [] })).toBe(100);
  });

  it('compares nested values deeply', () => {
    expect(evaluateAnswer('json', { tags: ['x', 'y'] }, { tags: ['x', 'y'] })).toBe(100);
    expect(evaluateAnswer('json', { tags: ['y', 'x'] }, { tags: ['x', 'y'] })).toBe(0);
  });

  it('fails non-object answers', () => {
    expect(evaluateAnswer('json', '{"a":1,"b":2}', expected)).toBe(0);
    expect(evaluateAnswer('json', [1, 2], expected)).toBe(0);
    expect(evaluateAnswer('json', null, expected)).toBe(0);
  });

  it('fails the parse-error payload produced by adapters', () => {
    expect(evaluateAnswer('json', { error: 'Failed to parse JSON: nope' }, expected)).toBe(0);
  });
});

describe('boolean', () => {
  it('accepts only true or false', () => {
    expect(evaluateAnswer('boolean', 'True', true)).toBe(100);
    expect(evaluateAnswer('boolean', false, 'FALSE')).toBe(100);
    expect(evaluateAnswer('boolean', 'true', false)).toBe(0);
    expect(evaluateAnswer('boolean', 'yes', 'yes')).toBe(0);
  });
});

describe('numeric', () => {
  const criteria = { tolerance: 0.5 };

  it('gives two-tier partial credit when enabled', () => {
    expect(evaluateAnswer('numeric', 10.4, 10.0, criteria, { partialCredit: true })).toBe(100);
    expect(evaluateAnswer('numeric', 10.6, 10.0, criteria, { partialCredit: true })).toBe(50);
    expect(evaluateAnswer('numeric', 20, 10.0, criteria, { partialCredit: true })).toBe(0);
  });

  it('is pass or fail without partial credit', () => {
    expect(evaluateAnswer('numeric', 10.4, 10.0, criteria)).toBe(100);
    expect(evaluateAnswer('numeric', 10.6, 10.0, criteria)).toBe(0);
  });

  it('parses numeric strings and the value field', () => {
    expect(evaluateAnswer('numeric', ' 5000 ', 5000)).toBe(100);
    expect(evaluateAnswer('numeric', { value: 37.8 }, '37.78', { tolerance: 0.05 })).toBe(100);
  });

  it('fails unparseable input', () => {
    expect(evaluateAnswer('numeric', 'about ten', 10, criteria)).toBe(0);
    expect(evaluateAnswer('numeric', '', 0)).toBe(0);
    expect(evaluateAnswer('numeric', { value: 'x' }, 1)).toBe(0);
  });
});

describe('unknown answer types', () => {
  it('use exact trimmed equality', () => {
    expect(evaluateAnswer('reversed_word', ' neves ', 'neves')).toBe(100);
    expect(evaluateAnswer('reversed_word', 'Neves', 'neves')).toBe(0);
  });

  it('do not pick up object prototype keys', () => {
    expect(evaluateAnswer('toString', 'a', 'a')).toBe(100);
    expect(evaluateAnswer('constructor', 'a', 'b')).toBe(0);
  });
});

describe('evaluator table', () => {
  it('covers every declared answer type', () => {
    expect(Object.keys(EVALUATORS).sort()).toEqual(['boolean', 'free_text', 'json', 'multiple_choice', 'numeric']);
  });

  it('always returns an integer in range', () => {
    const inputs: unknown[] = ['x', 3, null, undefined, { answer: 1 }, [1], true];
    for (const type of [...Object.keys(EVALUATORS), 'other']) {
      for (const actual of inputs) {
        const score = evaluateAnswer(type, actual, 'x', { tolerance: 1, contains: true }, { partialCredit: true });
        expect(Number.isInteger(score)).toBe(true);
        expect(score).toBeGreaterThanOrEqual(0);
        expect(score).toBeLessThanOrEqual(100);
      }
    }
  });
});
