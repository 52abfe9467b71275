import type { BenchmarkQuestion, JsonSchema, PreparedPrompt, StrategyName } from './types';

export type PromptStrategy = (question: BenchmarkQuestion) => PreparedPrompt;

const MULTIPLE_CHOICE_SCHEMA: JsonSchema = {
  type: 'object',
  properties: {
    answer: { type: 'string', description: 'The chosen option, copied exactly' }
  },
  required: ['answer']
};

const UNIT_CONVERSION_SCHEMA: JsonSchema = {
  type: 'object',
  properties: {
    value: { type: 'number', description: 'The converted quantity as a plain number' }
  },
  required: ['value']
};

const UNIT_CONVERSION_CONTEXT =
  'You convert quantities between units. Answer with the numeric value only, in the unit requested, without rounding beyond two decimals.';

const SPELL_CHECK_CONTEXT =
  'You are a careful proofreader. Report only genuine spelling mistakes and their corrections, in the format requested.';

const questionText: PromptStrategy = ({ questionInfo }) => ({
  prompt: questionInfo.questionText,
  schema: questionInfo.schema
});

const multipleChoice: PromptStrategy = ({ questionInfo }) => {
  const choices = questionInfo.choices ?? [];
  const options = choices.map((choice, index) => `${index + 1}. ${choice}`).join('\n');

  return {
    prompt: `${questionInfo.questionText}\n\nOptions:\n${options}\n\nReply with the text of the correct option.`,
    schema: MULTIPLE_CHOICE_SCHEMA
  };
};

const unitConversion: PromptStrategy = ({ questionInfo }) => ({
  prompt: questionInfo.questionText,
  schema: UNIT_CONVERSION_SCHEMA,
  context: UNIT_CONVERSION_CONTEXT
});

const spellCheck: PromptStrategy = ({ questionInfo }) => ({
  prompt: questionInfo.questionText,
  schema: questionInfo.schema,
  context: SPELL_CHECK_CONTEXT
});

export const STRATEGIES = {
  question_text: questionText,
  multiple_choice: multipleChoice,
  unit_conversion: unitConversion,
  spell_check: spellCheck
} satisfies Record<StrategyName, PromptStrategy>;

export function strategyFor(name: StrategyName): PromptStrategy {
  return STRATEGIES[name];
}
