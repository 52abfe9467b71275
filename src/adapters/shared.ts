import type { JsonSchema } from '../types';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function chatMessages(prompt: string, context?: string): ChatMessage[] {
  const messages: ChatMessage[] = [];
  if (context) {
    messages.push({ role: 'system', content: context });
  }
  messages.push({ role: 'user', content: prompt });
  return messages;
}

const FENCED_JSON = /```(?:json)?\s*([\s\S]*?)\s*```/;

/**
 * Parse the body of a schema-driven answer. Models often wrap JSON in a
 * markdown fence; the fence is dropped first. Text that does not parse into a
 * JSON object becomes an `error` entry so the evaluator fails the question.
 */
export function parseStructured(text: string): Record<string, unknown> {
  const fenced = FENCED_JSON.exec(text);
  const jsonText = fenced ? fenced[1] : text.trim();

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonText);
  } catch {
    return { error: `Failed to parse JSON: ${text}` };
  }

  if (!isRecord(parsed)) {
    return { error: `Expected a JSON object: ${text}` };
  }
  return parsed;
}

export interface SchemaRewrite {
  /** Keywords removed at every level */
  drop: string[];
  /** Close every object and mark all of its properties required */
  strictObjects: boolean;
}

/**
 * Rewrite a JSON schema for a provider that accepts only a subset of the
 * keywords. Returns a new object; the input is left untouched.
 */
export function rewriteSchema(schema: JsonSchema, rewrite: SchemaRewrite): JsonSchema {
  const result: JsonSchema = {};

  for (const [key, value] of Object.entries(schema)) {
    if (rewrite.drop.includes(key)) {
      continue;
    }

    if (key === 'properties' && isRecord(value)) {
      const properties: JsonSchema = {};
      for (const [name, property] of Object.entries(value)) {
        properties[name] = isRecord(property) ? rewriteSchema(property, rewrite) : property;
      }
      result.properties = properties;
      continue;
    }

    if (key === 'items' && isRecord(value)) {
      result.items = rewriteSchema(value, rewrite);
      continue;
    }

    result[key] = value;
  }

  if (rewrite.strictObjects && isRecord(result.properties)) {
    result.additionalProperties = false;
    result.required = Object.keys(result.properties);
  }

  return result;
}
