/**
 * Prompt text for model-backed units
 */

import type { TaskInput } from '../types/index.js';

const PROMPT_KEYS = ['prompt', 'question', 'query', 'input'] as const;

/**
 * The sample input as a user message
 *
 * Strings are sent as-is. Objects use their first prompt-like string field,
 * with the remaining fields appended as JSON context.
 */
export function buildUserMessage(input: TaskInput): string {
  const value = input.sample.input;
  if (typeof value === 'string') {
    return value;
  }
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    const entries = Object.entries(value);
    const promptEntry = PROMPT_KEYS.map((key) => entries.find(([k]) => k === key)).find(
      (entry): entry is [string, string] => entry !== undefined && typeof entry[1] === 'string'
    );
    if (promptEntry) {
      const rest = Object.fromEntries(entries.filter(([key]) => key !== promptEntry[0]));
      return Object.keys(rest).length > 0
        ? `${promptEntry[1]}\n\nContext:\n${JSON.stringify(rest, null, 2)}`
        : promptEntry[1];
    }
  }
  return JSON.stringify(value);
}

/**
 * Default instructions by use-case family
 */
export function defaultSystemPrompt(input: TaskInput): string {
  switch (input.family) {
    case 'qa':
      return 'Answer the question concisely. Reply with the answer only.';
    case 'rag':
      return (
        'Answer using the provided context. Reply with JSON: ' +
        '{"answer": string, "retrieved": [{"id": string, "content": string}]}.'
      );
    case 'search':
      return (
        'Answer the query from current sources. Reply with JSON: ' +
        '{"answer": string, "sources": [{"url": string, "title": string, "date": string}]}.'
      );
  }
}
