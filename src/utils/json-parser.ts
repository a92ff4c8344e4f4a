/**
 * JSON extraction for unit output
 *
 * Framework adapters often print JSON wrapped in markdown fences or trailing
 * log noise, and LLM-backed units return JSON that is almost-but-not-quite
 * valid. Both go through the same cleanup before being handed to evaluators.
 */

import { jsonrepair } from 'jsonrepair';
import { ValidationError } from '../errors/index.js';
import { createLogger } from './logger.js';

const logger = createLogger('JsonParser');

/**
 * Strip markdown code fences and leading prose, leaving the JSON payload
 *
 * Handles complete fences (```json ... ```), fences cut off by a truncated
 * response, and text before the first `{` or `[`.
 */
export function cleanJsonText(raw: string): string {
  let cleaned = raw.trim();

  const completeCodeBlock = cleaned.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (completeCodeBlock && completeCodeBlock[1]) {
    return completeCodeBlock[1].trim();
  }

  const incompleteCodeBlock = cleaned.match(/```(?:json)?\s*([\s\S]*)/);
  if (incompleteCodeBlock && incompleteCodeBlock[1]) {
    cleaned = incompleteCodeBlock[1].trim();
  }

  const starts = [cleaned.indexOf('{'), cleaned.indexOf('[')].filter((i) => i >= 0);
  if (starts.length > 0) {
    const jsonStartIndex = Math.min(...starts);
    if (jsonStartIndex > 0) {
      cleaned = cleaned.slice(jsonStartIndex);
    }
  }

  // BOM and zero-width characters
  return cleaned.replace(/[\uFEFF\u200B-\u200D\u2060]/g, '');
}

/**
 * Parse JSON text, falling back to jsonrepair for malformed payloads
 *
 * @throws ValidationError when the text cannot be recovered as JSON
 */
export function parseJsonLenient(raw: string): unknown {
  const cleaned = cleanJsonText(raw);
  if (cleaned.length === 0) {
    throw new ValidationError('Empty output where JSON was expected', { code: 'EMPTY_OUTPUT' });
  }

  try {
    return JSON.parse(cleaned);
  } catch (strictError) {
    logger.debug({ err: strictError }, 'Strict JSON parse failed, trying jsonrepair');
  }

  try {
    return JSON.parse(jsonrepair(cleaned));
  } catch (error) {
    logger.debug(
      { responseLength: raw.length, responsePreview: raw.slice(0, 200) },
      'jsonrepair could not recover output'
    );
    throw new ValidationError('Output is not valid JSON', {
      code: 'MALFORMED_OUTPUT',
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Parse unit output: JSON when it looks like JSON, the trimmed text otherwise
 *
 * Plain-text answers are valid output for QA use cases, so only text that
 * starts with a code fence or a JSON bracket is required to parse.
 */
export function parseUnitOutput(raw: string): unknown {
  const trimmed = raw.trim();
  const isFenced = trimmed.startsWith('```');
  const isBareJson = trimmed.startsWith('{') || trimmed.startsWith('[');
  if (!isFenced && !isBareJson) {
    return trimmed;
  }
  return parseJsonLenient(trimmed);
}
