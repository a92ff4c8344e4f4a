/**
 * Rate card loading
 *
 * A rate card is versioned and injected into each CostTracker; nothing here is
 * cached module-wide.
 */

import { z } from 'zod';
import { RateCardSchema } from '../types/schemas.js';
import { ConfigurationError } from '../errors/index.js';
import { parseMoney, unitRate } from '../cost/money.js';
import { formatZodIssues } from '../utils/validation.js';
import { readStructuredFile } from './loader.js';

export type RateCard = z.infer<typeof RateCardSchema>;
export type Rate = RateCard['rates'][number];

/**
 * Rates that cannot be priced exactly at 18 decimal places per unit
 */
function inexactRateIssues(card: RateCard): string[] {
  const issues: string[] = [];
  card.rates.forEach((rate, index) => {
    for (const field of ['inputRate', 'outputRate'] as const) {
      try {
        unitRate(parseMoney(rate[field]), rate.per);
      } catch (error) {
        if (!(error instanceof ConfigurationError)) {
          throw error;
        }
        issues.push(`rates.${index}.${field}: ${error.message}`);
      }
    }
  });
  return issues;
}

/**
 * Validate a rate card object
 *
 * @throws ConfigurationError listing every schema issue
 */
export function parseRateCard(input: unknown): RateCard {
  const result = RateCardSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid rate card: ${formatZodIssues(result.error).join('; ')}`,
      { code: 'INVALID_RATE_CARD', cause: result.error }
    );
  }

  const issues = inexactRateIssues(result.data);
  if (issues.length > 0) {
    throw new ConfigurationError(`Invalid rate card: ${issues.join('; ')}`, {
      code: 'INVALID_RATE_CARD',
    });
  }
  return result.data;
}

export async function loadRateCard(filePath: string): Promise<RateCard> {
  return parseRateCard(await readStructuredFile(filePath));
}

/**
 * A rate card with no entries: every usage event is reported as unpriced
 */
export function emptyRateCard(version: string = 'none'): RateCard {
  return { version, currency: 'USD', rates: [] };
}
