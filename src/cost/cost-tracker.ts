/**
 * Cost Tracker
 *
 * Converts usage events into money through an injected, versioned rate card.
 * Events with no rate-card entry are kept and counted, never priced as zero.
 */

import type { CostBreakdown, UsageEvent } from '../types/index.js';
import { UsageEventSchema } from '../types/schemas.js';
import type { Rate, RateCard } from '../config/rate-card.js';
import { ValidationError } from '../errors/index.js';
import { createLogger } from '../utils/logger.js';
import { formatZodIssues } from '../utils/validation.js';
import { ZERO, formatMoney, parseMoney, unitRate, type Money } from './money.js';

const logger = createLogger('CostTracker');

interface PricedRate {
  provider: string;
  model: string;
  /** Cost of one input unit */
  inputRate: Money;
  /** Cost of one output unit */
  outputRate: Money;
}

export interface CostSummary extends CostBreakdown {
  /** Cost per "provider/model" */
  perModel: Record<string, string>;
}

export interface WorkloadEstimate {
  provider: string;
  model: string;
  cost: string;
}

function rateKey(provider: string, model: string): string {
  return `${provider.toLowerCase()}/${model}`;
}

/**
 * @throws ConfigurationError when a rate cannot be split into an exact unit cost
 */
export function toPricedRate(rate: Rate): PricedRate {
  return {
    provider: rate.provider,
    model: rate.model,
    inputRate: unitRate(parseMoney(rate.inputRate), rate.per),
    outputRate: unitRate(parseMoney(rate.outputRate), rate.per),
  };
}

function priceWith(rate: PricedRate, inputUnits: number, outputUnits: number): Money {
  return BigInt(inputUnits) * rate.inputRate + BigInt(outputUnits) * rate.outputRate;
}

/**
 * CostTracker
 *
 * One instance accumulates the usage of one cell.
 */
export class CostTracker {
  private readonly rates: Map<string, PricedRate>;
  private readonly byProvider = new Map<string, Money>();
  private readonly perModel = new Map<string, Money>();
  private readonly unpricedEvents: UsageEvent[] = [];
  private pricedEventCount = 0;

  constructor(private readonly rateCard: RateCard) {
    this.rates = new Map(
      rateCard.rates.map((rate) => [rateKey(rate.provider, rate.model), toPricedRate(rate)])
    );
  }

  get rateCardVersion(): string {
    return this.rateCard.version;
  }

  /**
   * Record one usage event
   *
   * @returns The event's cost, or null when the rate card has no entry for it
   * @throws ValidationError when the event is malformed (negative or fractional units, ...)
   */
  record(event: UsageEvent): Money | null {
    const parsed = UsageEventSchema.safeParse(event);
    if (!parsed.success) {
      throw new ValidationError(
        `Invalid usage event: ${formatZodIssues(parsed.error).join('; ')}`,
        { code: 'INVALID_USAGE_EVENT', cause: parsed.error }
      );
    }

    const rate = this.rates.get(rateKey(event.provider, event.model));
    if (!rate) {
      this.unpricedEvents.push(parsed.data);
      logger.warn(
        { provider: event.provider, model: event.model, rateCardVersion: this.rateCard.version },
        'No rate-card entry for usage event'
      );
      return null;
    }

    const cost = priceWith(rate, event.inputUnits, event.outputUnits);
    this.pricedEventCount++;
    this.byProvider.set(rate.provider, (this.byProvider.get(rate.provider) ?? ZERO) + cost);
    const modelKey = `${rate.provider}/${rate.model}`;
    this.perModel.set(modelKey, (this.perModel.get(modelKey) ?? ZERO) + cost);
    return cost;
  }

  /**
   * Record events in order. Stops at the first malformed event.
   */
  recordAll(events: Iterable<UsageEvent>): void {
    for (const event of events) {
      this.record(event);
    }
  }

  /**
   * Sum of priced events only
   */
  total(): Money {
    let total = ZERO;
    for (const amount of this.byProvider.values()) {
      total += amount;
    }
    return total;
  }

  get unpricedEventCount(): number {
    return this.unpricedEvents.length;
  }

  summary(): CostSummary {
    return {
      ...this.toBreakdown(),
      perModel: formatAmounts(this.perModel),
    };
  }

  /**
   * The shape stored on a ResultRecord
   */
  toBreakdown(): CostBreakdown {
    return {
      currency: this.rateCard.currency,
      rateCardVersion: this.rateCard.version,
      byProvider: formatAmounts(this.byProvider),
      total: formatMoney(this.total()),
      pricedEventCount: this.pricedEventCount,
      unpricedEventCount: this.unpricedEvents.length,
      unpricedEvents: [...this.unpricedEvents],
    };
  }

  /**
   * Price a hypothetical workload against every rate-card entry, cheapest first
   */
  compare(inputUnits: number, outputUnits: number): WorkloadEstimate[] {
    return [...this.rates.values()]
      .map((rate) => ({ rate, cost: priceWith(rate, inputUnits, outputUnits) }))
      .sort((a, b) => (a.cost < b.cost ? -1 : a.cost > b.cost ? 1 : 0))
      .map(({ rate, cost }) => ({
        provider: rate.provider,
        model: rate.model,
        cost: formatMoney(cost),
      }));
  }
}

function formatAmounts(amounts: Map<string, Money>): Record<string, string> {
  const formatted: Record<string, string> = {};
  for (const [key, amount] of [...amounts.entries()].sort(([a], [b]) => a.localeCompare(b))) {
    formatted[key] = formatMoney(amount);
  }
  return formatted;
}
