/**
 * Fixed-point money arithmetic
 *
 * Amounts are bigints scaled by 10^18. Rounding happens only in formatMoney().
 */

import { ConfigurationError } from '../errors/index.js';

/** Amount in units of 10^-18 of the currency */
export type Money = bigint;

export const MONEY_SCALE = 18;
const SCALE_FACTOR = 10n ** BigInt(MONEY_SCALE);

export const ZERO: Money = 0n;

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?(?:[eE]([-+]?\d+))?$/;

/**
 * Parse a non-negative decimal ("0.0025", "1e-7" or a JSON number) exactly
 *
 * @throws ConfigurationError when the value is malformed or needs more than 18 decimal places
 */
export function parseMoney(value: string | number): Money {
  const text = typeof value === 'number' ? String(value) : value.trim();
  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    throw new ConfigurationError(`Invalid decimal amount: "${text}"`, { code: 'INVALID_AMOUNT' });
  }

  const integerPart = match[1] ?? '0';
  const fractionPart = match[2] ?? '';
  const exponent = Number(match[3] ?? '0') - fractionPart.length + MONEY_SCALE;
  const digits = BigInt(integerPart + fractionPart);

  if (exponent >= 0) {
    return digits * 10n ** BigInt(exponent);
  }

  const divisor = 10n ** BigInt(-exponent);
  if (digits % divisor !== 0n) {
    throw new ConfigurationError(`Amount "${text}" has more than ${MONEY_SCALE} decimal places`, {
      code: 'INVALID_AMOUNT',
    });
  }
  return digits / divisor;
}

/**
 * Divide with round-half-up (operands are non-negative)
 */
export function divideRounded(numerator: bigint, divisor: bigint): bigint {
  const quotient = numerator / divisor;
  return (numerator % divisor) * 2n >= divisor ? quotient + 1n : quotient;
}

/**
 * Cost of a single unit when `rate` buys `per` units
 *
 * @throws ConfigurationError when the unit cost needs more than 18 decimal places
 */
export function unitRate(rate: Money, per: number): Money {
  const divisor = BigInt(per);
  if (rate % divisor !== 0n) {
    throw new ConfigurationError(
      `Rate ${formatMoney(rate)} per ${per} units has more than ${MONEY_SCALE} decimal places ` +
        'per unit',
      { code: 'INEXACT_RATE' }
    );
  }
  return rate / divisor;
}

/**
 * Price `units` at `rate` per `per` units, exactly
 */
export function priceUnits(units: number, rate: Money, per: number): Money {
  return BigInt(units) * unitRate(rate, per);
}

export function sumMoney(amounts: Iterable<Money>): Money {
  let total = ZERO;
  for (const amount of amounts) {
    total += amount;
  }
  return total;
}

/**
 * Render an amount as a decimal string
 *
 * Without `decimals` the exact value is printed with trailing zeros removed
 * ("0.0035", "12"). With `decimals` the value is rounded half-up and padded.
 */
export function formatMoney(amount: Money, decimals?: number): string {
  const negative = amount < 0n;
  let magnitude = negative ? -amount : amount;
  let scale = MONEY_SCALE;

  if (decimals !== undefined && decimals < MONEY_SCALE) {
    magnitude = divideRounded(magnitude, 10n ** BigInt(MONEY_SCALE - decimals));
    scale = decimals;
  }

  const padded = magnitude.toString().padStart(scale + 1, '0');
  const integerPart = padded.slice(0, padded.length - scale);
  let fractionPart = padded.slice(padded.length - scale);

  if (decimals === undefined) {
    fractionPart = fractionPart.replace(/0+$/, '');
  }

  const sign = negative ? '-' : '';
  return fractionPart.length > 0
    ? `${sign}${integerPart}.${fractionPart}`
    : `${sign}${integerPart}`;
}

export function moneyToNumber(amount: Money): number {
  return Number(amount) / Number(SCALE_FACTOR);
}
