/**
 * @ledgersync/ledger: Amount Rounding Utility.
 *
 * Amounts travel as decimal strings and are rounded to their currency's
 * increment wherever they are persisted. Rounding twice is the same as
 * rounding once, so every stage of the pipeline may call these freely.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts must be valid decimal strings
 * - Zero runtime dependencies
 */

import { add, isZero, neg, parseDecimal, ZERO } from "./rational.js";
import { CurrencyPrecision, DEFAULT_PRECISION } from "./precision.js";
import type { Rational } from "./types.js";

/**
 * Round an amount to the configured precision of `currency`
 * (0.01 unless configured otherwise).
 *
 * roundToPrecision("91.444", "EUR") → "91.44"
 * roundToPrecision("1234.5", "JPY", jpyAsUnits) → "1234"
 */
export function roundToPrecision(
  amount: string,
  currency: string | null,
  precision: CurrencyPrecision = DEFAULT_PRECISION,
): string {
  return precision.format(parseDecimal(amount), currency);
}

/**
 * Sum decimal strings exactly.
 */
export function sumAmounts(amounts: Iterable<string>): Rational {
  let total: Rational = ZERO;
  for (const amount of amounts) {
    total = add(total, parseDecimal(amount));
  }
  return total;
}

/**
 * Negate a decimal string at the currency's precision.
 */
export function negateAmount(
  amount: string,
  currency: string | null,
  precision: CurrencyPrecision = DEFAULT_PRECISION,
): string {
  return precision.format(neg(parseDecimal(amount)), currency);
}

/**
 * Check whether an amount is exactly zero.
 */
export function isZeroAmount(amount: string): boolean {
  return isZero(parseDecimal(amount));
}
