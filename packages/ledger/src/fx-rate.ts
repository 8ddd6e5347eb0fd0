/**
 * @ledgersync/ledger: Exchange rates at the remote's storage precision.
 *
 * The remote bookkeeping service stores one exchange rate per transaction
 * with eight decimal digits. Every rate handed to it passes through
 * `roundRate`, and reporting amounts are re-derived from that rounded rate.
 */

import {
  ceilToInteger,
  floorToInteger,
  fromScaled,
  mul,
  pow10,
  rational,
  roundToInteger,
  toPlainString,
} from "./rational.js";
import type { CurrencyPrecision } from "./precision.js";
import type { Rational, RoundingMode } from "./types.js";

/** Decimal digits of a stored exchange rate. */
export const FX_RATE_DECIMALS = 8;

const RATE_SCALE = rational(pow10(FX_RATE_DECIMALS));

/** Round a rate to eight decimal digits. */
export function roundRate(rate: Rational, mode: RoundingMode = "half-even"): Rational {
  return fromScaled(roundToInteger(mul(rate, RATE_SCALE), mode), FX_RATE_DECIMALS);
}

/** Largest eight-digit rate not above `rate`. */
export function floorRate(rate: Rational): Rational {
  return fromScaled(floorToInteger(mul(rate, RATE_SCALE)), FX_RATE_DECIMALS);
}

/** Smallest eight-digit rate not below `rate`. */
export function ceilRate(rate: Rational): Rational {
  return fromScaled(ceilToInteger(mul(rate, RATE_SCALE)), FX_RATE_DECIMALS);
}

/**
 * Render a rate without trailing zeros ("1.20000000" → "1.2").
 */
export function formatRate(rate: Rational): string {
  return toPlainString(roundRate(rate));
}

/**
 * Convert an amount at `rate` and round to the target currency.
 */
export function convertAmount(
  amount: Rational,
  rate: Rational,
  targetCurrency: string,
  precision: CurrencyPrecision,
): Rational {
  return precision.round(mul(amount, rate), targetCurrency);
}
