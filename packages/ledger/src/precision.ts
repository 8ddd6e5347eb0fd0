/**
 * @ledgersync/ledger: Per-currency rounding precision.
 *
 * Each currency has an increment (0.01 for most currencies, 1 for JPY,
 * 0.05 for cash-rounded CHF if configured). Unknown currencies and a
 * null currency use the default increment.
 */

import {
  div,
  decimalPlaces,
  isZero,
  parseDecimal,
  rational,
  roundToIncrement,
  toDecimalString,
} from "./rational.js";
import { LedgerError } from "./types.js";
import type { PrecisionOptions, Rational, RoundingMode } from "./types.js";

export const DEFAULT_INCREMENT = "0.01";

function parseIncrement(currency: string, value: string): Rational {
  let increment: Rational;
  try {
    increment = parseDecimal(value);
  } catch {
    throw new LedgerError(
      "INVALID_PRECISION",
      `Invalid precision "${value}" for ${currency}`,
    );
  }
  if (increment.num <= 0n) {
    throw new LedgerError(
      "INVALID_PRECISION",
      `Precision for ${currency} must be positive, got "${value}"`,
    );
  }
  return increment;
}

/**
 * Immutable lookup of rounding increments by currency.
 */
export class CurrencyPrecision {
  readonly roundingMode: RoundingMode;
  private readonly _default: Rational;
  private readonly _increments: ReadonlyMap<string, Rational>;

  constructor(options: PrecisionOptions = {}) {
    this.roundingMode = options.roundingMode ?? "half-even";
    this._default = parseIncrement("default", options.defaultPrecision ?? DEFAULT_INCREMENT);

    const increments = new Map<string, Rational>();
    for (const [currency, value] of Object.entries(options.currencies ?? {})) {
      increments.set(currency.toUpperCase(), parseIncrement(currency, value));
    }
    this._increments = increments;
  }

  /** Rounding increment of a currency. */
  incrementOf(currency: string | null): Rational {
    if (currency === null) {
      return this._default;
    }
    return this._increments.get(currency.toUpperCase()) ?? this._default;
  }

  /** Digits after the decimal point when rendering amounts of a currency. */
  decimalsOf(currency: string | null): number {
    return decimalPlaces(this.incrementOf(currency));
  }

  /** Half of one rounding unit. */
  halfUnitOf(currency: string | null): Rational {
    return div(this.incrementOf(currency), rational(2n));
  }

  round(value: Rational, currency: string | null): Rational {
    return roundToIncrement(value, this.incrementOf(currency), this.roundingMode);
  }

  /** Round, then render with the currency's number of decimals. */
  format(value: Rational, currency: string | null): string {
    return toDecimalString(this.round(value, currency), this.decimalsOf(currency), this.roundingMode);
  }

  /** True when `value` rounds to zero at the currency's precision. */
  isNegligible(value: Rational, currency: string | null): boolean {
    return isZero(this.round(value, currency));
  }

  /** Plain record of the configured increments, for diagnostics. */
  toJSON(): { defaultPrecision: string; currencies: Record<string, string> } {
    const currencies: Record<string, string> = {};
    for (const [currency, increment] of this._increments) {
      currencies[currency] = toDecimalString(increment, decimalPlaces(increment));
    }
    return {
      defaultPrecision: toDecimalString(this._default, decimalPlaces(this._default)),
      currencies,
    };
  }
}

export const DEFAULT_PRECISION = new CurrencyPrecision();
