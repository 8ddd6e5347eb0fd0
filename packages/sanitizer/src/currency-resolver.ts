/**
 * Currency Resolver: currency and exchange rate of a collective transaction.
 *
 * The remote service stores a collective transaction in the reporting
 * currency plus at most one foreign currency, at one exchange rate with
 * eight decimal digits. The resolver finds that currency and a rate that
 * reproduces every line's reporting amount:
 *
 * 1. Lines in the reporting currency or with a zero amount need no rate.
 *    When all lines are like that, the result is (reporting currency, 1).
 * 2. The remaining lines must share one currency.
 * 3. Each remaining line admits the rates that reproduce its reporting
 *    amount within max(|amount| × 1e-8, half a rounding unit). The
 *    admissible interval of the transaction is the intersection.
 * 4. The preferred rate is the median of reporting / amount over the
 *    lines of largest absolute amount, pulled into the interval.
 */

import type { LedgerLine } from "@ledgersync/types";
import {
  abs,
  add,
  ceilRate,
  compare,
  div,
  floorRate,
  formatRate,
  isNegative,
  max,
  median,
  min,
  mul,
  ONE,
  rational,
  roundRate,
  sub,
  toDecimalString,
} from "@ledgersync/ledger";
import type { Rational } from "@ledgersync/ledger";
import { EmptyTransactionError, IncoherentCurrencyError, IncoherentFXRateError } from "./errors.js";
import { amountOf, isReportingOnly, lineCurrency, reportingAmountOf } from "./lines.js";
import type { ResolveOptions, ResolvedRate } from "./types.js";

/** Relative tolerance of a foreign amount, 1e-8. */
export const RELATIVE_TOLERANCE = rational(1n, 100_000_000n);

// =============================================================================
// Rate Intervals
// =============================================================================

export interface RateInterval {
  readonly lower: Rational;
  readonly upper: Rational;
}

interface ForeignLine {
  readonly amount: Rational;
  readonly reportingAmount: Rational;
}

function lineInterval(line: ForeignLine, halfUnit: Rational): RateInterval {
  const tolerance = max(mul(abs(line.amount), RELATIVE_TOLERANCE), halfUnit);
  const a = div(sub(line.reportingAmount, tolerance), line.amount);
  const b = div(add(line.reportingAmount, tolerance), line.amount);
  return isNegative(line.amount) ? { lower: b, upper: a } : { lower: a, upper: b };
}

function intersect(intervals: readonly RateInterval[]): RateInterval {
  const [first, ...rest] = intervals;
  if (first === undefined) {
    throw new EmptyTransactionError("Cannot intersect an empty set of rate intervals");
  }
  return rest.reduce<RateInterval>(
    (acc, next) => ({ lower: max(acc.lower, next.lower), upper: min(acc.upper, next.upper) }),
    first,
  );
}

function isEmptyInterval(interval: RateInterval): boolean {
  return compare(interval.lower, interval.upper) > 0;
}

/**
 * Median of reporting / amount over the lines with the largest absolute
 * amount. Small lines carry the most rounding noise relative to their size.
 */
function preferredRate(lines: readonly ForeignLine[]): Rational {
  let largest: Rational | null = null;
  for (const line of lines) {
    const magnitude = abs(line.amount);
    if (largest === null || compare(magnitude, largest) > 0) {
      largest = magnitude;
    }
  }
  const ratios = lines
    .filter((line) => largest !== null && compare(abs(line.amount), largest) === 0)
    .map((line) => div(line.reportingAmount, line.amount));
  return median(ratios);
}

/**
 * An eight-digit rate inside the interval, as close to `preferred` as the
 * interval permits. Falls back to the rounded clamp when the interval is
 * narrower than one rate unit.
 */
function pickRate(preferred: Rational, interval: RateInterval): Rational {
  const clamped = min(max(preferred, interval.lower), interval.upper);
  const rounded = roundRate(clamped);
  if (compare(rounded, interval.lower) < 0) {
    const candidate = ceilRate(interval.lower);
    if (compare(candidate, interval.upper) <= 0) return candidate;
  } else if (compare(rounded, interval.upper) > 0) {
    const candidate = floorRate(interval.upper);
    if (compare(candidate, interval.lower) >= 0) return candidate;
  }
  return rounded;
}

function formatBound(value: Rational): string {
  return toDecimalString(value, 10);
}

// =============================================================================
// Resolver
// =============================================================================

/**
 * Determine the foreign currency and eight-digit exchange rate of a
 * transaction.
 *
 * @throws {EmptyTransactionError} for no lines
 * @throws {IncoherentCurrencyError} for more than one foreign currency
 * @throws {IncoherentFXRateError} in strict mode, when no rate reproduces
 *   every foreign line's reporting amount
 */
export function resolveCollectiveCurrency(
  lines: readonly LedgerLine[],
  options: ResolveOptions,
): ResolvedRate {
  const { reportingCurrency, precision, mode, logger } = options;
  const [first] = lines;
  if (first === undefined) {
    throw new EmptyTransactionError();
  }
  const transactionId = first.id;

  const foreign = lines.filter((line) => !isReportingOnly(line, reportingCurrency));
  if (foreign.length === 0) {
    return { currency: reportingCurrency, rate: ONE, withinTolerance: true };
  }

  const currencies = [...new Set(foreign.map((line) => lineCurrency(line, reportingCurrency)))];
  const [currency] = currencies;
  if (currency === undefined || currencies.length > 1) {
    throw new IncoherentCurrencyError(transactionId, currencies);
  }

  const foreignLines: ForeignLine[] = foreign.map((line) => ({
    amount: amountOf(line),
    reportingAmount: reportingAmountOf(line, reportingCurrency),
  }));
  const halfUnit = precision.halfUnitOf(reportingCurrency);
  const interval = intersect(foreignLines.map((line) => lineInterval(line, halfUnit)));
  const preferred = preferredRate(foreignLines);

  if (isEmptyInterval(interval)) {
    if (mode === "strict") {
      throw new IncoherentFXRateError(
        transactionId,
        `no ${currency} rate reproduces every reporting amount ` +
          `(lower bound ${formatBound(interval.lower)} exceeds upper bound ${formatBound(interval.upper)})`,
      );
    }
    const rate = roundRate(preferred, precision.roundingMode);
    logger?.warn(
      {
        transactionId,
        currency,
        rate: formatRate(rate),
        lower: formatBound(interval.lower),
        upper: formatBound(interval.upper),
      },
      "Accepted exchange rate outside the tolerance interval",
    );
    return { currency, rate, withinTolerance: false };
  }

  const rate = pickRate(preferred, interval);

  if (mode === "strict") {
    for (const line of foreignLines) {
      const implied = precision.round(mul(line.amount, rate), reportingCurrency);
      const expected = precision.round(line.reportingAmount, reportingCurrency);
      if (compare(implied, expected) !== 0) {
        throw new IncoherentFXRateError(
          transactionId,
          `${precision.format(line.amount, currency)} ${currency} at rate ${formatRate(rate)} ` +
            `gives ${precision.format(implied, reportingCurrency)}, ` +
            `not ${precision.format(expected, reportingCurrency)} ${reportingCurrency}`,
        );
      }
    }
  }

  return { currency, rate, withinTolerance: true };
}
