/**
 * @ledgersync/ledger: Exact rational arithmetic on bigint.
 *
 * Amounts, tolerances and exchange rates are fractions of two bigints.
 * Rounding happens only where a value is persisted, through
 * `roundToIncrement` with an explicit tie-breaking mode.
 */

import { LedgerError } from "./types.js";
import type { Rational, RoundingMode } from "./types.js";

// ─── Construction ────────────────────────────────────────────────────────

function gcd(a: bigint, b: bigint): bigint {
  let x = a < 0n ? -a : a;
  let y = b < 0n ? -b : b;
  while (y !== 0n) {
    const t = x % y;
    x = y;
    y = t;
  }
  return x;
}

/**
 * Build a normalized fraction (positive denominator, lowest terms).
 */
export function rational(num: bigint, den: bigint = 1n): Rational {
  if (den === 0n) {
    throw new LedgerError("DIVISION_BY_ZERO", "Denominator must not be zero");
  }
  const sign = den < 0n ? -1n : 1n;
  const divisor = gcd(num, den);
  if (divisor === 0n) {
    return { num: 0n, den: 1n };
  }
  return { num: (sign * num) / divisor, den: (sign * den) / divisor };
}

export const ZERO: Rational = { num: 0n, den: 1n };
export const ONE: Rational = { num: 1n, den: 1n };

/** 10^exponent as a bigint. */
export function pow10(exponent: number): bigint {
  return 10n ** BigInt(exponent);
}

const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d+))?(?:[eE]([-+]?\d+))?$/;

/** Largest exponent magnitude `parseDecimal` accepts. */
export const MAX_DECIMAL_EXPONENT = 30;

/** Most digits, integer and fraction together, `parseDecimal` accepts. */
export const MAX_DECIMAL_DIGITS = 40;

/**
 * Parse a decimal string exactly.
 *
 * Accepts the forms `String(number)` produces, including exponents up to
 * ±30 and at most 40 digits: "100.50" → 201/2, "-0.01" → -1/100,
 * "1e-7" → 1/10000000
 */
export function parseDecimal(value: string): Rational {
  const trimmed = value.trim();
  const match = DECIMAL_PATTERN.exec(trimmed);
  if (match === null) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid decimal: "${value}"`);
  }

  const [, minus, intPart = "0", fracPart = "", exponentPart] = match;
  const exponent = exponentPart === undefined ? 0 : Number(exponentPart);
  if (Math.abs(exponent) > MAX_DECIMAL_EXPONENT) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Invalid decimal: "${value}" (exponent beyond ±${MAX_DECIMAL_EXPONENT})`,
    );
  }
  if (intPart.length + fracPart.length > MAX_DECIMAL_DIGITS) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Invalid decimal: more than ${MAX_DECIMAL_DIGITS} digits`,
    );
  }
  const digits = BigInt(intPart + fracPart);
  const scale = fracPart.length - exponent;
  const signed = minus === undefined ? digits : -digits;

  return scale >= 0
    ? rational(signed, pow10(scale))
    : rational(signed * pow10(-scale));
}

/** Interpret a bigint count of `10^-decimals` units. */
export function fromScaled(scaled: bigint, decimals: number): Rational {
  return rational(scaled, pow10(decimals));
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

export function add(a: Rational, b: Rational): Rational {
  return rational(a.num * b.den + b.num * a.den, a.den * b.den);
}

export function sub(a: Rational, b: Rational): Rational {
  return rational(a.num * b.den - b.num * a.den, a.den * b.den);
}

export function mul(a: Rational, b: Rational): Rational {
  return rational(a.num * b.num, a.den * b.den);
}

export function div(a: Rational, b: Rational): Rational {
  if (b.num === 0n) {
    throw new LedgerError("DIVISION_BY_ZERO", "Cannot divide by zero");
  }
  return rational(a.num * b.den, a.den * b.num);
}

export function neg(a: Rational): Rational {
  return { num: -a.num, den: a.den };
}

export function abs(a: Rational): Rational {
  return a.num < 0n ? neg(a) : a;
}

export function sum(values: Iterable<Rational>): Rational {
  let total = ZERO;
  for (const value of values) {
    total = add(total, value);
  }
  return total;
}

// ─── Comparison ──────────────────────────────────────────────────────────

export function compare(a: Rational, b: Rational): -1 | 0 | 1 {
  const left = a.num * b.den;
  const right = b.num * a.den;
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

export function equals(a: Rational, b: Rational): boolean {
  return a.num === b.num && a.den === b.den;
}

export function isZero(a: Rational): boolean {
  return a.num === 0n;
}

export function isNegative(a: Rational): boolean {
  return a.num < 0n;
}

export function min(a: Rational, b: Rational): Rational {
  return compare(a, b) <= 0 ? a : b;
}

export function max(a: Rational, b: Rational): Rational {
  return compare(a, b) >= 0 ? a : b;
}

/**
 * Median of a non-empty list; the mean of the two middle values
 * for an even count.
 */
export function median(values: readonly Rational[]): Rational {
  if (values.length === 0) {
    throw new LedgerError("INVALID_AMOUNT", "Cannot take the median of no values");
  }
  const sorted = [...values].sort(compare);
  const middle = Math.floor(sorted.length / 2);
  const upper = sorted[middle] ?? ZERO;
  if (sorted.length % 2 === 1) {
    return upper;
  }
  const lower = sorted[middle - 1] ?? upper;
  return div(add(lower, upper), rational(2n));
}

// ─── Rounding ────────────────────────────────────────────────────────────

/**
 * Round a fraction to an integer.
 */
export function roundToInteger(value: Rational, mode: RoundingMode): bigint {
  const quotient = value.num / value.den;
  const remainder = value.num % value.den;
  if (remainder === 0n) {
    return quotient;
  }

  const away = value.num < 0n ? -1n : 1n;
  const twice = 2n * (remainder < 0n ? -remainder : remainder);
  if (twice > value.den) return quotient + away;
  if (twice < value.den) return quotient;

  // Exact tie
  if (mode === "half-up") return quotient + away;
  return quotient % 2n === 0n ? quotient : quotient + away;
}

export function floorToInteger(value: Rational): bigint {
  const quotient = value.num / value.den;
  return value.num % value.den !== 0n && value.num < 0n ? quotient - 1n : quotient;
}

export function ceilToInteger(value: Rational): bigint {
  const quotient = value.num / value.den;
  return value.num % value.den !== 0n && value.num > 0n ? quotient + 1n : quotient;
}

/**
 * Round to the nearest multiple of `increment` (e.g. 0.01, 0.05, 1).
 */
export function roundToIncrement(
  value: Rational,
  increment: Rational,
  mode: RoundingMode,
): Rational {
  const units = roundToInteger(div(value, increment), mode);
  return mul(rational(units), increment);
}

/**
 * Number of decimal digits needed to write `value` exactly.
 * Throws if the value has no finite decimal expansion.
 */
export function decimalPlaces(value: Rational): number {
  let den = value.den;
  let twos = 0;
  let fives = 0;
  while (den % 2n === 0n) {
    den /= 2n;
    twos += 1;
  }
  while (den % 5n === 0n) {
    den /= 5n;
    fives += 1;
  }
  if (den !== 1n) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `${value.num.toString()}/${value.den.toString()} has no finite decimal form`,
    );
  }
  return Math.max(twos, fives);
}

// ─── Formatting ──────────────────────────────────────────────────────────

/**
 * Convert a scaled bigint to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatScaled(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const magnitude = negative ? -scaled : scaled;
  const str = magnitude.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

/**
 * Render with exactly `decimals` digits, rounding if needed.
 */
export function toDecimalString(
  value: Rational,
  decimals: number,
  mode: RoundingMode = "half-even",
): string {
  const scaled = roundToInteger(mul(value, rational(pow10(decimals))), mode);
  return formatScaled(scaled, decimals);
}

/**
 * Render a value that is known to have a finite decimal form,
 * with no trailing zeros ("1.20000000" → "1.2").
 */
export function toPlainString(value: Rational): string {
  const places = decimalPlaces(value);
  return formatScaled((value.num * pow10(places)) / value.den, places);
}
