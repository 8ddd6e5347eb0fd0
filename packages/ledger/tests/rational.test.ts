/**
 * Tests for exact rational arithmetic.
 *
 * Covers:
 * - Parsing decimal strings (plain and exponent forms)
 * - Normalization and arithmetic
 * - Rounding modes at exact ties
 * - Floor / ceil on negative values
 * - Formatting
 */

import { describe, it, expect } from "vitest";
import {
  rational,
  parseDecimal,
  add,
  sub,
  mul,
  div,
  compare,
  median,
  roundToInteger,
  floorToInteger,
  ceilToInteger,
  roundToIncrement,
  decimalPlaces,
  formatScaled,
  toDecimalString,
  toPlainString,
} from "../src/rational.js";
import { LedgerError } from "../src/types.js";

// ─── Construction ────────────────────────────────────────────────────────

describe("rational", () => {
  it("reduces to lowest terms", () => {
    expect(rational(2n, 4n)).toEqual({ num: 1n, den: 2n });
  });

  it("moves the sign to the numerator", () => {
    expect(rational(3n, -6n)).toEqual({ num: -1n, den: 2n });
  });

  it("normalizes zero", () => {
    expect(rational(0n, 5n)).toEqual({ num: 0n, den: 1n });
  });

  it("rejects a zero denominator", () => {
    expect(() => rational(1n, 0n)).toThrow(LedgerError);
  });
});

// ─── parseDecimal ────────────────────────────────────────────────────────

describe("parseDecimal", () => {
  it("parses a decimal", () => {
    expect(parseDecimal("100.50")).toEqual({ num: 201n, den: 2n });
  });

  it("parses a negative decimal", () => {
    expect(parseDecimal("-0.01")).toEqual({ num: -1n, den: 100n });
  });

  it("parses a negative exponent", () => {
    expect(parseDecimal("1e-7")).toEqual({ num: 1n, den: 10_000_000n });
  });

  it("parses a positive exponent", () => {
    expect(parseDecimal("1.5e3")).toEqual({ num: 1500n, den: 1n });
  });

  it("trims whitespace", () => {
    expect(parseDecimal(" 42 ")).toEqual({ num: 42n, den: 1n });
  });

  it("accepts exponents up to the limit", () => {
    expect(parseDecimal("1e30")).toEqual({ num: 10n ** 30n, den: 1n });
    expect(parseDecimal("1e-30")).toEqual({ num: 1n, den: 10n ** 30n });
  });

  it("rejects exponents beyond the limit", () => {
    expect(() => parseDecimal("1e-31")).toThrow('Invalid decimal: "1e-31" (exponent beyond ±30)');
    expect(() => parseDecimal("1e31")).toThrow(LedgerError);
    expect(() => parseDecimal("1e-3000000")).toThrow(LedgerError);
  });

  it("rejects more than forty digits", () => {
    expect(parseDecimal("1" + "0".repeat(39))).toEqual({ num: 10n ** 39n, den: 1n });
    expect(() => parseDecimal("0." + "0".repeat(40) + "1")).toThrow(
      "Invalid decimal: more than 40 digits",
    );
  });

  it("rejects non-numeric input", () => {
    expect(() => parseDecimal("abc")).toThrow(LedgerError);
    expect(() => parseDecimal("")).toThrow(LedgerError);
    expect(() => parseDecimal("1.2.3")).toThrow(LedgerError);
  });
});

// ─── Arithmetic ──────────────────────────────────────────────────────────

describe("arithmetic", () => {
  it("adds without binary rounding error", () => {
    expect(add(parseDecimal("0.1"), parseDecimal("0.2"))).toEqual(parseDecimal("0.3"));
  });

  it("subtracts", () => {
    expect(sub(parseDecimal("91.45"), parseDecimal("91.44"))).toEqual(parseDecimal("0.01"));
  });

  it("multiplies", () => {
    expect(mul(parseDecimal("100"), parseDecimal("0.9144"))).toEqual(parseDecimal("91.44"));
  });

  it("divides", () => {
    expect(div(parseDecimal("120"), parseDecimal("100"))).toEqual({ num: 6n, den: 5n });
  });

  it("rejects division by zero", () => {
    expect(() => div(parseDecimal("1"), parseDecimal("0"))).toThrow(LedgerError);
  });

  it("compares across denominators", () => {
    expect(compare(parseDecimal("0.5"), rational(1n, 3n))).toBe(1);
    expect(compare(rational(1n, 3n), parseDecimal("0.5"))).toBe(-1);
    expect(compare(rational(2n, 4n), parseDecimal("0.5"))).toBe(0);
  });
});

describe("median", () => {
  it("returns the middle value of an odd count", () => {
    expect(median([rational(3n), rational(1n), rational(2n)])).toEqual(rational(2n));
  });

  it("averages the two middle values of an even count", () => {
    expect(median([rational(4n), rational(1n), rational(3n), rational(2n)])).toEqual(
      rational(5n, 2n),
    );
  });

  it("rejects an empty list", () => {
    expect(() => median([])).toThrow(LedgerError);
  });
});

// ─── Rounding ────────────────────────────────────────────────────────────

describe("roundToInteger", () => {
  it("rounds below and above half", () => {
    expect(roundToInteger(rational(12n, 10n), "half-even")).toBe(1n);
    expect(roundToInteger(rational(16n, 10n), "half-even")).toBe(2n);
    expect(roundToInteger(rational(-16n, 10n), "half-even")).toBe(-2n);
  });

  it("breaks ties toward the even neighbour in half-even mode", () => {
    expect(roundToInteger(rational(5n, 2n), "half-even")).toBe(2n);
    expect(roundToInteger(rational(7n, 2n), "half-even")).toBe(4n);
    expect(roundToInteger(rational(-5n, 2n), "half-even")).toBe(-2n);
  });

  it("breaks ties away from zero in half-up mode", () => {
    expect(roundToInteger(rational(5n, 2n), "half-up")).toBe(3n);
    expect(roundToInteger(rational(-5n, 2n), "half-up")).toBe(-3n);
  });
});

describe("floorToInteger / ceilToInteger", () => {
  it("floors toward negative infinity", () => {
    expect(floorToInteger(rational(7n, 2n))).toBe(3n);
    expect(floorToInteger(rational(-7n, 2n))).toBe(-4n);
  });

  it("ceils toward positive infinity", () => {
    expect(ceilToInteger(rational(7n, 2n))).toBe(4n);
    expect(ceilToInteger(rational(-7n, 2n))).toBe(-3n);
  });

  it("leaves integers unchanged", () => {
    expect(floorToInteger(rational(-4n))).toBe(-4n);
    expect(ceilToInteger(rational(-4n))).toBe(-4n);
  });
});

describe("roundToIncrement", () => {
  it("rounds to cents", () => {
    expect(
      roundToIncrement(parseDecimal("91.444"), parseDecimal("0.01"), "half-even"),
    ).toEqual(parseDecimal("91.44"));
  });

  it("rounds to a five-cent increment", () => {
    expect(
      roundToIncrement(parseDecimal("1.075"), parseDecimal("0.05"), "half-even"),
    ).toEqual(parseDecimal("1.1"));
  });
});

describe("decimalPlaces", () => {
  it("counts digits of terminating fractions", () => {
    expect(decimalPlaces(parseDecimal("0.05"))).toBe(2);
    expect(decimalPlaces(parseDecimal("1"))).toBe(0);
    expect(decimalPlaces(parseDecimal("0.00000001"))).toBe(8);
  });

  it("rejects non-terminating fractions", () => {
    expect(() => decimalPlaces(rational(1n, 3n))).toThrow(LedgerError);
  });
});

// ─── Formatting ──────────────────────────────────────────────────────────

describe("formatting", () => {
  it("formats scaled bigints", () => {
    expect(formatScaled(10050n, 2)).toBe("100.50");
    expect(formatScaled(-5n, 2)).toBe("-0.05");
    expect(formatScaled(42n, 0)).toBe("42");
  });

  it("renders with fixed decimals and rounds ties to even", () => {
    expect(toDecimalString(parseDecimal("2.345"), 2)).toBe("2.34");
    expect(toDecimalString(parseDecimal("2.355"), 2)).toBe("2.36");
    expect(toDecimalString(parseDecimal("2.345"), 2, "half-up")).toBe("2.35");
  });

  it("renders plain strings without trailing zeros", () => {
    expect(toPlainString(rational(6n, 5n))).toBe("1.2");
    expect(toPlainString(rational(3n))).toBe("3");
    expect(toPlainString(parseDecimal("-0.9144"))).toBe("-0.9144");
  });
});
