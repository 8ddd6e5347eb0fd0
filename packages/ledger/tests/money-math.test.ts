/**
 * Tests for the amount rounding utility and the precision table.
 *
 * Covers:
 * - Default two-decimal rounding
 * - Per-currency increments (JPY units, five-cent CHF)
 * - Idempotence of rounding
 * - Invalid precision configuration
 */

import { describe, it, expect } from "vitest";
import {
  roundToPrecision,
  sumAmounts,
  negateAmount,
  isZeroAmount,
} from "../src/money-math.js";
import { CurrencyPrecision, DEFAULT_PRECISION } from "../src/precision.js";
import { parseDecimal } from "../src/rational.js";
import { LedgerError } from "../src/types.js";

const precision = new CurrencyPrecision({
  currencies: { JPY: "1", xau: "0.0001" },
});

// ─── roundToPrecision ────────────────────────────────────────────────────

describe("roundToPrecision", () => {
  it("rounds to two decimals by default", () => {
    expect(roundToPrecision("91.444", "EUR")).toBe("91.44");
    expect(roundToPrecision("100", "EUR")).toBe("100.00");
  });

  it("uses the default precision for a null currency", () => {
    expect(roundToPrecision("-0.005", null)).toBe("0.00");
    expect(roundToPrecision("-0.015", null)).toBe("-0.02");
  });

  it("rounds to a configured increment", () => {
    expect(roundToPrecision("1234.5", "JPY", precision)).toBe("1234");
    expect(roundToPrecision("1235.5", "JPY", precision)).toBe("1236");
  });

  it("matches currency codes case-insensitively", () => {
    expect(roundToPrecision("1.23456", "XAU", precision)).toBe("1.2346");
  });

  it("is idempotent", () => {
    const once = roundToPrecision("12.34567", "CHF");
    expect(roundToPrecision(once, "CHF")).toBe(once);
  });

  it("supports half-up rounding", () => {
    const halfUp = new CurrencyPrecision({ roundingMode: "half-up" });
    expect(roundToPrecision("2.345", "CHF", halfUp)).toBe("2.35");
    expect(roundToPrecision("2.345", "CHF")).toBe("2.34");
  });

  it("rejects malformed amounts", () => {
    expect(() => roundToPrecision("12,50", "CHF")).toThrow(LedgerError);
  });
});

// ─── CurrencyPrecision ───────────────────────────────────────────────────

describe("CurrencyPrecision", () => {
  it("reports decimals per currency", () => {
    expect(precision.decimalsOf("JPY")).toBe(0);
    expect(precision.decimalsOf("CHF")).toBe(2);
    expect(precision.decimalsOf("XAU")).toBe(4);
  });

  it("supports five-cent increments", () => {
    const cash = new CurrencyPrecision({ currencies: { CHF: "0.05" } });
    expect(cash.format(parseDecimal("1.075"), "CHF")).toBe("1.10");
    expect(cash.decimalsOf("CHF")).toBe(2);
  });

  it("computes half a rounding unit", () => {
    expect(DEFAULT_PRECISION.halfUnitOf("CHF")).toEqual(parseDecimal("0.005"));
  });

  it("treats values that round to zero as negligible", () => {
    expect(DEFAULT_PRECISION.isNegligible(parseDecimal("0.004"), "CHF")).toBe(true);
    expect(DEFAULT_PRECISION.isNegligible(parseDecimal("0.006"), "CHF")).toBe(false);
  });

  it("serializes its configuration", () => {
    expect(precision.toJSON()).toEqual({
      defaultPrecision: "0.01",
      currencies: { JPY: "1", XAU: "0.0001" },
    });
  });

  it("rejects a non-positive increment", () => {
    expect(() => new CurrencyPrecision({ currencies: { EUR: "0" } })).toThrow(LedgerError);
    expect(() => new CurrencyPrecision({ defaultPrecision: "-0.01" })).toThrow(LedgerError);
  });

  it("rejects a malformed increment", () => {
    expect(() => new CurrencyPrecision({ currencies: { EUR: "cent" } })).toThrow(
      'Invalid precision "cent" for EUR',
    );
  });
});

// ─── Helpers ─────────────────────────────────────────────────────────────

describe("amount helpers", () => {
  it("sums decimal strings exactly", () => {
    expect(sumAmounts(["0.1", "0.2", "-0.3"])).toEqual(parseDecimal("0"));
  });

  it("negates at currency precision", () => {
    expect(negateAmount("12.5", "EUR")).toBe("-12.50");
    expect(negateAmount("-3", "JPY", precision)).toBe("3");
  });

  it("detects zero amounts", () => {
    expect(isZeroAmount("0.00")).toBe(true);
    expect(isZeroAmount("-0.01")).toBe(false);
  });
});
