/**
 * FX-precision adjuster tests
 */
import { describe, it, expect } from "vitest";
import { adjustFxPrecision, FX_ADJUSTMENT_DESCRIPTION } from "../src/fx-adjuster.js";
import { EmptyTransactionError } from "../src/errors.js";
import { captureLogger, context, foreign, line, TRANSITORY } from "./helpers.js";
import type { LedgerLine } from "@ledgersync/types";

function rows(lines: readonly LedgerLine[]) {
  return lines.map((l) => [l.id, l.account, l.currency, l.amount, l.reportingAmount, l.description]);
}

describe("adjustFxPrecision", () => {
  describe("individual transactions", () => {
    it("keeps a line its eight-digit rate reproduces", () => {
      const entry = foreign("9", "100.00", "91.44", "EUR", { counterAccount: "2000" });
      expect(adjustFxPrecision([entry], context())).toEqual([entry]);
    });

    it("keeps a line with a four-digit implied rate", () => {
      const entry = foreign("9", "100.00", "91.45", "EUR", { counterAccount: "2000" });
      expect(adjustFxPrecision([entry], context())).toEqual([entry]);
    });

    it("keeps reporting-currency and zero-amount lines", () => {
      const chf = line({ id: "9", amount: "100.00", currency: "CHF" });
      const zero = foreign("9", "0.00", "0.05");
      expect(adjustFxPrecision([chf], context())).toEqual([chf]);
      expect(adjustFxPrecision([zero], context())).toEqual([zero]);
    });

    it("moves the residual of a large amount to a reporting-currency :fx line", () => {
      const entry = foreign("9", "10000000.00", "9144000.07", "EUR", {
        counterAccount: "2000",
        description: "Bond",
        taxCode: "VAT",
      });
      const result = adjustFxPrecision([entry], context());

      expect(result).toHaveLength(2);
      expect(result[0]).toEqual({ ...entry, reportingAmount: "9144000.10" });
      expect(result[1]).toEqual({
        ...entry,
        id: "9:fx",
        account: "1000",
        counterAccount: "2000",
        amount: "-0.03",
        reportingAmount: "-0.03",
        currency: "CHF",
        taxCode: null,
        description: "Currency adjustments: Bond",
      });
    });

    it("leaves the transitory account untouched and both accounts at their original totals", () => {
      const entry = foreign("9", "10000000.00", "9144000.07", "EUR", { counterAccount: "2000" });
      const result = adjustFxPrecision([entry], context());

      expect(result.some((l) => l.account === TRANSITORY || l.counterAccount === TRANSITORY)).toBe(false);
      const total = result.reduce((acc, l) => acc + Math.round(Number(l.reportingAmount) * 100), 0);
      expect(total).toBe(914400007);
      expect(result.every((l) => l.account === "1000" && l.counterAccount === "2000")).toBe(true);
    });
  });

  describe("collective transactions", () => {
    it("keeps a transaction without residuals", () => {
      const lines = [
        foreign("1", "100.00", "120.00"),
        foreign("1", "-200.00", "-240.00"),
        foreign("1", "100.00", "120.00"),
      ];
      expect(adjustFxPrecision(lines, context())).toEqual(lines);
    });

    it("keeps a reporting-currency transaction", () => {
      const lines = [line({ id: "1", amount: "0.03" }), line({ id: "1", amount: "-0.03" })];
      expect(adjustFxPrecision(lines, context())).toEqual(lines);
    });

    it("books a foreign residual through the transitory account", () => {
      const lines = [
        foreign("3", "100.00", "91.44", "EUR", { description: "Sale A" }),
        foreign("3", "2.00", "1.84", "EUR", { description: "Sale B" }),
        line({ id: "3", amount: "-93.28", currency: "CHF", account: "3000", description: "Revenue" }),
      ];
      expect(rows(adjustFxPrecision(lines, context()))).toEqual([
        ["3", "1000", "EUR", "100.00", "91.44", "Sale A"],
        ["3", "1000", "EUR", "2.00", "1.83", "Sale B"],
        ["3", "3000", "CHF", "-93.28", "-93.28", "Revenue"],
        ["3", TRANSITORY, "CHF", "0.01", "0.01", FX_ADJUSTMENT_DESCRIPTION],
        ["3:fx", "1000", "EUR", "0.00", "0.01", "Currency adjustments: Sale B"],
        ["3:fx", TRANSITORY, "CHF", "-0.01", "-0.01", `Currency adjustments: ${FX_ADJUSTMENT_DESCRIPTION}`],
      ]);
    });

    it("adjusts reporting lines that do not survive conversion", () => {
      const lines = [
        foreign("4", "100.00", "120.00", "EUR", { description: "Invoice" }),
        line({ id: "4", amount: "-119.97", currency: "CHF", account: "3000", description: "Payment" }),
        line({ id: "4", amount: "-0.03", currency: "CHF", account: "3400", description: "Fee" }),
      ];
      expect(rows(adjustFxPrecision(lines, context()))).toEqual([
        ["4", "1000", "EUR", "100.00", "120.00", "Invoice"],
        ["4", "3000", "CHF", "-119.98", "-119.98", "Payment"],
        ["4", "3400", "CHF", "-0.02", "-0.02", "Fee"],
        ["4:fx", "3000", "CHF", "0.01", "0.01", "Currency adjustments: Payment"],
        ["4:fx", "3400", "CHF", "-0.01", "-0.01", "Currency adjustments: Fee"],
      ]);
    });

    it("leaves clearing lines on the transitory account alone", () => {
      const lines = [
        foreign("4", "100.00", "120.00"),
        line({ id: "4", amount: "-100.00", currency: "CHF", account: "3000" }),
        line({ id: "4", amount: "-20.03", currency: "CHF", account: "3400" }),
        line({ id: "4", amount: "0.03", currency: "CHF", account: TRANSITORY }),
      ];
      expect(adjustFxPrecision(lines, context())).toEqual(lines);
    });

    it("warns about the fallback rate and logs the residual", () => {
      const { logger, records } = captureLogger();
      adjustFxPrecision(
        [
          foreign("3", "100.00", "91.44"),
          foreign("3", "2.00", "1.84"),
          line({ id: "3", amount: "-93.28", currency: "CHF" }),
        ],
        context(logger),
      );
      expect(records.map((r) => r.msg)).toEqual([
        "Accepted exchange rate outside the tolerance interval",
        "FX precision residuals on collective transaction",
      ]);
      expect(records[1]).toMatchObject({ transactionId: "3", rate: "0.9144", residual: "0.01" });
    });
  });

  it("rejects an empty transaction", () => {
    expect(() => adjustFxPrecision([], context())).toThrow(EmptyTransactionError);
  });
});
