/**
 * Tests for ledger standardization.
 *
 * Covers:
 * - Canonical columns and null handling
 * - Amount rounding per currency
 * - Document consolidation within a transaction
 * - Rejection of inconsistent transactions
 * - Grouping order and idempotence
 */

import { describe, it, expect } from "vitest";
import { standardizeLedger, groupById } from "../src/standardize.js";
import { CurrencyPrecision } from "../src/precision.js";
import { LedgerError } from "../src/types.js";
import type { LedgerLineInput } from "../src/types.js";

describe("standardizeLedger", () => {
  it("fills every column and cleans values", () => {
    const [line] = standardizeLedger([
      {
        id: " 1 ",
        date: "2024-05-24",
        account: "1000",
        counterAccount: "",
        amount: "100",
        currency: "eur",
        description: " Office rent ",
      },
    ]);

    expect(line).toEqual({
      id: "1",
      date: "2024-05-24",
      account: "1000",
      counterAccount: null,
      amount: "100.00",
      reportingAmount: null,
      currency: "EUR",
      taxCode: null,
      description: "Office rent",
      document: null,
    });
  });

  it("rounds amounts to the line currency and reporting amounts to the reporting currency", () => {
    const precision = new CurrencyPrecision({ currencies: { JPY: "1" } });
    const [line] = standardizeLedger(
      [{ id: "1", date: "2024-05-24", amount: "1234.4", reportingAmount: "7.123", currency: "JPY" }],
      { precision, reportingCurrency: "CHF" },
    );

    expect(line?.amount).toBe("1234");
    expect(line?.reportingAmount).toBe("7.12");
  });

  it("truncates timestamps to dates", () => {
    const [line] = standardizeLedger([
      { id: "1", date: "2024-05-24T10:00:00Z", amount: "1" },
    ]);
    expect(line?.date).toBe("2024-05-24");
  });

  it("shares a single document across all lines of an id", () => {
    const lines = standardizeLedger([
      { id: "1", date: "2024-05-24", amount: "100", document: "" },
      { id: "1", date: "2024-05-24", amount: "-100", document: "invoice-17.pdf" },
      { id: "2", date: "2024-05-24", amount: "5" },
    ]);

    expect(lines.map((l) => l.document)).toEqual(["invoice-17.pdf", "invoice-17.pdf", null]);
  });

  it("rejects conflicting documents within an id", () => {
    expect(() =>
      standardizeLedger([
        { id: "1", date: "2024-05-24", amount: "100", document: "a.pdf" },
        { id: "1", date: "2024-05-24", amount: "-100", document: "b.pdf" },
      ]),
    ).toThrow('Transaction "1" references more than one document: a.pdf, b.pdf');
  });

  it("rejects mixed dates within an id", () => {
    try {
      standardizeLedger([
        { id: "1", date: "2024-05-24", amount: "100" },
        { id: "1", date: "2024-05-25", amount: "-100" },
      ]);
      expect.unreachable("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(LedgerError);
      expect((err as LedgerError).code).toBe("INCONSISTENT_TRANSACTION");
    }
  });

  it("rejects a missing id, a bad date and a bad amount", () => {
    expect(() => standardizeLedger([{ id: " ", date: "2024-05-24", amount: "1" }])).toThrow(
      "Ledger lines require a non-empty id",
    );
    expect(() => standardizeLedger([{ id: "1", date: "24.05.2024", amount: "1" }])).toThrow(
      'Transaction "1" has an invalid date: "24.05.2024"',
    );
    expect(() => standardizeLedger([{ id: "1", date: "2024-05-24", amount: "ten" }])).toThrow(
      'Transaction "1": Invalid decimal: "ten"',
    );
  });

  it("groups lines by id in first-appearance order", () => {
    const lines = standardizeLedger([
      { id: "b", date: "2024-05-24", amount: "1" },
      { id: "a", date: "2024-05-24", amount: "2" },
      { id: "b", date: "2024-05-24", amount: "-1" },
    ]);
    expect(lines.map((l) => `${l.id}:${l.amount}`)).toEqual(["b:1.00", "b:-1.00", "a:2.00"]);
  });

  it("is idempotent", () => {
    const input: LedgerLineInput[] = [
      { id: "1", date: "2024-05-24", amount: "10.005", currency: "usd", document: "x.pdf" },
      { id: "1", date: "2024-05-24", amount: "-10.005", currency: "USD" },
    ];
    const once = standardizeLedger(input);
    expect(standardizeLedger(once)).toEqual(once);
  });
});

describe("groupById", () => {
  it("maps ids to their lines", () => {
    const groups = groupById([{ id: "1" }, { id: "2" }, { id: "1" }]);
    expect([...groups.keys()]).toEqual(["1", "2"]);
    expect(groups.get("1")).toHaveLength(2);
  });
});
