/**
 * Tests for the JSON data files read at startup.
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  loadAccounts,
  loadPriceHistory,
  parseAccounts,
  parsePriceHistory,
} from "../src/data-files.js";

describe("parsePriceHistory", () => {
  it("accepts string and numeric rates", () => {
    expect(
      parsePriceHistory([
        { date: "2024-01-01", currency: "eur", rate: 0.95 },
        { date: "2024-02-01", currency: "USD", rate: "0.88" },
      ]),
    ).toEqual([
      { date: "2024-01-01", currency: "EUR", rate: "0.95" },
      { date: "2024-02-01", currency: "USD", rate: "0.88" },
    ]);
  });

  it("rejects records without a date", () => {
    expect(() => parsePriceHistory([{ currency: "EUR", rate: "0.95" }])).toThrow();
  });

  it("rejects a non-array document", () => {
    expect(() => parsePriceHistory({ EUR: 0.95 })).toThrow();
  });
});

describe("parseAccounts", () => {
  it("fills optional fields", () => {
    expect(parseAccounts([{ account: 1000, currency: "chf" }])).toEqual([
      { account: "1000", currency: "CHF", description: "", taxCode: null, group: "/" },
    ]);
  });
});

describe("loading files", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "ledgersync-data-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns no records without a path", async () => {
    expect(await loadAccounts(undefined)).toEqual([]);
    expect(await loadPriceHistory(undefined)).toEqual([]);
  });

  it("reads a price history file", async () => {
    const path = join(dir, "prices.json");
    writeFileSync(path, JSON.stringify([{ date: "2024-01-01", currency: "EUR", rate: "0.95" }]));

    expect(await loadPriceHistory(path)).toEqual([
      { date: "2024-01-01", currency: "EUR", rate: "0.95" },
    ]);
  });

  it("reads an account file", async () => {
    const path = join(dir, "accounts.json");
    writeFileSync(
      path,
      JSON.stringify([
        { account: "1999", currency: "CHF", description: "Clearing", taxCode: null, group: "/Assets" },
      ]),
    );

    expect(await loadAccounts(path)).toEqual([
      { account: "1999", currency: "CHF", description: "Clearing", taxCode: null, group: "/Assets" },
    ]);
  });

  it("rejects a malformed file", async () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "[{");

    await expect(loadAccounts(path)).rejects.toThrow(SyntaxError);
  });
});
