/**
 * @ledgersync/ledger: Ledger standardization.
 *
 * Brings raw ledger rows into the canonical schema every later stage
 * relies on:
 * - every column present, absent values as null
 * - currency codes upper-case, amounts rounded to their currency
 * - one date and at most one document reference per transaction id,
 *   the document shared by all lines of the id
 * - lines grouped by id, ids in first-appearance order
 *
 * Standardizing standardized lines returns equal lines.
 */

import type { LedgerLine } from "@ledgersync/types";
import { roundToPrecision } from "./money-math.js";
import { DEFAULT_PRECISION } from "./precision.js";
import { LedgerError } from "./types.js";
import type { LedgerLineInput, StandardizeOptions } from "./types.js";

const DATE_PREFIX = /^(\d{4}-\d{2}-\d{2})(?:$|T)/;

function clean(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
}

function parseDate(line: LedgerLineInput): string {
  const match = DATE_PREFIX.exec(line.date.trim());
  if (match === null || match[1] === undefined) {
    throw new LedgerError(
      "INVALID_LINE",
      `Transaction "${line.id}" has an invalid date: "${line.date}"`,
    );
  }
  return match[1];
}

function standardizeLine(line: LedgerLineInput, options: StandardizeOptions): LedgerLine {
  const precision = options.precision ?? DEFAULT_PRECISION;
  const id = clean(line.id);
  if (id === null) {
    throw new LedgerError("INVALID_LINE", "Ledger lines require a non-empty id");
  }

  const currency = clean(line.currency)?.toUpperCase() ?? null;
  const reportingAmount = clean(line.reportingAmount);

  return {
    id,
    date: parseDate(line),
    account: clean(line.account),
    counterAccount: clean(line.counterAccount),
    amount: roundToPrecision(line.amount, currency, precision),
    reportingAmount:
      reportingAmount === null
        ? null
        : roundToPrecision(reportingAmount, options.reportingCurrency ?? null, precision),
    currency,
    taxCode: clean(line.taxCode),
    description: clean(line.description) ?? "",
    document: clean(line.document),
  };
}

/**
 * Group lines by transaction id, preserving first-appearance order of ids
 * and the original order of lines within each id.
 */
export function groupById<T extends { readonly id: string }>(
  lines: readonly T[],
): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const line of lines) {
    let group = groups.get(line.id);
    if (group === undefined) {
      group = [];
      groups.set(line.id, group);
    }
    group.push(line);
  }
  return groups;
}

function consolidate(id: string, group: readonly LedgerLine[]): LedgerLine[] {
  const dates = new Set(group.map((line) => line.date));
  if (dates.size > 1) {
    throw new LedgerError(
      "INCONSISTENT_TRANSACTION",
      `Transaction "${id}" has lines on different dates: ${[...dates].join(", ")}`,
    );
  }

  const documents = new Set<string>();
  for (const line of group) {
    if (line.document !== null) {
      documents.add(line.document);
    }
  }
  if (documents.size > 1) {
    throw new LedgerError(
      "INCONSISTENT_TRANSACTION",
      `Transaction "${id}" references more than one document: ${[...documents].join(", ")}`,
    );
  }

  const [document] = documents;
  if (document === undefined) {
    return [...group];
  }
  return group.map((line) => (line.document === document ? line : { ...line, document }));
}

/**
 * Standardize raw ledger rows into canonical `LedgerLine` records.
 *
 * @throws {LedgerError} INVALID_LINE for a missing id, bad date or amount;
 *   INCONSISTENT_TRANSACTION for mixed dates or documents within one id
 */
export function standardizeLedger(
  lines: readonly LedgerLineInput[],
  options: StandardizeOptions = {},
): LedgerLine[] {
  const standardized = lines.map((line) => {
    try {
      return standardizeLine(line, options);
    } catch (err) {
      if (err instanceof LedgerError && err.code === "INVALID_AMOUNT") {
        throw new LedgerError(
          "INVALID_LINE",
          `Transaction "${line.id}": ${err.message}`,
        );
      }
      throw err;
    }
  });

  const result: LedgerLine[] = [];
  for (const [id, group] of groupById(standardized)) {
    result.push(...consolidate(id, group));
  }
  return result;
}
