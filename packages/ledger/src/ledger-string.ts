/**
 * @ledgersync/ledger: Canonical ledger rendering.
 *
 * Renders lines as CSV with columns in alphabetical order and rows sorted
 * by every column, so two ledgers with the same content compare equal
 * regardless of row order.
 */

import type { LedgerLine } from "@ledgersync/types";

type Column = keyof LedgerLine;

const COLUMNS: readonly Column[] = (
  [
    "id",
    "date",
    "account",
    "counterAccount",
    "amount",
    "reportingAmount",
    "currency",
    "taxCode",
    "description",
    "document",
  ] satisfies Column[]
).sort();

function escapeCell(value: string | null): string {
  if (value === null) {
    return "";
  }
  if (/[",\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** Nulls sort after every string. */
function compareCells(a: string | null, b: string | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a < b ? -1 : 1;
}

function compareLines(a: LedgerLine, b: LedgerLine): number {
  for (const column of COLUMNS) {
    const order = compareCells(a[column], b[column]);
    if (order !== 0) {
      return order;
    }
  }
  return 0;
}

/**
 * Render a ledger as sorted CSV text (header line first, no trailing newline).
 */
export function ledgerToString(lines: readonly LedgerLine[]): string {
  const rows = [...lines].sort(compareLines);
  const header = COLUMNS.join(",");
  const body = rows.map((line) => COLUMNS.map((column) => escapeCell(line[column])).join(","));
  return [header, ...body].join("\n");
}
