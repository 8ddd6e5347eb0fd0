/**
 * Sanitization Pipeline
 *
 * Per transaction id, in this order:
 * 1. fill missing reporting amounts
 * 2. split ids spanning more than one foreign currency
 * 3. adjust every group to the eight-digit rate precision
 * 4. standardize the result
 *
 * Sanitizing sanitized output is a no-op.
 */

import type { LedgerLine } from "@ledgersync/types";
import { groupById, LedgerError, roundToPrecision, standardizeLedger } from "@ledgersync/ledger";
import type { LedgerLineInput } from "@ledgersync/ledger";
import { InconsistentTransactionError, MissingAmountError } from "./errors.js";
import { adjustFxPrecision } from "./fx-adjuster.js";
import { foreignCurrencies } from "./lines.js";
import { splitMultiCurrencyTransaction } from "./splitter.js";
import type { ReportingAmountResolver, SanitizeContext } from "./types.js";

export interface SanitizeOptions extends SanitizeContext {
  /** Fills reporting amounts of foreign lines that arrive without one. */
  readonly reportingAmounts?: ReportingAmountResolver | undefined;
}

function standardize(lines: readonly LedgerLineInput[], options: SanitizeOptions): LedgerLine[] {
  try {
    return standardizeLedger(lines, {
      precision: options.precision,
      reportingCurrency: options.reportingCurrency,
    });
  } catch (err) {
    if (err instanceof LedgerError && err.code === "INCONSISTENT_TRANSACTION") {
      throw new InconsistentTransactionError(err.message);
    }
    throw err;
  }
}

function fillReportingAmount(line: LedgerLine, options: SanitizeOptions): LedgerLine {
  const { reportingCurrency, precision, reportingAmounts } = options;
  const currency = line.currency ?? reportingCurrency;
  if (currency === reportingCurrency) {
    return { ...line, currency, reportingAmount: line.amount };
  }
  if (line.reportingAmount !== null) {
    return line;
  }
  if (reportingAmounts === undefined) {
    throw new MissingAmountError(
      `Transaction "${line.id}": no reporting-currency amount for ${line.amount} ${currency}`,
    );
  }
  const converted = reportingAmounts.reportingAmount(line.amount, currency, line.date);
  return {
    ...line,
    reportingAmount: roundToPrecision(converted, reportingCurrency, precision),
  };
}

/**
 * Turn ledger rows into transactions the remote ledger can store.
 *
 * All-or-nothing: any error aborts the whole run.
 *
 * @throws {MissingAmountError} when a foreign line has no reporting amount
 *   and no resolver is given
 * @throws {InconsistentTransactionError} for mixed dates or documents in one id
 */
export function sanitizeLedger(
  lines: readonly LedgerLineInput[],
  options: SanitizeOptions,
): LedgerLine[] {
  const { reportingCurrency, logger } = options;
  const filled = standardize(lines, options).map((line) => fillReportingAmount(line, options));

  const groups: LedgerLine[][] = [];
  const splitIds: string[] = [];
  for (const [id, group] of groupById(filled)) {
    if (foreignCurrencies(group, reportingCurrency).length > 1) {
      splitIds.push(id);
      groups.push(...groupById(splitMultiCurrencyTransaction(group, options)).values());
    } else {
      groups.push(group);
    }
  }

  const adjusted: LedgerLine[] = [];
  const adjustedIds: string[] = [];
  for (const group of groups) {
    const result = adjustFxPrecision(group, options);
    const [head] = group;
    if (head !== undefined && result.length !== group.length) {
      adjustedIds.push(head.id);
    }
    adjusted.push(...result);
  }

  const output = standardize(adjusted, options);
  logger?.debug(
    {
      inputLines: lines.length,
      outputLines: output.length,
      splitIds,
      adjustedIds,
    },
    "Sanitized ledger",
  );
  return output;
}
