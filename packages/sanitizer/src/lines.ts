/**
 * Helpers reading the monetary columns of standardized ledger lines.
 */

import type { LedgerLine } from "@ledgersync/types";
import { isZeroAmount, parseDecimal } from "@ledgersync/ledger";
import type { Rational } from "@ledgersync/ledger";
import { MissingAmountError } from "./errors.js";

/** Currency of a line; a null currency denotes the reporting currency. */
export function lineCurrency(line: LedgerLine, reportingCurrency: string): string {
  return line.currency ?? reportingCurrency;
}

export function amountOf(line: LedgerLine): Rational {
  return parseDecimal(line.amount);
}

/**
 * Reporting-currency amount of a line. Lines in the reporting currency
 * report their own amount.
 *
 * @throws {MissingAmountError} for a foreign line without one
 */
export function reportingAmountOf(line: LedgerLine, reportingCurrency: string): Rational {
  if (lineCurrency(line, reportingCurrency) === reportingCurrency) {
    return amountOf(line);
  }
  if (line.reportingAmount === null) {
    throw new MissingAmountError(
      `Transaction "${line.id}" has a ${line.currency ?? ""} line without reporting-currency amount`,
    );
  }
  return parseDecimal(line.reportingAmount);
}

/**
 * A line that needs no exchange rate: reporting currency, or a zero amount.
 */
export function isReportingOnly(line: LedgerLine, reportingCurrency: string): boolean {
  return lineCurrency(line, reportingCurrency) === reportingCurrency || isZeroAmount(line.amount);
}

/** Distinct foreign currencies of a transaction, in order of appearance. */
export function foreignCurrencies(
  lines: readonly LedgerLine[],
  reportingCurrency: string,
): string[] {
  const currencies = new Set<string>();
  for (const line of lines) {
    const currency = lineCurrency(line, reportingCurrency);
    if (currency !== reportingCurrency) {
      currencies.add(currency);
    }
  }
  return [...currencies];
}
