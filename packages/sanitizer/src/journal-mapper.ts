/**
 * Journal Mapper: sanitized transactions to remote journal entries.
 *
 * A single line becomes an individual entry booked from its counter
 * account to its account. Several lines become a collective entry in one
 * currency at one eight-digit rate, resolved in strict mode: the mapper
 * is the last stop before posting and refuses anything the remote
 * would store incorrectly.
 */

import type {
  LedgerLine,
  RemoteCollectiveItem,
  RemoteIndividualEntry,
  RemoteJournalEntry,
} from "@ledgersync/types";
import {
  div,
  formatRate,
  groupById,
  isNegative,
  isZero,
  neg,
  ONE,
  roundRate,
  ZERO,
} from "@ledgersync/ledger";
import type { CurrencyPrecision, Rational } from "@ledgersync/ledger";
import type { Logger } from "pino";
import { resolveCollectiveCurrency } from "./currency-resolver.js";
import { EmptyTransactionError, InconsistentTransactionError } from "./errors.js";
import { amountOf, lineCurrency, reportingAmountOf } from "./lines.js";

export interface JournalMapperOptions {
  readonly reportingCurrency: string;
  readonly precision: CurrencyPrecision;
  readonly logger?: Logger | undefined;
}

function requireAccount(line: LedgerLine, value: string | null, column: string): string {
  if (value === null) {
    throw new InconsistentTransactionError(`Transaction "${line.id}" has no ${column}`);
  }
  return value;
}

function toIndividualEntry(line: LedgerLine, options: JournalMapperOptions): RemoteIndividualEntry {
  const { reportingCurrency, precision } = options;
  const currency = lineCurrency(line, reportingCurrency);
  const amount = amountOf(line);
  const reportingAmount = reportingAmountOf(line, reportingCurrency);
  const rate =
    currency === reportingCurrency || isZero(amount)
      ? ONE
      : roundRate(div(reportingAmount, amount), precision.roundingMode);

  return {
    kind: "individual",
    id: line.id,
    date: line.date,
    account: requireAccount(line, line.account, "account"),
    counterAccount: requireAccount(line, line.counterAccount, "counter account"),
    amount: precision.format(amount, currency),
    currency,
    reportingAmount: precision.format(reportingAmount, reportingCurrency),
    rate: formatRate(rate),
    title: line.description,
    taxCode: line.taxCode,
    document: line.document,
  };
}

/**
 * Amount of a line in the entry currency. In a reporting-currency entry
 * every line contributes its reporting amount; otherwise reporting lines
 * are converted at the entry rate and zero-amount lines of other
 * currencies contribute nothing.
 */
function entryAmount(
  line: LedgerLine,
  entryCurrency: string,
  rate: Rational,
  options: JournalMapperOptions,
): Rational {
  const { reportingCurrency, precision } = options;
  const currency = lineCurrency(line, reportingCurrency);
  if (entryCurrency === reportingCurrency) {
    return reportingAmountOf(line, reportingCurrency);
  }
  if (currency === entryCurrency) {
    return amountOf(line);
  }
  if (currency === reportingCurrency && !isZero(rate)) {
    return precision.round(div(amountOf(line), rate), entryCurrency);
  }
  return ZERO;
}

function toCollectiveItem(
  line: LedgerLine,
  amount: Rational,
  currency: string,
  precision: CurrencyPrecision,
): RemoteCollectiveItem {
  return {
    account: requireAccount(line, line.account, "account"),
    debit: precision.format(isNegative(amount) ? neg(amount) : ZERO, currency),
    credit: precision.format(isNegative(amount) ? ZERO : amount, currency),
    taxCode: line.taxCode,
    description: line.description,
  };
}

/**
 * Map the lines of one sanitized transaction to a remote journal entry.
 *
 * @throws {EmptyTransactionError} for no lines
 * @throws {InconsistentTransactionError} for mixed dates or missing accounts
 * @throws {IncoherentCurrencyError | IncoherentFXRateError} when the lines
 *   admit no single currency and rate
 */
export function toRemoteJournalEntry(
  lines: readonly LedgerLine[],
  options: JournalMapperOptions,
): RemoteJournalEntry {
  const [first] = lines;
  if (first === undefined) {
    throw new EmptyTransactionError();
  }
  if (lines.length === 1) {
    return toIndividualEntry(first, options);
  }

  const dates = new Set(lines.map((line) => line.date));
  if (dates.size > 1) {
    throw new InconsistentTransactionError(
      `Transaction "${first.id}" has lines on different dates: ${[...dates].join(", ")}`,
    );
  }

  const { currency, rate } = resolveCollectiveCurrency(lines, {
    reportingCurrency: options.reportingCurrency,
    precision: options.precision,
    mode: "strict",
    logger: options.logger,
  });

  return {
    kind: "collective",
    id: first.id,
    date: first.date,
    currency,
    rate: formatRate(rate),
    items: lines.map((line) =>
      toCollectiveItem(line, entryAmount(line, currency, rate, options), currency, options.precision),
    ),
    document: first.document,
  };
}

/** Map every transaction of a sanitized ledger, in order of first appearance. */
export function toRemoteJournal(
  lines: readonly LedgerLine[],
  options: JournalMapperOptions,
): RemoteJournalEntry[] {
  return [...groupById(lines).values()].map((group) => toRemoteJournalEntry(group, options));
}
