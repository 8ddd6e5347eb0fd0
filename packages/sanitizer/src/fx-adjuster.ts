/**
 * FX-Precision Adjuster
 *
 * The remote service stores one exchange rate per transaction with eight
 * decimal digits and derives reporting amounts from it. Re-applying that
 * rate to a foreign amount can miss the supplied reporting amount by a
 * rounding unit. The adjuster books each such residual on a separate
 * posting so that every line agrees with the stored rate while the
 * financial result stays the same.
 */

import type { LedgerLine } from "@ledgersync/types";
import {
  convertAmount,
  div,
  formatRate,
  isZero,
  neg,
  roundRate,
  sub,
  sum,
  ZERO,
} from "@ledgersync/ledger";
import type { Rational } from "@ledgersync/ledger";
import { resolveCollectiveCurrency } from "./currency-resolver.js";
import { EmptyTransactionError } from "./errors.js";
import { amountOf, lineCurrency, reportingAmountOf } from "./lines.js";
import type { SanitizeContext } from "./types.js";

export const FX_ADJUSTMENT_DESCRIPTION = "Currency adjustments to match the remote FX rate precision";
export const FX_ADJUSTMENT_PREFIX = "Currency adjustments: ";

/** Suffix of the id of a generated FX adjustment transaction. */
export const FX_SUFFIX = ":fx";

// =============================================================================
// Individual Transactions
// =============================================================================

/**
 * A single foreign line whose reporting amount is not reproduced by its
 * own eight-digit rate keeps the reproducible part. The residual is
 * booked in the reporting currency on a separate line between the same
 * two accounts, so both accounts keep their original reporting totals.
 */
function adjustIndividual(line: LedgerLine, context: SanitizeContext): LedgerLine[] {
  const { reportingCurrency, precision } = context;
  const currency = lineCurrency(line, reportingCurrency);
  const amount = amountOf(line);
  if (isZero(amount) || currency === reportingCurrency) {
    return [line];
  }

  const reportingAmount = reportingAmountOf(line, reportingCurrency);
  const rate = roundRate(div(reportingAmount, amount), precision.roundingMode);
  const implied = convertAmount(amount, rate, reportingCurrency, precision);
  const residual = precision.round(sub(reportingAmount, implied), reportingCurrency);
  if (isZero(residual)) {
    return [line];
  }

  context.logger?.debug(
    { transactionId: line.id, rate: formatRate(rate), residual: precision.format(residual, reportingCurrency) },
    "FX precision residual on individual transaction",
  );

  return [
    { ...line, reportingAmount: precision.format(implied, reportingCurrency) },
    {
      ...line,
      id: `${line.id}${FX_SUFFIX}`,
      amount: precision.format(residual, reportingCurrency),
      reportingAmount: precision.format(residual, reportingCurrency),
      currency: reportingCurrency,
      taxCode: null,
      description: `${FX_ADJUSTMENT_PREFIX}${line.description}`,
    },
  ];
}

// =============================================================================
// Collective Transactions
// =============================================================================

/**
 * Residual of one line against the transaction rate. A reporting line is
 * converted to the foreign currency and back; a foreign line is compared
 * against its own reporting amount. Clearing lines on the transitory
 * account carry no residual, so adjusted output adjusts to itself.
 */
function lineResidual(
  line: LedgerLine,
  foreignCurrency: string,
  rate: Rational,
  context: SanitizeContext,
): Rational {
  const { reportingCurrency, transitoryAccount, precision } = context;
  const amount = amountOf(line);
  if (lineCurrency(line, reportingCurrency) === reportingCurrency) {
    if (line.account === transitoryAccount.account || isZero(rate)) {
      return ZERO;
    }
    const foreign = precision.round(div(amount, rate), foreignCurrency);
    return sub(amount, convertAmount(foreign, rate, reportingCurrency, precision));
  }
  return sub(
    reportingAmountOf(line, reportingCurrency),
    convertAmount(amount, rate, reportingCurrency, precision),
  );
}

function adjustCollective(lines: readonly LedgerLine[], context: SanitizeContext): LedgerLine[] {
  const { reportingCurrency, transitoryAccount, precision, logger } = context;
  const resolved = resolveCollectiveCurrency(lines, {
    reportingCurrency,
    precision,
    mode: "lenient",
    logger,
  });
  if (resolved.currency === reportingCurrency) {
    return [...lines];
  }

  const rate = roundRate(resolved.rate, precision.roundingMode);
  const residuals = lines.map((line) => lineResidual(line, resolved.currency, rate, context));
  if (residuals.every(isZero)) {
    return [...lines];
  }

  const [head] = lines;
  if (head === undefined) {
    throw new EmptyTransactionError();
  }
  const total = sum(residuals);
  const format = (value: Rational): string => precision.format(value, reportingCurrency);

  // (a) lines re-expressed at the stored rate
  const adjusted = lines.map((line, index): LedgerLine => {
    const residual = residuals[index] ?? ZERO;
    const reportingAmount = format(sub(reportingAmountOf(line, reportingCurrency), residual));
    if (lineCurrency(line, reportingCurrency) === reportingCurrency) {
      return { ...line, amount: reportingAmount, reportingAmount };
    }
    return { ...line, reportingAmount };
  });

  // (b) clearing line restoring the balance of the original transaction
  const clearing: LedgerLine = {
    id: head.id,
    date: head.date,
    account: transitoryAccount.account,
    counterAccount: null,
    amount: format(total),
    reportingAmount: format(total),
    currency: reportingCurrency,
    taxCode: null,
    description: FX_ADJUSTMENT_DESCRIPTION,
    document: head.document,
  };

  // (c) secondary transaction carrying the residuals themselves
  const fxId = `${head.id}${FX_SUFFIX}`;
  const fxLines: LedgerLine[] = [];
  lines.forEach((line, index) => {
    const residual = residuals[index] ?? ZERO;
    if (isZero(residual)) {
      return;
    }
    const currency = lineCurrency(line, reportingCurrency);
    fxLines.push({
      ...line,
      id: fxId,
      amount: currency === reportingCurrency ? format(residual) : precision.format(ZERO, currency),
      reportingAmount: format(residual),
      taxCode: null,
      description: `${FX_ADJUSTMENT_PREFIX}${line.description}`,
    });
  });

  const result = [...adjusted];
  if (!isZero(total)) {
    result.push(clearing);
    fxLines.push({
      ...clearing,
      id: fxId,
      amount: format(neg(total)),
      reportingAmount: format(neg(total)),
      description: `${FX_ADJUSTMENT_PREFIX}${clearing.description}`,
    });
  }

  logger?.debug(
    {
      transactionId: head.id,
      currency: resolved.currency,
      rate: formatRate(rate),
      residual: format(total),
    },
    "FX precision residuals on collective transaction",
  );

  return [...result, ...fxLines];
}

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Make one transaction's reporting amounts agree with its eight-digit
 * exchange rate. Lines must already be limited to the reporting currency
 * plus one foreign currency.
 *
 * Returns the lines unchanged when no residual arises. Otherwise returns
 * the adjusted transaction followed by a "{id}:fx" transaction that
 * carries the residuals.
 *
 * @throws {EmptyTransactionError} for no lines
 */
export function adjustFxPrecision(
  lines: readonly LedgerLine[],
  context: SanitizeContext,
): LedgerLine[] {
  const [first] = lines;
  if (first === undefined) {
    throw new EmptyTransactionError();
  }
  if (lines.length === 1) {
    return adjustIndividual(first, context);
  }
  return adjustCollective(lines, context);
}
