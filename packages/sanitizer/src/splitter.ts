/**
 * Splitter: decompose multi-currency transactions.
 *
 * The remote service accepts the reporting currency plus one foreign
 * currency per collective transaction. A transaction spanning several
 * foreign currencies is split into one sub-transaction per
 * (id, currency) pair with id "{id}:{currency}". A sub-transaction that
 * does not balance in the reporting currency gets a clearing line on
 * the transitory account. The groups partition a balanced transaction,
 * so the clearing lines of one original id sum to zero.
 */

import type { LedgerLine } from "@ledgersync/types";
import { isZeroAmount, negateAmount, sumAmounts } from "@ledgersync/ledger";
import { lineCurrency, reportingAmountOf } from "./lines.js";
import type { SanitizeContext } from "./types.js";

export const SPLIT_DESCRIPTION =
  "Split multi-currency transaction into multiple transactions compatible with the remote ledger";

interface CurrencyGroup {
  readonly id: string;
  readonly currency: string;
  readonly lines: LedgerLine[];
}

/**
 * Split transactions into single-currency sub-transactions, each
 * balanced through the transitory account.
 *
 * Lines in the reporting currency take their amount as reporting amount.
 *
 * @throws {MissingAmountError} when a foreign line has no reporting amount
 */
export function splitMultiCurrencyTransaction(
  lines: readonly LedgerLine[],
  context: SanitizeContext,
): LedgerLine[] {
  const { reportingCurrency, transitoryAccount, precision } = context;

  const groups = new Map<string, CurrencyGroup>();
  for (const line of lines) {
    const currency = lineCurrency(line, reportingCurrency);
    const reportingAmount = precision.format(
      reportingAmountOf(line, reportingCurrency),
      reportingCurrency,
    );
    const key = `${line.id}\u0000${currency}`;
    let group = groups.get(key);
    if (group === undefined) {
      group = { id: `${line.id}:${currency}`, currency, lines: [] };
      groups.set(key, group);
    }
    group.lines.push({ ...line, id: group.id, reportingAmount });
  }

  const result: LedgerLine[] = [];
  for (const group of groups.values()) {
    result.push(...group.lines);

    const balance = precision.format(
      sumAmounts(group.lines.map((line) => line.reportingAmount ?? line.amount)),
      reportingCurrency,
    );
    const [head] = group.lines;
    if (head === undefined || isZeroAmount(balance)) {
      continue;
    }
    const clearing = negateAmount(balance, reportingCurrency, precision);
    result.push({
      id: group.id,
      date: head.date,
      account: transitoryAccount.account,
      counterAccount: null,
      amount: clearing,
      reportingAmount: clearing,
      currency: reportingCurrency,
      taxCode: null,
      description: SPLIT_DESCRIPTION,
      document: head.document,
    });
  }
  return result;
}
