/**
 * Remote Journal Types
 *
 * The shape in which sanitized transactions are handed to the remote
 * bookkeeping service. The remote side knows two kinds of entries:
 * individual entries (one amount between two accounts) and collective
 * entries (several items in a single currency at a single FX rate).
 */

import type { Currency, DecimalString } from "./financial.js";

/**
 * A single-line entry booked from `counterAccount` (debit)
 * to `account` (credit).
 */
export interface RemoteIndividualEntry {
  readonly kind: "individual";
  readonly id: string;
  readonly date: string;
  readonly account: string;
  readonly counterAccount: string;
  readonly amount: DecimalString;
  readonly currency: Currency;

  /** Reporting-currency amount the remote should derive from `rate` */
  readonly reportingAmount: DecimalString;

  /** Exchange rate with at most eight decimal digits */
  readonly rate: string;
  readonly title: string;
  readonly taxCode: string | null;
  readonly document: string | null;
}

/**
 * One item of a collective entry. Exactly one of debit/credit is non-zero
 * (or both are zero for pure FX adjustment items).
 */
export interface RemoteCollectiveItem {
  readonly account: string;
  readonly debit: DecimalString;
  readonly credit: DecimalString;
  readonly taxCode: string | null;
  readonly description: string;
}

/**
 * A multi-item entry in a single currency at a single exchange rate.
 */
export interface RemoteCollectiveEntry {
  readonly kind: "collective";
  readonly id: string;
  readonly date: string;
  readonly currency: Currency;

  /** Exchange rate with at most eight decimal digits */
  readonly rate: string;
  readonly items: readonly RemoteCollectiveItem[];
  readonly document: string | null;
}

export type RemoteJournalEntry = RemoteIndividualEntry | RemoteCollectiveEntry;
