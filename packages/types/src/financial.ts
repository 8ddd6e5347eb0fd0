/**
 * Financial Types
 *
 * Core ledger primitives shared by the sanitizer, the standardizer
 * and the HTTP service.
 *
 * Rules:
 * - All amounts are decimal strings to avoid floating-point errors
 * - A null currency means the reporting currency
 * - A null reporting amount means "not yet converted"
 */

/**
 * Currency identifier (ISO 4217 code or a ticker, e.g. "CHF", "EUR").
 */
export type Currency = string;

/**
 * Decimal amount as a string (e.g. "100.50", "-0.01").
 */
export type DecimalString = string;

/**
 * One posting row of a journal transaction.
 *
 * Lines sharing an `id` form one logical transaction. A single line is an
 * individual transaction (account against counter account); two or more
 * lines form a collective transaction that must net to zero in the
 * reporting currency.
 */
export interface LedgerLine {
  /** Transaction identifier shared by all lines of one transaction */
  readonly id: string;

  /** Booking date (YYYY-MM-DD) */
  readonly date: string;

  /** Account the amount is booked on */
  readonly account: string | null;

  /** Counter account, only for individual (single-line) transactions */
  readonly counterAccount: string | null;

  /** Signed amount in `currency` */
  readonly amount: DecimalString;

  /** Signed amount in the reporting currency, null until converted */
  readonly reportingAmount: DecimalString | null;

  /** Currency of `amount`; null means the reporting currency */
  readonly currency: Currency | null;

  readonly taxCode: string | null;

  /** Free-text booking text */
  readonly description: string;

  /** Document reference (e.g. receipt file name) */
  readonly document: string | null;
}

/**
 * Shape of a transaction: one line, or several netting to zero.
 */
export type TransactionKind = "individual" | "collective";

/**
 * An account in the chart of accounts.
 */
export interface AccountRecord {
  /** Account identifier (e.g. "1000") */
  readonly account: string;

  /** Currency the account is denominated in */
  readonly currency: Currency;

  readonly description: string;

  /** Default tax code, if any */
  readonly taxCode: string | null;

  /** Slash-separated account group path (e.g. "/Assets/Current Assets") */
  readonly group: string;
}
