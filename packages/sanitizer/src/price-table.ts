/**
 * PriceTable: FX rate lookup from a price history.
 *
 * Answers the reporting-currency value of a foreign amount from the
 * latest rate on or before the booking date.
 */

import { convertAmount, ONE, parseDecimal, toPlainString } from "@ledgersync/ledger";
import type { CurrencyPrecision, Rational } from "@ledgersync/ledger";
import { MissingAmountError } from "./errors.js";
import type { ReportingAmountResolver } from "./types.js";

/** Price of one unit of `currency` in the reporting currency. */
export interface PriceRecord {
  readonly date: string;
  readonly currency: string;
  readonly rate: string;
}

interface DatedRate {
  readonly date: string;
  readonly rate: Rational;
}

export class PriceTable implements ReportingAmountResolver {
  private readonly _reportingCurrency: string;
  private readonly _precision: CurrencyPrecision;
  private readonly _rates = new Map<string, DatedRate[]>();

  constructor(
    records: readonly PriceRecord[],
    options: { readonly reportingCurrency: string; readonly precision: CurrencyPrecision },
  ) {
    this._reportingCurrency = options.reportingCurrency;
    this._precision = options.precision;
    for (const record of records) {
      const currency = record.currency.toUpperCase();
      let history = this._rates.get(currency);
      if (history === undefined) {
        history = [];
        this._rates.set(currency, history);
      }
      history.push({ date: record.date, rate: parseDecimal(record.rate) });
    }
    for (const history of this._rates.values()) {
      history.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
    }
  }

  /** Currencies with at least one rate. */
  get currencies(): string[] {
    return [...this._rates.keys()];
  }

  /**
   * Latest rate of `currency` on or before `date`; 1 for the reporting
   * currency, undefined when the history starts later.
   */
  rateOn(currency: string, date: string): Rational | undefined {
    const code = currency.toUpperCase();
    if (code === this._reportingCurrency) {
      return ONE;
    }
    let found: Rational | undefined;
    for (const entry of this._rates.get(code) ?? []) {
      if (entry.date > date) break;
      found = entry.rate;
    }
    return found;
  }

  /**
   * @throws {MissingAmountError} when no rate is known for the date
   */
  reportingAmount(amount: string, currency: string, date: string): string {
    const rate = this.rateOn(currency, date);
    if (rate === undefined) {
      throw new MissingAmountError(`No ${currency} rate on or before ${date}`);
    }
    const converted = convertAmount(parseDecimal(amount), rate, this._reportingCurrency, this._precision);
    return this._precision.format(converted, this._reportingCurrency);
  }

  toJSON(): PriceRecord[] {
    const records: PriceRecord[] = [];
    for (const [currency, history] of this._rates) {
      for (const entry of history) {
        records.push({ date: entry.date, currency, rate: toPlainString(entry.rate) });
      }
    }
    return records;
  }
}
