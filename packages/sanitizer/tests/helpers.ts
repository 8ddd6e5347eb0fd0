/**
 * Shared test fixtures for @ledgersync/sanitizer.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { LedgerLine } from "@ledgersync/types";
import { CurrencyPrecision } from "@ledgersync/ledger";
import type { SanitizeContext } from "../src/types.js";

export const REPORTING = "CHF";
export const TRANSITORY = "1999";

export const precision = new CurrencyPrecision({ currencies: { JPY: "1" } });

export function context(logger?: Logger): SanitizeContext {
  return {
    reportingCurrency: REPORTING,
    transitoryAccount: { account: TRANSITORY, currency: REPORTING },
    precision,
    logger,
  };
}

/** A standardized line with defaults for every column not given. */
export function line(fields: Partial<LedgerLine> & Pick<LedgerLine, "id" | "amount">): LedgerLine {
  return {
    date: "2024-05-24",
    account: "1000",
    counterAccount: null,
    reportingAmount: null,
    currency: null,
    taxCode: null,
    description: "",
    document: null,
    ...fields,
  };
}

export function foreign(
  id: string,
  amount: string,
  reportingAmount: string,
  currency = "EUR",
  fields: Partial<LedgerLine> = {},
): LedgerLine {
  return line({ id, amount, reportingAmount, currency, ...fields });
}

export interface CapturedLogger {
  readonly logger: Logger;
  readonly records: Record<string, unknown>[];
}

/** A pino logger writing parsed records to an array. */
export function captureLogger(): CapturedLogger {
  const records: Record<string, unknown>[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(message: string): void {
        records.push(JSON.parse(message));
      },
    },
  );
  return { logger, records };
}
