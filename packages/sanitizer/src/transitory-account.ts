/**
 * Transitory Account Guard
 *
 * Holds the identifier of the clearing account and checks it against
 * the account chart. `resolveTransitoryAccount` is called once per
 * pipeline run and its result is threaded through as a parameter.
 *
 * Assignment provisions a missing account. Concurrent assignments of
 * the same id share one provisioning call.
 */

import type { Logger } from "pino";
import type { AccountRecord } from "@ledgersync/types";
import type { LedgerEntity } from "./entity.js";
import { ConfigurationError } from "./errors.js";
import type { TransitoryAccount } from "./types.js";

export const DEFAULT_TRANSITORY_GROUP = "/Assets";
export const TRANSITORY_DESCRIPTION = "Transitory account";

export interface TransitoryAccountGuardOptions {
  readonly reportingCurrency: string;
  /** Initial account id, checked on first resolution. */
  readonly account?: string | undefined;
  /** Group of a provisioned account. Default "/Assets". */
  readonly group?: string | undefined;
  readonly logger?: Logger | undefined;
}

export class TransitoryAccountGuard {
  private readonly _accounts: LedgerEntity<AccountRecord>;
  private readonly _reportingCurrency: string;
  private readonly _group: string;
  private readonly _logger: Logger | undefined;
  private readonly _pending = new Map<string, Promise<void>>();
  private _account: string | null;

  constructor(accounts: LedgerEntity<AccountRecord>, options: TransitoryAccountGuardOptions) {
    this._accounts = accounts;
    this._reportingCurrency = options.reportingCurrency;
    this._group = options.group ?? DEFAULT_TRANSITORY_GROUP;
    this._logger = options.logger;
    this._account = options.account ?? null;
  }

  /** The assigned id, unvalidated. */
  get account(): string | null {
    return this._account;
  }

  /**
   * The validated clearing account.
   *
   * @throws {ConfigurationError} when unset, absent from the chart, or
   *   not denominated in the reporting currency
   */
  async resolveTransitoryAccount(): Promise<TransitoryAccount> {
    const account = this._account;
    if (account === null) {
      throw new ConfigurationError("Transitory account is not set");
    }
    const record = (await this._accounts.list()).find((entry) => entry.account === account);
    if (record === undefined) {
      throw new ConfigurationError(`Transitory account ${account} does not exist`);
    }
    if (record.currency !== this._reportingCurrency) {
      throw new ConfigurationError(
        `Transitory account ${account} must be denominated in ${this._reportingCurrency}, ` +
          `not ${record.currency}`,
      );
    }
    return { account, currency: record.currency };
  }

  /**
   * Assign the clearing account, creating it in the reporting currency
   * when the chart does not have it.
   */
  async setTransitoryAccount(account: string): Promise<void> {
    const id = account.trim();
    if (id === "") {
      throw new ConfigurationError("Transitory account must not be empty");
    }

    let pending = this._pending.get(id);
    if (pending === undefined) {
      pending = this._provision(id).finally(() => {
        this._pending.delete(id);
      });
      this._pending.set(id, pending);
    }
    await pending;
    this._account = id;
  }

  private async _provision(account: string): Promise<void> {
    const existing = await this._accounts.list();
    if (existing.some((entry) => entry.account === account)) {
      return;
    }
    await this._accounts.add([
      {
        account,
        currency: this._reportingCurrency,
        description: TRANSITORY_DESCRIPTION,
        taxCode: null,
        group: this._group,
      },
    ]);
    this._logger?.info(
      { account, currency: this._reportingCurrency, group: this._group },
      "Provisioned transitory account",
    );
  }
}
