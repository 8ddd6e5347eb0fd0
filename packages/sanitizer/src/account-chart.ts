/**
 * @ledgersync/sanitizer: In-memory account chart.
 *
 * A LedgerEntity of accounts held in a Map. Backs the transitory guard
 * in tests and in the service when no remote client is configured.
 */

import type { AccountRecord } from "@ledgersync/types";
import type { LedgerEntity } from "./entity.js";
import { SanitizerError } from "./errors.js";

function cleanGroup(group: string): string {
  const trimmed = group.trim();
  if (trimmed === "") {
    return "/";
  }
  return trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
}

export class InMemoryAccountChart implements LedgerEntity<AccountRecord> {
  private readonly _accounts = new Map<string, AccountRecord>();

  constructor(initial: readonly AccountRecord[] = []) {
    for (const record of this.standardize(initial)) {
      if (this._accounts.has(record.account)) {
        throw new SanitizerError("DUPLICATE_ACCOUNT", `Account ${record.account} is listed twice`);
      }
      this._accounts.set(record.account, record);
    }
  }

  async list(): Promise<readonly AccountRecord[]> {
    return [...this._accounts.values()].sort((a, b) =>
      a.account.localeCompare(b.account, "en", { numeric: true }),
    );
  }

  async add(records: readonly AccountRecord[]): Promise<void> {
    const standardized = this.standardize(records);
    for (const record of standardized) {
      if (this._accounts.has(record.account)) {
        throw new SanitizerError("DUPLICATE_ACCOUNT", `Account ${record.account} already exists`);
      }
    }
    for (const record of standardized) {
      this._accounts.set(record.account, record);
    }
  }

  async modify(records: readonly AccountRecord[]): Promise<void> {
    const standardized = this.standardize(records);
    for (const record of standardized) {
      if (!this._accounts.has(record.account)) {
        throw new SanitizerError("UNKNOWN_ACCOUNT", `Account ${record.account} does not exist`);
      }
    }
    for (const record of standardized) {
      this._accounts.set(record.account, record);
    }
  }

  async delete(keys: readonly string[], allowMissing = false): Promise<void> {
    if (!allowMissing) {
      const missing = keys.filter((key) => !this._accounts.has(key));
      if (missing.length > 0) {
        throw new SanitizerError(
          "UNKNOWN_ACCOUNT",
          `Cannot delete unknown accounts: ${missing.join(", ")}`,
        );
      }
    }
    for (const key of keys) {
      this._accounts.delete(key);
    }
  }

  standardize(records: readonly AccountRecord[]): AccountRecord[] {
    return records.map((record) => {
      const taxCode = record.taxCode?.trim() ?? "";
      return {
        account: record.account.trim(),
        currency: record.currency.trim().toUpperCase(),
        description: record.description.trim(),
        taxCode: taxCode === "" ? null : taxCode,
        group: cleanGroup(record.group),
      };
    });
  }
}
