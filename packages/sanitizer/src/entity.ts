/**
 * LedgerEntity: the remote CRUD surface of one entity type.
 *
 * Each entity type of the remote ledger (accounts, tax codes, ...) is
 * reached through these five operations. Mirroring logic and the
 * transitory guard depend on the interface, never on a concrete client.
 */

export interface LedgerEntity<TRecord, TKey = string> {
  /** All records currently stored remotely, standardized. */
  list(): Promise<readonly TRecord[]>;

  /** Create records. Fails when a key already exists. */
  add(records: readonly TRecord[]): Promise<void>;

  /** Update records by key. Fails when a key does not exist. */
  modify(records: readonly TRecord[]): Promise<void>;

  /** Remove records by key. Unknown keys fail unless `allowMissing` is set. */
  delete(keys: readonly TKey[], allowMissing?: boolean): Promise<void>;

  /** Bring records into canonical form. */
  standardize(records: readonly TRecord[]): TRecord[];
}
