/**
 * Persistence for the daily quota ledger and its API call audit trail.
 * Usage is shared by every process that spends against the same key, so it
 * only ever grows through addUsage; save() is reserved for explicit resets.
 */

import type { ApiCallRecord, QuotaLedgerEntry } from '../types/models.js';

export interface IQuotaStore {
  /** The stored entry for `entry.date`, inserting `entry` first when there is none. */
  ensureEntry(entry: QuotaLedgerEntry): Promise<QuotaLedgerEntry>;

  /** Insert or replace the entry for `entry.date`. */
  save(entry: QuotaLedgerEntry): Promise<void>;

  /**
   * Atomically add `cost` to the usage recorded for `date` and return the
   * new total. Creates the day's entry when missing.
   */
  addUsage(date: string, cost: number, dailyLimit: number): Promise<number>;

  /** Append one record to the audit trail. */
  appendCall(record: ApiCallRecord): Promise<void>;

  /** Delete audit records older than `before`. Returns how many were removed. */
  pruneCalls(before: Date): Promise<number>;
}
