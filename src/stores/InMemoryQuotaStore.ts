/**
 * In-memory quota store.
 * Used by tests and by single-process runs without a database.
 */

import type { IQuotaStore } from './IQuotaStore.js';
import type { ApiCallRecord, QuotaLedgerEntry } from '../types/models.js';

export class InMemoryQuotaStore implements IQuotaStore {
  readonly entries = new Map<string, QuotaLedgerEntry>();
  readonly calls: ApiCallRecord[] = [];

  async ensureEntry(entry: QuotaLedgerEntry): Promise<QuotaLedgerEntry> {
    const existing = this.entries.get(entry.date);
    if (existing) return { ...existing };
    this.entries.set(entry.date, { ...entry });
    return { ...entry };
  }

  async save(entry: QuotaLedgerEntry): Promise<void> {
    this.entries.set(entry.date, { ...entry });
  }

  async addUsage(date: string, cost: number, dailyLimit: number): Promise<number> {
    const entry = this.entries.get(date) ?? {
      date,
      used: 0,
      dailyLimit,
      reserved: 0,
      lastResetAt: new Date(`${date}T00:00:00.000Z`),
    };
    entry.used += cost;
    this.entries.set(date, entry);
    return entry.used;
  }

  async appendCall(record: ApiCallRecord): Promise<void> {
    this.calls.push({ ...record });
  }

  async pruneCalls(before: Date): Promise<number> {
    const kept = this.calls.filter((c) => c.timestamp.getTime() >= before.getTime());
    const removed = this.calls.length - kept.length;
    this.calls.splice(0, this.calls.length, ...kept);
    return removed;
  }

  clear(): void {
    this.entries.clear();
    this.calls.length = 0;
  }
}
