/**
 * Supabase-backed quota store.
 * One row per UTC day in `quota_ledger`; audit records in `api_calls`.
 * Usage grows through the `increment_quota_usage` function so that several
 * processes can spend against the same day without overwriting each other.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IQuotaStore } from './IQuotaStore.js';
import type { ApiCallRecord, QuotaLedgerEntry } from '../types/models.js';
import type { QuotaLedgerRow } from '../types/database.js';

export class SupabaseQuotaStore implements IQuotaStore {
  constructor(private readonly db: SupabaseClient) {}

  async ensureEntry(entry: QuotaLedgerEntry): Promise<QuotaLedgerEntry> {
    const { error: insertError } = await this.db
      .from('quota_ledger')
      .upsert(toRow(entry), { onConflict: 'date', ignoreDuplicates: true });
    if (insertError) throw new Error(`Failed to create quota ledger entry: ${insertError.message}`);

    const { data, error } = await this.db
      .from('quota_ledger')
      .select('*')
      .eq('date', entry.date)
      .single();

    if (error) throw new Error(`Failed to load quota ledger: ${error.message}`);
    return fromRow(data as QuotaLedgerRow);
  }

  async save(entry: QuotaLedgerEntry): Promise<void> {
    const { error } = await this.db.from('quota_ledger').upsert(toRow(entry), { onConflict: 'date' });
    if (error) throw new Error(`Failed to save quota ledger: ${error.message}`);
  }

  async addUsage(date: string, cost: number, dailyLimit: number): Promise<number> {
    const { data, error } = await this.db.rpc('increment_quota_usage', {
      p_date: date,
      p_cost: cost,
      p_daily_limit: dailyLimit,
    });

    if (error) throw new Error(`Failed to add quota usage: ${error.message}`);
    return Number(data ?? 0);
  }

  async appendCall(record: ApiCallRecord): Promise<void> {
    const { error } = await this.db.from('api_calls').insert({
      called_at: record.timestamp.toISOString(),
      operation: record.operation,
      cost: record.cost,
      success: record.success,
      error: record.error,
      duration_ms: Math.round(record.durationMs),
      items_returned: record.itemsReturned,
    });

    if (error) throw new Error(`Failed to record API call: ${error.message}`);
  }

  async pruneCalls(before: Date): Promise<number> {
    const { count, error } = await this.db
      .from('api_calls')
      .delete({ count: 'exact' })
      .lt('called_at', before.toISOString());

    if (error) throw new Error(`Failed to prune API calls: ${error.message}`);
    return count ?? 0;
  }
}

function toRow(entry: QuotaLedgerEntry): QuotaLedgerRow {
  return {
    date: entry.date,
    used: entry.used,
    daily_limit: entry.dailyLimit,
    reserved: entry.reserved,
    last_reset_at: entry.lastResetAt.toISOString(),
  };
}

function fromRow(row: QuotaLedgerRow): QuotaLedgerEntry {
  return {
    date: row.date,
    used: row.used,
    dailyLimit: row.daily_limit,
    reserved: row.reserved,
    lastResetAt: new Date(row.last_reset_at),
  };
}
