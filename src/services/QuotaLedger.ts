/**
 * Quota ledger.
 * Tracks daily consumption of the video platform's metered API against a
 * fixed budget. Every component checks it before spending.
 *
 * Mutations are serialized through a promise chain. Today's stored usage is
 * loaded before the first mutation (or by init()), and charges are added to
 * the store atomically, so processes sharing a store share one counter.
 * Reservations are local to this process. A new UTC day rolls the ledger
 * over lazily on the next mutation, and status() reports the rolled-over
 * view without mutating anything.
 */

import type { IQuotaStore } from '../stores/IQuotaStore.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { safeNotify, type INotificationProvider } from '../providers/INotificationProvider.js';
import type {
  ApiCallRecord,
  OperationStats,
  QuotaLedgerEntry,
  QuotaStatus,
} from '../types/models.js';
import { describeError } from '../errors.js';
import { nextUtcMidnight, utcDayKey } from '../utils/time.js';

const HISTORY_RETENTION_MS = 24 * 60 * 60 * 1000;
const RECENT_CALLS_LIMIT = 50;

export interface CostModel {
  searchCost: number;
  detailCost: number;
  detailBatchSize: number;
  /** Provider calls issued per logical search. */
  callsPerSearch: number;
}

export interface QuotaLedgerOptions {
  dailyLimit: number;
  nearLimitFraction: number;
  criticalFraction: number;
  /** Name used in user-facing notifications. */
  resourceName?: string;
  costModel?: Partial<CostModel>;
  now?: () => Date;
}

export interface ApiCallInput {
  operation: string;
  cost: number;
  success: boolean;
  durationMs: number;
  error?: string | null;
  itemsReturned?: number;
}

export interface Reservation {
  readonly id: number;
  readonly cost: number;
  readonly date: string;
}

export interface CostEstimate {
  sourceSearchCost: number;
  topicSearchCost: number;
  detailCost: number;
  total: number;
  remaining: number;
  exceedsBudget: boolean;
  /** Fraction of the daily limit used if the estimate is spent. */
  projectedUsageFraction: number;
}

export interface UsageStatistics {
  byOperation: Record<string, OperationStats>;
  totalCalls: number;
  totalDurationMs: number;
  errorCount: number;
  recentCalls: ApiCallRecord[];
}

type Threshold = 'near' | 'critical' | 'limit';

export class QuotaLedger {
  private entry: QuotaLedgerEntry;
  private readonly reservations = new Map<number, Reservation>();
  private nextReservationId = 1;
  private readonly stats = new Map<string, OperationStats>();
  private history: ApiCallRecord[] = [];
  private readonly notified = new Set<Threshold>();
  private queue: Promise<unknown> = Promise.resolve();
  private loaded = false;

  private readonly resourceName: string;
  private readonly costModel: CostModel;
  private readonly now: () => Date;

  constructor(
    private readonly store: IQuotaStore,
    private readonly notifier: INotificationProvider,
    private readonly logger: ILogProvider,
    private readonly options: QuotaLedgerOptions
  ) {
    this.resourceName = options.resourceName ?? 'YouTube API quota';
    this.costModel = {
      searchCost: 100,
      detailCost: 1,
      detailBatchSize: 50,
      callsPerSearch: 2,
      ...options.costModel,
    };
    this.now = options.now ?? (() => new Date());
    this.entry = this.freshEntry(this.now());
  }

  /**
   * Load today's persisted usage, creating the day's entry if needed.
   * Mutations do this on first use; call it to make status() accurate
   * before anything has been spent.
   */
  async init(): Promise<void> {
    await this.serialize(() => this.load());
  }

  /** True iff `used + reserved + cost <= dailyLimit` for the current UTC day. */
  isAvailable(cost: number): boolean {
    const entry = this.current();
    return entry.used + entry.reserved + cost <= entry.dailyLimit;
  }

  /**
   * Atomically hold `cost` units for an in-flight call.
   * Returns null when the budget cannot cover it.
   */
  reserve(cost: number): Promise<Reservation | null> {
    return this.serialize(async () => {
      await this.prepare();
      if (!this.isAvailable(cost)) return null;

      const reservation: Reservation = {
        id: this.nextReservationId++,
        cost,
        date: this.entry.date,
      };
      this.reservations.set(reservation.id, reservation);
      this.entry.reserved += cost;
      return reservation;
    });
  }

  /** Drop a reservation without charging anything. */
  release(reservation: Reservation): Promise<void> {
    return this.serialize(async () => {
      this.dropReservation(reservation);
    });
  }

  /** Release a reservation and record the calls it covered, in one step. */
  settle(reservation: Reservation, calls: ApiCallInput[]): Promise<void> {
    return this.serialize(async () => {
      await this.prepare();
      this.dropReservation(reservation);
      let charged = 0;
      for (const call of calls) {
        charged += await this.apply(call);
      }
      await this.commitUsage(charged);
      this.checkThresholds();
    });
  }

  /** Charge one call against today's budget and append it to the audit trail. */
  record(call: ApiCallInput): Promise<void> {
    return this.serialize(async () => {
      await this.prepare();
      await this.commitUsage(await this.apply(call));
      this.checkThresholds();
    });
  }

  /**
   * Zero usage and reservations, clear statistics, keep the last 24h of
   * history. Overwrites the stored usage for today.
   */
  reset(): Promise<QuotaLedgerEntry> {
    return this.serialize(() => this.resetNow('manual'));
  }

  /** Reset only if the ledger still belongs to an earlier UTC day. */
  resetIfNewDay(): Promise<QuotaLedgerEntry | null> {
    return this.serialize(async () => {
      if (!this.loaded) {
        await this.load();
        return null;
      }
      if (this.entry.date === utcDayKey(this.now())) return null;
      return this.resetNow('scheduled');
    });
  }

  status(): QuotaStatus {
    const entry = this.current();
    const usageFraction = entry.dailyLimit > 0 ? entry.used / entry.dailyLimit : 1;
    return {
      date: entry.date,
      used: entry.used,
      limit: entry.dailyLimit,
      reserved: entry.reserved,
      remaining: Math.max(0, entry.dailyLimit - entry.used - entry.reserved),
      usageFraction,
      resetsAt: nextUtcMidnight(this.now()),
      lastResetAt: entry.lastResetAt,
      isNearLimit: usageFraction >= this.options.nearLimitFraction,
      isCritical: usageFraction >= this.options.criticalFraction,
    };
  }

  usageStatistics(): UsageStatistics {
    const byOperation: Record<string, OperationStats> = {};
    let totalCalls = 0;
    let totalDurationMs = 0;
    let errorCount = 0;
    for (const [operation, s] of this.stats) {
      byOperation[operation] = { ...s };
      totalCalls += s.calls;
      totalDurationMs += s.totalDurationMs;
      errorCount += s.errors;
    }
    return {
      byOperation,
      totalCalls,
      totalDurationMs,
      errorCount,
      recentCalls: this.history.slice(-RECENT_CALLS_LIMIT),
    };
  }

  /** Projected cost of one generation run for the given workload. */
  estimateSuggestionCost(sourceCount: number, topicCount: number, estimatedVideos: number): CostEstimate {
    const { searchCost, detailCost, detailBatchSize, callsPerSearch } = this.costModel;
    const sourceSearchCost = sourceCount * searchCost * callsPerSearch;
    const topicSearchCost = topicCount * searchCost * callsPerSearch;
    const detail = Math.ceil(Math.max(0, estimatedVideos) / detailBatchSize) * detailCost;
    const total = sourceSearchCost + topicSearchCost + detail;
    const status = this.status();

    return {
      sourceSearchCost,
      topicSearchCost,
      detailCost: detail,
      total,
      remaining: status.remaining,
      exceedsBudget: total > status.remaining,
      projectedUsageFraction:
        status.limit > 0 ? (status.used + status.reserved + total) / status.limit : 1,
    };
  }

  // ── Private ──

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  /** The entry as it stands for today, without mutating state. */
  private current(): QuotaLedgerEntry {
    const now = this.now();
    if (this.entry.date !== utcDayKey(now)) {
      return { ...this.freshEntry(now), lastResetAt: this.entry.lastResetAt };
    }
    return this.entry;
  }

  private freshEntry(now: Date): QuotaLedgerEntry {
    return {
      date: utcDayKey(now),
      used: 0,
      dailyLimit: this.options.dailyLimit,
      reserved: 0,
      lastResetAt: now,
    };
  }

  /** Load on first use, then roll over if the UTC day changed. */
  private async prepare(): Promise<void> {
    if (!this.loaded) {
      await this.load();
    } else if (this.entry.date !== utcDayKey(this.now())) {
      await this.resetNow('day_rollover');
    }
  }

  private async load(): Promise<void> {
    const fresh = this.freshEntry(this.now());
    this.entry = await this.adopt(fresh);
    this.loaded = true;
  }

  /** The stored entry for `fresh.date`, or `fresh` itself when the store fails. */
  private async adopt(fresh: QuotaLedgerEntry): Promise<QuotaLedgerEntry> {
    try {
      const stored = await this.store.ensureEntry(fresh);
      // Reservations are in-memory only; a stored value belongs to another process.
      return { ...stored, dailyLimit: this.options.dailyLimit, reserved: 0 };
    } catch (err) {
      this.logger.error('Failed to load quota ledger', { date: fresh.date, error: describeError(err) });
      return fresh;
    }
  }

  private async resetNow(trigger: 'manual' | 'scheduled' | 'day_rollover'): Promise<QuotaLedgerEntry> {
    const now = this.now();
    const previous = { ...this.entry };

    this.entry = this.freshEntry(now);
    this.loaded = true;
    this.reservations.clear();
    this.stats.clear();
    this.notified.clear();

    const cutoff = new Date(now.getTime() - HISTORY_RETENTION_MS);
    this.history = this.history.filter((c) => c.timestamp.getTime() >= cutoff.getTime());

    if (trigger === 'manual') {
      await this.persist();
    } else {
      // Another process may already have spent against the new day.
      this.entry = await this.adopt(this.entry);
    }
    try {
      await this.store.pruneCalls(cutoff);
    } catch (err) {
      this.logger.error('Failed to prune API call history', { error: describeError(err) });
    }

    this.logger.info('Quota ledger reset', {
      trigger,
      previousDate: previous.date,
      previousUsed: previous.used,
      limit: previous.dailyLimit,
    });
    return previous;
  }

  private dropReservation(reservation: Reservation): void {
    if (!this.reservations.delete(reservation.id)) return;
    if (reservation.date !== this.entry.date) return;
    this.entry.reserved = Math.max(0, this.entry.reserved - reservation.cost);
  }

  /** Account one call in memory and the audit trail. Returns the cost charged. */
  private async apply(call: ApiCallInput): Promise<number> {
    const record: ApiCallRecord = {
      timestamp: this.now(),
      operation: call.operation,
      cost: Math.max(0, call.cost),
      success: call.success,
      error: call.error ?? null,
      durationMs: call.durationMs,
      itemsReturned: call.itemsReturned ?? 0,
    };

    this.entry.used += record.cost;
    this.history.push(record);

    const s = this.stats.get(record.operation) ?? {
      calls: 0,
      quotaUsed: 0,
      totalDurationMs: 0,
      errors: 0,
    };
    s.calls++;
    s.quotaUsed += record.cost;
    s.totalDurationMs += record.durationMs;
    if (!record.success) s.errors++;
    this.stats.set(record.operation, s);

    try {
      await this.store.appendCall(record);
    } catch (err) {
      this.logger.error('Failed to append API call record', {
        operation: record.operation,
        error: describeError(err),
      });
    }
    return record.cost;
  }

  /** Add `cost` to the stored usage and adopt the shared total. */
  private async commitUsage(cost: number): Promise<void> {
    if (cost <= 0) return;
    try {
      this.entry.used = await this.store.addUsage(this.entry.date, cost, this.entry.dailyLimit);
    } catch (err) {
      this.logger.error('Failed to persist quota ledger', {
        date: this.entry.date,
        error: describeError(err),
      });
    }
  }

  private checkThresholds(): void {
    const { used, dailyLimit } = this.entry;
    const fraction = dailyLimit > 0 ? used / dailyLimit : 1;
    const fields = { used, limit: dailyLimit, percent: Math.round(fraction * 100) };

    if (fraction >= 1) {
      if (this.markNotified('limit', 'critical', 'near')) {
        this.logger.error('Daily quota exhausted', fields);
        const resetAt = nextUtcMidnight(this.now());
        void safeNotify(this.logger, () =>
          this.notifier.notifyQuotaLimit(this.resourceName, resetAt)
        );
      }
    } else if (fraction >= this.options.criticalFraction) {
      if (this.markNotified('critical', 'near')) {
        this.logger.warn('Daily quota nearly exhausted', fields);
        void safeNotify(this.logger, () =>
          this.notifier.notifyWarning(
            `Video search is at ${fields.percent}% of today's allowance. New suggestions may pause until the daily reset.`
          )
        );
      }
    } else if (fraction >= this.options.nearLimitFraction) {
      if (this.markNotified('near')) {
        this.logger.info('Daily quota usage is high', fields);
      }
    }
  }

  /** Marks thresholds as notified; true if the first one was not yet. */
  private markNotified(first: Threshold, ...implied: Threshold[]): boolean {
    if (this.notified.has(first)) return false;
    this.notified.add(first);
    for (const t of implied) this.notified.add(t);
    return true;
  }

  private async persist(): Promise<void> {
    try {
      await this.store.save({ ...this.entry });
    } catch (err) {
      this.logger.error('Failed to persist quota ledger', {
        date: this.entry.date,
        error: describeError(err),
      });
    }
  }
}
