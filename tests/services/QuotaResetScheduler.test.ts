import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { QuotaResetScheduler } from '../../src/services/QuotaResetScheduler.js';
import { QuotaLedger } from '../../src/services/QuotaLedger.js';
import { InMemoryQuotaStore } from '../../src/stores/InMemoryQuotaStore.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { MockNotificationProvider } from '../mocks/MockNotificationProvider.js';

describe('QuotaResetScheduler', () => {
  const cleanupExpired = vi.fn<() => Promise<number>>();
  let logger: ConsoleLogProvider;
  let ledger: QuotaLedger;
  let scheduler: QuotaResetScheduler;

  function spend(cost: number): Promise<void> {
    return ledger.record({ operation: 'search.topic', cost, success: true, durationMs: 1 });
  }

  beforeEach(() => {
    vi.useFakeTimers({ now: new Date('2026-03-10T23:59:00Z') });
    cleanupExpired.mockReset();
    cleanupExpired.mockResolvedValue(3);
    logger = new ConsoleLogProvider();
    ledger = new QuotaLedger(new InMemoryQuotaStore(), new MockNotificationProvider(), logger, {
      dailyLimit: 1000,
      nearLimitFraction: 0.8,
      criticalFraction: 0.95,
    });
    scheduler = new QuotaResetScheduler(ledger, { cleanupExpired }, logger, {
      retryBackoffMs: 10_000,
      settleDelayMs: 1_000,
    });
  });

  afterEach(async () => {
    await scheduler.stop();
    vi.useRealTimers();
  });

  // --- runOnce() ---

  it('should only sweep expired suggestions when the day has not changed', async () => {
    await spend(400);
    await expect(scheduler.runOnce()).resolves.toEqual({ reset: false, previousUsed: null, expiredRemoved: 3 });
    expect(ledger.status().used).toBe(400);
  });

  it("should reset the ledger once the UTC day has changed", async () => {
    await spend(400);
    vi.setSystemTime(new Date('2026-03-11T00:00:01Z'));

    await expect(scheduler.runOnce()).resolves.toEqual({ reset: true, previousUsed: 400, expiredRemoved: 3 });
    expect(ledger.status().used).toBe(0);
    await expect(scheduler.runOnce()).resolves.toMatchObject({ reset: false });
  });

  // --- loop ---

  it('should wake at UTC midnight and run one iteration', async () => {
    await spend(700);
    scheduler.start();
    expect(scheduler.running).toBe(true);

    await vi.advanceTimersByTimeAsync(59_000);
    expect(cleanupExpired).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1_000);
    await vi.waitFor(() => expect(cleanupExpired).toHaveBeenCalledTimes(1));
    expect(ledger.status().used).toBe(0);
    expect(logger.events.some((e) => e.message === 'Daily quota reset')).toBe(true);
  });

  it('should log a failed iteration and keep running', async () => {
    cleanupExpired.mockRejectedValueOnce(new Error('Failed to delete suggestions: timeout'));
    scheduler.start();

    await vi.advanceTimersByTimeAsync(60_000);
    await vi.waitFor(() => expect(logger.byLevel('error')).toHaveLength(1));
    expect(logger.byLevel('error')[0]).toMatchObject({
      message: 'Quota reset iteration failed',
      fields: { error: 'Failed to delete suggestions: timeout', retryInMs: 10_000 },
    });

    await vi.advanceTimersByTimeAsync(10_000);
    expect(scheduler.running).toBe(true);
    await vi.waitFor(() =>
      expect(logger.events.filter((e) => e.message === 'Next quota reset scheduled')).toHaveLength(2)
    );
  });

  it('should stop promptly while waiting', async () => {
    scheduler.start();
    await scheduler.stop();

    expect(scheduler.running).toBe(false);
    expect(cleanupExpired).not.toHaveBeenCalled();
    expect(vi.getTimerCount()).toBe(0);
    expect(logger.events.map((e) => e.message)).toContain('Quota reset scheduler stopped');
  });

  it('should ignore a second start', () => {
    scheduler.start();
    scheduler.start();
    expect(logger.events.filter((e) => e.message === 'Quota reset scheduler started')).toHaveLength(1);
  });
});
