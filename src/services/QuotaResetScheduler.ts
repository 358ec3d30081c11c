/**
 * Quota reset scheduler.
 * A single long-lived loop that sleeps until the next UTC midnight, rolls
 * the quota ledger over and sweeps expired suggestions. A failed iteration
 * is logged and retried after a backoff; it never ends the loop.
 */

import type { ILogProvider } from '../providers/ILogProvider.js';
import type { QuotaLedger } from './QuotaLedger.js';
import type { SuggestionService } from './SuggestionService.js';
import { CancelledError, describeError } from '../errors.js';
import { nextUtcMidnight, sleep } from '../utils/time.js';

export interface QuotaResetSchedulerOptions {
  /** Wait after a failed iteration. Default: 5 minutes. */
  retryBackoffMs?: number;
  /** Pause after a successful reset before computing the next wake-up. Default: 1 minute. */
  settleDelayMs?: number;
  now?: () => Date;
}

export interface ResetOutcome {
  /** False when the ledger had already rolled over for today. */
  reset: boolean;
  previousUsed: number | null;
  expiredRemoved: number;
}

export class QuotaResetScheduler {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private readonly retryBackoffMs: number;
  private readonly settleDelayMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly ledger: QuotaLedger,
    private readonly suggestions: Pick<SuggestionService, 'cleanupExpired'>,
    private readonly logger: ILogProvider,
    options: QuotaResetSchedulerOptions = {}
  ) {
    this.retryBackoffMs = options.retryBackoffMs ?? 5 * 60 * 1000;
    this.settleDelayMs = options.settleDelayMs ?? 60 * 1000;
    this.now = options.now ?? (() => new Date());
  }

  get running(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
    this.logger.info('Quota reset scheduler started');
  }

  /** Abort any pending wait and resolve once the loop has exited. */
  async stop(): Promise<void> {
    if (!this.loop || !this.controller) return;
    this.controller.abort();
    await this.loop;
    this.loop = null;
    this.controller = null;
    this.logger.info('Quota reset scheduler stopped');
  }

  /** One iteration: roll the ledger over if the day changed, then sweep expired suggestions. */
  async runOnce(): Promise<ResetOutcome> {
    const previous = await this.ledger.resetIfNewDay();
    if (previous) {
      this.logger.info('Daily quota reset', { date: previous.date, previousUsed: previous.used });
    } else {
      this.logger.debug('Quota ledger already current');
    }

    const expiredRemoved = await this.suggestions.cleanupExpired();
    return {
      reset: previous !== null,
      previousUsed: previous?.used ?? null,
      expiredRemoved,
    };
  }

  // ── Private ──

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        const now = this.now();
        const wait = nextUtcMidnight(now).getTime() - now.getTime();
        this.logger.debug('Next quota reset scheduled', { inMs: wait });
        await sleep(wait, signal);

        await this.runOnce();
        await sleep(this.settleDelayMs, signal);
      } catch (err) {
        if (err instanceof CancelledError || signal.aborted) break;

        this.logger.error('Quota reset iteration failed', {
          error: describeError(err),
          retryInMs: this.retryBackoffMs,
        });
        try {
          await sleep(this.retryBackoffMs, signal);
        } catch (sleepErr) {
          if (sleepErr instanceof CancelledError) break;
          throw sleepErr;
        }
      }
    }
  }
}
