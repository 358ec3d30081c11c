/**
 * Discovery orchestrator.
 * Runs the two discovery strategies, tracked-source polling and topic
 * keyword search, side by side. Both are best-effort: a failure in one
 * never prevents the other's results from being used, and neither throws.
 */

import type { IUserInterestRepository } from '../repositories/IUserInterestRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { safeNotify, type INotificationProvider } from '../providers/INotificationProvider.js';
import type { VideoApiClient, SourceUpdateRequest } from './VideoApiClient.js';
import type { CandidateItem, TopicHit, TrackedSource } from '../types/models.js';
import type { ApiErrorKind } from '../types/common.js';
import { describeError } from '../errors.js';
import { isSourceDue } from './Scorer.js';
import { subtractDays } from '../utils/time.js';

export interface DiscoveryOptions {
  lookbackDays: number;
  maxResultsPerSource: number;
  maxResultsPerTopic: number;
  now?: () => Date;
}

export interface StrategyReport<T> {
  candidates: T[];
  /** Requests that failed, including the one that halted the strategy. */
  failures: number;
  /** Why the strategy stopped early, if it did. */
  halted: ApiErrorKind | null;
  /** Requests the strategy issued (sources polled or topics searched). */
  attempted: number;
}

export interface DiscoveryResult {
  sourceUpdates: StrategyReport<CandidateItem>;
  topicMatches: StrategyReport<TopicHit>;
}

export class DiscoveryService {
  private readonly now: () => Date;

  constructor(
    private readonly apiClient: VideoApiClient,
    private readonly interestRepo: IUserInterestRepository,
    private readonly notifier: INotificationProvider,
    private readonly logger: ILogProvider,
    private readonly options: DiscoveryOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /** Run both strategies concurrently. */
  async discover(userId: string, signal?: AbortSignal): Promise<DiscoveryResult> {
    const [sourceUpdates, topicMatches] = await Promise.all([
      this.fetchSourceUpdates(userId, signal),
      this.fetchTopicMatches(userId, signal),
    ]);

    const nonQuotaFailures = skippedFailures(sourceUpdates) + skippedFailures(topicMatches);
    if (nonQuotaFailures > 0 && !signal?.aborted) {
      void safeNotify(this.logger, () =>
        this.notifier.notifyWarning(
          'Some of your sources or topics could not be checked right now. Some suggestions may be missing.'
        )
      );
    }

    return { sourceUpdates, topicMatches };
  }

  /**
   * New uploads from the user's tracked sources that are due for a check
   * under their rating tier. Sources polled successfully get their
   * last-checked timestamp updated, unless the run was cancelled.
   */
  async fetchSourceUpdates(userId: string, signal?: AbortSignal): Promise<StrategyReport<CandidateItem>> {
    const now = this.now();

    let due: TrackedSource[];
    try {
      const sources = await this.interestRepo.getSourcesForUpdateCheck(userId);
      due = sources.filter((s) => isSourceDue(s.rating, s.lastCheckedAt, now));
    } catch (err) {
      this.logger.error('Failed to load tracked sources', { userId, error: describeError(err) });
      return emptyReport();
    }

    if (due.length === 0) {
      this.logger.debug('No tracked sources due for a check', { userId });
      return emptyReport();
    }

    const bySourceId = new Map(due.map((s) => [s.externalId, s]));
    const requests: SourceUpdateRequest[] = due.map((s) => ({
      sourceId: s.externalId,
      lastCheck: s.lastCheckedAt,
      rating: s.rating,
    }));

    const outcome = await this.apiClient.bulkSourceUpdates(
      requests,
      this.options.maxResultsPerSource,
      signal
    );

    if (outcome.halted !== 'Cancelled') {
      await this.markChecked(userId, outcome.completed, bySourceId, now);
    }

    this.logger.info('Source updates fetched', {
      userId,
      due: due.length,
      completed: outcome.completed.length,
      failed: outcome.failed.length,
      candidates: outcome.succeeded.length,
      halted: outcome.halted,
    });

    return {
      candidates: outcome.succeeded,
      failures: outcome.failed.length,
      halted: outcome.halted,
      attempted: requests.length,
    };
  }

  /** Recent videos matching the user's topic names. */
  async fetchTopicMatches(userId: string, signal?: AbortSignal): Promise<StrategyReport<TopicHit>> {
    let queries: string[];
    try {
      const topics = await this.interestRepo.getUserTopics(userId);
      queries = uniqueQueries(topics.map((t) => t.name));
    } catch (err) {
      this.logger.error('Failed to load topics', { userId, error: describeError(err) });
      return emptyReport();
    }

    if (queries.length === 0) {
      this.logger.debug('User has no topics to search', { userId });
      return emptyReport();
    }

    const publishedAfter = subtractDays(this.now(), this.options.lookbackDays);
    const outcome = await this.apiClient.bulkTopicSearch(
      queries,
      publishedAfter,
      this.options.maxResultsPerTopic,
      signal
    );

    this.logger.info('Topic matches fetched', {
      userId,
      topics: queries.length,
      completed: outcome.completed.length,
      failed: outcome.failed.length,
      candidates: outcome.succeeded.length,
      halted: outcome.halted,
    });

    return {
      candidates: outcome.succeeded,
      failures: outcome.failed.length,
      halted: outcome.halted,
      attempted: queries.length,
    };
  }

  // ── Private ──

  private async markChecked(
    userId: string,
    completed: SourceUpdateRequest[],
    bySourceId: Map<string, TrackedSource>,
    checkedAt: Date
  ): Promise<void> {
    for (const request of completed) {
      const source = bySourceId.get(request.sourceId);
      if (!source) continue;
      try {
        await this.interestRepo.markSourceChecked(userId, source.sourceId, checkedAt);
      } catch (err) {
        this.logger.warn('Failed to update source check date', {
          userId,
          sourceId: source.sourceId,
          error: describeError(err),
        });
      }
    }
  }
}

function emptyReport<T>(): StrategyReport<T> {
  return { candidates: [], failures: 0, halted: null, attempted: 0 };
}

/** Failures that were skipped over, excluding the one that stopped the strategy. */
export function skippedFailures<T>(report: StrategyReport<T>): number {
  return report.halted ? Math.max(0, report.failures - 1) : report.failures;
}

/** Trimmed, non-blank, case-insensitively unique queries in first-seen order. */
function uniqueQueries(names: string[]): string[] {
  const seen = new Set<string>();
  const queries: string[] = [];
  for (const name of names) {
    const query = name.trim();
    const key = query.toLowerCase();
    if (!query || seen.has(key)) continue;
    seen.add(key);
    queries.push(query);
  }
  return queries;
}
