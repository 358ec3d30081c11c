/**
 * Suggestion curator.
 * Runs discovery, consolidation and scoring for a user, then applies the
 * queue rules (threshold, duplicate check, per-request cap, pending cap) and
 * persists each accepted candidate together with its topic links.
 *
 * Suggestions move Pending → Approved | Denied. Expiry is not a state
 * transition: a pending suggestion older than the expiry window is simply
 * no longer active, and the cleanup sweep soft-deletes it.
 */

import type { ISuggestionRepository } from '../repositories/ISuggestionRepository.js';
import type { IVideoRepository } from '../repositories/IVideoRepository.js';
import type { IUserInterestRepository } from '../repositories/IUserInterestRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { safeNotify, type INotificationProvider } from '../providers/INotificationProvider.js';
import { skippedFailures, type DiscoveryService } from './DiscoveryService.js';
import type { QuotaLedger } from './QuotaLedger.js';
import type { Scorer } from './Scorer.js';
import type { PipelineConfig } from '../config.js';
import type { Score, SourceRating, Topic } from '../types/models.js';
import type { SuggestionRow } from '../types/database.js';
import type { PaginationOptions } from '../types/common.js';
import type {
  CreatedSuggestion,
  DecisionResult,
  GenerateOptions,
  GenerationStats,
  PendingSuggestion,
  SuggestionAnalytics,
  SuggestionResult,
} from '../types/api.js';
import {
  CancelledError,
  ConflictError,
  NotFoundError,
  PersistenceError,
  ValidationError,
  describeError,
} from '../errors.js';
import { consolidate, countByOrigin } from './SourceConsolidator.js';
import { scoreDistribution } from './Scorer.js';
import { MS_PER_DAY, subtractDays } from '../utils/time.js';

const MAX_PAGE_SIZE = 100;
const DEFAULT_PAGE_SIZE = 20;

export class SuggestionService {
  private readonly now: () => Date;

  constructor(
    private readonly suggestionRepo: ISuggestionRepository,
    private readonly videoRepo: IVideoRepository,
    private readonly interestRepo: IUserInterestRepository,
    private readonly discovery: DiscoveryService,
    private readonly scorer: Scorer,
    private readonly ledger: QuotaLedger,
    private readonly notifier: INotificationProvider,
    private readonly logger: ILogProvider,
    private readonly config: PipelineConfig,
    now?: () => Date
  ) {
    this.now = now ?? (() => new Date());
  }

  /**
   * Discover, score and queue new suggestions for a user.
   * Throws CancelledError if `options.signal` aborts before the last suggestion is stored.
   */
  async generate(userId: string, options: GenerateOptions = {}): Promise<SuggestionResult> {
    const started = Date.now();
    const threshold = options.threshold ?? this.config.defaultThreshold;
    const { signal } = options;
    const now = this.now();
    const activeSince = subtractDays(now, this.config.expiryDays);
    throwIfCancelled(signal);

    // 1. Queue-size guard
    let activeCount: number;
    try {
      activeCount = await this.suggestionRepo.countActive(userId, activeSince);
    } catch (err) {
      return this.batchFailure(userId, new PersistenceError('countActive', err), started);
    }

    const { maxPendingSuggestions } = this.config;
    if (activeCount >= maxPendingSuggestions) {
      const message = `You have reached the maximum of ${maxPendingSuggestions} pending suggestions. Please approve or deny some before generating more.`;
      this.logger.warn('Pending suggestion cap reached', { userId, activeCount });
      void safeNotify(this.logger, () => this.notifier.notifyWarning(message));
      return failedResult(message, started);
    }

    let topics: Topic[];
    let ratings: SourceRating[];
    try {
      [topics, ratings] = await Promise.all([
        this.interestRepo.getUserTopics(userId),
        this.interestRepo.getSourceRatings(userId),
      ]);
    } catch (err) {
      return this.batchFailure(userId, new PersistenceError('loadInterests', err), started);
    }

    // 2. Discovery, consolidation, scoring
    const quotaBefore = this.ledger.status().used;
    const found = await this.discovery.discover(userId, signal);
    throwIfCancelled(signal);

    const sourceItems = found.sourceUpdates.candidates;
    const topicHits = found.topicMatches.candidates;
    const candidates = consolidate(sourceItems, topicHits);

    const ratingBySource = new Map(ratings.map((r) => [r.sourceExternalId, r.stars]));
    const topicNames = topics.map((t) => t.name);
    const scores = candidates.map((c) => this.scorer.score(c, topicNames, ratingBySource, now));

    // 3–5. Threshold, duplicate check, sort, cap
    const qualified = scores
      .filter((s) => s.total >= threshold)
      .sort((a, b) => b.total - a.total);
    const capacity = Math.min(
      this.config.maxSuggestionsPerRequest,
      maxPendingSuggestions - activeCount
    );

    const selected: Score[] = [];
    let alreadySuggested = 0;
    let persistFailures = 0;
    let attempted = 0;

    for (const score of qualified) {
      if (selected.length >= capacity) break;
      throwIfCancelled(signal);
      attempted++;
      try {
        const exists = await this.suggestionRepo.hasActiveSuggestion(
          userId,
          score.candidate.item.externalId,
          activeSince
        );
        if (exists) {
          alreadySuggested++;
          continue;
        }
        selected.push(score);
      } catch (err) {
        persistFailures++;
        this.logger.warn('Duplicate check failed, skipping candidate', {
          userId,
          externalVideoId: score.candidate.item.externalId,
          error: describeError(err),
        });
      }
    }
    throwIfCancelled(signal);

    // 6. Persist, one transaction per suggestion
    const topicIdByName = new Map(topics.map((t) => [t.name.trim().toLowerCase(), t.id]));
    const created: CreatedSuggestion[] = [];

    if (selected.length > 0) {
      // Expired pending rows still occupy the one-active-per-video index until swept.
      await this.sweepExpired(userId, activeSince, now);
    }

    for (const score of selected) {
      throwIfCancelled(signal);
      try {
        created.push(await this.persist(userId, score, topicIdByName, signal));
      } catch (err) {
        if (err instanceof CancelledError) throw err;
        if (err instanceof ConflictError) {
          alreadySuggested++;
          continue;
        }
        persistFailures++;
        this.logger.warn('Failed to persist suggestion, skipping', {
          userId,
          externalVideoId: score.candidate.item.externalId,
          error: describeError(err),
        });
      }
    }

    if (attempted > 0 && created.length === 0 && persistFailures === attempted) {
      return this.batchFailure(
        userId,
        new PersistenceError('insertSuggestions', `${persistFailures} of ${attempted} candidates failed`),
        started
      );
    }

    // 7. Summary
    const quotaHalted =
      found.sourceUpdates.halted === 'QuotaExceeded' ||
      found.topicMatches.halted === 'QuotaExceeded';
    const warnings: string[] = [];
    if (quotaHalted) {
      warnings.push("Today's video search allowance ran out, so only part of your sources and topics were checked.");
    }
    if (skippedFailures(found.sourceUpdates) + skippedFailures(found.topicMatches) > 0) {
      warnings.push('Some sources or topics could not be checked.');
    }
    if (persistFailures > 0) {
      warnings.push(`${persistFailures} suggestion(s) could not be saved.`);
    }

    const createdTotals = created.map((c) => c.score);
    const stats: GenerationStats = {
      sourceCandidatesFound: sourceItems.length,
      topicCandidatesFound: topicHits.length,
      duplicatesFound: sourceItems.length + topicHits.length - candidates.length,
      totalUnique: candidates.length,
      qualified: qualified.length,
      alreadySuggested,
      persistFailures,
      countsByOrigin: countByOrigin(created),
      averageScore: createdTotals.length > 0 ? sum(createdTotals) / createdTotals.length : 0,
      scoreDistribution: scoreDistribution(createdTotals),
      quotaHalted,
      estimatedQuotaCost: this.ledger.estimateSuggestionCost(
        found.sourceUpdates.attempted,
        found.topicMatches.attempted,
        sourceItems.length + topicHits.length
      ).total,
      quotaSpent: Math.max(0, this.ledger.status().used - quotaBefore),
      processingTimeMs: Date.now() - started,
    };

    const message = created.length > 0
      ? `Generated ${created.length} new suggestion(s) from ${candidates.length} videos discovered`
      : 'No new suggestions found based on your topics and channels';
    this.notifyOutcome(created.length, candidates.length, message);

    this.logger.info('Suggestions generated', {
      userId,
      threshold,
      created: created.length,
      ...stats,
    });

    return { success: true, message, suggestions: created, stats, warnings };
  }

  /**
   * Approve a pending suggestion and add its video to the user's library.
   * A video already in the library is approved without adding it again.
   */
  async approve(userId: string, suggestionId: string): Promise<DecisionResult> {
    const suggestion = await this.requirePending(userId, suggestionId);
    const title = await this.videoTitle(suggestion.video_id);
    const decidedAt = this.now();

    if (await this.videoRepo.isInLibrary(userId, suggestion.video_id)) {
      await this.suggestionRepo.setStatus(suggestionId, 'approved', decidedAt);
      return {
        suggestionId,
        status: 'approved',
        alreadyInLibrary: true,
        message: `Suggestion approved! Video '${title}' was already in your library.`,
      };
    }

    await this.suggestionRepo.setStatus(suggestionId, 'approved', decidedAt);
    try {
      await this.videoRepo.addToLibrary(userId, suggestion.video_id);
    } catch (err) {
      this.logger.error('Approved suggestion but library add failed', {
        userId,
        suggestionId,
        videoId: suggestion.video_id,
        error: describeError(err),
      });
      return {
        suggestionId,
        status: 'approved',
        alreadyInLibrary: false,
        message: `Suggestion approved, but '${title}' could not be added to your library. Please add it manually.`,
      };
    }

    return {
      suggestionId,
      status: 'approved',
      alreadyInLibrary: false,
      message: `Suggestion approved! Video '${title}' has been added to your library.`,
    };
  }

  async deny(userId: string, suggestionId: string): Promise<DecisionResult> {
    const suggestion = await this.requirePending(userId, suggestionId);
    const title = await this.videoTitle(suggestion.video_id);

    await this.suggestionRepo.setStatus(suggestionId, 'denied', this.now());
    return {
      suggestionId,
      status: 'denied',
      alreadyInLibrary: false,
      message: `Video '${title}' removed from suggestions.`,
    };
  }

  /** Soft-delete pending suggestions older than the expiry window. */
  async cleanupExpired(): Promise<number> {
    const now = this.now();
    const cutoff = subtractDays(now, this.config.expiryDays);
    const removed = await this.suggestionRepo.softDeletePendingBefore(cutoff, now);
    this.logger.info('Expired suggestions cleaned up', { removed, cutoff: cutoff.toISOString() });
    return removed;
  }

  /** Drop pending suggestions from a source the user stopped tracking. */
  async removeForSource(userId: string, sourceId: string): Promise<number> {
    const removed = await this.suggestionRepo.softDeletePendingForSource(userId, sourceId, this.now());
    this.logger.info('Suggestions removed for untracked source', { userId, sourceId, removed });
    return removed;
  }

  async listPending(userId: string, options?: PaginationOptions): Promise<PendingSuggestion[]> {
    const limit = Math.min(MAX_PAGE_SIZE, Math.max(1, options?.limit ?? DEFAULT_PAGE_SIZE));
    const offset = Math.max(0, options?.offset ?? 0);
    const activeSince = subtractDays(this.now(), this.config.expiryDays);

    const rows = await this.suggestionRepo.listPending(userId, activeSince, { limit, offset });
    return rows.map((row) => ({
      id: row.id,
      reason: row.reason,
      createdAt: row.created_at,
      expiresAt: this.expiresAt(row.created_at),
      video: {
        id: row.videos.id,
        externalId: row.videos.external_id,
        title: row.videos.title,
        thumbnailUrl: row.videos.thumbnail_url,
        durationSeconds: row.videos.duration_seconds,
        viewCount: row.videos.view_count,
        publishedAt: row.videos.published_at,
      },
    }));
  }

  async analytics(userId: string): Promise<SuggestionAnalytics> {
    const [totals, lastSevenDays] = await Promise.all([
      this.suggestionRepo.countByStatus(userId),
      this.suggestionRepo.countByStatus(userId, subtractDays(this.now(), 7)),
    ]);
    const decided = totals.approved + totals.denied;
    return {
      totals,
      lastSevenDays,
      approvalRate: decided > 0 ? totals.approved / decided : 0,
    };
  }

  // ── Private ──

  private async persist(
    userId: string,
    score: Score,
    topicIdByName: Map<string, string>,
    signal?: AbortSignal
  ): Promise<CreatedSuggestion> {
    const { item, origin } = score.candidate;
    const sourceId = await this.videoRepo.ensureSourceExists(item.sourceExternalId, item.sourceName);
    const videoId = await this.videoRepo.ensureVideoExists(item, sourceId);
    throwIfCancelled(signal);

    const topicIds = this.provenanceTopicIds(score, topicIdByName);
    const input = { userId, videoId, reason: score.reason };
    const row = topicIds.length > 0
      ? await this.suggestionRepo.insertWithTopics(input, topicIds)
      : await this.suggestionRepo.insert(input);

    return {
      id: row.id,
      videoId,
      externalVideoId: item.externalId,
      title: item.title,
      sourceName: item.sourceName,
      origin,
      score: score.total,
      reason: row.reason,
      topicIds,
      createdAt: row.created_at,
      expiresAt: this.expiresAt(row.created_at),
    };
  }

  private async sweepExpired(userId: string, activeSince: Date, now: Date): Promise<void> {
    try {
      const removed = await this.suggestionRepo.softDeletePendingBefore(activeSince, now, userId);
      if (removed > 0) this.logger.info('Swept expired suggestions', { userId, removed });
    } catch (err) {
      this.logger.warn('Failed to sweep expired suggestions', { userId, error: describeError(err) });
    }
  }

  /** Ids of the topics named in the reason. Tracked-source-only reasons name none. */
  private provenanceTopicIds(score: Score, topicIdByName: Map<string, string>): string[] {
    if (score.candidate.origin === 'tracked_source') return [];
    const names = score.matchedTopics.length > 0 ? score.matchedTopics : score.candidate.matchedTopics;

    const ids = new Set<string>();
    for (const name of names) {
      const id = topicIdByName.get(name.trim().toLowerCase());
      if (id) ids.add(id);
    }
    return [...ids];
  }

  private async requirePending(userId: string, suggestionId: string): Promise<SuggestionRow> {
    const suggestion = await this.suggestionRepo.findById(suggestionId);
    if (!suggestion || suggestion.user_id !== userId) {
      throw new NotFoundError('Suggestion not found. It may have been removed or expired.', {
        suggestionId,
      });
    }
    if (suggestion.status !== 'pending') {
      throw new ValidationError(`This suggestion was already ${suggestion.status}.`, {
        suggestionId,
        status: suggestion.status,
      });
    }
    const activeSince = subtractDays(this.now(), this.config.expiryDays);
    if (new Date(suggestion.created_at).getTime() < activeSince.getTime()) {
      throw new NotFoundError('Suggestion not found. It may have been removed or expired.', {
        suggestionId,
      });
    }
    return suggestion;
  }

  private async videoTitle(videoId: string): Promise<string> {
    const video = await this.videoRepo.findById(videoId);
    return video?.title ?? 'Unknown video';
  }

  private expiresAt(createdAt: string): string {
    return new Date(new Date(createdAt).getTime() + this.config.expiryDays * MS_PER_DAY).toISOString();
  }

  private notifyOutcome(created: number, discovered: number, message: string): void {
    if (created > 0) {
      void safeNotify(this.logger, () => this.notifier.notifySuccess(message));
    } else if (discovered > 0) {
      void safeNotify(this.logger, () =>
        this.notifier.notifyInfo(
          'Found videos but none met the quality threshold or they were already suggested. Try adding more topics or rating more sources.'
        )
      );
    } else {
      void safeNotify(this.logger, () =>
        this.notifier.notifyInfo(
          'No new videos found from your tracked sources or topics. Try adding more topics or tracking more sources.'
        )
      );
    }
  }

  private batchFailure(userId: string, err: PersistenceError, started: number): SuggestionResult {
    this.logger.error('Suggestion generation aborted', { userId, code: err.code, ...err.details });
    const message = "We couldn't generate suggestions right now. Please try again later.";
    void safeNotify(this.logger, () => this.notifier.notifyWarning(message));
    return failedResult(message, started);
  }
}

function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) throw new CancelledError('Suggestion generation was cancelled');
}

function failedResult(message: string, started: number): SuggestionResult {
  return {
    success: false,
    message,
    suggestions: [],
    warnings: [],
    stats: {
      sourceCandidatesFound: 0,
      topicCandidatesFound: 0,
      duplicatesFound: 0,
      totalUnique: 0,
      qualified: 0,
      alreadySuggested: 0,
      persistFailures: 0,
      countsByOrigin: { tracked_source: 0, topic_search: 0, both: 0 },
      averageScore: 0,
      scoreDistribution: {},
      quotaHalted: false,
      estimatedQuotaCost: 0,
      quotaSpent: 0,
      processingTimeMs: Date.now() - started,
    },
  };
}

function sum(values: number[]): number {
  return values.reduce((acc, v) => acc + v, 0);
}
