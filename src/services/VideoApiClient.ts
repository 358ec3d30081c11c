/**
 * Rate-limited, cached client for the video platform.
 * The only component that talks to the external API. Every outbound call
 * passes through a concurrency gate and a quota reservation; provider
 * failures are classified here and returned as ApiResult values, never thrown.
 *
 * Each search is issued twice, once per duration category (medium, long),
 * and the halves are merged with the long category winning. A search fails
 * only when both halves fail; otherwise the failed half is reported in
 * `partial`. Search results are enriched with video details before they are
 * returned.
 */

import type { ILogProvider, ApiCallLogEvent } from '../providers/ILogProvider.js';
import { safeNotify, type INotificationProvider } from '../providers/INotificationProvider.js';
import {
  PlatformHttpError,
  type IVideoPlatformProvider,
  type PlatformSearchItem,
  type PlatformSearchQuery,
  type PlatformVideo,
} from '../providers/IVideoPlatformProvider.js';
import type { QuotaLedger, ApiCallInput } from './QuotaLedger.js';
import type { CandidateItem, DurationCategory, TopicHit } from '../types/models.js';
import type { ApiError, ApiErrorKind, ApiResult, BulkOutcome } from '../types/common.js';
import type { VideoApiConfig } from '../config.js';
import { CancelledError, describeError } from '../errors.js';
import { TtlCache } from '../stores/TtlCache.js';
import { Semaphore } from '../utils/semaphore.js';
import { parseIsoDuration } from '../utils/duration.js';
import { subtractDays } from '../utils/time.js';

const DURATION_SPLIT: readonly DurationCategory[] = ['medium', 'long'];
const MAX_RESULTS_PER_REQUEST = 50;
/** Sources rated at this tier are never polled. */
export const LOWEST_RATING_TIER = 1;

export type VideoApiClientOptions = Pick<
  VideoApiConfig,
  | 'maxConcurrentRequests'
  | 'requestTimeoutMs'
  | 'cacheTtlMs'
  | 'searchCacheCapacity'
  | 'detailCacheCapacity'
  | 'detailBatchSize'
  | 'searchCost'
  | 'detailCost'
> & {
  lookbackDays: number;
  resourceName?: string;
  now?: () => Date;
};

export interface SourceUpdateRequest {
  /** Platform channel id. */
  sourceId: string;
  lastCheck: Date | null;
  rating: number | null;
}

type CallOutcome<T> =
  | { ok: true; value: T; durationMs: number }
  | { ok: false; error: ApiError; durationMs: number; charged: boolean };

/** Most severe first; used to pick one error out of a split search. */
const SEVERITY: readonly ApiErrorKind[] = [
  'Cancelled',
  'QuotaExceeded',
  'AuthFailure',
  'InvalidRequest',
  'Transient',
];

export class VideoApiClient {
  private readonly searchCache: TtlCache<CandidateItem[]>;
  private readonly detailCache: TtlCache<CandidateItem>;
  private readonly gate: Semaphore;
  private readonly resourceName: string;
  private readonly now: () => Date;

  constructor(
    private readonly provider: IVideoPlatformProvider,
    private readonly ledger: QuotaLedger,
    private readonly notifier: INotificationProvider,
    private readonly logger: ILogProvider,
    private readonly options: VideoApiClientOptions
  ) {
    const clock = options.now;
    const nowMs = clock ? () => clock().getTime() : Date.now;
    this.searchCache = new TtlCache({
      ttlMs: options.cacheTtlMs,
      capacity: options.searchCacheCapacity,
      now: nowMs,
    });
    this.detailCache = new TtlCache({
      ttlMs: options.cacheTtlMs,
      capacity: options.detailCacheCapacity,
      now: nowMs,
    });
    this.gate = new Semaphore(options.maxConcurrentRequests);
    this.resourceName = options.resourceName ?? 'YouTube API quota';
    this.now = clock ?? (() => new Date());
  }

  /** Videos a channel published after `since`, newest first. */
  async searchBySource(
    sourceId: string,
    since: Date,
    maxResults = MAX_RESULTS_PER_REQUEST,
    signal?: AbortSignal
  ): Promise<ApiResult<CandidateItem[]>> {
    const id = sourceId.trim();
    if (!id) {
      return fail({ kind: 'InvalidRequest', message: 'Source id is required' });
    }
    const max = clampResults(maxResults);

    return this.runSearch(
      'search.source',
      `source:${id}:${since.toISOString()}:${max}`,
      { channelId: id, publishedAfter: since, order: 'date' },
      max,
      true,
      signal
    );
  }

  /** Videos matching a free-text query, in platform relevance order. */
  async searchByTopic(
    query: string,
    publishedAfter: Date | null,
    maxResults = 25,
    signal?: AbortSignal
  ): Promise<ApiResult<CandidateItem[]>> {
    const q = query.trim();
    if (!q) return { ok: true, data: [] };
    const max = clampResults(maxResults);

    return this.runSearch(
      'search.topic',
      `topic:${q.toLowerCase()}:${publishedAfter?.toISOString() ?? 'any'}:${max}`,
      { query: q, publishedAfter: publishedAfter ?? undefined, order: 'relevance' },
      max,
      false,
      signal
    );
  }

  /**
   * Full details for `ids`, fetched in provider-sized batches.
   * A quota or credential failure stops further batches; anything fetched
   * before it is still returned, with the failure in `partial`.
   */
  async getDetails(ids: string[], signal?: AbortSignal): Promise<ApiResult<CandidateItem[]>> {
    const unique = [...new Set(ids.map((id) => id.trim()).filter(Boolean))];
    if (unique.length === 0) return { ok: true, data: [] };

    const found = new Map<string, CandidateItem>();
    const missing: string[] = [];
    for (const id of unique) {
      const cached = this.detailCache.get(id);
      if (cached) found.set(id, cached);
      else missing.push(id);
    }

    let partial: ApiError | undefined;
    for (const batch of chunk(missing, this.options.detailBatchSize)) {
      if (signal?.aborted) {
        return fail(cancelledError());
      }

      const reservation = await this.ledger.reserve(this.options.detailCost);
      if (!reservation) {
        partial = this.quotaDenied('videos.list');
        break;
      }

      const outcome = await this.call((s) => this.provider.listVideos(batch, s), signal);
      await this.ledger.settle(reservation, [
        this.track('videos.list', this.options.detailCost, outcome, outcome.ok ? outcome.value.length : 0),
      ]);

      if (!outcome.ok) {
        if (outcome.error.kind === 'Cancelled') return fail(outcome.error);
        partial = outcome.error;
        this.reportFailure('videos.list', outcome.error);
        if (isHaltingKind(outcome.error.kind)) break;
        continue;
      }

      for (const video of outcome.value) {
        const item = fromVideo(video);
        this.detailCache.set(item.externalId, item);
        found.set(item.externalId, item);
      }
    }

    const data = unique.flatMap((id) => {
      const item = found.get(id);
      return item ? [item] : [];
    });
    return partial ? { ok: true, data, partial } : { ok: true, data };
  }

  /**
   * Polls each source for uploads since its last check. Sources at the lowest
   * rating tier are skipped. Quota exhaustion, bad credentials and
   * cancellation stop the loop; other failures are logged and skipped.
   * A source whose search only partly succeeded contributes its results but
   * is listed as failed, not completed.
   */
  async bulkSourceUpdates(
    requests: SourceUpdateRequest[],
    maxPerSource = MAX_RESULTS_PER_REQUEST,
    signal?: AbortSignal
  ): Promise<BulkOutcome<CandidateItem, SourceUpdateRequest>> {
    const outcome: BulkOutcome<CandidateItem, SourceUpdateRequest> = emptyOutcome();
    const seen = new Set<string>();
    const now = this.now();

    for (const [index, request] of requests.entries()) {
      if (request.rating === LOWEST_RATING_TIER) {
        this.logger.debug('Skipping bottom-tier source', { sourceId: request.sourceId });
        continue;
      }
      if (signal?.aborted) {
        outcome.halted = 'Cancelled';
        break;
      }

      const since = request.lastCheck ?? subtractDays(now, this.options.lookbackDays);
      const result = await this.searchBySource(request.sourceId, since, maxPerSource, signal);

      let error: ApiError;
      if (result.ok) {
        for (const item of result.data) {
          if (seen.has(item.externalId)) continue;
          seen.add(item.externalId);
          outcome.succeeded.push(item);
        }
        if (!result.partial) {
          outcome.completed.push(request);
          continue;
        }
        error = result.partial;
      } else {
        error = result.error;
      }

      outcome.failed.push({ input: request, error });
      if (isHaltingKind(error.kind)) {
        outcome.halted = error.kind;
        this.logger.warn('Source updates halted', {
          reason: error.kind,
          completed: outcome.completed.length,
          remaining: requests
            .slice(index + 1)
            .filter((r) => r.rating !== LOWEST_RATING_TIER).length,
        });
        break;
      }
      this.logger.warn('Source update failed, continuing', {
        sourceId: request.sourceId,
        kind: error.kind,
        error: error.message,
      });
    }

    return outcome;
  }

  /**
   * Runs one search per query and merges the results by video id. The first
   * occurrence of a video keeps its data; later queries are added to its
   * provenance.
   */
  async bulkTopicSearch(
    queries: string[],
    publishedAfter: Date | null,
    maxPerTopic = 25,
    signal?: AbortSignal
  ): Promise<BulkOutcome<TopicHit, string>> {
    const outcome: BulkOutcome<TopicHit, string> = emptyOutcome();
    const hits = new Map<string, TopicHit>();

    for (const query of queries) {
      if (signal?.aborted) {
        outcome.halted = 'Cancelled';
        break;
      }

      const result = await this.searchByTopic(query, publishedAfter, maxPerTopic, signal);
      if (result.ok) {
        for (const item of result.data) {
          const hit = hits.get(item.externalId);
          if (!hit) {
            hits.set(item.externalId, { item, queries: [query] });
          } else if (!hit.queries.includes(query)) {
            hit.queries.push(query);
          }
        }
        if (!result.partial) {
          outcome.completed.push(query);
          continue;
        }
      }

      const error = result.ok ? result.partial : result.error;
      if (!error) continue;
      outcome.failed.push({ input: query, error });
      if (isHaltingKind(error.kind)) {
        outcome.halted = error.kind;
        break;
      }
      this.logger.warn('Topic search failed, continuing', {
        query,
        kind: error.kind,
        error: error.message,
      });
    }

    outcome.succeeded = [...hits.values()];
    return outcome;
  }

  /** Drop every cached search and detail result. */
  clearCache(): void {
    this.searchCache.clear();
    this.detailCache.clear();
  }

  // ── Private ──

  private async runSearch(
    operation: string,
    cacheKey: string,
    base: Omit<PlatformSearchQuery, 'maxResults' | 'videoDuration'>,
    maxResults: number,
    newestFirst: boolean,
    signal?: AbortSignal
  ): Promise<ApiResult<CandidateItem[]>> {
    if (signal?.aborted) return fail(cancelledError());

    const cached = this.searchCache.get(cacheKey);
    if (cached) {
      this.logger.debug('Search cache hit', { operation, cacheKey });
      return { ok: true, data: [...cached] };
    }

    const reservation = await this.ledger.reserve(this.options.searchCost * DURATION_SPLIT.length);
    if (!reservation) {
      return fail(this.quotaDenied(operation));
    }

    const perCall = Math.max(1, Math.floor(maxResults / DURATION_SPLIT.length));
    const outcomes = await Promise.all(
      DURATION_SPLIT.map((videoDuration) =>
        this.call(
          (s) => this.provider.search({ ...base, maxResults: perCall, videoDuration }, s),
          signal
        )
      )
    );
    await this.ledger.settle(
      reservation,
      outcomes.map((o) =>
        this.track(operation, this.options.searchCost, o, o.ok ? o.value.length : 0)
      )
    );

    const errors: ApiError[] = [];
    const merged = new Map<string, CandidateItem>();
    outcomes.forEach((outcome, i) => {
      if (!outcome.ok) {
        errors.push(outcome.error);
        return;
      }
      for (const result of outcome.value) {
        const item = fromSearchItem(result, DURATION_SPLIT[i]);
        const existing = merged.get(item.externalId);
        if (!existing) {
          merged.set(item.externalId, item);
        } else if (item.durationCategory === 'long') {
          merged.set(item.externalId, { ...existing, durationCategory: 'long' });
        }
      }
    });

    const partial = errors.length > 0 ? mostSevere(errors) : undefined;
    if (partial) {
      this.reportFailure(operation, partial);
      if (errors.length === outcomes.length || partial.kind === 'Cancelled') return fail(partial);
    }

    let items = [...merged.values()];
    if (newestFirst) {
      items.sort((a, b) => b.publishedAt.getTime() - a.publishedAt.getTime());
    }
    items = items.slice(0, maxResults);

    const enriched = await this.enrich(items, signal);
    if (signal?.aborted) return fail(cancelledError());

    if (partial) return { ok: true, data: enriched, partial };
    this.searchCache.set(cacheKey, enriched);
    return { ok: true, data: [...enriched] };
  }

  /** Merge detail data into search results. Missing details leave zero/empty fields. */
  private async enrich(items: CandidateItem[], signal?: AbortSignal): Promise<CandidateItem[]> {
    if (items.length === 0) return items;

    const details = await this.getDetails(items.map((i) => i.externalId), signal);
    if (!details.ok) {
      this.logger.warn('Detail enrichment failed', { kind: details.error.kind, count: items.length });
      return items;
    }
    if (details.partial) {
      this.logger.warn('Detail enrichment incomplete', {
        kind: details.partial.kind,
        requested: items.length,
        received: details.data.length,
      });
    }

    const byId = new Map(details.data.map((d) => [d.externalId, d]));
    return items.map((item) => {
      const detail = byId.get(item.externalId);
      if (!detail) return item;
      return {
        ...item,
        durationSeconds: detail.durationSeconds,
        viewCount: detail.viewCount,
        likeCount: detail.likeCount,
        commentCount: detail.commentCount,
        description: detail.description || item.description,
        thumbnailUrl: item.thumbnailUrl || detail.thumbnailUrl,
      };
    });
  }

  /** One provider call under the concurrency gate and the request timeout. */
  private async call<T>(
    fn: (signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal
  ): Promise<CallOutcome<T>> {
    const started = Date.now();
    try {
      const value = await this.gate.run(() => {
        const timeout = AbortSignal.timeout(this.options.requestTimeoutMs);
        return fn(signal ? AbortSignal.any([signal, timeout]) : timeout);
      }, signal);
      return { ok: true, value, durationMs: Date.now() - started };
    } catch (err) {
      const error = classify(err, signal);
      return {
        ok: false,
        error,
        durationMs: Date.now() - started,
        charged: err instanceof PlatformHttpError && err.status !== 401 && err.status !== 403,
      };
    }
  }

  /** Build the ledger record for a call and emit its log event. */
  private track<T>(
    operation: string,
    cost: number,
    outcome: CallOutcome<T>,
    itemsReturned: number
  ): ApiCallInput {
    const charged = outcome.ok || outcome.charged ? cost : 0;
    const event: ApiCallLogEvent = {
      level: outcome.ok ? 'debug' : 'warn',
      message: outcome.ok ? 'Video API call' : 'Video API call failed',
      operation,
      cost: charged,
      durationMs: outcome.durationMs,
      success: outcome.ok,
      itemsReturned,
      ...(outcome.ok ? {} : { errorKind: outcome.error.kind }),
    };
    this.logger.log(event);

    return {
      operation,
      cost: charged,
      success: outcome.ok,
      durationMs: outcome.durationMs,
      error: outcome.ok ? null : outcome.error.message,
      itemsReturned,
    };
  }

  private quotaDenied(operation: string): ApiError {
    const error: ApiError = {
      kind: 'QuotaExceeded',
      message: `Insufficient quota for ${operation}`,
    };
    this.reportFailure(operation, error);
    return error;
  }

  private reportFailure(operation: string, error: ApiError): void {
    const fields = { operation, kind: error.kind, status: error.status, error: error.message };

    switch (error.kind) {
      case 'QuotaExceeded': {
        this.logger.warn('Video API quota exceeded', fields);
        const resetAt = this.ledger.status().resetsAt;
        void safeNotify(this.logger, () => this.notifier.notifyQuotaLimit(this.resourceName, resetAt));
        return;
      }
      case 'AuthFailure':
        this.logger.error('Video API rejected credentials', fields);
        void safeNotify(this.logger, () =>
          this.notifier.notifyWarning(
            'The video service rejected our credentials. Suggestions are paused until the API key is fixed.'
          )
        );
        return;
      case 'InvalidRequest':
        this.logger.warn('Video API rejected request', fields);
        return;
      case 'Transient':
        this.logger.warn('Video API call failed', fields);
        if (error.status !== undefined && error.status >= 500) {
          void safeNotify(this.logger, () =>
            this.notifier.notifyWarning(
              'The video service is having trouble right now. Some suggestions may be missing.'
            )
          );
        }
        return;
      case 'Cancelled':
        this.logger.debug('Video API call cancelled', fields);
        return;
      default:
        return assertNever(error.kind);
    }
  }
}

// ── Helpers ──

function classify(err: unknown, signal?: AbortSignal): ApiError {
  if (signal?.aborted || err instanceof CancelledError) {
    return cancelledError();
  }
  if (err instanceof PlatformHttpError) {
    switch (err.status) {
      case 403:
        return { kind: 'QuotaExceeded', message: err.message, status: err.status };
      case 400:
        return { kind: 'InvalidRequest', message: err.message, status: err.status };
      case 401:
        return { kind: 'AuthFailure', message: err.message, status: err.status };
      default:
        return { kind: 'Transient', message: err.message, status: err.status };
    }
  }
  if (err instanceof Error && err.name === 'TimeoutError') {
    return { kind: 'Transient', message: 'Request timed out' };
  }
  return { kind: 'Transient', message: `Network error: ${describeError(err)}` };
}

function isHaltingKind(kind: ApiErrorKind): boolean {
  return kind === 'QuotaExceeded' || kind === 'AuthFailure' || kind === 'Cancelled';
}

function mostSevere(errors: ApiError[]): ApiError {
  return [...errors].sort((a, b) => SEVERITY.indexOf(a.kind) - SEVERITY.indexOf(b.kind))[0];
}

function cancelledError(): ApiError {
  return { kind: 'Cancelled', message: 'Request was cancelled' };
}

function fail<T>(error: ApiError): ApiResult<T> {
  return { ok: false, error };
}

function emptyOutcome<T, I>(): BulkOutcome<T, I> {
  return { succeeded: [], completed: [], failed: [], halted: null };
}

function clampResults(n: number): number {
  if (!Number.isFinite(n)) return MAX_RESULTS_PER_REQUEST;
  return Math.min(MAX_RESULTS_PER_REQUEST, Math.max(1, Math.floor(n)));
}

function chunk<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

function fromSearchItem(result: PlatformSearchItem, category: DurationCategory): CandidateItem {
  return {
    externalId: result.videoId,
    title: result.title,
    sourceExternalId: result.channelId,
    sourceName: result.channelTitle,
    publishedAt: result.publishedAt,
    viewCount: 0,
    likeCount: 0,
    commentCount: 0,
    durationSeconds: 0,
    thumbnailUrl: result.thumbnailUrl,
    description: result.description,
    durationCategory: category,
  };
}

function fromVideo(video: PlatformVideo): CandidateItem {
  return {
    externalId: video.videoId,
    title: video.title,
    sourceExternalId: video.channelId,
    sourceName: video.channelTitle,
    publishedAt: video.publishedAt,
    viewCount: video.viewCount,
    likeCount: video.likeCount,
    commentCount: video.commentCount,
    durationSeconds: parseIsoDuration(video.duration),
    thumbnailUrl: video.thumbnailUrl,
    description: video.description,
    durationCategory: null,
  };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled value: ${String(value)}`);
}
