/**
 * Scorer.
 * Deterministic weighted relevance score per candidate: source rating,
 * topic match against the title, and recency, plus a flat bonus for
 * candidates found by both discovery strategies. No I/O.
 *
 * Also owns the rating-tier refresh rule that decides when a tracked source
 * is polled again.
 */

import type { PipelineConfig } from '../config.js';
import type { Origin, Score, SourcedCandidate } from '../types/models.js';
import { daysBetween } from '../utils/time.js';

const MAX_REASON_LENGTH = 200;

/** Days between polls, by star rating. Ratings absent here are never polled. */
const REFRESH_INTERVAL_DAYS: Readonly<Record<number, number>> = {
  5: 5,
  4: 7,
  3: 10,
  2: 14,
};

export interface TopicRelevance {
  score: number;
  matchedTopics: string[];
}

export class Scorer {
  constructor(private readonly config: PipelineConfig) {}

  /**
   * @param userTopics topic names, in the user's order
   * @param ratings star rating (1–5) keyed by source external id
   */
  score(
    candidate: SourcedCandidate,
    userTopics: readonly string[],
    ratings: ReadonlyMap<string, number>,
    now: Date
  ): Score {
    const { weights } = this.config;
    const ratingScore = this.ratingScore(ratings.get(candidate.item.sourceExternalId));
    const topic = this.topicRelevance(candidate.item.title, userTopics);
    const recencyScore = this.recencyScore(candidate.item.publishedAt, now);

    const baseScore =
      ratingScore * weights.rating +
      topic.score * weights.topic +
      recencyScore * weights.recency;
    const bonus = candidate.origin === 'both' ? this.config.dualSourceBonus : 0;

    return {
      candidate,
      ratingScore,
      topicScore: topic.score,
      recencyScore,
      bonus,
      baseScore,
      total: baseScore + bonus,
      matchedTopics: topic.matchedTopics,
      reason: buildReason(candidate, topic.matchedTopics),
    };
  }

  ratingScore(stars: number | undefined): number {
    if (stars === undefined) return this.config.neutralRatingScore;
    return Math.min(5, Math.max(1, stars)) * 2;
  }

  /**
   * A topic counts as matched when at least half its words occur in the
   * title (case-insensitive substring). The score is the share of all topic
   * words found, scaled to 0–10.
   */
  topicRelevance(title: string, topics: readonly string[]): TopicRelevance {
    const haystack = title.toLowerCase();
    let matchedWords = 0;
    let totalWords = 0;
    const matchedTopics: string[] = [];

    for (const topic of topics) {
      const words = topic.split(/\s+/).filter(Boolean);
      if (words.length === 0) continue;

      const hits = words.filter((w) => haystack.includes(w.toLowerCase())).length;
      totalWords += words.length;
      matchedWords += hits;
      if (hits >= Math.ceil(words.length / 2)) matchedTopics.push(topic);
    }

    if (totalWords === 0) {
      return { score: this.config.neutralTopicScore, matchedTopics };
    }
    return { score: Math.min(10, (10 * matchedWords) / totalWords), matchedTopics };
  }

  recencyScore(publishedAt: Date, now: Date): number {
    const age = daysBetween(publishedAt, now);
    for (const bucket of this.config.recencyBuckets) {
      if (age <= bucket.maxDays) return bucket.score;
    }
    return this.config.recencyFloor;
  }
}

// ── Reasons ──

/** Human-readable explanation persisted with the suggestion. */
export function buildReason(candidate: SourcedCandidate, titleTopics: readonly string[]): string {
  const topics = titleTopics.length > 0 ? titleTopics : candidate.matchedTopics;
  const topicList = topics.join(', ');
  const origin: Origin = candidate.origin;

  let reason: string;
  switch (origin) {
    case 'tracked_source':
      reason = `New from ${candidate.item.sourceName}`;
      break;
    case 'topic_search':
      reason = topicList ? `Topics: ${topicList}` : 'Matches your topics';
      break;
    case 'both':
      reason = topicList
        ? `${candidate.item.sourceName} + Topics: ${topicList} (found by both tracked source and topic search)`
        : `${candidate.item.sourceName} (found by both tracked source and topic search)`;
      break;
    default:
      return assertNever(origin);
  }

  return reason.length > MAX_REASON_LENGTH
    ? `${reason.slice(0, MAX_REASON_LENGTH - 1)}…`
    : reason;
}

// ── Refresh schedule ──

/** Days between polls for a rating, or null when the source is never polled. */
export function refreshIntervalDays(rating: number | null): number | null {
  if (rating === null) return null;
  return REFRESH_INTERVAL_DAYS[rating] ?? null;
}

/**
 * Whether a tracked source should be polled now. A source that was never
 * checked is always due; otherwise the days since the last check must
 * exceed the rating's refresh interval.
 */
export function isSourceDue(rating: number | null, lastCheckedAt: Date | null, now: Date): boolean {
  if (lastCheckedAt === null) return true;
  const interval = refreshIntervalDays(rating);
  if (interval === null) return false;
  return daysBetween(lastCheckedAt, now) > interval;
}

// ── Analytics ──

/** Histogram of totals keyed by whole-number band, e.g. "7-8". */
export function scoreDistribution(totals: readonly number[]): Record<string, number> {
  const buckets: Record<string, number> = {};
  for (const total of totals) {
    const floor = Math.floor(total);
    const key = `${floor}-${floor + 1}`;
    buckets[key] = (buckets[key] ?? 0) + 1;
  }
  return buckets;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled origin: ${String(value)}`);
}
