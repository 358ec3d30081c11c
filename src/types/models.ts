/**
 * Domain models: the internal representation used by services.
 * These are NOT database rows (see database.ts) and NOT wire shapes.
 */

// ── Discovery ──

/** Duration bucket a search result was requested under. */
export type DurationCategory = 'medium' | 'long';

/** A video discovered by either strategy, not yet scored or persisted. */
export interface CandidateItem {
  externalId: string;
  title: string;
  sourceExternalId: string;
  sourceName: string;
  publishedAt: Date;
  viewCount: number;
  likeCount: number;
  commentCount: number;
  durationSeconds: number;
  thumbnailUrl: string;
  description: string;
  durationCategory: DurationCategory | null;
}

/** A topic-search result together with every query that returned it. */
export interface TopicHit {
  item: CandidateItem;
  queries: string[];
}

/** Which discovery strategy (or both) produced a candidate. */
export type Origin = 'tracked_source' | 'topic_search' | 'both';

/** A consolidated candidate, tagged with its provenance. */
export interface SourcedCandidate {
  readonly item: CandidateItem;
  readonly origin: Origin;
  /** Topic queries that discovered the item, sorted. Empty for tracked-source only. */
  readonly matchedTopics: readonly string[];
}

// ── Scoring ──

export interface Score {
  candidate: SourcedCandidate;
  ratingScore: number;
  topicScore: number;
  recencyScore: number;
  bonus: number;
  /** Weighted sum of the three components, without the bonus. */
  baseScore: number;
  total: number;
  /** User topics with at least half their words present in the title. */
  matchedTopics: string[];
  reason: string;
}

// ── User interests ──

export interface Topic {
  id: string;
  name: string;
}

export interface SourceRating {
  sourceExternalId: string;
  /** 1–5 stars. */
  stars: number;
}

export interface TrackedSource {
  sourceId: string;
  externalId: string;
  name: string;
  /** 1–5 stars, or null when the user never rated it. */
  rating: number | null;
  lastCheckedAt: Date | null;
}

// ── Suggestions ──

export type SuggestionStatus = 'pending' | 'approved' | 'denied';

// ── Quota ──

export interface QuotaLedgerEntry {
  /** UTC day this entry accounts for, YYYY-MM-DD. */
  date: string;
  used: number;
  dailyLimit: number;
  reserved: number;
  lastResetAt: Date;
}

export interface ApiCallRecord {
  timestamp: Date;
  operation: string;
  cost: number;
  success: boolean;
  error: string | null;
  durationMs: number;
  itemsReturned: number;
}

export interface QuotaStatus {
  date: string;
  used: number;
  limit: number;
  reserved: number;
  remaining: number;
  usageFraction: number;
  resetsAt: Date;
  lastResetAt: Date;
  isNearLimit: boolean;
  isCritical: boolean;
}

export interface OperationStats {
  calls: number;
  quotaUsed: number;
  totalDurationMs: number;
  errors: number;
}
