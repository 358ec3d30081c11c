/**
 * Shapes returned by the suggestion service to the surrounding application.
 */

import type { Origin, SuggestionStatus } from './models.js';

export interface GenerateOptions {
  /** Minimum total score a candidate needs. Defaults to the configured threshold. */
  threshold?: number;
  /** Aborts discovery; nothing is persisted once aborted. */
  signal?: AbortSignal;
}

export interface CreatedSuggestion {
  id: string;
  videoId: string;
  externalVideoId: string;
  title: string;
  sourceName: string;
  origin: Origin;
  score: number;
  reason: string;
  topicIds: string[];
  createdAt: string;
  expiresAt: string;
}

export interface GenerationStats {
  sourceCandidatesFound: number;
  topicCandidatesFound: number;
  /** Videos found by both strategies. */
  duplicatesFound: number;
  totalUnique: number;
  qualified: number;
  /** Qualified candidates skipped because an active suggestion already exists. */
  alreadySuggested: number;
  persistFailures: number;
  countsByOrigin: Record<Origin, number>;
  averageScore: number;
  scoreDistribution: Record<string, number>;
  quotaHalted: boolean;
  /** Projected cost of the searches issued and the details they returned. */
  estimatedQuotaCost: number;
  quotaSpent: number;
  processingTimeMs: number;
}

export interface SuggestionResult {
  success: boolean;
  /** Short, user-facing summary. */
  message: string;
  suggestions: CreatedSuggestion[];
  stats: GenerationStats;
  warnings: string[];
}

export interface DecisionResult {
  suggestionId: string;
  status: Exclude<SuggestionStatus, 'pending'>;
  alreadyInLibrary: boolean;
  message: string;
}

export interface PendingSuggestion {
  id: string;
  reason: string;
  createdAt: string;
  expiresAt: string;
  video: {
    id: string;
    externalId: string;
    title: string;
    thumbnailUrl: string;
    durationSeconds: number;
    viewCount: number;
    publishedAt: string;
  };
}

export interface SuggestionAnalytics {
  totals: Record<SuggestionStatus, number>;
  lastSevenDays: Record<SuggestionStatus, number>;
  /** approved / (approved + denied), 0 when nothing was decided. */
  approvalRate: number;
}
