/**
 * Suggestion data access interface.
 * A suggestion is active while it is pending, not deleted, and was created
 * on or after the caller's `activeSince` cutoff.
 */

import type { SuggestionRow, SuggestionWithVideoRow } from '../types/database.js';
import type { SuggestionStatus } from '../types/models.js';
import type { PaginationOptions } from '../types/common.js';

export interface InsertSuggestionInput {
  userId: string;
  videoId: string;
  reason: string;
}

export interface ISuggestionRepository {
  /** Whether the user has an active suggestion for the video with this external id. */
  hasActiveSuggestion(userId: string, externalVideoId: string, activeSince: Date): Promise<boolean>;

  countActive(userId: string, activeSince: Date): Promise<number>;

  /**
   * Insert a pending suggestion.
   * Throws ConflictError when an active suggestion for the same video exists.
   */
  insert(input: InsertSuggestionInput): Promise<SuggestionRow>;

  /** Insert a pending suggestion and its topic links atomically. Same conflict rule as insert. */
  insertWithTopics(input: InsertSuggestionInput, topicIds: string[]): Promise<SuggestionRow>;

  findById(id: string): Promise<SuggestionRow | null>;

  /** Topic ids linked to a suggestion. */
  findTopicIds(suggestionId: string): Promise<string[]>;

  setStatus(id: string, status: Exclude<SuggestionStatus, 'pending'>, decidedAt: Date): Promise<SuggestionRow>;

  /** Soft-delete pending suggestions created before `cutoff`, only the user's when given. Returns how many. */
  softDeletePendingBefore(cutoff: Date, deletedAt: Date, userId?: string): Promise<number>;

  /** Soft-delete a user's pending suggestions whose video belongs to `sourceId`. Returns how many. */
  softDeletePendingForSource(userId: string, sourceId: string, deletedAt: Date): Promise<number>;

  /** Active suggestions with their videos, newest first. */
  listPending(userId: string, activeSince: Date, options?: PaginationOptions): Promise<SuggestionWithVideoRow[]>;

  /** Non-deleted suggestion counts by status, optionally only those created on or after `since`. */
  countByStatus(userId: string, since?: Date): Promise<Record<SuggestionStatus, number>>;
}
