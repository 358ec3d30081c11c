/**
 * Read access to what a user cares about: topics, rated and tracked sources.
 * The only write is stamping when a tracked source was last polled.
 */

import type { SourceRating, Topic, TrackedSource } from '../types/models.js';

export interface IUserInterestRepository {
  /** The user's topics, oldest first. */
  getUserTopics(userId: string): Promise<Topic[]>;

  /** Star ratings the user gave to sources, keyed by source external id. */
  getSourceRatings(userId: string): Promise<SourceRating[]>;

  /** Tracked sources eligible for polling: every source not rated at the bottom tier. */
  getSourcesForUpdateCheck(userId: string): Promise<TrackedSource[]>;

  /** Record that a tracked source was polled at `checkedAt`. */
  markSourceChecked(userId: string, sourceId: string, checkedAt: Date): Promise<void>;
}
