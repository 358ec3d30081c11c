/**
 * Supabase implementation of IUserInterestRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IUserInterestRepository } from './IUserInterestRepository.js';
import type { TopicRow, UserSourceWithSourceRow } from '../types/database.js';
import type { SourceRating, Topic, TrackedSource } from '../types/models.js';

export class SupabaseUserInterestRepository implements IUserInterestRepository {
  constructor(private readonly db: SupabaseClient) {}

  async getUserTopics(userId: string): Promise<Topic[]> {
    const { data, error } = await this.db
      .from('topics')
      .select('*')
      .eq('user_id', userId)
      .order('created_at', { ascending: true });

    if (error) throw new Error(`Failed to fetch topics: ${error.message}`);
    return ((data ?? []) as TopicRow[]).map((row) => ({ id: row.id, name: row.name }));
  }

  async getSourceRatings(userId: string): Promise<SourceRating[]> {
    const { data, error } = await this.db
      .from('user_sources')
      .select('*, sources!inner(external_id, name)')
      .eq('user_id', userId)
      .not('rating', 'is', null);

    if (error) throw new Error(`Failed to fetch source ratings: ${error.message}`);

    const ratings: SourceRating[] = [];
    for (const row of (data ?? []) as UserSourceWithSourceRow[]) {
      if (row.rating === null) continue;
      ratings.push({ sourceExternalId: row.sources.external_id, stars: row.rating });
    }
    return ratings;
  }

  async getSourcesForUpdateCheck(userId: string): Promise<TrackedSource[]> {
    const { data, error } = await this.db
      .from('user_sources')
      .select('*, sources!inner(external_id, name)')
      .eq('user_id', userId)
      .or('rating.is.null,rating.gt.1')
      .order('last_checked_at', { ascending: true, nullsFirst: true });

    if (error) throw new Error(`Failed to fetch tracked sources: ${error.message}`);

    return ((data ?? []) as UserSourceWithSourceRow[]).map((row) => ({
      sourceId: row.source_id,
      externalId: row.sources.external_id,
      name: row.sources.name,
      rating: row.rating,
      lastCheckedAt: row.last_checked_at ? new Date(row.last_checked_at) : null,
    }));
  }

  async markSourceChecked(userId: string, sourceId: string, checkedAt: Date): Promise<void> {
    const { error } = await this.db
      .from('user_sources')
      .update({ last_checked_at: checkedAt.toISOString() })
      .eq('user_id', userId)
      .eq('source_id', sourceId);

    if (error) throw new Error(`Failed to update source check date: ${error.message}`);
  }
}
