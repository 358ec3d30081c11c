/**
 * Supabase implementation of ISuggestionRepository.
 * The partial unique index on (user_id, video_id) for pending, non-deleted
 * rows turns a lost check-then-insert race into a ConflictError.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { ISuggestionRepository, InsertSuggestionInput } from './ISuggestionRepository.js';
import type {
  SuggestionRow,
  SuggestionTopicRow,
  SuggestionWithVideoRow,
} from '../types/database.js';
import type { SuggestionStatus } from '../types/models.js';
import type { PaginationOptions } from '../types/common.js';
import { ConflictError } from '../errors.js';

const UNIQUE_VIOLATION = '23505';

export class SupabaseSuggestionRepository implements ISuggestionRepository {
  constructor(private readonly db: SupabaseClient) {}

  async hasActiveSuggestion(userId: string, externalVideoId: string, activeSince: Date): Promise<boolean> {
    const { count, error } = await this.db
      .from('suggestions')
      .select('id, videos!inner(external_id)', { count: 'exact', head: true })
      .eq('user_id', userId)
      .eq('videos.external_id', externalVideoId)
      .eq('status', 'pending')
      .is('deleted_at', null)
      .gte('created_at', activeSince.toISOString());

    if (error) throw new Error(`Failed to check existing suggestion: ${error.message}`);
    return (count ?? 0) > 0;
  }

  async countActive(userId: string, activeSince: Date): Promise<number> {
    const { count, error } = await this.db
      .from('suggestions')
      .select('id', { count: 'exact', head: true })
      .eq('user_id', userId)
      .eq('status', 'pending')
      .is('deleted_at', null)
      .gte('created_at', activeSince.toISOString());

    if (error) throw new Error(`Failed to count suggestions: ${error.message}`);
    return count ?? 0;
  }

  async insert(input: InsertSuggestionInput): Promise<SuggestionRow> {
    const { data, error } = await this.db
      .from('suggestions')
      .insert({
        user_id: input.userId,
        video_id: input.videoId,
        reason: input.reason,
        status: 'pending',
      })
      .select()
      .single();

    if (error) {
      if (error.code === UNIQUE_VIOLATION) throw duplicate(input);
      throw new Error(`Failed to insert suggestion: ${error.message}`);
    }
    return data as SuggestionRow;
  }

  async insertWithTopics(input: InsertSuggestionInput, topicIds: string[]): Promise<SuggestionRow> {
    const { data, error } = await this.db.rpc('insert_suggestion_with_topics', {
      p_user_id: input.userId,
      p_video_id: input.videoId,
      p_reason: input.reason,
      p_topic_ids: topicIds,
    });

    if (error) {
      if (error.code === UNIQUE_VIOLATION) throw duplicate(input);
      throw new Error(`Failed to insert suggestion with topics: ${error.message}`);
    }
    return data as SuggestionRow;
  }

  async findById(id: string): Promise<SuggestionRow | null> {
    const { data, error } = await this.db
      .from('suggestions')
      .select('*')
      .eq('id', id)
      .is('deleted_at', null)
      .maybeSingle();

    if (error) throw new Error(`Failed to fetch suggestion: ${error.message}`);
    return data as SuggestionRow | null;
  }

  async findTopicIds(suggestionId: string): Promise<string[]> {
    const { data, error } = await this.db
      .from('suggestion_topics')
      .select('*')
      .eq('suggestion_id', suggestionId);

    if (error) throw new Error(`Failed to fetch suggestion topics: ${error.message}`);
    return ((data ?? []) as SuggestionTopicRow[]).map((row) => row.topic_id);
  }

  async setStatus(
    id: string,
    status: Exclude<SuggestionStatus, 'pending'>,
    decidedAt: Date
  ): Promise<SuggestionRow> {
    const { data, error } = await this.db
      .from('suggestions')
      .update({ status, decided_at: decidedAt.toISOString() })
      .eq('id', id)
      .select()
      .single();

    if (error) throw new Error(`Failed to update suggestion: ${error.message}`);
    return data as SuggestionRow;
  }

  async softDeletePendingBefore(cutoff: Date, deletedAt: Date, userId?: string): Promise<number> {
    let query = this.db
      .from('suggestions')
      .update({ deleted_at: deletedAt.toISOString() }, { count: 'exact' })
      .eq('status', 'pending')
      .is('deleted_at', null)
      .lt('created_at', cutoff.toISOString());
    if (userId) query = query.eq('user_id', userId);

    const { count, error } = await query;

    if (error) throw new Error(`Failed to clean up suggestions: ${error.message}`);
    return count ?? 0;
  }

  async softDeletePendingForSource(userId: string, sourceId: string, deletedAt: Date): Promise<number> {
    const { data, error } = await this.db.rpc('soft_delete_pending_for_source', {
      p_user_id: userId,
      p_source_id: sourceId,
      p_deleted_at: deletedAt.toISOString(),
    });

    if (error) throw new Error(`Failed to remove source suggestions: ${error.message}`);
    return Number(data ?? 0);
  }

  async listPending(
    userId: string,
    activeSince: Date,
    options?: PaginationOptions
  ): Promise<SuggestionWithVideoRow[]> {
    const limit = options?.limit ?? 20;
    const offset = options?.offset ?? 0;

    const { data, error } = await this.db
      .from('suggestions')
      .select('*, videos!inner(*)')
      .eq('user_id', userId)
      .eq('status', 'pending')
      .is('deleted_at', null)
      .gte('created_at', activeSince.toISOString())
      .order('created_at', { ascending: false })
      .range(offset, offset + limit - 1);

    if (error) throw new Error(`Failed to list suggestions: ${error.message}`);
    return (data ?? []) as SuggestionWithVideoRow[];
  }

  async countByStatus(userId: string, since?: Date): Promise<Record<SuggestionStatus, number>> {
    const statuses: SuggestionStatus[] = ['pending', 'approved', 'denied'];
    const counts = await Promise.all(
      statuses.map(async (status) => {
        let query = this.db
          .from('suggestions')
          .select('id', { count: 'exact', head: true })
          .eq('user_id', userId)
          .eq('status', status)
          .is('deleted_at', null);
        if (since) query = query.gte('created_at', since.toISOString());

        const { count, error } = await query;
        if (error) throw new Error(`Failed to count suggestions: ${error.message}`);
        return count ?? 0;
      })
    );

    return { pending: counts[0], approved: counts[1], denied: counts[2] };
  }
}

function duplicate(input: InsertSuggestionInput): ConflictError {
  return new ConflictError(
    'DUPLICATE_SUGGESTION',
    'An active suggestion for this video already exists',
    { userId: input.userId, videoId: input.videoId }
  );
}
