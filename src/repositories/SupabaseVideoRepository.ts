/**
 * Supabase implementation of IVideoRepository.
 * Upserts key on external_id so repeated discovery of a video is idempotent.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IVideoRepository } from './IVideoRepository.js';
import type { SourceRow, VideoRow } from '../types/database.js';
import type { CandidateItem } from '../types/models.js';

export class SupabaseVideoRepository implements IVideoRepository {
  constructor(private readonly db: SupabaseClient) {}

  async ensureSourceExists(externalId: string, name: string): Promise<string> {
    const { data, error } = await this.db
      .from('sources')
      .upsert({ external_id: externalId, name }, { onConflict: 'external_id' })
      .select('id')
      .single();

    if (error) throw new Error(`Failed to upsert source: ${error.message}`);
    return (data as Pick<SourceRow, 'id'>).id;
  }

  async ensureVideoExists(item: CandidateItem, sourceId: string): Promise<string> {
    const { data, error } = await this.db
      .from('videos')
      .upsert(
        {
          external_id: item.externalId,
          title: item.title,
          source_id: sourceId,
          published_at: item.publishedAt.toISOString(),
          view_count: item.viewCount,
          like_count: item.likeCount,
          comment_count: item.commentCount,
          duration_seconds: item.durationSeconds,
          thumbnail_url: item.thumbnailUrl,
          description: item.description,
        },
        { onConflict: 'external_id' }
      )
      .select('id')
      .single();

    if (error) throw new Error(`Failed to upsert video: ${error.message}`);
    return (data as Pick<VideoRow, 'id'>).id;
  }

  async findById(videoId: string): Promise<VideoRow | null> {
    const { data, error } = await this.db
      .from('videos')
      .select('*')
      .eq('id', videoId)
      .maybeSingle();

    if (error) throw new Error(`Failed to fetch video: ${error.message}`);
    return data as VideoRow | null;
  }

  async isInLibrary(userId: string, videoId: string): Promise<boolean> {
    const { count, error } = await this.db
      .from('library_entries')
      .select('video_id', { count: 'exact', head: true })
      .eq('user_id', userId)
      .eq('video_id', videoId);

    if (error) throw new Error(`Failed to check library: ${error.message}`);
    return (count ?? 0) > 0;
  }

  async addToLibrary(userId: string, videoId: string): Promise<void> {
    const { error } = await this.db
      .from('library_entries')
      .upsert(
        { user_id: userId, video_id: videoId },
        { onConflict: 'user_id,video_id', ignoreDuplicates: true }
      );

    if (error) throw new Error(`Failed to add video to library: ${error.message}`);
  }
}
