/**
 * In-memory mock for IVideoRepository.
 * Sources and videos are upserted by external id; the library is a set of
 * user/video pairs.
 */

import type { IVideoRepository } from '../../src/repositories/IVideoRepository.js';
import type { SourceRow, VideoRow } from '../../src/types/database.js';
import type { CandidateItem } from '../../src/types/models.js';

export class MockVideoRepository implements IVideoRepository {
  readonly sources = new Map<string, SourceRow>();
  readonly videos = new Map<string, VideoRow>();
  private library = new Set<string>();
  private nextId = 1;

  /** When set, ensureVideoExists rejects for these external ids. */
  failVideoIds = new Set<string>();
  failAddToLibrary = false;

  async ensureSourceExists(externalId: string, name: string): Promise<string> {
    const existing = [...this.sources.values()].find((s) => s.external_id === externalId);
    if (existing) return existing.id;

    const id = `source-${this.nextId++}`;
    this.sources.set(id, {
      id,
      external_id: externalId,
      name,
      created_at: new Date().toISOString(),
    });
    return id;
  }

  async ensureVideoExists(item: CandidateItem, sourceId: string): Promise<string> {
    if (this.failVideoIds.has(item.externalId)) {
      throw new Error(`Failed to upsert video: ${item.externalId}`);
    }

    const existing = this.findByExternalId(item.externalId);
    const id = existing?.id ?? `video-${this.nextId++}`;
    this.videos.set(id, {
      id,
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
      created_at: existing?.created_at ?? new Date().toISOString(),
    });
    return id;
  }

  async findById(videoId: string): Promise<VideoRow | null> {
    return this.videos.get(videoId) ?? null;
  }

  async isInLibrary(userId: string, videoId: string): Promise<boolean> {
    return this.library.has(`${userId}:${videoId}`);
  }

  async addToLibrary(userId: string, videoId: string): Promise<void> {
    if (this.failAddToLibrary) throw new Error('Failed to add to library: connection reset');
    this.library.add(`${userId}:${videoId}`);
  }

  // ── Test Helpers ──

  findByExternalId(externalId: string): VideoRow | undefined {
    return [...this.videos.values()].find((v) => v.external_id === externalId);
  }

  clear(): void {
    this.sources.clear();
    this.videos.clear();
    this.library.clear();
    this.failVideoIds.clear();
    this.failAddToLibrary = false;
    this.nextId = 1;
  }
}
