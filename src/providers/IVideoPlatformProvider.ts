/**
 * Video platform provider interface.
 * Raw access to the platform's search and video-detail endpoints, with no
 * caching, quota accounting or retry. Failed HTTP responses throw
 * PlatformHttpError; network failures and aborts reject with whatever the
 * underlying fetch raised.
 */

import type { DurationCategory } from '../types/models.js';

export interface PlatformSearchQuery {
  /** Restrict to one channel. */
  channelId?: string;
  /** Free-text query. */
  query?: string;
  publishedAfter?: Date;
  maxResults: number;
  order: 'date' | 'relevance';
  videoDuration: DurationCategory;
}

export interface PlatformSearchItem {
  videoId: string;
  title: string;
  channelId: string;
  channelTitle: string;
  publishedAt: Date;
  description: string;
  thumbnailUrl: string;
}

export interface PlatformVideo extends PlatformSearchItem {
  /** ISO-8601 duration, e.g. PT12M3S. */
  duration: string;
  viewCount: number;
  likeCount: number;
  commentCount: number;
}

export class PlatformHttpError extends Error {
  constructor(
    readonly status: number,
    /** Platform-specific reason code, e.g. quotaExceeded. */
    readonly reason: string | null,
    message: string
  ) {
    super(message);
    this.name = 'PlatformHttpError';
  }
}

export interface IVideoPlatformProvider {
  search(query: PlatformSearchQuery, signal?: AbortSignal): Promise<PlatformSearchItem[]>;

  /** Details for at most one batch of ids. Unknown ids are omitted from the result. */
  listVideos(ids: string[], signal?: AbortSignal): Promise<PlatformVideo[]>;
}
