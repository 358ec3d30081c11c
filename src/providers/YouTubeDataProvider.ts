/**
 * YouTube Data API v3 provider.
 * No SDK dependency, uses native fetch. Responses are validated with zod
 * before they reach the rest of the pipeline.
 */

import { z } from 'zod';
import {
  PlatformHttpError,
  type IVideoPlatformProvider,
  type PlatformSearchItem,
  type PlatformSearchQuery,
  type PlatformVideo,
} from './IVideoPlatformProvider.js';

const DEFAULT_BASE_URL = 'https://www.googleapis.com/youtube/v3';

const ThumbnailSchema = z.object({ url: z.string() });

const SnippetSchema = z.object({
  publishedAt: z.string(),
  channelId: z.string(),
  title: z.string(),
  description: z.string().default(''),
  channelTitle: z.string().default(''),
  thumbnails: z
    .object({
      default: ThumbnailSchema.optional(),
      medium: ThumbnailSchema.optional(),
      high: ThumbnailSchema.optional(),
    })
    .default({}),
});

const SearchResponseSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.object({ videoId: z.string().optional() }),
        snippet: SnippetSchema,
      })
    )
    .default([]),
});

const VideosResponseSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.string(),
        snippet: SnippetSchema,
        contentDetails: z.object({ duration: z.string().default('') }).default({}),
        statistics: z
          .object({
            viewCount: z.coerce.number().optional(),
            likeCount: z.coerce.number().optional(),
            commentCount: z.coerce.number().optional(),
          })
          .default({}),
      })
    )
    .default([]),
});

const ErrorResponseSchema = z.object({
  error: z.object({
    message: z.string().default(''),
    errors: z.array(z.object({ reason: z.string().optional() })).default([]),
  }),
});

type Snippet = z.infer<typeof SnippetSchema>;

export class YouTubeDataProvider implements IVideoPlatformProvider {
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(opts: { apiKey: string; baseUrl?: string }) {
    this.apiKey = opts.apiKey;
    this.baseUrl = opts.baseUrl ?? DEFAULT_BASE_URL;
  }

  async search(query: PlatformSearchQuery, signal?: AbortSignal): Promise<PlatformSearchItem[]> {
    const params: Record<string, string> = {
      part: 'snippet',
      type: 'video',
      order: query.order,
      maxResults: String(query.maxResults),
      videoDuration: query.videoDuration,
    };
    if (query.channelId) params.channelId = query.channelId;
    if (query.query) params.q = query.query;
    if (query.publishedAfter) params.publishedAfter = query.publishedAfter.toISOString();

    const body = SearchResponseSchema.parse(await this.get('search', params, signal));

    const results: PlatformSearchItem[] = [];
    for (const item of body.items) {
      if (!item.id.videoId) continue;
      results.push(toSearchItem(item.id.videoId, item.snippet));
    }
    return results;
  }

  async listVideos(ids: string[], signal?: AbortSignal): Promise<PlatformVideo[]> {
    if (ids.length === 0) return [];

    const body = VideosResponseSchema.parse(
      await this.get(
        'videos',
        { part: 'snippet,statistics,contentDetails', id: ids.join(',') },
        signal
      )
    );

    return body.items.map((item) => ({
      ...toSearchItem(item.id, item.snippet),
      duration: item.contentDetails.duration,
      viewCount: item.statistics.viewCount ?? 0,
      likeCount: item.statistics.likeCount ?? 0,
      commentCount: item.statistics.commentCount ?? 0,
    }));
  }

  // ── Private ──

  private async get(
    resource: string,
    params: Record<string, string>,
    signal?: AbortSignal
  ): Promise<unknown> {
    const url = new URL(`${this.baseUrl}/${resource}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    url.searchParams.set('key', this.apiKey);

    const res = await fetch(url, {
      headers: { Accept: 'application/json' },
      signal,
    });

    if (!res.ok) {
      const parsed = ErrorResponseSchema.safeParse(await res.json().catch(() => ({})));
      const reason = parsed.success ? parsed.data.error.errors[0]?.reason ?? null : null;
      const detail = parsed.success && parsed.data.error.message
        ? parsed.data.error.message
        : res.statusText || 'Unknown error';
      throw new PlatformHttpError(
        res.status,
        reason,
        `YouTube API error (${res.status}): ${detail}`
      );
    }

    return res.json();
  }
}

function toSearchItem(videoId: string, snippet: Snippet): PlatformSearchItem {
  const thumbs = snippet.thumbnails;
  return {
    videoId,
    title: snippet.title,
    channelId: snippet.channelId,
    channelTitle: snippet.channelTitle,
    publishedAt: new Date(snippet.publishedAt),
    description: snippet.description,
    thumbnailUrl: thumbs.high?.url ?? thumbs.medium?.url ?? thumbs.default?.url ?? '',
  };
}
