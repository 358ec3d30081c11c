/**
 * Database row types: mirror the Supabase table schemas in supabase/migrations.
 * Kept separate so the database can evolve independently of domain models.
 * Column names use snake_case to match PostgreSQL conventions.
 */

import type { SuggestionStatus } from './models.js';

// ── Catalog ──

export interface SourceRow {
  id: string;
  external_id: string;
  name: string;
  created_at: string;
}

export interface VideoRow {
  id: string;
  external_id: string;
  title: string;
  source_id: string;
  published_at: string;
  view_count: number;
  like_count: number;
  comment_count: number;
  duration_seconds: number;
  thumbnail_url: string;
  description: string;
  created_at: string;
}

// ── User interests ──

export interface TopicRow {
  id: string;
  user_id: string;
  name: string;
  created_at: string;
}

export interface UserSourceRow {
  user_id: string;
  source_id: string;
  rating: number | null;
  last_checked_at: string | null;
  created_at: string;
}

/** user_sources joined with sources. */
export interface UserSourceWithSourceRow extends UserSourceRow {
  sources: Pick<SourceRow, 'external_id' | 'name'>;
}

export interface LibraryEntryRow {
  user_id: string;
  video_id: string;
  added_at: string;
}

// ── Suggestions ──

export interface SuggestionRow {
  id: string;
  user_id: string;
  video_id: string;
  reason: string;
  status: SuggestionStatus;
  created_at: string;
  decided_at: string | null;
  deleted_at: string | null;
}

export interface SuggestionTopicRow {
  suggestion_id: string;
  topic_id: string;
}

export interface SuggestionWithVideoRow extends SuggestionRow {
  videos: VideoRow;
}

// ── Quota ──

export interface QuotaLedgerRow {
  date: string;
  used: number;
  daily_limit: number;
  reserved: number;
  last_reset_at: string;
}

export interface ApiCallRow {
  id: number;
  called_at: string;
  operation: string;
  cost: number;
  success: boolean;
  error: string | null;
  duration_ms: number;
  items_returned: number;
}
