/**
 * Video and source catalog access, plus the user's library.
 */

import type { VideoRow } from '../types/database.js';
import type { CandidateItem } from '../types/models.js';

export interface IVideoRepository {
  /** Upsert a source by external id. Returns its internal id. */
  ensureSourceExists(externalId: string, name: string): Promise<string>;

  /** Upsert a video by external id, refreshing its counters. Returns its internal id. */
  ensureVideoExists(item: CandidateItem, sourceId: string): Promise<string>;

  findById(videoId: string): Promise<VideoRow | null>;

  isInLibrary(userId: string, videoId: string): Promise<boolean>;

  addToLibrary(userId: string, videoId: string): Promise<void>;
}
