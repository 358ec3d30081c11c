/**
 * Shared builders for pipeline test data.
 */

import type { CandidateItem, Origin, SourcedCandidate } from '../../src/types/models.js';

export function makeItem(externalId: string, overrides: Partial<CandidateItem> = {}): CandidateItem {
  return {
    externalId,
    title: `Video ${externalId}`,
    sourceExternalId: 'channel-1',
    sourceName: 'Channel One',
    publishedAt: new Date('2026-03-01T00:00:00Z'),
    viewCount: 0,
    likeCount: 0,
    commentCount: 0,
    durationSeconds: 0,
    thumbnailUrl: '',
    description: '',
    durationCategory: 'medium',
    ...overrides,
  };
}

export function makeCandidate(
  origin: Origin,
  item: CandidateItem,
  matchedTopics: string[] = []
): SourcedCandidate {
  return { item, origin, matchedTopics };
}

/** Deterministic PRNG (mulberry32) for property-style tests. */
export function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
