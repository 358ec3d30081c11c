/**
 * In-memory mock for IUserInterestRepository.
 */

import type { IUserInterestRepository } from '../../src/repositories/IUserInterestRepository.js';
import type { SourceRating, Topic, TrackedSource } from '../../src/types/models.js';

export interface CheckRecord {
  userId: string;
  sourceId: string;
  checkedAt: Date;
}

export class MockUserInterestRepository implements IUserInterestRepository {
  private topics = new Map<string, Topic[]>();
  private sources = new Map<string, TrackedSource[]>();
  readonly checks: CheckRecord[] = [];

  failTopics = false;
  failSources = false;

  async getUserTopics(userId: string): Promise<Topic[]> {
    if (this.failTopics) throw new Error('Failed to fetch topics: timeout');
    return [...(this.topics.get(userId) ?? [])];
  }

  async getSourceRatings(userId: string): Promise<SourceRating[]> {
    if (this.failSources) throw new Error('Failed to fetch source ratings: timeout');
    return (this.sources.get(userId) ?? []).flatMap((s) =>
      s.rating === null ? [] : [{ sourceExternalId: s.externalId, stars: s.rating }]
    );
  }

  async getSourcesForUpdateCheck(userId: string): Promise<TrackedSource[]> {
    if (this.failSources) throw new Error('Failed to fetch tracked sources: timeout');
    return (this.sources.get(userId) ?? []).filter((s) => s.rating !== 1).map((s) => ({ ...s }));
  }

  async markSourceChecked(userId: string, sourceId: string, checkedAt: Date): Promise<void> {
    this.checks.push({ userId, sourceId, checkedAt });
    const source = (this.sources.get(userId) ?? []).find((s) => s.sourceId === sourceId);
    if (source) source.lastCheckedAt = checkedAt;
  }

  // ── Test Helpers ──

  addTopic(userId: string, name: string): Topic {
    const list = this.topics.get(userId) ?? [];
    const topic = { id: `topic-${list.length + 1}`, name };
    list.push(topic);
    this.topics.set(userId, list);
    return topic;
  }

  trackSource(
    userId: string,
    externalId: string,
    rating: number | null,
    lastCheckedAt: Date | null = null,
    name = `Source ${externalId}`
  ): TrackedSource {
    const list = this.sources.get(userId) ?? [];
    const source = { sourceId: `us-${externalId}`, externalId, name, rating, lastCheckedAt };
    list.push(source);
    this.sources.set(userId, list);
    return source;
  }

  clear(): void {
    this.topics.clear();
    this.sources.clear();
    this.checks.length = 0;
    this.failTopics = false;
    this.failSources = false;
  }
}
