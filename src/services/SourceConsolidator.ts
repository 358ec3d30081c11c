/**
 * Source consolidator.
 * Merges tracked-source and topic-search candidates into one list keyed by
 * video id, tagging each with the strategy (or both) that found it.
 * Pure and order-independent: feeding the lists in either order yields the
 * same origins and matched topics.
 */

import type { CandidateItem, Origin, SourcedCandidate, TopicHit } from '../types/models.js';

interface Draft {
  item: CandidateItem;
  fromSource: boolean;
  fromTopic: boolean;
  topics: Set<string>;
}

export function consolidate(
  sourceItems: readonly CandidateItem[],
  topicHits: readonly TopicHit[]
): SourcedCandidate[] {
  const drafts = new Map<string, Draft>();

  for (const item of sourceItems) {
    const draft = drafts.get(item.externalId);
    if (draft) {
      draft.fromSource = true;
      // Tracked-source data wins over topic-search data for the same video.
      draft.item = item;
    } else {
      drafts.set(item.externalId, { item, fromSource: true, fromTopic: false, topics: new Set() });
    }
  }

  for (const hit of topicHits) {
    const draft = drafts.get(hit.item.externalId);
    if (draft) {
      draft.fromTopic = true;
      for (const q of hit.queries) draft.topics.add(q);
    } else {
      drafts.set(hit.item.externalId, {
        item: hit.item,
        fromSource: false,
        fromTopic: true,
        topics: new Set(hit.queries),
      });
    }
  }

  return [...drafts.values()].map((d) => ({
    item: d.item,
    origin: originOf(d.fromSource, d.fromTopic),
    matchedTopics: [...d.topics].sort(),
  }));
}

/** Counts per origin, for generation summaries. */
export function countByOrigin(candidates: readonly { origin: Origin }[]): Record<Origin, number> {
  const counts: Record<Origin, number> = { tracked_source: 0, topic_search: 0, both: 0 };
  for (const c of candidates) counts[c.origin]++;
  return counts;
}

function originOf(fromSource: boolean, fromTopic: boolean): Origin {
  if (fromSource && fromTopic) return 'both';
  return fromSource ? 'tracked_source' : 'topic_search';
}
