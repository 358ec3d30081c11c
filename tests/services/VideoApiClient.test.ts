import { describe, it, expect, beforeEach } from 'vitest';
import { VideoApiClient, type SourceUpdateRequest } from '../../src/services/VideoApiClient.js';
import { QuotaLedger } from '../../src/services/QuotaLedger.js';
import { InMemoryQuotaStore } from '../../src/stores/InMemoryQuotaStore.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { PlatformHttpError } from '../../src/providers/IVideoPlatformProvider.js';
import { MockVideoPlatformProvider } from '../mocks/MockVideoPlatformProvider.js';
import { MockNotificationProvider } from '../mocks/MockNotificationProvider.js';

const NOW = new Date('2026-03-10T12:00:00Z');

describe('VideoApiClient', () => {
  let provider: MockVideoPlatformProvider;
  let notifier: MockNotificationProvider;
  let logger: ConsoleLogProvider;
  let ledger: QuotaLedger;
  let client: VideoApiClient;

  function build(dailyLimit = 10_000): void {
    ledger = new QuotaLedger(new InMemoryQuotaStore(), notifier, logger, {
      dailyLimit,
      nearLimitFraction: 0.8,
      criticalFraction: 0.95,
      now: () => NOW,
    });
    client = new VideoApiClient(provider, ledger, notifier, logger, {
      maxConcurrentRequests: 3,
      requestTimeoutMs: 30_000,
      cacheTtlMs: 15 * 60 * 1000,
      searchCacheCapacity: 100,
      detailCacheCapacity: 500,
      detailBatchSize: 50,
      searchCost: 100,
      detailCost: 1,
      lookbackDays: 30,
      now: () => NOW,
    });
  }

  beforeEach(() => {
    provider = new MockVideoPlatformProvider();
    notifier = new MockNotificationProvider();
    logger = new ConsoleLogProvider();
    build();
  });

  // --- getDetails() ---

  describe('getDetails', () => {
    const ids = Array.from({ length: 120 }, (_, i) => `vid-${i}`);

    beforeEach(() => {
      for (const id of ids) provider.addVideo(id, { duration: 'PT4M5S', viewCount: 10 });
    });

    it('should fetch 120 ids in batches of 50, 50 and 20', async () => {
      const result = await client.getDetails([...ids, 'vid-0', ' vid-1 ']);

      expect(provider.listCalls.map((c) => c.length)).toEqual([50, 50, 20]);
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.data.map((d) => d.externalId)).toEqual(ids);
      expect(result.partial).toBeUndefined();
      expect(result.data[0].durationSeconds).toBe(245);
      expect(ledger.status().used).toBe(3);
    });

    it('should serve repeated ids from the detail cache', async () => {
      await client.getDetails(ids.slice(0, 10));
      await client.getDetails(ids.slice(5, 15));

      expect(provider.listCalls.map((c) => c.length)).toEqual([10, 5]);
      expect(ledger.status().used).toBe(2);
    });

    it('should omit ids the platform does not know', async () => {
      const result = await client.getDetails(['vid-1', 'deleted-video']);
      expect(result.ok && result.data.map((d) => d.externalId)).toEqual(['vid-1']);
    });

    it('should return earlier batches when the budget runs out', async () => {
      build(1);
      const result = await client.getDetails(ids);

      expect(provider.listCalls).toHaveLength(1);
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.data).toHaveLength(50);
      expect(result.partial?.kind).toBe('QuotaExceeded');
    });

    it('should stop at a platform quota error without charging for it', async () => {
      provider.failListAfter(1, new PlatformHttpError(403, 'quotaExceeded', 'quota exceeded'));
      const result = await client.getDetails(ids);

      expect(provider.listCalls).toHaveLength(2);
      expect(result.ok && result.data).toHaveLength(50);
      expect(result.ok && result.partial?.kind).toBe('QuotaExceeded');
      expect(ledger.status().used).toBe(1);
      expect(notifier.ofType('quota_limit')).toHaveLength(1);
    });

    it('should continue past transient batch failures and charge them', async () => {
      provider.failListAfter(0, new PlatformHttpError(500, null, 'backend error'));
      const result = await client.getDetails(ids);

      expect(provider.listCalls).toHaveLength(3);
      expect(result.ok && result.data).toEqual([]);
      expect(result.ok && result.partial?.kind).toBe('Transient');
      expect(ledger.status().used).toBe(3);
    });

    it('should return Cancelled when aborted before a batch', async () => {
      const result = await client.getDetails(ids, AbortSignal.abort());
      expect(result).toEqual({ ok: false, error: { kind: 'Cancelled', message: 'Request was cancelled' } });
      expect(provider.listCalls).toHaveLength(0);
    });

    it('should not call the platform for an empty id list', async () => {
      await expect(client.getDetails(['', '  '])).resolves.toEqual({ ok: true, data: [] });
      expect(provider.callCount).toBe(0);
    });
  });

  // --- searchBySource() ---

  describe('searchBySource', () => {
    beforeEach(() => {
      provider.addVideo('a', { publishedAt: new Date('2026-03-01T00:00:00Z'), viewCount: 11 });
      provider.addVideo('b', { publishedAt: new Date('2026-03-03T00:00:00Z'), viewCount: 22 });
      provider.addVideo('c', { publishedAt: new Date('2026-03-02T00:00:00Z'), viewCount: 33, duration: 'PT1H' });
      provider.setChannelResults('UC-a', ['a', 'b'], 'medium');
      provider.setChannelResults('UC-a', ['b', 'c'], 'long');
    });

    it('should split the search by duration and merge newest first', async () => {
      const since = new Date('2026-02-20T00:00:00Z');
      const result = await client.searchBySource('UC-a', since);

      expect(provider.searchCalls).toEqual([
        { channelId: 'UC-a', publishedAfter: since, order: 'date', maxResults: 25, videoDuration: 'medium' },
        { channelId: 'UC-a', publishedAfter: since, order: 'date', maxResults: 25, videoDuration: 'long' },
      ]);
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.data.map((d) => [d.externalId, d.durationCategory])).toEqual([
        ['b', 'long'],
        ['c', 'long'],
        ['a', 'medium'],
      ]);
    });

    it('should enrich results with video details', async () => {
      const result = await client.searchBySource('UC-a', NOW);
      if (!result.ok) throw new Error('expected success');

      const c = result.data.find((d) => d.externalId === 'c');
      expect(c?.viewCount).toBe(33);
      expect(c?.durationSeconds).toBe(3600);
      expect(provider.listCalls).toEqual([['b', 'c', 'a']]);
      expect(ledger.status().used).toBe(201);
    });

    it('should serve an identical search from the cache', async () => {
      await client.searchBySource('UC-a', NOW);
      const again = await client.searchBySource('UC-a', NOW);

      expect(again.ok && again.data).toHaveLength(3);
      expect(provider.searchCalls).toHaveLength(2);
      expect(ledger.status().used).toBe(201);
    });

    it('should search again after the cache is cleared', async () => {
      await client.searchBySource('UC-a', NOW);
      client.clearCache();
      await client.searchBySource('UC-a', NOW);
      expect(provider.searchCalls).toHaveLength(4);
    });

    it('should keep the half that succeeded when the other fails', async () => {
      provider.failSearch('UC-a', new PlatformHttpError(503, null, 'backend error'), 'long');
      const result = await client.searchBySource('UC-a', NOW);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.data.map((d) => [d.externalId, d.durationCategory])).toEqual([
        ['b', 'medium'],
        ['a', 'medium'],
      ]);
      expect(result.partial).toEqual({ kind: 'Transient', message: 'backend error', status: 503 });
      expect(ledger.status().used).toBe(201);
    });

    it('should not cache a result with a failed half', async () => {
      provider.failSearch('UC-a', new PlatformHttpError(503, null, 'backend error'), 'long');
      await client.searchBySource('UC-a', NOW);
      await client.searchBySource('UC-a', NOW);
      expect(provider.searchCalls).toHaveLength(4);
    });

    it('should fail when both halves fail', async () => {
      provider.failSearch('UC-a', new PlatformHttpError(503, null, 'backend error'));
      const result = await client.searchBySource('UC-a', NOW);
      expect(result).toEqual({
        ok: false,
        error: { kind: 'Transient', message: 'backend error', status: 503 },
      });
    });

    it('should ask each half for half the requested results', async () => {
      await client.searchBySource('UC-a', NOW, 7);
      expect(provider.searchCalls.map((c) => c.maxResults)).toEqual([3, 3]);
    });

    it('should reject a blank source id without calling the platform', async () => {
      const result = await client.searchBySource('  ', NOW);
      expect(result.ok || result.error.kind).toBe('InvalidRequest');
      expect(provider.callCount).toBe(0);
    });

    it('should fail fast when the budget cannot cover the search', async () => {
      build(150);
      const result = await client.searchBySource('UC-a', NOW);

      expect(result).toEqual({
        ok: false,
        error: { kind: 'QuotaExceeded', message: 'Insufficient quota for search.source' },
      });
      expect(provider.callCount).toBe(0);
      expect(notifier.ofType('quota_limit')).toHaveLength(1);
    });
  });

  // --- error classification ---

  describe('error classification', () => {
    it('should classify 401 as AuthFailure and charge nothing', async () => {
      provider.failSearch('UC-x', new PlatformHttpError(401, null, 'bad key'));
      const result = await client.searchBySource('UC-x', NOW);

      expect(result.ok || result.error).toEqual({ kind: 'AuthFailure', message: 'bad key', status: 401 });
      expect(ledger.status().used).toBe(0);
      expect(notifier.ofType('warning').map((n) => n.text)).toEqual([
        'The video service rejected our credentials. Suggestions are paused until the API key is fixed.',
      ]);
    });

    it('should classify 403 as QuotaExceeded and charge nothing', async () => {
      provider.failSearch('UC-x', new PlatformHttpError(403, 'quotaExceeded', 'quota'));
      const result = await client.searchBySource('UC-x', NOW);
      expect(result.ok || result.error.kind).toBe('QuotaExceeded');
      expect(ledger.status().used).toBe(0);
    });

    it('should classify 400 as InvalidRequest and charge both halves', async () => {
      provider.failSearch('UC-x', new PlatformHttpError(400, 'invalidChannelId', 'bad channel'));
      const result = await client.searchBySource('UC-x', NOW);
      expect(result.ok || result.error.kind).toBe('InvalidRequest');
      expect(ledger.status().used).toBe(200);
      expect(notifier.notifications).toHaveLength(0);
    });

    it('should classify network failures as Transient without charging', async () => {
      provider.failSearch('rust', new Error('ECONNRESET'));
      const result = await client.searchByTopic('rust', null);
      expect(result.ok || result.error).toEqual({ kind: 'Transient', message: 'Network error: ECONNRESET' });
      expect(ledger.status().used).toBe(0);
    });

    it('should return Cancelled for an aborted signal', async () => {
      const result = await client.searchByTopic('rust', null, 25, AbortSignal.abort());
      expect(result.ok || result.error.kind).toBe('Cancelled');
      expect(provider.callCount).toBe(0);
    });

    it('should log a structured event for each call', async () => {
      provider.failSearch('rust', new PlatformHttpError(500, null, 'backend error'));
      await client.searchByTopic('rust', null);

      const calls = logger.events.filter((e) => 'cost' in e);
      expect(calls).toHaveLength(2);
      expect(calls[0]).toMatchObject({ operation: 'search.topic', cost: 100, success: false, errorKind: 'Transient' });
    });
  });

  // --- searchByTopic() ---

  describe('searchByTopic', () => {
    it('should return nothing for a blank query without calling the platform', async () => {
      await expect(client.searchByTopic('   ', null)).resolves.toEqual({ ok: true, data: [] });
      expect(provider.callCount).toBe(0);
    });

    it('should search by relevance and omit the date filter when none is given', async () => {
      await client.searchByTopic('  rust  ', null, 10);
      expect(provider.searchCalls[0]).toEqual({
        query: 'rust',
        publishedAfter: undefined,
        order: 'relevance',
        maxResults: 5,
        videoDuration: 'medium',
      });
    });
  });

  // --- bulkSourceUpdates() ---

  describe('bulkSourceUpdates', () => {
    const requests: SourceUpdateRequest[] = [
      { sourceId: 'UC-1', lastCheck: null, rating: 5 },
      { sourceId: 'UC-2', lastCheck: null, rating: 1 },
      { sourceId: 'UC-3', lastCheck: new Date('2026-03-01T00:00:00Z'), rating: 3 },
      { sourceId: 'UC-4', lastCheck: null, rating: null },
    ];

    beforeEach(() => {
      provider.addVideo('one', { channelId: 'UC-1' });
      provider.addVideo('shared', { channelId: 'UC-1' });
      provider.addVideo('three', { channelId: 'UC-3' });
      provider.addVideo('four', { channelId: 'UC-4' });
      provider.setChannelResults('UC-1', ['one', 'shared']);
      provider.setChannelResults('UC-2', ['one']);
      provider.setChannelResults('UC-3', ['three', 'shared']);
      provider.setChannelResults('UC-4', ['four']);
    });

    it('should skip bottom-tier sources and dedupe across sources', async () => {
      const outcome = await client.bulkSourceUpdates(requests);

      expect(provider.searchCalls.some((c) => c.channelId === 'UC-2')).toBe(false);
      expect(outcome.succeeded.map((i) => i.externalId)).toEqual(['one', 'shared', 'three', 'four']);
      expect(outcome.completed.map((r) => r.sourceId)).toEqual(['UC-1', 'UC-3', 'UC-4']);
      expect(outcome.failed).toEqual([]);
      expect(outcome.halted).toBeNull();
    });

    it('should search from the last check, or the lookback window when never checked', async () => {
      await client.bulkSourceUpdates(requests);
      const since = (id: string) => provider.searchCalls.find((c) => c.channelId === id)?.publishedAfter?.toISOString();
      expect(since('UC-1')).toBe('2026-02-08T12:00:00.000Z');
      expect(since('UC-3')).toBe('2026-03-01T00:00:00.000Z');
    });

    it('should keep earlier results when quota runs out mid-loop', async () => {
      build(300);
      const outcome = await client.bulkSourceUpdates(requests);

      expect(outcome.succeeded.map((i) => i.externalId)).toEqual(['one', 'shared']);
      expect(outcome.completed.map((r) => r.sourceId)).toEqual(['UC-1']);
      expect(outcome.failed.map((f) => [f.input.sourceId, f.error.kind])).toEqual([['UC-3', 'QuotaExceeded']]);
      expect(outcome.halted).toBe('QuotaExceeded');
      expect(provider.searchCalls.some((c) => c.channelId === 'UC-4')).toBe(false);
    });

    it('should count only searchable sources as remaining when halted', async () => {
      build(300);
      await client.bulkSourceUpdates(requests);

      const halted = logger.events.find((e) => e.message === 'Source updates halted');
      expect(halted?.fields?.remaining).toBe(1);
    });

    it('should keep the results of a source whose second half hit the quota, then stop', async () => {
      provider.failSearch('UC-1', new PlatformHttpError(403, 'quotaExceeded', 'quota spent'), 'long');
      const outcome = await client.bulkSourceUpdates(requests);

      expect(outcome.succeeded.map((i) => i.externalId)).toEqual(['one', 'shared']);
      expect(outcome.completed).toEqual([]);
      expect(outcome.failed.map((f) => [f.input.sourceId, f.error.kind])).toEqual([['UC-1', 'QuotaExceeded']]);
      expect(outcome.halted).toBe('QuotaExceeded');
      expect(provider.searchCalls.some((c) => c.channelId === 'UC-3')).toBe(false);
    });

    it('should skip past a transient failure', async () => {
      provider.failSearch('UC-1', new PlatformHttpError(503, null, 'unavailable'));
      const outcome = await client.bulkSourceUpdates(requests);

      expect(outcome.failed.map((f) => f.input.sourceId)).toEqual(['UC-1']);
      expect(outcome.completed.map((r) => r.sourceId)).toEqual(['UC-3', 'UC-4']);
      expect(outcome.halted).toBeNull();
    });

    it('should stop on bad credentials', async () => {
      provider.failSearch('UC-1', new PlatformHttpError(401, null, 'bad key'));
      const outcome = await client.bulkSourceUpdates(requests);

      expect(outcome.halted).toBe('AuthFailure');
      expect(outcome.completed).toEqual([]);
      expect(provider.searchCalls).toHaveLength(2);
    });

    it('should stop when cancelled', async () => {
      const outcome = await client.bulkSourceUpdates(requests, 50, AbortSignal.abort());
      expect(outcome.halted).toBe('Cancelled');
      expect(provider.callCount).toBe(0);
    });
  });

  // --- bulkTopicSearch() ---

  describe('bulkTopicSearch', () => {
    beforeEach(() => {
      provider.addVideo('x');
      provider.addVideo('y');
      provider.addVideo('z');
      provider.setQueryResults('rust', ['x', 'y']);
      provider.setQueryResults('async', ['x']);
      provider.setQueryResults('chess', ['z']);
    });

    it('should merge hits and record every query that found a video', async () => {
      const outcome = await client.bulkTopicSearch(['rust', 'async'], null);

      expect(outcome.succeeded.map((h) => [h.item.externalId, h.queries])).toEqual([
        ['x', ['rust', 'async']],
        ['y', ['rust']],
      ]);
      expect(outcome.completed).toEqual(['rust', 'async']);
    });

    it('should stop on quota exhaustion and keep completed topics', async () => {
      build(250);
      const outcome = await client.bulkTopicSearch(['rust', 'chess'], null);

      expect(outcome.succeeded.map((h) => h.item.externalId)).toEqual(['x', 'y']);
      expect(outcome.failed.map((f) => f.input)).toEqual(['chess']);
      expect(outcome.halted).toBe('QuotaExceeded');
    });

    it('should keep hits from the half that succeeded and continue', async () => {
      provider.failSearch('rust', new PlatformHttpError(503, null, 'backend error'), 'long');
      const outcome = await client.bulkTopicSearch(['rust', 'chess'], null);

      expect(outcome.succeeded.map((h) => h.item.externalId)).toEqual(['x', 'y', 'z']);
      expect(outcome.completed).toEqual(['chess']);
      expect(outcome.failed.map((f) => [f.input, f.error.kind])).toEqual([['rust', 'Transient']]);
      expect(outcome.halted).toBeNull();
    });

    it('should continue past an invalid query', async () => {
      provider.failSearch('rust', new PlatformHttpError(400, null, 'bad query'));
      const outcome = await client.bulkTopicSearch(['rust', 'chess'], null);

      expect(outcome.failed.map((f) => f.error.kind)).toEqual(['InvalidRequest']);
      expect(outcome.succeeded.map((h) => h.item.externalId)).toEqual(['z']);
      expect(outcome.halted).toBeNull();
    });
  });
});
