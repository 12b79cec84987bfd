import type Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { Denormalizer } from '../../../src/denormalize/denormalizer.js';
import { EventBus } from '../../../src/engine/event-bus.js';
import { createIndexingUnit } from '../../../src/indexing/dispatch.js';
import { JobRegistry } from '../../../src/jobs/job-registry.js';
import { LogAggregator } from '../../../src/logs/log-aggregator.js';
import { openDatabase } from '../../../src/memory/database.js';
import { JobStore } from '../../../src/memory/job-store.js';
import type { IndexingConfig } from '../../../src/types/config.js';
import type { ProgressSnapshot } from '../../../src/types/jobs.js';
import { FakeDataSource, FakeSearchIndex, deferred } from '../../helpers/fakes.js';

function range(from: number, to: number): number[] {
  return Array.from({ length: to - from + 1 }, (_, i) => from + i);
}

describe('indexing recipes', () => {
  let db: Database.Database;
  let logs: LogAggregator;
  let registry: JobRegistry;
  let source: FakeDataSource;
  let index: FakeSearchIndex;
  let progress: Map<string, ProgressSnapshot[]>;

  beforeEach(() => {
    db = openDatabase(':memory:');
    logs = new LogAggregator();
    const events = new EventBus();
    progress = new Map();
    events.on('event', (e) => {
      if (e.type !== 'job.progress') return;
      const list = progress.get(e.jobId) ?? [];
      list.push(e.progress);
      progress.set(e.jobId, list);
    });
    registry = new JobRegistry(new JobStore(db), logs, { concurrency: 2, events });
    source = new FakeDataSource();
    index = new FakeSearchIndex();
  });

  afterEach(() => {
    db.close();
  });

  async function run(params: unknown, settings: Partial<IndexingConfig> = {}): Promise<string> {
    const jobId = registry.create(params);
    registry.submit(
      jobId,
      createIndexingUnit({
        source,
        index,
        denormalizer: new Denormalizer(source),
        settings: { ...DEFAULT_CONFIG.indexing, ...settings },
      }),
    );
    await registry.drain();
    return jobId;
  }

  describe('index-publication', () => {
    it('indexes one publication', async () => {
      source.addPublications([7]);
      const id = await run({ type: 'index-publication', publicationId: 7 });

      const job = registry.get(id);
      expect(job?.status).toBe('completed');
      expect(job?.progress).toEqual({ current: 2, total: 2, indexed: 1, failed: 0, message: 'Completed' });
      expect(index.docs.get(7)).toEqual({
        id: 7,
        objeto: 'Publication 7',
        visible: true,
        tag_ids: [],
        tags: [],
        mercado_ids: [],
        tasaCambioUSD: 0,
        vigente: false,
      });
      expect(progress.get(id)?.map((p) => p.message)).toEqual([
        'Fetching publication 7',
        'Indexing publication 7',
        'Completed',
      ]);
    });

    it('fails when the publication does not exist', async () => {
      const id = await run({ type: 'index-publication', publicationId: 42 });
      const job = registry.get(id);
      expect(job?.status).toBe('failed');
      expect(job?.errorText).toBe('Publication 42 not found');
      expect(index.upserts).toEqual([]);
    });

    it('fails when the write is rejected', async () => {
      source.addPublications([7]);
      index.rejectedIds.add(7);
      const id = await run({ type: 'index-publication', publicationId: 7 });
      expect(registry.get(id)?.errorText).toBe(
        'Failed to index publication 7: mapper_parsing_exception for 7',
      );
    });

    it('fails before reading anything when the search engine is down', async () => {
      source.addPublications([7]);
      index.reachable = false;
      const id = await run({ type: 'index-publication', publicationId: 7 });
      expect(registry.get(id)?.status).toBe('failed');
      expect(registry.get(id)?.errorText).toBe('Search engine unreachable: ping failed');
      expect(source.calls.fetch).toBe(0);
    });

    it('reports the ping error', async () => {
      index.pingError = new Error('connect ECONNREFUSED 127.0.0.1:9200');
      const id = await run({ type: 'index-publication', publicationId: 7 });
      expect(registry.get(id)?.errorText).toBe(
        'Search engine unreachable: connect ECONNREFUSED 127.0.0.1:9200',
      );
    });
  });

  describe('sync-since and index-scraper', () => {
    it('counts failures per item and skips missing publications', async () => {
      source.addPublications([1, 2, 4, 5]);
      source.changed = [5, 4, 3, 2, 1];
      source.failingIds.add(2);
      index.rejectedIds.add(4);

      const id = await run({ type: 'sync-since', since: '2024-01-01' }, { syncProgressEvery: 2 });

      const job = registry.get(id);
      expect(job?.status).toBe('completed');
      expect(job?.progress).toEqual({ current: 5, total: 5, indexed: 2, failed: 2, message: 'Completed' });
      expect(index.upserts).toEqual([5, 1]);
      expect(progress.get(id)).toEqual([
        { current: 0, total: 5, indexed: 0, failed: 0, message: 'Starting' },
        { current: 2, total: 5, indexed: 1, failed: 1, message: 'Processed 2/5' },
        { current: 4, total: 5, indexed: 1, failed: 2, message: 'Processed 4/5' },
        { current: 5, total: 5, indexed: 2, failed: 2, message: 'Completed' },
      ]);
      const messages = logs.query(id).map((r) => r.message);
      expect(messages).toContain('Publication 3 not found, skipped');
      expect(messages).toContain(
        'Failed to index publication 2: Failed to read publication 2: connection reset',
      );
    });

    it('passes the scraper and its batch limit to the source', async () => {
      source.changed = range(1, 20);
      source.addPublications(range(1, 20));
      const id = await run(
        { type: 'index-scraper', scraperId: 9, since: '2024-03-01 00:00:00' },
        { scraperLimit: 12 },
      );

      expect(source.lastChanged).toEqual({ since: '2024-03-01 00:00:00', options: { scraperId: 9, limit: 12 } });
      expect(registry.get(id)?.progress).toEqual({
        current: 12,
        total: 12,
        indexed: 12,
        failed: 0,
        message: 'Completed',
      });
      expect(progress.get(id)?.map((p) => p.current)).toEqual([0, 10, 12]);
    });

    it('stops between items when asked', async () => {
      source.addPublications([1, 2, 3]);
      source.changed = [1, 2, 3];
      const gate = deferred();
      source.gate = gate.promise;

      const jobId = registry.create({ type: 'sync-since', since: '2024-01-01' });
      registry.submit(
        jobId,
        createIndexingUnit({
          source,
          index,
          denormalizer: new Denormalizer(source),
          settings: DEFAULT_CONFIG.indexing,
        }),
      );
      while (source.calls.fetch === 0) await new Promise((r) => setTimeout(r, 1));

      expect(registry.stop(jobId)).toBe('signalled');
      gate.resolve();
      await registry.drain();

      expect(registry.get(jobId)?.status).toBe('stopped');
      expect(source.calls.fetch).toBe(1);
      expect(index.upserts).toEqual([1]);
    });
  });

  describe('index-bulk', () => {
    it('writes one bulk request per page', async () => {
      source.allIds = range(1, 2500);
      source.addPublications(source.allIds);

      const id = await run({ type: 'index-bulk' });

      expect(index.bulkCalls.map((docs) => docs.length)).toEqual([1000, 1000, 500]);
      expect(source.calls.allIds).toBe(6);
      expect(index.docs.size).toBe(2500);
      const job = registry.get(id);
      expect(job?.status).toBe('completed');
      expect(job?.progress).toEqual({
        current: 2500,
        total: 2500,
        indexed: 2500,
        failed: 0,
        message: 'Completed',
      });
      expect(progress.get(id)?.map((p) => p.current)).toEqual([0, 1000, 2000, 2500, 2500]);
    });

    it('counts rejected documents and a failed page', async () => {
      source.allIds = range(1, 5);
      source.addPublications([1, 2, 3, 5]);
      index.rejectedIds.add(2);

      const first = await run({ type: 'index-bulk' }, { bulkPageSize: 3 });
      expect(registry.get(first)?.progress).toEqual({
        current: 5,
        total: 5,
        indexed: 3,
        failed: 1,
        message: 'Completed',
      });

      index.failBulk = true;
      const second = await run({ type: 'index-bulk' }, { bulkPageSize: 3 });
      expect(registry.get(second)?.status).toBe('completed');
      expect(registry.get(second)?.progress).toEqual({
        current: 5,
        total: 5,
        indexed: 0,
        failed: 4,
        message: 'Completed',
      });
    });

    it('fails when the id listing cannot be read', async () => {
      source.listAllIds = async () => {
        throw new Error('Too many connections');
      };
      const id = await run({ type: 'index-bulk' });
      expect(registry.get(id)?.errorText).toBe('Failed to list publication ids: Too many connections');
    });
  });
});
