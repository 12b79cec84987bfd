import type Database from 'better-sqlite3';
import { beforeEach, describe, expect, it } from 'vitest';
import { openDatabase } from '../../../src/memory/database.js';
import { JobStore } from '../../../src/memory/job-store.js';

describe('JobStore', () => {
  let db: Database.Database;
  let store: JobStore;

  beforeEach(() => {
    db = openDatabase(':memory:');
    store = new JobStore(db);
  });

  describe('create + get', () => {
    it('persists a running job with its parameters', () => {
      const id = store.create({ type: 'index-publication', publicationId: 42 }, 'user_7', 1_000);
      const job = store.get(id);
      expect(id).toMatch(/^job_/);
      expect(job).toEqual({
        id,
        type: 'index-publication',
        status: 'running',
        params: { type: 'index-publication', publicationId: 42 },
        ownerId: 'user_7',
        progress: null,
        errorText: null,
        startedAt: 1_000,
        completedAt: null,
        updatedAt: 1_000,
      });
    });

    it('returns null for nonexistent ID', () => {
      expect(store.get('nope')).toBeNull();
    });
  });

  describe('finish', () => {
    it('moves a running job to a terminal status', () => {
      const id = store.create({ type: 'index-bulk' }, null, 1_000);
      expect(store.finish(id, 'failed', 'boom', 2_000)).toBe(true);
      const job = store.get(id);
      expect(job?.status).toBe('failed');
      expect(job?.errorText).toBe('boom');
      expect(job?.completedAt).toBe(2_000);
    });

    it('only the first terminal write wins', () => {
      const id = store.create({ type: 'index-bulk' }, null);
      expect(store.markStopped(id)).toBe(true);
      expect(store.finish(id, 'completed')).toBe(false);
      expect(store.finish(id, 'failed', 'late')).toBe(false);
      const job = store.get(id);
      expect(job?.status).toBe('stopped');
      expect(job?.errorText).toBeNull();
    });
  });

  describe('updateProgress', () => {
    it('overwrites the snapshot while running', () => {
      const id = store.create({ type: 'sync-since', since: '2024-01-01' }, null);
      store.updateProgress(id, { current: 1, total: 10 });
      store.updateProgress(id, { current: 5, total: 10, indexed: 5, failed: 0 });
      expect(store.get(id)?.progress).toEqual({ current: 5, total: 10, indexed: 5, failed: 0 });
    });

    it('leaves terminal jobs untouched', () => {
      const id = store.create({ type: 'sync-since', since: '2024-01-01' }, null);
      store.updateProgress(id, { message: 'Completed' });
      store.finish(id, 'completed');
      expect(store.updateProgress(id, { message: 'late' })).toBe(false);
      expect(store.get(id)?.progress).toEqual({ message: 'Completed' });
    });
  });

  describe('list', () => {
    it('filters by status, type and owner, newest first', () => {
      const a = store.create({ type: 'index-bulk' }, 'u1', 1_000);
      const b = store.create({ type: 'index-publication', publicationId: 1 }, 'u1', 2_000);
      const c = store.create({ type: 'index-publication', publicationId: 2 }, 'u2', 3_000);
      store.finish(a, 'completed');

      expect(store.list().map((j) => j.id)).toEqual([c, b, a]);
      expect(store.list({ status: 'running' }).map((j) => j.id)).toEqual([c, b]);
      expect(store.list({ type: 'index-publication', ownerId: 'u1' }).map((j) => j.id)).toEqual([b]);
    });

    it('pages with limit and offset', () => {
      const ids = [1, 2, 3, 4].map((n) => store.create({ type: 'index-bulk' }, null, n * 1_000));
      expect(store.list({ limit: 2, offset: 1 }).map((j) => j.id)).toEqual([ids[2], ids[1]]);
    });
  });

  describe('deleteTerminalBefore', () => {
    it('deletes old terminal jobs and never running ones', () => {
      const oldDone = store.create({ type: 'index-bulk' }, null, 1_000);
      store.finish(oldDone, 'completed', null, 2_000);
      const oldRunning = store.create({ type: 'index-bulk' }, null, 1_000);
      const recentDone = store.create({ type: 'index-bulk' }, null, 1_000);
      store.finish(recentDone, 'failed', 'x', 9_000);

      expect(store.deleteTerminalBefore(5_000)).toBe(1);
      expect(store.listIds().sort()).toEqual([oldRunning, recentDone].sort());
    });
  });

  it('vacuum runs outside a transaction', () => {
    store.create({ type: 'index-bulk' }, null);
    expect(() => store.vacuum()).not.toThrow();
  });
});
