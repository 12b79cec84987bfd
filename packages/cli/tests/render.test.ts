import type { JobRecord } from '@pubsync/core';
import chalk from 'chalk';
import { beforeAll, describe, expect, it, vi } from 'vitest';

import { createJobSpinner, formatEvent, jobView } from '../src/render.js';

const TS = '2024-01-02T03:04:05.000Z';

beforeAll(() => {
  chalk.level = 0;
});

describe('formatEvent', () => {
  it('formats lifecycle events', () => {
    expect(formatEvent({ type: 'job.created', jobId: 'job_a', jobType: 'index-bulk', timestamp: TS })).toBe(
      '● job_a created (index-bulk)',
    );
    expect(formatEvent({ type: 'job.started', jobId: 'job_a', timestamp: TS })).toBe('▶ job_a started');
    expect(formatEvent({ type: 'job.finished', jobId: 'job_a', status: 'completed', timestamp: TS })).toBe(
      '✓ job_a completed',
    );
    expect(formatEvent({ type: 'job.finished', jobId: 'job_a', status: 'stopped', timestamp: TS })).toBe(
      '■ job_a stopped',
    );
    expect(
      formatEvent({ type: 'job.finished', jobId: 'job_a', status: 'failed', error: 'Publication 42 not found', timestamp: TS }),
    ).toBe('✗ job_a failed: Publication 42 not found');
  });

  it('formats progress counters', () => {
    expect(
      formatEvent({
        type: 'job.progress',
        jobId: 'job_a',
        progress: { current: 2, total: 5, indexed: 1, failed: 1, message: 'Processed 2/5' },
        timestamp: TS,
      }),
    ).toBe('  job_a 2/5 indexed=1 failed=1 Processed 2/5');
    expect(
      formatEvent({ type: 'job.progress', jobId: 'job_a', progress: { message: 'Fetching publication 7' }, timestamp: TS }),
    ).toBe('  job_a Fetching publication 7');
  });
});

describe('jobView', () => {
  it('renders timestamps as ISO strings', () => {
    const job: JobRecord = {
      id: 'job_a',
      type: 'index-publication',
      status: 'failed',
      params: { type: 'index-publication', publicationId: 42 },
      ownerId: null,
      progress: { current: 0, total: 2, message: 'Fetching publication 42' },
      errorText: 'Publication 42 not found',
      startedAt: Date.parse(TS),
      completedAt: Date.parse(TS) + 1500,
      updatedAt: Date.parse(TS) + 1500,
    };
    expect(jobView(job)).toEqual({
      id: 'job_a',
      type: 'index-publication',
      status: 'failed',
      params: { type: 'index-publication', publicationId: 42 },
      ownerId: null,
      progress: { current: 0, total: 2, message: 'Fetching publication 42' },
      error: 'Publication 42 not found',
      startedAt: TS,
      completedAt: '2024-01-02T03:04:06.500Z',
      updatedAt: '2024-01-02T03:04:06.500Z',
    });
  });
});

describe('createJobSpinner', () => {
  it('prints events of jobs it never saw start', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const listener = createJobSpinner();
    listener({ type: 'job.created', jobId: 'job_b', jobType: 'sync-since', timestamp: TS });
    listener({ type: 'job.finished', jobId: 'job_b', status: 'stopped', timestamp: TS });
    expect(spy.mock.calls).toEqual([['● job_b created (sync-since)'], ['■ job_b stopped']]);
    spy.mockRestore();
  });
});
