// packages/core/src/logs/log-aggregator.ts — Per-job bounded in-memory log buffers

import type { LogRecord } from '../types/jobs.js';
import { LOG_BUFFER_CAPACITY } from '../utils/constants.js';
import type { LogLevel } from '../utils/logger.js';
import { RingBuffer } from './ring-buffer.js';

/**
 * Holds one ring buffer per job id. Buffers are created on first append and
 * live until `remove()`; they never expire on their own. Records are not
 * persisted and do not survive a restart.
 */
export class LogAggregator {
  private buffers = new Map<string, RingBuffer<LogRecord>>();

  constructor(private readonly capacity: number = LOG_BUFFER_CAPACITY) {}

  /** Create the buffer for a job if it does not exist yet. */
  ensure(jobId: string): void {
    if (!this.buffers.has(jobId)) {
      this.buffers.set(jobId, new RingBuffer<LogRecord>(this.capacity));
    }
  }

  append(jobId: string, level: LogLevel, message: string, now: Date = new Date()): LogRecord {
    this.ensure(jobId);
    const record: LogRecord = { timestamp: now.toISOString(), level, message, jobId };
    this.buffers.get(jobId)?.push(record);
    return record;
  }

  /**
   * Records strictly after `since` (any string `Date.parse` accepts).
   * An unparsable `since` returns the whole buffer; an unknown job returns `[]`.
   */
  query(jobId: string, since?: string): LogRecord[] {
    const buffer = this.buffers.get(jobId);
    if (!buffer) return [];
    const records = buffer.toArray();
    if (since === undefined) return records;
    const sinceMs = Date.parse(since);
    if (Number.isNaN(sinceMs)) return records;
    return records.filter((r) => Date.parse(r.timestamp) > sinceMs);
  }

  remove(jobId: string): boolean {
    return this.buffers.delete(jobId);
  }

  has(jobId: string): boolean {
    return this.buffers.has(jobId);
  }

  jobIds(): string[] {
    return [...this.buffers.keys()];
  }
}
