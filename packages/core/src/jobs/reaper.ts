// packages/core/src/jobs/reaper.ts — Periodic retirement of old job records and orphaned log buffers

import type { LogAggregator } from '../logs/log-aggregator.js';
import type { JobStore } from '../memory/job-store.js';
import {
  MS_PER_DAY,
  MS_PER_HOUR,
  PROCESS_RETENTION_DAYS,
  REAPER_INTERVAL_HOURS,
  REAPER_MAX_INTERVAL_HOURS,
} from '../utils/constants.js';
import { errorMessage } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface ReaperOptions {
  retentionDays?: number;
  intervalHours?: number;
  logger?: Logger;
}

export interface SweepResult {
  deletedJobs: number;
  removedBuffers: number;
}

export class Reaper {
  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly retentionDays: number;
  private readonly intervalHours: number;
  private readonly logger: Logger;

  constructor(
    private readonly store: JobStore,
    private readonly logs: LogAggregator,
    options: ReaperOptions = {},
  ) {
    this.retentionDays = options.retentionDays ?? PROCESS_RETENTION_DAYS;
    this.intervalHours = options.intervalHours ?? REAPER_INTERVAL_HOURS;
    if (!(this.intervalHours > 0 && this.intervalHours <= REAPER_MAX_INTERVAL_HOURS)) {
      throw new RangeError(
        `Reaper interval must be in (0, ${REAPER_MAX_INTERVAL_HOURS}] hours, got ${this.intervalHours}`,
      );
    }
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Delete terminal jobs finished more than `retentionDays` before `now`,
   * drop log buffers whose job is no longer on record, then compact the store.
   * Running jobs are never touched.
   */
  sweep(now = Date.now()): SweepResult {
    const cutoff = now - this.retentionDays * MS_PER_DAY;
    const deletedJobs = this.store.deleteTerminalBefore(cutoff);

    const known = new Set(this.store.listIds());
    let removedBuffers = 0;
    for (const jobId of this.logs.jobIds()) {
      if (!known.has(jobId) && this.logs.remove(jobId)) removedBuffers++;
    }

    this.store.vacuum();
    this.logger.info(`Reaper removed ${deletedJobs} job(s) and ${removedBuffers} log buffer(s)`);
    return { deletedJobs, removedBuffers };
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      try {
        this.sweep();
      } catch (err) {
        this.logger.error(`Reaper sweep failed: ${errorMessage(err)}`);
      }
    }, this.intervalHours * MS_PER_HOUR);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get running(): boolean {
    return this.timer !== null;
  }
}
