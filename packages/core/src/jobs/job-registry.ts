// packages/core/src/jobs/job-registry.ts — Durable job records plus live cancellation handles

import pLimit from 'p-limit';
import { CancellationError, CancellationToken } from '../engine/cancellation.js';
import type { EventBus } from '../engine/event-bus.js';
import { createJobLogger } from '../logs/job-logger.js';
import type { LogAggregator } from '../logs/log-aggregator.js';
import type { JobStore } from '../memory/job-store.js';
import {
  jobParamsSchema,
  type JobParams,
  type JobRecord,
  type ListJobsOptions,
  type ProgressSnapshot,
  type StopOutcome,
  type TerminalJobStatus,
} from '../types/jobs.js';
import { DEFAULT_JOB_CONCURRENCY } from '../utils/constants.js';
import { NotFoundError, ValidationError, errorMessage } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface JobContext {
  jobId: string;
  params: JobParams;
  token: CancellationToken;
  logger: Logger;
  /** Overwrite the job's progress snapshot. */
  reportProgress(progress: ProgressSnapshot): void;
}

/** One job's work. Resolving completes the job, throwing fails it. */
export type JobUnit = (ctx: JobContext) => Promise<void>;

type Limit = ReturnType<typeof pLimit>;

interface ActiveJob {
  token: CancellationToken;
  started: boolean;
  done: Promise<void>;
}

export interface JobRegistryOptions {
  concurrency?: number;
  events?: EventBus;
  logger?: Logger;
}

/**
 * Owns the job state machine. Records live in the JobStore; cancellation
 * handles for scheduled and running jobs live in memory only and are keyed
 * by job id. Terminal writes go through `JobStore.finish`, which only moves a
 * job out of `running`, so the first terminal write wins.
 */
export class JobRegistry {
  private readonly active = new Map<string, ActiveJob>();
  private readonly limit: Limit;
  private readonly events?: EventBus;
  private readonly logger: Logger;

  constructor(
    private readonly store: JobStore,
    private readonly logs: LogAggregator,
    options: JobRegistryOptions = {},
  ) {
    this.limit = pLimit(Math.max(1, Math.floor(options.concurrency ?? DEFAULT_JOB_CONCURRENCY)));
    this.events = options.events;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Validate parameters and persist a RUNNING record. The record exists
   * before anything is scheduled. Returns the job id.
   */
  create(input: unknown, ownerId: string | null = null): string {
    const parsed = jobParamsSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'type'}: ${i.message}`);
      throw new ValidationError(`Invalid job parameters: ${issues.join('; ')}`, issues);
    }
    const jobId = this.store.create(parsed.data, ownerId);
    this.logs.ensure(jobId);
    this.events?.emitEvent({
      type: 'job.created',
      jobId,
      jobType: parsed.data.type,
      timestamp: new Date().toISOString(),
    });
    return jobId;
  }

  /**
   * Schedule `unit` on the worker pool. A job that is no longer running
   * (stopped before submission) is not scheduled.
   */
  submit(jobId: string, unit: JobUnit): void {
    const record = this.store.get(jobId);
    if (!record) throw new NotFoundError(`Job ${jobId} not found`, jobId);
    if (this.active.has(jobId)) throw new ValidationError(`Job ${jobId} is already scheduled`);
    if (record.status !== 'running') return;

    const handle: ActiveJob = { token: new CancellationToken(), started: false, done: Promise.resolve() };
    this.active.set(jobId, handle);
    handle.done = this.limit(() => this.run(record, handle, unit));
  }

  /** Request a stop. See StopOutcome for what each result means. */
  stop(jobId: string): StopOutcome {
    const handle = this.active.get(jobId);
    if (handle) {
      handle.token.cancel();
      if (handle.started) return 'signalled';
      this.active.delete(jobId);
      this.finalize(jobId, 'stopped', null);
      return 'cancelled';
    }

    const record = this.store.get(jobId);
    if (!record) return 'not-found';
    if (record.status !== 'running') return 'not-running';
    // No live handle: the process that ran it is gone.
    this.finalize(jobId, 'stopped', null);
    return 'reconciled';
  }

  updateProgress(jobId: string, progress: ProgressSnapshot): void {
    if (this.store.updateProgress(jobId, progress)) {
      this.events?.emitEvent({
        type: 'job.progress',
        jobId,
        progress,
        timestamp: new Date().toISOString(),
      });
    }
  }

  get(jobId: string): JobRecord | null {
    return this.store.get(jobId);
  }

  list(options?: ListJobsOptions): JobRecord[] {
    return this.store.list(options);
  }

  /** True while the job is scheduled or running in this process. */
  isActive(jobId: string): boolean {
    return this.active.has(jobId);
  }

  /** Resolve once every scheduled unit has settled. */
  async drain(): Promise<void> {
    while (this.active.size > 0) {
      await Promise.all([...this.active.values()].map((h) => h.done));
    }
  }

  private async run(record: JobRecord, handle: ActiveJob, unit: JobUnit): Promise<void> {
    const jobId = record.id;
    if (handle.token.isCancelled) {
      this.release(jobId, handle);
      return;
    }
    handle.started = true;

    const logger = createJobLogger(this.logs, jobId, this.logger);
    let status: TerminalJobStatus = 'completed';
    let error: string | null = null;

    try {
      this.events?.emitEvent({ type: 'job.started', jobId, timestamp: new Date().toISOString() });
      await unit({
        jobId,
        params: record.params,
        token: handle.token,
        logger,
        reportProgress: (progress) => this.updateProgress(jobId, progress),
      });
      if (handle.token.isCancelled) status = 'stopped';
    } catch (err) {
      if (err instanceof CancellationError) {
        status = 'stopped';
      } else {
        status = 'failed';
        error = errorMessage(err);
      }
    }

    if (status === 'stopped') logger.info('Job stopped');
    else if (status === 'failed') logger.error(`Job failed: ${error ?? 'unknown error'}`);
    else logger.info('Job completed');

    try {
      this.finalize(jobId, status, error);
    } catch (err) {
      this.logger.error(`Failed to record final status of ${jobId}: ${errorMessage(err)}`);
    } finally {
      this.release(jobId, handle);
    }
  }

  private finalize(jobId: string, status: TerminalJobStatus, error: string | null): void {
    if (this.store.finish(jobId, status, error)) {
      this.events?.emitEvent({
        type: 'job.finished',
        jobId,
        status,
        ...(error !== null ? { error } : {}),
        timestamp: new Date().toISOString(),
      });
    }
  }

  private release(jobId: string, handle: ActiveJob): void {
    if (this.active.get(jobId) === handle) {
      this.active.delete(jobId);
    }
  }
}
