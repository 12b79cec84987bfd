// packages/core/src/types/events.ts

import type { JobStatus, JobType, ProgressSnapshot } from './jobs.js';

/**
 * Job lifecycle events.
 * Emitted by the job registry and consumed by the CLI.
 */

export interface JobCreatedEvent {
  type: 'job.created';
  jobId: string;
  jobType: JobType;
  timestamp: string;
}

export interface JobStartedEvent {
  type: 'job.started';
  jobId: string;
  timestamp: string;
}

export interface JobProgressEvent {
  type: 'job.progress';
  jobId: string;
  progress: ProgressSnapshot;
  timestamp: string;
}

export interface JobFinishedEvent {
  type: 'job.finished';
  jobId: string;
  status: Exclude<JobStatus, 'running'>;
  error?: string;
  timestamp: string;
}

export type JobEvent = JobCreatedEvent | JobStartedEvent | JobProgressEvent | JobFinishedEvent;
