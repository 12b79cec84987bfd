// packages/core/src/types/jobs.ts — Indexing job records, parameters and progress

import { z } from 'zod';
import type { LogLevel } from '../utils/logger.js';

export const JOB_TYPES = ['index-publication', 'index-scraper', 'sync-since', 'index-bulk'] as const;
export type JobType = (typeof JOB_TYPES)[number];

export const JOB_STATUSES = ['running', 'completed', 'failed', 'stopped'] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];
export type TerminalJobStatus = Exclude<JobStatus, 'running'>;

/** `YYYY-MM-DD` or `YYYY-MM-DD HH:MM:SS`, the format the source tables compare against. */
const sinceSchema = z
  .string()
  .trim()
  .regex(/^\d{4}-\d{2}-\d{2}( \d{2}:\d{2}:\d{2})?$/, 'expected YYYY-MM-DD or YYYY-MM-DD HH:MM:SS');

const publicationIdSchema = z.number().int().positive();

export const jobParamsSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('index-publication'), publicationId: publicationIdSchema }),
  z.object({ type: z.literal('index-scraper'), scraperId: z.number().int().positive(), since: sinceSchema }),
  z.object({ type: z.literal('sync-since'), since: sinceSchema }),
  z.object({ type: z.literal('index-bulk') }),
]);

export type JobParams = z.infer<typeof jobParamsSchema>;

export const progressSnapshotSchema = z.object({
  current: z.number().int().nonnegative().optional(),
  total: z.number().int().nonnegative().optional(),
  indexed: z.number().int().nonnegative().optional(),
  failed: z.number().int().nonnegative().optional(),
  message: z.string().optional(),
});

export type ProgressSnapshot = z.infer<typeof progressSnapshotSchema>;

export interface JobRecord {
  id: string;
  type: JobType;
  status: JobStatus;
  params: JobParams;
  ownerId: string | null;
  progress: ProgressSnapshot | null;
  errorText: string | null;
  startedAt: number;
  completedAt: number | null;
  updatedAt: number;
}

export interface ListJobsOptions {
  status?: JobStatus;
  type?: JobType;
  ownerId?: string;
  limit?: number;
  offset?: number;
}

export interface LogRecord {
  timestamp: string;
  level: LogLevel;
  message: string;
  jobId: string;
}

/** What `stop()` did. */
export type StopOutcome =
  | 'cancelled' // never started; marked stopped immediately
  | 'signalled' // running; the executor will mark it stopped
  | 'reconciled' // no live handle but the record read running; force-marked
  | 'not-running' // already terminal
  | 'not-found';

const statusNames: readonly string[] = JOB_STATUSES;
const typeNames: readonly string[] = JOB_TYPES;

export function isJobStatus(value: string): value is JobStatus {
  return statusNames.includes(value);
}

export function isJobType(value: string): value is JobType {
  return typeNames.includes(value);
}
