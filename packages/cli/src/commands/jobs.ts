// packages/cli/src/commands/jobs.ts — Start, inspect and stop indexing jobs

import { isJobStatus, isJobType, type IndexingService, type ListJobsOptions } from '@pubsync/core';
import chalk from 'chalk';

import { createJobSpinner, jobView } from '../render.js';
import { exitWithError, withService, type GlobalOptions } from '../utils.js';

// ── pubsync jobs start ──

export interface StartOptions extends GlobalOptions {
  id?: number;
  scraperId?: number;
  since?: string;
  owner?: string;
}

/** Raw job parameters; the registry validates them against the job type. */
export function buildJobParams(type: string, options: StartOptions): Record<string, unknown> {
  return {
    type,
    publicationId: options.id,
    scraperId: options.scraperId,
    since: options.since,
  };
}

async function runToCompletion(service: IndexingService, type: string, options: StartOptions): Promise<boolean> {
  service.events.on('event', createJobSpinner());
  service.startReaper();
  const jobId = service.startJob(buildJobParams(type, options), options.owner ?? null);

  const shutdown = () => {
    const outcome = service.stopJob(jobId);
    console.error(chalk.dim(`\nStop requested (${outcome})...`));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  try {
    await service.drain();
  } finally {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
  }

  const job = service.getJob(jobId);
  if (job) console.log(JSON.stringify(jobView(job), null, 2));
  return job?.status === 'completed';
}

export async function jobsStartCommand(type: string, options: StartOptions): Promise<void> {
  let completed = false;
  try {
    completed = await withService(options, (service) => runToCompletion(service, type, options));
  } catch (error) {
    exitWithError(error);
  }
  if (!completed) process.exit(1);
}

// ── pubsync jobs list ──

export interface ListOptions extends GlobalOptions {
  status?: string;
  type?: string;
  owner?: string;
  limit?: number;
  offset?: number;
}

export function buildListFilters(options: ListOptions): ListJobsOptions {
  if (options.status !== undefined && !isJobStatus(options.status)) {
    throw new Error(`Unknown status: ${options.status}`);
  }
  if (options.type !== undefined && !isJobType(options.type)) {
    throw new Error(`Unknown job type: ${options.type}`);
  }
  return {
    status: options.status,
    type: options.type,
    ownerId: options.owner,
    limit: options.limit ?? 20,
    offset: options.offset ?? 0,
  };
}

export async function jobsListCommand(options: ListOptions): Promise<void> {
  try {
    const filters = buildListFilters(options);
    const jobs = await withService(options, async (service) => service.listJobs(filters));
    console.log(JSON.stringify(jobs.map(jobView), null, 2));
  } catch (error) {
    exitWithError(error);
  }
}

// ── pubsync jobs status ──

export async function jobsStatusCommand(jobId: string, options: GlobalOptions): Promise<void> {
  try {
    const job = await withService(options, async (service) => service.getJob(jobId));
    if (!job) {
      console.error(chalk.red(`No job found with ID: ${jobId}`));
      process.exit(1);
    }
    console.log(JSON.stringify(jobView(job), null, 2));
  } catch (error) {
    exitWithError(error);
  }
}

// ── pubsync jobs stop ──

export async function jobsStopCommand(jobId: string, options: GlobalOptions): Promise<void> {
  try {
    const outcome = await withService(options, async (service) => service.stopJob(jobId));
    if (outcome === 'not-found') {
      console.error(chalk.red(`No job found with ID: ${jobId}`));
      process.exit(1);
    }
    console.log(JSON.stringify({ jobId, outcome }));
  } catch (error) {
    exitWithError(error);
  }
}
