// packages/cli/src/render.ts — Terminal rendering for job events and records

import type { JobEvent, JobRecord, ProgressSnapshot } from '@pubsync/core';
import chalk from 'chalk';
import ora from 'ora';

function formatProgress(progress: ProgressSnapshot): string {
  const parts: string[] = [];
  if (progress.current !== undefined && progress.total !== undefined) {
    parts.push(`${progress.current}/${progress.total}`);
  }
  if (progress.indexed !== undefined) parts.push(`indexed=${progress.indexed}`);
  if (progress.failed !== undefined) parts.push(`failed=${progress.failed}`);
  if (progress.message) parts.push(progress.message);
  return parts.join(' ');
}

/** One line per lifecycle event. */
export function formatEvent(event: JobEvent): string {
  switch (event.type) {
    case 'job.created':
      return chalk.gray(`● ${event.jobId} created (${event.jobType})`);
    case 'job.started':
      return chalk.cyan(`▶ ${event.jobId} started`);
    case 'job.progress':
      return chalk.dim(`  ${event.jobId} ${formatProgress(event.progress)}`);
    case 'job.finished':
      if (event.status === 'completed') return chalk.green(`✓ ${event.jobId} completed`);
      if (event.status === 'stopped') return chalk.yellow(`■ ${event.jobId} stopped`);
      return chalk.red(`✗ ${event.jobId} failed: ${event.error ?? 'unknown error'}`);
  }
}

/**
 * Listener that keeps one spinner per started job, updating its text with
 * progress and settling it when the job finishes.
 */
export function createJobSpinner(): (event: JobEvent) => void {
  const spinners = new Map<string, ReturnType<typeof ora>>();

  return (event) => {
    switch (event.type) {
      case 'job.created':
        console.error(formatEvent(event));
        break;
      case 'job.started':
        spinners.set(event.jobId, ora({ text: `${event.jobId} running...`, color: 'cyan' }).start());
        break;
      case 'job.progress': {
        const spinner = spinners.get(event.jobId);
        if (spinner) spinner.text = `${event.jobId} ${formatProgress(event.progress)}`;
        else console.error(formatEvent(event));
        break;
      }
      case 'job.finished': {
        const spinner = spinners.get(event.jobId);
        spinners.delete(event.jobId);
        if (!spinner) {
          console.error(formatEvent(event));
        } else if (event.status === 'completed') {
          spinner.succeed(`${event.jobId} completed`);
        } else if (event.status === 'stopped') {
          spinner.warn(`${event.jobId} stopped`);
        } else {
          spinner.fail(`${event.jobId} failed: ${event.error ?? 'unknown error'}`);
        }
        break;
      }
    }
  };
}

/** JSON-friendly view of a job record with ISO timestamps. */
export function jobView(job: JobRecord): Record<string, unknown> {
  return {
    id: job.id,
    type: job.type,
    status: job.status,
    params: job.params,
    ownerId: job.ownerId,
    progress: job.progress,
    error: job.errorText,
    startedAt: new Date(job.startedAt).toISOString(),
    completedAt: job.completedAt !== null ? new Date(job.completedAt).toISOString() : null,
    updatedAt: new Date(job.updatedAt).toISOString(),
  };
}
