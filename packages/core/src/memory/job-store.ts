// packages/core/src/memory/job-store.ts — SQLite-backed durable records for indexing jobs

import type Database from 'better-sqlite3';
import {
  isJobStatus,
  jobParamsSchema,
  progressSnapshotSchema,
  type JobParams,
  type JobRecord,
  type ListJobsOptions,
  type ProgressSnapshot,
  type TerminalJobStatus,
} from '../types/jobs.js';
import { DatabaseError } from '../utils/errors.js';
import { generateJobId } from '../utils/id.js';

interface JobRow {
  id: string;
  type: string;
  status: string;
  params_json: string;
  owner_id: string | null;
  progress_json: string | null;
  error_text: string | null;
  started_at: number;
  completed_at: number | null;
  updated_at: number;
}

export class JobStore {
  constructor(private db: Database.Database) {}

  /** Persist a new RUNNING job. Returns the job ID. */
  create(params: JobParams, ownerId: string | null, now = Date.now()): string {
    const id = generateJobId();
    this.db
      .prepare(
        `INSERT INTO index_jobs (id, type, status, params_json, owner_id, started_at, updated_at)
         VALUES (?, ?, 'running', ?, ?, ?, ?)`,
      )
      .run(id, params.type, JSON.stringify(params), ownerId, now, now);
    return id;
  }

  /** Get a job by ID. */
  get(id: string): JobRecord | null {
    const row = this.db.prepare('SELECT * FROM index_jobs WHERE id = ?').get(id) as
      | JobRow
      | undefined;
    return row ? this.toJob(row) : null;
  }

  /**
   * Move a job to a terminal status. Only updates if still running, so the
   * first terminal write wins. Returns whether this call made the transition.
   */
  finish(id: string, status: TerminalJobStatus, errorText: string | null = null, now = Date.now()): boolean {
    const result = this.db
      .prepare(
        `UPDATE index_jobs SET status = ?, error_text = ?, completed_at = ?, updated_at = ?
         WHERE id = ? AND status = 'running'`,
      )
      .run(status, errorText, now, now, id);
    return result.changes > 0;
  }

  markStopped(id: string, now = Date.now()): boolean {
    return this.finish(id, 'stopped', null, now);
  }

  /** Overwrite the progress snapshot of a running job. Terminal jobs are left untouched. */
  updateProgress(id: string, progress: ProgressSnapshot, now = Date.now()): boolean {
    const result = this.db
      .prepare(
        `UPDATE index_jobs SET progress_json = ?, updated_at = ? WHERE id = ? AND status = 'running'`,
      )
      .run(JSON.stringify(progress), now, id);
    return result.changes > 0;
  }

  /** List jobs with optional filters, newest first. */
  list(options?: ListJobsOptions): JobRecord[] {
    const conditions: string[] = [];
    const params: (string | number)[] = [];

    if (options?.status) {
      conditions.push('status = ?');
      params.push(options.status);
    }
    if (options?.type) {
      conditions.push('type = ?');
      params.push(options.type);
    }
    if (options?.ownerId) {
      conditions.push('owner_id = ?');
      params.push(options.ownerId);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    params.push(options?.limit ?? 50, options?.offset ?? 0);

    const rows = this.db
      .prepare(`SELECT * FROM index_jobs ${where} ORDER BY started_at DESC, rowid DESC LIMIT ? OFFSET ?`)
      .all(...params) as JobRow[];

    return rows.map((r) => this.toJob(r));
  }

  /**
   * Delete terminal jobs whose completion (or start, when never completed)
   * is older than the cutoff. Returns the number of deleted rows.
   */
  deleteTerminalBefore(cutoffMs: number): number {
    const result = this.db
      .prepare(
        `DELETE FROM index_jobs
         WHERE status != 'running' AND COALESCE(completed_at, started_at) < ?`,
      )
      .run(cutoffMs);
    return result.changes;
  }

  /** IDs of every job still on record. */
  listIds(): string[] {
    const rows = this.db.prepare('SELECT id FROM index_jobs').all() as { id: string }[];
    return rows.map((r) => r.id);
  }

  vacuum(): void {
    this.db.exec('VACUUM');
  }

  private toJob(row: JobRow): JobRecord {
    if (!isJobStatus(row.status)) {
      throw new DatabaseError(`Job ${row.id} has unknown status "${row.status}"`, 'read');
    }
    const params = jobParamsSchema.safeParse(JSON.parse(row.params_json));
    if (!params.success) {
      throw new DatabaseError(`Job ${row.id} has malformed parameters`, 'read');
    }
    let progress: ProgressSnapshot | null = null;
    if (row.progress_json) {
      const parsed = progressSnapshotSchema.safeParse(JSON.parse(row.progress_json));
      progress = parsed.success ? parsed.data : null;
    }
    return {
      id: row.id,
      type: params.data.type,
      status: row.status,
      params: params.data,
      ownerId: row.owner_id,
      progress,
      errorText: row.error_text,
      startedAt: row.started_at,
      completedAt: row.completed_at,
      updatedAt: row.updated_at,
    };
  }
}
