// packages/core/src/service/indexing-service.ts — Facade the submitting layer talks to

import type Database from 'better-sqlite3';
import { Denormalizer } from '../denormalize/denormalizer.js';
import { EventBus } from '../engine/event-bus.js';
import { createIndexingUnit } from '../indexing/dispatch.js';
import { JobRegistry } from '../jobs/job-registry.js';
import { Reaper, type SweepResult } from '../jobs/reaper.js';
import { LogAggregator } from '../logs/log-aggregator.js';
import { openDatabase } from '../memory/database.js';
import { JobStore } from '../memory/job-store.js';
import { searchPublications } from '../query/search.js';
import type { DataSource } from '../sources/data-source.js';
import { ElasticSearchIndex } from '../sources/elastic-index.js';
import { MysqlDataSource } from '../sources/mysql-source.js';
import type { SearchIndex } from '../sources/search-index.js';
import type { PubsyncConfig } from '../types/config.js';
import type { JobRecord, ListJobsOptions, LogRecord, StopOutcome } from '../types/jobs.js';
import type { SearchResponse } from '../types/search.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface IndexingServiceDeps {
  config: PubsyncConfig;
  db: Database.Database;
  source: DataSource;
  index: SearchIndex;
  logger?: Logger;
  events?: EventBus;
}

/**
 * Wires the job store, registry, log buffers, reaper and recipes around one
 * data source and one search index. One instance per process.
 */
export class IndexingService {
  readonly events: EventBus;
  readonly store: JobStore;
  readonly logs: LogAggregator;
  readonly registry: JobRegistry;
  readonly reaper: Reaper;
  private readonly config: PubsyncConfig;
  private readonly db: Database.Database;
  private readonly source: DataSource;
  private readonly index: SearchIndex;
  private readonly logger: Logger;
  private closed = false;

  constructor(deps: IndexingServiceDeps) {
    this.config = deps.config;
    this.db = deps.db;
    this.source = deps.source;
    this.index = deps.index;
    this.logger = deps.logger ?? createLogger(deps.config.advanced.logLevel, 'pubsync');
    this.events = deps.events ?? new EventBus();

    this.store = new JobStore(this.db);
    this.logs = new LogAggregator(this.config.logs.bufferCapacity);
    this.registry = new JobRegistry(this.store, this.logs, {
      concurrency: this.config.jobs.concurrency,
      events: this.events,
      logger: this.logger,
    });
    this.reaper = new Reaper(this.store, this.logs, {
      retentionDays: this.config.reaper.retentionDays,
      intervalHours: this.config.reaper.intervalHours,
      logger: this.logger,
    });
  }

  /** Open the job database and connect the MySQL and Elasticsearch adapters. */
  static fromConfig(config: PubsyncConfig, options?: { logger?: Logger; events?: EventBus }): IndexingService {
    return new IndexingService({
      config,
      db: openDatabase(config.jobs.dbPath),
      source: MysqlDataSource.fromConfig(config.mysql),
      index: ElasticSearchIndex.fromConfig(config.elasticsearch),
      logger: options?.logger,
      events: options?.events,
    });
  }

  /** Validate, persist and schedule a job. Returns its id. */
  startJob(params: unknown, ownerId: string | null = null): string {
    const jobId = this.registry.create(params, ownerId);
    this.registry.submit(
      jobId,
      createIndexingUnit({
        source: this.source,
        index: this.index,
        denormalizer: new Denormalizer(this.source, this.logger),
        settings: this.config.indexing,
      }),
    );
    return jobId;
  }

  stopJob(jobId: string): StopOutcome {
    return this.registry.stop(jobId);
  }

  getJob(jobId: string): JobRecord | null {
    return this.registry.get(jobId);
  }

  listJobs(options?: ListJobsOptions): JobRecord[] {
    return this.registry.list(options);
  }

  getLogs(jobId: string, since?: string): LogRecord[] {
    return this.logs.query(jobId, since);
  }

  search(params: unknown): Promise<SearchResponse> {
    return searchPublications(this.index, params, this.config.search.defaultPageSize);
  }

  reap(now?: number): SweepResult {
    return this.reaper.sweep(now);
  }

  /**
   * Sweep every `reaper.intervalHours` until `close()`. The timer is unref'd,
   * so it never keeps the process alive on its own.
   */
  startReaper(): void {
    this.reaper.start();
  }

  ensureIndex(): Promise<boolean> {
    return this.index.ensureIndex();
  }

  /** Wait for every scheduled job to settle. */
  drain(): Promise<void> {
    return this.registry.drain();
  }

  /** Stop the reaper, let scheduled jobs settle, then release every connection. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.reaper.stop();
    await this.registry.drain();
    await Promise.all([this.source.close(), this.index.close()]);
    this.db.close();
  }
}
