// packages/core/src/config/defaults.ts

import type { PubsyncConfig } from '../types/config.js';
import {
  BULK_PAGE_SIZE,
  DEFAULT_JOB_CONCURRENCY,
  DEFAULT_PAGE_SIZE,
  ES_MAX_RETRIES,
  ES_REQUEST_TIMEOUT_MS,
  LOG_BUFFER_CAPACITY,
  PROCESS_RETENTION_DAYS,
  REAPER_INTERVAL_HOURS,
  SCRAPER_BATCH_LIMIT,
  SCRAPER_PROGRESS_EVERY,
  SYNC_BATCH_LIMIT,
  SYNC_PROGRESS_EVERY,
} from '../utils/constants.js';

export const DEFAULT_CONFIG: PubsyncConfig = {
  mysql: {
    host: 'localhost',
    port: 3306,
    database: 'licitaciones',
    user: 'root',
    password: '',
    connectionLimit: 10,
  },
  elasticsearch: {
    node: 'http://localhost:9200',
    index: 'publicaciones',
    requestTimeoutMs: ES_REQUEST_TIMEOUT_MS,
    maxRetries: ES_MAX_RETRIES,
  },
  jobs: {
    dbPath: '.pubsync/jobs.db',
    concurrency: DEFAULT_JOB_CONCURRENCY,
  },
  logs: {
    bufferCapacity: LOG_BUFFER_CAPACITY,
  },
  reaper: {
    retentionDays: PROCESS_RETENTION_DAYS,
    intervalHours: REAPER_INTERVAL_HOURS,
  },
  indexing: {
    scraperLimit: SCRAPER_BATCH_LIMIT,
    syncLimit: SYNC_BATCH_LIMIT,
    bulkPageSize: BULK_PAGE_SIZE,
    scraperProgressEvery: SCRAPER_PROGRESS_EVERY,
    syncProgressEvery: SYNC_PROGRESS_EVERY,
  },
  search: {
    defaultPageSize: DEFAULT_PAGE_SIZE,
  },
  advanced: {
    logLevel: 'info',
  },
};
