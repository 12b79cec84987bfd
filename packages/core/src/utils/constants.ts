// packages/core/src/utils/constants.ts — Shared magic number constants

/** Log records kept per job before the oldest is evicted */
export const LOG_BUFFER_CAPACITY = 1000;

/** Jobs executed concurrently by the worker pool */
export const DEFAULT_JOB_CONCURRENCY = 4;

/** Days a terminal job record is kept before the reaper deletes it */
export const PROCESS_RETENTION_DAYS = 30;

/** Hours between reaper sweeps */
export const REAPER_INTERVAL_HOURS = 24;

/** Longest sweep interval whose delay still fits a Node timer (2^31 - 1 ms) */
export const REAPER_MAX_INTERVAL_HOURS = 596;

/** Candidate cap for the per-scraper incremental recipe */
export const SCRAPER_BATCH_LIMIT = 1000;

/** Candidate cap for the unscoped sync-since recipe */
export const SYNC_BATCH_LIMIT = 5000;

/** Page size for both passes of the full reindex */
export const BULK_PAGE_SIZE = 1000;

/** Progress is written every N items by the incremental recipes */
export const SCRAPER_PROGRESS_EVERY = 10;
export const SYNC_PROGRESS_EVERY = 50;

/** Search paging defaults */
export const DEFAULT_PAGE_SIZE = 15;
export const MAX_PAGE_SIZE = 1_000_000;

/** Elasticsearch client defaults */
export const ES_REQUEST_TIMEOUT_MS = 30_000;
export const ES_MAX_RETRIES = 3;

export const MS_PER_DAY = 24 * 60 * 60 * 1000;
export const MS_PER_HOUR = 60 * 60 * 1000;
