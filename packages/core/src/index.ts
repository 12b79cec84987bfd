// @pubsync/core - Search index synchronization for tender publications
// Denormalizer, query compiler, job registry, log buffers, indexing recipes

export const VERSION = '0.1.0';

// Type definitions
export type {
  // Config
  MysqlConfig,
  ElasticsearchConfig,
  JobsConfig,
  LogsConfig,
  ReaperConfig,
  IndexingConfig,
  SearchConfig,
  PubsyncConfig,
  PubsyncConfigOverrides,
  // Events
  JobCreatedEvent,
  JobStartedEvent,
  JobProgressEvent,
  JobFinishedEvent,
  JobEvent,
  // Jobs
  JobType,
  JobStatus,
  TerminalJobStatus,
  JobParams,
  ProgressSnapshot,
  JobRecord,
  ListJobsOptions,
  LogRecord,
  StopOutcome,
  // Publications
  PublicationRow,
  PublicationDocument,
  TagRef,
  TenderTypeIds,
  // Search
  SearchParamsInput,
  SearchParams,
  QueryFilters,
  CompiledQuery,
  SearchRequest,
  SearchHits,
  SearchResponse,
} from './types/index.js';

export {
  JOB_TYPES,
  JOB_STATUSES,
  jobParamsSchema,
  progressSnapshotSchema,
  searchParamsSchema,
  isJobStatus,
  isJobType,
} from './types/index.js';

// Utilities
export {
  generateJobId,
  ConfigError,
  DatabaseError,
  ValidationError,
  NotFoundError,
  SourceUnavailableError,
  ItemIndexError,
  errorMessage,
  createLogger,
  silentLogger,
  LOG_LEVELS,
} from './utils/index.js';
export type { Logger, LogLevel } from './utils/index.js';
export {
  LOG_BUFFER_CAPACITY,
  DEFAULT_JOB_CONCURRENCY,
  PROCESS_RETENTION_DAYS,
  DEFAULT_PAGE_SIZE,
} from './utils/constants.js';

// Configuration
export {
  DEFAULT_CONFIG,
  pubsyncConfigSchema,
  validateConfig,
  loadConfig,
  configFromEnv,
  CONFIG_FILENAME,
} from './config/index.js';
export type { PubsyncConfigInput } from './config/index.js';

// Persistence
export { openDatabase, runMigrations, getSchemaVersion, JobStore } from './memory/index.js';

// Engine
export { EventBus, CancellationToken, CancellationError } from './engine/index.js';

// Logs
export { LogAggregator, RingBuffer, createJobLogger } from './logs/index.js';

// Denormalizer
export {
  Denormalizer,
  buildDocument,
  parseAmount,
  sanitizeDate,
  splitIds,
  parseTags,
  SparseDocumentBuilder,
} from './denormalize/index.js';

// Query
export {
  compileQuery,
  normalizeDateBound,
  parseSearchParams,
  buildSearchRequest,
  pageCount,
  searchPublications,
} from './query/index.js';

// Jobs
export { JobRegistry, Reaper } from './jobs/index.js';
export type { JobContext, JobUnit, JobRegistryOptions, ReaperOptions, SweepResult } from './jobs/index.js';

// Indexing recipes
export { createIndexingUnit, indexPublication, indexChangedSince, reindexAll, ensureReachable } from './indexing/index.js';
export type { IndexingDeps, IncrementalOptions } from './indexing/index.js';

// Store adapters
export { MysqlDataSource, ElasticSearchIndex, PUBLICATIONS_MAPPING_PATH, totalHits } from './sources/index.js';
export type { DataSource, ChangedSinceOptions, SearchIndex, BulkItemOutcome } from './sources/index.js';

// Service
export { IndexingService } from './service/index.js';
export type { IndexingServiceDeps } from './service/index.js';
