// packages/core/src/types/index.ts -- barrel re-export

export type {
  MysqlConfig,
  ElasticsearchConfig,
  JobsConfig,
  LogsConfig,
  ReaperConfig,
  IndexingConfig,
  SearchConfig,
  PubsyncConfig,
  PubsyncConfigOverrides,
} from './config.js';

export type {
  JobCreatedEvent,
  JobStartedEvent,
  JobProgressEvent,
  JobFinishedEvent,
  JobEvent,
} from './events.js';

export {
  JOB_TYPES,
  JOB_STATUSES,
  jobParamsSchema,
  progressSnapshotSchema,
  isJobStatus,
  isJobType,
} from './jobs.js';
export type {
  JobType,
  JobStatus,
  TerminalJobStatus,
  JobParams,
  ProgressSnapshot,
  JobRecord,
  ListJobsOptions,
  LogRecord,
  StopOutcome,
} from './jobs.js';

export type {
  PublicationRow,
  PublicationDocument,
  TagRef,
  TenderTypeIds,
} from './publication.js';

export { searchParamsSchema } from './search.js';
export type {
  SearchParamsInput,
  SearchParams,
  QueryFilters,
  TextField,
  WildcardClause,
  TermClause,
  TermsClause,
  DateBounds,
  RangeClause,
  FilterClause,
  BoolQuery,
  CompiledQuery,
  SortOrder,
  SortClause,
  SearchRequest,
  SearchHits,
  SearchResponse,
} from './search.js';
