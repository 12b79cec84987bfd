// packages/core/src/config/schema.ts

import { z } from 'zod';
import {
  BULK_PAGE_SIZE,
  DEFAULT_JOB_CONCURRENCY,
  DEFAULT_PAGE_SIZE,
  ES_MAX_RETRIES,
  ES_REQUEST_TIMEOUT_MS,
  LOG_BUFFER_CAPACITY,
  PROCESS_RETENTION_DAYS,
  REAPER_INTERVAL_HOURS,
  REAPER_MAX_INTERVAL_HOURS,
  SCRAPER_BATCH_LIMIT,
  SCRAPER_PROGRESS_EVERY,
  SYNC_BATCH_LIMIT,
  SYNC_PROGRESS_EVERY,
} from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';

const positiveInt = z.number().int().positive();

const mysqlConfigSchema = z.object({
  host: z.string().min(1).default('localhost'),
  port: positiveInt.max(65535).default(3306),
  database: z.string().min(1).default('licitaciones'),
  user: z.string().min(1).default('root'),
  password: z.string().default(''),
  connectionLimit: positiveInt.default(10),
});

const elasticsearchConfigSchema = z
  .object({
    node: z.string().url().default('http://localhost:9200'),
    index: z.string().min(1).default('publicaciones'),
    username: z.string().min(1).optional(),
    password: z.string().optional(),
    apiKey: z.string().min(1).optional(),
    requestTimeoutMs: positiveInt.default(ES_REQUEST_TIMEOUT_MS),
    maxRetries: z.number().int().nonnegative().default(ES_MAX_RETRIES),
  })
  .superRefine((data, ctx) => {
    if (data.username !== undefined && data.password === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['password'],
        message: 'password is required when username is set',
      });
    }
  });

const jobsConfigSchema = z.object({
  dbPath: z.string().min(1).default('.pubsync/jobs.db'),
  concurrency: positiveInt.max(64).default(DEFAULT_JOB_CONCURRENCY),
});

const logsConfigSchema = z.object({
  bufferCapacity: positiveInt.default(LOG_BUFFER_CAPACITY),
});

const reaperConfigSchema = z.object({
  retentionDays: positiveInt.default(PROCESS_RETENTION_DAYS),
  intervalHours: z.number().positive().max(REAPER_MAX_INTERVAL_HOURS).default(REAPER_INTERVAL_HOURS),
});

const indexingConfigSchema = z.object({
  scraperLimit: positiveInt.default(SCRAPER_BATCH_LIMIT),
  syncLimit: positiveInt.default(SYNC_BATCH_LIMIT),
  bulkPageSize: positiveInt.default(BULK_PAGE_SIZE),
  scraperProgressEvery: positiveInt.default(SCRAPER_PROGRESS_EVERY),
  syncProgressEvery: positiveInt.default(SYNC_PROGRESS_EVERY),
});

const searchConfigSchema = z.object({
  defaultPageSize: positiveInt.default(DEFAULT_PAGE_SIZE),
});

const advancedConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export const pubsyncConfigSchema = z.object({
  mysql: mysqlConfigSchema.default({}),
  elasticsearch: elasticsearchConfigSchema.default({}),
  jobs: jobsConfigSchema.default({}),
  logs: logsConfigSchema.default({}),
  reaper: reaperConfigSchema.default({}),
  indexing: indexingConfigSchema.default({}),
  search: searchConfigSchema.default({}),
  advanced: advancedConfigSchema.default({}),
});

export type PubsyncConfigInput = z.input<typeof pubsyncConfigSchema>;

/**
 * Validate and parse a config object. Throws ConfigError on invalid input.
 */
export function validateConfig(config: unknown): z.output<typeof pubsyncConfigSchema> {
  const result = pubsyncConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    const field = result.error.issues[0]?.path.join('.');
    throw new ConfigError(`Invalid configuration: ${issues}`, field);
  }
  return result.data;
}
