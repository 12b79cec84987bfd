// packages/core/src/types/config.ts

import type { LogLevel } from '../utils/logger.js';

export interface MysqlConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  connectionLimit: number;
}

export interface ElasticsearchConfig {
  node: string;
  index: string;
  username?: string;
  password?: string;
  apiKey?: string;
  requestTimeoutMs: number;
  maxRetries: number;
}

export interface JobsConfig {
  dbPath: string;
  concurrency: number;
}

export interface LogsConfig {
  bufferCapacity: number;
}

export interface ReaperConfig {
  retentionDays: number;
  intervalHours: number;
}

export interface IndexingConfig {
  scraperLimit: number;
  syncLimit: number;
  bulkPageSize: number;
  scraperProgressEvery: number;
  syncProgressEvery: number;
}

export interface SearchConfig {
  defaultPageSize: number;
}

export interface PubsyncConfig {
  mysql: MysqlConfig;
  elasticsearch: ElasticsearchConfig;
  jobs: JobsConfig;
  logs: LogsConfig;
  reaper: ReaperConfig;
  indexing: IndexingConfig;
  search: SearchConfig;
  advanced: {
    logLevel: LogLevel;
  };
}

/** Deeply optional shape accepted by the loader's `overrides`. */
export type PubsyncConfigOverrides = {
  [K in keyof PubsyncConfig]?: Partial<PubsyncConfig[K]>;
};
