// packages/core/src/logs/job-logger.ts

import type { Logger, LogLevel } from '../utils/logger.js';
import type { LogAggregator } from './log-aggregator.js';

function render(message: string, args: unknown[]): string {
  if (args.length === 0) return message;
  return [message, ...args.map((a) => (a instanceof Error ? a.message : String(a)))].join(' ');
}

/**
 * Logger scoped to one job: every line lands in that job's buffer and is
 * forwarded to the process logger under the job id.
 */
export function createJobLogger(logs: LogAggregator, jobId: string, base: Logger): Logger {
  logs.ensure(jobId);

  function log(level: LogLevel, message: string, args: unknown[]): void {
    logs.append(jobId, level, render(message, args));
    base[level](`[${jobId}] ${message}`, ...args);
  }

  return {
    debug: (message, ...args) => log('debug', message, args),
    info: (message, ...args) => log('info', message, args),
    warn: (message, ...args) => log('warn', message, args),
    error: (message, ...args) => log('error', message, args),
  };
}
