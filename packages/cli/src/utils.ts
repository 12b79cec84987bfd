// packages/cli/src/utils.ts — Config loading, service lifetime and option parsing for commands

import {
  IndexingService,
  createLogger,
  errorMessage,
  loadConfig,
  type Logger,
  type PubsyncConfig,
} from '@pubsync/core';
import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';

export interface GlobalOptions {
  verbose?: boolean;
  projectDir?: string;
}

export function loadCliConfig(options: GlobalOptions): PubsyncConfig {
  const config = loadConfig({ projectDir: options.projectDir ?? process.cwd() });
  if (options.verbose) config.advanced.logLevel = 'debug';
  return config;
}

/**
 * Run a command against an IndexingService that is closed afterwards,
 * whether the command succeeds or throws.
 */
export async function withService<T>(
  options: GlobalOptions,
  fn: (service: IndexingService, logger: Logger) => Promise<T>,
): Promise<T> {
  const config = loadCliConfig(options);
  const logger = createLogger(config.advanced.logLevel, 'pubsync');
  const service = IndexingService.fromConfig(config, { logger });
  try {
    return await fn(service, logger);
  } finally {
    await service.close();
  }
}

/** Print the error in red and exit non-zero. */
export function exitWithError(error: unknown): never {
  console.error(chalk.red(`Error: ${errorMessage(error)}`));
  process.exit(1);
}

export function parseInteger(value: string): number {
  if (!/^\d+$/.test(value.trim())) throw new InvalidArgumentError('Must be a non-negative integer');
  return Number.parseInt(value, 10);
}

export function parseIdList(value: string): number[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map(parseInteger);
}
