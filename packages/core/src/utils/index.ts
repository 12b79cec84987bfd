// packages/core/src/utils/index.ts -- barrel re-export

export { generateJobId } from './id.js';
export {
  ConfigError,
  DatabaseError,
  ValidationError,
  NotFoundError,
  SourceUnavailableError,
  ItemIndexError,
  errorMessage,
} from './errors.js';
export { createLogger, silentLogger, LOG_LEVELS } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
