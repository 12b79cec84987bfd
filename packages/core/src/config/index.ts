// packages/core/src/config/index.ts -- barrel re-export

export { DEFAULT_CONFIG } from './defaults.js';
export { pubsyncConfigSchema, validateConfig } from './schema.js';
export type { PubsyncConfigInput } from './schema.js';
export { loadConfig, configFromEnv, deepMerge, CONFIG_FILENAME } from './loader.js';
