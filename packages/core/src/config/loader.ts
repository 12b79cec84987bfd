// packages/core/src/config/loader.ts

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { PubsyncConfig, PubsyncConfigOverrides } from '../types/config.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { validateConfig } from './schema.js';

export const CONFIG_FILENAME = '.pubsync.yml';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects. Source values overwrite target values.
 * Arrays are replaced, not merged. `undefined` in the source is skipped.
 */
function deepMerge(target: object, source: object): PlainObject {
  const result: PlainObject = { ...target };
  for (const [key, value] of Object.entries(source)) {
    const srcVal: unknown = value;
    const tgtVal = result[key];
    if (srcVal === undefined) continue;
    if (isPlainObject(srcVal) && isPlainObject(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else {
      result[key] = srcVal;
    }
  }
  return result;
}

/** Numeric variables stay strings when they do not parse, so validation reports them. */
function numeric(value: string | undefined): number | string | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const n = Number(value);
  return Number.isNaN(n) ? value : n;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Map the deployment's environment variables onto config sections.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): PlainObject {
  return {
    mysql: {
      host: nonEmpty(env['DB_HOST']),
      port: numeric(env['DB_PORT']),
      database: nonEmpty(env['DB_DATABASE']),
      user: nonEmpty(env['DB_USERNAME']),
      password: env['DB_PASSWORD'],
    },
    elasticsearch: {
      node: nonEmpty(env['ELASTICSEARCH_NODE']),
      index: nonEmpty(env['ELASTICSEARCH_INDEX']),
      username: nonEmpty(env['ELASTICSEARCH_USERNAME']),
      password: env['ELASTICSEARCH_PASSWORD'],
      apiKey: nonEmpty(env['ELASTICSEARCH_API_KEY']),
    },
    jobs: {
      dbPath: nonEmpty(env['PUBSYNC_DB_PATH']),
    },
    reaper: {
      retentionDays: numeric(env['PROCESS_RETENTION_DAYS']),
    },
    advanced: {
      logLevel: nonEmpty(env['PUBSYNC_LOG_LEVEL']),
    },
  };
}

/**
 * Load config with precedence: overrides > environment > .pubsync.yml > defaults.
 *
 * 1. Start with hardcoded defaults
 * 2. Merge .pubsync.yml from projectDir on top
 * 3. Merge recognised environment variables on top
 * 4. Merge programmatic overrides on top
 * 5. Validate the final result
 */
export function loadConfig(options?: {
  projectDir?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: PubsyncConfigOverrides;
  skipFile?: boolean;
}): PubsyncConfig {
  const projectDir = options?.projectDir ?? process.cwd();
  let merged = deepMerge({}, structuredClone(DEFAULT_CONFIG));

  // Layer 2: Project file (.pubsync.yml)
  const configPath = join(projectDir, CONFIG_FILENAME);
  if (!options?.skipFile && existsSync(configPath)) {
    let fileConfig: unknown;
    try {
      fileConfig = parseYaml(readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${CONFIG_FILENAME}: ${errorMessage(err)}`);
    }
    if (isPlainObject(fileConfig)) {
      merged = deepMerge(merged, fileConfig);
    } else if (fileConfig !== null && fileConfig !== undefined) {
      throw new ConfigError(`${CONFIG_FILENAME} must contain a mapping at the top level`);
    }
  }

  // Layer 3: Environment
  merged = deepMerge(merged, configFromEnv(options?.env ?? process.env));

  // Layer 4: Programmatic overrides
  if (options?.overrides) {
    merged = deepMerge(merged, options.overrides);
  }

  return validateConfig(merged);
}

export { deepMerge };
