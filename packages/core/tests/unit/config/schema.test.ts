import { describe, expect, it } from 'vitest';
import { validateConfig } from '../../../src/config/schema.js';
import { ConfigError } from '../../../src/utils/errors.js';

describe('validateConfig', () => {
  it('fills every section with defaults from an empty object', () => {
    const config = validateConfig({});
    expect(config.mysql.port).toBe(3306);
    expect(config.elasticsearch.index).toBe('publicaciones');
    expect(config.jobs.concurrency).toBe(4);
    expect(config.logs.bufferCapacity).toBe(1000);
    expect(config.reaper.retentionDays).toBe(30);
    expect(config.indexing).toEqual({
      scraperLimit: 1000,
      syncLimit: 5000,
      bulkPageSize: 1000,
      scraperProgressEvery: 10,
      syncProgressEvery: 50,
    });
    expect(config.search.defaultPageSize).toBe(15);
    expect(config.advanced.logLevel).toBe('info');
  });

  it('rejects a non-positive concurrency', () => {
    expect(() => validateConfig({ jobs: { concurrency: 0 } })).toThrow(ConfigError);
  });

  it('lists the path of each issue', () => {
    try {
      validateConfig({ mysql: { port: 'abc' }, advanced: { logLevel: 'loud' } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      const message = err instanceof Error ? err.message : '';
      expect(message).toContain('mysql.port');
      expect(message).toContain('advanced.logLevel');
    }
  });

  it('requires a password when an Elasticsearch username is set', () => {
    expect(() => validateConfig({ elasticsearch: { username: 'indexer' } })).toThrow(
      'elasticsearch.password: password is required when username is set',
    );
  });

  it('caps the reaper interval at what a timer can hold', () => {
    expect(validateConfig({ reaper: { intervalHours: 596 } }).reaper.intervalHours).toBe(596);
    expect(() => validateConfig({ reaper: { intervalHours: 1000 } })).toThrow(ConfigError);
    expect(() => validateConfig({ reaper: { intervalHours: 1000 } })).toThrow(/reaper\.intervalHours/);
  });

  it('rejects a malformed node URL', () => {
    expect(() => validateConfig({ elasticsearch: { node: 'not a url' } })).toThrow(ConfigError);
  });
});
