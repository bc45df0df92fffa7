import { describe, expect, it } from 'vitest';

import { DEFAULT_ARCHIVE_URL, DEFAULT_GEMINI_MODEL, loadConfig } from '../src/config/env';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      redisUrl: undefined,
      catalog: {
        baseUrl: DEFAULT_ARCHIVE_URL,
        timeoutMs: 10_000,
        cacheTtlMs: 3_600_000,
        defaultLimit: 10,
        retries: 0
      },
      advisor: {
        apiKey: undefined,
        model: DEFAULT_GEMINI_MODEL,
        cacheTtlMs: 3_600_000,
        timeoutMs: 30_000
      }
    });
  });

  it('reads values from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      CATALOG_TIMEOUT_MS: '2500',
      CATALOG_DEFAULT_LIMIT: '250',
      CATALOG_FETCH_RETRIES: '2',
      GEMINI_API_KEY: 'test-key',
      GEMINI_MODEL: 'gemini-test',
      REDIS_URL: 'redis://localhost:6379'
    });

    expect(config.port).toBe(8080);
    expect(config.catalog.timeoutMs).toBe(2500);
    expect(config.catalog.defaultLimit).toBe(250);
    expect(config.catalog.retries).toBe(2);
    expect(config.advisor.apiKey).toBe('test-key');
    expect(config.advisor.model).toBe('gemini-test');
    expect(config.redisUrl).toBe('redis://localhost:6379');
  });

  it('treats empty strings as unset', () => {
    const config = loadConfig({ GEMINI_API_KEY: '', REDIS_URL: '', EXOPLANET_ARCHIVE_URL: '' });
    expect(config.advisor.apiKey).toBeUndefined();
    expect(config.redisUrl).toBeUndefined();
    expect(config.catalog.baseUrl).toBe(DEFAULT_ARCHIVE_URL);
  });

  it('rejects a default limit outside 1..10000', () => {
    expect(() => loadConfig({ CATALOG_DEFAULT_LIMIT: '20000' })).toThrow(/CATALOG_DEFAULT_LIMIT/);
  });
});
