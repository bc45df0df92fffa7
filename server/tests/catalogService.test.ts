import { type Mock, beforeEach, describe, expect, it, vi } from 'vitest';

import { TtlCache } from '../src/cache/ttlCache';
import { CatalogService, CatalogSource } from '../src/services/catalogService';
import { FetchError } from '../src/types/errors';
import { PlanetRecord } from '../src/types/planet';
import { Result } from '../src/types/result';
import { PLANETS } from './fixtures';

const TTL_MS = 60 * 60 * 1000;

type FetchResult = Result<PlanetRecord[], FetchError>;

const success = (records: PlanetRecord[]): FetchResult => ({ ok: true, value: records });
const failure = (error: FetchError): FetchResult => ({ ok: false, error });

describe('CatalogService', () => {
  let clock: number;
  let fetch: Mock<[number, { requestId?: string }?], Promise<FetchResult>>;
  let sleep: Mock<[number], Promise<void>>;

  function service(retries = 0): CatalogService {
    const now = () => clock;
    const source: CatalogSource = { fetch };
    return new CatalogService({
      source,
      cache: new TtlCache<PlanetRecord[]>({ namespace: 'catalog:test', ttlMs: TTL_MS, now, keepExpired: true }),
      defaultLimit: 10,
      retries,
      sleep,
      now
    });
  }

  beforeEach(() => {
    clock = Date.parse('2024-03-01T12:00:00.000Z');
    fetch = vi.fn<[number, { requestId?: string }?], Promise<FetchResult>>();
    sleep = vi.fn<[number], Promise<void>>().mockResolvedValue(undefined);
  });

  it('fetches on a miss and serves the memoized records afterwards', async () => {
    fetch.mockResolvedValue(success(PLANETS));
    const catalog = service();

    const first = await catalog.getCatalog();
    clock += 5_000;
    const second = await catalog.getCatalog();

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(fetch).toHaveBeenCalledWith(10, { requestId: undefined });
    expect(first.ok && first.value.metadata.cacheStatus).toBe('MISS');
    expect(second.ok && second.value.metadata.cacheStatus).toBe('HIT');
    expect(second.ok && second.value.metadata.cacheAgeMs).toBe(5_000);
    expect(second.ok && second.value.metadata.fetchedAt).toBe('2024-03-01T12:00:00.000Z');
    expect(second.ok && second.value.records).toEqual(PLANETS);
  });

  it('keys the memoization by limit', async () => {
    fetch.mockResolvedValue(success(PLANETS));
    const catalog = service();

    await catalog.getCatalog({ limit: 5 });
    await catalog.getCatalog({ limit: 50 });
    await catalog.getCatalog({ limit: 5 });

    expect(fetch.mock.calls.map(([limit]) => limit)).toEqual([5, 50]);
  });

  it('fetches again once the validity window has passed', async () => {
    fetch.mockResolvedValueOnce(success(PLANETS)).mockResolvedValueOnce(success(PLANETS.slice(0, 2)));
    const catalog = service();

    await catalog.getCatalog();
    clock += TTL_MS;
    const result = await catalog.getCatalog();

    expect(fetch).toHaveBeenCalledTimes(2);
    expect(result.ok && result.value.metadata.cacheStatus).toBe('MISS');
    expect(result.ok && result.value.records).toHaveLength(2);
  });

  it('bypasses the memoized records on a manual refresh', async () => {
    fetch.mockResolvedValue(success(PLANETS));
    const catalog = service();

    await catalog.getCatalog();
    const refreshed = await catalog.getCatalog({ forceRefresh: true });

    expect(fetch).toHaveBeenCalledTimes(2);
    expect(refreshed.ok && refreshed.value.metadata.cacheStatus).toBe('MISS');
  });

  it('keeps the prior records active when a refresh times out', async () => {
    fetch
      .mockResolvedValueOnce(success(PLANETS))
      .mockResolvedValueOnce(failure(new FetchError('Archive injoignable: délai de 10000 ms dépassé', 'timeout')));
    const catalog = service();

    await catalog.getCatalog();
    clock += 1_000;
    const result = await catalog.getCatalog({ forceRefresh: true });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.records).toEqual(PLANETS);
      expect(result.value.metadata.cacheStatus).toBe('FROZEN');
      expect(result.value.metadata.frozenSnapshot).toBe(true);
      expect(result.value.metadata.freezeReason).toBe('Archive injoignable: délai de 10000 ms dépassé');
      expect(result.value.metadata.cacheAgeMs).toBe(1_000);
      expect(result.value.metadata.cacheExpiresInMs).toBe(0);
    }
  });

  it('returns the FetchError when nothing was fetched before', async () => {
    const error = new FetchError('Archive injoignable: délai de 10000 ms dépassé', 'timeout');
    fetch.mockResolvedValue(failure(error));

    const result = await service().getCatalog();

    expect(result).toEqual({ ok: false, error });
  });

  it('shares one in-flight fetch between concurrent callers', async () => {
    fetch.mockResolvedValue(success(PLANETS));
    const catalog = service();

    const [a, b] = await Promise.all([catalog.getCatalog(), catalog.getCatalog()]);

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(a).toEqual(b);
  });

  it('retries transient failures with exponential backoff', async () => {
    fetch
      .mockResolvedValueOnce(failure(new FetchError('timeout', 'timeout')))
      .mockResolvedValueOnce(failure(new FetchError('HTTP 502', 'http-status', 502)))
      .mockResolvedValueOnce(success(PLANETS));

    const result = await service(3).getCatalog();

    expect(result.ok).toBe(true);
    expect(fetch).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[500], [1000]]);
  });

  it('gives up after the configured number of retries', async () => {
    fetch.mockResolvedValue(failure(new FetchError('network down', 'network')));

    const result = await service(2).getCatalog();

    expect(result.ok).toBe(false);
    expect(fetch).toHaveBeenCalledTimes(3);
  });

  it('does not retry permanent failures', async () => {
    fetch.mockResolvedValue(failure(new FetchError('HTTP 400', 'http-status', 400)));

    await service(3).getCatalog();

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });
});
