import { CacheBackend, CacheRecord, TtlCache } from '../cache/ttlCache';
import { ExoplanetArchiveClient } from '../nasa/exoplanetArchiveClient';
import { logError, logInfo, logWarn } from '../observability/logger';
import { FetchError } from '../types/errors';
import { PlanetRecord } from '../types/planet';
import { Result, fail, ok } from '../types/result';

export type CatalogSource = Pick<ExoplanetArchiveClient, 'fetch'>;

export type CatalogCacheStatus = 'HIT' | 'MISS' | 'FROZEN';

export interface CatalogSnapshot {
  records: PlanetRecord[];
  metadata: {
    source: string;
    limit: number;
    fetchedAt: string;
    cacheStatus: CatalogCacheStatus;
    cacheBackend: CacheBackend;
    cacheAgeMs: number;
    cacheExpiresInMs: number;
    frozenSnapshot?: boolean;
    freezeReason?: string;
    requestId?: string;
  };
}

export interface CatalogServiceOptions {
  source: CatalogSource;
  cache: TtlCache<PlanetRecord[]>;
  defaultLimit: number;
  retries?: number;
  retryBaseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface GetCatalogOptions {
  limit?: number;
  forceRefresh?: boolean;
  requestId?: string;
}

const SOURCE = 'NASA-Exoplanet-Archive';

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Serves the catalog record set for a given row limit. Successful fetches are
 * memoized for the cache TTL; a failed fetch leaves the last good record set
 * for that limit active (reported as FROZEN) when there is one.
 */
export class CatalogService {
  readonly defaultLimit: number;
  private readonly source: CatalogSource;
  private readonly cache: TtlCache<PlanetRecord[]>;
  private readonly retries: number;
  private readonly retryBaseDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly inflightByLimit = new Map<number, Promise<Result<CatalogSnapshot, FetchError>>>();

  constructor(options: CatalogServiceOptions) {
    this.source = options.source;
    this.cache = options.cache;
    this.defaultLimit = options.defaultLimit;
    this.retries = options.retries ?? 0;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 500;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async getCatalog(options?: GetCatalogOptions): Promise<Result<CatalogSnapshot, FetchError>> {
    const limit = options?.limit ?? this.defaultLimit;
    const key = String(limit);

    if (!options?.forceRefresh) {
      const cached = await this.cache.get(key);
      if (cached) {
        return ok(this.toSnapshot(cached, limit, 'HIT', options?.requestId));
      }
    }

    let inflight = this.inflightByLimit.get(limit);
    if (!inflight) {
      inflight = this.refresh(limit, options?.forceRefresh ? 'manual-refresh' : 'miss', options?.requestId).finally(
        () => {
          this.inflightByLimit.delete(limit);
        }
      );
      this.inflightByLimit.set(limit, inflight);
    }

    return inflight;
  }

  private async refresh(
    limit: number,
    reason: string,
    requestId?: string
  ): Promise<Result<CatalogSnapshot, FetchError>> {
    const key = String(limit);
    const result = await this.fetchWithRetry(limit, requestId);

    if (result.ok) {
      const record = await this.cache.set(key, result.value);
      logInfo('catalog_refresh', { limit, reason, rows: result.value.length, requestId });
      return ok(this.toSnapshot(record, limit, 'MISS', requestId));
    }

    // On garde le dernier jeu de données valide plutôt que de tout vider.
    const previous = await this.cache.peek(key);
    if (previous) {
      const snapshot = this.toSnapshot(previous, limit, 'FROZEN', requestId);
      snapshot.metadata = {
        ...snapshot.metadata,
        cacheExpiresInMs: 0,
        frozenSnapshot: true,
        freezeReason: result.error.message
      };
      logWarn('catalog_snapshot_frozen', {
        limit,
        cacheAgeMs: snapshot.metadata.cacheAgeMs,
        requestId,
        error: result.error.message
      });
      return ok(snapshot);
    }

    logError('catalog_refresh_failed', { limit, reason, requestId, error: result.error.message });
    return fail(result.error);
  }

  private async fetchWithRetry(limit: number, requestId?: string): Promise<Result<PlanetRecord[], FetchError>> {
    for (let attempt = 0; ; attempt++) {
      const result = await this.source.fetch(limit, { requestId });
      if (result.ok || !result.error.transient || attempt >= this.retries) {
        return result;
      }

      const delayMs = this.retryBaseDelayMs * 2 ** attempt;
      logWarn('catalog_fetch_retry', { limit, attempt: attempt + 1, delayMs, requestId, error: result.error.message });
      await this.sleep(delayMs);
    }
  }

  private toSnapshot(
    record: CacheRecord<PlanetRecord[]>,
    limit: number,
    cacheStatus: CatalogCacheStatus,
    requestId?: string
  ): CatalogSnapshot {
    const cacheAgeMs = Math.max(0, this.now() - record.cachedAt);
    return {
      records: record.value,
      metadata: {
        source: SOURCE,
        limit,
        fetchedAt: new Date(record.cachedAt).toISOString(),
        cacheStatus,
        cacheBackend: this.cache.backend,
        cacheAgeMs,
        cacheExpiresInMs: Math.max(0, record.expiresAt - this.now()),
        requestId
      }
    };
  }
}
