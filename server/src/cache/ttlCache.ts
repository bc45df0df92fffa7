import { createClient } from 'redis';

import { errorMessage, logInfo, logWarn } from '../observability/logger';

export type CacheBackend = 'memory' | 'redis';

export interface CacheRecord<T> {
  value: T;
  cachedAt: number;
  expiresAt: number;
}

/** The few Redis commands the cache needs. */
export interface RedisStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlMs: number): Promise<void>;
  del(key: string): Promise<void>;
}

export interface TtlCacheOptions {
  namespace: string;
  ttlMs: number;
  redis?: RedisStore | null;
  now?: () => number;
  /** Keep expired entries for `peek` instead of evicting them. */
  keepExpired?: boolean;
}

/**
 * Time-bounded memoization keyed by string. Entries live in process memory and,
 * when a Redis store is given, are mirrored there so several API instances share
 * them. Expired entries are evicted, unless the cache is built with
 * `keepExpired`: they then stay reachable through `peek` until overwritten, so
 * callers can fall back on the last good value.
 */
export class TtlCache<T> {
  readonly ttlMs: number;
  private readonly namespace: string;
  private readonly redis: RedisStore | null;
  private readonly now: () => number;
  private readonly keepExpired: boolean;
  private readonly memory = new Map<string, CacheRecord<T>>();

  constructor(options: TtlCacheOptions) {
    this.namespace = options.namespace;
    this.ttlMs = options.ttlMs;
    this.redis = options.redis ?? null;
    this.now = options.now ?? Date.now;
    this.keepExpired = options.keepExpired ?? false;
  }

  get backend(): CacheBackend {
    return this.redis ? 'redis' : 'memory';
  }

  /** Entries held in process memory. */
  get size(): number {
    return this.memory.size;
  }

  async get(key: string): Promise<CacheRecord<T> | null> {
    const record = await this.read(key);
    if (!record) {
      return null;
    }
    if (this.isExpired(record)) {
      if (!this.keepExpired) {
        await this.delete(key);
      }
      return null;
    }
    return record;
  }

  /** Last value stored under `key`; expired ones only survive with `keepExpired`. */
  async peek(key: string): Promise<CacheRecord<T> | null> {
    return this.read(key);
  }

  async set(key: string, value: T): Promise<CacheRecord<T>> {
    this.evictExpired();

    const cachedAt = this.now();
    const record: CacheRecord<T> = {
      value,
      cachedAt,
      expiresAt: cachedAt + this.ttlMs
    };
    this.memory.set(key, record);

    if (this.redis && this.ttlMs > 0) {
      try {
        await this.redis.set(this.redisKey(key), JSON.stringify(record), this.ttlMs);
      } catch (err) {
        logWarn('redis_write_failed', { namespace: this.namespace, error: errorMessage(err) });
      }
    }

    return record;
  }

  async delete(key: string): Promise<void> {
    this.memory.delete(key);
    if (this.redis) {
      try {
        await this.redis.del(this.redisKey(key));
      } catch (err) {
        logWarn('redis_delete_failed', { namespace: this.namespace, error: errorMessage(err) });
      }
    }
  }

  private isExpired(record: CacheRecord<T>): boolean {
    return this.now() >= record.expiresAt;
  }

  // Redis drops its copies through PX, so only memory needs sweeping.
  private evictExpired(): void {
    if (this.keepExpired) return;
    for (const [key, record] of this.memory) {
      if (this.isExpired(record)) {
        this.memory.delete(key);
      }
    }
  }

  private async read(key: string): Promise<CacheRecord<T> | null> {
    if (this.redis) {
      try {
        const raw = await this.redis.get(this.redisKey(key));
        if (raw) {
          const parsed: CacheRecord<T> = JSON.parse(raw);
          this.memory.set(key, parsed);
          return parsed;
        }
      } catch (err) {
        logWarn('redis_read_failed', { namespace: this.namespace, error: errorMessage(err) });
      }
    }

    return this.memory.get(key) ?? null;
  }

  private redisKey(key: string): string {
    return `${this.namespace}:${key}`;
  }
}

/**
 * Connects to Redis when a URL is configured. Any connection failure leaves the
 * caches on their in-memory backend.
 */
export async function connectRedisStore(url: string | undefined): Promise<RedisStore | null> {
  if (!url) {
    return null;
  }

  const client = createClient({ url });
  client.on('error', (err: unknown) => {
    logWarn('redis_error', { error: errorMessage(err) });
  });

  try {
    await client.connect();
  } catch (err) {
    logWarn('redis_connect_failed', { error: errorMessage(err) });
    return null;
  }

  logInfo('redis_connected', { url });

  return {
    get: (key) => client.get(key),
    set: async (key, value, ttlMs) => {
      await client.set(key, value, { PX: ttlMs });
    },
    del: async (key) => {
      await client.del(key);
    }
  };
}
