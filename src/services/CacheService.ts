/**
 * Two-tier cache.
 * Reads hit the in-process store first, then the optional distributed tier
 * (backfilling memory on a hit). Writes go to both. Distributed-tier failures
 * are logged and never fail the caller; the cache is an optimisation only.
 */

import type { ZodType } from 'zod';
import type { ICacheStore } from '../stores/ICacheStore.js';
import type { InMemoryCacheStore } from '../stores/InMemoryCacheStore.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { HealthResponse } from '../types/api.js';
import { errorMessage } from '../utils/outcome.js';

export type CacheStats = HealthResponse['cache'];

export class CacheService {
  constructor(
    private readonly memory: InMemoryCacheStore,
    private readonly secondary: ICacheStore | null,
    private readonly logger: ILogProvider,
    private readonly defaultTtlSeconds = 3600,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Cached value for `namespace:key`, or null on a miss.
   * A value that no longer matches `schema` is dropped and treated as a miss.
   */
  async get<T>(namespace: string, key: string, schema: ZodType<T>): Promise<T | null> {
    const cacheKey = toKey(namespace, key);

    const hot = await this.memory.get(cacheKey);
    if (hot) {
      return this.validate(cacheKey, hot.value, schema);
    }

    if (!this.secondary) return null;

    try {
      const hit = await this.secondary.get(cacheKey);
      if (!hit) return null;

      const value = await this.validate(cacheKey, hit.value, schema);
      if (value !== null) {
        const remaining = Math.ceil((hit.expiresAt - this.now()) / 1000);
        if (remaining > 0) await this.memory.set(cacheKey, value, remaining);
      }
      return value;
    } catch (err) {
      this.logger.warn('Distributed cache read failed', {
        key: cacheKey,
        error: errorMessage(err),
      });
      return null;
    }
  }

  async set(namespace: string, key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    const cacheKey = toKey(namespace, key);
    const ttl = ttlSeconds ?? this.defaultTtlSeconds;

    await this.memory.set(cacheKey, value, ttl);

    if (!this.secondary) return;
    try {
      await this.secondary.set(cacheKey, value, ttl);
    } catch (err) {
      this.logger.warn('Distributed cache write failed', {
        key: cacheKey,
        error: errorMessage(err),
      });
    }
  }

  async delete(namespace: string, key: string): Promise<void> {
    const cacheKey = toKey(namespace, key);
    await this.memory.delete(cacheKey);

    if (!this.secondary) return;
    try {
      await this.secondary.delete(cacheKey);
    } catch (err) {
      this.logger.warn('Distributed cache delete failed', {
        key: cacheKey,
        error: errorMessage(err),
      });
    }
  }

  /** Drop every entry in `namespace`. Returns the number removed from memory. */
  async clearNamespace(namespace: string): Promise<number> {
    const removed = await this.memory.deleteByPrefix(`${namespace}:`);

    if (this.secondary) {
      try {
        await this.secondary.deleteByPrefix(`${namespace}:`);
      } catch (err) {
        this.logger.warn('Distributed cache clear failed', {
          namespace,
          error: errorMessage(err),
        });
      }
    }

    this.logger.info('Cleared cache namespace', { namespace, removed });
    return removed;
  }

  async stats(): Promise<CacheStats> {
    return {
      memoryEntries: await this.memory.size(),
      memoryMaxEntries: this.memory.maxEntries,
      secondaryEnabled: this.secondary !== null,
    };
  }

  private async validate<T>(cacheKey: string, value: unknown, schema: ZodType<T>): Promise<T | null> {
    const parsed = schema.safeParse(value);
    if (parsed.success) return parsed.data;

    this.logger.warn('Discarding cache entry with unexpected shape', { key: cacheKey });
    await this.memory.delete(cacheKey);
    return null;
  }
}

function toKey(namespace: string, key: string): string {
  return `${namespace}:${key}`;
}
