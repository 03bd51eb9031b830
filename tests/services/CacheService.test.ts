import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { CacheService } from '../../src/services/CacheService.js';
import { InMemoryCacheStore } from '../../src/stores/InMemoryCacheStore.js';
import type { CacheHit, ICacheStore } from '../../src/stores/ICacheStore.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';

const scoreSchema = z.object({ score: z.number() });

class BrokenStore implements ICacheStore {
  async get(): Promise<CacheHit | null> {
    throw new Error('connection refused');
  }
  async set(): Promise<void> {
    throw new Error('connection refused');
  }
  async delete(): Promise<void> {
    throw new Error('connection refused');
  }
  async deleteByPrefix(): Promise<number> {
    throw new Error('connection refused');
  }
  async size(): Promise<number> {
    return 0;
  }
}

describe('CacheService', () => {
  let clock: number;
  let logger: ConsoleLogProvider;
  let memory: InMemoryCacheStore;

  beforeEach(() => {
    clock = 5_000_000;
    logger = new ConsoleLogProvider();
    memory = new InMemoryCacheStore(10, () => clock);
  });

  function service(secondary: ICacheStore | null = null): CacheService {
    return new CacheService(memory, secondary, logger, 3600, () => clock);
  }

  it('should round-trip a value within its namespace', async () => {
    const cache = service();
    await cache.set('fraud', 'abc', { score: 0.4 });

    expect(await cache.get('fraud', 'abc', scoreSchema)).toEqual({ score: 0.4 });
    expect(await cache.get('other', 'abc', scoreSchema)).toBeNull();
  });

  it('should apply the default TTL', async () => {
    const cache = service();
    await cache.set('fraud', 'abc', { score: 0.4 });

    clock += 3_599_000;
    expect(await cache.get('fraud', 'abc', scoreSchema)).not.toBeNull();
    clock += 1_000;
    expect(await cache.get('fraud', 'abc', scoreSchema)).toBeNull();
  });

  it('should drop entries that fail the schema', async () => {
    const cache = service();
    await cache.set('fraud', 'abc', { score: 'high' });

    expect(await cache.get('fraud', 'abc', scoreSchema)).toBeNull();
    expect(await memory.get('fraud:abc')).toBeNull();
    expect(logger.events.map((e) => e.message)).toContain('Discarding cache entry with unexpected shape');
  });

  it('should backfill memory from the distributed tier for the remaining TTL', async () => {
    const secondary = new InMemoryCacheStore(10, () => clock);
    await secondary.set('fraud:abc', { score: 0.9 }, 100);
    clock += 40_000;

    const cache = service(secondary);
    expect(await cache.get('fraud', 'abc', scoreSchema)).toEqual({ score: 0.9 });
    expect(await memory.get('fraud:abc')).toEqual({
      value: { score: 0.9 },
      expiresAt: clock + 60_000,
    });
  });

  it('should write through to the distributed tier', async () => {
    const secondary = new InMemoryCacheStore(10, () => clock);
    const cache = service(secondary);
    await cache.set('fraud', 'abc', { score: 0.1 }, 30);

    expect(await secondary.get('fraud:abc')).toEqual({
      value: { score: 0.1 },
      expiresAt: clock + 30_000,
    });
  });

  it('should keep working when the distributed tier fails', async () => {
    const cache = service(new BrokenStore());

    await expect(cache.set('fraud', 'abc', { score: 0.2 })).resolves.toBeUndefined();
    expect(await cache.get('fraud', 'abc', scoreSchema)).toEqual({ score: 0.2 });
    expect(await cache.get('fraud', 'missing', scoreSchema)).toBeNull();

    const warnings = logger.events.filter((e) => e.level === 'warn').map((e) => e.message);
    expect(warnings).toEqual(['Distributed cache write failed', 'Distributed cache read failed']);
  });

  it('should clear a namespace and leave the rest', async () => {
    const cache = service();
    await cache.set('fraud', 'a', { score: 1 });
    await cache.set('fraud', 'b', { score: 2 });
    await cache.set('risk', 'a', { score: 3 });

    expect(await cache.clearNamespace('fraud')).toBe(2);
    expect(await cache.get('risk', 'a', scoreSchema)).toEqual({ score: 3 });
  });

  it('should report occupancy', async () => {
    const cache = service();
    await cache.set('fraud', 'a', { score: 1 });

    expect(await cache.stats()).toEqual({
      memoryEntries: 1,
      memoryMaxEntries: 10,
      secondaryEnabled: false,
    });
  });
});
