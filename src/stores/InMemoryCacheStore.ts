/**
 * Bounded in-process TTL store.
 * Map insertion order doubles as age order: when full, expired entries are
 * swept first and then the oldest live entry is evicted.
 */

import type { CacheHit, ICacheStore } from './ICacheStore.js';

export class InMemoryCacheStore implements ICacheStore {
  private entries = new Map<string, CacheHit>();

  constructor(
    readonly maxEntries = 1000,
    private readonly now: () => number = Date.now
  ) {
    if (maxEntries < 1) {
      throw new Error('maxEntries must be at least 1');
    }
  }

  async get(key: string): Promise<CacheHit | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    // Re-inserting moves the key to the young end
    this.entries.delete(key);

    if (this.entries.size >= this.maxEntries) {
      this.sweepExpired();
    }
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }

    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async deleteByPrefix(prefix: string): Promise<number> {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  async size(): Promise<number> {
    this.sweepExpired();
    return this.entries.size;
  }

  private sweepExpired(): void {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(key);
    }
  }
}
