/**
 * Key/value store with per-entry expiry.
 * Values must be JSON-serializable; the distributed tier stores them as JSON.
 */

export interface CacheHit {
  value: unknown;
  /** Epoch milliseconds after which the entry is dead. */
  expiresAt: number;
}

export interface ICacheStore {
  get(key: string): Promise<CacheHit | null>;
  set(key: string, value: unknown, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
  /** Remove every key that starts with `prefix`. Returns the number removed. */
  deleteByPrefix(prefix: string): Promise<number>;
  /** Live entry count. */
  size(): Promise<number>;
}
