/**
 * Supabase implementation of ICacheStore (distributed tier).
 * Rows live in `cache_entries`; expired rows are ignored on read and
 * overwritten by the next write to the same key. Every call is aborted after
 * `timeoutMs`.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { CacheHit, ICacheStore } from './ICacheStore.js';
import type { CacheEntryRow } from '../types/database.js';

const TABLE = 'cache_entries';
const DEFAULT_TIMEOUT_MS = 5_000;

export class SupabaseCacheStore implements ICacheStore {
  constructor(
    private readonly db: SupabaseClient,
    private readonly timeoutMs = DEFAULT_TIMEOUT_MS
  ) {}

  async get(key: string): Promise<CacheHit | null> {
    const { data, error } = await this.db
      .from(TABLE)
      .select('key, value, expires_at')
      .eq('key', key)
      .gt('expires_at', new Date().toISOString())
      .abortSignal(this.signal())
      .maybeSingle<Pick<CacheEntryRow, 'key' | 'value' | 'expires_at'>>();

    if (error) throw new Error(`Failed to read cache entry: ${error.message}`);
    if (!data) return null;

    return { value: data.value, expiresAt: Date.parse(data.expires_at) };
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    const now = Date.now();
    const row: CacheEntryRow = {
      key,
      value,
      expires_at: new Date(now + ttlSeconds * 1000).toISOString(),
      updated_at: new Date(now).toISOString(),
    };

    const { error } = await this.db
      .from(TABLE)
      .upsert(row, { onConflict: 'key' })
      .abortSignal(this.signal());
    if (error) throw new Error(`Failed to write cache entry: ${error.message}`);
  }

  async delete(key: string): Promise<void> {
    const { error } = await this.db
      .from(TABLE)
      .delete()
      .eq('key', key)
      .abortSignal(this.signal());
    if (error) throw new Error(`Failed to delete cache entry: ${error.message}`);
  }

  async deleteByPrefix(prefix: string): Promise<number> {
    const { count, error } = await this.db
      .from(TABLE)
      .delete({ count: 'exact' })
      .like('key', `${escapeLike(prefix)}%`)
      .abortSignal(this.signal());

    if (error) throw new Error(`Failed to clear cache prefix: ${error.message}`);
    return count ?? 0;
  }

  async size(): Promise<number> {
    const { count, error } = await this.db
      .from(TABLE)
      .select('*', { count: 'exact', head: true })
      .gt('expires_at', new Date().toISOString())
      .abortSignal(this.signal());

    if (error) throw new Error(`Failed to count cache entries: ${error.message}`);
    return count ?? 0;
  }

  private signal(): AbortSignal {
    return AbortSignal.timeout(this.timeoutMs);
  }
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (c) => `\\${c}`);
}
