/**
 * Database row types. These mirror the Supabase table schemas.
 * Column names use snake_case to match PostgreSQL conventions.
 */

export interface PolicyChunkRow {
  id: string;
  content: string;
  label: string;
  source: string;
  chunk_index: number;
  embedding: string; // pgvector serialized
  created_at: string;
}

export interface ScoredPolicyChunkRow extends Omit<PolicyChunkRow, 'embedding'> {
  similarity: number;
}

export interface CacheEntryRow {
  key: string;
  value: unknown;
  expires_at: string;
  updated_at: string;
}
