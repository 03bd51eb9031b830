/**
 * Supabase implementation of IPolicyChunkRepository.
 * Uses pgvector for semantic similarity search. Every call is aborted after
 * `timeoutMs`.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { IPolicyChunkRepository, NewPolicyChunk } from './IPolicyChunkRepository.js';
import type { PolicyChunkRow, ScoredPolicyChunkRow } from '../types/database.js';

const DEFAULT_TIMEOUT_MS = 10_000;

const chunkFields = {
  id: z.string(),
  content: z.string(),
  label: z.string(),
  source: z.string(),
  chunk_index: z.number().int(),
  created_at: z.string(),
};

const policyChunkRows: z.ZodType<PolicyChunkRow[]> = z.array(
  z.object({ ...chunkFields, embedding: z.string() })
);

const scoredPolicyChunkRows: z.ZodType<ScoredPolicyChunkRow[]> = z.array(
  z.object({ ...chunkFields, similarity: z.number() })
);

export class SupabasePolicyChunkRepository implements IPolicyChunkRepository {
  constructor(
    private readonly db: SupabaseClient,
    private readonly timeoutMs = DEFAULT_TIMEOUT_MS
  ) {}

  async add(chunks: NewPolicyChunk[]): Promise<PolicyChunkRow[]> {
    if (chunks.length === 0) return [];

    const { data, error } = await this.db
      .from('policy_chunks')
      .insert(
        chunks.map((chunk) => ({
          content: chunk.content,
          label: chunk.label,
          source: chunk.source,
          chunk_index: chunk.chunk_index,
          embedding: JSON.stringify(chunk.embedding),
        }))
      )
      .select()
      .abortSignal(AbortSignal.timeout(this.timeoutMs));

    if (error) throw new Error(`Failed to insert policy chunks: ${error.message}`);
    return parseRows(policyChunkRows, data, 'inserted policy chunks');
  }

  /**
   * Vector similarity search using pgvector.
   * Calls a Supabase RPC function that handles the cosine similarity query.
   */
  async search(embedding: number[], k: number): Promise<ScoredPolicyChunkRow[]> {
    const { data, error } = await this.db
      .rpc('match_policy_chunks', {
        query_embedding: JSON.stringify(embedding),
        match_count: k,
      })
      .abortSignal(AbortSignal.timeout(this.timeoutMs));

    if (error) throw new Error(`Failed to search policy chunks: ${error.message}`);
    return parseRows(scoredPolicyChunkRows, data, 'policy chunk matches');
  }
}

function parseRows<T>(schema: z.ZodType<T[]>, data: unknown, what: string): T[] {
  if (data === null || data === undefined) return [];
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new Error(`Unexpected shape for ${what}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  return parsed.data;
}
