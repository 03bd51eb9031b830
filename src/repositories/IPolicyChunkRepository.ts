/**
 * Policy chunk data access interface (the vector store).
 */

import type { PolicyChunkRow, ScoredPolicyChunkRow } from '../types/database.js';

export type NewPolicyChunk = Omit<PolicyChunkRow, 'id' | 'created_at' | 'embedding'> & {
  embedding: number[];
};

export interface IPolicyChunkRepository {
  /** Insert chunks in order. Returns the stored rows. */
  add(chunks: NewPolicyChunk[]): Promise<PolicyChunkRow[]>;

  /** The `k` most similar chunks, best first. */
  search(embedding: number[], k: number): Promise<ScoredPolicyChunkRow[]>;
}
