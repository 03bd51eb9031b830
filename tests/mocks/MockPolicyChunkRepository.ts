/**
 * In-memory policy chunk store, ranked by cosine similarity.
 */

import { randomUUID } from 'node:crypto';
import type {
  IPolicyChunkRepository,
  NewPolicyChunk,
} from '../../src/repositories/IPolicyChunkRepository.js';
import type { PolicyChunkRow, ScoredPolicyChunkRow } from '../../src/types/database.js';

interface StoredChunk {
  row: PolicyChunkRow;
  vector: number[];
}

export class MockPolicyChunkRepository implements IPolicyChunkRepository {
  private chunks: StoredChunk[] = [];
  /** When set, search rejects with this error. */
  searchError: Error | null = null;

  async add(chunks: NewPolicyChunk[]): Promise<PolicyChunkRow[]> {
    const rows = chunks.map((chunk) => {
      const row: PolicyChunkRow = {
        id: randomUUID(),
        content: chunk.content,
        label: chunk.label,
        source: chunk.source,
        chunk_index: chunk.chunk_index,
        embedding: JSON.stringify(chunk.embedding),
        created_at: new Date().toISOString(),
      };
      this.chunks.push({ row, vector: chunk.embedding });
      return row;
    });
    return rows;
  }

  async search(embedding: number[], k: number): Promise<ScoredPolicyChunkRow[]> {
    if (this.searchError) throw this.searchError;

    return this.chunks
      .map(({ row, vector }) => {
        const { embedding: _embedding, ...rest } = row;
        return { ...rest, similarity: cosine(embedding, vector) };
      })
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, k);
  }

  // ── Test Helpers ──

  get all(): PolicyChunkRow[] {
    return this.chunks.map((c) => c.row);
  }

  clear(): void {
    this.chunks = [];
  }
}

function cosine(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
