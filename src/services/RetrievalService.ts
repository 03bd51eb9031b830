/**
 * Policy context retrieval.
 * Embeds a query, searches the policy store and joins the hits into one
 * context block. Retrieval is best effort: callers get `available: false`
 * instead of an error when the store or the embedding call fails.
 */

import type { IEmbeddingProvider } from '../providers/IEmbeddingProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IPolicyChunkRepository } from '../repositories/IPolicyChunkRepository.js';
import type { ScoredPolicyChunkRow } from '../types/database.js';
import { errorMessage } from '../utils/outcome.js';

export interface RetrievedContext {
  context: string;
  available: boolean;
  /** Distinct sources the context was drawn from, in rank order. */
  sources: string[];
}

const EMPTY: RetrievedContext = { context: '', available: false, sources: [] };

export class RetrievalService {
  constructor(
    private readonly chunkRepo: IPolicyChunkRepository,
    private readonly embeddingProvider: IEmbeddingProvider,
    private readonly logger: ILogProvider
  ) {}

  async retrieve(query: string, k: number): Promise<ScoredPolicyChunkRow[]> {
    const embedding = await this.embeddingProvider.generate(query);
    return this.chunkRepo.search(embedding, k);
  }

  async tryRetrieveContext(query: string, k: number): Promise<RetrievedContext> {
    try {
      const hits = await this.retrieve(query, k);
      const context = hits
        .map((hit) => hit.content.trim())
        .filter((content) => content.length > 0)
        .join('\n\n');

      if (!context) return EMPTY;
      return {
        context,
        available: true,
        sources: [...new Set(hits.map((hit) => hit.source))],
      };
    } catch (err) {
      this.logger.warn('Policy context retrieval failed', { error: errorMessage(err) });
      return EMPTY;
    }
  }
}
