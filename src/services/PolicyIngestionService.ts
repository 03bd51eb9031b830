/**
 * Policy text ingestion.
 * Screens the text for fraud, splits it into chunks, embeds them in one
 * batch, tags each chunk with its clause type and adds them to the store.
 */

import { ValidationError } from '../errors.js';
import type { IEmbeddingProvider } from '../providers/IEmbeddingProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ITextClassifier } from '../providers/ITextClassifier.js';
import type { IPolicyChunkRepository } from '../repositories/IPolicyChunkRepository.js';
import type { IngestionResult } from '../types/models.js';
import type { FraudEnsembleService } from './FraudEnsembleService.js';
import { chunkText } from '../utils/chunking.js';
import { errorMessage, settle } from '../utils/outcome.js';

export const MIN_POLICY_TEXT_LENGTH = 50;
export const CHUNK_TOKENS = 500;
export const DEFAULT_CLAUSE_LABEL = 'GENERAL';
export const LABEL_CONCURRENCY = 8;

export const CLAUSE_LABELS: readonly string[] = [
  'COVERAGE',
  'EXCLUSION',
  'CONDITION',
  'DEFINITION',
  'LIMIT',
  'PREMIUM',
  'CLAIMS_PROCEDURE',
  DEFAULT_CLAUSE_LABEL,
];

export class PolicyIngestionService {
  constructor(
    private readonly fraudService: FraudEnsembleService,
    private readonly embeddingProvider: IEmbeddingProvider,
    private readonly clauseClassifier: ITextClassifier | null,
    private readonly chunkRepo: IPolicyChunkRepository,
    private readonly logger: ILogProvider
  ) {}

  async ingest(input: { source: string; text: string }): Promise<IngestionResult> {
    const source = input.source.trim();
    const text = input.text.trim();

    if (!source) {
      throw new ValidationError('source is required');
    }
    if (text.length < MIN_POLICY_TEXT_LENGTH) {
      throw new ValidationError(
        `Policy text must be at least ${MIN_POLICY_TEXT_LENGTH} characters`,
        { length: text.length }
      );
    }

    const fraud = await this.fraudService.assess(text);
    if (fraud.isSuspicious) {
      this.logger.warn('Policy document flagged, not indexed', {
        source,
        fraudScore: fraud.fraudScore,
      });
      return { status: 'flagged', source, fraud };
    }

    const chunks = chunkText(text, CHUNK_TOKENS);
    const [embeddings, labels] = await Promise.all([
      this.embeddingProvider.generateBatch(chunks),
      this.labelAll(chunks),
    ]);

    if (embeddings.length !== chunks.length) {
      throw new Error(`Expected ${chunks.length} embeddings, got ${embeddings.length}`);
    }

    await this.chunkRepo.add(
      chunks.map((content, i) => ({
        content,
        label: labels[i] ?? DEFAULT_CLAUSE_LABEL,
        source,
        chunk_index: i,
        embedding: embeddings[i] ?? [],
      }))
    );

    this.logger.info('Policy document indexed', { source, chunks: chunks.length });
    return { status: 'indexed', source, chunks: chunks.length };
  }

  /** Labels chunks in slices of LABEL_CONCURRENCY to bound in-flight classifier calls. */
  private async labelAll(chunks: readonly string[]): Promise<string[]> {
    const labels: string[] = [];
    for (let start = 0; start < chunks.length; start += LABEL_CONCURRENCY) {
      const slice = chunks.slice(start, start + LABEL_CONCURRENCY);
      labels.push(...(await Promise.all(slice.map((chunk) => this.label(chunk)))));
    }
    return labels;
  }

  private async label(chunk: string): Promise<string> {
    if (!this.clauseClassifier) return DEFAULT_CLAUSE_LABEL;

    const outcome = await settle(this.clauseClassifier.classify(chunk));
    if (outcome.ok) return outcome.value.label;

    this.logger.debug('Clause classification failed', { error: errorMessage(outcome.error) });
    return DEFAULT_CLAUSE_LABEL;
  }
}
