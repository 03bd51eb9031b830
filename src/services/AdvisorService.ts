/**
 * Policy Q&A grounded in retrieved policy context.
 */

import type { IGenerationProvider } from '../providers/IGenerationProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { AskResponse } from '../types/api.js';
import type { RetrievalService } from './RetrievalService.js';
import { UpstreamError, ValidationError } from '../errors.js';
import { advisorPrompt } from '../claims/prompts.js';
import { errorMessage } from '../utils/outcome.js';

export class AdvisorService {
  constructor(
    private readonly retrieval: RetrievalService,
    private readonly generation: IGenerationProvider,
    private readonly logger: ILogProvider,
    private readonly retrievalK = 5
  ) {}

  async ask(question: string): Promise<AskResponse> {
    const trimmed = question.trim();
    if (!trimmed) throw new ValidationError('question cannot be empty');

    const retrieved = await this.retrieval.tryRetrieveContext(trimmed, this.retrievalK);

    try {
      const answer = await this.generation.generate(advisorPrompt(retrieved.context, trimmed));
      return { answer, contextAvailable: retrieved.available };
    } catch (err) {
      this.logger.error('Advisor generation failed', { error: errorMessage(err) });
      throw new UpstreamError('Advisor service is unavailable', { cause: errorMessage(err) });
    }
  }
}
