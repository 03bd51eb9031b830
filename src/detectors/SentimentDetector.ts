/**
 * Emotional-manipulation signal: only near-certain sentiment counts.
 */

import type { ITextClassifier } from '../providers/ITextClassifier.js';
import type { DetectionResult } from '../types/models.js';
import type { ISignalDetector } from './ISignalDetector.js';

const MAX_INPUT_CHARS = 512;
const EXTREME = 0.95;

export class SentimentDetector implements ISignalDetector {
  readonly name = 'sentiment' as const;

  constructor(private readonly classifier: ITextClassifier) {}

  async detect(text: string): Promise<DetectionResult> {
    const { label, score } = await this.classifier.classify(text.slice(0, MAX_INPUT_CHARS));
    const normalized = label.toUpperCase();

    if (normalized === 'NEGATIVE' && score > EXTREME) {
      return {
        score: 0.3,
        indicators: ['Extremely negative sentiment (possible manipulation)'],
      };
    }
    if (normalized === 'POSITIVE' && score > EXTREME) {
      return { score: 0.2, indicators: ['Unusually positive sentiment'] };
    }
    return { score: 0, indicators: [] };
  }
}
