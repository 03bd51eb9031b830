/**
 * Learned fraud signal from a text classifier.
 * Only the first 512 characters are classified.
 */

import type { ITextClassifier } from '../providers/ITextClassifier.js';
import type { DetectionResult } from '../types/models.js';
import type { ISignalDetector } from './ISignalDetector.js';

const MAX_INPUT_CHARS = 512;
export const FRAUD_LABELS: readonly string[] = ['FRAUD', 'LABEL_1', 'POSITIVE'];

export class ModelDetector implements ISignalDetector {
  readonly name = 'model' as const;

  constructor(private readonly classifier: ITextClassifier) {}

  async detect(text: string): Promise<DetectionResult> {
    const { label, score } = await this.classifier.classify(text.slice(0, MAX_INPUT_CHARS));

    if (FRAUD_LABELS.includes(label.toUpperCase())) {
      return {
        score,
        indicators: [`ML detected fraud signals (confidence: ${score.toFixed(2)})`],
      };
    }
    return { score: 1 - score, indicators: [] };
  }
}
