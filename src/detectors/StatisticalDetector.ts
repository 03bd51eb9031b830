/**
 * Threshold-based anomaly signals over text shape and claim metadata.
 */

import type { DetectionResult, FraudMetadata } from '../types/models.js';
import type { ISignalDetector } from './ISignalDetector.js';

const LONG_WORD_MEAN = 10;
const HIGH_CLAIM_AMOUNT = 50_000;

export class StatisticalDetector implements ISignalDetector {
  readonly name = 'statistical' as const;

  async detect(text: string, metadata?: FraudMetadata): Promise<DetectionResult> {
    let score = 0;
    const indicators: string[] = [];

    const words = text.split(/\s+/).filter((w) => w.length > 0);
    if (words.length > 0) {
      const meanLength = words.reduce((sum, w) => sum + w.length, 0) / words.length;
      if (meanLength > LONG_WORD_MEAN) {
        score += 0.1;
        indicators.push('Unusually complex language');
      }
    }

    if ((metadata?.claimAmount ?? 0) > HIGH_CLAIM_AMOUNT) {
      score += 0.15;
      indicators.push('High claim amount');
    }

    return { score: Math.min(score, 1), indicators };
  }
}
