/**
 * Phrase and heuristic fraud signals.
 * Each matched pattern adds 0.15; brevity, excess exclamation marks and a
 * pile of dates add smaller amounts. The score is capped at 1.
 */

import type { DetectionResult } from '../types/models.js';
import type { ISignalDetector } from './ISignalDetector.js';

const PATTERN_WEIGHT = 0.15;

const FRAUD_PATTERNS: Array<{ pattern: RegExp; label: string }> = [
  {
    pattern: /\b(fake|forged|counterfeit|fabricated)\b/i,
    label: 'fabrication language',
  },
  {
    pattern: /\b(urgent|immediately|asap|right now)\b.*\b(claim|payment)\b/i,
    label: 'urgency around claim or payment',
  },
  {
    pattern: /\b(multiple|several|many)\b.*\b(claims|accidents|incidents)\b/i,
    label: 'multiple claims or incidents',
  },
  {
    pattern: /\$\d{4,}.*\b(cash|payment|reimburse)\b/i,
    label: 'large amount tied to cash or payment',
  },
  {
    pattern: /\b(pre-existing|prior|previous)\b.*\b(condition|injury|damage)\b/i,
    label: 'prior condition, injury or damage',
  },
  {
    pattern: /\b(witness|proof|evidence)\b.*\b(unavailable|lost|missing)\b/i,
    label: 'missing witness or evidence',
  },
];

const DATE_LIKE = /\d{1,2}[/-]\d{1,2}[/-]\d{2,4}/g;

export class PatternDetector implements ISignalDetector {
  readonly name = 'pattern' as const;

  async detect(text: string): Promise<DetectionResult> {
    let score = 0;
    const indicators: string[] = [];

    for (const { pattern, label } of FRAUD_PATTERNS) {
      if (pattern.test(text)) {
        score += PATTERN_WEIGHT;
        indicators.push(`Pattern match: ${label}`);
      }
    }

    const words = text.split(/\s+/).filter((w) => w.length > 0);
    if (words.length < 20) {
      score += 0.1;
      indicators.push('Unusually brief description');
    }

    if ((text.match(/!/g) ?? []).length > 3) {
      score += 0.05;
      indicators.push('Excessive urgency markers');
    }

    if ((text.match(DATE_LIKE) ?? []).length > 5) {
      score += 0.1;
      indicators.push('Multiple conflicting dates');
    }

    return { score: Math.min(score, 1), indicators };
  }
}
