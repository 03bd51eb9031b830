/**
 * A single fraud signal.
 * Detectors may reject; the ensemble isolates each one's failure.
 */

import type { DetectionResult, DetectorName, FraudMetadata } from '../types/models.js';

export interface ISignalDetector {
  readonly name: DetectorName;
  detect(text: string, metadata?: FraudMetadata): Promise<DetectionResult>;
}
