/**
 * Detector with a scripted score, a scripted failure, or no answer at all.
 */

import type { ISignalDetector } from '../../src/detectors/ISignalDetector.js';
import type { DetectionResult, DetectorName } from '../../src/types/models.js';

export class StubDetector implements ISignalDetector {
  calls = 0;

  constructor(
    readonly name: DetectorName,
    private result: number | Error | 'hang',
    private readonly indicators: string[] = []
  ) {}

  set(result: number | Error | 'hang'): void {
    this.result = result;
  }

  async detect(): Promise<DetectionResult> {
    this.calls++;
    if (this.result === 'hang') return new Promise<DetectionResult>(() => {});
    if (this.result instanceof Error) throw this.result;
    return { score: this.result, indicators: this.indicators };
  }
}
