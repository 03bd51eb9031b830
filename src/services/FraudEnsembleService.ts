/**
 * Fraud ensemble.
 * Runs every signal detector concurrently, drops the ones that fail, and
 * fuses the rest into one weighted score with an agreement-based confidence.
 * Results are cached by input fingerprint. `assess` never rejects: when no
 * detector succeeds it returns a degraded assessment that asks for manual
 * review.
 */

import { z } from 'zod';
import type { ISignalDetector } from '../detectors/ISignalDetector.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type {
  DetectionResult,
  DetectorName,
  FraudAssessment,
  FraudMetadata,
  FraudRiskLevel,
} from '../types/models.js';
import type { CacheService } from './CacheService.js';
import { fingerprint } from '../utils/fingerprint.js';
import { clamp, round, variance } from '../utils/math.js';
import { errorMessage, settle } from '../utils/outcome.js';
import { withTimeout } from '../utils/retry.js';

export const DETECTOR_ORDER: readonly DetectorName[] = [
  'pattern',
  'model',
  'sentiment',
  'statistical',
];

export const DETECTOR_WEIGHTS: Readonly<Record<DetectorName, number>> = {
  pattern: 0.2,
  model: 0.4,
  sentiment: 0.2,
  statistical: 0.2,
};

export const DEGRADED_INDICATOR = 'System error: fraud detection unavailable';
const CACHE_NAMESPACE = 'fraud';
const DETECTOR_TIMEOUT_MS = 15_000;

export interface FraudEnsembleOptions {
  /** Scores strictly above this are suspicious. Default: 0.75. */
  threshold?: number;
  cacheTtlSeconds?: number;
}

export interface FraudBatchItem {
  text: string;
  metadata?: FraudMetadata;
}

const detectorScore = z.number().min(0).max(1).nullable();

export const fraudAssessmentSchema: z.ZodType<FraudAssessment> = z.object({
  fraudScore: z.number().min(0).max(1),
  isSuspicious: z.boolean(),
  confidence: z.number().min(0).max(1),
  indicators: z.array(z.string()),
  riskLevel: z.enum(['MINIMAL', 'LOW', 'MEDIUM', 'HIGH', 'CRITICAL', 'UNKNOWN']),
  recommendation: z.string(),
  detectionMethods: z.object({
    pattern: detectorScore,
    model: detectorScore,
    sentiment: detectorScore,
    statistical: detectorScore,
  }),
  degraded: z.boolean(),
  timestamp: z.string(),
});

interface Band {
  min: number;
  level: FraudRiskLevel;
  recommendation: string;
}

const BANDS: readonly Band[] = [
  {
    min: 0.85,
    level: 'CRITICAL',
    recommendation: 'REJECT - High fraud probability. Escalate to fraud investigation unit.',
  },
  {
    min: 0.75,
    level: 'HIGH',
    recommendation: 'FLAG - Suspicious activity detected. Mandatory manual review required.',
  },
  {
    min: 0.5,
    level: 'MEDIUM',
    recommendation: 'REVIEW - Some fraud indicators present. Recommend additional verification.',
  },
  {
    min: 0.3,
    level: 'LOW',
    recommendation: 'PROCEED - Low risk, but monitor for patterns.',
  },
];

const MINIMAL_BAND: Band = {
  min: 0,
  level: 'MINIMAL',
  recommendation: 'APPROVE - No significant fraud indicators detected.',
};

export function riskBand(score: number): Band {
  return BANDS.find((band) => score >= band.min) ?? MINIMAL_BAND;
}

/** 1 − min(2·variance, 0.5); fewer than two scores carry no agreement signal. */
export function agreementConfidence(scores: number[]): number {
  if (scores.length < 2) return 0.5;
  return round(1 - Math.min(variance(scores) * 2, 0.5), 3);
}

export class FraudEnsembleService {
  private readonly detectors: ISignalDetector[];
  private readonly threshold: number;
  private readonly cacheTtlSeconds: number;

  constructor(
    detectors: ISignalDetector[],
    private readonly cache: CacheService,
    private readonly logger: ILogProvider,
    options: FraudEnsembleOptions = {},
    private readonly now: () => Date = () => new Date()
  ) {
    const names = new Set(detectors.map((d) => d.name));
    if (names.size !== detectors.length) {
      throw new Error('Each detector name may only be registered once');
    }
    this.detectors = [...detectors].sort(
      (a, b) => DETECTOR_ORDER.indexOf(a.name) - DETECTOR_ORDER.indexOf(b.name)
    );
    this.threshold = options.threshold ?? 0.75;
    this.cacheTtlSeconds = options.cacheTtlSeconds ?? 3600;
  }

  async assess(text: string, metadata?: FraudMetadata): Promise<FraudAssessment> {
    try {
      return await this.evaluate(text, metadata);
    } catch (err) {
      this.logger.error('Fraud assessment failed', { error: errorMessage(err) });
      return this.degraded();
    }
  }

  /** Assess each item concurrently; results keep the input order. */
  assessBatch(items: FraudBatchItem[]): Promise<FraudAssessment[]> {
    return Promise.all(items.map((item) => this.assess(item.text, item.metadata)));
  }

  private async evaluate(text: string, metadata?: FraudMetadata): Promise<FraudAssessment> {
    const key = fingerprint(text, scoringInputs(metadata));

    const cached = await this.cache.get(CACHE_NAMESPACE, key, fraudAssessmentSchema);
    if (cached) return cached;

    const outcomes = await Promise.all(
      this.detectors.map(async (detector) => ({
        name: detector.name,
        outcome: await settle(
          withTimeout(
            // A detector that throws before returning a promise still settles
            Promise.resolve().then(() => detector.detect(text, metadata)),
            DETECTOR_TIMEOUT_MS,
            `${detector.name} detector`
          )
        ),
      }))
    );

    const used: Array<{ name: DetectorName; result: DetectionResult }> = [];
    for (const { name, outcome } of outcomes) {
      if (!outcome.ok) {
        this.logger.warn('Fraud detector failed', { detector: name, error: errorMessage(outcome.error) });
        continue;
      }
      if (!Number.isFinite(outcome.value.score)) {
        this.logger.warn('Fraud detector returned a non-numeric score', { detector: name });
        continue;
      }
      used.push({
        name,
        result: { ...outcome.value, score: clamp(outcome.value.score, 0, 1) },
      });
    }

    if (used.length === 0) {
      return this.degraded();
    }

    const totalWeight = used.reduce((sum, u) => sum + DETECTOR_WEIGHTS[u.name], 0);
    const weighted = used.reduce((sum, u) => sum + u.result.score * DETECTOR_WEIGHTS[u.name], 0);
    const fraudScore = round(weighted / totalWeight, 3);
    const band = riskBand(fraudScore);

    const detectionMethods: Record<DetectorName, number | null> = {
      pattern: null,
      model: null,
      sentiment: null,
      statistical: null,
    };
    for (const u of used) detectionMethods[u.name] = u.result.score;

    const assessment: FraudAssessment = {
      fraudScore,
      isSuspicious: fraudScore > this.threshold,
      confidence: agreementConfidence(used.map((u) => u.result.score)),
      indicators: [...new Set(used.flatMap((u) => u.result.indicators))],
      riskLevel: band.level,
      recommendation: band.recommendation,
      detectionMethods,
      degraded: false,
      timestamp: this.now().toISOString(),
    };

    // Partial results are not cached so a recovered detector is picked up
    const complete = DETECTOR_ORDER.every((name) => detectionMethods[name] !== null);
    if (complete) {
      await this.cache.set(CACHE_NAMESPACE, key, assessment, this.cacheTtlSeconds);
    }

    return assessment;
  }

  private degraded(): FraudAssessment {
    return {
      fraudScore: 0.5,
      isSuspicious: false,
      confidence: 0,
      indicators: [DEGRADED_INDICATOR],
      riskLevel: 'UNKNOWN',
      recommendation: 'Manual review required due to system error',
      detectionMethods: {
        pattern: null,
        model: null,
        sentiment: null,
        statistical: null,
      },
      degraded: true,
      timestamp: this.now().toISOString(),
    };
  }
}

function scoringInputs(metadata?: FraudMetadata): Record<string, unknown> | undefined {
  if (!metadata) return undefined;
  return {
    claimAmount: metadata.claimAmount,
    previousClaims: metadata.previousClaims,
  };
}
