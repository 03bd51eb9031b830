/**
 * Underwriting risk aggregation.
 * Parses the applicant, computes the risk components concurrently (each
 * falling back to a neutral default on failure), screens for fraud, and maps
 * the combined score to a decision, a premium and advice. With
 * explainability on, adds a narrative assessment and what-if scenarios.
 */

import type { UnderwritingThresholds } from '../config.js';
import type { IGenerationProvider } from '../providers/IGenerationProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ITextClassifier } from '../providers/ITextClassifier.js';
import type {
  ApplicantProfile,
  FraudAssessment,
  FraudRejectedRiskAssessment,
  RiskAssessment,
  ScenarioAnalysis,
  ScenarioOutcome,
  ScoredRiskAssessment,
  WhatIfComparison,
} from '../types/models.js';
import type { FraudEnsembleService } from './FraudEnsembleService.js';
import type { RetrievalService } from './RetrievalService.js';
import { parseApplicantProfile, type ApplicantInput } from '../underwriting/profile.js';
import {
  BASE_SCORE,
  DEFAULT_COVERAGE,
  aggregateRiskScore,
  baseRiskScore,
  calculatePremium,
  checkCompliance,
  externalAdjustment,
  financialAdjustment,
  financialProfileText,
  recommendations,
  underwritingDecision,
  type BaseRisk,
  type RiskComponent,
} from '../underwriting/rules.js';
import {
  UNAVAILABLE_ASSESSMENT,
  detailedAssessmentPrompt,
  guidelineQuery,
} from '../underwriting/prompts.js';
import { round } from '../utils/math.js';
import { errorMessage, settle, type Outcome } from '../utils/outcome.js';

const GUIDELINE_K = 3;
const TARGET_CREDIT_SCORE = 750;
const NEUTRAL: RiskComponent = { adjustment: 0, factors: [] };

interface Components {
  base: BaseRisk;
  financial: RiskComponent;
  external: RiskComponent;
}

export interface RiskAssessmentOptions {
  policyType?: string;
  coverageAmount?: number;
  enableFraudCheck?: boolean;
  enableExplainability?: boolean;
}

export class RiskAssessmentService {
  constructor(
    private readonly fraudService: FraudEnsembleService,
    private readonly retrieval: RetrievalService,
    private readonly generation: IGenerationProvider,
    private readonly financialClassifier: ITextClassifier | null,
    private readonly thresholds: UnderwritingThresholds,
    private readonly logger: ILogProvider,
    private readonly now: () => Date = () => new Date()
  ) {}

  async assess(input: ApplicantInput, options: RiskAssessmentOptions = {}): Promise<RiskAssessment> {
    const policyType = options.policyType ?? 'life';
    const coverage = options.coverageAmount ?? DEFAULT_COVERAGE;
    const fraudCheck = options.enableFraudCheck ?? true;
    const explain = options.enableExplainability ?? true;

    const profile = parseApplicantProfile(input);

    const [components, fraud, guidelines] = await Promise.all([
      this.components(profile),
      fraudCheck ? this.screenForFraud(input, profile) : Promise.resolve(null),
      // Guidelines only feed the narrative
      explain
        ? this.retrieval.tryRetrieveContext(guidelineQuery(policyType), GUIDELINE_K)
        : Promise.resolve(null),
    ]);

    if (fraudCheck && fraud?.isSuspicious) {
      this.logger.warn('Application flagged for potential fraud', {
        fraudScore: fraud.fraudScore,
        riskLevel: fraud.riskLevel,
      });
      return this.fraudRejected(fraud);
    }

    const scored = this.build(profile, policyType, coverage, components, fraud);
    if (!explain) return scored;

    const [detailedAssessment, scenarioAnalysis] = await Promise.all([
      this.detailedAssessment(profile, scored.riskScore, guidelines?.context ?? ''),
      this.scenarioAnalysis(profile, policyType, coverage, scored),
    ]);

    return { ...scored, detailedAssessment, scenarioAnalysis };
  }

  /** Score two applicant variants side by side, without fraud checks or narrative. */
  async compare(
    original: ApplicantInput,
    modified: ApplicantInput,
    policyType = 'life',
    coverageAmount?: number
  ): Promise<WhatIfComparison> {
    const coverage = coverageAmount ?? DEFAULT_COVERAGE;
    const [before, after] = await Promise.all([
      this.rescore(parseApplicantProfile(original), policyType, coverage),
      this.rescore(parseApplicantProfile(modified), policyType, coverage),
    ]);

    return {
      original: before,
      modified: after,
      changes: {
        riskScoreDelta: round(after.riskScore - before.riskScore, 2),
        premiumDelta: {
          annual: round(after.premium.annual - before.premium.annual, 2),
          monthly: round(after.premium.monthly - before.premium.monthly, 2),
        },
        decisionChanged: before.decision !== after.decision,
      },
    };
  }

  // ── Components ──

  private async components(profile: ApplicantProfile): Promise<Components> {
    const [base, financial, external] = await Promise.all([
      settle(Promise.resolve().then(() => baseRiskScore(profile))),
      settle(this.financialSentiment(profile)),
      settle(
        Promise.resolve().then(() =>
          externalAdjustment(profile.location, this.now().getMonth() + 1)
        )
      ),
    ]);

    return {
      base: this.orDefault('base score', base, { score: BASE_SCORE, factors: [] }),
      financial: this.orDefault('financial sentiment', financial, NEUTRAL),
      external: this.orDefault('external factors', external, NEUTRAL),
    };
  }

  private async financialSentiment(profile: ApplicantProfile): Promise<RiskComponent> {
    if (!this.financialClassifier) return NEUTRAL;
    const sentiment = await this.financialClassifier.classify(financialProfileText(profile));
    return financialAdjustment(sentiment);
  }

  private screenForFraud(input: ApplicantInput, profile: ApplicantProfile): Promise<FraudAssessment> {
    return this.fraudService.assess(JSON.stringify(input), {
      previousClaims: profile.claimsHistoryCount,
    });
  }

  private orDefault<T>(component: string, outcome: Outcome<T>, fallback: T): T {
    if (outcome.ok) return outcome.value;
    this.logger.warn('Risk component failed, using default', {
      component,
      error: errorMessage(outcome.error),
    });
    return fallback;
  }

  // ── Assembly ──

  private build(
    profile: ApplicantProfile,
    policyType: string,
    coverage: number,
    c: Components,
    fraud: FraudAssessment | null
  ): ScoredRiskAssessment {
    const fraudScore = fraud?.fraudScore ?? 0;
    const riskScore = aggregateRiskScore(
      c.base.score,
      c.financial.adjustment,
      c.external.adjustment,
      fraudScore
    );
    const { decision, confidence } = underwritingDecision(riskScore, this.thresholds);

    return {
      kind: 'scored',
      riskScore,
      decision,
      confidence,
      premium: calculatePremium(riskScore, coverage, policyType),
      policyType,
      coverageAmount: coverage,
      riskBreakdown: {
        baseRisk: round(c.base.score, 2),
        financialRisk: round(c.financial.adjustment, 2),
        externalFactors: round(c.external.adjustment, 2),
        fraudRisk: fraudScore,
      },
      riskFactors: [...c.base.factors, ...c.financial.factors, ...c.external.factors],
      recommendations: recommendations(riskScore, profile),
      compliance: checkCompliance(profile, policyType),
      detailedAssessment: '',
      fraud,
      timestamp: this.now().toISOString(),
    };
  }

  private fraudRejected(fraud: FraudAssessment): FraudRejectedRiskAssessment {
    return {
      kind: 'fraud_rejected',
      riskScore: 100,
      decision: 'REJECT',
      reason: 'Application flagged for potential fraud',
      recommendation: 'Escalate to fraud investigation unit',
      fraud,
      timestamp: this.now().toISOString(),
    };
  }

  private async rescore(
    profile: ApplicantProfile,
    policyType: string,
    coverage: number
  ): Promise<ScoredRiskAssessment> {
    const components = await this.components(profile);
    return this.build(profile, policyType, coverage, components, null);
  }

  // ── Explainability ──

  private async detailedAssessment(
    profile: ApplicantProfile,
    riskScore: number,
    guidelines: string
  ): Promise<string> {
    try {
      return await this.generation.generate(
        detailedAssessmentPrompt(profile, riskScore, guidelines)
      );
    } catch (err) {
      this.logger.warn('Detailed assessment generation failed', { error: errorMessage(err) });
      return UNAVAILABLE_ASSESSMENT;
    }
  }

  private async scenarioAnalysis(
    profile: ApplicantProfile,
    policyType: string,
    coverage: number,
    current: ScoredRiskAssessment
  ): Promise<ScenarioAnalysis> {
    const [smokingCessation, creditImprovement] = await Promise.all([
      profile.smoking
        ? this.rescore({ ...profile, smoking: false }, policyType, coverage)
        : Promise.resolve(null),
      profile.creditScore < TARGET_CREDIT_SCORE
        ? this.rescore({ ...profile, creditScore: TARGET_CREDIT_SCORE }, policyType, coverage)
        : Promise.resolve(null),
    ]);

    const analysis: ScenarioAnalysis = {};
    if (smokingCessation) {
      analysis.smokingCessation = scenarioOutcome(current, smokingCessation);
    }
    if (creditImprovement) {
      analysis.creditImprovement = {
        ...scenarioOutcome(current, creditImprovement),
        targetCreditScore: TARGET_CREDIT_SCORE,
      };
    }
    return analysis;
  }
}

function scenarioOutcome(
  current: ScoredRiskAssessment,
  scenario: ScoredRiskAssessment
): ScenarioOutcome {
  return {
    riskScore: scenario.riskScore,
    riskScoreChange: round(scenario.riskScore - current.riskScore, 2),
    decision: scenario.decision,
    annualPremium: scenario.premium.annual,
    premiumSavings: round(current.premium.annual - scenario.premium.annual, 2),
  };
}
