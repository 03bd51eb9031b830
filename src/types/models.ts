/**
 * Domain models: the entities the decision engine produces.
 * Decoupled from both API request shapes and database row shapes.
 */

// ── Fraud ──

export type DetectorName = 'pattern' | 'model' | 'sentiment' | 'statistical';

export type FraudRiskLevel =
  | 'MINIMAL'
  | 'LOW'
  | 'MEDIUM'
  | 'HIGH'
  | 'CRITICAL'
  | 'UNKNOWN';

/** Output of a single signal detector. */
export interface DetectionResult {
  score: number;
  indicators: string[];
}

/** Metadata that influences statistical scoring. */
export interface FraudMetadata {
  claimAmount?: number;
  previousClaims?: number;
}

export interface FraudAssessment {
  /** Weighted ensemble score, 3 decimals, in [0, 1]. */
  fraudScore: number;
  isSuspicious: boolean;
  /** Derived from inter-detector agreement; floor 0.5 unless degraded. */
  confidence: number;
  indicators: string[];
  riskLevel: FraudRiskLevel;
  recommendation: string;
  /** Per-detector score; null when that detector failed. */
  detectionMethods: Record<DetectorName, number | null>;
  /** True when every detector failed and the result is a fallback. */
  degraded: boolean;
  timestamp: string;
}

// ── Underwriting ──

export type PolicyType = 'life' | 'health' | 'auto' | 'home';

export interface ApplicantProfile {
  age: number;
  gender: string;
  occupation: string;
  location: string;
  healthStatus: string;
  smoking: boolean;
  creditScore: number;
  claimsHistoryCount: number;
  coverageYears: number;
  paymentHistory: string;
}

export type UnderwritingDecision = 'APPROVE' | 'REJECT' | 'MANUAL_REVIEW';

export interface PremiumEstimate {
  annual: number;
  monthly: number;
  baseRate: number;
  riskMultiplier: number;
  currency: 'USD';
}

export interface RiskBreakdown {
  baseRisk: number;
  financialRisk: number;
  externalFactors: number;
  fraudRisk: number;
}

export interface ComplianceResult {
  compliant: boolean;
  issues: string[];
  warnings: string[];
  regulationsChecked: string[];
}

export interface ScenarioOutcome {
  riskScore: number;
  riskScoreChange: number;
  decision: UnderwritingDecision;
  annualPremium: number;
  premiumSavings: number;
}

export interface ScenarioAnalysis {
  smokingCessation?: ScenarioOutcome;
  creditImprovement?: ScenarioOutcome & { targetCreditScore: number };
}

export interface ScoredRiskAssessment {
  kind: 'scored';
  riskScore: number;
  decision: UnderwritingDecision;
  confidence: number;
  premium: PremiumEstimate;
  policyType: string;
  coverageAmount: number;
  riskBreakdown: RiskBreakdown;
  riskFactors: string[];
  recommendations: string[];
  compliance: ComplianceResult;
  detailedAssessment: string;
  scenarioAnalysis?: ScenarioAnalysis;
  fraud: FraudAssessment | null;
  timestamp: string;
}

export interface FraudRejectedRiskAssessment {
  kind: 'fraud_rejected';
  riskScore: 100;
  decision: 'REJECT';
  reason: string;
  recommendation: string;
  fraud: FraudAssessment;
  timestamp: string;
}

export type RiskAssessment = ScoredRiskAssessment | FraudRejectedRiskAssessment;

export interface WhatIfComparison {
  original: ScoredRiskAssessment;
  modified: ScoredRiskAssessment;
  changes: {
    riskScoreDelta: number;
    premiumDelta: { annual: number; monthly: number };
    decisionChanged: boolean;
  };
}

// ── Claims ──

export type ClaimVerdict =
  | 'APPROVED'
  | 'PENDING_DOCUMENTS'
  | 'UNDER_INVESTIGATION'
  | 'REJECTED';

export type ClaimFraudRisk = 'LOW' | 'MEDIUM' | 'HIGH';

export type IncidentType =
  | 'auto'
  | 'death'
  | 'medical'
  | 'property'
  | 'disability'
  | 'general';

/** Which pipeline stage produced the verdict before overrides. */
export type AdjudicationSource =
  | 'fraud_prefilter'
  | 'grounded_decision'
  | 'parse_fallback';

export type AdjudicationOverride = 'fraud_score' | 'insufficient_documents';

export type DocumentStatusLabel = 'MISSING' | 'DECLARED_BUT_UNVERIFIED';

export interface DocumentStatus {
  verified: string[];
  unverified: string[];
  missing: string[];
}

export interface DocumentGuidance {
  document: string;
  status: DocumentStatusLabel;
  howToObtain: string;
  issuingEntity: string;
  turnaround: string;
  cost: string;
  contact: string;
}

export interface ClaimSubmission {
  claimDescription: string;
  incidentDate?: string;
  incidentLocation?: string;
  claimAmount?: number;
  policyNumber?: string;
  claimantName?: string;
  submittedDocuments: string[];
  contactEmail?: string;
  contactPhone?: string;
}

export interface ClaimAdjudication {
  verdict: ClaimVerdict;
  source: AdjudicationSource;
  coverageApplicable: boolean;
  /** False when no policy context could be retrieved. */
  coverageVerifiable: boolean;
  fraudRisk: ClaimFraudRisk;
  fraudScore: number;
  incidentTypes: IncidentType[];
  requiredDocumentsChecklist: string[];
  documentStatus: DocumentStatus;
  /** Merged, deduplicated list of every insufficient document. */
  missingDocuments: string[];
  documentGuidance: DocumentGuidance[];
  fraudSignals: string[];
  reason: string;
  claimantMessage: string;
  nextSteps: string[];
  internalNotes: string;
  estimatedCoverageAmount: number;
  policyReferences: string[];
  submittedDocuments: string[];
  overridesApplied: AdjudicationOverride[];
}

// ── Policy ingestion ──

export type IngestionResult =
  | { status: 'indexed'; source: string; chunks: number }
  | { status: 'flagged'; source: string; fraud: FraudAssessment };
