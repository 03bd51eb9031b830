/**
 * Underwriting rules: risk components, the decision ladder, premium pricing,
 * compliance checks and recommendations. All pure.
 */

import type { UnderwritingThresholds } from '../config.js';
import type { Classification } from '../providers/ITextClassifier.js';
import type {
  ApplicantProfile,
  ComplianceResult,
  PremiumEstimate,
  UnderwritingDecision,
} from '../types/models.js';
import { clamp, round } from '../utils/math.js';

export const DEFAULT_COVERAGE = 100_000;
export const BASE_SCORE = 50;

const OPTIMAL_AGE = { min: 25, max: 55 } as const;
const HIGH_RISK_OCCUPATIONS = ['construction', 'mining', 'logging'];
const SMOKING_MULTIPLIER = 2;
const HIGH_RISK_LOCATIONS = ['coastal', 'flood', 'seismic', 'hurricane', 'tornado'];
const HURRICANE_MONTHS = [6, 7, 8, 9];

const BASE_RATES: Record<string, number> = {
  life: 500,
  health: 3000,
  auto: 1200,
  home: 800,
};
const FALLBACK_BASE_RATE = 1000;

export const REGULATIONS_CHECKED = ['ACA', 'HIPAA', 'State Insurance Codes'];

export interface RiskComponent {
  adjustment: number;
  factors: string[];
}

export interface BaseRisk {
  score: number;
  factors: string[];
}

// ── Components ──

export function baseRiskScore(profile: ApplicantProfile): BaseRisk {
  let score = BASE_SCORE;
  const factors: string[] = [];

  const { age } = profile;
  if (age > 0 && (age < OPTIMAL_AGE.min || age > OPTIMAL_AGE.max)) {
    const midpoint = (OPTIMAL_AGE.min + OPTIMAL_AGE.max) / 2;
    score += Math.min(Math.abs(age - midpoint) * 0.3, 15);
    factors.push(`Age (${age}) outside optimal range`);
  }

  const occupation = HIGH_RISK_OCCUPATIONS.find((o) => profile.occupation.includes(o));
  if (occupation) {
    score += 10;
    factors.push(`High-risk occupation: ${profile.occupation}`);
  }

  if (profile.smoking) {
    score *= SMOKING_MULTIPLIER;
    factors.push(`Smoking status (risk multiplier: ${SMOKING_MULTIPLIER}x)`);
  }

  if (profile.claimsHistoryCount > 0) {
    score += Math.min(profile.claimsHistoryCount * 5, 20);
    factors.push(`${profile.claimsHistoryCount} previous claims on record`);
  }

  if (profile.creditScore < 600) {
    score += 15;
    factors.push(`Low credit score (${profile.creditScore})`);
  } else if (profile.creditScore > 750) {
    score -= 5;
    factors.push(`Excellent credit score (${profile.creditScore})`);
  }

  return { score: clamp(score, 0, 100), factors };
}

/** Text the financial-sentiment classifier reads. */
export function financialProfileText(profile: ApplicantProfile): string {
  return [
    `Credit Score: ${profile.creditScore}`,
    `Claims History: ${profile.claimsHistoryCount} claims`,
    `Coverage Years: ${profile.coverageYears} years`,
    `Payment History: ${profile.paymentHistory}`,
  ].join('\n');
}

export function financialAdjustment(sentiment: Classification): RiskComponent {
  const label = sentiment.label.toUpperCase();
  if (label === 'NEGATIVE') {
    return {
      adjustment: sentiment.score * 10,
      factors: ['Negative financial profile'],
    };
  }
  if (label === 'POSITIVE') {
    return {
      adjustment: -sentiment.score * 5,
      factors: ['Positive financial profile'],
    };
  }
  return { adjustment: 0, factors: [] };
}

/** Location hazards plus a hurricane-season loading; `month` is 1-12. */
export function externalAdjustment(location: string, month: number): RiskComponent {
  const normalized = location.toLowerCase();
  let adjustment = 0;
  const factors: string[] = [];

  for (const keyword of HIGH_RISK_LOCATIONS) {
    if (normalized.includes(keyword)) {
      adjustment += 5;
      factors.push(`High-risk location: ${keyword} zone`);
    }
  }

  if (
    HURRICANE_MONTHS.includes(month) &&
    (normalized.includes('coastal') || normalized.includes('florida'))
  ) {
    adjustment += 3;
    factors.push('Hurricane season - coastal area');
  }

  return { adjustment, factors };
}

/** Fraud only loads the score once it passes 0.5. */
export function aggregateRiskScore(
  base: number,
  financial: number,
  external: number,
  fraudScore: number
): number {
  const fraudLoading = fraudScore > 0.5 ? fraudScore * 30 : 0;
  return round(clamp(base + financial + external + fraudLoading, 0, 100), 2);
}

// ── Decision ──

export interface UnderwritingOutcome {
  decision: UnderwritingDecision;
  confidence: number;
}

/** The rungs are checked in this exact order; the first match wins. */
export function underwritingDecision(
  score: number,
  t: UnderwritingThresholds
): UnderwritingOutcome {
  if (score <= t.autoApprove) return { decision: 'APPROVE', confidence: 0.95 };
  if (score >= t.autoReject) return { decision: 'REJECT', confidence: 0.9 };
  if (score >= t.reviewMin && score <= t.reviewMax) {
    return { decision: 'MANUAL_REVIEW', confidence: 0.7 };
  }
  if (score < t.reviewMin) return { decision: 'APPROVE', confidence: 0.8 };
  return { decision: 'REJECT', confidence: 0.85 };
}

// ── Pricing ──

export function baseRate(policyType: string): number {
  return BASE_RATES[policyType.toLowerCase()] ?? FALLBACK_BASE_RATE;
}

/** Annual rate is quoted per 100 000 of coverage. */
export function calculatePremium(
  score: number,
  coverageAmount: number,
  policyType: string
): PremiumEstimate {
  const rate = baseRate(policyType);
  const multiplier = 1 + score / 100;
  const annual = (coverageAmount / 100_000) * rate * multiplier;

  return {
    annual: round(annual, 2),
    monthly: round(annual / 12, 2),
    baseRate: rate,
    riskMultiplier: round(multiplier, 2),
    currency: 'USD',
  };
}

// ── Compliance & advice ──

export function checkCompliance(profile: ApplicantProfile, policyType: string): ComplianceResult {
  const issues: string[] = [];
  const warnings: string[] = [];

  if (profile.age < 18) {
    issues.push('Applicant under minimum age (18)');
  }
  if (profile.age > 80 && policyType.toLowerCase() === 'life') {
    warnings.push('Age exceeds typical underwriting guidelines for life insurance');
  }
  if (!profile.gender || !profile.age) {
    warnings.push('Incomplete demographic data may impact compliance');
  }

  return {
    compliant: issues.length === 0,
    issues,
    warnings,
    regulationsChecked: [...REGULATIONS_CHECKED],
  };
}

export function recommendations(score: number, profile: ApplicantProfile): string[] {
  const advice: string[] = [];

  if (profile.smoking) {
    advice.push('Smoking cessation program can reduce premium by up to 30%');
  }
  if (profile.creditScore < 700) {
    advice.push('Improving credit score can qualify for better rates');
  }
  if (profile.claimsHistoryCount > 2) {
    advice.push('Consider higher deductible to lower premium');
  }
  if (score > 70) {
    advice.push('Additional medical examination may improve risk assessment');
  }

  if (advice.length === 0) {
    advice.push('Maintain current health and financial status for continued favorable rates');
  }
  return advice;
}
