/**
 * Applicant profile parsing.
 * Accepts a structured object (snake_case or camelCase keys), a JSON string,
 * or free text, and always yields a complete profile.
 */

import type { ApplicantProfile } from '../types/models.js';

export type ApplicantInput = Record<string, unknown> | string;

const DEFAULT_CREDIT_SCORE = 650;

const AGE_PATTERN = /\b(\d{1,2})\s*(?:years?\s*old|yo)\b/i;
const SMOKER_PATTERN = /\b(smoker|smoking|smokes)\b/i;
const NON_SMOKER_PATTERN =
  /\b(non[-\s]?smok(?:er|ing)|(?:does|do)\s+not\s+smoke|doesn't\s+smoke|don't\s+smoke|never\s+smoked|not\s+a\s+smoker)\b/i;
const OCCUPATION_PATTERN = /\b(?:occupation|work|job):\s*(\w+)/i;
const LOCATION_PATTERN = /\blocation:\s*([^,;.\n]+)/i;

export function parseApplicantProfile(input: ApplicantInput): ApplicantProfile {
  return normalizeProfile(toRecord(input));
}

/** True when free text mentions smoking without negating it. */
export function mentionsSmoking(text: string): boolean {
  return SMOKER_PATTERN.test(text) && !NON_SMOKER_PATTERN.test(text);
}

export function extractFromText(text: string): Record<string, unknown> {
  const data: Record<string, unknown> = {};

  const age = AGE_PATTERN.exec(text);
  if (age?.[1]) data.age = Number(age[1]);

  if (mentionsSmoking(text)) data.smoking = true;

  const occupation = OCCUPATION_PATTERN.exec(text);
  if (occupation?.[1]) data.occupation = occupation[1];

  const location = LOCATION_PATTERN.exec(text);
  if (location?.[1]) data.location = location[1].trim();

  return data;
}

function toRecord(input: ApplicantInput): Record<string, unknown> {
  if (typeof input !== 'string') return input;

  try {
    const parsed: unknown = JSON.parse(input);
    if (isRecord(parsed)) return parsed;
  } catch {
    // Not JSON: fall through to free-text extraction
  }
  return extractFromText(input);
}

function normalizeProfile(data: Record<string, unknown>): ApplicantProfile {
  return {
    age: numberField(data, ['age']) ?? 0,
    gender: (stringField(data, ['gender']) ?? '').toLowerCase(),
    occupation: (stringField(data, ['occupation']) ?? '').toLowerCase(),
    location: (stringField(data, ['location']) ?? '').toLowerCase(),
    healthStatus: stringField(data, ['health_status', 'healthStatus']) ?? 'unknown',
    smoking: smokingField(data),
    creditScore: numberField(data, ['credit_score', 'creditScore']) ?? DEFAULT_CREDIT_SCORE,
    claimsHistoryCount: claimsCount(data),
    coverageYears: numberField(data, ['coverage_years', 'coverageYears']) ?? 0,
    paymentHistory: stringField(data, ['payment_history', 'paymentHistory']) ?? 'unknown',
  };
}

function smokingField(data: Record<string, unknown>): boolean {
  for (const key of ['smoking', 'smoker']) {
    const value = data[key];
    if (typeof value === 'boolean') return value;
    if (typeof value === 'string') {
      return ['yes', 'true', 'smoker', 'current'].includes(value.trim().toLowerCase());
    }
  }
  return false;
}

/** Claims history may arrive as a list of claims or as a count. */
function claimsCount(data: Record<string, unknown>): number {
  for (const key of ['claims_history', 'claimsHistory', 'claimsHistoryCount', 'previous_claims']) {
    const value = data[key];
    if (Array.isArray(value)) return value.length;
    if (typeof value === 'number' && Number.isFinite(value) && value >= 0) {
      return Math.floor(value);
    }
  }
  return 0;
}

function numberField(data: Record<string, unknown>, keys: string[]): number | undefined {
  for (const key of keys) {
    const value = data[key];
    if (typeof value === 'number' && Number.isFinite(value)) return value;
    if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
      return Number(value);
    }
  }
  return undefined;
}

function stringField(data: Record<string, unknown>, keys: string[]): string | undefined {
  for (const key of keys) {
    const value = data[key];
    if (typeof value === 'string') return value;
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
