/**
 * API types: shapes for request/response payloads.
 * Decoupled from domain models so the API can evolve independently.
 */

import type { FraudMetadata } from './models.js';

// ── Requests ──

export interface SubmitClaimRequest {
  claimDescription?: string;
  /** Legacy free-text field, promoted to claimDescription when that is absent. */
  query?: string;
  incidentDate?: string;
  incidentLocation?: string;
  claimAmount?: number;
  policyNumber?: string;
  claimantName?: string;
  submittedDocuments?: string[];
  contactEmail?: string;
  contactPhone?: string;
}

export interface AssessRiskRequest {
  applicantData: Record<string, unknown> | string;
  policyType?: string;
  coverageAmount?: number;
  enableFraudCheck?: boolean;
  enableExplainability?: boolean;
}

export interface WhatIfRequest {
  originalData: Record<string, unknown> | string;
  modifiedData: Record<string, unknown> | string;
  policyType?: string;
  coverageAmount?: number;
}

export interface FraudCheckRequest {
  text: string;
  metadata?: FraudMetadata;
}

export interface IngestPolicyRequest {
  source: string;
  text: string;
}

export interface AskRequest {
  question: string;
}

// ── Responses ──

export interface AskResponse {
  answer: string;
  contextAvailable: boolean;
}

export interface HealthResponse {
  status: 'ok';
  cache: {
    memoryEntries: number;
    memoryMaxEntries: number;
    secondaryEnabled: boolean;
  };
}

// ── Errors ──

export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'NOT_FOUND'
  | 'UPSTREAM_FAILURE'
  | 'INTERNAL_ERROR';

export interface ApiErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}
