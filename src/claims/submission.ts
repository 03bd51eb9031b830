import { ValidationError } from '../errors.js';
import type { SubmitClaimRequest } from '../types/api.js';
import type { ClaimSubmission } from '../types/models.js';

/**
 * Turn a request body into a submission.
 * The legacy `query` field stands in for a missing `claimDescription`.
 */
export function toClaimSubmission(request: SubmitClaimRequest): ClaimSubmission {
  const submission: ClaimSubmission = {
    claimDescription: (request.claimDescription || request.query || '').trim(),
    incidentDate: request.incidentDate,
    incidentLocation: request.incidentLocation,
    claimAmount: request.claimAmount,
    policyNumber: request.policyNumber,
    claimantName: request.claimantName,
    submittedDocuments: request.submittedDocuments ?? [],
    contactEmail: request.contactEmail,
    contactPhone: request.contactPhone,
  };
  assertValidSubmission(submission);
  return submission;
}

export function assertValidSubmission(submission: ClaimSubmission): void {
  if (!submission.claimDescription.trim()) {
    throw new ValidationError('claimDescription cannot be empty');
  }
  const amount = submission.claimAmount;
  if (amount !== undefined && (!Number.isFinite(amount) || amount < 0)) {
    throw new ValidationError('claimAmount must be a non-negative number', {
      claimAmount: amount,
    });
  }
}
