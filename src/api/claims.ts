/**
 * Claims endpoint.
 * POST /api/v1/claims: Adjudicate a claim
 */

import { pipeline } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { SubmitClaimRequest } from '../types/api.js';
import { toClaimSubmission } from '../claims/submission.js';
import {
  json,
  optionalNumber,
  optionalString,
  optionalStringArray,
  readBody,
} from './body.js';

const claimSchema: BodySchema = {
  fields: {
    claimDescription: { type: 'string', maxLength: 10_000 },
    query: { type: 'string', maxLength: 10_000 },
    incidentDate: { type: 'string', maxLength: 100 },
    incidentLocation: { type: 'string', maxLength: 500 },
    claimAmount: { type: 'number', min: 0 },
    policyNumber: { type: 'string', maxLength: 100 },
    claimantName: { type: 'string', maxLength: 200 },
    submittedDocuments: { type: 'array', items: 'string', maxLength: 50 },
    contactEmail: { type: 'string', maxLength: 320 },
    contactPhone: { type: 'string', maxLength: 50 },
  },
  oneOf: [['claimDescription', 'query']],
};

export function createClaimHandlers(container: Container) {
  const submit: Handler = pipeline(
    container.logging,
    container.errorHandler,
    validateBody(claimSchema)
  )(async (req) => {
    const body = await readBody(req);

    const request: SubmitClaimRequest = {
      claimDescription: optionalString(body, 'claimDescription'),
      query: optionalString(body, 'query'),
      incidentDate: optionalString(body, 'incidentDate'),
      incidentLocation: optionalString(body, 'incidentLocation'),
      claimAmount: optionalNumber(body, 'claimAmount'),
      policyNumber: optionalString(body, 'policyNumber'),
      claimantName: optionalString(body, 'claimantName'),
      submittedDocuments: optionalStringArray(body, 'submittedDocuments'),
      contactEmail: optionalString(body, 'contactEmail'),
      contactPhone: optionalString(body, 'contactPhone'),
    };

    const result = await container.claimService.adjudicate(toClaimSubmission(request));
    return json(result);
  });

  return { submit };
}
