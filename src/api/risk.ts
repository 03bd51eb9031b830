/**
 * Underwriting endpoints.
 * POST /api/v1/risk: Assess an applicant
 * POST /api/v1/risk/what-if: Compare two applicant variants
 */

import { pipeline } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema, FieldSchema } from '../types/common.js';
import {
  json,
  objectOrString,
  optionalBoolean,
  optionalNumber,
  optionalString,
  readBody,
} from './body.js';

const APPLICANT_FIELD: FieldSchema = { type: ['object', 'string'], required: true, maxLength: 20_000 };

const assessSchema: BodySchema = {
  fields: {
    applicantData: APPLICANT_FIELD,
    policyType: { type: 'string', maxLength: 50 },
    coverageAmount: { type: 'number', min: 1, max: 1_000_000_000 },
    enableFraudCheck: { type: 'boolean' },
    enableExplainability: { type: 'boolean' },
  },
};

const whatIfSchema: BodySchema = {
  fields: {
    originalData: APPLICANT_FIELD,
    modifiedData: APPLICANT_FIELD,
    policyType: { type: 'string', maxLength: 50 },
    coverageAmount: { type: 'number', min: 1, max: 1_000_000_000 },
  },
};

export function createRiskHandlers(container: Container) {
  const assess: Handler = pipeline(
    container.logging,
    container.errorHandler,
    validateBody(assessSchema)
  )(async (req) => {
    const body = await readBody(req);

    const result = await container.riskService.assess(objectOrString(body, 'applicantData'), {
      policyType: optionalString(body, 'policyType')?.toLowerCase(),
      coverageAmount: optionalNumber(body, 'coverageAmount'),
      enableFraudCheck: optionalBoolean(body, 'enableFraudCheck'),
      enableExplainability: optionalBoolean(body, 'enableExplainability'),
    });

    return json(result);
  });

  const whatIf: Handler = pipeline(
    container.logging,
    container.errorHandler,
    validateBody(whatIfSchema)
  )(async (req) => {
    const body = await readBody(req);

    const result = await container.riskService.compare(
      objectOrString(body, 'originalData'),
      objectOrString(body, 'modifiedData'),
      optionalString(body, 'policyType')?.toLowerCase(),
      optionalNumber(body, 'coverageAmount')
    );

    return json(result);
  });

  return { assess, whatIf };
}
