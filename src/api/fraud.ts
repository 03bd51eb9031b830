/**
 * Fraud screening endpoint.
 * POST /api/v1/fraud: Score free text with the detector ensemble
 */

import { pipeline } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { FraudMetadata } from '../types/models.js';
import { json, optionalNumber, optionalRecord, readBody, requiredString } from './body.js';

const fraudSchema: BodySchema = {
  fields: {
    text: { type: 'string', required: true, minLength: 1, maxLength: 20_000 },
    metadata: { type: 'object' },
  },
};

export function createFraudHandlers(container: Container) {
  const check: Handler = pipeline(
    container.logging,
    container.errorHandler,
    validateBody(fraudSchema)
  )(async (req) => {
    const body = await readBody(req);
    const raw = optionalRecord(body, 'metadata');

    let metadata: FraudMetadata | undefined;
    if (raw) {
      metadata = {
        claimAmount: optionalNumber(raw, 'claimAmount'),
        previousClaims: optionalNumber(raw, 'previousClaims'),
      };
    }

    const result = await container.fraudService.assess(requiredString(body, 'text'), metadata);
    return json(result);
  });

  return { check };
}
