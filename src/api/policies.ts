/**
 * Policy ingestion endpoint.
 * POST /api/v1/policies: Chunk, embed and index a policy document
 */

import { pipeline } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import { json, readBody, requiredString } from './body.js';

const policySchema: BodySchema = {
  fields: {
    source: { type: 'string', required: true, minLength: 1, maxLength: 500 },
    text: { type: 'string', required: true, maxLength: 500_000 },
  },
};

export function createPolicyHandlers(container: Container) {
  const ingest: Handler = pipeline(
    container.logging,
    container.errorHandler,
    validateBody(policySchema)
  )(async (req) => {
    const body = await readBody(req);

    const result = await container.ingestionService.ingest({
      source: requiredString(body, 'source'),
      text: requiredString(body, 'text'),
    });

    return json(result, result.status === 'indexed' ? 201 : 422);
  });

  return { ingest };
}
