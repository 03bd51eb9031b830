/**
 * Policy advisor endpoint.
 * POST /api/v1/advisor: Answer a question from retrieved policy context
 */

import { pipeline } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import { json, readBody, requiredString } from './body.js';

const askSchema: BodySchema = {
  fields: {
    question: { type: 'string', required: true, minLength: 1, maxLength: 2000 },
  },
};

export function createAdvisorHandlers(container: Container) {
  const ask: Handler = pipeline(
    container.logging,
    container.errorHandler,
    validateBody(askSchema)
  )(async (req) => {
    const body = await readBody(req);
    const result = await container.advisorService.ask(requiredString(body, 'question'));
    return json(result);
  });

  return { ask };
}
