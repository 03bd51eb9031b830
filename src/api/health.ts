/**
 * Health endpoint.
 * GET /api/v1/health: Liveness plus cache occupancy
 */

import { pipeline } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { HealthResponse } from '../types/api.js';
import { json } from './body.js';

export function createHealthHandlers(container: Container) {
  const check: Handler = pipeline(
    container.logging,
    container.errorHandler
  )(async () => {
    const response: HealthResponse = {
      status: 'ok',
      cache: await container.cacheService.stats(),
    };
    return json(response);
  });

  return { check };
}
