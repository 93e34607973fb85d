/**
 * Health endpoint.
 * GET /api/v1/health — Service status and configured pipeline stages
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';

export function createHealthHandlers(container: Container) {
  const check: Handler = pipeline(errorHandler)(async (_req, _ctx) => {
    const health = container.healthService.check();

    return new Response(JSON.stringify(health), {
      status: 200,
      headers: { 'Content-Type': 'application/json', 'Cache-Control': 'no-store' },
    });
  });

  return { check };
}
