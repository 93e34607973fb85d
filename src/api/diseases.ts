/**
 * Catalog endpoints.
 * GET /api/v1/diseases       — Disease summaries (?crop= filters by crop)
 * GET /api/v1/diseases/:key  — Full disease record
 * GET /api/v1/crops          — Crops with their disease counts
 * GET /api/v1/supported      — Supported crops and languages with totals
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { pathParam } from './params.js';

const CACHEABLE = {
  'Content-Type': 'application/json',
  'Cache-Control': 'public, max-age=300',
};

export function createDiseaseHandlers(container: Container) {
  const list: Handler = pipeline(container.logging, errorHandler)(async (req, _ctx) => {
    const crop = new URL(req.url).searchParams.get('crop') ?? undefined;
    const result = container.catalogService.listDiseases(crop);

    return new Response(JSON.stringify(result), { status: 200, headers: CACHEABLE });
  });

  const getByKey: Handler = pipeline(container.logging, errorHandler)(async (req, _ctx) => {
    const key = pathParam(req);
    const result = container.catalogService.getDisease(key);

    return new Response(JSON.stringify(result), { status: 200, headers: CACHEABLE });
  });

  const crops: Handler = pipeline(container.logging, errorHandler)(async (_req, _ctx) => {
    const result = { crops: container.catalogService.listCrops() };

    return new Response(JSON.stringify(result), { status: 200, headers: CACHEABLE });
  });

  const supported: Handler = pipeline(container.logging, errorHandler)(async (_req, _ctx) => {
    return new Response(JSON.stringify(container.catalogService.supported()), {
      status: 200,
      headers: CACHEABLE,
    });
  });

  return { list, getByKey, crops, supported };
}
