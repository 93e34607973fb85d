/**
 * Scan history endpoints.
 * GET /api/v1/scans             — Recent scans (?limit=1..100, ?requesterId=)
 * GET /api/v1/scans/:id         — One scan
 * GET /api/v1/dashboard/stats   — Aggregates, top diseases, latest scans
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { ValidationError } from '../errors.js';
import { pathParam } from './params.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function createScanHandlers(container: Container) {
  const list: Handler = pipeline(container.logging, errorHandler)(async (req, _ctx) => {
    const params = new URL(req.url).searchParams;
    const rawLimit = params.get('limit');
    const limit = rawLimit === null ? undefined : Number(rawLimit);
    if (limit !== undefined && !Number.isInteger(limit)) {
      throw new ValidationError('limit must be an integer', { field: 'limit' });
    }

    const result = await container.scanService.list({
      limit,
      requesterId: params.get('requesterId') ?? undefined,
    });

    return new Response(JSON.stringify(result), { status: 200, headers: JSON_HEADERS });
  });

  const getById: Handler = pipeline(container.logging, errorHandler)(async (req, _ctx) => {
    const result = await container.scanService.getById(pathParam(req));

    return new Response(JSON.stringify(result), { status: 200, headers: JSON_HEADERS });
  });

  const dashboard: Handler = pipeline(container.logging, errorHandler)(async (_req, _ctx) => {
    const stats = await container.scanService.dashboardStats();

    return new Response(JSON.stringify(stats), {
      status: 200,
      headers: { ...JSON_HEADERS, 'Cache-Control': 'no-store' },
    });
  });

  return { list, getById, dashboard };
}
