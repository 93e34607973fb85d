/**
 * API router.
 * Maps HTTP method + path pattern to handlers.
 * Framework-agnostic — works with any Request/Response based runtime.
 */

import type { Container } from '../container.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import { createAnalyzeHandlers } from './analyze.js';
import { createDiseaseHandlers } from './diseases.js';
import { createHealthHandlers } from './health.js';
import { createScanHandlers } from './scans.js';

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

export function createRouter(container: Container) {
  const analyze = createAnalyzeHandlers(container);
  const diseases = createDiseaseHandlers(container);
  const scans = createScanHandlers(container);
  const health = createHealthHandlers(container);

  const routes: Route[] = [
    // Diagnosis
    { method: 'POST', pattern: /^\/api\/v1\/analyze\/?$/, handler: analyze.upload },
    { method: 'POST', pattern: /^\/api\/v1\/analyze\/base64\/?$/, handler: analyze.base64 },

    // Catalog
    { method: 'GET', pattern: /^\/api\/v1\/diseases\/?$/, handler: diseases.list },
    { method: 'GET', pattern: /^\/api\/v1\/diseases\/[^/]+\/?$/, handler: diseases.getByKey },
    { method: 'GET', pattern: /^\/api\/v1\/crops\/?$/, handler: diseases.crops },
    { method: 'GET', pattern: /^\/api\/v1\/supported\/?$/, handler: diseases.supported },

    // Scan history
    { method: 'GET', pattern: /^\/api\/v1\/scans\/?$/, handler: scans.list },
    { method: 'GET', pattern: /^\/api\/v1\/scans\/[^/]+\/?$/, handler: scans.getById },
    { method: 'GET', pattern: /^\/api\/v1\/dashboard\/stats\/?$/, handler: scans.dashboard },

    // Health
    { method: 'GET', pattern: /^\/api\/v1\/health\/?$/, handler: health.check },
  ];

  const handle: Handler = async (req: Request, ctx: HandlerContext) => {
    const url = new URL(req.url);
    const method = req.method;

    // CORS preflight
    if (method === 'OPTIONS') {
      return new Response(null, {
        status: 204,
        headers: { ...corsHeaders(), 'X-Request-Id': ctx.requestId },
      });
    }

    for (const route of routes) {
      if (route.method === method && route.pattern.test(url.pathname)) {
        const response = await route.handler(req, ctx);
        return addCommonHeaders(response, ctx);
      }
    }

    // Check if path matches but method doesn't
    const pathMatches = routes.some((r) => r.pattern.test(url.pathname));
    if (pathMatches) {
      const allowed = routes
        .filter((r) => r.pattern.test(url.pathname))
        .map((r) => r.method)
        .join(', ');

      return new Response(
        JSON.stringify({
          error: {
            code: 'INVALID_REQUEST',
            message: `Method ${method} not allowed`,
          },
        }),
        {
          status: 405,
          headers: {
            'Content-Type': 'application/json',
            Allow: allowed,
            'X-Request-Id': ctx.requestId,
            ...corsHeaders(),
          },
        }
      );
    }

    return new Response(
      JSON.stringify({
        error: {
          code: 'NOT_FOUND',
          message: `No route matches ${method} ${url.pathname}`,
        },
      }),
      {
        status: 404,
        headers: {
          'Content-Type': 'application/json',
          'X-Request-Id': ctx.requestId,
          ...corsHeaders(),
        },
      }
    );
  };

  return { handle, routes };
}

function corsHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type, X-Request-Id',
    'Access-Control-Expose-Headers': 'X-Request-Id, Retry-After',
    'Access-Control-Max-Age': '86400',
  };
}

function addCommonHeaders(response: Response, ctx: HandlerContext): Response {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries(corsHeaders())) {
    headers.set(key, value);
  }
  headers.set('X-Request-Id', ctx.requestId);
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
