/**
 * Error handler middleware.
 * Catches errors thrown by handlers and maps them to structured JSON responses.
 * AppError subclasses get their status code and details; unknown errors become 500.
 */

import { AnalysisUnavailableError, AppError, errorMessage } from '../errors.js';
import type { Handler } from './pipeline.js';
import { annotate } from './logging.js';
import type { ApiErrorResponse } from '../types/api.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

/** Seconds a client should wait before resending after a 503. */
export const RETRY_AFTER_SECONDS = 30;

export function errorHandler(next: Handler): Handler {
  return async (req, ctx) => {
    try {
      return await next(req, ctx);
    } catch (err) {
      if (err instanceof AppError) {
        annotate(ctx, { errorCode: err.code });
        const body: ApiErrorResponse = {
          error: {
            code: err.code,
            message: err.message,
            ...(err.details && { details: err.details }),
          },
        };

        const headers: Record<string, string> = { ...JSON_HEADERS };

        if (err instanceof AnalysisUnavailableError) {
          headers['Retry-After'] = String(RETRY_AFTER_SECONDS);
        }

        return new Response(JSON.stringify(body), {
          status: err.statusCode,
          headers,
        });
      }

      // Unknown error: the message goes to the request log, never to the caller
      annotate(ctx, { errorCode: 'INTERNAL_ERROR', error: errorMessage(err) });
      const body: ApiErrorResponse = {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
        },
      };

      return new Response(JSON.stringify(body), {
        status: 500,
        headers: JSON_HEADERS,
      });
    }
  };
}
