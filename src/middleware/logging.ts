/**
 * Request logging middleware.
 *
 * Writes one line per request once the response is known. Inner handlers and
 * middleware attach fields to that line with annotate(), so a diagnosis is
 * logged with its scan id and engine and a failure with its error code.
 * Status picks the level: 5xx error, 4xx warn, anything else info. A handler
 * that throws is logged as a 500 and the error is re-thrown.
 */

import { errorMessage } from '../errors.js';
import type { ILogProvider, LogLevel, RequestLogEvent } from '../providers/ILogProvider.js';
import type { HandlerContext, Middleware } from './pipeline.js';

/** Add fields to the current request's log line. No-op outside the logging middleware. */
export function annotate(ctx: HandlerContext, fields: Record<string, unknown>): void {
  if (ctx.logFields) Object.assign(ctx.logFields, fields);
}

export function createLoggingMiddleware(logProvider: ILogProvider): Middleware {
  return (next) => async (req, ctx) => {
    const startedAt = performance.now();
    const logFields: Record<string, unknown> = {};
    let status = 500;

    try {
      const response = await next(req, { ...ctx, logFields });
      status = response.status;
      return response;
    } catch (err) {
      logFields.error = errorMessage(err);
      throw err;
    } finally {
      const durationMs = Math.round(performance.now() - startedAt);
      logProvider.log(requestEvent(req, ctx.requestId, status, durationMs, logFields));
    }
  };
}

function requestEvent(
  req: Request,
  requestId: string,
  status: number,
  durationMs: number,
  fields: Record<string, unknown>
): RequestLogEvent {
  const path = new URL(req.url).pathname;
  return {
    level: levelFor(status),
    message: `${req.method} ${path} ${status} in ${durationMs}ms`,
    method: req.method,
    path,
    status,
    durationMs,
    requestId,
    ...(Object.keys(fields).length > 0 ? { fields } : {}),
  };
}

function levelFor(status: number): LogLevel {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}
