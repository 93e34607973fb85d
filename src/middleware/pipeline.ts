/**
 * Composable middleware pipeline for Request/Response handlers.
 * Middleware wraps handlers in order (left to right), forming an onion model.
 */

export interface HandlerContext {
  /** Per-request id, echoed in the X-Request-Id response header. */
  requestId: string;
  /** Fields for the request log line; set by the logging middleware, filled through annotate(). */
  logFields?: Record<string, unknown>;
}

export type Handler = (req: Request, ctx: HandlerContext) => Promise<Response>;
export type Middleware = (next: Handler) => Handler;

/**
 * Compose middleware into a function that wraps a handler.
 * Middleware is applied left-to-right:
 *   pipeline(bodyLimit, validateBody(schema))(handler)
 *   → bodyLimit wraps (validateBody wraps handler)
 */
export function pipeline(...middlewares: Middleware[]) {
  return (handler: Handler): Handler => {
    return middlewares.reduceRight<Handler>(
      (next, mw) => mw(next),
      handler
    );
  };
}
