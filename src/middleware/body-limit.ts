/**
 * Request body size limit.
 * Rejects on a declared Content-Length above the limit, and otherwise counts
 * bytes while buffering the body so a chunked upload cannot exceed it either.
 */

import { PayloadTooLargeError } from '../errors.js';
import type { Handler, Middleware } from './pipeline.js';

export function bodyLimit(maxBytes: number): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      if (!req.body) return next(req, ctx);

      const declared = Number(req.headers.get('content-length'));
      if (Number.isFinite(declared) && declared > maxBytes) {
        throw new PayloadTooLargeError(maxBytes);
      }

      const chunks: Uint8Array[] = [];
      let total = 0;
      const reader = req.body.getReader();
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        total += value.byteLength;
        if (total > maxBytes) {
          await reader.cancel();
          throw new PayloadTooLargeError(maxBytes);
        }
        chunks.push(value);
      }

      // Re-create request with the buffered body so handlers can read it
      return next(
        new Request(req.url, {
          method: req.method,
          headers: req.headers,
          body: Buffer.concat(chunks),
        }),
        ctx
      );
    };
  };
}
