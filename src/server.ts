/**
 * HTTP entry point.
 * One Node server handles all /api/v1/* routes via the router.
 * The container is created once at startup and shared across requests.
 */

import { randomUUID } from 'node:crypto';
import { serve } from '@hono/node-server';
import { createRouter } from './api/router.js';
import { getProductionContainer } from './container.production.js';
import { loadConfig } from './config.js';

const REQUEST_ID = /^[\w.-]{1,64}$/;

const config = loadConfig();
const container = getProductionContainer();
const router = createRouter(container);

const server = serve(
  {
    fetch: (req: Request) => {
      const incoming = req.headers.get('x-request-id');
      const requestId = incoming && REQUEST_ID.test(incoming) ? incoming : randomUUID();
      return router.handle(req, { requestId });
    },
    port: config.PORT,
  },
  (info) => {
    container.logProvider.info('Server listening', { port: info.port });
  }
);

async function shutdown(signal: string): Promise<void> {
  container.logProvider.info('Shutting down', { signal });
  server.close();
  await Promise.all([container.metrics.flush(), container.logProvider.flush()]);
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    void shutdown(signal);
  });
}
