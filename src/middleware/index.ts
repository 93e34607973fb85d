export { pipeline } from './pipeline.js';
export type { Handler, HandlerContext, Middleware } from './pipeline.js';
export { errorHandler } from './error-handler.js';
export { validateBody } from './validate-body.js';
export { bodyLimit } from './body-limit.js';
export { annotate, createLoggingMiddleware } from './logging.js';
