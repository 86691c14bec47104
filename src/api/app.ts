/**
 * Hono Application Factory
 *
 * Builds the HTTP application around an already-wired runtime, so tests can
 * drive it with `app.request()` and in-memory stores.
 *
 * Middleware and handlers, in order:
 * 1. Logger - one line per request with timing
 * 2. Routes - /health at the root, everything else under /api
 * 3. Error Handler - registered with onError, maps engine errors to statuses
 * 4. 404 Handler - unmatched routes
 *
 * @example
 * ```typescript
 * const runtime = await createRuntime(config);
 * const app = createApp(runtime);
 * const res = await app.request('/api/entries');
 * ```
 */

import { Hono } from 'hono';
import { errorHandler, loggerMiddleware, type LoggerConfig } from './middleware';
import { createApiRouter, healthRoutes, type ApiDependencies } from './routes';
import { notFound } from './utils/response';

export interface AppOptions {
  logger?: Partial<LoggerConfig>;
}

export function createApp(deps: ApiDependencies, options: AppOptions = {}): Hono {
  const app = new Hono();

  app.use('*', loggerMiddleware(options.logger));

  app.route('/health', healthRoutes());
  app.route('/api', createApiRouter(deps));

  app.onError(errorHandler());
  app.notFound((c) => notFound(c));

  return app;
}
