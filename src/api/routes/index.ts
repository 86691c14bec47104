/**
 * API Routes - Barrel Export and Router Factory
 *
 * Mounts the resource routers under /api:
 *
 * - /api          - API info
 * - /api/entries  - Entry catalog
 * - /api/sessions - Sessions and turns
 *
 * The health route is mounted at the root by the app, outside /api.
 */

import { Hono } from 'hono';
import type { Runtime } from '@/bootstrap';
import { success } from '../utils/response';
import { entriesRoutes } from './entries';
import { APP_VERSION } from './health';
import { sessionsRoutes } from './sessions';

export { healthRoutes, APP_VERSION, type HealthCheckData } from './health';
export { entriesRoutes } from './entries';
export { sessionsRoutes } from './sessions';

export interface ApiInfo {
  name: string;
  version: string;
  endpoints: { path: string; description: string }[];
}

export type ApiDependencies = Pick<Runtime, 'orchestrator' | 'catalog'>;

export function createApiRouter(deps: ApiDependencies): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const info: ApiInfo = {
      name: 'Dialogue Director API',
      version: APP_VERSION,
      endpoints: [
        { path: '/api/entries', description: 'Topics a session can be started on' },
        { path: '/api/sessions', description: 'Sessions, turns and timelines' },
      ],
    };
    return success(c, info);
  });

  router.route('/entries', entriesRoutes(deps.catalog));
  router.route('/sessions', sessionsRoutes(deps.orchestrator));

  return router;
}
