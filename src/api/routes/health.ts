/**
 * Health Check Route
 *
 * Lightweight liveness endpoint for load balancers and uptime monitors. It
 * does not touch the stores.
 *
 * @example
 * ```bash
 * curl http://localhost:3000/health
 * # { "success": true, "data": { "status": "ok", "timestamp": "...", "environment": "development", "version": "0.1.0" } }
 * ```
 */

import { Hono } from 'hono';
import { success } from '../utils/response';

export interface HealthCheckData {
  status: 'ok';
  /** ISO 8601 timestamp of the check */
  timestamp: string;
  environment: string;
  version: string;
}

/** Should match package.json */
export const APP_VERSION = '0.1.0';

export function healthRoutes(): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const data: HealthCheckData = {
      status: 'ok',
      timestamp: new Date().toISOString(),
      environment: process.env.NODE_ENV || 'development',
      version: APP_VERSION,
    };
    return success(c, data);
  });

  return router;
}
