/**
 * Request Logging Middleware
 *
 * Logs one line per request with method, path, status and elapsed time:
 *
 *   [API] POST    /api/sessions/sess_1/events 200 - 12ms
 *
 * Output is colorized outside production. Health checks are skipped.
 */

import type { MiddlewareHandler } from 'hono';

export interface LoggerConfig {
  prefix: string;
  /** Path prefixes that are not logged */
  skipPaths: string[];
  colorize: boolean;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  prefix: '[API]',
  skipPaths: ['/health'],
  colorize: process.env.NODE_ENV !== 'production',
};

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

function statusColor(status: number): string {
  if (status >= 500) return '\x1b[31m';
  if (status >= 400) return '\x1b[33m';
  if (status >= 300) return '\x1b[36m';
  return '\x1b[32m';
}

function formatElapsed(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(2)}s`;
}

export function loggerMiddleware(config: Partial<LoggerConfig> = {}): MiddlewareHandler {
  const { prefix, skipPaths, colorize } = { ...DEFAULT_LOGGER_CONFIG, ...config };

  return async (c, next) => {
    const path = c.req.path;
    if (skipPaths.some((skip) => path.startsWith(skip))) {
      return next();
    }

    const startTime = performance.now();
    await next();
    const elapsed = formatElapsed(Math.round(performance.now() - startTime));

    const method = c.req.method.padEnd(7);
    const status = c.res.status;

    console.log(
      colorize
        ? `${prefix} ${method} ${path} ${statusColor(status)}${status}${RESET} - ${DIM}${elapsed}${RESET}`
        : `${prefix} ${method} ${path} ${status} - ${elapsed}`
    );
  };
}
