/**
 * API Response Utilities
 *
 * Helpers that wrap data in the `{ success, data }` envelope so every
 * endpoint answers in the same shape.
 *
 * @example
 * ```typescript
 * router.get('/:id', async (c) => {
 *   return success(c, await orchestrator.getSession(c.req.param('id')));
 * });
 * ```
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ApiErrorResponse, ApiResponse } from '../types';

export function success<T>(c: Context, data: T, statusCode: ContentfulStatusCode = 200): Response {
  const response: ApiResponse<T> = {
    success: true,
    data,
  };
  return c.json(response, statusCode);
}

export function error(
  c: Context,
  code: string,
  message: string,
  statusCode: ContentfulStatusCode = 400,
  details?: unknown
): Response {
  const response: ApiErrorResponse = {
    success: false,
    error: {
      code,
      message,
      ...(details !== undefined && { details }),
    },
  };
  return c.json(response, statusCode);
}

/**
 * 404 for an unmatched route.
 */
export function notFound(c: Context, message: string = `Route ${c.req.method} ${c.req.path} not found`): Response {
  return error(c, 'NOT_FOUND', message, 404);
}
