/**
 * Zod Request Body Validation
 *
 * Parses the JSON body and validates it against a schema, returning the
 * typed result. Failures are thrown as AppErrors, which the global error
 * handler renders:
 *
 * ```json
 * {
 *   "success": false,
 *   "error": {
 *     "code": "VALIDATION_ERROR",
 *     "message": "Invalid request body",
 *     "details": [{ "path": "entryId", "message": "entryId is required" }]
 *   }
 * }
 * ```
 *
 * @example
 * ```typescript
 * router.post('/', async (c) => {
 *   const body = await parseJsonBody(c, startSessionSchema);
 *   return success(c, await orchestrator.startSession(body.entryId), 201);
 * });
 * ```
 */

import type { Context } from 'hono';
import type { z } from 'zod';
import type { ValidationErrorDetail } from '../types';
import { AppError, ErrorCodes, validationError } from './error-handler';

export interface ParseBodyOptions {
  /** Treat an empty body as `{}` */
  allowEmpty?: boolean;
}

export async function parseJsonBody<T extends z.ZodTypeAny>(
  c: Context,
  schema: T,
  options: ParseBodyOptions = {}
): Promise<z.output<T>> {
  const raw = await c.req.text();

  let body: unknown = {};
  if (raw.trim() !== '' || !options.allowEmpty) {
    try {
      body = JSON.parse(raw);
    } catch (error) {
      throw new AppError(ErrorCodes.INVALID_JSON, 'Request body must be valid JSON', 400, {
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    const details: ValidationErrorDetail[] = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw validationError('Invalid request body', details);
  }
  return result.data;
}
