/**
 * Global Error Handler
 *
 * Turns every error that escapes a route into the standard JSON envelope:
 *
 * ```json
 * {
 *   "success": false,
 *   "error": {
 *     "code": "ERROR_CODE",
 *     "message": "Human-readable error message",
 *     "details": { ... } // Optional additional context
 *   }
 * }
 * ```
 *
 * Engine errors are mapped by kind: not_found → 404, validation → 400,
 * external_service → 502, internal → 500, cancelled → 499.
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.onError(errorHandler());
 *
 * app.get('/protected', () => {
 *   throw new AppError(ErrorCodes.BAD_REQUEST, 'Missing header', 400);
 * });
 * ```
 */

import type { ErrorHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { EngineError, NotFoundError, type EngineErrorKind } from '@/core/errors';
import type { ApiErrorResponse } from '../types';

/**
 * Standard error codes used throughout the API.
 */
export const ErrorCodes = {
  // Client errors (4xx)
  BAD_REQUEST: 'BAD_REQUEST',
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_JSON: 'INVALID_JSON',
  CANCELLED: 'CANCELLED',

  // Server errors (5xx)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  EXTERNAL_SERVICE_ERROR: 'EXTERNAL_SERVICE_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/** Non-standard status for requests the client abandoned */
export const CLIENT_CLOSED_REQUEST = 499;

/**
 * Custom application error class for throwing controlled errors.
 *
 * @example
 * ```typescript
 * throw new AppError('VALIDATION_ERROR', 'Invalid request body', 400, details);
 * ```
 */
export class AppError extends Error {
  /** Machine-readable error code */
  public readonly code: ErrorCode | string;
  public readonly statusCode: ContentfulStatusCode;
  public readonly details?: unknown;

  constructor(
    code: ErrorCode | string,
    message: string,
    statusCode: ContentfulStatusCode = 500,
    details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

const ENGINE_ERROR_MAPPING: Record<
  Exclude<EngineErrorKind, 'cancelled'>,
  { code: ErrorCode; status: ContentfulStatusCode }
> = {
  not_found: { code: ErrorCodes.NOT_FOUND, status: 404 },
  validation: { code: ErrorCodes.VALIDATION_ERROR, status: 400 },
  external_service: { code: ErrorCodes.EXTERNAL_SERVICE_ERROR, status: 502 },
  internal: { code: ErrorCodes.INTERNAL_ERROR, status: 500 },
};

/**
 * Converts an engine error to an AppError. Internal failures keep their
 * message out of production responses.
 */
export function fromEngineError(error: EngineError): AppError {
  if (error instanceof NotFoundError) {
    return new AppError(ErrorCodes.NOT_FOUND, error.message, 404, {
      resource: error.resource,
      id: error.id,
    });
  }

  const kind = error.kind === 'cancelled' ? 'internal' : error.kind;
  const { code, status } = ENGINE_ERROR_MAPPING[kind];
  const message =
    kind === 'internal' && process.env.NODE_ENV === 'production'
      ? 'An unexpected error occurred. Please try again.'
      : error.message;
  return new AppError(code, message, status);
}

function formatErrorResponse(error: unknown): { response: ApiErrorResponse; statusCode: ContentfulStatusCode } {
  const appError =
    error instanceof AppError ? error : error instanceof EngineError ? fromEngineError(error) : null;

  if (appError) {
    return {
      response: {
        success: false,
        error: {
          code: appError.code,
          message: appError.message,
          ...(appError.details !== undefined && { details: appError.details }),
        },
      },
      statusCode: appError.statusCode,
    };
  }

  const isDev = process.env.NODE_ENV !== 'production';
  return {
    response: {
      success: false,
      error: {
        code: ErrorCodes.INTERNAL_ERROR,
        message:
          isDev && error instanceof Error ? error.message : 'An unexpected error occurred. Please try again.',
      },
    },
    statusCode: 500,
  };
}

/**
 * Creates the handler registered with `app.onError`.
 */
export function errorHandler(): ErrorHandler {
  return (error, c) => {
    if (error instanceof EngineError && error.kind === 'cancelled') {
      console.warn(`[API] ${c.req.method} ${c.req.path} cancelled: ${error.message}`);
      const body: ApiErrorResponse = {
        success: false,
        error: { code: ErrorCodes.CANCELLED, message: error.message },
      };
      // 499 is outside Hono's status union
      return new Response(JSON.stringify(body), {
        status: CLIENT_CLOSED_REQUEST,
        headers: { 'Content-Type': 'application/json' },
      });
    }

    const { response, statusCode } = formatErrorResponse(error);
    if (statusCode >= 500) {
      console.error(`[API] ${c.req.method} ${c.req.path} failed:`, error);
    }
    return c.json(response, statusCode);
  };
}

/**
 * Helper to create a validation error.
 *
 * @example
 * ```typescript
 * const result = schema.safeParse(input);
 * if (!result.success) {
 *   throw validationError('Invalid request body', details);
 * }
 * ```
 */
export function validationError(message: string, details?: unknown): AppError {
  return new AppError(ErrorCodes.VALIDATION_ERROR, message, 400, details);
}
