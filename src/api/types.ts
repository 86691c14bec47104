/**
 * API Types and Request Schemas
 *
 * Response envelope types shared by every endpoint, and the Zod schemas
 * that validate request bodies at the HTTP boundary.
 *
 * @example
 * ```typescript
 * import { inboundEventSchema, type InboundEventBody } from '@/api/types';
 *
 * const result = inboundEventSchema.safeParse(await c.req.json());
 * if (result.success) {
 *   await orchestrator.onEvent(sessionId, result.data);
 * }
 * ```
 */

import { z } from 'zod';
import { ENGINE_EVENT_TYPES, isEngineEventType } from '@/core/models';

// ============================================================================
// Response Envelope
// ============================================================================

export interface ApiResponse<T> {
  success: true;
  data: T;
}

export interface ApiError {
  code: string;
  message: string;
  details?: unknown;
}

export interface ApiErrorResponse {
  success: false;
  error: ApiError;
}

export type ApiResult<T> = ApiResponse<T> | ApiErrorResponse;

/**
 * One field-level validation failure.
 */
export interface ValidationErrorDetail {
  /** Dot-separated path of the offending field ('' for the body itself) */
  path: string;
  message: string;
}

// ============================================================================
// Request Schemas
// ============================================================================

/**
 * POST /api/sessions
 */
export const startSessionSchema = z.object({
  entryId: z.string().min(1, 'entryId is required'),
});

/**
 * POST /api/sessions/:id/events
 *
 * Everything is optional; the engine fills in the type and timestamps.
 * Timestamps arrive as ISO 8601 strings.
 */
export const inboundEventSchema = z.object({
  type: z
    .string()
    .min(1)
    .refine((type) => !isEngineEventType(type), {
      message: `type must not be one of ${ENGINE_EVENT_TYPES.join(', ')}`,
    })
    .optional(),
  text: z.string().optional(),
  questionId: z.string().min(1).optional(),
  answer: z.string().optional(),
  clientTimestamp: z
    .string()
    .datetime({ offset: true })
    .transform((value) => new Date(value))
    .optional(),
  eventId: z.string().min(1).optional(),
  turnId: z.string().min(1).optional(),
});

/**
 * POST /api/sessions/:id/assistant-text
 */
export const assistantTextSchema = z.object({
  text: z.string().min(1, 'text is required'),
  role: z.string().min(1).optional(),
});

export type StartSessionBody = z.infer<typeof startSessionSchema>;
export type InboundEventBody = z.infer<typeof inboundEventSchema>;
export type AssistantTextBody = z.infer<typeof assistantTextSchema>;
