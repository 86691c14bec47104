/**
 * Engine Error Taxonomy
 *
 * Every failure the engine raises on purpose is an EngineError carrying a
 * `kind`. The kind decides how far the error travels:
 *
 * - 'not_found': unknown session or catalog entry. Surfaced to the caller.
 * - 'validation': malformed prompt, empty instruction, bad input. Inside a turn
 *   these are replaced with a fallback; at the HTTP boundary they become 400s.
 * - 'external_service': decision or generation provider failed or timed out.
 *   Always replaced with a fallback inside a turn.
 * - 'internal': store failure. Aborts the current call; retrying the same
 *   eventId is safe because timeline appends are idempotent.
 * - 'cancelled': the caller aborted before anything was recorded.
 *
 * @example
 * ```typescript
 * try {
 *   await orchestrator.onEvent(sessionId, { text: 'hello' });
 * } catch (error) {
 *   if (error instanceof NotFoundError) {
 *     console.log(`${error.resource} ${error.id} does not exist`);
 *   }
 * }
 * ```
 */

export type EngineErrorKind =
  | 'not_found'
  | 'validation'
  | 'external_service'
  | 'internal'
  | 'cancelled';

/**
 * Base class for all errors raised by the engine.
 */
export class EngineError extends Error {
  /** Category used for propagation and HTTP mapping */
  readonly kind: EngineErrorKind;

  constructor(kind: EngineErrorKind, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'EngineError';
    this.kind = kind;
  }
}

/**
 * A session, catalog entry or template that does not exist.
 */
export class NotFoundError extends EngineError {
  readonly resource: string;
  readonly id: string;

  constructor(resource: string, id: string) {
    super('not_found', `${resource} '${id}' not found`);
    this.name = 'NotFoundError';
    this.resource = resource;
    this.id = id;
  }
}

export class ValidationError extends EngineError {
  constructor(message: string, cause?: unknown) {
    super('validation', message, cause);
    this.name = 'ValidationError';
  }
}

/**
 * A decision or generation provider failed, timed out or answered with
 * something unusable.
 */
export class ExternalServiceError extends EngineError {
  /** Which provider failed, e.g. 'director' or 'generator' */
  readonly service: string;

  constructor(service: string, message: string, cause?: unknown) {
    super('external_service', message, cause);
    this.name = 'ExternalServiceError';
    this.service = service;
  }
}

export class InternalError extends EngineError {
  constructor(message: string, cause?: unknown) {
    super('internal', message, cause);
    this.name = 'InternalError';
  }
}

export class CancelledError extends EngineError {
  constructor(message: string = 'Operation cancelled before any event was recorded') {
    super('cancelled', message);
    this.name = 'CancelledError';
  }
}

/**
 * Wraps an unknown store failure into an InternalError, leaving engine
 * errors (such as NotFoundError) untouched.
 */
export function toStoreError(operation: string, error: unknown): EngineError {
  if (error instanceof EngineError) {
    return error;
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new InternalError(`Store failure during ${operation}: ${reason}`, error);
}
