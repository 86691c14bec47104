/**
 * API Module - Barrel Export
 *
 * The HTTP surface of the engine, built on Hono.
 *
 * @example
 * ```typescript
 * import { createApp } from '@/api';
 *
 * const app = createApp(await createRuntime(config));
 * ```
 */

export { createApp, type AppOptions } from './app';

export {
  errorHandler,
  fromEngineError,
  validationError,
  AppError,
  ErrorCodes,
  loggerMiddleware,
  parseJsonBody,
  type ErrorCode,
  type LoggerConfig,
} from './middleware';

export { createApiRouter, healthRoutes, entriesRoutes, sessionsRoutes, type ApiDependencies } from './routes';

export {
  startSessionSchema,
  inboundEventSchema,
  assistantTextSchema,
  type ApiResponse,
  type ApiError,
  type ApiErrorResponse,
  type ApiResult,
  type ValidationErrorDetail,
  type StartSessionBody,
  type InboundEventBody,
  type AssistantTextBody,
} from './types';

export { success, error, notFound } from './utils/response';
