/**
 * API Middleware - Barrel Export
 */

export {
  errorHandler,
  fromEngineError,
  validationError,
  AppError,
  ErrorCodes,
  CLIENT_CLOSED_REQUEST,
  type ErrorCode,
} from './error-handler';

export { loggerMiddleware, DEFAULT_LOGGER_CONFIG, type LoggerConfig } from './logger';

export { parseJsonBody, type ParseBodyOptions } from './validate';
