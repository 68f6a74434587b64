/**
 * Shared Package - Main Export
 */

// Config
export * from './config/errorHandler';
export * from './config/configLoader';
export * from './config/global-env';
export * from './config/logger';

// Database connections
export * from './databases/index';

// Middlewares
export * from './middlewares/correlationId';
export * from './middlewares/healthChecks';
export * from './middlewares/requestLogger';
export { globalErrorHandler, toErrorResponse } from './middlewares/globalErrorHandler';

// Utils
export * from './utils/responseBuilder';
export * from './utils/tokenManager';
export { asyncHandler } from './utils/asyncHandler';

export { default as logger } from './config/logger';
