/**
 * Middleware exports
 */

export { errorHandler, ApiError, notFound, unauthorized } from './error-handler.js';
export { createApiKeyAuth, type AuthHook } from './auth.js';
