/**
 * Middleware exports
 */

export {
  errorHandler,
  statusForRecoveryError,
  ApiError,
  badRequest,
  unauthorized,
} from './error-handler.js';
export { createApiKeyAuth, callerIdentity, API_KEY_HEADER, IDENTITY_HEADER } from './auth.js';
