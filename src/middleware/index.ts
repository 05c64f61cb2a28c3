export { validateApiKey, type AuthErrorResponse } from './auth.js';
export {
  errorHandler,
  asyncHandler,
  ApiError,
  toApiError,
} from './errorHandler.js';
export { requestLogger, getRequestId } from './requestLogger.js';
export { validateRequest, parseOrThrow } from './validateRequest.js';
