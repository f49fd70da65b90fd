/**
 * Middleware Exports
 */

// Error handling
export { errorHandler, notFoundHandler, ApiError, asyncHandler, AppError } from './errorHandler';

// Request validation
export { validateRequest } from './validateRequest';

// Rate limiting
export { globalLimiter, orderLimiter } from './rateLimiter';
