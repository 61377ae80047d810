export { createErrorHandler, notFoundHandler, statusForKind, AppError } from './error-handler.js';
export { asyncHandler } from './async-wrapper.js';
