/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, createErrorHandler } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware, pinoRequestLog } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export {
  validateBody,
  validateQuery,
  formatZodErrors,
  RequestValidationError,
} from "./validate.js";
export type { ValidationIssue } from "./validate.js";
export { authMiddleware, requirePermission, verifyJwt, signJwt } from "./auth.js";
export type { AuthConfig } from "./auth.js";
