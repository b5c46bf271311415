/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, mapError, zodFieldErrors } from "./error-handler.js";
export type { ErrorHandlerOptions, ErrorStatus } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { jsonBody, queryOf, paramsOf } from "./validate.js";
export {
  authMiddleware,
  actingUserMiddleware,
  verifyJwt,
  signJwt,
  USER_ID_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
