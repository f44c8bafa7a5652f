/**
 * Middleware barrel - re-exports all middleware.
 */

export { handleError, createErrorHandler, statusForError } from "./error-handler.js";
export type { InternalErrorReporter } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { readBody, readQuery, readParam } from "./validate.js";
export {
  identityMiddleware,
  requireCaller,
  buildAuthConfig,
  API_KEY_HEADER,
  ACCOUNT_ID_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
