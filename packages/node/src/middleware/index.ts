/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, CATEGORY_STATUS } from "./error-handler.js";
export type { UnexpectedErrorCallback } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, formatZodIssues } from "./validate.js";
export type { ValidatedBodyEnv } from "./validate.js";
export {
  authMiddleware,
  callerHeaderMiddleware,
  API_KEY_HEADER,
  CALLER_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
