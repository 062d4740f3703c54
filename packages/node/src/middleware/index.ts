/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, mapError } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, validateQuery } from "./validate.js";
export {
  authMiddleware,
  actorHeaderMiddleware,
  API_KEY_HEADER,
  ACTOR_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
