/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, isExpectedError } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { callerMiddleware, DEFAULT_CALLER_HEADER } from "./caller.js";
export { parseBody, parseQuery, parseParam } from "./validate.js";
export {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
  IDEMPOTENCY_HEADER,
  IDEMPOTENT_REPLAY_HEADER,
} from "./idempotency.js";
export type {
  IdempotencyStore,
  CachedResponse,
  InMemoryIdempotencyStoreOptions,
} from "./idempotency.js";
