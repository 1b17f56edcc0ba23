/**
 * Type barrel — re-exports all public types from @coffer/node.
 */

// DTOs
export {
  AmountSchema,
  PaginationQuerySchema,
  VaultIdParamSchema,
  DepositSchema,
  WithdrawSchema,
  ListEventsQuerySchema,
  ListVaultEventsQuerySchema,
} from "./dto.js";
export type {
  DepositDto,
  WithdrawDto,
  ListEventsQuery,
  ListVaultEventsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope, RequestValidationError } from "./error.js";
export type {
  ApiErrorCode,
  ErrorDetail,
  ErrorEnvelope,
  ValidationIssue,
} from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// App env
export type { AppEnv } from "./api-contract.js";
