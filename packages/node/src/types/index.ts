/**
 * Type barrel - re-exports all public types from @streamledger/node.
 */

// DTOs
export {
  AmountSchema,
  AccountIdSchema,
  UnixSecondsSchema,
  StreamIdParamSchema,
  DepositSchema,
  CreateStreamSchema,
  WithdrawSchema,
  ListStreamsQuerySchema,
} from "./dto.js";
export type {
  DepositDto,
  CreateStreamDto,
  WithdrawDto,
  ListStreamsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope, ApiError } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Auth
export type { AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
