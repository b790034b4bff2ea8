/**
 * Type barrel — re-exports all public types from @txrelay/node.
 */

// DTOs
export {
  BuiltCallSchema,
  SubmitIntentSchema,
  ImportWalletSchema,
  IntentIdSchema,
  toSendDto,
} from "./dto.js";
export type { SubmitIntentDto, ImportWalletDto, SendDto } from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
