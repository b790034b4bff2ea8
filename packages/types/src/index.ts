/**
 * @txrelay/types — Shared domain types for the txrelay stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Wei amounts are bigint
 */

// Intent types
export type {
  Intent,
  IntentStatus,
  IntentMetadata,
  IntentStatusView,
} from "./intent.js";

// Chain types
export type {
  HexString,
  ChainId,
  TxHash,
  FeeParams,
  BuiltCall,
  Allocation,
  Send,
  NewSend,
  Receipt,
} from "./chain.js";

// Key material
export type { WalletRecord, ApiCredentialRecord } from "./keys.js";

// Runtime type guards
export {
  isIntentStatus,
  isTerminalStatus,
  isIntent,
  isHexString,
  isAddress,
  isFeeParams,
  isBuiltCall,
} from "./guards.js";
