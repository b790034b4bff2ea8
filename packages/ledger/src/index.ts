/**
 * @txrelay/ledger — Exactly-once intent registration and lifecycle.
 */

export {
  IntentLedger,
  VALID_TRANSITIONS,
  MAX_INTENT_KEY_LENGTH,
  canTransition,
} from "./intent-ledger.js";
export type { IntentLedgerOptions } from "./intent-ledger.js";

export {
  LedgerError,
  DuplicateIntentError,
  InvalidTransitionError,
  IntentNotFoundError,
} from "./errors.js";
export type { LedgerErrorCode } from "./errors.js";
