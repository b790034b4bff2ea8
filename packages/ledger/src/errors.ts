/**
 * @txrelay/ledger — Error types.
 */

import type { Intent, IntentStatus } from "@txrelay/types";

export type LedgerErrorCode =
  | "DUPLICATE_INTENT"
  | "INVALID_TRANSITION"
  | "INTENT_NOT_FOUND"
  | "INVALID_INTENT_KEY"
  | "SEND_NOT_LIVE"
  | "NOT_AN_ANCESTOR";

export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

/**
 * The intent key is already registered. Benign: carries the Intent that
 * won the insert.
 */
export class DuplicateIntentError extends LedgerError {
  public readonly existing: Intent;
  constructor(existing: Intent) {
    super("DUPLICATE_INTENT", `Intent '${existing.intentKey}' already exists`);
    this.name = "DuplicateIntentError";
    this.existing = existing;
  }
}

/**
 * A transition was illegal, or its expected prior status was stale. The
 * write was not applied.
 */
export class InvalidTransitionError extends LedgerError {
  public readonly intentId: number;
  public readonly from: IntentStatus;
  public readonly to: IntentStatus;
  public readonly actual: IntentStatus | undefined;

  constructor(
    intentId: number,
    from: IntentStatus,
    to: IntentStatus,
    actual?: IntentStatus,
  ) {
    super(
      "INVALID_TRANSITION",
      actual === undefined
        ? `Cannot transition intent ${intentId} from ${from} to ${to}`
        : `Cannot transition intent ${intentId} from ${from} to ${to}: status is ${actual}`,
    );
    this.name = "InvalidTransitionError";
    this.intentId = intentId;
    this.from = from;
    this.to = to;
    this.actual = actual;
  }
}

export class IntentNotFoundError extends LedgerError {
  constructor(ref: number | string) {
    super(
      "INTENT_NOT_FOUND",
      typeof ref === "number" ? `Intent ${ref} not found` : `Intent '${ref}' not found`,
    );
    this.name = "IntentNotFoundError";
  }
}
