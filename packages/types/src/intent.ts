/**
 * Intent Types
 *
 * An Intent is one logical action (open/close a position) that must produce
 * at most one effective on-chain transaction. It is registered once under a
 * caller-supplied key and then driven through its lifecycle by the
 * Allocator, Broadcaster and Reconciler.
 */

/**
 * Lifecycle states of an Intent.
 *
 * CONFIRMED and FAILED are terminal. REPLACED is transient: it is accepted
 * on rows written by older writers and always resolves to SENT, CONFIRMED
 * or FAILED.
 */
export type IntentStatus =
  | "CREATED"
  | "ALLOCATED"
  | "SENT"
  | "CONFIRMED"
  | "FAILED"
  | "REPLACED";

/** Free-form caller metadata, stored as canonical JSON. */
export type IntentMetadata = Readonly<Record<string, unknown>>;

export interface Intent {
  /** Surrogate key assigned by the store */
  readonly id: number;

  /** Caller-supplied idempotency key (globally unique, opaque) */
  readonly intentKey: string;

  readonly status: IntentStatus;

  /** ISO 8601 */
  readonly createdAt: string;

  /** ISO 8601, bumped on every status or metadata write */
  readonly updatedAt: string;

  readonly metadata: IntentMetadata;
}

/**
 * Status view returned to callers. Raw RPC or crypto errors never appear
 * here; `reason` is the human-readable cause recorded on failure.
 */
export interface IntentStatusView {
  readonly id: number;
  readonly intentKey: string;
  readonly status: IntentStatus;
  readonly txHash: string | null;
  readonly reason: string | null;
  readonly sendCount: number;
  readonly createdAt: string;
  readonly updatedAt: string;
}
