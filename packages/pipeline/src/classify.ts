/**
 * @txrelay/pipeline — Chain error classification.
 *
 * Nodes report broadcast failures as free text, and clients wrap them in
 * several layers of error (viem nests the node message under `cause` and
 * `details`). Classification walks that chain and matches known phrases.
 */

import { BroadcastRejectedError, RpcTimeoutError } from "./errors.js";
import type { BroadcastRejectionKind } from "./errors.js";

const MAX_CAUSE_DEPTH = 6;

const ALREADY_KNOWN_PATTERNS = [
  "already known",
  "known transaction",
  "already imported",
  "alreadyknown",
  "transaction already exists",
];

const NONCE_TOO_LOW_PATTERNS = [
  "nonce too low",
  "nonce is too low",
  "nonce has already been used",
  "invalid transaction nonce",
];

/** Another transaction holds the nonce and the new one does not outbid it. */
const REPLACEMENT_UNDERPRICED_PATTERNS = [
  "replacement transaction underpriced",
  "replacement fee too low",
];

/** Fees below the node's own minimum, whatever holds the nonce. */
const UNDERPRICED_PATTERNS = [
  "transaction underpriced",
  "underpriced",
];

const TRANSIENT_PATTERNS = [
  "timeout",
  "timed out",
  "econnreset",
  "econnrefused",
  "etimedout",
  "socket hang up",
  "fetch failed",
  "network error",
  "too many requests",
  "rate limit",
  "service unavailable",
  "bad gateway",
  "gateway timeout",
  "header not found",
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

/** Every message, short message and details string along the cause chain. */
export function errorText(err: unknown): string {
  const parts: string[] = [];
  let current: unknown = err;

  for (let depth = 0; depth < MAX_CAUSE_DEPTH && current !== undefined; depth++) {
    if (typeof current === "string") {
      parts.push(current);
      break;
    }
    if (!isRecord(current)) break;

    for (const field of ["message", "shortMessage", "details"]) {
      const value = current[field];
      if (typeof value === "string") parts.push(value);
    }
    current = current["cause"];
  }

  return parts.join(" | ").toLowerCase();
}

function httpStatus(err: unknown): number | undefined {
  let current: unknown = err;
  for (let depth = 0; depth < MAX_CAUSE_DEPTH && isRecord(current); depth++) {
    const status = current["status"];
    if (typeof status === "number") return status;
    current = current["cause"];
  }
  return undefined;
}

function matches(text: string, patterns: readonly string[]): boolean {
  return patterns.some((p) => text.includes(p));
}

/**
 * Whether a failed chain call is worth retrying: timeouts, connection
 * errors, 429 and 5xx. A classified broadcast failure is retried only when
 * it was classified transient.
 */
export function isTransientRpcError(err: unknown): boolean {
  if (err instanceof BroadcastRejectedError) return err.kind === "transient";
  if (err instanceof RpcTimeoutError) return true;

  const status = httpStatus(err);
  if (status !== undefined && (status === 429 || status >= 500)) return true;

  return matches(errorText(err), TRANSIENT_PATTERNS);
}

/**
 * Classify a raw-transaction submit failure.
 */
export function classifyBroadcastError(err: unknown): BroadcastRejectionKind {
  const text = errorText(err);

  if (matches(text, ALREADY_KNOWN_PATTERNS)) return "already-known";
  if (matches(text, NONCE_TOO_LOW_PATTERNS)) return "nonce-too-low";
  if (matches(text, REPLACEMENT_UNDERPRICED_PATTERNS)) return "replacement-underpriced";
  if (matches(text, UNDERPRICED_PATTERNS)) return "underpriced";
  if (isTransientRpcError(err)) return "transient";
  return "rejected";
}

const REJECTION_REASONS: readonly (readonly [string, string])[] = [
  ["insufficient funds", "Insufficient funds for gas and value"],
  ["intrinsic gas too low", "Gas limit is below the intrinsic cost"],
  ["exceeds block gas limit", "Gas limit exceeds the block gas limit"],
  ["max fee per gas less than block base fee", "Max fee is below the block base fee"],
  ["fee cap less than block base fee", "Max fee is below the block base fee"],
  ["tip higher than fee cap", "Priority fee exceeds max fee"],
  ["invalid chain id", "Transaction signed for the wrong chain"],
  ["invalid sender", "Transaction signature is invalid"],
];

/**
 * Human-readable reason for a rejected submit. Node text is matched
 * against known phrases and never passed through.
 */
export function describeRejection(err: unknown): string {
  const text = errorText(err);
  const known = REJECTION_REASONS.find(([pattern]) => text.includes(pattern));
  return known ? known[1] : "Transaction rejected by the node";
}
