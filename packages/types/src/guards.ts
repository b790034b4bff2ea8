/**
 * Runtime Type Guards
 *
 * Narrowing functions for txrelay domain types, used at system boundaries
 * (API inputs, rows read back from storage).
 */

import type { Intent, IntentStatus } from "./intent.js";
import type { BuiltCall, FeeParams, HexString } from "./chain.js";

// =============================================================================
// Intent guards
// =============================================================================

const INTENT_STATUSES = new Set<string>([
  "CREATED", "ALLOCATED", "SENT", "CONFIRMED", "FAILED", "REPLACED",
]);

const TERMINAL = new Set<string>(["CONFIRMED", "FAILED"]);

export function isIntentStatus(value: unknown): value is IntentStatus {
  return typeof value === "string" && INTENT_STATUSES.has(value);
}

export function isTerminalStatus(status: IntentStatus): boolean {
  return TERMINAL.has(status);
}

export function isIntent(value: unknown): value is Intent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "number" &&
    Number.isInteger(v.id) &&
    typeof v.intentKey === "string" &&
    v.intentKey.length > 0 &&
    isIntentStatus(v.status) &&
    typeof v.createdAt === "string" &&
    typeof v.updatedAt === "string" &&
    v.metadata !== null &&
    typeof v.metadata === "object"
  );
}

// =============================================================================
// Chain guards
// =============================================================================

const HEX_RE = /^0x[0-9a-fA-F]*$/;
const ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;

export function isHexString(value: unknown): value is HexString {
  return typeof value === "string" && HEX_RE.test(value);
}

export function isAddress(value: unknown): value is HexString {
  return typeof value === "string" && ADDRESS_RE.test(value);
}

export function isFeeParams(value: unknown): value is FeeParams {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.maxFeePerGas === "bigint" &&
    typeof v.maxPriorityFeePerGas === "bigint" &&
    v.maxFeePerGas >= 0n &&
    v.maxPriorityFeePerGas >= 0n &&
    v.maxPriorityFeePerGas <= v.maxFeePerGas
  );
}

export function isBuiltCall(value: unknown): value is BuiltCall {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.chainId === "number" &&
    Number.isInteger(v.chainId) &&
    v.chainId > 0 &&
    isAddress(v.to) &&
    isHexString(v.data) &&
    typeof v.value === "bigint" &&
    v.value >= 0n &&
    (v.gasLimit === undefined || (typeof v.gasLimit === "bigint" && v.gasLimit > 0n))
  );
}
