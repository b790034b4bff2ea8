/**
 * @txrelay/pipeline — Error types.
 *
 * Every class carries a string `code`. Raw RPC and crypto errors stay in
 * `cause` and in the logs; only the messages here reach callers.
 */

import type { FeeParams } from "@txrelay/types";

export type PipelineErrorCode =
  | "GAS_ESTIMATION_FAILED"
  | "NONCE_CONFLICT"
  | "UNDERPRICED_REPLACEMENT"
  | "BROADCAST_REJECTED"
  | "RECEIPT_TIMEOUT"
  | "RPC_TIMEOUT"
  | "NO_LIVE_SEND"
  | "NOT_REPLACEABLE"
  | "CHAIN_MISMATCH"
  | "INVALID_REQUEST";

export class PipelineError extends Error {
  public readonly code: PipelineErrorCode;
  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.code = code;
  }
}

export class GasEstimationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("GAS_ESTIMATION_FAILED", message, options);
    this.name = "GasEstimationError";
  }
}

export class NonceConflictError extends PipelineError {
  constructor(
    public readonly intentId: number,
    public readonly nonce: number,
    message: string,
  ) {
    super("NONCE_CONFLICT", message);
    this.name = "NonceConflictError";
  }
}

/**
 * Replacement fees would not clear the node's minimum bump.
 */
export class UnderpricedReplacementError extends PipelineError {
  constructor(
    public readonly required: FeeParams,
    public readonly offered: FeeParams,
    options?: { cause?: unknown },
  ) {
    super(
      "UNDERPRICED_REPLACEMENT",
      `Replacement fees ${offered.maxFeePerGas}/${offered.maxPriorityFeePerGas} are below the required ${required.maxFeePerGas}/${required.maxPriorityFeePerGas}`,
      options,
    );
    this.name = "UnderpricedReplacementError";
  }
}

export type BroadcastRejectionKind =
  | "already-known"
  | "nonce-too-low"
  | "replacement-underpriced"
  | "underpriced"
  | "transient"
  | "rejected";

export class BroadcastRejectedError extends PipelineError {
  constructor(
    public readonly kind: BroadcastRejectionKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super("BROADCAST_REJECTED", message, options);
    this.name = "BroadcastRejectedError";
  }
}

export class ReceiptTimeoutError extends PipelineError {
  constructor(
    public readonly intentId: number,
    public readonly replacements: number,
  ) {
    super(
      "RECEIPT_TIMEOUT",
      `No receipt for intent ${intentId} after ${replacements} fee-bumped replacements`,
    );
    this.name = "ReceiptTimeoutError";
  }
}

export class RpcTimeoutError extends PipelineError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super("RPC_TIMEOUT", `${operation} timed out after ${timeoutMs}ms`);
    this.name = "RpcTimeoutError";
  }
}
