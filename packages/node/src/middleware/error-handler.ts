/**
 * Global error handler.
 *
 * Maps coded domain errors (ledger, pipeline, vault, store) to HTTP status
 * codes and a consistent error envelope. Anything without a mapped code is
 * a 500 whose message never leaves the process.
 */

import type { ErrorHandler } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import pino from "pino";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Request shape
  INVALID_REQUEST: 400,
  INVALID_INTENT_KEY: 400,
  CHAIN_MISMATCH: 400,
  INVALID_PRIVATE_KEY: 400,

  // Ledger
  INTENT_NOT_FOUND: 404,
  DUPLICATE_INTENT: 409,
  INVALID_TRANSITION: 409,
  SEND_NOT_LIVE: 409,
  NOT_AN_ANCESTOR: 409,

  // Pipeline
  NO_LIVE_SEND: 409,
  NOT_REPLACEABLE: 409,
  NONCE_CONFLICT: 409,
  UNDERPRICED_REPLACEMENT: 409,
  GAS_ESTIMATION_FAILED: 422,
  BROADCAST_REJECTED: 502,
  RETRY_EXHAUSTED: 503,
  RPC_TIMEOUT: 504,

  // Vault
  WALLET_NOT_FOUND: 404,
};

/** Codes whose error message may embed upstream text. */
const FIXED_MESSAGES: Readonly<Record<string, string>> = {
  RETRY_EXHAUSTED: "Chain node unavailable",
};

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Create the handler registered as Hono's onError.
 */
export function createErrorHandler(
  logger: Logger = pino({ level: "silent" }),
): ErrorHandler<AppEnv> {
  return (err, c) => {
    const code = errorCode(err);
    const status = code !== undefined ? STATUS_MAP[code] : undefined;

    if (code === undefined || status === undefined) {
      logger.error({ err, requestId: c.get("requestId") }, "Unhandled error");
      return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
    }

    const message = FIXED_MESSAGES[code] ?? err.message;
    return c.json(createErrorEnvelope(code, message), status);
  };
}
