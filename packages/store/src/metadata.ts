/**
 * Metadata serialization.
 *
 * Intent metadata is stored as RFC 8785 canonical JSON, so two writes of
 * the same object always produce the same bytes.
 */

import { canonicalize } from "json-canonicalize";
import type { IntentMetadata } from "@txrelay/types";
import { StoreError } from "./types.js";

export function encodeMetadata(metadata: IntentMetadata): string {
  return canonicalize(metadata);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function decodeMetadata(raw: string): IntentMetadata {
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new StoreError("CORRUPT_ROW", "Intent metadata is not a JSON object");
  }
  return Object.freeze(parsed);
}
