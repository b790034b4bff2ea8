/**
 * @txrelay/store — Persistence for intents, sends, receipts and key material.
 */

export { StoreError } from "./types.js";
export type {
  StoreErrorCode,
  IntentRepository,
  AllocationRepository,
  SendRepository,
  ReceiptRepository,
  KeyMaterialRepository,
  TxStore,
} from "./types.js";

export { encodeMetadata, decodeMetadata } from "./metadata.js";
export { InMemoryTxStore } from "./in-memory-store.js";
export { SqliteTxStore, loadSchema } from "./sqlite-store.js";
