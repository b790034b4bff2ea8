/**
 * @txrelay/store — Repository contracts.
 *
 * One store holds the transaction pipeline tables and the encrypted key
 * material. All methods are synchronous: the SQLite driver is synchronous
 * and the in-memory store has nothing to wait on, so a `transaction()` body
 * can never interleave with another writer in the same process.
 *
 * Rules:
 * - `insertIntent` never throws on a duplicate key; it returns undefined
 * - Status writes are compare-and-set
 * - A Send's (signingAddress, chainId, nonce) is unique among non-replaced Sends
 */

import type {
  Allocation,
  ApiCredentialRecord,
  ChainId,
  HexString,
  Intent,
  IntentMetadata,
  IntentStatus,
  NewSend,
  Receipt,
  Send,
  TxHash,
  WalletRecord,
} from "@txrelay/types";

// =============================================================================
// Errors
// =============================================================================

export type StoreErrorCode =
  | "DUPLICATE_TX_HASH"
  | "NONCE_IN_USE"
  | "INTENT_NOT_FOUND"
  | "SEND_NOT_FOUND"
  | "CORRUPT_ROW";

export class StoreError extends Error {
  public readonly code: StoreErrorCode;
  constructor(code: StoreErrorCode, message: string) {
    super(message);
    this.name = "StoreError";
    this.code = code;
  }
}

// =============================================================================
// Repositories
// =============================================================================

export interface IntentRepository {
  /** Insert a new intent. Returns undefined when the key already exists. */
  insertIntent(intentKey: string, metadata: IntentMetadata, at: string): Intent | undefined;

  getIntent(id: number): Intent | undefined;

  getIntentByKey(intentKey: string): Intent | undefined;

  /** Apply `next` only if the stored status is still `expected`. */
  compareAndSetStatus(
    id: number,
    expected: IntentStatus,
    next: IntentStatus,
    at: string,
  ): boolean;

  updateIntentMetadata(id: number, metadata: IntentMetadata, at: string): void;

  /** Intents in any of `statuses`, oldest first, optionally created before `createdBefore`. */
  listIntents(
    statuses: readonly IntentStatus[],
    createdBefore?: string,
  ): readonly Intent[];
}

export interface AllocationRepository {
  /** Record (or overwrite, on reallocation) the allocation for an intent. */
  upsertAllocation(allocation: Allocation): void;

  getAllocation(intentId: number): Allocation | undefined;

  /**
   * Nonces at or above `fromNonce` that an address still holds: those of
   * Sends and Allocations whose intent is not FAILED. Ascending.
   */
  heldNonces(
    signingAddress: HexString,
    chainId: ChainId,
    fromNonce: number,
    excludeIntentId?: number,
  ): readonly number[];
}

export interface SendRepository {
  /**
   * @throws StoreError DUPLICATE_TX_HASH | NONCE_IN_USE
   */
  insertSend(send: NewSend): Send;

  getSend(txHash: TxHash): Send | undefined;

  /** All Sends for an intent, in insertion order. */
  listSends(intentId: number): readonly Send[];

  /** Set (or clear) the successor of a Send. */
  setReplacedBy(txHash: TxHash, replacedBy: TxHash | null): void;
}

export interface ReceiptRepository {
  /** Insert a receipt. Returns false when one already exists for the hash. */
  insertReceipt(receipt: Receipt): boolean;

  getReceipt(txHash: TxHash): Receipt | undefined;
}

/**
 * Encrypted key material. Wallet addresses compare case-insensitively.
 */
export interface KeyMaterialRepository {
  putWallet(record: WalletRecord): void;
  getWallet(address: HexString): WalletRecord | undefined;
  listWallets(): readonly WalletRecord[];

  /** Upsert on (userId, provider). */
  putCredential(record: ApiCredentialRecord): void;
  getCredential(userId: string, provider: string): ApiCredentialRecord | undefined;
  listCredentials(): readonly ApiCredentialRecord[];
  deleteCredential(userId: string, provider: string): boolean;
}

export interface TxStore
  extends IntentRepository,
    AllocationRepository,
    SendRepository,
    ReceiptRepository,
    KeyMaterialRepository {
  /** Run `fn` atomically. Nested calls join the outer transaction. */
  transaction<T>(fn: () => T): T;

  close(): void;
}
