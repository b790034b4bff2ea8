/**
 * @txrelay/store — In-memory TxStore implementation.
 *
 * Keeps every table in Maps. Suitable for:
 * - Unit and integration tests
 * - Local development against a devnet
 *
 * Not suitable for production (all state lost on process exit).
 *
 * Every method runs to completion synchronously, so no other writer can
 * observe a half-applied state. `transaction()` snapshots the tables and
 * restores them if its body throws. Rows are frozen copies: callers never
 * hold a reference into the store.
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
import { decodeMetadata, encodeMetadata } from "./metadata.js";
import { StoreError } from "./types.js";
import type { TxStore } from "./types.js";

interface IntentEntry {
  readonly id: number;
  readonly intentKey: string;
  status: IntentStatus;
  readonly createdAt: string;
  updatedAt: string;
  metadataJson: string;
}

interface Snapshot {
  readonly intents: Map<number, IntentEntry>;
  readonly intentIdsByKey: Map<string, number>;
  readonly allocations: Map<number, Allocation>;
  readonly sends: Send[];
  readonly receipts: Map<string, Receipt>;
  readonly wallets: Map<string, WalletRecord>;
  readonly credentials: Map<string, ApiCredentialRecord>;
  readonly nextIntentId: number;
  readonly nextSendId: number;
}

function credentialKey(userId: string, provider: string): string {
  return `${userId}\u0000${provider}`;
}

export class InMemoryTxStore implements TxStore {
  private readonly _intents = new Map<number, IntentEntry>();
  private readonly _intentIdsByKey = new Map<string, number>();
  private readonly _allocations = new Map<number, Allocation>();
  private readonly _sends: Send[] = [];
  private readonly _receipts = new Map<string, Receipt>();
  private readonly _wallets = new Map<string, WalletRecord>();
  private readonly _credentials = new Map<string, ApiCredentialRecord>();

  private _nextIntentId = 1;
  private _nextSendId = 1;

  transaction<T>(fn: () => T): T {
    const snapshot = this.snapshot();
    try {
      return fn();
    } catch (err) {
      this.restore(snapshot);
      throw err;
    }
  }

  close(): void {
    // nothing to release
  }

  // ─── Intents ────────────────────────────────────────────────────────

  insertIntent(intentKey: string, metadata: IntentMetadata, at: string): Intent | undefined {
    if (this._intentIdsByKey.has(intentKey)) {
      return undefined;
    }
    const entry: IntentEntry = {
      id: this._nextIntentId++,
      intentKey,
      status: "CREATED",
      createdAt: at,
      updatedAt: at,
      metadataJson: encodeMetadata(metadata),
    };
    this._intents.set(entry.id, entry);
    this._intentIdsByKey.set(intentKey, entry.id);
    return this.toIntent(entry);
  }

  getIntent(id: number): Intent | undefined {
    const entry = this._intents.get(id);
    return entry ? this.toIntent(entry) : undefined;
  }

  getIntentByKey(intentKey: string): Intent | undefined {
    const id = this._intentIdsByKey.get(intentKey);
    return id !== undefined ? this.getIntent(id) : undefined;
  }

  compareAndSetStatus(
    id: number,
    expected: IntentStatus,
    next: IntentStatus,
    at: string,
  ): boolean {
    const entry = this._intents.get(id);
    if (!entry || entry.status !== expected) {
      return false;
    }
    entry.status = next;
    entry.updatedAt = at;
    return true;
  }

  updateIntentMetadata(id: number, metadata: IntentMetadata, at: string): void {
    const entry = this._intents.get(id);
    if (!entry) {
      throw new StoreError("INTENT_NOT_FOUND", `Intent ${id} not found`);
    }
    entry.metadataJson = encodeMetadata(metadata);
    entry.updatedAt = at;
  }

  listIntents(
    statuses: readonly IntentStatus[],
    createdBefore?: string,
  ): readonly Intent[] {
    const wanted = new Set(statuses);
    return [...this._intents.values()]
      .filter((e) => wanted.has(e.status))
      .filter((e) => createdBefore === undefined || e.createdAt < createdBefore)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt) || a.id - b.id)
      .map((e) => this.toIntent(e));
  }

  // ─── Allocations ────────────────────────────────────────────────────

  upsertAllocation(allocation: Allocation): void {
    if (!this._intents.has(allocation.intentId)) {
      throw new StoreError("INTENT_NOT_FOUND", `Intent ${allocation.intentId} not found`);
    }
    this._allocations.set(allocation.intentId, Object.freeze({ ...allocation }));
  }

  getAllocation(intentId: number): Allocation | undefined {
    return this._allocations.get(intentId);
  }

  heldNonces(
    signingAddress: HexString,
    chainId: ChainId,
    fromNonce: number,
    excludeIntentId?: number,
  ): readonly number[] {
    const held = new Set<number>();
    const holds = (entry: {
      intentId: number;
      signingAddress: HexString;
      chainId: ChainId;
      nonce: number;
    }): boolean =>
      entry.signingAddress === signingAddress &&
      entry.chainId === chainId &&
      entry.nonce >= fromNonce &&
      entry.intentId !== excludeIntentId &&
      this._intents.get(entry.intentId)?.status !== "FAILED";

    for (const send of this._sends) {
      if (holds(send)) held.add(send.nonce);
    }
    for (const allocation of this._allocations.values()) {
      if (holds(allocation)) held.add(allocation.nonce);
    }

    return [...held].sort((x, y) => x - y);
  }

  // ─── Sends ──────────────────────────────────────────────────────────

  insertSend(send: NewSend): Send {
    if (this._sends.some((s) => s.txHash === send.txHash)) {
      throw new StoreError("DUPLICATE_TX_HASH", `Send ${send.txHash} already recorded`);
    }
    const clash = this._sends.find(
      (s) =>
        s.replacedBy === null &&
        s.signingAddress === send.signingAddress &&
        s.chainId === send.chainId &&
        s.nonce === send.nonce,
    );
    if (clash) {
      throw new StoreError(
        "NONCE_IN_USE",
        `Nonce ${send.nonce} for ${send.signingAddress} is held by live send ${clash.txHash}`,
      );
    }

    const stored: Send = Object.freeze({
      ...send,
      id: this._nextSendId++,
      replacedBy: null,
    });
    this._sends.push(stored);
    return stored;
  }

  getSend(txHash: TxHash): Send | undefined {
    return this._sends.find((s) => s.txHash === txHash);
  }

  listSends(intentId: number): readonly Send[] {
    return this._sends.filter((s) => s.intentId === intentId);
  }

  setReplacedBy(txHash: TxHash, replacedBy: TxHash | null): void {
    const index = this._sends.findIndex((s) => s.txHash === txHash);
    const current = this._sends[index];
    if (current === undefined) {
      throw new StoreError("SEND_NOT_FOUND", `Send ${txHash} not found`);
    }
    this._sends[index] = Object.freeze({ ...current, replacedBy });
  }

  // ─── Receipts ───────────────────────────────────────────────────────

  insertReceipt(receipt: Receipt): boolean {
    if (this._receipts.has(receipt.txHash)) {
      return false;
    }
    if (!this.getSend(receipt.txHash)) {
      throw new StoreError("SEND_NOT_FOUND", `Send ${receipt.txHash} not found`);
    }
    this._receipts.set(receipt.txHash, Object.freeze({ ...receipt }));
    return true;
  }

  getReceipt(txHash: TxHash): Receipt | undefined {
    return this._receipts.get(txHash);
  }

  // ─── Key material ───────────────────────────────────────────────────

  putWallet(record: WalletRecord): void {
    const key = record.address.toLowerCase();
    const existing = this._wallets.get(key);
    this._wallets.set(
      key,
      Object.freeze({
        ...record,
        address: existing?.address ?? record.address,
        createdAt: existing?.createdAt ?? record.createdAt,
      }),
    );
  }

  getWallet(address: HexString): WalletRecord | undefined {
    return this._wallets.get(address.toLowerCase());
  }

  listWallets(): readonly WalletRecord[] {
    return [...this._wallets.values()];
  }

  putCredential(record: ApiCredentialRecord): void {
    const key = credentialKey(record.userId, record.provider);
    const existing = this._credentials.get(key);
    this._credentials.set(
      key,
      Object.freeze({
        ...record,
        createdAt: existing?.createdAt ?? record.createdAt,
      }),
    );
  }

  getCredential(userId: string, provider: string): ApiCredentialRecord | undefined {
    return this._credentials.get(credentialKey(userId, provider));
  }

  listCredentials(): readonly ApiCredentialRecord[] {
    return [...this._credentials.values()];
  }

  deleteCredential(userId: string, provider: string): boolean {
    return this._credentials.delete(credentialKey(userId, provider));
  }

  // ─── Private ────────────────────────────────────────────────────────

  private snapshot(): Snapshot {
    return {
      intents: new Map([...this._intents].map(([id, e]) => [id, { ...e }])),
      intentIdsByKey: new Map(this._intentIdsByKey),
      allocations: new Map(this._allocations),
      sends: [...this._sends],
      receipts: new Map(this._receipts),
      wallets: new Map(this._wallets),
      credentials: new Map(this._credentials),
      nextIntentId: this._nextIntentId,
      nextSendId: this._nextSendId,
    };
  }

  private restore(snapshot: Snapshot): void {
    replaceMap(this._intents, snapshot.intents);
    replaceMap(this._intentIdsByKey, snapshot.intentIdsByKey);
    replaceMap(this._allocations, snapshot.allocations);
    this._sends.splice(0, this._sends.length, ...snapshot.sends);
    replaceMap(this._receipts, snapshot.receipts);
    replaceMap(this._wallets, snapshot.wallets);
    replaceMap(this._credentials, snapshot.credentials);
    this._nextIntentId = snapshot.nextIntentId;
    this._nextSendId = snapshot.nextSendId;
  }

  private toIntent(entry: IntentEntry): Intent {
    return Object.freeze({
      id: entry.id,
      intentKey: entry.intentKey,
      status: entry.status,
      createdAt: entry.createdAt,
      updatedAt: entry.updatedAt,
      metadata: decodeMetadata(entry.metadataJson),
    });
  }
}

function replaceMap<K, V>(target: Map<K, V>, source: ReadonlyMap<K, V>): void {
  target.clear();
  for (const [key, value] of source) {
    target.set(key, value);
  }
}
