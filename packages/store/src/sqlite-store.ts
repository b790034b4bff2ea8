/**
 * @txrelay/store — SQLite TxStore implementation (better-sqlite3).
 *
 * The durable store for a single process. better-sqlite3 is synchronous, so
 * a `transaction()` body runs start to finish on one connection with no
 * await points inside it.
 *
 * Pass ":memory:" as the path for an ephemeral database (tests).
 */

import { readFileSync } from "node:fs";
import Database from "better-sqlite3";
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
import { isHexString, isIntentStatus } from "@txrelay/types";
import { decodeMetadata, encodeMetadata } from "./metadata.js";
import { StoreError } from "./types.js";
import type { TxStore } from "./types.js";

// =============================================================================
// Row shapes
// =============================================================================

interface IntentRow {
  id: number;
  intent_key: string;
  status: string;
  intent_metadata: string;
  created_at: string;
  updated_at: string;
}

interface AllocationRow {
  intent_id: number;
  signing_address: string;
  chain_id: number;
  nonce: number;
  max_fee_per_gas: string;
  max_priority_fee_per_gas: string;
  gas_limit: string;
  allocated_at: string;
}

interface SendRow {
  id: number;
  intent_id: number;
  chain_id: number;
  signing_address: string;
  nonce: number;
  max_fee_per_gas: string;
  max_priority_fee_per_gas: string;
  gas_limit: string;
  raw_tx: string | null;
  tx_hash: string;
  sent_at: string;
  replaced_by: string | null;
}

interface ReceiptRow {
  tx_hash: string;
  status: number;
  block_number: number;
  gas_used: string;
  effective_gas_price: string;
  mined_at: string;
}

interface WalletRow {
  address: string;
  privkey_enc: Buffer;
  created_at: string;
  updated_at: string;
}

interface CredentialRow {
  user_id: string;
  provider: string;
  secret_enc: Buffer;
  meta_enc: Buffer | null;
  created_at: string;
  updated_at: string;
}

// =============================================================================
// Row mapping
// =============================================================================

function hex(value: string, column: string): HexString {
  if (!isHexString(value)) {
    throw new StoreError("CORRUPT_ROW", `Column ${column} is not hex: ${value}`);
  }
  return value;
}

function toIntent(row: IntentRow): Intent {
  if (!isIntentStatus(row.status)) {
    throw new StoreError("CORRUPT_ROW", `Intent ${row.id} has unknown status ${row.status}`);
  }
  return Object.freeze({
    id: row.id,
    intentKey: row.intent_key,
    status: row.status,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    metadata: decodeMetadata(row.intent_metadata),
  });
}

function toAllocation(row: AllocationRow): Allocation {
  return Object.freeze({
    intentId: row.intent_id,
    signingAddress: hex(row.signing_address, "signing_address"),
    chainId: row.chain_id,
    nonce: row.nonce,
    fees: {
      maxFeePerGas: BigInt(row.max_fee_per_gas),
      maxPriorityFeePerGas: BigInt(row.max_priority_fee_per_gas),
    },
    gasLimit: BigInt(row.gas_limit),
    allocatedAt: row.allocated_at,
  });
}

function toSend(row: SendRow): Send {
  return Object.freeze({
    id: row.id,
    intentId: row.intent_id,
    chainId: row.chain_id,
    signingAddress: hex(row.signing_address, "signing_address"),
    nonce: row.nonce,
    maxFeePerGas: BigInt(row.max_fee_per_gas),
    maxPriorityFeePerGas: BigInt(row.max_priority_fee_per_gas),
    gasLimit: BigInt(row.gas_limit),
    rawTx: row.raw_tx === null ? null : hex(row.raw_tx, "raw_tx"),
    txHash: hex(row.tx_hash, "tx_hash"),
    sentAt: row.sent_at,
    replacedBy: row.replaced_by === null ? null : hex(row.replaced_by, "replaced_by"),
  });
}

function toReceipt(row: ReceiptRow): Receipt {
  if (row.status !== 0 && row.status !== 1) {
    throw new StoreError("CORRUPT_ROW", `Receipt ${row.tx_hash} has status ${row.status}`);
  }
  return Object.freeze({
    txHash: hex(row.tx_hash, "tx_hash"),
    status: row.status === 1 ? 1 : 0,
    blockNumber: row.block_number,
    gasUsed: BigInt(row.gas_used),
    effectiveGasPrice: BigInt(row.effective_gas_price),
    minedAt: row.mined_at,
  });
}

function toWallet(row: WalletRow): WalletRecord {
  return Object.freeze({
    address: hex(row.address, "address"),
    privkeyEnc: new Uint8Array(row.privkey_enc),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  });
}

function toCredential(row: CredentialRow): ApiCredentialRecord {
  return Object.freeze({
    userId: row.user_id,
    provider: row.provider,
    secretEnc: new Uint8Array(row.secret_enc),
    metaEnc: row.meta_enc === null ? null : new Uint8Array(row.meta_enc),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  });
}

// =============================================================================
// Store
// =============================================================================

export function loadSchema(): string {
  return readFileSync(new URL("./schema.sql", import.meta.url), "utf8");
}

export class SqliteTxStore implements TxStore {
  private readonly db: Database.Database;

  constructor(path: string) {
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.exec(loadSchema());
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    this.db.close();
  }

  // ─── Intents ────────────────────────────────────────────────────────

  insertIntent(intentKey: string, metadata: IntentMetadata, at: string): Intent | undefined {
    const result = this.db
      .prepare<[string, string, string, string]>(
        `INSERT INTO tx_intents (intent_key, status, intent_metadata, created_at, updated_at)
         VALUES (?, 'CREATED', ?, ?, ?)
         ON CONFLICT(intent_key) DO NOTHING`,
      )
      .run(intentKey, encodeMetadata(metadata), at, at);

    if (result.changes === 0) {
      return undefined;
    }
    return this.getIntent(Number(result.lastInsertRowid));
  }

  getIntent(id: number): Intent | undefined {
    const row = this.db
      .prepare<[number], IntentRow>("SELECT * FROM tx_intents WHERE id = ?")
      .get(id);
    return row ? toIntent(row) : undefined;
  }

  getIntentByKey(intentKey: string): Intent | undefined {
    const row = this.db
      .prepare<[string], IntentRow>("SELECT * FROM tx_intents WHERE intent_key = ?")
      .get(intentKey);
    return row ? toIntent(row) : undefined;
  }

  compareAndSetStatus(
    id: number,
    expected: IntentStatus,
    next: IntentStatus,
    at: string,
  ): boolean {
    const result = this.db
      .prepare<[string, string, number, string]>(
        "UPDATE tx_intents SET status = ?, updated_at = ? WHERE id = ? AND status = ?",
      )
      .run(next, at, id, expected);
    return result.changes === 1;
  }

  updateIntentMetadata(id: number, metadata: IntentMetadata, at: string): void {
    const result = this.db
      .prepare<[string, string, number]>(
        "UPDATE tx_intents SET intent_metadata = ?, updated_at = ? WHERE id = ?",
      )
      .run(encodeMetadata(metadata), at, id);
    if (result.changes === 0) {
      throw new StoreError("INTENT_NOT_FOUND", `Intent ${id} not found`);
    }
  }

  listIntents(
    statuses: readonly IntentStatus[],
    createdBefore?: string,
  ): readonly Intent[] {
    if (statuses.length === 0) {
      return [];
    }
    const placeholders = statuses.map(() => "?").join(", ");
    const params: string[] = [...statuses];
    let sql = `SELECT * FROM tx_intents WHERE status IN (${placeholders})`;
    if (createdBefore !== undefined) {
      sql += " AND created_at < ?";
      params.push(createdBefore);
    }
    sql += " ORDER BY created_at ASC, id ASC";

    return this.db
      .prepare<string[], IntentRow>(sql)
      .all(...params)
      .map(toIntent);
  }

  // ─── Allocations ────────────────────────────────────────────────────

  upsertAllocation(allocation: Allocation): void {
    this.db
      .prepare(
        `INSERT INTO tx_allocations
           (intent_id, signing_address, chain_id, nonce, max_fee_per_gas,
            max_priority_fee_per_gas, gas_limit, allocated_at)
         VALUES (@intentId, @signingAddress, @chainId, @nonce, @maxFee, @maxPriority, @gasLimit, @allocatedAt)
         ON CONFLICT(intent_id) DO UPDATE SET
           signing_address = excluded.signing_address,
           chain_id = excluded.chain_id,
           nonce = excluded.nonce,
           max_fee_per_gas = excluded.max_fee_per_gas,
           max_priority_fee_per_gas = excluded.max_priority_fee_per_gas,
           gas_limit = excluded.gas_limit,
           allocated_at = excluded.allocated_at`,
      )
      .run({
        intentId: allocation.intentId,
        signingAddress: allocation.signingAddress,
        chainId: allocation.chainId,
        nonce: allocation.nonce,
        maxFee: allocation.fees.maxFeePerGas.toString(),
        maxPriority: allocation.fees.maxPriorityFeePerGas.toString(),
        gasLimit: allocation.gasLimit.toString(),
        allocatedAt: allocation.allocatedAt,
      });
  }

  getAllocation(intentId: number): Allocation | undefined {
    const row = this.db
      .prepare<[number], AllocationRow>("SELECT * FROM tx_allocations WHERE intent_id = ?")
      .get(intentId);
    return row ? toAllocation(row) : undefined;
  }

  heldNonces(
    signingAddress: HexString,
    chainId: ChainId,
    fromNonce: number,
    excludeIntentId?: number,
  ): readonly number[] {
    const exclude = excludeIntentId ?? -1;
    const rows = this.db
      .prepare<
        [string, number, number, number, string, number, number, number],
        { n: number }
      >(
        `SELECT s.nonce AS n FROM tx_sends s
           JOIN tx_intents i ON i.id = s.intent_id
          WHERE s.signing_address = ? AND s.chain_id = ? AND s.nonce >= ?
            AND i.status != 'FAILED' AND s.intent_id != ?
         UNION
         SELECT a.nonce AS n FROM tx_allocations a
           JOIN tx_intents i ON i.id = a.intent_id
          WHERE a.signing_address = ? AND a.chain_id = ? AND a.nonce >= ?
            AND i.status != 'FAILED' AND a.intent_id != ?
         ORDER BY n`,
      )
      .all(signingAddress, chainId, fromNonce, exclude, signingAddress, chainId, fromNonce, exclude);
    return rows.map((row) => row.n);
  }

  // ─── Sends ──────────────────────────────────────────────────────────

  insertSend(send: NewSend): Send {
    return this.transaction(() => {
      if (this.getSend(send.txHash)) {
        throw new StoreError("DUPLICATE_TX_HASH", `Send ${send.txHash} already recorded`);
      }
      const clash = this.db
        .prepare<[string, number, number], { tx_hash: string }>(
          `SELECT tx_hash FROM tx_sends
            WHERE signing_address = ? AND chain_id = ? AND nonce = ? AND replaced_by IS NULL`,
        )
        .get(send.signingAddress, send.chainId, send.nonce);
      if (clash) {
        throw new StoreError(
          "NONCE_IN_USE",
          `Nonce ${send.nonce} for ${send.signingAddress} is held by live send ${clash.tx_hash}`,
        );
      }

      const result = this.db
        .prepare(
          `INSERT INTO tx_sends
             (intent_id, chain_id, signing_address, nonce, max_fee_per_gas,
              max_priority_fee_per_gas, gas_limit, raw_tx, tx_hash, sent_at)
           VALUES (@intentId, @chainId, @signingAddress, @nonce, @maxFee,
                   @maxPriority, @gasLimit, @rawTx, @txHash, @sentAt)`,
        )
        .run({
          intentId: send.intentId,
          chainId: send.chainId,
          signingAddress: send.signingAddress,
          nonce: send.nonce,
          maxFee: send.maxFeePerGas.toString(),
          maxPriority: send.maxPriorityFeePerGas.toString(),
          gasLimit: send.gasLimit.toString(),
          rawTx: send.rawTx,
          txHash: send.txHash,
          sentAt: send.sentAt,
        });

      const row = this.db
        .prepare<[number], SendRow>("SELECT * FROM tx_sends WHERE id = ?")
        .get(Number(result.lastInsertRowid));
      if (!row) {
        throw new StoreError("SEND_NOT_FOUND", `Send ${send.txHash} vanished after insert`);
      }
      return toSend(row);
    });
  }

  getSend(txHash: TxHash): Send | undefined {
    const row = this.db
      .prepare<[string], SendRow>("SELECT * FROM tx_sends WHERE tx_hash = ?")
      .get(txHash);
    return row ? toSend(row) : undefined;
  }

  listSends(intentId: number): readonly Send[] {
    return this.db
      .prepare<[number], SendRow>("SELECT * FROM tx_sends WHERE intent_id = ? ORDER BY id ASC")
      .all(intentId)
      .map(toSend);
  }

  setReplacedBy(txHash: TxHash, replacedBy: TxHash | null): void {
    const result = this.db
      .prepare<[string | null, string]>("UPDATE tx_sends SET replaced_by = ? WHERE tx_hash = ?")
      .run(replacedBy, txHash);
    if (result.changes === 0) {
      throw new StoreError("SEND_NOT_FOUND", `Send ${txHash} not found`);
    }
  }

  // ─── Receipts ───────────────────────────────────────────────────────

  insertReceipt(receipt: Receipt): boolean {
    if (!this.getSend(receipt.txHash)) {
      throw new StoreError("SEND_NOT_FOUND", `Send ${receipt.txHash} not found`);
    }
    const result = this.db
      .prepare(
        `INSERT INTO tx_receipts (tx_hash, status, block_number, gas_used, effective_gas_price, mined_at)
         VALUES (@txHash, @status, @blockNumber, @gasUsed, @effectiveGasPrice, @minedAt)
         ON CONFLICT(tx_hash) DO NOTHING`,
      )
      .run({
        txHash: receipt.txHash,
        status: receipt.status,
        blockNumber: receipt.blockNumber,
        gasUsed: receipt.gasUsed.toString(),
        effectiveGasPrice: receipt.effectiveGasPrice.toString(),
        minedAt: receipt.minedAt,
      });
    return result.changes === 1;
  }

  getReceipt(txHash: TxHash): Receipt | undefined {
    const row = this.db
      .prepare<[string], ReceiptRow>("SELECT * FROM tx_receipts WHERE tx_hash = ?")
      .get(txHash);
    return row ? toReceipt(row) : undefined;
  }

  // ─── Key material ───────────────────────────────────────────────────

  putWallet(record: WalletRecord): void {
    this.db
      .prepare(
        `INSERT INTO wallets (address, privkey_enc, created_at, updated_at)
         VALUES (@address, @privkeyEnc, @createdAt, @updatedAt)
         ON CONFLICT(address) DO UPDATE SET
           privkey_enc = excluded.privkey_enc,
           updated_at = excluded.updated_at`,
      )
      .run({
        address: record.address,
        privkeyEnc: Buffer.from(record.privkeyEnc),
        createdAt: record.createdAt,
        updatedAt: record.updatedAt,
      });
  }

  getWallet(address: HexString): WalletRecord | undefined {
    const row = this.db
      .prepare<[string], WalletRow>("SELECT * FROM wallets WHERE address = ?")
      .get(address);
    return row ? toWallet(row) : undefined;
  }

  listWallets(): readonly WalletRecord[] {
    return this.db
      .prepare<[], WalletRow>("SELECT * FROM wallets ORDER BY created_at ASC")
      .all()
      .map(toWallet);
  }

  putCredential(record: ApiCredentialRecord): void {
    this.db
      .prepare(
        `INSERT INTO api_credentials (user_id, provider, secret_enc, meta_enc, created_at, updated_at)
         VALUES (@userId, @provider, @secretEnc, @metaEnc, @createdAt, @updatedAt)
         ON CONFLICT(user_id, provider) DO UPDATE SET
           secret_enc = excluded.secret_enc,
           meta_enc = excluded.meta_enc,
           updated_at = excluded.updated_at`,
      )
      .run({
        userId: record.userId,
        provider: record.provider,
        secretEnc: Buffer.from(record.secretEnc),
        metaEnc: record.metaEnc === null ? null : Buffer.from(record.metaEnc),
        createdAt: record.createdAt,
        updatedAt: record.updatedAt,
      });
  }

  getCredential(userId: string, provider: string): ApiCredentialRecord | undefined {
    const row = this.db
      .prepare<[string, string], CredentialRow>(
        "SELECT * FROM api_credentials WHERE user_id = ? AND provider = ?",
      )
      .get(userId, provider);
    return row ? toCredential(row) : undefined;
  }

  listCredentials(): readonly ApiCredentialRecord[] {
    return this.db
      .prepare<[], CredentialRow>("SELECT * FROM api_credentials ORDER BY id ASC")
      .all()
      .map(toCredential);
  }

  deleteCredential(userId: string, provider: string): boolean {
    const result = this.db
      .prepare<[string, string]>("DELETE FROM api_credentials WHERE user_id = ? AND provider = ?")
      .run(userId, provider);
    return result.changes === 1;
  }
}
