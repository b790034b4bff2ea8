/**
 * Intent Ledger — Exactly-once transaction intents.
 *
 * The durable record of every logical action a caller wants executed
 * once, keyed by a caller-supplied idempotency key. Every status change
 * goes through a compare-and-set transition so concurrent writers
 * (request path and reconciler) can never apply a lost update.
 *
 * Rules:
 * - `register` is idempotent: a known key returns the stored Intent as-is
 * - Only valid transitions are allowed; terminal states never move
 * - SENT → SENT happens only through `recordReplacement`
 * - Failures land in FAILED with the reason recorded as `lastError`
 */

import pino from "pino";
import type { Logger } from "pino";
import type {
  Allocation,
  ChainId,
  HexString,
  Intent,
  IntentMetadata,
  IntentStatus,
  IntentStatusView,
  NewSend,
  Receipt,
  Send,
  TxHash,
} from "@txrelay/types";
import { isTerminalStatus } from "@txrelay/types";
import type { TxStore } from "@txrelay/store";
import {
  DuplicateIntentError,
  IntentNotFoundError,
  InvalidTransitionError,
  LedgerError,
} from "./errors.js";

export const MAX_INTENT_KEY_LENGTH = 128;

// =============================================================================
// Valid Transitions
// =============================================================================

export const VALID_TRANSITIONS: Record<IntentStatus, readonly IntentStatus[]> = {
  CREATED: ["ALLOCATED", "FAILED"],
  ALLOCATED: ["SENT", "FAILED"],
  SENT: ["CONFIRMED", "FAILED"],
  // Rows written before replacements stayed in SENT
  REPLACED: ["SENT", "CONFIRMED", "FAILED"],
  CONFIRMED: [],
  FAILED: [],
};

export function canTransition(from: IntentStatus, to: IntentStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

// =============================================================================
// Intent Ledger
// =============================================================================

export interface IntentLedgerOptions {
  readonly logger?: Logger | undefined;
  readonly clock?: (() => string) | undefined;
}

export class IntentLedger {
  private readonly store: TxStore;
  private readonly logger: Logger;
  private readonly clock: () => string;

  constructor(store: TxStore, options: IntentLedgerOptions = {}) {
    this.store = store;
    this.logger = options.logger ?? pino({ level: "silent" });
    this.clock = options.clock ?? (() => new Date().toISOString());
  }

  // ───────────────────────────────────────────────────────────────────────
  // Registration
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Register an intent, or return the existing one for a known key. The
   * metadata of a repeated call is discarded.
   */
  register(intentKey: string, metadata: IntentMetadata = {}): Intent {
    try {
      return this.create(intentKey, metadata);
    } catch (err) {
      if (err instanceof DuplicateIntentError) {
        this.logger.debug({ intentKey, intentId: err.existing.id }, "Intent already registered");
        return err.existing;
      }
      throw err;
    }
  }

  /**
   * Strict registration.
   *
   * @throws DuplicateIntentError carrying the Intent that holds the key
   */
  create(intentKey: string, metadata: IntentMetadata = {}): Intent {
    assertIntentKey(intentKey);

    const inserted = this.store.insertIntent(intentKey, metadata, this.clock());
    if (inserted) {
      this.logger.info({ intentKey, intentId: inserted.id }, "Intent registered");
      return inserted;
    }

    const existing = this.store.getIntentByKey(intentKey);
    if (!existing) {
      throw new IntentNotFoundError(intentKey);
    }
    throw new DuplicateIntentError(existing);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Transitions
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Move an intent from `expected` to `next`. Applies only if the stored
   * status is still `expected`.
   *
   * @throws InvalidTransitionError for an illegal edge or a stale `expected`
   */
  transition(intentId: number, expected: IntentStatus, next: IntentStatus): Intent {
    if (!canTransition(expected, next)) {
      throw new InvalidTransitionError(intentId, expected, next);
    }

    const applied = this.store.compareAndSetStatus(intentId, expected, next, this.clock());
    if (!applied) {
      const current = this.requireIntent(intentId);
      throw new InvalidTransitionError(intentId, expected, next, current.status);
    }

    this.logger.debug({ intentId, from: expected, to: next }, "Intent transitioned");
    return this.requireIntent(intentId);
  }

  /**
   * Move an intent to FAILED and record `reason` as `lastError`.
   */
  fail(intentId: number, expected: IntentStatus, reason: string): Intent {
    return this.store.transaction(() => {
      const intent = this.transition(intentId, expected, "FAILED");
      this.store.updateIntentMetadata(
        intentId,
        { ...intent.metadata, lastError: reason },
        this.clock(),
      );
      this.logger.warn({ intentId, from: expected, reason }, "Intent failed");
      return this.requireIntent(intentId);
    });
  }

  /**
   * Record `reason` as `lastError` without moving the intent. Used when a
   * failure is recoverable and the reconciler will settle the intent.
   */
  noteError(intentId: number, reason: string): Intent {
    return this.store.transaction(() => {
      const intent = this.requireIntent(intentId);
      this.store.updateIntentMetadata(
        intentId,
        { ...intent.metadata, lastError: reason },
        this.clock(),
      );
      this.logger.warn({ intentId, status: intent.status, reason }, "Intent error noted");
      return this.requireIntent(intentId);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle records
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Record the nonce and fees claimed for an intent. The first allocation
   * moves CREATED → ALLOCATED; a reallocation overwrites in ALLOCATED.
   */
  recordAllocation(allocation: Allocation, expected: "CREATED" | "ALLOCATED"): Intent {
    return this.store.transaction(() => {
      if (expected === "CREATED") {
        this.transition(allocation.intentId, "CREATED", "ALLOCATED");
      } else {
        this.requireStatus(allocation.intentId, "ALLOCATED", "ALLOCATED");
      }
      this.store.upsertAllocation(allocation);
      return this.requireIntent(allocation.intentId);
    });
  }

  /**
   * Persist the first acknowledged Send of an intent and move it to SENT.
   */
  recordSend(send: NewSend, expected: "ALLOCATED" | "REPLACED" = "ALLOCATED"): Send {
    return this.store.transaction(() => {
      this.requireStatus(send.intentId, expected, "SENT");
      const stored = this.store.insertSend(send);
      this.transition(send.intentId, expected, "SENT");
      this.logger.info(
        { intentId: send.intentId, txHash: send.txHash, nonce: send.nonce },
        "Send recorded",
      );
      return stored;
    });
  }

  /**
   * Supersede `prior` with `replacement` on the same nonce. The intent
   * stays in (or returns to) SENT.
   */
  recordReplacement(prior: Send, replacement: NewSend): Send {
    return this.store.transaction(() => {
      const intent = this.requireIntent(prior.intentId);
      if (intent.status !== "SENT" && intent.status !== "REPLACED") {
        throw new InvalidTransitionError(intent.id, "SENT", "SENT", intent.status);
      }

      const current = this.store.getSend(prior.txHash);
      if (!current || current.replacedBy !== null) {
        throw new LedgerError("SEND_NOT_LIVE", `Send ${prior.txHash} is not the live send`);
      }

      this.store.setReplacedBy(prior.txHash, replacement.txHash);
      const stored = this.store.insertSend(replacement);
      if (intent.status === "REPLACED") {
        this.transition(intent.id, "REPLACED", "SENT");
      }

      this.logger.info(
        { intentId: intent.id, prior: prior.txHash, txHash: replacement.txHash },
        "Send replaced",
      );
      return stored;
    });
  }

  /**
   * A Send that was superseded earlier turned out to be the one mined.
   * The current live Send now points at it and the ancestor becomes live.
   *
   * @throws LedgerError SEND_NOT_LIVE when `live` has been superseded
   * @throws LedgerError NOT_AN_ANCESTOR unless `ancestor` is a superseded
   *   Send of the same intent and nonce
   */
  restoreAncestor(live: Send, ancestor: Send): void {
    this.store.transaction(() => {
      const current = this.store.getSend(live.txHash);
      if (!current || current.replacedBy !== null) {
        throw new LedgerError("SEND_NOT_LIVE", `Send ${live.txHash} is not the live send`);
      }
      const earlier = this.store.getSend(ancestor.txHash);
      if (
        !earlier ||
        earlier.replacedBy === null ||
        earlier.intentId !== current.intentId ||
        earlier.nonce !== current.nonce
      ) {
        throw new LedgerError(
          "NOT_AN_ANCESTOR",
          `Send ${ancestor.txHash} is not a superseded send of intent ${current.intentId}`,
        );
      }

      this.store.setReplacedBy(live.txHash, ancestor.txHash);
      this.store.setReplacedBy(ancestor.txHash, null);
    });
    this.logger.info(
      { intentId: live.intentId, stale: live.txHash, mined: ancestor.txHash },
      "Mined ancestor restored",
    );
  }

  /**
   * Store a receipt and settle the owning intent: CONFIRMED for status 1,
   * FAILED for status 0. A receipt for an already-terminal intent is
   * stored without moving it.
   */
  recordReceipt(intentId: number, receipt: Receipt): Intent {
    return this.store.transaction(() => {
      const intent = this.requireIntent(intentId);
      this.store.insertReceipt(receipt);
      if (isTerminalStatus(intent.status)) {
        return intent;
      }

      if (receipt.status === 1) {
        this.logger.info(
          { intentId, txHash: receipt.txHash, blockNumber: receipt.blockNumber },
          "Intent confirmed",
        );
        return this.transition(intentId, intent.status, "CONFIRMED");
      }
      return this.fail(
        intentId,
        intent.status,
        `Transaction ${receipt.txHash} reverted in block ${receipt.blockNumber}`,
      );
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get(intentId: number): Intent | undefined {
    return this.store.getIntent(intentId);
  }

  getByKey(intentKey: string): Intent | undefined {
    return this.store.getIntentByKey(intentKey);
  }

  requireIntent(intentId: number): Intent {
    const intent = this.store.getIntent(intentId);
    if (!intent) {
      throw new IntentNotFoundError(intentId);
    }
    return intent;
  }

  /** All Sends of an intent, in broadcast order. */
  sends(intentId: number): readonly Send[] {
    return this.store.listSends(intentId);
  }

  /** The Send that is not superseded, if any. */
  liveSend(intentId: number): Send | undefined {
    return this.store.listSends(intentId).find((s) => s.replacedBy === null);
  }

  allocation(intentId: number): Allocation | undefined {
    return this.store.getAllocation(intentId);
  }

  /**
   * Nonces at or above `fromNonce` still held for an address. A FAILED
   * intent releases its nonces.
   */
  heldNonces(
    signingAddress: HexString,
    chainId: ChainId,
    fromNonce: number,
    excludeIntentId?: number,
  ): readonly number[] {
    return this.store.heldNonces(signingAddress, chainId, fromNonce, excludeIntentId);
  }

  receipt(txHash: TxHash): Receipt | undefined {
    return this.store.getReceipt(txHash);
  }

  /** Intents in any of `statuses`, oldest first. */
  list(statuses: readonly IntentStatus[], olderThan?: string): readonly Intent[] {
    return this.store.listIntents(statuses, olderThan);
  }

  /**
   * Caller-facing view: status, the authoritative tx hash and the failure
   * reason.
   *
   * @throws IntentNotFoundError
   */
  status(intentKey: string): IntentStatusView {
    const intent = this.store.getIntentByKey(intentKey);
    if (!intent) {
      throw new IntentNotFoundError(intentKey);
    }
    const sends = this.store.listSends(intent.id);
    const mined = sends.find((s) => this.store.getReceipt(s.txHash) !== undefined);
    const live = sends.find((s) => s.replacedBy === null);
    const lastError = intent.metadata["lastError"];

    return {
      id: intent.id,
      intentKey: intent.intentKey,
      status: intent.status,
      txHash: mined?.txHash ?? live?.txHash ?? null,
      reason: typeof lastError === "string" ? lastError : null,
      sendCount: sends.length,
      createdAt: intent.createdAt,
      updatedAt: intent.updatedAt,
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private requireStatus(intentId: number, expected: IntentStatus, next: IntentStatus): Intent {
    const intent = this.requireIntent(intentId);
    if (intent.status !== expected) {
      throw new InvalidTransitionError(intentId, expected, next, intent.status);
    }
    return intent;
  }
}

function assertIntentKey(intentKey: string): void {
  if (intentKey.length === 0 || intentKey.length > MAX_INTENT_KEY_LENGTH) {
    throw new LedgerError(
      "INVALID_INTENT_KEY",
      `Intent key must be 1-${MAX_INTENT_KEY_LENGTH} characters`,
    );
  }
}
