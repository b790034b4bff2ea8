/**
 * @txrelay/pipeline — TxPipeline facade.
 *
 * Wires Ledger, Allocator, Broadcaster, FeeBumper and Reconciler over one
 * store, one chain and one wallet keyring, and exposes the operations
 * callers use: register, submit, status, force-replace and reconcile.
 *
 * `submit` never surfaces a chain or crypto error. Its outcome is the
 * intent's status and `lastError`; only malformed requests throw.
 */

import pino from "pino";
import type { Logger } from "pino";
import { getAddress, isAddress } from "viem";
import type {
  Allocation,
  BuiltCall,
  HexString,
  Intent,
  IntentMetadata,
  IntentStatusView,
  Send,
} from "@txrelay/types";
import { isBuiltCall } from "@txrelay/types";
import type { TxStore } from "@txrelay/store";
import { DuplicateIntentError, IntentLedger, InvalidTransitionError } from "@txrelay/ledger";
import type { WalletKeyring } from "@txrelay/key-vault";
import { Allocator } from "./allocator.js";
import { KeyedMutex } from "./address-lock.js";
import { Broadcaster } from "./broadcaster.js";
import type { ChainRpc } from "./chain-rpc.js";
import {
  BroadcastRejectedError,
  NonceConflictError,
  PipelineError,
  UnderpricedReplacementError,
} from "./errors.js";
import type { BroadcastRejectionKind } from "./errors.js";
import { FeeBumper } from "./fee-bumper.js";
import { GasPolicy } from "./gas-policy.js";
import type { GasPolicyConfig } from "./gas-policy.js";
import { Reconciler } from "./reconciler.js";
import type { ReconcileReport, ReconcilerConfig } from "./reconciler.js";
import { RetryExhaustedError, RetryPolicy } from "./retry.js";

export interface SubmitRequest {
  readonly intentKey: string;
  readonly signingAddress: string;
  readonly call: BuiltCall;
  readonly metadata?: IntentMetadata | undefined;
}

export interface SubmitResult {
  readonly intent: Intent;
  /**
   * True when this call moved the intent out of CREATED. False for a
   * replay, and for a concurrent submit that lost the allocation race.
   */
  readonly created: boolean;
}

type FirstAllocation =
  | { readonly outcome: "allocated"; readonly allocation: Allocation }
  | { readonly outcome: "failed" }
  | { readonly outcome: "claimed" };

export interface TxPipelineOptions {
  readonly gasPolicy?: Partial<GasPolicyConfig> | undefined;
  readonly reconciler?: Partial<ReconcilerConfig> | undefined;
  /** Governs allocation and submit retries. Default: RetryPolicy defaults */
  readonly retry?: RetryPolicy | undefined;
  /** Reallocations or re-quotes after nonce and fee conflicts before the intent fails. Default: 3 */
  readonly maxReallocations?: number | undefined;
  readonly logger?: Logger | undefined;
  /** Epoch milliseconds. */
  readonly now?: (() => number) | undefined;
}

export class TxPipeline {
  readonly ledger: IntentLedger;
  readonly allocator: Allocator;
  readonly broadcaster: Broadcaster;
  readonly bumper: FeeBumper;
  readonly reconciler: Reconciler;

  private readonly rpc: ChainRpc;
  private readonly keyring: WalletKeyring;
  private readonly retry: RetryPolicy;
  private readonly maxReallocations: number;
  private readonly logger: Logger;

  constructor(
    store: TxStore,
    rpc: ChainRpc,
    keyring: WalletKeyring,
    options: TxPipelineOptions = {},
  ) {
    const now = options.now ?? Date.now;
    const clock = (): string => new Date(now()).toISOString();

    this.rpc = rpc;
    this.keyring = keyring;
    this.maxReallocations = options.maxReallocations ?? 3;
    this.logger = options.logger ?? pino({ level: "silent" });
    this.retry = options.retry ?? new RetryPolicy({}, { logger: this.logger });

    this.ledger = new IntentLedger(store, { logger: this.logger, clock });
    this.allocator = new Allocator(this.ledger, rpc, {
      policy: new GasPolicy(options.gasPolicy),
      locks: new KeyedMutex(),
      logger: this.logger,
      clock,
    });
    this.broadcaster = new Broadcaster(this.ledger, rpc, keyring, {
      retry: this.retry,
      logger: this.logger,
      clock,
    });
    this.bumper = new FeeBumper(this.ledger, this.allocator, this.broadcaster, this.logger);
    this.reconciler = new Reconciler(this.ledger, rpc, this.bumper, {
      config: options.reconciler,
      logger: this.logger,
      now,
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Caller operations
  // ───────────────────────────────────────────────────────────────────────

  /** Idempotent registration without allocation. */
  registerIntent(intentKey: string, metadata: IntentMetadata = {}): Intent {
    return this.ledger.register(intentKey, metadata);
  }

  /**
   * Register the intent and, while it is CREATED, allocate and broadcast.
   * A replay returns the stored intent untouched.
   *
   * @throws PipelineError INVALID_REQUEST or CHAIN_MISMATCH before anything is stored
   */
  async submit(request: SubmitRequest): Promise<SubmitResult> {
    const signingAddress = this.checksum(request.signingAddress);
    this.assertCall(request.call);

    let intent: Intent;
    try {
      intent = this.ledger.create(request.intentKey, request.metadata ?? {});
    } catch (err) {
      if (!(err instanceof DuplicateIntentError)) {
        throw err;
      }
      if (err.existing.status !== "CREATED") {
        this.logger.info({ intentKey: request.intentKey, intentId: err.existing.id }, "Submit replayed");
        return { intent: err.existing, created: false };
      }
      // Registered earlier without a call
      intent = err.existing;
    }

    const first = await this.allocateFirst(intent.id, signingAddress, request.call);
    if (first.outcome === "allocated") {
      await this.broadcast(intent.id, first.allocation, request.call);
    }
    return { intent: this.ledger.requireIntent(intent.id), created: first.outcome !== "claimed" };
  }

  getIntentStatus(intentKey: string): IntentStatusView {
    return this.ledger.status(intentKey);
  }

  /** Manual fee bump of a SENT intent. */
  forceReplace(intentId: number): Promise<Send> {
    return this.bumper.bump(intentId);
  }

  reconcile(): Promise<ReconcileReport> {
    return this.reconciler.poll();
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private checksum(address: string): HexString {
    if (!isAddress(address, { strict: false })) {
      throw new PipelineError("INVALID_REQUEST", "Signing address is not a valid address");
    }
    const checksummed = getAddress(address);
    if (!this.keyring.has(checksummed)) {
      throw new PipelineError("INVALID_REQUEST", `No wallet stored for ${checksummed}`);
    }
    return checksummed;
  }

  private assertCall(call: BuiltCall): void {
    if (!isBuiltCall(call)) {
      throw new PipelineError("INVALID_REQUEST", "Built call is malformed");
    }
    if (call.chainId !== this.rpc.chainId) {
      throw new PipelineError(
        "CHAIN_MISMATCH",
        `Call targets chain ${call.chainId} but this pipeline serves chain ${this.rpc.chainId}`,
      );
    }
  }

  /**
   * Allocation with bounded retry; on failure the intent is FAILED.
   * "claimed" means a concurrent submit moved the intent first.
   */
  private async allocateFirst(
    intentId: number,
    signingAddress: HexString,
    call: BuiltCall,
  ): Promise<FirstAllocation> {
    try {
      const allocation = await this.retry.run("allocate", () =>
        this.allocator.allocate(intentId, signingAddress, call),
      );
      return { outcome: "allocated", allocation };
    } catch (err) {
      if (err instanceof InvalidTransitionError || this.ledger.requireIntent(intentId).status !== "CREATED") {
        this.logger.info({ intentId }, "Intent claimed by a concurrent submit");
        return { outcome: "claimed" };
      }
      this.logger.warn({ intentId, err }, "Allocation failed");
      this.ledger.fail(intentId, "CREATED", failureReason(err, "Allocation failed"));
      return { outcome: "failed" };
    }
  }

  /**
   * Broadcast the first Send. A nonce conflict moves to a fresh nonce; an
   * underpriced rejection keeps the nonce and raises the fees. Every other
   * outcome is already recorded on the intent by the Broadcaster.
   */
  private async broadcast(intentId: number, first: Allocation, call: BuiltCall): Promise<void> {
    let allocation = first;

    for (let reallocations = 0; ; reallocations++) {
      try {
        await this.broadcaster.send(intentId, allocation, call);
        return;
      } catch (err) {
        if (!(err instanceof BroadcastRejectedError) || !isConflict(err.kind)) {
          this.logger.warn({ intentId, err }, "Broadcast did not complete");
          if (
            !(err instanceof BroadcastRejectedError) &&
            this.ledger.requireIntent(intentId).status === "ALLOCATED"
          ) {
            this.ledger.noteError(intentId, failureReason(err, "Broadcast did not complete"));
          }
          return;
        }

        if (reallocations >= this.maxReallocations) {
          const error = new NonceConflictError(
            intentId,
            allocation.nonce,
            `Nonce conflict persisted after ${reallocations} reallocations`,
          );
          this.ledger.fail(intentId, "ALLOCATED", error.message);
          return;
        }

        this.logger.warn({ intentId, nonce: allocation.nonce, kind: err.kind }, "Broadcast conflict, retrying");
        try {
          allocation =
            err.kind === "underpriced"
              ? await this.allocator.requote(intentId)
              : await this.allocator.reallocate(intentId, allocation.nonce);
        } catch (reallocErr) {
          this.logger.warn({ intentId, err: reallocErr }, "Reallocation failed");
          if (reallocErr instanceof UnderpricedReplacementError) {
            this.ledger.fail(intentId, "ALLOCATED", reallocErr.message);
            return;
          }
          this.ledger.noteError(intentId, failureReason(reallocErr, "Reallocation failed"));
          return;
        }
      }
    }
  }
}

function isConflict(kind: BroadcastRejectionKind): boolean {
  return kind === "nonce-too-low" || kind === "replacement-underpriced" || kind === "underpriced";
}

/** A caller-safe reason: pipeline messages pass, raw errors do not. */
function failureReason(err: unknown, fallback: string): string {
  if (err instanceof RetryExhaustedError) {
    return failureReason(err.lastError, fallback);
  }
  if (err instanceof PipelineError) {
    return err.message;
  }
  return fallback;
}
