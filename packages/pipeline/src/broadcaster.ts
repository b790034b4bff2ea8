/**
 * @txrelay/pipeline — Broadcaster.
 *
 * Signs an allocated transaction inside the wallet keyring scope, submits
 * it, and records the Send only after the node acknowledged it.
 *
 * Submit failures are classified:
 * - already-known: success, the Send is recorded with the local hash
 * - transient: retried with backoff
 * - nonce-too-low / replacement-underpriced: returned to the caller, which
 *   reallocates (first send) or leaves it to the reconciler (replacement)
 * - underpriced: returned to the caller, which re-quotes the same nonce
 *   with higher fees
 * - anything else: the intent moves to FAILED with a readable reason
 *
 * A first send whose transient retries run out stays ALLOCATED with the
 * error noted: the submit may still have reached the mempool, and the
 * reconciler's orphan sweep settles it from chain state.
 */

import pino from "pino";
import type { Logger } from "pino";
import { keccak256, parseTransaction } from "viem";
import type {
  Allocation,
  BuiltCall,
  HexString,
  NewSend,
  Send,
  TxHash,
} from "@txrelay/types";
import type { IntentLedger } from "@txrelay/ledger";
import type { WalletKeyring } from "@txrelay/key-vault";
import type { ChainRpc } from "./chain-rpc.js";
import { classifyBroadcastError, describeRejection } from "./classify.js";
import {
  BroadcastRejectedError,
  PipelineError,
  UnderpricedReplacementError,
} from "./errors.js";
import { MIN_REPLACEMENT_BUMP_BPS, applyBps } from "./gas-policy.js";
import { RetryExhaustedError, RetryPolicy } from "./retry.js";

export interface SignedTransaction {
  readonly rawTx: HexString;
  readonly txHash: TxHash;
}

export interface BroadcasterOptions {
  /** Governs submit retries. Default: RetryPolicy defaults */
  readonly retry?: RetryPolicy | undefined;
  readonly logger?: Logger | undefined;
  readonly clock?: (() => string) | undefined;
}

/**
 * The call a Send was signed for, decoded from its raw payload.
 *
 * @throws PipelineError NOT_REPLACEABLE for Sends recovered from chain
 */
export function callFromSend(send: Send): BuiltCall {
  if (send.rawTx === null) {
    throw new PipelineError(
      "NOT_REPLACEABLE",
      `Send ${send.txHash} was recovered from chain and cannot be re-signed`,
    );
  }
  const parsed = parseTransaction(send.rawTx);
  if (!parsed.to) {
    throw new PipelineError("NOT_REPLACEABLE", `Send ${send.txHash} has no recipient`);
  }
  return {
    chainId: send.chainId,
    to: parsed.to,
    data: parsed.data ?? "0x",
    value: parsed.value ?? 0n,
    gasLimit: send.gasLimit,
  };
}

export class Broadcaster {
  private readonly ledger: IntentLedger;
  private readonly rpc: ChainRpc;
  private readonly keyring: WalletKeyring;
  private readonly retry: RetryPolicy;
  private readonly logger: Logger;
  private readonly clock: () => string;

  constructor(
    ledger: IntentLedger,
    rpc: ChainRpc,
    keyring: WalletKeyring,
    options: BroadcasterOptions = {},
  ) {
    this.ledger = ledger;
    this.rpc = rpc;
    this.keyring = keyring;
    this.retry = options.retry ?? new RetryPolicy();
    this.logger = options.logger ?? pino({ level: "silent" });
    this.clock = options.clock ?? (() => new Date().toISOString());
  }

  /**
   * Sign, submit and record the first Send of an ALLOCATED intent.
   *
   * @throws BroadcastRejectedError nonce-too-low, replacement-underpriced
   *   or underpriced: the intent stays ALLOCATED for reallocation or a
   *   re-quote
   * @throws BroadcastRejectedError rejected: the intent is FAILED
   * @throws BroadcastRejectedError transient: retries ran out, the intent
   *   stays ALLOCATED
   */
  async send(intentId: number, allocation: Allocation, call: BuiltCall): Promise<Send> {
    this.assertAllocation(intentId, allocation);

    let signed: SignedTransaction;
    try {
      signed = await this.sign(allocation, call);
    } catch (err) {
      this.logger.error({ intentId, err }, "Signing failed");
      this.ledger.fail(intentId, "ALLOCATED", signingReason(err));
      throw err;
    }

    try {
      await this.submit(intentId, allocation, signed);
    } catch (err) {
      if (err instanceof BroadcastRejectedError) {
        if (err.kind === "rejected") {
          this.ledger.fail(intentId, "ALLOCATED", err.message);
        } else if (err.kind === "transient") {
          this.ledger.noteError(intentId, err.message);
        }
      }
      throw err;
    }

    return this.ledger.recordSend(this.toSend(intentId, allocation, signed));
  }

  /**
   * Sign, submit and record a fee-bumped replacement of `prior`. The intent
   * keeps its status whatever the outcome.
   *
   * @throws UnderpricedReplacementError when the node wants a larger bump
   * @throws BroadcastRejectedError for every other submit failure
   */
  async replace(
    intentId: number,
    prior: Send,
    allocation: Allocation,
    call: BuiltCall,
  ): Promise<Send> {
    this.assertAllocation(intentId, allocation);
    if (allocation.nonce !== prior.nonce) {
      throw new PipelineError(
        "INVALID_REQUEST",
        `Replacement nonce ${allocation.nonce} differs from the prior nonce ${prior.nonce}`,
      );
    }

    const signed = await this.sign(allocation, call);
    try {
      await this.submit(intentId, allocation, signed);
    } catch (err) {
      if (
        err instanceof BroadcastRejectedError &&
        (err.kind === "replacement-underpriced" || err.kind === "underpriced")
      ) {
        throw new UnderpricedReplacementError(
          {
            maxFeePerGas: applyBps(prior.maxFeePerGas, MIN_REPLACEMENT_BUMP_BPS),
            maxPriorityFeePerGas: applyBps(prior.maxPriorityFeePerGas, MIN_REPLACEMENT_BUMP_BPS),
          },
          allocation.fees,
          { cause: err },
        );
      }
      throw err;
    }

    return this.ledger.recordReplacement(prior, this.toSend(intentId, allocation, signed));
  }

  // ─── Private ────────────────────────────────────────────────────────

  private assertAllocation(intentId: number, allocation: Allocation): void {
    if (allocation.intentId !== intentId) {
      throw new PipelineError(
        "INVALID_REQUEST",
        `Allocation belongs to intent ${allocation.intentId}, not ${intentId}`,
      );
    }
  }

  private sign(allocation: Allocation, call: BuiltCall): Promise<SignedTransaction> {
    return this.keyring.withAccount(allocation.signingAddress, async (account) => {
      const rawTx = await account.signTransaction({
        type: "eip1559",
        chainId: allocation.chainId,
        nonce: allocation.nonce,
        to: call.to,
        data: call.data,
        value: call.value,
        gas: allocation.gasLimit,
        maxFeePerGas: allocation.fees.maxFeePerGas,
        maxPriorityFeePerGas: allocation.fees.maxPriorityFeePerGas,
      });
      return { rawTx, txHash: keccak256(rawTx) };
    });
  }

  private async submit(
    intentId: number,
    allocation: Allocation,
    signed: SignedTransaction,
  ): Promise<void> {
    const context = { intentId, nonce: allocation.nonce, txHash: signed.txHash };

    try {
      await this.retry.run("sendRawTransaction", async (attempt) => {
        try {
          const acknowledged = await this.rpc.sendRawTransaction(signed.rawTx);
          if (acknowledged.toLowerCase() !== signed.txHash.toLowerCase()) {
            this.logger.warn({ ...context, acknowledged }, "Node returned a different hash");
          }
          this.logger.info({ ...context, attempt }, "Transaction submitted");
        } catch (err) {
          const kind = classifyBroadcastError(err);
          if (kind === "already-known") {
            this.logger.info({ ...context, attempt }, "Transaction already known to the node");
            return;
          }
          this.logger.warn({ ...context, attempt, kind, err }, "Submit failed");
          throw new BroadcastRejectedError(kind, rejectionMessage(kind, allocation, err), {
            cause: err,
          });
        }
      });
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        throw new BroadcastRejectedError(
          "transient",
          `Broadcast of nonce ${allocation.nonce} did not complete after ${err.attempts} attempts`,
          { cause: err.lastError },
        );
      }
      throw err;
    }
  }

  private toSend(intentId: number, allocation: Allocation, signed: SignedTransaction): NewSend {
    return {
      intentId,
      chainId: allocation.chainId,
      signingAddress: allocation.signingAddress,
      nonce: allocation.nonce,
      maxFeePerGas: allocation.fees.maxFeePerGas,
      maxPriorityFeePerGas: allocation.fees.maxPriorityFeePerGas,
      gasLimit: allocation.gasLimit,
      rawTx: signed.rawTx,
      txHash: signed.txHash,
      sentAt: this.clock(),
    };
  }
}

function rejectionMessage(
  kind: BroadcastRejectedError["kind"],
  allocation: Allocation,
  err: unknown,
): string {
  switch (kind) {
    case "nonce-too-low":
      return `Nonce ${allocation.nonce} is already used on chain`;
    case "replacement-underpriced":
      return `Nonce ${allocation.nonce} is held by a pending transaction with higher fees`;
    case "underpriced":
      return `Fees for nonce ${allocation.nonce} are below what the node accepts`;
    case "transient":
      return `Broadcast of nonce ${allocation.nonce} failed with a transient error`;
    case "already-known":
      return `Transaction for nonce ${allocation.nonce} is already known`;
    case "rejected":
      return describeRejection(err);
  }
}

function signingReason(err: unknown): string {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return `Signing failed: ${err.code}`;
  }
  return "Signing failed";
}
