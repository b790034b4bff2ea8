/**
 * @txrelay/pipeline — Nonce/Fee Allocator.
 *
 * Claims a nonce and fees for an Intent and records the claim in the
 * ledger before anything is signed.
 *
 * Nonce = max(last used in ledger + 1, chain pending nonce). The ledger is
 * the source of truth so a node that lags behind cannot hand out a nonce
 * twice. Allocation for one (chainId, address) is serialized through a
 * keyed mutex held for quote + record only.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { Allocation, BuiltCall, FeeParams, HexString, Send } from "@txrelay/types";
import type { IntentLedger } from "@txrelay/ledger";
import { KeyedMutex, addressLockKey } from "./address-lock.js";
import type { ChainRpc } from "./chain-rpc.js";
import { GasEstimationError, PipelineError } from "./errors.js";
import { GasPolicy } from "./gas-policy.js";

export interface AllocatorOptions {
  readonly policy?: GasPolicy | undefined;
  /** Shared with every other allocator for the same chain. */
  readonly locks?: KeyedMutex | undefined;
  readonly logger?: Logger | undefined;
  readonly clock?: (() => string) | undefined;
}

export class Allocator {
  readonly policy: GasPolicy;
  private readonly ledger: IntentLedger;
  private readonly rpc: ChainRpc;
  private readonly locks: KeyedMutex;
  private readonly logger: Logger;
  private readonly clock: () => string;

  constructor(ledger: IntentLedger, rpc: ChainRpc, options: AllocatorOptions = {}) {
    this.ledger = ledger;
    this.rpc = rpc;
    this.policy = options.policy ?? new GasPolicy();
    this.locks = options.locks ?? new KeyedMutex();
    this.logger = options.logger ?? pino({ level: "silent" });
    this.clock = options.clock ?? (() => new Date().toISOString());
  }

  /**
   * First allocation for a CREATED intent. Moves it to ALLOCATED.
   *
   * @throws GasEstimationError when the call cannot be estimated; the
   *   intent stays CREATED
   */
  async allocate(intentId: number, signingAddress: HexString, call: BuiltCall): Promise<Allocation> {
    this.assertChain(call);
    const gasLimit = await this.gasLimit(intentId, signingAddress, call);

    return this.locks.withLock(addressLockKey(call.chainId, signingAddress), async () => {
      const nonce = await this.nextNonce(signingAddress, intentId, 0);
      const fees = this.policy.quote(await this.suggestedFees());
      const allocation = this.build(intentId, signingAddress, nonce, fees, gasLimit);

      this.ledger.recordAllocation(allocation, "CREATED");
      this.logger.info({ intentId, signingAddress, nonce }, "Nonce allocated");
      return allocation;
    });
  }

  /**
   * Fresh nonce for an ALLOCATED intent whose broadcast came back
   * nonce-too-low. The result is above `rejectedNonce` and at least the
   * chain's pending nonce.
   */
  async reallocate(intentId: number, rejectedNonce: number): Promise<Allocation> {
    const prior = this.ledger.allocation(intentId);
    if (!prior) {
      throw new PipelineError("INVALID_REQUEST", `Intent ${intentId} has no allocation`);
    }

    return this.locks.withLock(addressLockKey(prior.chainId, prior.signingAddress), async () => {
      const nonce = await this.nextNonce(prior.signingAddress, intentId, rejectedNonce + 1);
      const fees = this.policy.quote(await this.suggestedFees());
      const allocation = this.build(intentId, prior.signingAddress, nonce, fees, prior.gasLimit);

      this.ledger.recordAllocation(allocation, "ALLOCATED");
      this.logger.info({ intentId, rejectedNonce, nonce }, "Nonce reallocated");
      return allocation;
    });
  }

  /**
   * Same nonce, higher fees, for an ALLOCATED intent whose first broadcast
   * came back underpriced. The new fees clear the replacement bump over
   * the rejected ones.
   *
   * @throws UnderpricedReplacementError when the cap leaves no room to bump
   */
  async requote(intentId: number, bumpBps?: number): Promise<Allocation> {
    const prior = this.ledger.allocation(intentId);
    if (!prior) {
      throw new PipelineError("INVALID_REQUEST", `Intent ${intentId} has no allocation`);
    }

    return this.locks.withLock(addressLockKey(prior.chainId, prior.signingAddress), async () => {
      const fees = this.policy.replacementFees(prior.fees, await this.suggestedFees(), bumpBps);
      const allocation = this.build(intentId, prior.signingAddress, prior.nonce, fees, prior.gasLimit);

      this.ledger.recordAllocation(allocation, "ALLOCATED");
      this.logger.info(
        { intentId, nonce: prior.nonce, maxFeePerGas: fees.maxFeePerGas.toString() },
        "Fees re-quoted",
      );
      return allocation;
    });
  }

  /**
   * Same nonce as `prior`, fees bumped past the node's replacement
   * minimum. Nothing is recorded: the replacement Send is the record.
   *
   * @throws UnderpricedReplacementError
   */
  async allocateReplacement(intentId: number, prior: Send, bumpBps?: number): Promise<Allocation> {
    return this.locks.withLock(addressLockKey(prior.chainId, prior.signingAddress), async () => {
      const fees = this.policy.replacementFees(
        { maxFeePerGas: prior.maxFeePerGas, maxPriorityFeePerGas: prior.maxPriorityFeePerGas },
        await this.suggestedFees(),
        bumpBps,
      );
      this.logger.debug(
        {
          intentId,
          nonce: prior.nonce,
          prior: prior.maxFeePerGas.toString(),
          next: fees.maxFeePerGas.toString(),
        },
        "Replacement fees quoted",
      );
      return this.build(intentId, prior.signingAddress, prior.nonce, fees, prior.gasLimit);
    });
  }

  // ─── Private ────────────────────────────────────────────────────────

  private assertChain(call: BuiltCall): void {
    if (call.chainId !== this.rpc.chainId) {
      throw new PipelineError(
        "CHAIN_MISMATCH",
        `Call targets chain ${call.chainId} but this pipeline serves chain ${this.rpc.chainId}`,
      );
    }
  }

  private async gasLimit(intentId: number, from: HexString, call: BuiltCall): Promise<bigint> {
    if (call.gasLimit !== undefined) {
      return call.gasLimit;
    }
    try {
      const estimate = await this.rpc.estimateGas({
        from,
        to: call.to,
        data: call.data,
        value: call.value,
      });
      return this.policy.padGasLimit(estimate);
    } catch (err) {
      this.logger.warn({ intentId, to: call.to, err }, "Gas estimation failed");
      throw new GasEstimationError(`Gas estimation failed for call to ${call.to}`, {
        cause: err,
      });
    }
  }

  private async nextNonce(address: HexString, intentId: number, floor: number): Promise<number> {
    const pending = await this.rpc.getTransactionCount(address, "pending");
    let nonce = Math.max(pending, floor);
    for (const held of this.ledger.heldNonces(address, this.rpc.chainId, nonce, intentId)) {
      if (held !== nonce) break;
      nonce += 1;
    }
    return nonce;
  }

  private async suggestedFees(): Promise<FeeParams> {
    try {
      return await this.rpc.estimateFees();
    } catch (err) {
      const fallback = this.policy.fallback();
      this.logger.warn(
        { err, maxFeePerGas: fallback.maxFeePerGas.toString() },
        "Fee estimation failed, using capped fees",
      );
      return fallback;
    }
  }

  private build(
    intentId: number,
    signingAddress: HexString,
    nonce: number,
    fees: FeeParams,
    gasLimit: bigint,
  ): Allocation {
    return {
      intentId,
      signingAddress,
      chainId: this.rpc.chainId,
      nonce,
      fees,
      gasLimit,
      allocatedAt: this.clock(),
    };
  }
}
