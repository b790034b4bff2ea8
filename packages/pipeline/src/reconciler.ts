/**
 * @txrelay/pipeline — Receipt Reconciler.
 *
 * Drives every SENT intent to a terminal status from chain state:
 *
 * 1. Receipt for the live Send → CONFIRMED (status 1) or FAILED (status 0)
 * 2. No receipt past the receipt threshold, nonce consumed on chain →
 *    the mined transaction is found among earlier Sends or by scanning
 *    recent blocks for (from, nonce) and its receipt governs the intent
 * 3. No receipt past the stuck threshold, nonce unused → fee-bumped
 *    replacement, up to `maxReplacements`
 *
 * The orphan sweep covers the crash window between submit and record:
 * ALLOCATED intents past the orphan threshold are matched by (from, nonce)
 * and either recovered as a Send or failed.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { Intent, NewSend, Receipt, Send } from "@txrelay/types";
import type { IntentLedger } from "@txrelay/ledger";
import type { ChainReceipt, ChainRpc, ChainTransaction } from "./chain-rpc.js";
import { BroadcastRejectedError, PipelineError, ReceiptTimeoutError } from "./errors.js";
import type { FeeBumper } from "./fee-bumper.js";

// =============================================================================
// Configuration
// =============================================================================

export interface ReconcilerConfig {
  /** Age of the live Send before nonce consumption is checked. Default: 60000 */
  readonly receiptThresholdMs: number;
  /** Age of the live Send before it is fee-bumped. Default: 180000 */
  readonly stuckThresholdMs: number;
  /** Age of an allocation before it counts as orphaned. Default: 300000 */
  readonly orphanThresholdMs: number;
  /** Replacements per intent before it fails. Default: 3 */
  readonly maxReplacements: number;
  /** Blocks scanned back from head for a (from, nonce) match. Default: 64 */
  readonly scanDepth: number;
  /** Intents examined per poll. Default: 200 */
  readonly batchSize: number;
}

export const DEFAULT_RECONCILER_CONFIG: ReconcilerConfig = {
  receiptThresholdMs: 60_000,
  stuckThresholdMs: 180_000,
  orphanThresholdMs: 300_000,
  maxReplacements: 3,
  scanDepth: 64,
  batchSize: 200,
};

export interface ReconcilerOptions {
  readonly config?: Partial<ReconcilerConfig> | undefined;
  readonly logger?: Logger | undefined;
  /** Epoch milliseconds. */
  readonly now?: (() => number) | undefined;
}

export interface ReconcileReport {
  /** Live Sends whose receipt was looked up */
  readonly checked: number;
  readonly confirmed: number;
  readonly failed: number;
  /** Fee-bumped replacements broadcast */
  readonly replaced: number;
  /** Stale Sends pointed at the transaction that actually mined */
  readonly superseded: number;
  /** Orphaned broadcasts recorded from chain */
  readonly recovered: number;
  readonly errors: number;
}

type Counters = { -readonly [K in keyof ReconcileReport]: number };

// =============================================================================
// Reconciler
// =============================================================================

export class Reconciler {
  readonly config: ReconcilerConfig;
  private readonly ledger: IntentLedger;
  private readonly rpc: ChainRpc;
  private readonly bumper: FeeBumper;
  private readonly logger: Logger;
  private readonly now: () => number;
  private inflight: Promise<ReconcileReport> | undefined;

  constructor(
    ledger: IntentLedger,
    rpc: ChainRpc,
    bumper: FeeBumper,
    options: ReconcilerOptions = {},
  ) {
    this.ledger = ledger;
    this.rpc = rpc;
    this.bumper = bumper;
    this.config = { ...DEFAULT_RECONCILER_CONFIG, ...options.config };
    this.logger = options.logger ?? pino({ level: "silent" });
    this.now = options.now ?? Date.now;
  }

  /**
   * One reconcile pass. A call made while a pass is running joins it.
   */
  poll(): Promise<ReconcileReport> {
    if (!this.inflight) {
      this.inflight = this.run().finally(() => {
        this.inflight = undefined;
      });
    }
    return this.inflight;
  }

  // ─── Sent intents ───────────────────────────────────────────────────

  private async run(): Promise<ReconcileReport> {
    const counters: Counters = {
      checked: 0,
      confirmed: 0,
      failed: 0,
      replaced: 0,
      superseded: 0,
      recovered: 0,
      errors: 0,
    };

    const pending: { intent: Intent; live: Send }[] = [];
    for (const intent of this.ledger.list(["SENT", "REPLACED"]).slice(0, this.config.batchSize)) {
      const live = this.ledger.liveSend(intent.id);
      if (live) {
        pending.push({ intent, live });
      } else {
        counters.errors++;
        this.logger.error({ intentId: intent.id, status: intent.status }, "Sent intent has no live send");
      }
    }

    counters.checked = pending.length;
    const receipts = await Promise.allSettled(
      pending.map(({ live }) => this.rpc.getTransactionReceipt(live.txHash)),
    );

    for (const [index, { intent, live }] of pending.entries()) {
      const result = receipts[index];
      if (result === undefined) continue;
      if (result.status === "rejected") {
        counters.errors++;
        this.logger.error({ intentId: intent.id, txHash: live.txHash, err: result.reason }, "Receipt lookup failed");
        continue;
      }
      try {
        await this.reconcileSend(intent, live, result.value, counters);
      } catch (err) {
        counters.errors++;
        this.logger.error({ intentId: intent.id, txHash: live.txHash, err }, "Reconcile failed");
      }
    }

    await this.sweepOrphans(counters);

    const report: ReconcileReport = { ...counters };
    this.logger.info(report, "Reconcile pass complete");
    return report;
  }

  private async reconcileSend(
    intent: Intent,
    live: Send,
    receipt: ChainReceipt | null,
    counters: Counters,
  ): Promise<void> {
    if (receipt) {
      this.settle(intent.id, receipt, counters);
      return;
    }

    const age = this.now() - Date.parse(live.sentAt);
    if (age < this.config.receiptThresholdMs) {
      return;
    }

    const minedCount = await this.rpc.getTransactionCount(live.signingAddress, "latest");
    if (minedCount > live.nonce) {
      await this.resolveConsumedNonce(intent, live, counters);
      return;
    }

    if (age < this.config.stuckThresholdMs) {
      return;
    }

    const replacements = this.ledger.sends(intent.id).length - 1;
    if (replacements >= this.config.maxReplacements) {
      this.ledger.fail(intent.id, intent.status, new ReceiptTimeoutError(intent.id, replacements).message);
      counters.failed++;
      return;
    }

    try {
      const replacement = await this.bumper.bump(intent.id);
      counters.replaced++;
      this.logger.info(
        { intentId: intent.id, prior: live.txHash, txHash: replacement.txHash, age },
        "Stuck send replaced",
      );
    } catch (err) {
      if (err instanceof BroadcastRejectedError && err.kind === "nonce-too-low") {
        this.logger.info({ intentId: intent.id, nonce: live.nonce }, "Nonce consumed during replacement");
        return;
      }
      throw err;
    }
  }

  /**
   * The live Send's nonce is used on chain but the Send has no receipt.
   * Find the transaction that took the nonce.
   */
  private async resolveConsumedNonce(intent: Intent, live: Send, counters: Counters): Promise<void> {
    // The live Send may have been mined since the receipt lookup
    const lateReceipt = await this.rpc.getTransactionReceipt(live.txHash);
    if (lateReceipt) {
      this.settle(intent.id, lateReceipt, counters);
      return;
    }

    const ancestors = this.ledger
      .sends(intent.id)
      .filter((s) => s.txHash !== live.txHash && s.nonce === live.nonce)
      .reverse();

    for (const ancestor of ancestors) {
      const receipt = await this.rpc.getTransactionReceipt(ancestor.txHash);
      if (receipt) {
        this.ledger.restoreAncestor(live, ancestor);
        counters.superseded++;
        this.settle(intent.id, receipt, counters);
        return;
      }
    }

    const found = await this.findByNonce(live, live.nonce);
    if (!found) {
      this.ledger.fail(intent.id, intent.status, `Nonce ${live.nonce} consumed by an unknown transaction`);
      counters.failed++;
      return;
    }

    if (this.ledger.sends(intent.id).some((s) => s.txHash === found.hash)) {
      this.logger.warn({ intentId: intent.id, txHash: found.hash }, "Mined send has no receipt yet");
      return;
    }

    const adopted = this.ledger.recordReplacement(live, this.recoveredSend(intent.id, live, found));
    counters.superseded++;
    this.logger.warn(
      { intentId: intent.id, stale: live.txHash, mined: adopted.txHash },
      "Adopted mined transaction for nonce",
    );

    const receipt = await this.rpc.getTransactionReceipt(adopted.txHash);
    if (receipt) {
      this.settle(intent.id, receipt, counters);
    }
  }

  // ─── Orphans ────────────────────────────────────────────────────────

  private async sweepOrphans(counters: Counters): Promise<void> {
    const cutoff = this.now() - this.config.orphanThresholdMs;

    for (const intent of this.ledger.list(["ALLOCATED"]).slice(0, this.config.batchSize)) {
      const allocation = this.ledger.allocation(intent.id);
      if (!allocation || Date.parse(allocation.allocatedAt) > cutoff) {
        continue;
      }

      try {
        const minedCount = await this.rpc.getTransactionCount(allocation.signingAddress, "latest");
        if (minedCount > allocation.nonce) {
          const found = await this.findByNonce(allocation, allocation.nonce);
          const ours =
            found !== undefined &&
            found.maxFeePerGas === allocation.fees.maxFeePerGas &&
            found.maxPriorityFeePerGas === allocation.fees.maxPriorityFeePerGas &&
            found.gasLimit === allocation.gasLimit;

          if (!found || !ours) {
            this.ledger.fail(
              intent.id,
              "ALLOCATED",
              `Nonce ${allocation.nonce} consumed by an unknown transaction`,
            );
            counters.failed++;
            continue;
          }

          this.ledger.recordSend(this.recoveredSend(intent.id, allocation, found));
          counters.recovered++;
          this.logger.warn({ intentId: intent.id, txHash: found.hash }, "Orphaned broadcast recovered");

          const receipt = await this.rpc.getTransactionReceipt(found.hash);
          if (receipt) {
            this.settle(intent.id, receipt, counters);
          }
          continue;
        }

        const pendingCount = await this.rpc.getTransactionCount(allocation.signingAddress, "pending");
        if (pendingCount > allocation.nonce) {
          this.logger.debug({ intentId: intent.id, nonce: allocation.nonce }, "Orphan nonce is pending");
          continue;
        }

        this.ledger.fail(intent.id, "ALLOCATED", "Abandoned before broadcast");
        counters.failed++;
      } catch (err) {
        counters.errors++;
        this.logger.error({ intentId: intent.id, err }, "Orphan sweep failed");
      }
    }
  }

  // ─── Helpers ────────────────────────────────────────────────────────

  private settle(intentId: number, chainReceipt: ChainReceipt, counters: Counters): void {
    const receipt: Receipt = {
      txHash: chainReceipt.txHash,
      status: chainReceipt.status,
      blockNumber: chainReceipt.blockNumber,
      gasUsed: chainReceipt.gasUsed,
      effectiveGasPrice: chainReceipt.effectiveGasPrice,
      minedAt: new Date(this.now()).toISOString(),
    };
    const intent = this.ledger.recordReceipt(intentId, receipt);
    if (intent.status === "CONFIRMED") {
      counters.confirmed++;
    } else if (intent.status === "FAILED") {
      counters.failed++;
    }
  }

  /** Newest match for (from, nonce) within `scanDepth` blocks of head. */
  private async findByNonce(
    owner: { readonly signingAddress: string },
    nonce: number,
  ): Promise<ChainTransaction | undefined> {
    const from = owner.signingAddress.toLowerCase();
    const head = await this.rpc.getBlockNumber();
    const lowest = Math.max(0, head - this.config.scanDepth + 1);

    for (let block = head; block >= lowest; block--) {
      const transactions = await this.rpc.getBlockTransactions(block);
      const match = transactions.find((tx) => tx.from.toLowerCase() === from && tx.nonce === nonce);
      if (match) {
        return match;
      }
    }
    return undefined;
  }

  private recoveredSend(
    intentId: number,
    source: Pick<Send, "chainId" | "signingAddress" | "nonce">,
    found: ChainTransaction,
  ): NewSend {
    if (found.nonce !== source.nonce) {
      throw new PipelineError("INVALID_REQUEST", `Transaction ${found.hash} has nonce ${found.nonce}`);
    }
    return {
      intentId,
      chainId: source.chainId,
      signingAddress: source.signingAddress,
      nonce: source.nonce,
      maxFeePerGas: found.maxFeePerGas ?? 0n,
      maxPriorityFeePerGas: found.maxPriorityFeePerGas ?? 0n,
      gasLimit: found.gasLimit,
      rawTx: null,
      txHash: found.hash,
      sentAt: new Date(this.now()).toISOString(),
    };
  }
}
