/**
 * @txrelay/pipeline — Fee-bumped replacement of a live Send.
 *
 * Shared by the reconciler's stuck-transaction path and manual
 * `forceReplace`. A node that still calls the bump underpriced gets one
 * more attempt with a larger bump.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { Send } from "@txrelay/types";
import type { IntentLedger } from "@txrelay/ledger";
import type { Allocator } from "./allocator.js";
import type { Broadcaster } from "./broadcaster.js";
import { callFromSend } from "./broadcaster.js";
import { PipelineError, UnderpricedReplacementError } from "./errors.js";

/** Added to the policy bump after an underpriced rejection. */
export const ESCALATION_BPS = 2_500;

export class FeeBumper {
  private readonly ledger: IntentLedger;
  private readonly allocator: Allocator;
  private readonly broadcaster: Broadcaster;
  private readonly logger: Logger;

  constructor(
    ledger: IntentLedger,
    allocator: Allocator,
    broadcaster: Broadcaster,
    logger: Logger = pino({ level: "silent" }),
  ) {
    this.ledger = ledger;
    this.allocator = allocator;
    this.broadcaster = broadcaster;
    this.logger = logger;
  }

  /**
   * Replace the live Send of a SENT intent with a fee-bumped one.
   *
   * @throws PipelineError NO_LIVE_SEND when the intent has nothing to replace
   * @throws PipelineError NOT_REPLACEABLE for a Send recovered from chain
   * @throws UnderpricedReplacementError when the fee cap blocks the bump
   */
  async bump(intentId: number): Promise<Send> {
    const intent = this.ledger.requireIntent(intentId);
    if (intent.status !== "SENT" && intent.status !== "REPLACED") {
      throw new PipelineError(
        "NO_LIVE_SEND",
        `Intent ${intentId} is ${intent.status}; only a sent intent can be replaced`,
      );
    }
    const live = this.ledger.liveSend(intentId);
    if (!live) {
      throw new PipelineError("NO_LIVE_SEND", `Intent ${intentId} has no live send`);
    }

    const call = callFromSend(live);
    const allocation = await this.allocator.allocateReplacement(intentId, live);
    try {
      return await this.broadcaster.replace(intentId, live, allocation, call);
    } catch (err) {
      if (!(err instanceof UnderpricedReplacementError)) {
        throw err;
      }
      const escalated = this.allocator.policy.config.replacementBumpBps + ESCALATION_BPS;
      this.logger.warn({ intentId, txHash: live.txHash, bumpBps: escalated }, "Escalating replacement bump");
      const retry = await this.allocator.allocateReplacement(intentId, live, escalated);
      return this.broadcaster.replace(intentId, live, retry, call);
    }
  }
}
