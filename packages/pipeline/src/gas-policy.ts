/**
 * @txrelay/pipeline — EIP-1559 gas policy.
 *
 * Turns a node's fee suggestion into the fees and gas limit a transaction
 * is signed with. Multipliers are basis points (10000 = ×1.0) so every
 * computation stays in bigint.
 *
 * Rules:
 * - maxFeePerGas never exceeds the cap
 * - maxPriorityFeePerGas is clamped to [floor, ceiling] and never exceeds maxFeePerGas
 * - A replacement pays at least the prior fees × MIN_REPLACEMENT_BUMP_BPS on
 *   both components, or it is not built at all
 */

import type { FeeParams } from "@txrelay/types";
import { UnderpricedReplacementError } from "./errors.js";

const GWEI = 1_000_000_000n;
const BPS = 10_000n;

/** Nodes reject a same-nonce replacement below a 10% bump. */
export const MIN_REPLACEMENT_BUMP_BPS = 11_000;

export interface GasPolicyConfig {
  /** Ceiling on maxFeePerGas, in wei. Default: 150 gwei */
  readonly maxFeeCapWei: bigint;
  /** Ceiling on the priority fee, in wei. Default: 2 gwei */
  readonly maxPriorityFeeWei: bigint;
  /** Floor on the priority fee, in wei. Default: 1 gwei */
  readonly minPriorityFeeWei: bigint;
  /** Applied to the suggested maxFeePerGas. Default: 12000 (×1.2) */
  readonly surgeMultiplierBps: number;
  /** Bump applied to a prior Send's fees on replacement. Default: 11500 (×1.15) */
  readonly replacementBumpBps: number;
  /** Applied to a gas estimate. Default: 12000 (×1.2) */
  readonly gasLimitMultiplierBps: number;
  /** Added to a padded gas estimate. Default: 50000 */
  readonly gasLimitBuffer: bigint;
}

export const DEFAULT_GAS_POLICY: GasPolicyConfig = {
  maxFeeCapWei: 150n * GWEI,
  maxPriorityFeeWei: 2n * GWEI,
  minPriorityFeeWei: 1n * GWEI,
  surgeMultiplierBps: 12_000,
  replacementBumpBps: 11_500,
  gasLimitMultiplierBps: 12_000,
  gasLimitBuffer: 50_000n,
};

/** `value × bps / 10000`, rounded up. */
export function applyBps(value: bigint, bps: number): bigint {
  const scaled = value * BigInt(bps);
  return (scaled + BPS - 1n) / BPS;
}

function maxOf(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

function minOf(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export class GasPolicy {
  readonly config: GasPolicyConfig;

  constructor(config: Partial<GasPolicyConfig> = {}) {
    this.config = { ...DEFAULT_GAS_POLICY, ...config };
    if (this.config.replacementBumpBps < MIN_REPLACEMENT_BUMP_BPS) {
      throw new RangeError(
        `replacementBumpBps must be at least ${MIN_REPLACEMENT_BUMP_BPS}`,
      );
    }
    if (this.config.minPriorityFeeWei > this.config.maxPriorityFeeWei) {
      throw new RangeError("minPriorityFeeWei must not exceed maxPriorityFeeWei");
    }
  }

  /** Fees for a first send, from the node's suggestion. */
  quote(suggested: FeeParams): FeeParams {
    const { maxFeeCapWei, maxPriorityFeeWei, minPriorityFeeWei, surgeMultiplierBps } =
      this.config;

    const maxFeePerGas = minOf(applyBps(suggested.maxFeePerGas, surgeMultiplierBps), maxFeeCapWei);
    const priority = minOf(
      maxOf(suggested.maxPriorityFeePerGas, minPriorityFeeWei),
      maxPriorityFeeWei,
    );

    return { maxFeePerGas, maxPriorityFeePerGas: minOf(priority, maxFeePerGas) };
  }

  /** Fees used when the node gives no suggestion: the caps. */
  fallback(): FeeParams {
    return {
      maxFeePerGas: this.config.maxFeeCapWei,
      maxPriorityFeePerGas: minOf(this.config.maxPriorityFeeWei, this.config.maxFeeCapWei),
    };
  }

  padGasLimit(estimate: bigint): bigint {
    return applyBps(estimate, this.config.gasLimitMultiplierBps) + this.config.gasLimitBuffer;
  }

  /** Both components × bps, rounded up. */
  bump(fees: FeeParams, bps: number = this.config.replacementBumpBps): FeeParams {
    return {
      maxFeePerGas: applyBps(fees.maxFeePerGas, bps),
      maxPriorityFeePerGas: applyBps(fees.maxPriorityFeePerGas, bps),
    };
  }

  /**
   * Fees for a same-nonce replacement of `prior`: the larger of the current
   * quote and the bumped prior fees, per component, capped.
   *
   * @throws UnderpricedReplacementError when the cap leaves the fees below
   *   the node's minimum bump
   */
  replacementFees(
    prior: FeeParams,
    suggested: FeeParams,
    bumpBps: number = this.config.replacementBumpBps,
  ): FeeParams {
    const required = this.bump(prior, MIN_REPLACEMENT_BUMP_BPS);
    const target = this.bump(prior, Math.max(bumpBps, MIN_REPLACEMENT_BUMP_BPS));
    const quoted = this.quote(suggested);

    const maxFeePerGas = minOf(
      maxOf(quoted.maxFeePerGas, target.maxFeePerGas),
      this.config.maxFeeCapWei,
    );
    const offered: FeeParams = {
      maxFeePerGas,
      maxPriorityFeePerGas: minOf(
        maxOf(quoted.maxPriorityFeePerGas, target.maxPriorityFeePerGas),
        maxFeePerGas,
      ),
    };

    if (
      offered.maxFeePerGas < required.maxFeePerGas ||
      offered.maxPriorityFeePerGas < required.maxPriorityFeePerGas
    ) {
      throw new UnderpricedReplacementError(required, offered);
    }
    return offered;
  }
}
