/**
 * Wires a TxPipeline over an in-memory store, a test vault and FakeChain,
 * with a controllable clock and no real sleeps.
 */

import type { BuiltCall, HexString } from "@txrelay/types";
import { InMemoryTxStore } from "@txrelay/store";
import { KeyVault, MasterKeyring, WalletKeyring } from "@txrelay/key-vault";
import { RetryPolicy } from "../../src/retry.js";
import { TxPipeline } from "../../src/tx-pipeline.js";
import type { TxPipelineOptions } from "../../src/tx-pipeline.js";
import { FakeChain } from "./fake-chain.js";

export const CHAIN_ID = 8453;
export const PRIVATE_KEY: HexString = `0x${"11".repeat(32)}`;
export const START = Date.parse("2026-03-01T00:00:00.000Z");

export const CALL: BuiltCall = {
  chainId: CHAIN_ID,
  to: "0x2222222222222222222222222222222222222222",
  data: "0xa9059cbb",
  value: 0n,
};

/** A retry policy that never sleeps. */
export function fastRetry(maxAttempts: number): RetryPolicy {
  return new RetryPolicy(
    { maxAttempts, baseDelayMs: 1, maxDelayMs: 1, jitterMs: 0 },
    { sleep: async () => {} },
  );
}

export interface Harness {
  readonly store: InMemoryTxStore;
  readonly keyring: WalletKeyring;
  readonly address: HexString;
  readonly chain: FakeChain;
  readonly pipeline: TxPipeline;
  /** Move the pipeline clock forward. */
  advance(ms: number): void;
}

export function createHarness(options: TxPipelineOptions = {}): Harness {
  const store = new InMemoryTxStore();
  const vault = new KeyVault(new MasterKeyring({ id: "test", key: new Uint8Array(32).fill(7) }));
  const keyring = new WalletKeyring(vault, store, () => new Date(START).toISOString());
  const address = keyring.importKey(PRIVATE_KEY);
  const chain = new FakeChain(CHAIN_ID);

  let now = START;
  const pipeline = new TxPipeline(store, chain, keyring, {
    now: () => now,
    retry: fastRetry(3),
    gasPolicy: {
      maxFeeCapWei: 1_000n,
      maxPriorityFeeWei: 5n,
      minPriorityFeeWei: 1n,
      surgeMultiplierBps: 10_000,
    },
    reconciler: {
      receiptThresholdMs: 60_000,
      stuckThresholdMs: 120_000,
      orphanThresholdMs: 300_000,
      maxReplacements: 3,
      scanDepth: 16,
    },
    ...options,
  });

  return {
    store,
    keyring,
    address,
    chain,
    pipeline,
    advance(ms: number) {
      now += ms;
    },
  };
}
