/**
 * Test helpers for @txrelay/node.
 *
 * Builds the Hono app over an in-memory store, a test vault and a stub
 * chain that accepts every transaction. No HTTP server, no network.
 */

import { keccak256 } from "viem";
import type { FeeParams, HexString, TxHash } from "@txrelay/types";
import { InMemoryTxStore } from "@txrelay/store";
import { KeyVault, MasterKeyring, WalletKeyring } from "@txrelay/key-vault";
import { RetryPolicy, TxPipeline } from "@txrelay/pipeline";
import type {
  ChainReceipt,
  ChainRpc,
  ChainTransaction,
  TxPipelineOptions,
} from "@txrelay/pipeline";
import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";

export const CHAIN_ID = 8453;
export const PRIVATE_KEY: HexString = `0x${"22".repeat(32)}`;

// =============================================================================
// Stub chain
// =============================================================================

/**
 * Accepts every raw transaction, mines nothing on its own. Tests add
 * receipts by hash.
 */
export class StubChain implements ChainRpc {
  readonly chainId = CHAIN_ID;
  readonly submitted: HexString[] = [];
  readonly receipts = new Map<string, ChainReceipt>();
  fees: FeeParams = { maxFeePerGas: 3_000_000_000n, maxPriorityFeePerGas: 1_000_000_000n };
  blockNumber = 100;

  async getTransactionCount(): Promise<number> {
    return 0;
  }

  async estimateFees(): Promise<FeeParams> {
    return this.fees;
  }

  async estimateGas(): Promise<bigint> {
    return 21_000n;
  }

  async sendRawTransaction(rawTx: HexString): Promise<TxHash> {
    this.submitted.push(rawTx);
    return keccak256(rawTx);
  }

  async getTransactionReceipt(hash: TxHash): Promise<ChainReceipt | null> {
    return this.receipts.get(hash) ?? null;
  }

  async getBlockNumber(): Promise<number> {
    return this.blockNumber;
  }

  async getBlockTransactions(): Promise<readonly ChainTransaction[]> {
    return [];
  }

  /** Mark `hash` as mined successfully. */
  mine(hash: TxHash): void {
    this.receipts.set(hash, {
      txHash: hash,
      status: 1,
      blockNumber: this.blockNumber,
      gasUsed: 21_000n,
      effectiveGasPrice: this.fees.maxFeePerGas,
    });
  }
}

// =============================================================================
// App factory
// =============================================================================

export interface TestApp extends AppInstance {
  readonly chain: StubChain;
  readonly store: InMemoryTxStore;
  readonly keyring: WalletKeyring;
  readonly pipeline: TxPipeline;
  /** Checksummed address of the wallet imported from PRIVATE_KEY */
  readonly address: HexString;
}

/**
 * Create a test app with one imported wallet and silent logging.
 */
export function createTestApp(
  overrides: Partial<Omit<CreateAppOptions, "pipeline" | "keyring">> = {},
  pipelineOptions: TxPipelineOptions = {},
): TestApp {
  const chain = new StubChain();
  const store = new InMemoryTxStore();
  const vault = new KeyVault(new MasterKeyring({ id: "test", key: new Uint8Array(32).fill(9) }));
  const keyring = new WalletKeyring(vault, store);
  const address = keyring.importKey(PRIVATE_KEY);
  const pipeline = new TxPipeline(store, chain, keyring, {
    retry: new RetryPolicy({}, { sleep: async () => {} }),
    ...pipelineOptions,
  });

  const { app } = createApp({ pipeline, keyring, ...overrides });
  return { app, chain, store, keyring, pipeline, address };
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

/** A submit body for the test wallet. */
export function submitBody(intentKey: string, signingAddress: string): Record<string, unknown> {
  return {
    intentKey,
    signingAddress,
    call: {
      chainId: CHAIN_ID,
      to: "0x3333333333333333333333333333333333333333",
      data: "0xa9059cbb",
      value: "0",
    },
    metadata: { market: "ETH-USD" },
  };
}
