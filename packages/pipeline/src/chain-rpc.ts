/**
 * @txrelay/pipeline — Chain RPC.
 *
 * The slice of an EVM JSON-RPC endpoint the pipeline consumes: nonce for
 * address, fee suggestion, gas estimate, raw submit, receipt by hash and
 * block by number.
 *
 * - ViemChainRpc talks to a node through a viem public client
 * - ResilientChainRpc wraps any ChainRpc with a timeout on every call and
 *   bounded retry on transient read failures. Raw submission gets the
 *   timeout only; its retries belong to the Broadcaster.
 */

import { createPublicClient, http, TransactionReceiptNotFoundError, type Chain } from "viem";
import { arbitrum, base, baseSepolia, mainnet, optimism, polygon, sepolia } from "viem/chains";
import pino from "pino";
import type { Logger } from "pino";
import type { ChainId, FeeParams, HexString, TxHash } from "@txrelay/types";
import { RetryPolicy } from "./retry.js";
import { withTimeout } from "./timeout.js";

// =============================================================================
// Contract
// =============================================================================

export type NonceBlockTag = "latest" | "pending";

export interface GasEstimateRequest {
  readonly from: HexString;
  readonly to: HexString;
  readonly data: HexString;
  readonly value: bigint;
}

/** Receipt fields as the chain reports them. */
export interface ChainReceipt {
  readonly txHash: TxHash;
  readonly status: 0 | 1;
  readonly blockNumber: number;
  readonly gasUsed: bigint;
  readonly effectiveGasPrice: bigint;
}

/** A mined transaction, reduced to what reverse lookup needs. */
export interface ChainTransaction {
  readonly hash: TxHash;
  readonly from: HexString;
  readonly nonce: number;
  readonly maxFeePerGas: bigint | undefined;
  readonly maxPriorityFeePerGas: bigint | undefined;
  readonly gasLimit: bigint;
}

export interface ChainRpc {
  readonly chainId: ChainId;

  /** Transactions sent by `address`: mined ("latest") or including the mempool ("pending"). */
  getTransactionCount(address: HexString, blockTag: NonceBlockTag): Promise<number>;

  estimateFees(): Promise<FeeParams>;

  estimateGas(request: GasEstimateRequest): Promise<bigint>;

  /** Submit a signed transaction. Resolves with the node's hash. */
  sendRawTransaction(rawTx: HexString): Promise<TxHash>;

  /** Receipt for `hash`, or null while it is not mined. */
  getTransactionReceipt(hash: TxHash): Promise<ChainReceipt | null>;

  getBlockNumber(): Promise<number>;

  getBlockTransactions(blockNumber: number): Promise<readonly ChainTransaction[]>;
}

// =============================================================================
// viem implementation
// =============================================================================

const VIEM_CHAINS: Record<number, Chain> = {
  [mainnet.id]: mainnet,
  [sepolia.id]: sepolia,
  [base.id]: base,
  [baseSepolia.id]: baseSepolia,
  [arbitrum.id]: arbitrum,
  [optimism.id]: optimism,
  [polygon.id]: polygon,
};

export interface ViemChainRpcConfig {
  readonly rpcUrl: string;
  readonly chainId: ChainId;
  /** Transport-level timeout. Default: 30000 */
  readonly timeoutMs?: number | undefined;
}

function createClient(config: ViemChainRpcConfig) {
  return createPublicClient({
    chain: VIEM_CHAINS[config.chainId],
    transport: http(config.rpcUrl, { timeout: config.timeoutMs ?? 30_000 }),
  });
}

export class ViemChainRpc implements ChainRpc {
  readonly chainId: ChainId;
  private readonly client: ReturnType<typeof createClient>;

  constructor(config: ViemChainRpcConfig) {
    this.chainId = config.chainId;
    this.client = createClient(config);
  }

  async getTransactionCount(address: HexString, blockTag: NonceBlockTag): Promise<number> {
    return this.client.getTransactionCount({ address, blockTag });
  }

  async estimateFees(): Promise<FeeParams> {
    const fees = await this.client.estimateFeesPerGas({ type: "eip1559", chain: undefined });
    return {
      maxFeePerGas: fees.maxFeePerGas,
      maxPriorityFeePerGas: fees.maxPriorityFeePerGas,
    };
  }

  async estimateGas(request: GasEstimateRequest): Promise<bigint> {
    return this.client.estimateGas({
      account: request.from,
      to: request.to,
      data: request.data,
      value: request.value,
    });
  }

  async sendRawTransaction(rawTx: HexString): Promise<TxHash> {
    return this.client.sendRawTransaction({ serializedTransaction: rawTx });
  }

  async getTransactionReceipt(hash: TxHash): Promise<ChainReceipt | null> {
    try {
      const receipt = await this.client.getTransactionReceipt({ hash });
      return {
        txHash: receipt.transactionHash,
        status: receipt.status === "success" ? 1 : 0,
        blockNumber: Number(receipt.blockNumber),
        gasUsed: receipt.gasUsed,
        effectiveGasPrice: receipt.effectiveGasPrice,
      };
    } catch (err) {
      if (err instanceof TransactionReceiptNotFoundError) {
        return null;
      }
      throw err;
    }
  }

  async getBlockNumber(): Promise<number> {
    return Number(await this.client.getBlockNumber());
  }

  async getBlockTransactions(blockNumber: number): Promise<readonly ChainTransaction[]> {
    const block = await this.client.getBlock({
      blockNumber: BigInt(blockNumber),
      includeTransactions: true,
    });
    return block.transactions.map((tx) => ({
      hash: tx.hash,
      from: tx.from,
      nonce: tx.nonce,
      maxFeePerGas: tx.maxFeePerGas,
      maxPriorityFeePerGas: tx.maxPriorityFeePerGas,
      gasLimit: tx.gas,
    }));
  }
}

// =============================================================================
// Resilient decorator
// =============================================================================

export interface ResilientChainRpcOptions {
  /** Per-call timeout. Default: 10000 */
  readonly timeoutMs?: number | undefined;
  /** Governs read retries. Default: RetryPolicy defaults */
  readonly retry?: RetryPolicy | undefined;
  readonly logger?: Logger | undefined;
}

export class ResilientChainRpc implements ChainRpc {
  readonly chainId: ChainId;
  private readonly inner: ChainRpc;
  private readonly timeoutMs: number;
  private readonly retry: RetryPolicy;
  private readonly logger: Logger;

  constructor(inner: ChainRpc, options: ResilientChainRpcOptions = {}) {
    this.inner = inner;
    this.chainId = inner.chainId;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.retry = options.retry ?? new RetryPolicy();
    this.logger = options.logger ?? pino({ level: "silent" });
  }

  getTransactionCount(address: HexString, blockTag: NonceBlockTag): Promise<number> {
    return this.read("getTransactionCount", () => this.inner.getTransactionCount(address, blockTag));
  }

  estimateFees(): Promise<FeeParams> {
    return this.read("estimateFees", () => this.inner.estimateFees());
  }

  estimateGas(request: GasEstimateRequest): Promise<bigint> {
    return this.read("estimateGas", () => this.inner.estimateGas(request));
  }

  sendRawTransaction(rawTx: HexString): Promise<TxHash> {
    return withTimeout(this.inner.sendRawTransaction(rawTx), this.timeoutMs, "sendRawTransaction");
  }

  getTransactionReceipt(hash: TxHash): Promise<ChainReceipt | null> {
    return this.read("getTransactionReceipt", () => this.inner.getTransactionReceipt(hash));
  }

  getBlockNumber(): Promise<number> {
    return this.read("getBlockNumber", () => this.inner.getBlockNumber());
  }

  getBlockTransactions(blockNumber: number): Promise<readonly ChainTransaction[]> {
    return this.read("getBlockTransactions", () => this.inner.getBlockTransactions(blockNumber));
  }

  private read<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return this.retry.run(operation, (attempt) => {
      if (attempt > 1) {
        this.logger.debug({ operation, attempt }, "Retrying chain read");
      }
      return withTimeout(fn(), this.timeoutMs, operation);
    });
  }
}
