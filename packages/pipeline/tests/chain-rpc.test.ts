/**
 * Tests for the chain RPC adapters.
 *
 * viem's createPublicClient is mocked. No actual RPC calls are made.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { TransactionReceiptNotFoundError } from "viem";
import { ResilientChainRpc, ViemChainRpc } from "../src/chain-rpc.js";
import type { ChainRpc } from "../src/chain-rpc.js";
import { RpcTimeoutError } from "../src/errors.js";
import { RetryPolicy } from "../src/retry.js";

// =============================================================================
// Mocks
// =============================================================================

const mockGetTransactionCount = vi.fn();
const mockEstimateFeesPerGas = vi.fn();
const mockGetTransactionReceipt = vi.fn();
const mockGetBlock = vi.fn();
const mockGetBlockNumber = vi.fn();

vi.mock("viem", async () => {
  const actual = await vi.importActual("viem");
  return {
    ...actual,
    createPublicClient: vi.fn(() => ({
      getTransactionCount: mockGetTransactionCount,
      estimateFeesPerGas: mockEstimateFeesPerGas,
      getTransactionReceipt: mockGetTransactionReceipt,
      getBlock: mockGetBlock,
      getBlockNumber: mockGetBlockNumber,
    })),
  };
});

const HASH = `0x${"ab".repeat(32)}` as const;
const FROM = "0x1111111111111111111111111111111111111111";

function createRpc(): ViemChainRpc {
  return new ViemChainRpc({ rpcUrl: "https://mock-rpc.example.com", chainId: 8453, timeoutMs: 5000 });
}

// =============================================================================
// ViemChainRpc
// =============================================================================

describe("ViemChainRpc", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("reads the nonce for the requested block tag", async () => {
    mockGetTransactionCount.mockResolvedValue(7);
    const rpc = createRpc();

    await expect(rpc.getTransactionCount(FROM, "pending")).resolves.toBe(7);
    expect(mockGetTransactionCount).toHaveBeenCalledWith({ address: FROM, blockTag: "pending" });
  });

  it("asks for EIP-1559 fee suggestions", async () => {
    mockEstimateFeesPerGas.mockResolvedValue({ maxFeePerGas: 30n, maxPriorityFeePerGas: 2n, gasPrice: undefined });
    const rpc = createRpc();

    await expect(rpc.estimateFees()).resolves.toEqual({ maxFeePerGas: 30n, maxPriorityFeePerGas: 2n });
    expect(mockEstimateFeesPerGas).toHaveBeenCalledWith({ type: "eip1559" });
  });

  it("maps a receipt", async () => {
    mockGetTransactionReceipt.mockResolvedValue({
      transactionHash: HASH,
      status: "reverted",
      blockNumber: 120n,
      gasUsed: 21_000n,
      effectiveGasPrice: 12n,
    });
    const rpc = createRpc();

    await expect(rpc.getTransactionReceipt(HASH)).resolves.toEqual({
      txHash: HASH,
      status: 0,
      blockNumber: 120,
      gasUsed: 21_000n,
      effectiveGasPrice: 12n,
    });
  });

  it("returns null for a receipt that does not exist yet", async () => {
    mockGetTransactionReceipt.mockRejectedValue(new TransactionReceiptNotFoundError({ hash: HASH }));
    const rpc = createRpc();

    await expect(rpc.getTransactionReceipt(HASH)).resolves.toBeNull();
  });

  it("propagates other receipt errors", async () => {
    mockGetTransactionReceipt.mockRejectedValue(new Error("fetch failed"));
    const rpc = createRpc();

    await expect(rpc.getTransactionReceipt(HASH)).rejects.toThrow("fetch failed");
  });

  it("reduces block transactions to the lookup fields", async () => {
    mockGetBlock.mockResolvedValue({
      transactions: [
        {
          hash: HASH,
          from: FROM,
          nonce: 4,
          maxFeePerGas: 30n,
          maxPriorityFeePerGas: 2n,
          gas: 75_200n,
          input: "0x",
        },
      ],
    });
    const rpc = createRpc();

    await expect(rpc.getBlockTransactions(99)).resolves.toEqual([
      { hash: HASH, from: FROM, nonce: 4, maxFeePerGas: 30n, maxPriorityFeePerGas: 2n, gasLimit: 75_200n },
    ]);
    expect(mockGetBlock).toHaveBeenCalledWith({ blockNumber: 99n, includeTransactions: true });
  });

  it("converts the block number", async () => {
    mockGetBlockNumber.mockResolvedValue(12345n);
    await expect(createRpc().getBlockNumber()).resolves.toBe(12345);
  });
});

// =============================================================================
// ResilientChainRpc
// =============================================================================

function stubRpc(overrides: Partial<ChainRpc> = {}): ChainRpc {
  return {
    chainId: 8453,
    getTransactionCount: vi.fn().mockResolvedValue(0),
    estimateFees: vi.fn().mockResolvedValue({ maxFeePerGas: 10n, maxPriorityFeePerGas: 1n }),
    estimateGas: vi.fn().mockResolvedValue(21_000n),
    sendRawTransaction: vi.fn().mockResolvedValue(HASH),
    getTransactionReceipt: vi.fn().mockResolvedValue(null),
    getBlockNumber: vi.fn().mockResolvedValue(1),
    getBlockTransactions: vi.fn().mockResolvedValue([]),
    ...overrides,
  };
}

const fastRetry = (maxAttempts: number): RetryPolicy =>
  new RetryPolicy({ maxAttempts, baseDelayMs: 1, maxDelayMs: 1, jitterMs: 0 }, { sleep: async () => {} });
const retry = fastRetry(3);

describe("ResilientChainRpc", () => {
  it("retries a transient read", async () => {
    const getBlockNumber = vi.fn()
      .mockRejectedValueOnce(new Error("ECONNRESET"))
      .mockResolvedValueOnce(42);
    const rpc = new ResilientChainRpc(stubRpc({ getBlockNumber }), { retry });

    await expect(rpc.getBlockNumber()).resolves.toBe(42);
    expect(getBlockNumber).toHaveBeenCalledTimes(2);
  });

  it("does not retry a permanent read failure", async () => {
    const estimateGas = vi.fn().mockRejectedValue(new Error("execution reverted"));
    const rpc = new ResilientChainRpc(stubRpc({ estimateGas }), { retry });

    await expect(
      rpc.estimateGas({ from: FROM, to: FROM, data: "0x", value: 0n }),
    ).rejects.toThrow("execution reverted");
    expect(estimateGas).toHaveBeenCalledTimes(1);
  });

  it("times out a hanging read on every attempt", async () => {
    const getTransactionCount = vi.fn(() => new Promise<number>(() => {}));
    const rpc = new ResilientChainRpc(stubRpc({ getTransactionCount }), {
      retry: fastRetry(2),
      timeoutMs: 5,
    });

    await expect(rpc.getTransactionCount(FROM, "latest")).rejects.toMatchObject({
      code: "RETRY_EXHAUSTED",
      message: "getTransactionCount failed after 2 attempts",
      lastError: expect.any(RpcTimeoutError),
    });
    expect(getTransactionCount).toHaveBeenCalledTimes(2);
  });

  it("submits raw transactions once", async () => {
    const sendRawTransaction = vi.fn().mockRejectedValue(new Error("ECONNRESET"));
    const rpc = new ResilientChainRpc(stubRpc({ sendRawTransaction }), { retry });

    await expect(rpc.sendRawTransaction("0x02")).rejects.toThrow("ECONNRESET");
    expect(sendRawTransaction).toHaveBeenCalledTimes(1);
  });

  it("keeps the inner chain id", () => {
    expect(new ResilientChainRpc(stubRpc()).chainId).toBe(8453);
  });
});
