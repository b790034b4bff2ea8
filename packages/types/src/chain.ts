/**
 * Chain Types
 *
 * Transaction records the pipeline writes and the built call it consumes.
 *
 * Rules:
 * - Wei amounts are bigint, never floating point
 * - Addresses are EIP-55 checksummed before they reach the store
 * - The built call arrives fully scaled; nothing downstream rescales it
 */

/** 0x-prefixed hex string. */
export type HexString = `0x${string}`;

/** EVM chain id (e.g. 8453 for Base). */
export type ChainId = number;

/** Transaction hash. */
export type TxHash = HexString;

/**
 * EIP-1559 fee parameters, in wei.
 */
export interface FeeParams {
  readonly maxFeePerGas: bigint;
  readonly maxPriorityFeePerGas: bigint;
}

/**
 * A pre-validated, pre-scaled contract call produced by the request
 * builder. Values are final on-chain units.
 */
export interface BuiltCall {
  readonly chainId: ChainId;
  readonly to: HexString;
  readonly data: HexString;
  readonly value: bigint;

  /** Skip estimation and use this gas limit as-is */
  readonly gasLimit?: bigint | undefined;
}

/**
 * Nonce and fees claimed for an Intent, recorded under the per-address lock
 * before anything is broadcast.
 */
export interface Allocation {
  readonly intentId: number;
  readonly signingAddress: HexString;
  readonly chainId: ChainId;
  readonly nonce: number;
  readonly fees: FeeParams;
  readonly gasLimit: bigint;
  readonly allocatedAt: string;
}

/**
 * One concrete broadcast attempt for an Intent.
 */
export interface Send {
  readonly id: number;
  readonly intentId: number;
  readonly chainId: ChainId;
  readonly signingAddress: HexString;
  readonly nonce: number;
  readonly maxFeePerGas: bigint;
  readonly maxPriorityFeePerGas: bigint;
  readonly gasLimit: bigint;

  /** Signed payload; null for Sends recovered from chain */
  readonly rawTx: HexString | null;

  readonly txHash: TxHash;
  readonly sentAt: string;

  /** Hash of the Send that superseded this one */
  readonly replacedBy: TxHash | null;
}

/** Send fields supplied by the writer; the store assigns `id`. */
export type NewSend = Omit<Send, "id" | "replacedBy">;

/**
 * Chain-confirmed outcome for a transaction hash.
 */
export interface Receipt {
  readonly txHash: TxHash;

  /** 1 = success, 0 = reverted */
  readonly status: 0 | 1;

  readonly blockNumber: number;
  readonly gasUsed: bigint;
  readonly effectiveGasPrice: bigint;
  readonly minedAt: string;
}
