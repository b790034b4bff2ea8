/**
 * @txrelay/pipeline — Transaction lifecycle pipeline.
 *
 * Allocation, broadcast and reconciliation of intents against one EVM
 * chain, behind the TxPipeline facade.
 */

// Facade
export { TxPipeline } from "./tx-pipeline.js";
export type { SubmitRequest, SubmitResult, TxPipelineOptions } from "./tx-pipeline.js";

// Components
export { Allocator } from "./allocator.js";
export type { AllocatorOptions } from "./allocator.js";
export { Broadcaster, callFromSend } from "./broadcaster.js";
export type { BroadcasterOptions, SignedTransaction } from "./broadcaster.js";
export { FeeBumper, ESCALATION_BPS } from "./fee-bumper.js";
export { Reconciler, DEFAULT_RECONCILER_CONFIG } from "./reconciler.js";
export type { ReconcilerConfig, ReconcilerOptions, ReconcileReport } from "./reconciler.js";
export { ReconcileScheduler } from "./scheduler.js";
export type { Pollable, ReconcileSchedulerOptions } from "./scheduler.js";

// Gas
export {
  GasPolicy,
  DEFAULT_GAS_POLICY,
  MIN_REPLACEMENT_BUMP_BPS,
  applyBps,
} from "./gas-policy.js";
export type { GasPolicyConfig } from "./gas-policy.js";

// Chain access
export { ViemChainRpc, ResilientChainRpc } from "./chain-rpc.js";
export type {
  ChainRpc,
  ChainReceipt,
  ChainTransaction,
  GasEstimateRequest,
  NonceBlockTag,
  ViemChainRpcConfig,
  ResilientChainRpcOptions,
} from "./chain-rpc.js";
export { classifyBroadcastError, describeRejection, isTransientRpcError } from "./classify.js";

// Concurrency and resilience
export { Mutex, KeyedMutex, addressLockKey } from "./address-lock.js";
export { RetryPolicy, RetryExhaustedError, DEFAULT_RETRY_CONFIG, sleep } from "./retry.js";
export type { RetryConfig, RetryPolicyOptions } from "./retry.js";
export { withTimeout } from "./timeout.js";

// Errors
export {
  PipelineError,
  GasEstimationError,
  NonceConflictError,
  UnderpricedReplacementError,
  BroadcastRejectedError,
  ReceiptTimeoutError,
  RpcTimeoutError,
} from "./errors.js";
export type { PipelineErrorCode, BroadcastRejectionKind } from "./errors.js";
