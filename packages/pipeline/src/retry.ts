/**
 * @txrelay/pipeline — Bounded retry policy.
 *
 * A RetryPolicy owns the whole retry decision for a network call: the
 * attempt bound, the backoff between attempts and which failures earn
 * another attempt. Allocation, broadcast and chain reads each run through
 * one, so a caller never pairs a config with its own predicate.
 *
 * Delay before retry n (zero-based):
 *   min(baseDelayMs * 2^n + random() * jitterMs, maxDelayMs)
 */

import pino from "pino";
import type { Logger } from "pino";
import { isTransientRpcError } from "./classify.js";

export interface RetryConfig {
  /** Attempts including the first. Default: 3 */
  readonly maxAttempts: number;
  /** Default: 250 */
  readonly baseDelayMs: number;
  /** Default: 5000 */
  readonly maxDelayMs: number;
  /** Upper bound of the random delay added per retry. Default: 100 */
  readonly jitterMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 250,
  maxDelayMs: 5000,
  jitterMs: 100,
};

export interface RetryPolicyOptions {
  /** Failures that earn another attempt. Default: isTransientRpcError */
  readonly isRetryable?: ((err: unknown) => boolean) | undefined;
  readonly sleep?: ((ms: number) => Promise<void>) | undefined;
  /** Jitter source in [0, 1). Default: Math.random */
  readonly random?: (() => number) | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Every attempt of an operation failed with a retryable error.
 */
export class RetryExhaustedError extends Error {
  public readonly code = "RETRY_EXHAUSTED" as const;

  constructor(
    public readonly operation: string,
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    super(`${operation} failed after ${attempts} attempts`, { cause: lastError });
    this.name = "RetryExhaustedError";
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class RetryPolicy {
  readonly config: RetryConfig;

  private readonly isRetryable: (err: unknown) => boolean;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly logger: Logger;

  constructor(config: Partial<RetryConfig> = {}, options: RetryPolicyOptions = {}) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    if (!Number.isInteger(this.config.maxAttempts) || this.config.maxAttempts < 1) {
      throw new RangeError("maxAttempts must be a positive integer");
    }
    if (this.config.baseDelayMs < 0 || this.config.maxDelayMs < 0 || this.config.jitterMs < 0) {
      throw new RangeError("Retry delays must not be negative");
    }

    this.isRetryable = options.isRetryable ?? isTransientRpcError;
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? pino({ level: "silent" });
  }

  /** Delay before retry `retry` (0 = the first retry). */
  delayFor(retry: number): number {
    const exponential = this.config.baseDelayMs * 2 ** retry;
    return Math.min(exponential + this.random() * this.config.jitterMs, this.config.maxDelayMs);
  }

  /**
   * Run `fn` until it succeeds, fails with an error the policy does not
   * retry, or runs out of attempts. `fn` receives the one-based attempt.
   *
   * @throws RetryExhaustedError when the last attempt failed retryably
   * @throws the failure itself when it is not retryable
   */
  async run<T>(operation: string, fn: (attempt: number) => Promise<T>): Promise<T> {
    const { maxAttempts } = this.config;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return await fn(attempt);
      } catch (err) {
        if (!this.isRetryable(err)) {
          throw err;
        }
        lastError = err;

        if (attempt < maxAttempts) {
          const delayMs = this.delayFor(attempt - 1);
          this.logger.debug({ operation, attempt, delayMs, err }, "Retrying after a transient failure");
          await this.sleep(delayMs);
        }
      }
    }

    throw new RetryExhaustedError(operation, maxAttempts, lastError);
  }
}
