/**
 * @txrelay/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * The entry point loads a `.env` file first when one exists.
 */

import { parseGwei } from "viem";
import { z } from "zod";
import type { GasPolicyConfig, ReconcilerConfig, RetryConfig } from "@txrelay/pipeline";

// =============================================================================
// Schema
// =============================================================================

const gwei = (fallback: string) =>
  z
    .string()
    .regex(/^\d+(\.\d{1,9})?$/, "Expected a decimal gwei amount")
    .default(fallback)
    .transform((v) => parseGwei(v));

const flag = (fallback: "true" | "false") =>
  z
    .string()
    .transform((v) => v === "true")
    .default(fallback);

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Persistence
  DATABASE_PATH: z.string().min(1).default("./data/txrelay.db"),

  // Chain
  RPC_URL: z.string().url(),
  CHAIN_ID: z.coerce.number().int().positive(),
  RPC_TIMEOUT_MS: z.coerce.number().int().min(100).default(10_000),
  RPC_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),

  // Key vault
  VAULT_MASTER_KEY: z.string().min(1),
  VAULT_MASTER_KEY_ID: z.string().min(1).default("primary"),
  VAULT_RETIRED_KEYS: z.string().optional(),
  VAULT_ROTATE_ON_START: flag("false"),

  // Gas policy
  GAS_MAX_FEE_CAP_GWEI: gwei("150"),
  GAS_MAX_PRIORITY_FEE_GWEI: gwei("2"),
  GAS_MIN_PRIORITY_FEE_GWEI: gwei("1"),
  GAS_SURGE_MULTIPLIER_BPS: z.coerce.number().int().min(10_000).default(12_000),
  GAS_REPLACEMENT_BUMP_BPS: z.coerce.number().int().min(11_000).default(11_500),

  // Reconciler
  RECONCILE_INTERVAL_MS: z.coerce.number().int().min(1000).default(15_000),
  RECEIPT_THRESHOLD_MS: z.coerce.number().int().min(0).default(60_000),
  STUCK_THRESHOLD_MS: z.coerce.number().int().min(0).default(180_000),
  ORPHAN_THRESHOLD_MS: z.coerce.number().int().min(0).default(300_000),
  MAX_REPLACEMENTS: z.coerce.number().int().min(0).default(3),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

// =============================================================================
// Pipeline settings
// =============================================================================

export function gasPolicyConfig(config: AppConfig): Partial<GasPolicyConfig> {
  return {
    maxFeeCapWei: config.GAS_MAX_FEE_CAP_GWEI,
    maxPriorityFeeWei: config.GAS_MAX_PRIORITY_FEE_GWEI,
    minPriorityFeeWei: config.GAS_MIN_PRIORITY_FEE_GWEI,
    surgeMultiplierBps: config.GAS_SURGE_MULTIPLIER_BPS,
    replacementBumpBps: config.GAS_REPLACEMENT_BUMP_BPS,
  };
}

export function reconcilerConfig(config: AppConfig): Partial<ReconcilerConfig> {
  return {
    receiptThresholdMs: config.RECEIPT_THRESHOLD_MS,
    stuckThresholdMs: config.STUCK_THRESHOLD_MS,
    orphanThresholdMs: config.ORPHAN_THRESHOLD_MS,
    maxReplacements: config.MAX_REPLACEMENTS,
  };
}

export function retryConfig(config: AppConfig): RetryConfig {
  return {
    maxAttempts: config.RPC_MAX_ATTEMPTS,
    baseDelayMs: 250,
    maxDelayMs: 5000,
    jitterMs: 100,
  };
}
