/**
 * @txrelay/node — Entry point.
 *
 * Loads config, opens the store and the key vault, wires the pipeline and
 * its reconcile scheduler, starts the HTTP server and handles graceful
 * shutdown.
 */

import "dotenv/config";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { serve } from "@hono/node-server";
import pino from "pino";
import { SqliteTxStore } from "@txrelay/store";
import { KeyVault, MasterKeyring, WalletKeyring } from "@txrelay/key-vault";
import {
  ReconcileScheduler,
  ResilientChainRpc,
  RetryPolicy,
  TxPipeline,
  ViemChainRpc,
} from "@txrelay/pipeline";
import { gasPolicyConfig, loadConfig, reconcilerConfig, retryConfig } from "./config.js";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  // ─── Persistence & keys ─────────────────────────────────────────
  if (config.DATABASE_PATH !== ":memory:") {
    mkdirSync(dirname(config.DATABASE_PATH), { recursive: true });
  }
  const store = new SqliteTxStore(config.DATABASE_PATH);

  const vault = new KeyVault(
    MasterKeyring.fromConfig({
      masterKey: config.VAULT_MASTER_KEY,
      masterKeyId: config.VAULT_MASTER_KEY_ID,
      retiredKeys: config.VAULT_RETIRED_KEYS,
    }),
    { logger },
  );
  if (config.VAULT_ROTATE_ON_START) {
    const report = vault.rotateDataKeys(store);
    logger.info(report, "Data keys rotated");
  }
  const keyring = new WalletKeyring(vault, store);

  // ─── Chain & pipeline ───────────────────────────────────────────
  const retry = new RetryPolicy(retryConfig(config), { logger });
  const rpc = new ResilientChainRpc(
    new ViemChainRpc({
      rpcUrl: config.RPC_URL,
      chainId: config.CHAIN_ID,
      timeoutMs: config.RPC_TIMEOUT_MS,
    }),
    { timeoutMs: config.RPC_TIMEOUT_MS, retry, logger },
  );
  const pipeline = new TxPipeline(store, rpc, keyring, {
    gasPolicy: gasPolicyConfig(config),
    reconciler: reconcilerConfig(config),
    retry,
    logger,
  });

  const scheduler = new ReconcileScheduler(pipeline.reconciler, {
    intervalMs: config.RECONCILE_INTERVAL_MS,
    logger,
  });

  const { app } = createApp({
    pipeline,
    keyring,
    logger,
    probes: {
      chain: () => rpc.getBlockNumber(),
      store: () => store.getIntent(0),
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });
  scheduler.start();

  logger.info(
    { port: config.PORT, host: config.HOST, chainId: config.CHAIN_ID },
    "txrelay node started",
  );

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    server.close();
    await scheduler.stop();
    store.close();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
