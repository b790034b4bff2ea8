/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. main.ts serves it;
 * tests call `app.request` directly.
 */

import { Hono } from "hono";
import pino from "pino";
import type { Logger } from "pino";
import type { TxPipeline } from "@txrelay/pipeline";
import type { WalletKeyring } from "@txrelay/key-vault";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import type { ReadinessProbe } from "./routes/health.js";
import { createIntentRoutes } from "./routes/intents.js";
import { createReconcileRoutes } from "./routes/reconcile.js";
import { createWalletRoutes } from "./routes/wallets.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly pipeline: TxPipeline;
  readonly keyring: WalletKeyring;
  /** Checks behind GET /ready, by subsystem name. */
  readonly probes?: Readonly<Record<string, ReadinessProbe>> | undefined;
  readonly logger?: Logger | undefined;
  /** Log one line per request. Default: true */
  readonly requestLogging?: boolean | undefined;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const logger = options.logger ?? pino({ level: "silent" });
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.requestLogging !== false) {
    app.use("*", loggerMiddleware(logger));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(createErrorHandler(logger));
  app.notFound((c) => c.json(createErrorEnvelope("NOT_FOUND", "Route not found"), 404));

  // ─── Routes ─────────────────────────────────────────────────────
  app.route("/", createHealthRoutes(options.probes ?? {}));
  app.route("/api/v1/intents", createIntentRoutes(options.pipeline));
  app.route("/api/v1/reconcile", createReconcileRoutes(options.pipeline));
  app.route("/api/v1/wallets", createWalletRoutes(options.keyring, logger));

  return { app };
}
