/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (every registered probe must pass)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

/** Resolves when the dependency is usable; throws or rejects when it is not. */
export type ReadinessProbe = () => unknown;

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(
  probes: Readonly<Record<string, ReadinessProbe>>,
): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", async (c) => {
    const subsystems: Record<string, SubsystemStatus> = {};
    let allReady = true;

    for (const [name, probe] of Object.entries(probes)) {
      try {
        await probe();
        subsystems[name] = { status: "ok" };
      } catch (err) {
        allReady = false;
        subsystems[name] = {
          status: "down",
          detail: err instanceof Error ? err.name : "unknown",
        };
      }
    }

    return c.json(
      {
        status: allReady ? "ready" : "not_ready",
        subsystems,
        timestamp: new Date().toISOString(),
      },
      allReady ? 200 : 503,
    );
  });

  return routes;
}
