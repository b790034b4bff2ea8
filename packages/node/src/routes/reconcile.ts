/**
 * POST /api/v1/reconcile — run one reconcile pass and return its report.
 * A pass already in flight is joined, not duplicated.
 */

import { Hono } from "hono";
import type { TxPipeline } from "@txrelay/pipeline";
import type { AppEnv } from "../types/api-contract.js";

export function createReconcileRoutes(pipeline: TxPipeline): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", async (c) => {
    const report = await pipeline.reconcile();
    return c.json({ data: report });
  });

  return routes;
}
