/**
 * Intent lifecycle routes.
 *
 * POST /api/v1/intents                — Submit (register, allocate, broadcast)
 * GET  /api/v1/intents/:intentKey     — Status view
 * POST /api/v1/intents/:id/replace    — Manual fee bump of a SENT intent
 */

import { Hono } from "hono";
import type { TxPipeline } from "@txrelay/pipeline";
import type { AppEnv } from "../types/api-contract.js";
import { IntentIdSchema, SubmitIntentSchema, toSendDto } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";

export function createIntentRoutes(pipeline: TxPipeline): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(SubmitIntentSchema), async (c) => {
    const body = c.get("validatedBody");

    const { intent, created } = await pipeline.submit({
      intentKey: body.intentKey,
      signingAddress: body.signingAddress,
      call: body.call,
      metadata: body.metadata,
    });

    return c.json({ data: pipeline.getIntentStatus(intent.intentKey) }, created ? 201 : 200);
  });

  routes.get("/:intentKey", (c) => {
    return c.json({ data: pipeline.getIntentStatus(c.req.param("intentKey")) });
  });

  routes.post("/:id/replace", async (c) => {
    const parsed = IntentIdSchema.safeParse(c.req.param("id"));
    if (!parsed.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Intent id must be a positive integer"),
        400,
      );
    }

    const send = await pipeline.forceReplace(parsed.data);
    return c.json({ data: toSendDto(send) });
  });

  return routes;
}
