/**
 * POST /api/v1/wallets — import a signing key.
 *
 * The key is sealed by the WalletKeyring before anything else sees it; the
 * response carries only the checksummed address.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { WalletKeyring } from "@txrelay/key-vault";
import type { AppEnv } from "../types/api-contract.js";
import { ImportWalletSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createWalletRoutes(keyring: WalletKeyring, logger: Logger): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(ImportWalletSchema), (c) => {
    const address = keyring.importKey(c.get("validatedBody").privateKey);
    logger.info({ address, requestId: c.get("requestId") }, "Wallet imported");
    return c.json({ data: { address } }, 201);
  });

  return routes;
}
