/**
 * Tests for POST /api/v1/wallets.
 */

import { describe, it, expect } from "vitest";
import pino from "pino";
import { privateKeyToAccount } from "viem/accounts";
import { createTestApp, jsonRequest } from "./setup.js";

const NEW_KEY = `0x${"33".repeat(32)}` as const;

describe("POST /api/v1/wallets", () => {
  it("imports a key and returns only its checksummed address", async () => {
    const { app, keyring } = createTestApp();
    const expected = privateKeyToAccount(NEW_KEY).address;

    const res = await app.request(jsonRequest("/api/v1/wallets", "POST", { privateKey: NEW_KEY }));

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({ data: { address: expected } });
    expect(keyring.has(expected)).toBe(true);
  });

  it("never writes the key to the log", async () => {
    const lines: string[] = [];
    const logger = pino({ level: "debug" }, { write: (line: string) => void lines.push(line) });
    const { app } = createTestApp({ logger });

    await app.request(jsonRequest("/api/v1/wallets", "POST", { privateKey: NEW_KEY }));

    const imported = lines
      .map((line) => JSON.parse(line) as { msg: string; address?: string })
      .find((entry) => entry.msg === "Wallet imported");
    expect(imported?.address).toBe(privateKeyToAccount(NEW_KEY).address);
    expect(lines.filter((line) => line.includes(NEW_KEY.slice(2)))).toEqual([]);
  });

  it("returns 400 for a key that is not 32 bytes of hex", async () => {
    const { app } = createTestApp();

    const res = await app.request(jsonRequest("/api/v1/wallets", "POST", { privateKey: "0x1234" }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: "INVALID_PRIVATE_KEY",
        message: "Private key must be 32 bytes of 0x-prefixed hex",
      },
    });
  });

  it("returns 400 when the key is missing", async () => {
    const { app } = createTestApp();

    const res = await app.request(jsonRequest("/api/v1/wallets", "POST", {}));

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });
});
