/**
 * Tests for health check endpoints.
 *
 * Verifies:
 * - GET /health returns 200 with status "ok"
 * - GET /ready runs every probe and returns 503 when one fails
 * - X-Request-Id is set on responses
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest } from "./setup.js";

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);

    const body = (await res.json()) as { status: string; timestamp: string };
    expect(body.status).toBe("ok");
    expect(Number.isNaN(Date.parse(body.timestamp))).toBe(false);
  });

  it("generates an X-Request-Id when none is sent", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(UUID_PATTERN);
  });

  it("preserves incoming X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, {
        "X-Request-Id": "test-req-123",
      }),
    );

    expect(res.headers.get("X-Request-Id")).toBe("test-req-123");
  });

  it("replaces an X-Request-Id that is not a plain token", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, {
        "X-Request-Id": "two words",
      }),
    );

    expect(res.headers.get("X-Request-Id")).toMatch(UUID_PATTERN);
  });
});

describe("GET /ready", () => {
  it("returns 200 ready with no probes", async () => {
    const { app } = createTestApp();
    const res = await app.request("/ready");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { status: string; subsystems: Record<string, unknown> };
    expect(body.status).toBe("ready");
    expect(body.subsystems).toEqual({});
  });

  it("returns 200 when every probe passes", async () => {
    const { app, chain, store } = createTestApp({
      probes: {
        chain: () => chain.getBlockNumber(),
        store: () => store.getIntent(0),
      },
    });
    const res = await app.request("/ready");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { subsystems: Record<string, { status: string }> };
    expect(body.subsystems).toEqual({ chain: { status: "ok" }, store: { status: "ok" } });
  });

  it("returns 503 naming the failed subsystem", async () => {
    const { app } = createTestApp({
      probes: {
        chain: async () => {
          throw new TypeError("fetch failed");
        },
        store: () => undefined,
      },
    });
    const res = await app.request("/ready");

    expect(res.status).toBe(503);
    const body = (await res.json()) as {
      status: string;
      subsystems: Record<string, { status: string; detail?: string }>;
    };
    expect(body.status).toBe("not_ready");
    expect(body.subsystems).toEqual({
      chain: { status: "down", detail: "TypeError" },
      store: { status: "ok" },
    });
  });
});

describe("unknown routes", () => {
  it("returns a NOT_FOUND envelope", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/nonexistent");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: "NOT_FOUND", message: "Route not found" },
    });
  });
});
