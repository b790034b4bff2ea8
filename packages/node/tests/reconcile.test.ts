/**
 * Tests for POST /api/v1/reconcile.
 */

import { describe, it, expect } from "vitest";
import { keccak256 } from "viem";
import type { IntentStatusView } from "@txrelay/types";
import type { ReconcileReport } from "@txrelay/pipeline";
import { createTestApp, jsonRequest, submitBody } from "./setup.js";

const EMPTY_REPORT: ReconcileReport = {
  checked: 0,
  confirmed: 0,
  failed: 0,
  replaced: 0,
  superseded: 0,
  recovered: 0,
  errors: 0,
};

describe("POST /api/v1/reconcile", () => {
  it("returns an empty report when nothing is in flight", async () => {
    const { app } = createTestApp();

    const res = await app.request(jsonRequest("/api/v1/reconcile", "POST"));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: EMPTY_REPORT });
  });

  it("confirms a mined send", async () => {
    const { app, chain, address } = createTestApp();
    const submitted = await app.request(
      jsonRequest("/api/v1/intents", "POST", submitBody("open-1", address)),
    );
    const { data } = (await submitted.json()) as { data: IntentStatusView };
    const txHash = keccak256(chain.submitted[0]!);
    expect(data.txHash).toBe(txHash);
    chain.mine(txHash);

    const res = await app.request(jsonRequest("/api/v1/reconcile", "POST"));

    expect(await res.json()).toEqual({ data: { ...EMPTY_REPORT, checked: 1, confirmed: 1 } });
    const status = (await (await app.request("/api/v1/intents/open-1")).json()) as {
      data: IntentStatusView;
    };
    expect(status.data).toMatchObject({ status: "CONFIRMED", txHash });
  });
});
