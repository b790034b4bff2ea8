/**
 * Runtime type guard tests for @txrelay/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isIntentStatus,
  isTerminalStatus,
  isIntent,
  isHexString,
  isAddress,
  isFeeParams,
  isBuiltCall,
} from "../src/guards.js";

const ADDRESS = "0x1111111111111111111111111111111111111111";

// =============================================================================
// Intent guards
// =============================================================================

describe("isIntentStatus", () => {
  it("accepts every lifecycle state", () => {
    for (const s of ["CREATED", "ALLOCATED", "SENT", "CONFIRMED", "FAILED", "REPLACED"]) {
      expect(isIntentStatus(s)).toBe(true);
    }
  });

  it("rejects lowercase and unknown values", () => {
    expect(isIntentStatus("sent")).toBe(false);
    expect(isIntentStatus("MINED")).toBe(false);
    expect(isIntentStatus(1)).toBe(false);
  });
});

describe("isTerminalStatus", () => {
  it("treats only CONFIRMED and FAILED as terminal", () => {
    expect(isTerminalStatus("CONFIRMED")).toBe(true);
    expect(isTerminalStatus("FAILED")).toBe(true);
    expect(isTerminalStatus("SENT")).toBe(false);
    expect(isTerminalStatus("REPLACED")).toBe(false);
  });
});

describe("isIntent", () => {
  const valid = {
    id: 1,
    intentKey: "trade-42",
    status: "CREATED",
    createdAt: "2026-01-01T00:00:00.000Z",
    updatedAt: "2026-01-01T00:00:00.000Z",
    metadata: {},
  };

  it("accepts a valid intent", () => {
    expect(isIntent(valid)).toBe(true);
  });

  it("rejects an empty intent key", () => {
    expect(isIntent({ ...valid, intentKey: "" })).toBe(false);
  });

  it("rejects a non-integer id", () => {
    expect(isIntent({ ...valid, id: 1.5 })).toBe(false);
  });

  it("rejects null metadata", () => {
    expect(isIntent({ ...valid, metadata: null })).toBe(false);
  });

  it("rejects null", () => {
    expect(isIntent(null)).toBe(false);
  });
});

// =============================================================================
// Chain guards
// =============================================================================

describe("isHexString / isAddress", () => {
  it("accepts 0x-prefixed hex", () => {
    expect(isHexString("0x")).toBe(true);
    expect(isHexString("0xdeadBEEF")).toBe(true);
  });

  it("rejects non-hex characters", () => {
    expect(isHexString("0xzz")).toBe(false);
    expect(isHexString("deadbeef")).toBe(false);
  });

  it("requires 20 bytes for an address", () => {
    expect(isAddress(ADDRESS)).toBe(true);
    expect(isAddress("0x1234")).toBe(false);
  });
});

describe("isFeeParams", () => {
  it("accepts priority fee at or below max fee", () => {
    expect(isFeeParams({ maxFeePerGas: 10n, maxPriorityFeePerGas: 2n })).toBe(true);
    expect(isFeeParams({ maxFeePerGas: 10n, maxPriorityFeePerGas: 10n })).toBe(true);
  });

  it("rejects priority fee above max fee", () => {
    expect(isFeeParams({ maxFeePerGas: 1n, maxPriorityFeePerGas: 2n })).toBe(false);
  });

  it("rejects number amounts (must be bigint)", () => {
    expect(isFeeParams({ maxFeePerGas: 10, maxPriorityFeePerGas: 2 })).toBe(false);
  });
});

describe("isBuiltCall", () => {
  const call = { chainId: 8453, to: ADDRESS, data: "0x", value: 0n };

  it("accepts a call without a gas hint", () => {
    expect(isBuiltCall(call)).toBe(true);
  });

  it("accepts a positive gas hint", () => {
    expect(isBuiltCall({ ...call, gasLimit: 21000n })).toBe(true);
  });

  it("rejects a zero gas hint", () => {
    expect(isBuiltCall({ ...call, gasLimit: 0n })).toBe(false);
  });

  it("rejects a negative value", () => {
    expect(isBuiltCall({ ...call, value: -1n })).toBe(false);
  });

  it("rejects a non-positive chain id", () => {
    expect(isBuiltCall({ ...call, chainId: 0 })).toBe(false);
  });
});
