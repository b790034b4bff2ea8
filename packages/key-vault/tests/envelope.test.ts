/**
 * Property and unit tests for envelope encryption.
 *
 * Verifies:
 * - open(seal(x)) == x for any byte string
 * - Any single-byte change or truncation raises AuthenticationError
 * - A blob opens only for the purpose it was sealed for
 * - Rewrap moves the DEK to the current key and keeps the payload bytes
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { seal, open, rewrap, blobKeyId, BLOB_VERSION } from "../src/envelope.js";
import { MasterKeyring } from "../src/master-keyring.js";
import { AuthenticationError, VaultError } from "../src/errors.js";

// =============================================================================
// Helpers
// =============================================================================

const KEY_A = new Uint8Array(32).fill(0xa1);
const KEY_B = new Uint8Array(32).fill(0xb2);

function keyring(): MasterKeyring {
  return new MasterKeyring({ id: "k1", key: KEY_A });
}

const arbPlaintext = fc.uint8Array({ minLength: 0, maxLength: 256 });

// Header (2 + "k1") + wrapped DEK (60) + nonce (12) + tag (16)
const OVERHEAD = 2 + 2 + 60 + 12 + 16;

// =============================================================================
// Properties
// =============================================================================

describe("envelope properties", () => {
  it("round-trips any byte string", () => {
    const ring = keyring();
    fc.assert(
      fc.property(arbPlaintext, (plaintext) => {
        const blob = seal(plaintext, "wallet:test", ring);
        expect(Buffer.from(open(blob, "wallet:test", ring))).toEqual(Buffer.from(plaintext));
      }),
    );
  });

  it("rejects any single-byte modification", () => {
    const ring = keyring();
    fc.assert(
      fc.property(
        arbPlaintext,
        fc.nat(),
        fc.integer({ min: 1, max: 255 }),
        (plaintext, position, mask) => {
          const blob = seal(plaintext, "wallet:test", ring);
          const index = position % blob.length;
          blob[index] = (blob[index] ?? 0) ^ mask;
          expect(() => open(blob, "wallet:test", ring)).toThrow(AuthenticationError);
        },
      ),
    );
  });

  it("rejects any truncation", () => {
    const ring = keyring();
    fc.assert(
      fc.property(arbPlaintext, fc.nat(), (plaintext, cut) => {
        const blob = seal(plaintext, "wallet:test", ring);
        const truncated = blob.subarray(0, cut % blob.length);
        expect(() => open(truncated, "wallet:test", ring)).toThrow(AuthenticationError);
      }),
    );
  });
});

// =============================================================================
// Layout and purpose binding
// =============================================================================

describe("seal", () => {
  it("writes the version and key id header", () => {
    const blob = seal(new Uint8Array([1, 2, 3]), "p", keyring());

    expect(blob[0]).toBe(BLOB_VERSION);
    expect(blob[1]).toBe(2);
    expect(Buffer.from(blob.subarray(2, 4)).toString("utf8")).toBe("k1");
    expect(blob.length).toBe(OVERHEAD + 3);
    expect(blobKeyId(blob)).toBe("k1");
  });

  it("uses a fresh data key per call", () => {
    const ring = keyring();
    const a = seal(new Uint8Array([9]), "p", ring);
    const b = seal(new Uint8Array([9]), "p", ring);
    expect(Buffer.from(a).equals(Buffer.from(b))).toBe(false);
  });

  it("rejects an empty purpose", () => {
    expect(() => seal(new Uint8Array([1]), "", keyring())).toThrow(VaultError);
  });
});

describe("open", () => {
  it("fails for a different purpose", () => {
    const ring = keyring();
    const blob = seal(new Uint8Array([1, 2, 3]), "api-secret:u1:exchange", ring);
    expect(() => open(blob, "api-secret:u2:exchange", ring)).toThrow(AuthenticationError);
  });

  it("fails when the key id is unknown", () => {
    const blob = seal(new Uint8Array([1]), "p", keyring());
    const other = new MasterKeyring({ id: "k9", key: KEY_A });
    expect(() => open(blob, "p", other)).toThrow(AuthenticationError);
  });

  it("fails under the right id but the wrong key", () => {
    const blob = seal(new Uint8Array([1]), "p", keyring());
    const impostor = new MasterKeyring({ id: "k1", key: KEY_B });
    expect(() => open(blob, "p", impostor)).toThrow(AuthenticationError);
  });

  it("fails on an unsupported version", () => {
    const blob = seal(new Uint8Array([1]), "p", keyring());
    blob[0] = 2;
    expect(() => open(blob, "p", keyring())).toThrow("Unsupported blob version 2");
  });

  it("fails on an empty blob", () => {
    expect(() => open(new Uint8Array(0), "p", keyring())).toThrow("Blob is truncated");
  });
});

// =============================================================================
// Rewrap
// =============================================================================

describe("rewrap", () => {
  it("moves the data key to the current master key", () => {
    const ring = keyring();
    const blob = seal(new Uint8Array([5, 6, 7]), "p", ring);

    ring.rotate("k2", KEY_B);
    const rewrapped = rewrap(blob, ring);

    expect(blobKeyId(rewrapped)).toBe("k2");
    ring.retire("k1");
    expect([...open(rewrapped, "p", ring)]).toEqual([5, 6, 7]);
    expect(() => open(blob, "p", ring)).toThrow(AuthenticationError);
  });

  it("carries the payload bytes over unchanged", () => {
    const ring = keyring();
    const blob = seal(new Uint8Array([5, 6, 7]), "p", ring);
    ring.rotate("k2", KEY_B);
    const rewrapped = rewrap(blob, ring);

    const payloadLength = 12 + 3 + 16;
    expect(Buffer.from(rewrapped.subarray(-payloadLength))).toEqual(
      Buffer.from(blob.subarray(-payloadLength)),
    );
  });
});
