/**
 * Tests for the master keyring and its environment encoding.
 */

import { describe, it, expect } from "vitest";
import {
  MasterKeyring,
  decodeMasterKey,
  parseRetiredKeys,
} from "../src/master-keyring.js";
import { VaultError } from "../src/errors.js";

const B64_SEVENS = Buffer.alloc(32, 7).toString("base64");
const HEX_EIGHTS = `0x${"08".repeat(32)}`;

describe("decodeMasterKey", () => {
  it("decodes base64", () => {
    expect([...decodeMasterKey(B64_SEVENS)]).toEqual(new Array<number>(32).fill(7));
  });

  it("decodes 0x-prefixed hex", () => {
    expect([...decodeMasterKey(HEX_EIGHTS)]).toEqual(new Array<number>(32).fill(8));
  });

  it("rejects a key of the wrong length", () => {
    expect(() => decodeMasterKey(Buffer.alloc(16, 1).toString("base64"))).toThrow(VaultError);
    expect(() => decodeMasterKey("0x1234")).toThrow("Master key must decode to 32 bytes");
  });
});

describe("parseRetiredKeys", () => {
  it("returns nothing for an empty value", () => {
    expect(parseRetiredKeys(undefined)).toEqual([]);
    expect(parseRetiredKeys("  ")).toEqual([]);
  });

  it("parses id:key pairs", () => {
    const keys = parseRetiredKeys(`old-1:${B64_SEVENS}, old-2:${HEX_EIGHTS}`);
    expect(keys.map((k) => k.id)).toEqual(["old-1", "old-2"]);
    expect(keys[1]!.key[0]).toBe(8);
  });

  it("rejects an entry without an id", () => {
    expect(() => parseRetiredKeys(B64_SEVENS)).toThrow("Retired keys must be formatted as id:key");
  });
});

describe("MasterKeyring", () => {
  it("builds from config", () => {
    const ring = MasterKeyring.fromConfig({
      masterKey: B64_SEVENS,
      masterKeyId: "k2",
      retiredKeys: `k1:${HEX_EIGHTS}`,
    });

    expect(ring.currentKeyId).toBe("k2");
    expect(ring.find("k1")?.[0]).toBe(8);
    expect(ring.find("k2")?.[0]).toBe(7);
    expect(ring.find("k3")).toBeUndefined();
  });

  it("rejects a retired key reusing the current id", () => {
    expect(
      () =>
        new MasterKeyring({ id: "k1", key: new Uint8Array(32) }, [
          { id: "k1", key: new Uint8Array(32) },
        ]),
    ).toThrow(VaultError);
  });

  it("rejects an empty key id", () => {
    expect(() => new MasterKeyring({ id: "", key: new Uint8Array(32) })).toThrow(
      "Master key id must be 1-255 bytes",
    );
  });

  it("rotates and keeps the previous key for unwrapping", () => {
    const ring = new MasterKeyring({ id: "k1", key: new Uint8Array(32).fill(1) });
    ring.rotate("k2", new Uint8Array(32).fill(2));

    expect(ring.currentKeyId).toBe("k2");
    expect(ring.retiredKeyIds()).toEqual(["k1"]);
    expect(ring.find("k1")?.[0]).toBe(1);
  });

  it("refuses to rotate to an id already held", () => {
    const ring = new MasterKeyring({ id: "k1", key: new Uint8Array(32) });
    expect(() => ring.rotate("k1", new Uint8Array(32))).toThrow("Master key id k1 already exists");
  });

  it("retires a key by zeroing and dropping it", () => {
    const ring = new MasterKeyring({ id: "k1", key: new Uint8Array(32).fill(1) });
    ring.rotate("k2", new Uint8Array(32).fill(2));
    const old = ring.find("k1")!;

    expect(ring.retire("k1")).toBe(true);
    expect(old.every((b) => b === 0)).toBe(true);
    expect(ring.find("k1")).toBeUndefined();
    expect(ring.retire("k1")).toBe(false);
  });

  it("copies the caller's key bytes", () => {
    const key = new Uint8Array(32).fill(3);
    const ring = new MasterKeyring({ id: "k1", key });
    key.fill(0);
    expect(ring.currentKey.key[0]).toBe(3);
  });
});
