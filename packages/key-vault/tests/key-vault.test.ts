/**
 * Tests for KeyVault: scoped plaintext, purpose binding and DEK rotation.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryTxStore } from "@txrelay/store";
import { KeyVault } from "../src/key-vault.js";
import { CredentialVault } from "../src/credential-vault.js";
import { MasterKeyring } from "../src/master-keyring.js";
import { blobKeyId } from "../src/envelope.js";
import { AuthenticationError } from "../src/errors.js";

const KEY_1 = new Uint8Array(32).fill(0x11);
const KEY_2 = new Uint8Array(32).fill(0x22);
const ADDRESS = "0x1111111111111111111111111111111111111111";
const NOW = "2026-01-01T00:00:00.000Z";
const LATER = "2026-02-01T00:00:00.000Z";

describe("KeyVault", () => {
  let ring: MasterKeyring;
  let vault: KeyVault;

  beforeEach(() => {
    ring = new MasterKeyring({ id: "k1", key: KEY_1 });
    vault = new KeyVault(ring, { clock: () => LATER });
  });

  // ─── encrypt / decrypt ──────────────────────────────────────────────

  it("round-trips strings as UTF-8", () => {
    const blob = vault.encrypt("test-secret", "api-secret:u1:exchange");
    const plaintext = vault.decrypt(blob, "api-secret:u1:exchange");
    expect(Buffer.from(plaintext).toString("utf8")).toBe("test-secret");
  });

  it("fails closed on the wrong purpose", () => {
    const blob = vault.encrypt("test-secret", "api-secret:u1:exchange");
    expect(() => vault.decrypt(blob, "api-meta:u1:exchange")).toThrow(AuthenticationError);
  });

  // ─── withPlaintext ──────────────────────────────────────────────────

  it("zeroes the plaintext after the scope resolves", async () => {
    const blob = vault.encrypt(new Uint8Array([1, 2, 3]), "p");
    let seen: Uint8Array | undefined;

    const sum = await vault.withPlaintext(blob, "p", (plaintext) => {
      seen = plaintext;
      return plaintext.reduce((a, b) => a + b, 0);
    });

    expect(sum).toBe(6);
    expect([...seen!]).toEqual([0, 0, 0]);
  });

  it("zeroes the plaintext when the scope throws", async () => {
    const blob = vault.encrypt(new Uint8Array([4, 5]), "p");
    let seen: Uint8Array | undefined;

    await expect(
      vault.withPlaintext(blob, "p", async (plaintext) => {
        seen = plaintext;
        throw new Error("signer unavailable");
      }),
    ).rejects.toThrow("signer unavailable");

    expect([...seen!]).toEqual([0, 0]);
  });

  // ─── rotation ───────────────────────────────────────────────────────

  it("reports which blobs need rewrapping", () => {
    const blob = vault.encrypt("x", "p");
    expect(vault.needsRewrap(blob)).toBe(false);
    ring.rotate("k2", KEY_2);
    expect(vault.needsRewrap(blob)).toBe(true);
  });

  it("rewraps every stored data key under the new master key", async () => {
    const store = new InMemoryTxStore();
    store.putWallet({
      address: ADDRESS,
      privkeyEnc: vault.encrypt(new Uint8Array([7, 7]), "wallet:test"),
      createdAt: NOW,
      updatedAt: NOW,
    });
    const credentials = new CredentialVault(vault, store, () => NOW);
    credentials.store("u1", "exchange", "test-secret", { label: "main" });

    ring.rotate("k2", KEY_2);
    const report = vault.rotateDataKeys(store);

    expect(report).toEqual({ keyId: "k2", wallets: 1, credentials: 1, unchanged: 0 });

    const wallet = store.getWallet(ADDRESS)!;
    const credential = store.getCredential("u1", "exchange")!;
    expect(blobKeyId(wallet.privkeyEnc)).toBe("k2");
    expect(blobKeyId(credential.secretEnc)).toBe("k2");
    expect(blobKeyId(credential.metaEnc!)).toBe("k2");
    expect(wallet.updatedAt).toBe(LATER);

    // Payloads still open once the old key is gone
    ring.retire("k1");
    expect([...vault.decrypt(wallet.privkeyEnc, "wallet:test")]).toEqual([7, 7]);
    expect(await credentials.withSecret("u1", "exchange", (s) => s)).toBe("test-secret");
    expect(credentials.readMeta("u1", "exchange")).toEqual({ label: "main" });
  });

  it("leaves blobs already under the current key alone", () => {
    const store = new InMemoryTxStore();
    const credentials = new CredentialVault(vault, store, () => NOW);
    credentials.store("u1", "exchange", "test-secret");

    ring.rotate("k2", KEY_2);
    vault.rotateDataKeys(store);
    const second = vault.rotateDataKeys(store);

    expect(second).toEqual({ keyId: "k2", wallets: 0, credentials: 0, unchanged: 1 });
  });
});
