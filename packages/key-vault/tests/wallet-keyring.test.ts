/**
 * Tests for WalletKeyring: import, scoped signing accounts and failure modes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { privateKeyToAccount } from "viem/accounts";
import { InMemoryTxStore } from "@txrelay/store";
import { KeyVault } from "../src/key-vault.js";
import { MasterKeyring } from "../src/master-keyring.js";
import { WalletKeyring } from "../src/wallet-keyring.js";
import { AuthenticationError, VaultError } from "../src/errors.js";

const PRIVATE_KEY = `0x${"01".repeat(32)}` as const;
const OTHER_KEY = `0x${"02".repeat(32)}` as const;
const NOW = "2026-01-01T00:00:00.000Z";

describe("WalletKeyring", () => {
  let store: InMemoryTxStore;
  let keyring: WalletKeyring;

  beforeEach(() => {
    store = new InMemoryTxStore();
    const vault = new KeyVault(new MasterKeyring({ id: "k1", key: new Uint8Array(32).fill(9) }));
    keyring = new WalletKeyring(vault, store, () => NOW);
  });

  it("imports a key and returns its checksummed address", () => {
    const address = keyring.importKey(PRIVATE_KEY);

    expect(address).toBe(privateKeyToAccount(PRIVATE_KEY).address);
    expect(keyring.has(address)).toBe(true);
  });

  it("never stores the plaintext key", () => {
    const address = keyring.importKey(PRIVATE_KEY);
    const stored = Buffer.from(store.getWallet(address)!.privkeyEnc);

    expect(stored.includes(Buffer.from("01".repeat(32), "hex"))).toBe(false);
  });

  it("hands out a signing account inside the scope", async () => {
    const address = keyring.importKey(PRIVATE_KEY);

    const signature = await keyring.withAccount(address, (account) =>
      account.signMessage({ message: "ping" }),
    );
    const expected = await privateKeyToAccount(PRIVATE_KEY).signMessage({ message: "ping" });

    expect(signature).toBe(expected);
  });

  it("finds the wallet regardless of address case", async () => {
    const address = keyring.importKey(PRIVATE_KEY);
    const seen = await keyring.withAccount(`0x${address.slice(2).toLowerCase()}`, (account) => account.address);
    expect(seen).toBe(address);
  });

  it("rejects an unknown wallet", async () => {
    await expect(
      keyring.withAccount("0x3333333333333333333333333333333333333333", () => 1),
    ).rejects.toThrow(VaultError);
  });

  it("rejects a malformed private key", () => {
    expect(() => keyring.importKey("0x1234")).toThrow(
      "Private key must be 32 bytes of 0x-prefixed hex",
    );
  });

  it("rejects a blob moved onto another wallet's row", async () => {
    const a = keyring.importKey(PRIVATE_KEY);
    const b = keyring.importKey(OTHER_KEY);
    const blobA = store.getWallet(a)!.privkeyEnc;
    store.putWallet({ address: b, privkeyEnc: blobA, createdAt: NOW, updatedAt: NOW });

    await expect(keyring.withAccount(b, () => 1)).rejects.toThrow(AuthenticationError);
  });
});
