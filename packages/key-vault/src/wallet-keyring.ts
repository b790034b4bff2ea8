/**
 * @txrelay/key-vault — Wallet keyring.
 *
 * Stores signing keys envelope-encrypted and hands out a viem local
 * account only inside `withAccount`. The decrypted key bytes are zeroed
 * when the scope ends.
 */

import { bytesToHex, hexToBytes } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import type { PrivateKeyAccount } from "viem/accounts";
import type { KeyMaterialRepository } from "@txrelay/store";
import type { HexString } from "@txrelay/types";
import { AuthenticationError, VaultError } from "./errors.js";
import { walletPurpose } from "./key-vault.js";
import type { KeyVault } from "./key-vault.js";

const PRIVATE_KEY_PATTERN = /^0x[0-9a-fA-F]{64}$/;

function isPrivateKey(value: string): value is HexString {
  return PRIVATE_KEY_PATTERN.test(value);
}

export class WalletKeyring {
  private readonly vault: KeyVault;
  private readonly repository: KeyMaterialRepository;
  private readonly clock: () => string;

  constructor(
    vault: KeyVault,
    repository: KeyMaterialRepository,
    clock: () => string = () => new Date().toISOString(),
  ) {
    this.vault = vault;
    this.repository = repository;
    this.clock = clock;
  }

  /**
   * Encrypt and store a private key. Returns the wallet's checksummed
   * address. Importing the same key again re-encrypts it in place.
   */
  importKey(privateKey: string): HexString {
    if (!isPrivateKey(privateKey)) {
      throw new VaultError("INVALID_PRIVATE_KEY", "Private key must be 32 bytes of 0x-prefixed hex");
    }

    let address: HexString;
    try {
      address = privateKeyToAccount(privateKey).address;
    } catch (err) {
      throw new VaultError(
        "INVALID_PRIVATE_KEY",
        `Private key rejected: ${err instanceof Error ? err.name : "unknown error"}`,
      );
    }

    const bytes = hexToBytes(privateKey);
    const now = this.clock();
    try {
      this.repository.putWallet({
        address,
        privkeyEnc: this.vault.encrypt(bytes, walletPurpose(address)),
        createdAt: now,
        updatedAt: now,
      });
    } finally {
      bytes.fill(0);
    }
    return address;
  }

  has(address: HexString): boolean {
    return this.repository.getWallet(address) !== undefined;
  }

  /**
   * Run `fn` with a signing account for `address`. The account must not
   * escape the callback.
   *
   * @throws VaultError WALLET_NOT_FOUND
   * @throws AuthenticationError when the stored key does not decrypt to this address
   */
  async withAccount<T>(
    address: HexString,
    fn: (account: PrivateKeyAccount) => T | Promise<T>,
  ): Promise<T> {
    const record = this.repository.getWallet(address);
    if (!record) {
      throw new VaultError("WALLET_NOT_FOUND", `No wallet stored for ${address}`);
    }

    return this.vault.withPlaintext(record.privkeyEnc, walletPurpose(record.address), (bytes) => {
      const account = privateKeyToAccount(bytesToHex(bytes));
      if (account.address.toLowerCase() !== record.address.toLowerCase()) {
        throw new AuthenticationError(`Stored key does not belong to ${record.address}`);
      }
      return fn(account);
    });
  }
}
