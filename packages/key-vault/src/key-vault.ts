/**
 * @txrelay/key-vault — KeyVault.
 *
 * Encrypts key material and API secrets at rest and decrypts them only
 * for the duration of a caller-supplied scope. Also owns DEK rotation
 * across every blob the store holds.
 *
 * Plaintext is never logged.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { KeyMaterialRepository } from "@txrelay/store";
import { blobKeyId, open, rewrap, seal } from "./envelope.js";
import type { MasterKeyring } from "./master-keyring.js";

export interface KeyVaultOptions {
  readonly logger?: Logger | undefined;
  readonly clock?: (() => string) | undefined;
}

/** Store surface rotation needs: key material plus an atomic scope. */
export interface KeyMaterialStore extends KeyMaterialRepository {
  transaction<T>(fn: () => T): T;
}

export interface RotationReport {
  readonly keyId: string;
  readonly wallets: number;
  readonly credentials: number;
  readonly unchanged: number;
}

// =============================================================================
// Purposes
// =============================================================================

export function walletPurpose(address: string): string {
  return `wallet:${address.toLowerCase()}`;
}

// The pair is JSON-encoded so ids containing ":" cannot collide.
export function credentialSecretPurpose(userId: string, provider: string): string {
  return `api-secret:${JSON.stringify([userId, provider])}`;
}

export function credentialMetaPurpose(userId: string, provider: string): string {
  return `api-meta:${JSON.stringify([userId, provider])}`;
}

// =============================================================================
// KeyVault
// =============================================================================

export class KeyVault {
  private readonly keyring: MasterKeyring;
  private readonly logger: Logger;
  private readonly clock: () => string;

  constructor(keyring: MasterKeyring, options: KeyVaultOptions = {}) {
    this.keyring = keyring;
    this.logger = options.logger ?? pino({ level: "silent" });
    this.clock = options.clock ?? (() => new Date().toISOString());
  }

  get currentKeyId(): string {
    return this.keyring.currentKeyId;
  }

  encrypt(plaintext: Uint8Array | string, purpose: string): Uint8Array {
    if (typeof plaintext === "string") {
      const bytes = Buffer.from(plaintext, "utf8");
      try {
        return seal(bytes, purpose, this.keyring);
      } finally {
        bytes.fill(0);
      }
    }
    return seal(plaintext, purpose, this.keyring);
  }

  /**
   * Decrypt a blob. The caller owns the returned buffer and must zero it;
   * prefer `withPlaintext`.
   *
   * @throws AuthenticationError
   */
  decrypt(blob: Uint8Array, purpose: string): Uint8Array {
    return open(blob, purpose, this.keyring);
  }

  /**
   * Decrypt, run `fn`, then zero the plaintext whether `fn` resolves or
   * throws. `fn` must not retain the buffer.
   */
  async withPlaintext<T>(
    blob: Uint8Array,
    purpose: string,
    fn: (plaintext: Uint8Array) => T | Promise<T>,
  ): Promise<T> {
    const plaintext = this.decrypt(blob, purpose);
    try {
      return await fn(plaintext);
    } finally {
      plaintext.fill(0);
    }
  }

  rewrap(blob: Uint8Array): Uint8Array {
    return rewrap(blob, this.keyring);
  }

  needsRewrap(blob: Uint8Array): boolean {
    return blobKeyId(blob) !== this.keyring.currentKeyId;
  }

  /**
   * Re-wrap every stored DEK (wallet keys, API secrets, API metadata) not
   * yet under the current master key. Payloads are not re-encrypted.
   * Runs in one store transaction: a failure leaves every row as it was.
   */
  rotateDataKeys(store: KeyMaterialStore): RotationReport {
    const at = this.clock();
    const report = store.transaction(() => {
      let wallets = 0;
      let credentials = 0;
      let unchanged = 0;

      for (const wallet of store.listWallets()) {
        if (!this.needsRewrap(wallet.privkeyEnc)) {
          unchanged++;
          continue;
        }
        store.putWallet({ ...wallet, privkeyEnc: this.rewrap(wallet.privkeyEnc), updatedAt: at });
        wallets++;
      }

      for (const credential of store.listCredentials()) {
        const secretStale = this.needsRewrap(credential.secretEnc);
        const metaStale = credential.metaEnc !== null && this.needsRewrap(credential.metaEnc);
        if (!secretStale && !metaStale) {
          unchanged++;
          continue;
        }
        store.putCredential({
          ...credential,
          secretEnc: secretStale ? this.rewrap(credential.secretEnc) : credential.secretEnc,
          metaEnc:
            credential.metaEnc !== null && metaStale
              ? this.rewrap(credential.metaEnc)
              : credential.metaEnc,
          updatedAt: at,
        });
        credentials++;
      }

      return { keyId: this.keyring.currentKeyId, wallets, credentials, unchanged };
    });

    this.logger.info(report, "Data keys rewrapped");
    return report;
  }
}
