/**
 * @txrelay/key-vault — Third-party API credential vault.
 *
 * One encrypted secret (plus optional encrypted JSON metadata) per
 * (userId, provider).
 */

import type { KeyMaterialRepository } from "@txrelay/store";
import { VaultError } from "./errors.js";
import { credentialMetaPurpose, credentialSecretPurpose } from "./key-vault.js";
import type { KeyVault } from "./key-vault.js";

export type CredentialMeta = Readonly<Record<string, unknown>>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Decode without copying the plaintext into a second buffer. */
function utf8(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("utf8");
}

export class CredentialVault {
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

  /** Insert or replace the credential for (userId, provider). */
  store(userId: string, provider: string, secret: string, meta?: CredentialMeta): void {
    const now = this.clock();
    this.repository.putCredential({
      userId,
      provider,
      secretEnc: this.vault.encrypt(secret, credentialSecretPurpose(userId, provider)),
      metaEnc:
        meta === undefined
          ? null
          : this.vault.encrypt(JSON.stringify(meta), credentialMetaPurpose(userId, provider)),
      createdAt: now,
      updatedAt: now,
    });
  }

  has(userId: string, provider: string): boolean {
    return this.repository.getCredential(userId, provider) !== undefined;
  }

  /**
   * Run `fn` with the decrypted secret. The decrypted bytes are zeroed
   * when `fn` settles.
   *
   * @throws VaultError CREDENTIAL_NOT_FOUND
   */
  async withSecret<T>(
    userId: string,
    provider: string,
    fn: (secret: string) => T | Promise<T>,
  ): Promise<T> {
    const record = this.repository.getCredential(userId, provider);
    if (!record) {
      throw new VaultError("CREDENTIAL_NOT_FOUND", `No ${provider} credential for ${userId}`);
    }
    return this.vault.withPlaintext(
      record.secretEnc,
      credentialSecretPurpose(userId, provider),
      (bytes) => fn(utf8(bytes)),
    );
  }

  /** Decrypted metadata, or null when none was stored. */
  readMeta(userId: string, provider: string): CredentialMeta | null {
    const record = this.repository.getCredential(userId, provider);
    if (!record) {
      throw new VaultError("CREDENTIAL_NOT_FOUND", `No ${provider} credential for ${userId}`);
    }
    if (record.metaEnc === null) {
      return null;
    }

    const bytes = this.vault.decrypt(record.metaEnc, credentialMetaPurpose(userId, provider));
    try {
      const parsed: unknown = JSON.parse(utf8(bytes));
      return isRecord(parsed) ? Object.freeze(parsed) : null;
    } finally {
      bytes.fill(0);
    }
  }

  remove(userId: string, provider: string): boolean {
    return this.repository.deleteCredential(userId, provider);
  }
}
