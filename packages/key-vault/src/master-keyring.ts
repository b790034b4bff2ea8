/**
 * @txrelay/key-vault — Master keyring.
 *
 * Holds the current master key (new DEKs are wrapped under it) and any
 * retired keys that may still unwrap existing blobs. Keys come from the
 * process environment at start and are never persisted.
 *
 * Encoded keys are 32 bytes as base64 or 0x-prefixed hex.
 * Retired keys are a comma-separated list of `id:key` pairs.
 */

import { VaultError } from "./errors.js";

export const MASTER_KEY_LENGTH = 32;

const MAX_KEY_ID_BYTES = 255;

export interface MasterKey {
  readonly id: string;
  readonly key: Uint8Array;
}

export interface MasterKeyringConfig {
  readonly masterKey: string;
  readonly masterKeyId: string;
  readonly retiredKeys?: string | undefined;
}

// =============================================================================
// Parsing
// =============================================================================

export function decodeMasterKey(encoded: string): Uint8Array {
  const trimmed = encoded.trim();
  const bytes = /^0x[0-9a-fA-F]*$/.test(trimmed)
    ? Buffer.from(trimmed.slice(2), "hex")
    : Buffer.from(trimmed, "base64");

  if (bytes.length !== MASTER_KEY_LENGTH) {
    bytes.fill(0);
    throw new VaultError(
      "INVALID_MASTER_KEY",
      `Master key must decode to ${MASTER_KEY_LENGTH} bytes`,
    );
  }
  const key = Uint8Array.from(bytes);
  bytes.fill(0);
  return key;
}

export function parseRetiredKeys(spec: string | undefined): MasterKey[] {
  if (spec === undefined || spec.trim() === "") {
    return [];
  }
  return spec.split(",").map((entry) => {
    const separator = entry.indexOf(":");
    if (separator <= 0) {
      throw new VaultError(
        "INVALID_MASTER_KEY",
        "Retired keys must be formatted as id:key",
      );
    }
    return {
      id: entry.slice(0, separator).trim(),
      key: decodeMasterKey(entry.slice(separator + 1)),
    };
  });
}

function assertKeyId(id: string): void {
  const length = Buffer.byteLength(id, "utf8");
  if (length === 0 || length > MAX_KEY_ID_BYTES) {
    throw new VaultError(
      "INVALID_MASTER_KEY",
      `Master key id must be 1-${MAX_KEY_ID_BYTES} bytes`,
    );
  }
}

function assertKeyLength(key: Uint8Array): void {
  if (key.length !== MASTER_KEY_LENGTH) {
    throw new VaultError(
      "INVALID_MASTER_KEY",
      `Master key must be ${MASTER_KEY_LENGTH} bytes`,
    );
  }
}

// =============================================================================
// Keyring
// =============================================================================

export class MasterKeyring {
  private _current: MasterKey;
  private readonly _retired = new Map<string, Uint8Array>();

  constructor(current: MasterKey, retired: readonly MasterKey[] = []) {
    assertKeyId(current.id);
    assertKeyLength(current.key);
    this._current = { id: current.id, key: Uint8Array.from(current.key) };

    for (const key of retired) {
      assertKeyId(key.id);
      assertKeyLength(key.key);
      if (key.id === current.id || this._retired.has(key.id)) {
        throw new VaultError("DUPLICATE_KEY_ID", `Master key id ${key.id} appears twice`);
      }
      this._retired.set(key.id, Uint8Array.from(key.key));
    }
  }

  static fromConfig(config: MasterKeyringConfig): MasterKeyring {
    return new MasterKeyring(
      { id: config.masterKeyId, key: decodeMasterKey(config.masterKey) },
      parseRetiredKeys(config.retiredKeys),
    );
  }

  get currentKeyId(): string {
    return this._current.id;
  }

  get currentKey(): MasterKey {
    return this._current;
  }

  /** Look up any key, current or retired, able to unwrap blobs tagged `id`. */
  find(id: string): Uint8Array | undefined {
    if (id === this._current.id) {
      return this._current.key;
    }
    return this._retired.get(id);
  }

  /** Retired key ids, in the order they were retired. */
  retiredKeyIds(): readonly string[] {
    return [...this._retired.keys()];
  }

  /**
   * Promote a new current key. The previous current key stays available
   * for unwrapping until `retire()` drops it.
   */
  rotate(id: string, key: Uint8Array): void {
    assertKeyId(id);
    assertKeyLength(key);
    if (this.find(id) !== undefined) {
      throw new VaultError("DUPLICATE_KEY_ID", `Master key id ${id} already exists`);
    }
    this._retired.set(this._current.id, this._current.key);
    this._current = { id, key: Uint8Array.from(key) };
  }

  /** Forget a retired key, zeroing it. Blobs still wrapped under it become unreadable. */
  retire(id: string): boolean {
    const key = this._retired.get(id);
    if (!key) {
      return false;
    }
    key.fill(0);
    return this._retired.delete(id);
  }

  /** Zero every key held. The keyring is unusable afterwards. */
  destroy(): void {
    this._current.key.fill(0);
    for (const key of this._retired.values()) {
      key.fill(0);
    }
    this._retired.clear();
  }
}
