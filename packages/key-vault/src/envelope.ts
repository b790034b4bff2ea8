/**
 * @txrelay/key-vault — Envelope encryption primitives.
 *
 * A fresh 256-bit data-encryption key (DEK) seals each payload with
 * AES-256-GCM; the DEK is itself sealed ("wrapped") under a master key.
 *
 * Blob layout:
 *
 *   version(1) || keyIdLen(1) || keyId || wrappedDek || nonce(12) || ciphertext || tag(16)
 *
 *   wrappedDek = iv(12) || encryptedDek(32) || tag(16)
 *
 * The header (version, keyIdLen, keyId) is the wrapped DEK's additional
 * authenticated data. The caller's purpose string is the payload's, so a
 * blob opens only for the purpose it was sealed for.
 *
 * Every parse, unwrap or tag failure raises AuthenticationError.
 */

import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";
import { AuthenticationError, VaultError } from "./errors.js";
import type { MasterKeyring } from "./master-keyring.js";

export const BLOB_VERSION = 1;

const CIPHER = "aes-256-gcm";
const IV_LENGTH = 12;
const TAG_LENGTH = 16;
const DEK_LENGTH = 32;
const WRAPPED_DEK_LENGTH = IV_LENGTH + DEK_LENGTH + TAG_LENGTH;

interface ParsedBlob {
  readonly header: Uint8Array;
  readonly version: number;
  readonly keyId: string;
  readonly wrappedDek: Uint8Array;
  readonly nonce: Uint8Array;
  readonly ciphertext: Uint8Array;
  readonly tag: Uint8Array;
}

// =============================================================================
// AES-GCM
// =============================================================================

interface Sealed {
  readonly iv: Uint8Array;
  readonly ciphertext: Uint8Array;
  readonly tag: Uint8Array;
}

function gcmSeal(key: Uint8Array, plaintext: Uint8Array, aad: Uint8Array): Sealed {
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(CIPHER, key, iv, { authTagLength: TAG_LENGTH });
  cipher.setAAD(aad);
  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  return { iv, ciphertext, tag: cipher.getAuthTag() };
}

function gcmOpen(
  key: Uint8Array,
  sealed: Sealed,
  aad: Uint8Array,
  what: string,
): Buffer {
  const decipher = createDecipheriv(CIPHER, key, sealed.iv, { authTagLength: TAG_LENGTH });
  decipher.setAAD(aad);
  decipher.setAuthTag(sealed.tag);
  const head = decipher.update(sealed.ciphertext);
  try {
    const tail = decipher.final();
    const plaintext = Buffer.concat([head, tail]);
    head.fill(0);
    tail.fill(0);
    return plaintext;
  } catch {
    head.fill(0);
    throw new AuthenticationError(`${what} failed authentication`);
  }
}

// =============================================================================
// Layout
// =============================================================================

function encodeHeader(keyId: string): Uint8Array {
  const id = Buffer.from(keyId, "utf8");
  const header = new Uint8Array(2 + id.length);
  header[0] = BLOB_VERSION;
  header[1] = id.length;
  header.set(id, 2);
  return header;
}

function parse(blob: Uint8Array): ParsedBlob {
  const version = blob[0];
  const keyIdLength = blob[1];
  if (version === undefined || keyIdLength === undefined) {
    throw new AuthenticationError("Blob is truncated");
  }
  if (version !== BLOB_VERSION) {
    throw new AuthenticationError(`Unsupported blob version ${version}`);
  }

  const headerLength = 2 + keyIdLength;
  const payloadStart = headerLength + WRAPPED_DEK_LENGTH;
  if (blob.length < payloadStart + IV_LENGTH + TAG_LENGTH) {
    throw new AuthenticationError("Blob is truncated");
  }

  const wrappedDek = blob.subarray(headerLength, payloadStart);
  return {
    header: blob.subarray(0, headerLength),
    version,
    keyId: Buffer.from(blob.subarray(2, headerLength)).toString("utf8"),
    wrappedDek,
    nonce: blob.subarray(payloadStart, payloadStart + IV_LENGTH),
    ciphertext: blob.subarray(payloadStart + IV_LENGTH, blob.length - TAG_LENGTH),
    tag: blob.subarray(blob.length - TAG_LENGTH),
  };
}

function splitWrappedDek(wrappedDek: Uint8Array): Sealed {
  return {
    iv: wrappedDek.subarray(0, IV_LENGTH),
    ciphertext: wrappedDek.subarray(IV_LENGTH, IV_LENGTH + DEK_LENGTH),
    tag: wrappedDek.subarray(IV_LENGTH + DEK_LENGTH),
  };
}

function wrapDek(dek: Uint8Array, keyring: MasterKeyring): { header: Uint8Array; wrapped: Uint8Array } {
  const { id, key } = keyring.currentKey;
  const header = encodeHeader(id);
  const sealed = gcmSeal(key, dek, header);
  return {
    header,
    wrapped: Buffer.concat([sealed.iv, sealed.ciphertext, sealed.tag]),
  };
}

function unwrapDek(parsed: ParsedBlob, keyring: MasterKeyring): Buffer {
  const masterKey = keyring.find(parsed.keyId);
  if (!masterKey) {
    throw new AuthenticationError(`No master key for key id ${parsed.keyId}`);
  }
  const dek = gcmOpen(masterKey, splitWrappedDek(parsed.wrappedDek), parsed.header, "Data key");
  if (dek.length !== DEK_LENGTH) {
    dek.fill(0);
    throw new AuthenticationError("Data key has the wrong length");
  }
  return dek;
}

function purposeBytes(purpose: string): Buffer {
  if (purpose.length === 0) {
    throw new VaultError("INVALID_PURPOSE", "Purpose must not be empty");
  }
  return Buffer.from(purpose, "utf8");
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Seal `plaintext` for `purpose` under a fresh DEK wrapped by the keyring's
 * current master key.
 */
export function seal(
  plaintext: Uint8Array,
  purpose: string,
  keyring: MasterKeyring,
): Uint8Array {
  const aad = purposeBytes(purpose);
  const dek = randomBytes(DEK_LENGTH);
  try {
    const { header, wrapped } = wrapDek(dek, keyring);
    const payload = gcmSeal(dek, plaintext, aad);
    return new Uint8Array(
      Buffer.concat([header, wrapped, payload.iv, payload.ciphertext, payload.tag]),
    );
  } finally {
    dek.fill(0);
  }
}

/**
 * Open a blob sealed for `purpose`. The caller owns the returned buffer and
 * must zero it when done.
 *
 * @throws AuthenticationError on any decode or authentication failure
 */
export function open(
  blob: Uint8Array,
  purpose: string,
  keyring: MasterKeyring,
): Uint8Array {
  const aad = purposeBytes(purpose);
  const parsed = parse(blob);
  const dek = unwrapDek(parsed, keyring);
  try {
    return gcmOpen(dek, { iv: parsed.nonce, ciphertext: parsed.ciphertext, tag: parsed.tag }, aad, "Payload");
  } finally {
    dek.fill(0);
  }
}

/**
 * Re-wrap a blob's DEK under the keyring's current master key. The
 * payload bytes are carried over untouched.
 */
export function rewrap(blob: Uint8Array, keyring: MasterKeyring): Uint8Array {
  const parsed = parse(blob);
  const dek = unwrapDek(parsed, keyring);
  try {
    const { header, wrapped } = wrapDek(dek, keyring);
    return new Uint8Array(
      Buffer.concat([header, wrapped, parsed.nonce, parsed.ciphertext, parsed.tag]),
    );
  } finally {
    dek.fill(0);
  }
}

/** Id of the master key a blob's DEK is wrapped under. */
export function blobKeyId(blob: Uint8Array): string {
  return parse(blob).keyId;
}
