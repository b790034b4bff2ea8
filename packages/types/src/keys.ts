/**
 * Key material records.
 *
 * Only envelope-encrypted blobs are ever stored. Plaintext private keys and
 * API secrets exist in memory only inside a vault scope.
 */

import type { HexString } from "./chain.js";

export interface WalletRecord {
  readonly address: HexString;
  readonly privkeyEnc: Uint8Array;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export interface ApiCredentialRecord {
  readonly userId: string;
  readonly provider: string;
  readonly secretEnc: Uint8Array;
  readonly metaEnc: Uint8Array | null;
  readonly createdAt: string;
  readonly updatedAt: string;
}
