/**
 * @txrelay/key-vault — Envelope encryption for signing keys and API secrets.
 */

export { VaultError, AuthenticationError } from "./errors.js";
export type { VaultErrorCode } from "./errors.js";

export {
  MasterKeyring,
  MASTER_KEY_LENGTH,
  decodeMasterKey,
  parseRetiredKeys,
} from "./master-keyring.js";
export type { MasterKey, MasterKeyringConfig } from "./master-keyring.js";

export { seal, open, rewrap, blobKeyId, BLOB_VERSION } from "./envelope.js";

export {
  KeyVault,
  walletPurpose,
  credentialSecretPurpose,
  credentialMetaPurpose,
} from "./key-vault.js";
export type { KeyVaultOptions, KeyMaterialStore, RotationReport } from "./key-vault.js";

export { WalletKeyring } from "./wallet-keyring.js";
export { CredentialVault } from "./credential-vault.js";
export type { CredentialMeta } from "./credential-vault.js";
