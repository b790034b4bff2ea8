/**
 * @txrelay/key-vault — Error types.
 */

export type VaultErrorCode =
  | "INVALID_MASTER_KEY"
  | "INVALID_PURPOSE"
  | "UNKNOWN_KEY_ID"
  | "DUPLICATE_KEY_ID"
  | "INVALID_PRIVATE_KEY"
  | "WALLET_NOT_FOUND"
  | "CREDENTIAL_NOT_FOUND";

export class VaultError extends Error {
  public readonly code: VaultErrorCode;
  constructor(code: VaultErrorCode, message: string) {
    super(message);
    this.name = "VaultError";
    this.code = code;
  }
}

/**
 * A blob failed to decode, unwrap or authenticate. Never carries plaintext.
 */
export class AuthenticationError extends Error {
  public readonly code = "AUTHENTICATION_FAILED" as const;
  constructor(message: string) {
    super(message);
    this.name = "AuthenticationError";
  }
}
