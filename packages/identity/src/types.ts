/**
 * @flatchain/identity — Types for accounts and identity errors.
 *
 * Rules:
 * - Account snapshots handed out by the vault are readonly copies
 * - Key material is raw bytes in memory, base64 only at the record boundary
 * - Fail-closed: every identity failure throws IdentityError
 */

/**
 * A registered account as seen by callers.
 */
export interface Account {
  readonly name: string;
  readonly balance: number;

  /** Raw 48-byte P-384 private scalar */
  readonly signingKey: Uint8Array;

  /** Raw 96-byte P-384 public point (X || Y) */
  readonly verifyingKey: Uint8Array;

  /** base58(hash160(verifyingKey) ++ sha256(sha256(hash160))) */
  readonly address: string;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for identity operations. */
export type IdentityErrorCode =
  | "DUPLICATE_ACCOUNT"
  | "UNKNOWN_ACCOUNT"
  | "INVALID_NAME"
  | "INVALID_KEY"
  | "INVALID_RECORD"
  | "SIGNATURE_INVALID";

/**
 * Structured error from the identity vault.
 */
export class IdentityError extends Error {
  public readonly code: IdentityErrorCode;

  constructor(code: IdentityErrorCode, message: string) {
    super(message);
    this.name = "IdentityError";
    this.code = code;
  }
}
