/**
 * Account Types
 *
 * Persisted shapes for accounts and the transfers between them.
 *
 * Rules:
 * - Balances are non-negative integers in the ledger's base unit
 * - Account names are the unique key; addresses are derived, never stored
 * - Key material travels as base64 text in records
 */

/**
 * Account record as written to the `address` file (one JSON object per line).
 */
export interface AccountRecord {
  /** Unique account name */
  readonly name: string;

  /** Current balance */
  readonly balance: number;

  /** Raw ECDSA P-384 private scalar, base64 */
  readonly signingKey: string;

  /** Raw ECDSA P-384 public point (X || Y), base64 */
  readonly verifyingKey: string;
}

/**
 * A requested movement of value from one account to another.
 * Written to the `transactions` file while it is pending.
 */
export interface TransferIntent {
  readonly source: string;
  readonly dest: string;
  readonly amount: number;
}
