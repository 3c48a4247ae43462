/**
 * @flatchain/identity — Account record encoding.
 *
 * Accounts are stored as `{name, balance, signingKey, verifyingKey}`
 * with base64 key material. The address is not stored: it is
 * re-derived from the verifying key when a record is decoded.
 */

import type { AccountRecord } from "@flatchain/types";
import { isAccountRecord } from "@flatchain/types";
import { deriveAddress } from "./address.js";
import { keyPairMatches } from "./keys.js";
import type { Account } from "./types.js";
import { IdentityError } from "./types.js";

export function toAccountRecord(account: Account): AccountRecord {
  return {
    name: account.name,
    balance: account.balance,
    signingKey: Buffer.from(account.signingKey).toString("base64"),
    verifyingKey: Buffer.from(account.verifyingKey).toString("base64"),
  };
}

/**
 * Rebuild an account from its record.
 * Throws INVALID_KEY if the key pair is malformed or mismatched.
 */
export function fromAccountRecord(record: AccountRecord): Account {
  const signingKey = new Uint8Array(Buffer.from(record.signingKey, "base64"));
  const verifyingKey = new Uint8Array(Buffer.from(record.verifyingKey, "base64"));

  if (!keyPairMatches({ signingKey, verifyingKey })) {
    throw new IdentityError(
      "INVALID_KEY",
      `Stored keys for account "${record.name}" do not form a key pair`,
    );
  }

  return {
    name: record.name,
    balance: record.balance,
    signingKey,
    verifyingKey,
    address: deriveAddress(verifyingKey),
  };
}

/**
 * Serialize an account to one JSON line (no trailing newline).
 */
export function serializeAccount(account: Account): string {
  return JSON.stringify(toAccountRecord(account));
}

/**
 * Parse one JSON line back into an account.
 */
export function deserializeAccount(line: string): Account {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    throw new IdentityError("INVALID_RECORD", "Line is not valid JSON");
  }
  if (!isAccountRecord(parsed)) {
    throw new IdentityError("INVALID_RECORD", "Line is not a valid account record");
  }
  return fromAccountRecord(parsed);
}
