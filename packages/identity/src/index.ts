/**
 * @flatchain/identity — Accounts, keys and addresses.
 *
 * - ECDSA P-384 key pairs (node:crypto)
 * - Addresses: base58(hash160(pubkey) ++ full double-SHA256 checksum)
 * - IdentityVault: the in-memory wallet pool with balance primitives
 *
 * @packageDocumentation
 */

export { IdentityVault } from "./vault.js";

export {
  generateKeyPair,
  keyPairMatches,
  signPayload,
  verifyPayload,
  SIGNING_KEY_BYTES,
  VERIFYING_KEY_BYTES,
  SIGNATURE_BYTES,
} from "./keys.js";
export type { KeyPair } from "./keys.js";

export {
  hash160,
  addressChecksum,
  deriveAddress,
  isWellFormedAddress,
  addressMatchesKey,
  KEY_HASH_BYTES,
  CHECKSUM_BYTES,
  ADDRESS_BYTES,
} from "./address.js";

export {
  toAccountRecord,
  fromAccountRecord,
  serializeAccount,
  deserializeAccount,
} from "./account-codec.js";

export type { Account, IdentityErrorCode } from "./types.js";
export { IdentityError } from "./types.js";
