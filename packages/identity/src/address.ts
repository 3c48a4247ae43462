/**
 * @flatchain/identity — Address derivation.
 *
 *   keyHash  = RIPEMD160(SHA256(verifyingKey))        20 bytes
 *   checksum = SHA256(SHA256(keyHash))                32 bytes, NOT truncated
 *   address  = base58(keyHash ++ checksum)
 *
 * The checksum is kept at full length, unlike the 4-byte checksum of
 * Bitcoin-style addresses. Addresses are therefore 52 bytes before
 * encoding and not interchangeable with that format.
 */

import { createHash } from "node:crypto";
import { ripemd160 } from "@noble/hashes/ripemd160";
import { base58 } from "@scure/base";

export const KEY_HASH_BYTES = 20;
export const CHECKSUM_BYTES = 32;
export const ADDRESS_BYTES = KEY_HASH_BYTES + CHECKSUM_BYTES;

function sha256(data: Uint8Array): Uint8Array {
  return new Uint8Array(createHash("sha256").update(data).digest());
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, i) => byte === b[i]);
}

/**
 * RIPEMD160(SHA256(data)).
 */
export function hash160(data: Uint8Array): Uint8Array {
  return ripemd160(sha256(data));
}

/**
 * Full-length double-SHA256 checksum of a key hash.
 */
export function addressChecksum(keyHash: Uint8Array): Uint8Array {
  return sha256(sha256(keyHash));
}

/**
 * Derive the account address for a verifying key.
 */
export function deriveAddress(verifyingKey: Uint8Array): string {
  const keyHash = hash160(verifyingKey);
  const raw = new Uint8Array(ADDRESS_BYTES);
  raw.set(keyHash, 0);
  raw.set(addressChecksum(keyHash), KEY_HASH_BYTES);
  return base58.encode(raw);
}

/**
 * Check an address's internal consistency without knowing its key:
 * valid base58, 52 bytes, checksum matches the embedded key hash.
 */
export function isWellFormedAddress(address: string): boolean {
  let raw: Uint8Array;
  try {
    raw = base58.decode(address);
  } catch {
    return false;
  }
  if (raw.length !== ADDRESS_BYTES) {
    return false;
  }
  const keyHash = raw.subarray(0, KEY_HASH_BYTES);
  return bytesEqual(raw.subarray(KEY_HASH_BYTES), addressChecksum(keyHash));
}

/**
 * Recompute the derivation for a verifying key and compare.
 */
export function addressMatchesKey(address: string, verifyingKey: Uint8Array): boolean {
  return address === deriveAddress(verifyingKey);
}
