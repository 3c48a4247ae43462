/**
 * @flatchain/identity — ECDSA P-384 key handling.
 *
 * Keys are kept as raw bytes: the 48-byte private scalar and the
 * 96-byte uncompressed public point without its 0x04 prefix. They are
 * turned into KeyObjects through JWK only for the duration of a
 * sign or verify call.
 *
 * Signatures are ECDSA over SHA-384 in IEEE P1363 form (r || s, 96 bytes).
 */

import {
  createPrivateKey,
  createPublicKey,
  generateKeyPairSync,
  sign,
  verify,
  type JsonWebKey,
  type KeyObject,
} from "node:crypto";
import { IdentityError } from "./types.js";

const CURVE = "P-384";
const COORDINATE_BYTES = 48;
const DIGEST = "sha384";

export const SIGNING_KEY_BYTES = COORDINATE_BYTES;
export const VERIFYING_KEY_BYTES = COORDINATE_BYTES * 2;
export const SIGNATURE_BYTES = COORDINATE_BYTES * 2;

/**
 * Raw key material for one account.
 */
export interface KeyPair {
  readonly signingKey: Uint8Array;
  readonly verifyingKey: Uint8Array;
}

// =============================================================================
// Internal Helpers
// =============================================================================

function fromBase64Url(value: string | undefined, field: string): Uint8Array {
  if (value === undefined) {
    throw new IdentityError("INVALID_KEY", `Exported JWK is missing "${field}"`);
  }
  return new Uint8Array(Buffer.from(value, "base64url"));
}

function toBase64Url(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64url");
}

function publicJwk(verifyingKey: Uint8Array): JsonWebKey {
  if (verifyingKey.length !== VERIFYING_KEY_BYTES) {
    throw new IdentityError(
      "INVALID_KEY",
      `Verifying key must be ${VERIFYING_KEY_BYTES} bytes, got ${verifyingKey.length}`,
    );
  }
  return {
    kty: "EC",
    crv: CURVE,
    x: toBase64Url(verifyingKey.subarray(0, COORDINATE_BYTES)),
    y: toBase64Url(verifyingKey.subarray(COORDINATE_BYTES)),
  };
}

function privateKeyObject(keys: KeyPair): KeyObject {
  if (keys.signingKey.length !== SIGNING_KEY_BYTES) {
    throw new IdentityError(
      "INVALID_KEY",
      `Signing key must be ${SIGNING_KEY_BYTES} bytes, got ${keys.signingKey.length}`,
    );
  }
  const jwk: JsonWebKey = { ...publicJwk(keys.verifyingKey), d: toBase64Url(keys.signingKey) };
  try {
    return createPrivateKey({ key: jwk, format: "jwk" });
  } catch (err) {
    throw new IdentityError(
      "INVALID_KEY",
      `Key pair rejected: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

function publicKeyObject(verifyingKey: Uint8Array): KeyObject {
  const jwk = publicJwk(verifyingKey);
  try {
    return createPublicKey({ key: jwk, format: "jwk" });
  } catch (err) {
    throw new IdentityError(
      "INVALID_KEY",
      `Verifying key rejected: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Generate a fresh P-384 key pair.
 */
export function generateKeyPair(): KeyPair {
  const { privateKey } = generateKeyPairSync("ec", { namedCurve: "secp384r1" });
  const jwk = privateKey.export({ format: "jwk" });
  const x = fromBase64Url(jwk.x, "x");
  const y = fromBase64Url(jwk.y, "y");

  const verifyingKey = new Uint8Array(VERIFYING_KEY_BYTES);
  verifyingKey.set(x, 0);
  verifyingKey.set(y, COORDINATE_BYTES);

  return { signingKey: fromBase64Url(jwk.d, "d"), verifyingKey };
}

/**
 * Check that a signing key and verifying key belong together.
 *
 * Derives the public point from the private scalar and compares it to
 * the stored verifying key. Throws INVALID_KEY on malformed bytes.
 */
export function keyPairMatches(keys: KeyPair): boolean {
  const derived = createPublicKey(privateKeyObject(keys)).export({ format: "jwk" });
  return (
    derived.x === toBase64Url(keys.verifyingKey.subarray(0, COORDINATE_BYTES)) &&
    derived.y === toBase64Url(keys.verifyingKey.subarray(COORDINATE_BYTES))
  );
}

/**
 * Sign a UTF-8 payload.
 */
export function signPayload(keys: KeyPair, payload: string): Uint8Array {
  const signature = sign(DIGEST, Buffer.from(payload, "utf8"), {
    key: privateKeyObject(keys),
    dsaEncoding: "ieee-p1363",
  });
  return new Uint8Array(signature);
}

/**
 * Verify a signature over a UTF-8 payload.
 * Returns false for any mismatch, including a malformed signature.
 */
export function verifyPayload(
  verifyingKey: Uint8Array,
  payload: string,
  signature: Uint8Array,
): boolean {
  if (signature.length !== SIGNATURE_BYTES) {
    return false;
  }
  const key = publicKeyObject(verifyingKey);
  try {
    return verify(
      DIGEST,
      Buffer.from(payload, "utf8"),
      { key, dsaEncoding: "ieee-p1363" },
      signature,
    );
  } catch {
    // OpenSSL rejects out-of-range r/s values by throwing
    return false;
  }
}
