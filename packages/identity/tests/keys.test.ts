import { describe, it, expect } from "vitest";
import {
  generateKeyPair,
  keyPairMatches,
  signPayload,
  verifyPayload,
  SIGNATURE_BYTES,
  SIGNING_KEY_BYTES,
  VERIFYING_KEY_BYTES,
} from "../src/keys.js";
import { IdentityError } from "../src/types.js";

describe("generateKeyPair", () => {
  it("produces raw P-384 key material", () => {
    const keys = generateKeyPair();
    expect(keys.signingKey).toHaveLength(SIGNING_KEY_BYTES);
    expect(keys.verifyingKey).toHaveLength(VERIFYING_KEY_BYTES);
    expect(keyPairMatches(keys)).toBe(true);
  });

  it("does not pair keys from different generations", () => {
    const a = generateKeyPair();
    const b = generateKeyPair();
    expect(keyPairMatches({ signingKey: a.signingKey, verifyingKey: b.verifyingKey })).toBe(false);
  });
});

describe("signPayload / verifyPayload", () => {
  it("round-trips", () => {
    const keys = generateKeyPair();
    const sig = signPayload(keys, "from: a -- to: b -- amount: 1");
    expect(sig).toHaveLength(SIGNATURE_BYTES);
    expect(verifyPayload(keys.verifyingKey, "from: a -- to: b -- amount: 1", sig)).toBe(true);
  });

  it("rejects an altered payload", () => {
    const keys = generateKeyPair();
    const sig = signPayload(keys, "from: a -- to: b -- amount: 1");
    expect(verifyPayload(keys.verifyingKey, "from: a -- to: b -- amount: 2", sig)).toBe(false);
  });

  it("rejects a truncated signature", () => {
    const keys = generateKeyPair();
    const sig = signPayload(keys, "payload");
    expect(verifyPayload(keys.verifyingKey, "payload", sig.subarray(1))).toBe(false);
  });

  it("rejects an all-zero signature", () => {
    const keys = generateKeyPair();
    expect(verifyPayload(keys.verifyingKey, "payload", new Uint8Array(SIGNATURE_BYTES))).toBe(false);
  });

  it("throws INVALID_KEY for a malformed verifying key", () => {
    const keys = generateKeyPair();
    const sig = signPayload(keys, "payload");
    try {
      verifyPayload(new Uint8Array(10), "payload", sig);
      expect.unreachable("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(IdentityError);
      expect((err as IdentityError).code).toBe("INVALID_KEY");
    }
  });
});
