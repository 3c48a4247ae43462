/**
 * @flatchain/chain — Proof-of-work sealer.
 *
 * hash = SHA-256(canonicalize(header) + ":" + nonce)
 *
 * where header is the RFC 8785 canonical form of
 * {height, timestamp, difficultyBits, prevHash, miner, transactions}.
 * The canonical prefix is computed once per seal; only the nonce
 * suffix changes between attempts. A hash meets the target when its
 * first `difficultyBits` bits are zero.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { BlockSealer, SealInput, SealResult } from "./types.js";
import { ChainError } from "./types.js";

const MAX_DIFFICULTY_BITS = 256;

function headerPrefix(input: SealInput): string {
  return canonicalize({
    height: input.height,
    timestamp: input.timestamp,
    difficultyBits: input.difficultyBits,
    prevHash: input.prevHash,
    miner: input.miner,
    transactions: input.transactions,
  });
}

function digest(prefix: string, nonce: number): Buffer {
  return createHash("sha256").update(`${prefix}:${nonce}`, "utf8").digest();
}

/**
 * True if the first `bits` bits of `hash` are zero.
 */
export function hasLeadingZeroBits(hash: Uint8Array, bits: number): boolean {
  const fullBytes = Math.floor(bits / 8);
  for (let i = 0; i < fullBytes; i++) {
    if (hash[i] !== 0) return false;
  }
  const remainder = bits % 8;
  if (remainder === 0) return true;
  const next = hash[fullBytes] ?? 0;
  return next >> (8 - remainder) === 0;
}

/**
 * Hashcash-style sealer. Nonces are tried from 0 upward.
 */
export class ProofOfWorkSealer implements BlockSealer {
  seal(input: SealInput): SealResult {
    this._assertDifficulty(input.difficultyBits);
    const prefix = headerPrefix(input);

    for (let nonce = 0; nonce <= Number.MAX_SAFE_INTEGER; nonce++) {
      const hash = digest(prefix, nonce);
      if (hasLeadingZeroBits(hash, input.difficultyBits)) {
        return { hash: hash.toString("hex"), nonce };
      }
    }

    throw new ChainError(
      "INVALID_DIFFICULTY",
      `Nonce space exhausted at difficulty ${input.difficultyBits}`,
    );
  }

  verify(input: SealInput, result: SealResult): boolean {
    if (input.difficultyBits > MAX_DIFFICULTY_BITS) return false;
    const hash = digest(headerPrefix(input), result.nonce);
    return (
      hash.toString("hex") === result.hash &&
      hasLeadingZeroBits(hash, input.difficultyBits)
    );
  }

  private _assertDifficulty(bits: number): void {
    if (!Number.isInteger(bits) || bits < 0 || bits > MAX_DIFFICULTY_BITS) {
      throw new ChainError(
        "INVALID_DIFFICULTY",
        `difficultyBits must be an integer in [0, ${MAX_DIFFICULTY_BITS}], got ${bits}`,
      );
    }
  }
}
