/**
 * @flatchain/chain — Collaborator interfaces and chain errors.
 *
 * The chain never computes proof-of-work or Merkle roots itself: it
 * asks a BlockSealer and a MerkleRootFn. Shipped implementations live
 * in pow.ts and merkle.ts.
 */

import type { Hash } from "@flatchain/types";

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Block contents submitted for sealing.
 */
export interface SealInput {
  readonly height: number;
  readonly timestamp: number;
  readonly difficultyBits: number;
  readonly transactions: readonly string[];
  readonly prevHash: Hash;
  readonly miner: string;
}

export interface SealResult {
  readonly hash: Hash;
  readonly nonce: number;
}

/**
 * Produces a hash/nonce pair that meets the difficulty target.
 */
export interface BlockSealer {
  seal(input: SealInput): SealResult;

  /** Recompute the hash for `nonce` and check it against the target. */
  verify(input: SealInput, result: SealResult): boolean;
}

/**
 * Commitment over a block's transaction list.
 */
export type MerkleRootFn = (transactions: readonly string[]) => Hash;

/**
 * Anything that can sign a payload on behalf of a named account.
 * IdentityVault satisfies this.
 */
export interface MessageSigner {
  sign(name: string, payload: string): Uint8Array;
}

// =============================================================================
// Integrity
// =============================================================================

export interface ChainIntegrityError {
  readonly height: number;
  readonly reason: string;
}

export interface ChainIntegrityResult {
  readonly valid: boolean;
  readonly errors: readonly ChainIntegrityError[];
}

// =============================================================================
// Errors
// =============================================================================

export type ChainErrorCode =
  | "EMPTY_CHAIN"
  | "GENESIS_EXISTS"
  | "BROKEN_LINK"
  | "MALFORMED_BLOCK"
  | "MALFORMED_TRANSACTION"
  | "INVALID_DIFFICULTY";

export class ChainError extends Error {
  public readonly code: ChainErrorCode;

  constructor(code: ChainErrorCode, message: string) {
    super(message);
    this.name = "ChainError";
    this.code = code;
  }
}
