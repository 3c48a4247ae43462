/**
 * @flatchain/chain — Block chain assembly and integrity.
 *
 * Provides:
 * - ChainStore: ordered blocks, genesis, two-phase build/commit
 * - ProofOfWorkSealer: the shipped BlockSealer
 * - computeMerkleRoot: the shipped MerkleRootFn
 * - Block and signed-message line encodings
 *
 * @packageDocumentation
 */

export { ChainStore, GENESIS_MESSAGE } from "./chain-store.js";
export type { ChainStoreOptions } from "./chain-store.js";

export { ProofOfWorkSealer, hasLeadingZeroBits } from "./pow.js";
export { computeMerkleRoot, rootOfLeaves } from "./merkle.js";
export { serializeBlock, deserializeBlock } from "./block-codec.js";
export {
  encodeSignedMessage,
  decodeSignedMessage,
  SIGNATURE_SEPARATOR,
} from "./signed-message.js";
export type { SignedMessage } from "./signed-message.js";

export type {
  BlockSealer,
  SealInput,
  SealResult,
  MerkleRootFn,
  MessageSigner,
  ChainIntegrityError,
  ChainIntegrityResult,
  ChainErrorCode,
} from "./types.js";
export { ChainError } from "./types.js";
