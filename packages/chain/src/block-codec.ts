/**
 * @flatchain/chain — Block encoding.
 *
 * One block per line, RFC 8785 canonical JSON. Canonical form keeps
 * the encoding stable: the same block always serializes to the same
 * bytes, independent of property insertion order.
 */

import { canonicalize } from "json-canonicalize";
import type { Block } from "@flatchain/types";
import { isBlock } from "@flatchain/types";
import { ChainError } from "./types.js";

export function serializeBlock(block: Block): string {
  return canonicalize({
    height: block.height,
    timestamp: block.timestamp,
    difficultyBits: block.difficultyBits,
    nonce: block.nonce,
    miner: block.miner,
    transactions: block.transactions,
    prevHash: block.prevHash,
    hash: block.hash,
    merkleRoot: block.merkleRoot,
  });
}

/**
 * Parse one serialized block. Throws MALFORMED_BLOCK on bad JSON or a
 * record that fails the Block guard.
 */
export function deserializeBlock(line: string): Block {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (err) {
    throw new ChainError(
      "MALFORMED_BLOCK",
      `Block line is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (!isBlock(parsed)) {
    throw new ChainError("MALFORMED_BLOCK", "Block line does not match the block shape");
  }

  return {
    height: parsed.height,
    timestamp: parsed.timestamp,
    difficultyBits: parsed.difficultyBits,
    nonce: parsed.nonce,
    miner: parsed.miner,
    transactions: [...parsed.transactions],
    prevHash: parsed.prevHash,
    hash: parsed.hash,
    merkleRoot: parsed.merkleRoot,
  };
}
