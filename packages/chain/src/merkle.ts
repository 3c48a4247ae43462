/**
 * @flatchain/chain — Merkle root over block transactions.
 *
 * Design:
 * - Leaves: SHA-256 of each transaction's UTF-8 text
 * - Internal nodes: SHA-256(left || right), concatenation of hex strings
 * - Odd node count: duplicate the last node to make even
 * - Single leaf: leaf IS the root
 * - Empty list: ZERO_HASH (a block always carries at least its coinbase)
 */

import { createHash } from "node:crypto";
import { ZERO_HASH } from "@flatchain/types";
import type { Hash } from "@flatchain/types";

function sha256Hex(data: string): Hash {
  return createHash("sha256").update(data, "utf8").digest("hex");
}

function hashPair(left: Hash, right: Hash): Hash {
  return sha256Hex(left + right);
}

/**
 * Fold a layer of hashes bottom-up into a single root.
 */
export function rootOfLeaves(leaves: readonly Hash[]): Hash {
  let level = [...leaves];
  if (level.length === 0) {
    return ZERO_HASH;
  }

  while (level.length > 1) {
    const next: Hash[] = [];
    for (let i = 0; i < level.length; i += 2) {
      const left = level[i];
      if (left === undefined) break;
      const right = level[i + 1] ?? left;
      next.push(hashPair(left, right));
    }
    level = next;
  }

  return level[0] ?? ZERO_HASH;
}

/**
 * Merkle root of a transaction list. Satisfies MerkleRootFn.
 */
export function computeMerkleRoot(transactions: readonly string[]): Hash {
  return rootOfLeaves(transactions.map(sha256Hex));
}
