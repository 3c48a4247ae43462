/**
 * Merkle root tests.
 *
 * Verifies:
 * - Empty, single, pair and odd-count layouts
 * - Determinism and sensitivity to order and content
 */

import { describe, it, expect } from "vitest";
import { createHash } from "node:crypto";
import { ZERO_HASH } from "@flatchain/types";
import { computeMerkleRoot, rootOfLeaves } from "../src/merkle.js";

function sha256(data: string): string {
  return createHash("sha256").update(data).digest("hex");
}

describe("computeMerkleRoot", () => {
  it("empty list has the zero root", () => {
    expect(computeMerkleRoot([])).toBe(ZERO_HASH);
  });

  it("single transaction: its hash IS the root", () => {
    expect(computeMerkleRoot(["tx-a"])).toBe(sha256("tx-a"));
  });

  it("two transactions: root is hash of the pair", () => {
    expect(computeMerkleRoot(["tx-a", "tx-b"])).toBe(sha256(sha256("tx-a") + sha256("tx-b")));
  });

  it("three transactions: last node is duplicated", () => {
    const [a, b, c] = ["tx-a", "tx-b", "tx-c"].map(sha256);
    const expected = sha256(sha256(`${a}${b}`) + sha256(`${c}${c}`));
    expect(computeMerkleRoot(["tx-a", "tx-b", "tx-c"])).toBe(expected);
  });

  it("is deterministic", () => {
    const txs = Array.from({ length: 7 }, (_, i) => `tx-${i}`);
    expect(computeMerkleRoot(txs)).toBe(computeMerkleRoot([...txs]));
  });

  it("changes when order changes", () => {
    expect(computeMerkleRoot(["tx-a", "tx-b"])).not.toBe(computeMerkleRoot(["tx-b", "tx-a"]));
  });

  it("changes when any transaction changes", () => {
    const txs = ["tx-0", "tx-1", "tx-2", "tx-3"];
    const root = computeMerkleRoot(txs);
    for (let i = 0; i < txs.length; i++) {
      const altered = [...txs];
      altered[i] = `${txs[i]}!`;
      expect(computeMerkleRoot(altered)).not.toBe(root);
    }
  });
});

describe("rootOfLeaves", () => {
  it("matches computeMerkleRoot on pre-hashed leaves", () => {
    const txs = ["a", "b", "c", "d", "e"];
    expect(rootOfLeaves(txs.map(sha256))).toBe(computeMerkleRoot(txs));
  });
});
