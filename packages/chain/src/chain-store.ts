/**
 * @flatchain/chain — ChainStore.
 *
 * The ordered, append-only sequence of blocks.
 *
 * API surface:
 * - genesis(): Seal the root block (height 0, prevHash = ZERO_HASH)
 * - build() / commit(): Seal the next block, then link it onto the tip
 * - append(): build() + commit()
 * - restore(): Re-link blocks read back from storage
 * - tip() / at() / blocks(): Queries
 * - verifyLink(): Merkle-root equality between two blocks
 * - verifyChain(): Full linkage, proof-of-work and Merkle check
 *
 * Sealing and commit are separate so a caller can make a block durable
 * before it becomes visible on the chain.
 */

import type { Block } from "@flatchain/types";
import { ZERO_HASH } from "@flatchain/types";
import { computeMerkleRoot } from "./merkle.js";
import { encodeSignedMessage } from "./signed-message.js";
import type {
  BlockSealer,
  ChainIntegrityError,
  ChainIntegrityResult,
  MerkleRootFn,
  MessageSigner,
} from "./types.js";
import { ChainError } from "./types.js";

/** Payload signed by the first miner into the genesis block. */
export const GENESIS_MESSAGE = "This is the genesis block!!!";

export interface ChainStoreOptions {
  readonly sealer: BlockSealer;
  readonly signer: MessageSigner;
  readonly difficultyBits: number;
  /** Defaults to computeMerkleRoot */
  readonly merkleRoot?: MerkleRootFn | undefined;
  /** Defaults to Date.now */
  readonly clock?: (() => number) | undefined;
}

export class ChainStore {
  private readonly _blocks: Block[] = [];
  private readonly _sealer: BlockSealer;
  private readonly _signer: MessageSigner;
  private readonly _merkleRoot: MerkleRootFn;
  private readonly _clock: () => number;
  private readonly _difficultyBits: number;

  constructor(options: ChainStoreOptions) {
    this._sealer = options.sealer;
    this._signer = options.signer;
    this._merkleRoot = options.merkleRoot ?? computeMerkleRoot;
    this._clock = options.clock ?? Date.now;
    this._difficultyBits = options.difficultyBits;
  }

  // ─── Block Creation ──────────────────────────────────────────────────

  /**
   * Seal and commit the genesis block. Only valid on an empty chain.
   */
  genesis(minerName: string): Block {
    if (this._blocks.length > 0) {
      throw new ChainError("GENESIS_EXISTS", "Chain already has a genesis block");
    }

    const message = encodeSignedMessage({
      payload: GENESIS_MESSAGE,
      signature: this._signer.sign(minerName, GENESIS_MESSAGE),
    });

    const block = this._seal(0, [message], ZERO_HASH, minerName);
    this.commit(block);
    return block;
  }

  /**
   * Seal a block on top of the current tip without committing it.
   */
  build(transactions: readonly string[], minerName: string): Block {
    const tip = this.tip();
    return this._seal(tip.height + 1, transactions, tip.hash, minerName);
  }

  /**
   * Link a sealed block onto the tip. Throws BROKEN_LINK unless the
   * block's height and prevHash continue the chain.
   */
  commit(block: Block): void {
    const tip = this._blocks[this._blocks.length - 1];
    const expectedHeight = tip === undefined ? 0 : tip.height + 1;
    const expectedPrev = tip === undefined ? ZERO_HASH : tip.hash;

    if (block.height !== expectedHeight || block.prevHash !== expectedPrev) {
      throw new ChainError(
        "BROKEN_LINK",
        `Block ${block.height} (prev ${block.prevHash}) does not extend tip at height ${expectedHeight - 1} (${expectedPrev})`,
      );
    }

    this._blocks.push(block);
  }

  append(transactions: readonly string[], minerName: string): Block {
    const block = this.build(transactions, minerName);
    this.commit(block);
    return block;
  }

  /**
   * Re-link stored blocks, genesis first. The chain must be empty.
   */
  restore(blocks: readonly Block[]): void {
    if (this._blocks.length > 0) {
      throw new ChainError("GENESIS_EXISTS", "Cannot restore onto a non-empty chain");
    }
    for (const block of blocks) {
      this.commit(block);
    }
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  tip(): Block {
    const tip = this._blocks[this._blocks.length - 1];
    if (tip === undefined) {
      throw new ChainError("EMPTY_CHAIN", "Chain has no blocks; create the genesis block first");
    }
    return tip;
  }

  at(height: number): Block | undefined {
    return this._blocks[height];
  }

  blocks(): readonly Block[] {
    return [...this._blocks];
  }

  get length(): number {
    return this._blocks.length;
  }

  get difficultyBits(): number {
    return this._difficultyBits;
  }

  // ─── Integrity ───────────────────────────────────────────────────────

  /**
   * Compare the Merkle roots of two blocks' transaction lists.
   *
   * This is a content-equality check: it says whether both blocks
   * commit to the same transactions. It does not check that one block
   * follows the other; see verifyChain() for linkage.
   */
  verifyLink(a: Block, b: Block): boolean {
    return this._merkleRoot(a.transactions) === this._merkleRoot(b.transactions);
  }

  /**
   * Walk the whole chain from genesis and collect every inconsistency.
   */
  verifyChain(): ChainIntegrityResult {
    const errors: ChainIntegrityError[] = [];
    let previousHash = ZERO_HASH;

    this._blocks.forEach((block, index) => {
      if (block.height !== index) {
        errors.push({ height: index, reason: `Height ${block.height} stored at position ${index}` });
      }
      if (block.prevHash !== previousHash) {
        errors.push({
          height: index,
          reason: `prevHash mismatch: expected "${previousHash}", got "${block.prevHash}"`,
        });
      }

      const sealed = this._sealer.verify(
        {
          height: block.height,
          timestamp: block.timestamp,
          difficultyBits: block.difficultyBits,
          transactions: block.transactions,
          prevHash: block.prevHash,
          miner: block.miner,
        },
        { hash: block.hash, nonce: block.nonce },
      );
      if (!sealed) {
        errors.push({ height: index, reason: "Hash does not match contents or difficulty" });
      }

      const root = this._merkleRoot(block.transactions);
      if (root !== block.merkleRoot) {
        errors.push({
          height: index,
          reason: `Merkle root mismatch: expected "${root}", got "${block.merkleRoot}"`,
        });
      }

      previousHash = block.hash;
    });

    return { valid: errors.length === 0, errors };
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _seal(
    height: number,
    transactions: readonly string[],
    prevHash: string,
    miner: string,
  ): Block {
    const input = {
      height,
      timestamp: this._clock(),
      difficultyBits: this._difficultyBits,
      transactions: [...transactions],
      prevHash,
      miner,
    };
    const { hash, nonce } = this._sealer.seal(input);

    return {
      ...input,
      nonce,
      hash,
      merkleRoot: this._merkleRoot(input.transactions),
    };
  }
}
