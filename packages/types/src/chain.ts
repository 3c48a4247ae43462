/**
 * Chain Types
 *
 * Block and store-metadata shapes shared by the chain, the pool and
 * the persistence layer.
 *
 * Rules:
 * - Hashes are lowercase hex SHA-256 digests (64 chars)
 * - `prevHash` of block N equals `hash` of block N-1; genesis links to ZERO_HASH
 * - Blocks are immutable once appended
 */

/**
 * Lowercase hex SHA-256 digest.
 */
export type Hash = string;

/**
 * The all-zero digest used as the genesis block's `prevHash`.
 */
export const ZERO_HASH: Hash = "0".repeat(64);

/**
 * A sealed block.
 *
 * `transactions` holds signed wire strings (`payload|signature`); the
 * chain never interprets them beyond hashing.
 */
export interface Block {
  /** 0 for genesis */
  readonly height: number;

  /** Milliseconds since epoch at sealing time */
  readonly timestamp: number;

  /** Proof-of-work target: leading zero bits required in `hash` */
  readonly difficultyBits: number;

  readonly nonce: number;

  /** Name of the account that sealed the block */
  readonly miner: string;

  readonly transactions: readonly string[];

  readonly prevHash: Hash;

  readonly hash: Hash;

  readonly merkleRoot: Hash;
}

/**
 * Store-wide counters, persisted as the single `metadata` record.
 */
export interface StoreMetadata {
  readonly difficultyBits: number;
  readonly subsidy: number;

  /** Number of blocks in the chain, genesis included */
  readonly height: number;

  /** Number of blocks written to segment files (genesis excluded) */
  readonly segmentRecordCount: number;

  /** Index N of the segment file `data-N` currently being appended to */
  readonly currentSegmentIndex: number;
}
