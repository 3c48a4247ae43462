/**
 * @flatchain/store — Types for the segmented flat-file store.
 *
 * Directory layout (all files newline-delimited, one record per line):
 *
 *   metadata      {difficultyBits, subsidy, height, segmentRecordCount, currentSegmentIndex}
 *   address       account records
 *   genesis       the genesis block, written once
 *   transactions  pending transfer intents
 *   data-<N>      blocks 1.. in segments of up to `segmentThreshold` lines
 */

import type { AccountRecord, Block, StoreMetadata, TransferIntent } from "@flatchain/types";

// =============================================================================
// File Names
// =============================================================================

export const METADATA_FILE = "metadata";
export const ADDRESS_FILE = "address";
export const GENESIS_FILE = "genesis";
export const TRANSACTIONS_FILE = "transactions";
export const SEGMENT_PREFIX = "data-";

export const DEFAULT_SEGMENT_THRESHOLD = 100;

// =============================================================================
// Store Shapes
// =============================================================================

/**
 * Chain-wide parameters fixed at initialization.
 */
export interface StoreParams {
  readonly difficultyBits: number;
  readonly subsidy: number;
}

/**
 * Everything load() reconstructs from disk.
 */
export interface StoreSnapshot {
  readonly metadata: StoreMetadata;
  readonly accounts: readonly AccountRecord[];
  readonly pending: readonly TransferIntent[];
  /** Genesis first, then segment blocks in order */
  readonly blocks: readonly Block[];
}

/**
 * Full in-memory state handed to persistAll().
 */
export interface PersistedState extends StoreParams {
  readonly accounts: readonly AccountRecord[];
  readonly pending: readonly TransferIntent[];
  /** Genesis first */
  readonly blocks: readonly Block[];
}

// =============================================================================
// Errors
// =============================================================================

export type StoreErrorCode =
  | "CORRUPT_OR_MISSING_STORE"
  | "CORRUPT_SEGMENT"
  | "SEGMENT_THRESHOLD_MISMATCH"
  | "NOT_INITIALIZED"
  | "ALREADY_INITIALIZED"
  | "BLOCK_OUT_OF_ORDER";

export interface StoreErrorOptions {
  /** File the problem was found in */
  readonly file?: string | undefined;
  /** 1-based line number within `file` */
  readonly line?: number | undefined;
  readonly cause?: unknown;
}

export class StoreError extends Error {
  public readonly code: StoreErrorCode;
  public readonly file: string | undefined;
  public readonly line: number | undefined;

  constructor(code: StoreErrorCode, message: string, options?: StoreErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "StoreError";
    this.code = code;
    this.file = options?.file;
    this.line = options?.line;
  }
}
