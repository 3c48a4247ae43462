/**
 * @flatchain/store — Segmented flat-file PersistenceLayer.
 *
 * Crash safety:
 * - Every write goes through a scoped writer (open, write, fsync, close)
 * - Whole-file rewrites go to a temp file that is renamed into place
 * - `metadata` is written last; its `height` is authoritative on load
 *
 * A block is appended to its segment before `metadata` is rewritten,
 * so a crash between the two leaves at most one untrusted trailing
 * line. load() drops such lines and rewrites the segment without them.
 *
 * Segment rotation: before each append the target index is
 * floor(segmentRecordCount / threshold); a new `data-N` file starts
 * whenever the count is a non-zero multiple of the threshold. The
 * threshold is not stored; load() checks the segment layout against
 * the configured one and refuses a store written with another.
 */

import { existsSync, mkdirSync, readdirSync, unlinkSync } from "node:fs";
import { join } from "node:path";
import type { Logger } from "pino";
import { deserializeBlock, serializeBlock } from "@flatchain/chain";
import type { AccountRecord, Block, StoreMetadata, TransferIntent } from "@flatchain/types";
import { isAccountRecord, isStoreMetadata, isTransferIntent } from "@flatchain/types";
import { appendAndSync, readLines, replaceAndSync, toLines } from "./files.js";
import { decodeLine, encodeAccountRecord, encodeIntent, encodeMetadata } from "./records.js";
import type { PersistedState, StoreParams, StoreSnapshot } from "./types.js";
import {
  ADDRESS_FILE,
  DEFAULT_SEGMENT_THRESHOLD,
  GENESIS_FILE,
  METADATA_FILE,
  SEGMENT_PREFIX,
  StoreError,
  TRANSACTIONS_FILE,
} from "./types.js";

const SEGMENT_NAME = /^data-(\d+)$/;

export interface PersistenceLayerOptions {
  /** Directory holding the store files; created on initialize() */
  readonly directory: string;

  /** Maximum blocks per `data-N` segment (default 100) */
  readonly segmentThreshold?: number | undefined;

  readonly logger?: Logger | undefined;
}

interface SegmentFile {
  readonly index: number;
  readonly name: string;
}

interface SegmentExtent extends SegmentFile {
  readonly blocks: number;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function segmentName(index: number): string {
  return `${SEGMENT_PREFIX}${index}`;
}

export class PersistenceLayer {
  private readonly _directory: string;
  private readonly _threshold: number;
  private readonly _logger: Logger | undefined;

  /** Counters mirrored from the `metadata` file once initialized or loaded */
  private _metadata: StoreMetadata | undefined;

  constructor(options: PersistenceLayerOptions) {
    const threshold = options.segmentThreshold ?? DEFAULT_SEGMENT_THRESHOLD;
    if (!Number.isSafeInteger(threshold) || threshold < 1) {
      throw new RangeError(`Segment threshold must be a positive integer, got ${threshold}`);
    }
    this._directory = options.directory;
    this._threshold = threshold;
    this._logger = options.logger;
  }

  // ─── Accessors ──────────────────────────────────────────────────────

  get directory(): string {
    return this._directory;
  }

  get segmentThreshold(): number {
    return this._threshold;
  }

  /** Current counters, or undefined before initialize()/load(). */
  get metadata(): StoreMetadata | undefined {
    return this._metadata;
  }

  /** Whether a `metadata` file exists on disk. */
  exists(): boolean {
    return existsSync(this._path(METADATA_FILE));
  }

  // ─── Initialization ─────────────────────────────────────────────────

  /**
   * Create a fresh store holding the genesis block and its accounts.
   * `metadata` is written last, so a store that has one is complete.
   */
  initialize(
    params: StoreParams,
    genesis: Block,
    accounts: readonly AccountRecord[] = [],
  ): void {
    if (this.exists()) {
      throw new StoreError(
        "ALREADY_INITIALIZED",
        `A store already exists in ${this._directory}`,
        { file: METADATA_FILE },
      );
    }
    if (genesis.height !== 0) {
      throw new StoreError(
        "BLOCK_OUT_OF_ORDER",
        `Genesis block must have height 0, got ${genesis.height}`,
      );
    }

    mkdirSync(this._directory, { recursive: true });
    for (const segment of this._segmentFiles()) {
      unlinkSync(this._path(segment.name));
    }

    replaceAndSync(this._path(GENESIS_FILE), toLines([serializeBlock(genesis)]));
    replaceAndSync(this._path(ADDRESS_FILE), toLines(accounts.map(encodeAccountRecord)));
    replaceAndSync(this._path(TRANSACTIONS_FILE), "");
    this._writeMetadata({
      difficultyBits: params.difficultyBits,
      subsidy: params.subsidy,
      height: 1,
      segmentRecordCount: 0,
      currentSegmentIndex: 0,
    });
  }

  // ─── Incremental Writes ─────────────────────────────────────────────

  /**
   * Append the next block to the current segment, then advance metadata.
   */
  appendBlock(block: Block): void {
    const metadata = this._requireMetadata();
    if (block.height !== metadata.height) {
      throw new StoreError(
        "BLOCK_OUT_OF_ORDER",
        `Expected block at height ${metadata.height}, got ${block.height}`,
      );
    }

    const count = metadata.segmentRecordCount;
    const index = Math.floor(count / this._threshold);
    if (count !== 0 && count % this._threshold === 0) {
      this._logger?.debug({ segment: segmentName(index), count }, "Opening new segment");
    }

    appendAndSync(this._path(segmentName(index)), toLines([serializeBlock(block)]));
    this._writeMetadata({
      ...metadata,
      height: metadata.height + 1,
      segmentRecordCount: count + 1,
      currentSegmentIndex: index,
    });
  }

  appendAccount(record: AccountRecord): void {
    this._requireMetadata();
    appendAndSync(this._path(ADDRESS_FILE), toLines([encodeAccountRecord(record)]));
  }

  rewriteAccounts(records: readonly AccountRecord[]): void {
    this._requireMetadata();
    replaceAndSync(this._path(ADDRESS_FILE), toLines(records.map(encodeAccountRecord)));
  }

  /**
   * Replace the pending-intent log with the full current list.
   */
  writePending(intents: readonly TransferIntent[]): void {
    this._requireMetadata();
    replaceAndSync(this._path(TRANSACTIONS_FILE), toLines(intents.map(encodeIntent)));
  }

  // ─── Load ───────────────────────────────────────────────────────────

  /**
   * Reconstruct everything from disk.
   *
   * Returns null when no `metadata` file exists. The pending log is
   * left as it is: the caller replaces it through writePending() once
   * the replayed intents are back in memory.
   */
  load(): StoreSnapshot | null {
    const metadataLines = readLines(this._path(METADATA_FILE));
    if (metadataLines === undefined) return null;

    const metadata = this._parseMetadata(metadataLines);
    const accounts = this._readRecords(ADDRESS_FILE, isAccountRecord);
    const pending = this._readRecords(TRANSACTIONS_FILE, isTransferIntent);
    const genesis = this._readGenesis();
    const segmentBlocks = this._readSegments(genesis, metadata);

    this._metadata = metadata;

    return { metadata, accounts, pending, blocks: [genesis, ...segmentBlocks] };
  }

  // ─── Full Rewrite ───────────────────────────────────────────────────

  /**
   * Rewrite every file from in-memory state.
   *
   * Segments are rewritten in place before `metadata`, and stale
   * segments past the new end are removed after it, so an interrupted
   * rewrite still loads as a prefix of the chain.
   */
  persistAll(state: PersistedState): void {
    const [genesis, ...rest] = state.blocks;
    if (genesis === undefined) {
      throw new StoreError("BLOCK_OUT_OF_ORDER", "Cannot persist a chain without a genesis block");
    }
    state.blocks.forEach((block, height) => {
      if (block.height !== height) {
        throw new StoreError(
          "BLOCK_OUT_OF_ORDER",
          `Block at position ${height} has height ${block.height}`,
        );
      }
    });

    mkdirSync(this._directory, { recursive: true });
    replaceAndSync(this._path(GENESIS_FILE), toLines([serializeBlock(genesis)]));

    let segments = 0;
    for (let start = 0; start < rest.length; start += this._threshold) {
      const chunk = rest.slice(start, start + this._threshold);
      replaceAndSync(this._path(segmentName(segments)), toLines(chunk.map(serializeBlock)));
      segments++;
    }

    replaceAndSync(this._path(ADDRESS_FILE), toLines(state.accounts.map(encodeAccountRecord)));
    replaceAndSync(this._path(TRANSACTIONS_FILE), toLines(state.pending.map(encodeIntent)));

    const count = rest.length;
    this._writeMetadata({
      difficultyBits: state.difficultyBits,
      subsidy: state.subsidy,
      height: state.blocks.length,
      segmentRecordCount: count,
      currentSegmentIndex: count === 0 ? 0 : Math.floor((count - 1) / this._threshold),
    });

    for (const segment of this._segmentFiles()) {
      if (segment.index >= segments) {
        unlinkSync(this._path(segment.name));
      }
    }
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _path(name: string): string {
    return join(this._directory, name);
  }

  private _requireMetadata(): StoreMetadata {
    if (this._metadata === undefined) {
      throw new StoreError(
        "NOT_INITIALIZED",
        "Store is not open; call initialize() or load() first",
      );
    }
    return this._metadata;
  }

  private _writeMetadata(metadata: StoreMetadata): void {
    replaceAndSync(this._path(METADATA_FILE), toLines([encodeMetadata(metadata)]));
    this._metadata = metadata;
  }

  private _parseMetadata(lines: readonly string[]): StoreMetadata {
    const [line] = lines;
    const metadata =
      lines.length === 1 && line !== undefined ? decodeLine(line, isStoreMetadata) : undefined;

    if (metadata === undefined) {
      throw new StoreError("CORRUPT_OR_MISSING_STORE", "metadata is not a valid record", {
        file: METADATA_FILE,
      });
    }
    if (metadata.height < 1 || metadata.segmentRecordCount !== metadata.height - 1) {
      throw new StoreError(
        "CORRUPT_OR_MISSING_STORE",
        `metadata counters disagree: height ${metadata.height}, segmentRecordCount ${metadata.segmentRecordCount}`,
        { file: METADATA_FILE },
      );
    }
    return metadata;
  }

  private _readRecords<T>(file: string, guard: (value: unknown) => value is T): T[] {
    const lines = readLines(this._path(file));
    if (lines === undefined) {
      throw new StoreError("CORRUPT_OR_MISSING_STORE", `${file} is missing`, { file });
    }

    return lines.map((line, i) => {
      const record = decodeLine(line, guard);
      if (record === undefined) {
        throw new StoreError("CORRUPT_OR_MISSING_STORE", `${file} line ${i + 1} is not a valid record`, {
          file,
          line: i + 1,
        });
      }
      return record;
    });
  }

  private _readGenesis(): Block {
    const lines = readLines(this._path(GENESIS_FILE));
    const [line] = lines ?? [];
    if (lines === undefined || lines.length !== 1 || line === undefined) {
      throw new StoreError("CORRUPT_OR_MISSING_STORE", "genesis is missing or not a single block", {
        file: GENESIS_FILE,
      });
    }

    let genesis: Block;
    try {
      genesis = deserializeBlock(line);
    } catch (err) {
      throw new StoreError("CORRUPT_OR_MISSING_STORE", `genesis: ${errorMessage(err)}`, {
        file: GENESIS_FILE,
        line: 1,
        cause: err,
      });
    }
    if (genesis.height !== 0) {
      throw new StoreError("CORRUPT_OR_MISSING_STORE", `genesis has height ${genesis.height}`, {
        file: GENESIS_FILE,
        line: 1,
      });
    }
    return genesis;
  }

  /**
   * Read the blocks after genesis from the segments in numeric order.
   * Lines past `segmentRecordCount` were never acknowledged by
   * metadata: they are dropped and their segment rewritten.
   */
  private _readSegments(genesis: Block, metadata: StoreMetadata): Block[] {
    const expected = metadata.segmentRecordCount;
    const blocks: Block[] = [];
    const extents: SegmentExtent[] = [];
    let previousHash = genesis.hash;

    for (const segment of this._segmentFiles()) {
      const path = this._path(segment.name);
      const lines = readLines(path) ?? [];
      const trusted = lines.slice(0, Math.max(expected - blocks.length, 0));

      trusted.forEach((line, i) => {
        let block: Block;
        try {
          block = deserializeBlock(line);
        } catch (err) {
          throw new StoreError(
            "CORRUPT_SEGMENT",
            `${segment.name} line ${i + 1}: ${errorMessage(err)}`,
            { file: segment.name, line: i + 1, cause: err },
          );
        }
        if (block.height !== blocks.length + 1) {
          throw new StoreError(
            "CORRUPT_SEGMENT",
            `${segment.name} line ${i + 1}: expected height ${blocks.length + 1}, got ${block.height}`,
            { file: segment.name, line: i + 1 },
          );
        }
        if (block.prevHash !== previousHash) {
          throw new StoreError(
            "CORRUPT_SEGMENT",
            `${segment.name} line ${i + 1}: block ${block.height} links to ${block.prevHash}, expected ${previousHash}`,
            { file: segment.name, line: i + 1 },
          );
        }
        previousHash = block.hash;
        blocks.push(block);
      });

      if (trusted.length > 0) {
        extents.push({ ...segment, blocks: trusted.length });
      }

      if (trusted.length < lines.length) {
        this._logger?.warn(
          { file: segment.name, dropped: lines.length - trusted.length },
          "Dropping segment lines not covered by metadata height",
        );
        if (trusted.length === 0) {
          unlinkSync(path);
        } else {
          replaceAndSync(path, toLines(trusted));
        }
      }
    }

    if (blocks.length < expected) {
      throw new StoreError(
        "CORRUPT_OR_MISSING_STORE",
        `metadata height needs ${expected} segment blocks, found ${blocks.length}`,
      );
    }
    this._assertSegmentLayout(extents, metadata);
    return blocks;
  }

  /**
   * Segments must be data-0..data-K with every one but the last holding
   * exactly `threshold` blocks, and metadata must point at data-K.
   */
  private _assertSegmentLayout(extents: readonly SegmentExtent[], metadata: StoreMetadata): void {
    extents.forEach((extent, position) => {
      const last = position === extents.length - 1;
      const fits = last ? extent.blocks <= this._threshold : extent.blocks === this._threshold;
      if (extent.index !== position || !fits) {
        throw new StoreError(
          "SEGMENT_THRESHOLD_MISMATCH",
          `${extent.name} holds ${extent.blocks} blocks at position ${position}; not a layout for segment threshold ${this._threshold}`,
          { file: extent.name },
        );
      }
    });

    const count = metadata.segmentRecordCount;
    const current = count === 0 ? 0 : Math.floor((count - 1) / this._threshold);
    if (metadata.currentSegmentIndex !== current) {
      throw new StoreError(
        "SEGMENT_THRESHOLD_MISMATCH",
        `metadata names segment ${metadata.currentSegmentIndex} as current; segment threshold ${this._threshold} puts block ${count} in segment ${current}`,
        { file: METADATA_FILE },
      );
    }
  }

  /** Segment files sorted by numeric index (data-2 before data-10). */
  private _segmentFiles(): SegmentFile[] {
    if (!existsSync(this._directory)) return [];
    const segments: SegmentFile[] = [];
    for (const name of readdirSync(this._directory)) {
      const match = SEGMENT_NAME.exec(name);
      if (match?.[1] !== undefined) {
        segments.push({ index: Number(match[1]), name });
      }
    }
    return segments.sort((a, b) => a.index - b.index);
  }
}
