/**
 * @flatchain/store — Segmented flat-file persistence.
 *
 * Provides:
 * - PersistenceLayer: initialize, incremental appends, full rewrite, load
 * - Scoped, fsync'd writers; whole-file rewrites via temp file + rename
 * - Line encodings for account records, pending intents and metadata
 *
 * @packageDocumentation
 */

export { PersistenceLayer, segmentName } from "./persistence-layer.js";
export type { PersistenceLayerOptions } from "./persistence-layer.js";

export { encodeAccountRecord, encodeIntent, encodeMetadata, decodeLine } from "./records.js";

export type {
  StoreParams,
  StoreSnapshot,
  PersistedState,
  StoreErrorCode,
  StoreErrorOptions,
} from "./types.js";
export {
  StoreError,
  METADATA_FILE,
  ADDRESS_FILE,
  GENESIS_FILE,
  TRANSACTIONS_FILE,
  SEGMENT_PREFIX,
  DEFAULT_SEGMENT_THRESHOLD,
} from "./types.js";
