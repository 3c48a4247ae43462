/**
 * Runtime Type Guards
 *
 * Narrowing functions for flatchain records.
 * Used wherever data crosses the disk boundary (every line read back
 * from the store passes through one of these).
 */

import type { AccountRecord, TransferIntent } from "./account.js";
import type { Block, StoreMetadata } from "./chain.js";

const HASH_PATTERN = /^[0-9a-f]{64}$/;

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

export function isHash(value: unknown): value is string {
  return typeof value === "string" && HASH_PATTERN.test(value);
}

// =============================================================================
// Account guards
// =============================================================================

export function isAccountRecord(value: unknown): value is AccountRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.name === "string" &&
    v.name.length > 0 &&
    isNonNegativeInteger(v.balance) &&
    typeof v.signingKey === "string" &&
    typeof v.verifyingKey === "string"
  );
}

export function isTransferIntent(value: unknown): value is TransferIntent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.source === "string" &&
    v.source.length > 0 &&
    typeof v.dest === "string" &&
    v.dest.length > 0 &&
    isNonNegativeInteger(v.amount) &&
    v.amount > 0
  );
}

// =============================================================================
// Chain guards
// =============================================================================

export function isBlock(value: unknown): value is Block {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isNonNegativeInteger(v.height) &&
    isNonNegativeInteger(v.timestamp) &&
    isNonNegativeInteger(v.difficultyBits) &&
    isNonNegativeInteger(v.nonce) &&
    typeof v.miner === "string" &&
    Array.isArray(v.transactions) &&
    v.transactions.every((tx) => typeof tx === "string") &&
    isHash(v.prevHash) &&
    isHash(v.hash) &&
    isHash(v.merkleRoot)
  );
}

export function isStoreMetadata(value: unknown): value is StoreMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isNonNegativeInteger(v.difficultyBits) &&
    isNonNegativeInteger(v.subsidy) &&
    isNonNegativeInteger(v.height) &&
    isNonNegativeInteger(v.segmentRecordCount) &&
    isNonNegativeInteger(v.currentSegmentIndex)
  );
}
