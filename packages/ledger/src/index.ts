/**
 * @flatchain/ledger — Pending transfers and settlement.
 *
 * Rules:
 * - A transfer is admitted only if its source can cover it after
 *   everything it already has queued
 * - Settlement seals every queued transfer plus a coinbase into one block
 * - A block is committed before balances move; the pool clears only
 *   after that
 * - Fail-closed: invalid transfers throw, never silently succeed
 */

// Pool
export { LedgerPool } from "./pool.js";
export type { LedgerPoolOptions } from "./pool.js";

// Payload text
export { transferPayload, coinbasePayload } from "./payload.js";

// Types
export type {
  PendingTransfer,
  LedgerJournal,
  LedgerErrorCode,
  LedgerErrorOptions,
  BalanceCheckPhase,
} from "./types.js";
export { LedgerError } from "./types.js";
