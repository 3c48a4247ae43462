/**
 * @flatchain/ledger — Types for the pending pool and settlement.
 *
 * Rules:
 * - One record per pending transfer: the signed payload and the
 *   transfer intent travel together and cannot drift apart
 * - Amounts are positive integers
 * - Fail-closed: invalid transfers throw, never silently succeed
 */

import type { Block, TransferIntent } from "@flatchain/types";
import type { Account } from "@flatchain/identity";

// ─── Pool Types ──────────────────────────────────────────────────────────

/**
 * A signed, not yet settled transfer.
 */
export interface PendingTransfer extends TransferIntent {
  /** Canonical text that was signed */
  readonly payload: string;

  /** Source account's signature over `payload` */
  readonly signature: Uint8Array;
}

/**
 * Durable side effects of pool operations.
 *
 * The pool calls these at fixed points; an implementation writes them
 * to storage. Every method must either complete durably or throw.
 */
export interface LedgerJournal {
  /** Full replacement of the pending-transfer log */
  recordPending(intents: readonly TransferIntent[]): void;

  /** A sealed block, before it is committed to the in-memory chain */
  recordBlock(block: Block): void;

  /** Full replacement of the account set after balances changed */
  recordAccounts(accounts: readonly Account[]): void;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for pool and settlement operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INSUFFICIENT_BALANCE"
  | "SETTLEMENT_INCONSISTENCY"
  | "POOL_NOT_EMPTY";

/** Where a balance check failed. */
export type BalanceCheckPhase = "enqueue" | "settlement";

export interface LedgerErrorOptions {
  readonly phase?: BalanceCheckPhase | undefined;
  readonly block?: Block | undefined;
  readonly cause?: unknown;
}

/**
 * Structured error from the pool.
 *
 * SETTLEMENT_INCONSISTENCY carries the block that was already committed:
 * the block stays on the chain and durable, but the balance update that
 * should accompany it is not.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly phase: BalanceCheckPhase | undefined;
  public readonly block: Block | undefined;

  constructor(code: LedgerErrorCode, message: string, options?: LedgerErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "LedgerError";
    this.code = code;
    this.phase = options?.phase;
    this.block = options?.block;
  }
}
