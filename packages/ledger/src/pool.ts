/**
 * @flatchain/ledger — LedgerPool.
 *
 * Pending signed transfers and the settlement protocol that turns them
 * into a block.
 *
 * API surface:
 * - addTransaction(): Validate, sign and queue a transfer
 * - settle(): Seal the queue (plus coinbase) into a block and apply it
 * - restore(): Re-queue transfers replayed from the pending log
 * - pending() / pendingIntents() / pendingCount(): Queries
 * - availableBalance(): Balance minus amounts already queued from it
 * - verifyPending(): Re-verify every queued signature
 *
 * Pool entries are never removed one by one. The whole queue is
 * dropped by a successful settlement and nothing else.
 */

import type { Block, TransferIntent } from "@flatchain/types";
import type { ChainStore } from "@flatchain/chain";
import { encodeSignedMessage } from "@flatchain/chain";
import type { IdentityVault } from "@flatchain/identity";
import { IdentityError } from "@flatchain/identity";
import { coinbasePayload, transferPayload } from "./payload.js";
import type { LedgerJournal, PendingTransfer } from "./types.js";
import { LedgerError } from "./types.js";

export interface LedgerPoolOptions {
  readonly vault: IdentityVault;
  readonly chain: ChainStore;
  /** Coinbase reward credited to the miner of each settled block */
  readonly subsidy: number;
  readonly journal?: LedgerJournal | undefined;
}

function toIntent(transfer: PendingTransfer): TransferIntent {
  return { source: transfer.source, dest: transfer.dest, amount: transfer.amount };
}

export class LedgerPool {
  private readonly _vault: IdentityVault;
  private readonly _chain: ChainStore;
  private readonly _subsidy: number;
  private readonly _journal: LedgerJournal | undefined;
  private _pending: readonly PendingTransfer[] = [];

  constructor(options: LedgerPoolOptions) {
    this._vault = options.vault;
    this._chain = options.chain;
    this._subsidy = options.subsidy;
    this._journal = options.journal;
  }

  // ─── Enqueue ─────────────────────────────────────────────────────────

  /**
   * Queue a signed transfer.
   *
   * Validation (all must pass, pool untouched otherwise):
   * 1. amount is a positive integer
   * 2. source and dest are registered
   * 3. source's balance minus its already-queued outflow covers amount
   */
  addTransaction(source: string, dest: string, amount: number): PendingTransfer {
    const intent: TransferIntent = { source, dest, amount };
    this._assertValidIntent(intent);

    const available = this.availableBalance(source);
    if (available < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `"${source}" has ${available} available (after pending transfers), needs ${amount}`,
        { phase: "enqueue" },
      );
    }

    const transfer = this._sign(intent);
    this._replacePending([...this._pending, transfer]);
    return transfer;
  }

  /**
   * Re-queue transfers replayed from the pending log on startup.
   *
   * Payloads are rebuilt from the intents and signed again with the
   * source's key: the log stores intents only. Balances are not checked
   * here; settle() validates them before sealing.
   */
  restore(intents: readonly TransferIntent[]): void {
    if (this._pending.length > 0) {
      throw new LedgerError("POOL_NOT_EMPTY", "Cannot restore into a non-empty pool");
    }
    for (const intent of intents) {
      this._assertValidIntent(intent);
    }
    this._replacePending(intents.map((intent) => this._sign(intent)));
  }

  // ─── Settlement ──────────────────────────────────────────────────────

  /**
   * Seal every pending transfer plus a coinbase into a new block.
   *
   * Phase 1 (nothing changes on failure):
   *   validate all intents, in order, against a balance snapshot that
   *   already includes the miner's subsidy; seal the block; journal it.
   * Phase 2 (after the block is committed):
   *   credit the miner, move balances, clear the pool, journal accounts
   *   and the now-empty pending log.
   *
   * A failure in phase 2 raises SETTLEMENT_INCONSISTENCY carrying the
   * committed block. In-memory state is complete at that point; the
   * durable account and pending files lag behind until the next full
   * persist.
   */
  settle(minerName: string): Block {
    this._assertAccountExists(minerName);
    this._assertSettleable(minerName);

    const reward = coinbasePayload(this._subsidy, minerName);
    const coinbase = encodeSignedMessage({
      payload: reward,
      signature: this._vault.sign(minerName, reward),
    });

    const transfers = this._pending;
    const transactions = [...transfers.map((t) => encodeSignedMessage(t)), coinbase];

    const block = this._chain.build(transactions, minerName);
    this._journal?.recordBlock(block);
    this._chain.commit(block);

    try {
      this._vault.credit(minerName, this._subsidy);
      for (const transfer of transfers) {
        this._vault.moveBalance(transfer.source, transfer.dest, transfer.amount);
      }
      this._pending = [];
      this._journal?.recordAccounts(this._vault.accounts());
      this._journal?.recordPending([]);
    } catch (err) {
      throw new LedgerError(
        "SETTLEMENT_INCONSISTENCY",
        `Block ${block.height} is committed but its balance update did not complete: ${
          err instanceof Error ? err.message : String(err)
        }`,
        { block, cause: err },
      );
    }

    return block;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  pendingCount(): number {
    return this._pending.length;
  }

  pending(): readonly PendingTransfer[] {
    return [...this._pending];
  }

  pendingIntents(): readonly TransferIntent[] {
    return this._pending.map(toIntent);
  }

  get subsidy(): number {
    return this._subsidy;
  }

  /**
   * Current balance minus everything already queued from this account.
   */
  availableBalance(name: string): number {
    let outflow = 0;
    for (const transfer of this._pending) {
      if (transfer.source === name) outflow += transfer.amount;
    }
    return this._vault.balanceOf(name) - outflow;
  }

  /**
   * Verify every queued signature. Throws SIGNATURE_INVALID on the
   * first mismatch.
   */
  verifyPending(): void {
    for (const transfer of this._pending) {
      this._vault.verify(transfer.source, transfer.payload, transfer.signature);
    }
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _sign(intent: TransferIntent): PendingTransfer {
    const payload = transferPayload(intent);
    return { ...intent, payload, signature: this._vault.sign(intent.source, payload) };
  }

  /**
   * Swap in a new queue only after the journal accepted it.
   */
  private _replacePending(next: readonly PendingTransfer[]): void {
    this._journal?.recordPending(next.map(toIntent));
    this._pending = next;
  }

  private _assertValidIntent(intent: TransferIntent): void {
    if (!Number.isSafeInteger(intent.amount) || intent.amount <= 0) {
      throw new LedgerError(
        "INVALID_AMOUNT",
        `Transfer amount must be a positive integer, got ${intent.amount}`,
      );
    }
    this._assertAccountExists(intent.source);
    this._assertAccountExists(intent.dest);
  }

  private _assertAccountExists(name: string): void {
    if (!this._vault.hasAccount(name)) {
      throw new IdentityError("UNKNOWN_ACCOUNT", `Unknown account: "${name}"`);
    }
  }

  /**
   * Replay the queue against a snapshot of current balances.
   */
  private _assertSettleable(minerName: string): void {
    const snapshot = new Map<string, number>();
    const balance = (name: string): number => snapshot.get(name) ?? this._vault.balanceOf(name);

    snapshot.set(minerName, balance(minerName) + this._subsidy);

    this._pending.forEach((transfer, index) => {
      const available = balance(transfer.source);
      if (available < transfer.amount) {
        throw new LedgerError(
          "INSUFFICIENT_BALANCE",
          `Pending transfer #${index} from "${transfer.source}" needs ${transfer.amount}, balance is ${available}`,
          { phase: "settlement" },
        );
      }
      snapshot.set(transfer.source, available - transfer.amount);
      snapshot.set(transfer.dest, balance(transfer.dest) + transfer.amount);
    });
  }
}
