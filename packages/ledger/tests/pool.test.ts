/**
 * Tests for LedgerPool.
 *
 * Covers:
 * - Enqueue validation (amount, unknown accounts, available balance)
 * - Settlement: block contents, linkage, balance movement, coinbase
 * - Settlement-time balance checks (nothing changes on failure)
 * - Journal ordering and failures before/after commit
 * - Restore from replayed intents
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { Block, TransferIntent } from "@flatchain/types";
import { ChainStore, ProofOfWorkSealer, decodeSignedMessage } from "@flatchain/chain";
import { IdentityError, IdentityVault } from "@flatchain/identity";
import type { Account } from "@flatchain/identity";
import { LedgerPool } from "../src/pool.js";
import { LedgerError } from "../src/types.js";
import type { LedgerJournal } from "../src/types.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const SUBSIDY = 50;

interface Fixture {
  readonly vault: IdentityVault;
  readonly chain: ChainStore;
  readonly genesis: Block;
}

function makeFixture(): Fixture {
  const vault = new IdentityVault();
  vault.createAccount("A");
  vault.createAccount("B");
  vault.createAccount("C");

  let now = 1_700_000_000_000;
  const chain = new ChainStore({
    sealer: new ProofOfWorkSealer(),
    signer: vault,
    difficultyBits: 4,
    clock: () => now++,
  });
  const genesis = chain.genesis("A");
  vault.credit("A", 100);
  return { vault, chain, genesis };
}

type JournalCall =
  | { readonly kind: "pending"; readonly intents: readonly TransferIntent[] }
  | { readonly kind: "block"; readonly height: number }
  | { readonly kind: "accounts"; readonly count: number };

class RecordingJournal implements LedgerJournal {
  readonly calls: JournalCall[] = [];
  failOn: JournalCall["kind"] | undefined;

  recordPending(intents: readonly TransferIntent[]): void {
    this._maybeFail("pending");
    this.calls.push({ kind: "pending", intents });
  }

  recordBlock(block: Block): void {
    this._maybeFail("block");
    this.calls.push({ kind: "block", height: block.height });
  }

  recordAccounts(accounts: readonly Account[]): void {
    this._maybeFail("accounts");
    this.calls.push({ kind: "accounts", count: accounts.length });
  }

  private _maybeFail(kind: JournalCall["kind"]): void {
    if (this.failOn === kind) throw new Error(`disk full (${kind})`);
  }
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return expect.unreachable("should have thrown");
}

function expectLedgerError(fn: () => unknown, code: LedgerError["code"]): LedgerError {
  const err = catchError(fn);
  expect(err).toBeInstanceOf(LedgerError);
  if (!(err instanceof LedgerError)) throw err;
  expect(err.code).toBe(code);
  return err;
}

function expectIdentityError(fn: () => unknown, code: IdentityError["code"]): void {
  const err = catchError(fn);
  expect(err).toBeInstanceOf(IdentityError);
  if (!(err instanceof IdentityError)) throw err;
  expect(err.code).toBe(code);
}

let vault: IdentityVault;
let chain: ChainStore;
let genesis: Block;
let journal: RecordingJournal;
let pool: LedgerPool;

beforeEach(() => {
  ({ vault, chain, genesis } = makeFixture());
  journal = new RecordingJournal();
  pool = new LedgerPool({ vault, chain, subsidy: SUBSIDY, journal });
});

// ─── Enqueue ─────────────────────────────────────────────────────────────

describe("addTransaction", () => {
  it("signs and queues a valid transfer", () => {
    const transfer = pool.addTransaction("A", "B", 30);

    expect(transfer.payload).toBe("from: A -- to: B -- amount: 30");
    expect(() => vault.verify("A", transfer.payload, transfer.signature)).not.toThrow();
    expect(pool.pendingCount()).toBe(1);
    expect(pool.pendingIntents()).toEqual([{ source: "A", dest: "B", amount: 30 }]);
    expect(vault.balanceOf("A")).toBe(100);
  });

  it("counts queued outflows against the source", () => {
    pool.addTransaction("A", "B", 30);
    expect(pool.availableBalance("A")).toBe(70);

    const err = expectLedgerError(() => pool.addTransaction("A", "B", 80), "INSUFFICIENT_BALANCE");
    expect(err.phase).toBe("enqueue");
    expect(pool.pendingCount()).toBe(1);
  });

  it("admits a transfer that uses exactly the available balance", () => {
    pool.addTransaction("A", "B", 30);
    pool.addTransaction("A", "C", 70);
    expect(pool.availableBalance("A")).toBe(0);
    expect(pool.pendingCount()).toBe(2);
  });

  it("does not count queued inflows as available", () => {
    pool.addTransaction("A", "B", 30);
    expectLedgerError(() => pool.addTransaction("B", "C", 10), "INSUFFICIENT_BALANCE");
  });

  it.each([0, -5, 1.5, Number.NaN])("rejects amount %s", (amount) => {
    expectLedgerError(() => pool.addTransaction("A", "B", amount), "INVALID_AMOUNT");
    expect(pool.pendingCount()).toBe(0);
  });

  it("rejects unknown source or destination", () => {
    expectIdentityError(() => pool.addTransaction("Z", "B", 1), "UNKNOWN_ACCOUNT");
    expectIdentityError(() => pool.addTransaction("A", "Z", 1), "UNKNOWN_ACCOUNT");
    expect(pool.pendingCount()).toBe(0);
  });

  it("journals the full pending list after each enqueue", () => {
    pool.addTransaction("A", "B", 30);
    pool.addTransaction("A", "C", 5);

    expect(journal.calls).toEqual([
      { kind: "pending", intents: [{ source: "A", dest: "B", amount: 30 }] },
      {
        kind: "pending",
        intents: [
          { source: "A", dest: "B", amount: 30 },
          { source: "A", dest: "C", amount: 5 },
        ],
      },
    ]);
  });

  it("leaves the pool untouched when the journal fails", () => {
    journal.failOn = "pending";
    expect(() => pool.addTransaction("A", "B", 30)).toThrow("disk full (pending)");
    expect(pool.pendingCount()).toBe(0);
  });

  it("verifyPending accepts every queued signature", () => {
    pool.addTransaction("A", "B", 30);
    pool.addTransaction("A", "C", 20);
    expect(() => pool.verifyPending()).not.toThrow();
  });
});

// ─── Settlement ──────────────────────────────────────────────────────────

describe("settle", () => {
  it("seals pending transfers and the coinbase into the next block", () => {
    pool.addTransaction("A", "B", 30);
    expectLedgerError(() => pool.addTransaction("A", "B", 80), "INSUFFICIENT_BALANCE");

    const block = pool.settle("A");

    expect(block.height).toBe(1);
    expect(block.prevHash).toBe(genesis.hash);
    expect(block.miner).toBe("A");
    expect(block.transactions).toHaveLength(2);
    expect(decodeSignedMessage(block.transactions[0] ?? "").payload).toBe(
      "from: A -- to: B -- amount: 30",
    );
    expect(decodeSignedMessage(block.transactions[1] ?? "").payload).toBe("Reward $50 to A");
    expect(chain.tip()).toEqual(block);

    expect(vault.balanceOf("A")).toBe(120);
    expect(vault.balanceOf("B")).toBe(30);
    expect(pool.pendingCount()).toBe(0);
  });

  it("signs every transaction in the block with its account's key", () => {
    pool.addTransaction("A", "B", 30);
    const block = pool.settle("C");

    const [transfer, coinbase] = block.transactions.map((tx) => decodeSignedMessage(tx));
    if (transfer === undefined || coinbase === undefined) throw new Error("missing transactions");
    expect(() => vault.verify("A", transfer.payload, transfer.signature)).not.toThrow();
    expect(() => vault.verify("C", coinbase.payload, coinbase.signature)).not.toThrow();
    expect(() => vault.verify("A", coinbase.payload, coinbase.signature)).toThrow(IdentityError);
  });

  it("grows total supply by exactly the subsidy", () => {
    pool.addTransaction("A", "B", 40);
    pool.addTransaction("A", "C", 10);
    const before = vault.totalBalance();

    pool.settle("B");

    expect(vault.totalBalance()).toBe(before + SUBSIDY);
    expect(vault.balanceOf("A")).toBe(50);
    expect(vault.balanceOf("B")).toBe(90);
    expect(vault.balanceOf("C")).toBe(10);
  });

  it("seals a coinbase-only block when nothing is pending", () => {
    const block = pool.settle("B");
    expect(block.transactions).toHaveLength(1);
    expect(vault.balanceOf("B")).toBe(SUBSIDY);
  });

  it("rejects an unknown miner before sealing", () => {
    pool.addTransaction("A", "B", 30);
    expectIdentityError(() => pool.settle("Z"), "UNKNOWN_ACCOUNT");
    expect(chain.length).toBe(1);
    expect(pool.pendingCount()).toBe(1);
  });

  it("re-checks balances at settlement and changes nothing on failure", () => {
    pool.addTransaction("A", "B", 60);
    vault.debit("A", 50);

    const err = expectLedgerError(() => pool.settle("B"), "INSUFFICIENT_BALANCE");

    expect(err.phase).toBe("settlement");
    expect(chain.length).toBe(1);
    expect(pool.pendingCount()).toBe(1);
    expect(vault.balanceOf("A")).toBe(50);
    expect(vault.balanceOf("B")).toBe(0);
    expect(journal.calls.filter((c) => c.kind !== "pending")).toEqual([]);
  });

  it("counts the miner's subsidy before checking its own transfers", () => {
    pool.addTransaction("A", "B", 100);
    vault.debit("A", 30);

    expectLedgerError(() => pool.settle("B"), "INSUFFICIENT_BALANCE");
    pool.settle("A");

    expect(vault.balanceOf("A")).toBe(20);
    expect(vault.balanceOf("B")).toBe(100);
  });

  it("applies transfers in order so earlier inflows fund later outflows", () => {
    // B holds nothing yet; restore skips the enqueue-time check.
    pool.restore([
      { source: "A", dest: "B", amount: 100 },
      { source: "B", dest: "C", amount: 40 },
    ]);

    pool.settle("C");

    expect(vault.balanceOf("A")).toBe(0);
    expect(vault.balanceOf("B")).toBe(60);
    expect(vault.balanceOf("C")).toBe(40 + SUBSIDY);
  });

  it("journals block, accounts and empty pending in that order", () => {
    pool.addTransaction("A", "B", 30);
    journal.calls.length = 0;

    pool.settle("A");

    expect(journal.calls).toEqual([
      { kind: "block", height: 1 },
      { kind: "accounts", count: 3 },
      { kind: "pending", intents: [] },
    ]);
  });

  it("changes nothing when the block cannot be journaled", () => {
    pool.addTransaction("A", "B", 30);
    journal.failOn = "block";

    expect(() => pool.settle("A")).toThrow("disk full (block)");
    expect(chain.length).toBe(1);
    expect(pool.pendingCount()).toBe(1);
    expect(vault.balanceOf("A")).toBe(100);
  });

  it("reports SETTLEMENT_INCONSISTENCY when a post-commit write fails", () => {
    pool.addTransaction("A", "B", 30);
    journal.failOn = "accounts";

    const err = expectLedgerError(() => pool.settle("A"), "SETTLEMENT_INCONSISTENCY");

    expect(err.block).toEqual(chain.tip());
    expect(err.block?.height).toBe(1);
    expect(err.cause).toBeInstanceOf(Error);
    expect(vault.balanceOf("A")).toBe(120);
    expect(vault.balanceOf("B")).toBe(30);
    expect(pool.pendingCount()).toBe(0);
  });

  it("links consecutive settlements", () => {
    pool.addTransaction("A", "B", 10);
    const first = pool.settle("A");
    pool.addTransaction("B", "C", 5);
    const second = pool.settle("B");

    expect(second.prevHash).toBe(first.hash);
    expect(chain.verifyChain().valid).toBe(true);
  });
});

// ─── Restore ─────────────────────────────────────────────────────────────

describe("restore", () => {
  it("re-signs replayed intents", () => {
    pool.restore([
      { source: "A", dest: "B", amount: 10 },
      { source: "A", dest: "C", amount: 20 },
    ]);

    expect(pool.pendingCount()).toBe(2);
    expect(pool.pending()[1]?.payload).toBe("from: A -- to: C -- amount: 20");
    expect(() => pool.verifyPending()).not.toThrow();
    expect(journal.calls).toHaveLength(1);
  });

  it("refuses to restore into a non-empty pool", () => {
    pool.addTransaction("A", "B", 10);
    expectLedgerError(() => pool.restore([{ source: "A", dest: "C", amount: 1 }]), "POOL_NOT_EMPTY");
    expect(pool.pendingCount()).toBe(1);
  });

  it("rejects invalid replayed intents without partial state", () => {
    expectLedgerError(
      () =>
        pool.restore([
          { source: "A", dest: "B", amount: 10 },
          { source: "A", dest: "B", amount: 0 },
        ]),
      "INVALID_AMOUNT",
    );
    expectIdentityError(() => pool.restore([{ source: "Q", dest: "B", amount: 1 }]), "UNKNOWN_ACCOUNT");
    expect(pool.pendingCount()).toBe(0);
  });
});
