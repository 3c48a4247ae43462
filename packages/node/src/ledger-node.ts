/**
 * @flatchain/node — LedgerNode.
 *
 * Wires the four components together over one store directory:
 *
 *   IdentityVault  accounts, keys, balances
 *   ChainStore     sealed blocks
 *   LedgerPool     pending transfers and settlement
 *   PersistenceLayer  flat files, journaled through StoreJournal
 *
 * Every mutation is written through to disk before it returns. open()
 * rebuilds in-memory state from the store; a directory without a store
 * waits for initialize().
 */

import type { Logger } from "pino";
import type { Block, TransferIntent } from "@flatchain/types";
import type { BlockSealer, ChainIntegrityResult } from "@flatchain/chain";
import { ChainStore, ProofOfWorkSealer } from "@flatchain/chain";
import type { Account } from "@flatchain/identity";
import { IdentityError, IdentityVault, toAccountRecord } from "@flatchain/identity";
import type { LedgerJournal, PendingTransfer } from "@flatchain/ledger";
import { LedgerError, LedgerPool } from "@flatchain/ledger";
import type { StoreParams, StoreSnapshot } from "@flatchain/store";
import { ADDRESS_FILE, PersistenceLayer, StoreError, TRANSACTIONS_FILE } from "@flatchain/store";
import type { AppConfig } from "./config.js";
import { createLogger } from "./logger.js";

// =============================================================================
// Types
// =============================================================================

export interface LedgerNodeOptions {
  readonly config: AppConfig;

  /** Defaults to createLogger(config) */
  readonly logger?: Logger | undefined;

  /** Defaults to ProofOfWorkSealer */
  readonly sealer?: BlockSealer | undefined;

  /** Block timestamp source, ms since epoch */
  readonly clock?: (() => number) | undefined;
}

// =============================================================================
// Journal
// =============================================================================

/**
 * Routes pool side effects to the flat-file store.
 */
export class StoreJournal implements LedgerJournal {
  constructor(private readonly store: PersistenceLayer) {}

  recordPending(intents: readonly TransferIntent[]): void {
    this.store.writePending(intents);
  }

  recordBlock(block: Block): void {
    this.store.appendBlock(block);
  }

  recordAccounts(accounts: readonly Account[]): void {
    this.store.rewriteAccounts(accounts.map(toAccountRecord));
  }
}

// =============================================================================
// LedgerNode
// =============================================================================

export class LedgerNode {
  private _initialized: boolean;

  private constructor(
    private readonly _store: PersistenceLayer,
    private readonly _vault: IdentityVault,
    private readonly _chain: ChainStore,
    private readonly _pool: LedgerPool,
    private readonly _params: StoreParams,
    private readonly _logger: Logger,
  ) {
    this._initialized = false;
  }

  /**
   * Open the store at `config.FLATCHAIN_DATA_DIR`.
   *
   * An existing store is loaded and its chain parameters win over the
   * configured ones. The pending log on disk is only replaced once every
   * account, block and replayed transfer is back in memory.
   */
  static open(options: LedgerNodeOptions): LedgerNode {
    const { config } = options;
    const logger = options.logger ?? createLogger(config);

    const store = new PersistenceLayer({
      directory: config.FLATCHAIN_DATA_DIR,
      segmentThreshold: config.FLATCHAIN_SEGMENT_THRESHOLD,
      logger,
    });
    const snapshot = store.load();

    const params: StoreParams = snapshot?.metadata ?? {
      difficultyBits: config.FLATCHAIN_DIFFICULTY_BITS,
      subsidy: config.FLATCHAIN_SUBSIDY,
    };

    const vault = new IdentityVault();
    const chain = new ChainStore({
      sealer: options.sealer ?? new ProofOfWorkSealer(),
      signer: vault,
      difficultyBits: params.difficultyBits,
      clock: options.clock,
    });
    const pool = new LedgerPool({
      vault,
      chain,
      subsidy: params.subsidy,
      journal: new StoreJournal(store),
    });

    const node = new LedgerNode(
      store,
      vault,
      chain,
      pool,
      { difficultyBits: params.difficultyBits, subsidy: params.subsidy },
      logger,
    );

    if (snapshot === null) {
      logger.info({ dataDir: config.FLATCHAIN_DATA_DIR }, "No store found; waiting for initialize()");
    } else {
      if (
        snapshot.metadata.difficultyBits !== config.FLATCHAIN_DIFFICULTY_BITS ||
        snapshot.metadata.subsidy !== config.FLATCHAIN_SUBSIDY
      ) {
        logger.warn(
          {
            stored: params,
            configured: {
              difficultyBits: config.FLATCHAIN_DIFFICULTY_BITS,
              subsidy: config.FLATCHAIN_SUBSIDY,
            },
          },
          "Using chain parameters from the existing store",
        );
      }
      node._restore(snapshot);
    }

    return node;
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────

  /**
   * Create the store: the miner's account, the genesis block and the
   * miner's first subsidy.
   */
  initialize(minerName: string): Block {
    if (this._initialized || this._store.exists()) {
      throw new StoreError(
        "ALREADY_INITIALIZED",
        `A store already exists in ${this._store.directory}`,
      );
    }

    this._vault.createAccount(minerName);
    const genesis = this._chain.genesis(minerName);
    this._vault.credit(minerName, this._params.subsidy);

    this._store.initialize(this._params, genesis, this._vault.accounts().map(toAccountRecord));
    this._initialized = true;

    this._logger.info(
      { miner: minerName, hash: genesis.hash, difficultyBits: this._params.difficultyBits },
      "Store initialized",
    );
    return genesis;
  }

  get isInitialized(): boolean {
    return this._initialized;
  }

  get params(): StoreParams {
    return this._params;
  }

  // ─── Operations ─────────────────────────────────────────────────────

  createAccount(name: string): Account {
    this._requireInitialized();
    const account = this._vault.createAccount(name);
    this._store.appendAccount(toAccountRecord(account));
    this._logger.debug({ name, address: account.address }, "Account created");
    return account;
  }

  addTransaction(source: string, dest: string, amount: number): PendingTransfer {
    this._requireInitialized();
    return this._pool.addTransaction(source, dest, amount);
  }

  settle(minerName: string): Block {
    this._requireInitialized();

    let block: Block;
    try {
      block = this._pool.settle(minerName);
    } catch (err) {
      if (err instanceof LedgerError && err.code === "SETTLEMENT_INCONSISTENCY") {
        this._logger.error(
          { err, height: err.block?.height },
          "Block committed but balances not persisted; call persistAll()",
        );
      }
      throw err;
    }

    this._logger.info(
      { height: block.height, hash: block.hash, miner: minerName, transactions: block.transactions.length },
      "Block settled",
    );
    return block;
  }

  /**
   * Rewrite the whole store from memory. Recovers the files after a
   * SETTLEMENT_INCONSISTENCY.
   */
  persistAll(): void {
    this._requireInitialized();
    this._store.persistAll({
      ...this._params,
      accounts: this._vault.accounts().map(toAccountRecord),
      pending: this._pool.pendingIntents(),
      blocks: this._chain.blocks(),
    });
    this._logger.info({ height: this._chain.length }, "Store rewritten from memory");
  }

  // ─── Queries ────────────────────────────────────────────────────────

  balanceOf(name: string): number {
    return this._vault.balanceOf(name);
  }

  getAccount(name: string): Account | undefined {
    return this._vault.getAccount(name);
  }

  getAccountByAddress(address: string): Account | undefined {
    return this._vault.getAccountByAddress(address);
  }

  accounts(): readonly Account[] {
    return this._vault.accounts();
  }

  chain(): readonly Block[] {
    return this._chain.blocks();
  }

  pendingIntents(): readonly TransferIntent[] {
    return this._pool.pendingIntents();
  }

  verifyChain(): ChainIntegrityResult {
    return this._chain.verifyChain();
  }

  verifyPending(): void {
    this._pool.verifyPending();
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /**
   * Rebuild memory from a loaded snapshot. Records the store accepted but
   * the vault or pool reject are reported as store corruption; the pool
   * validates every replayed intent before it rewrites the pending log.
   */
  private _restore(snapshot: StoreSnapshot): void {
    snapshot.accounts.forEach((record, i) => {
      try {
        this._vault.restore(record);
      } catch (err) {
        if (!(err instanceof IdentityError)) throw err;
        throw new StoreError(
          "CORRUPT_OR_MISSING_STORE",
          `${ADDRESS_FILE} line ${i + 1}: ${err.message}`,
          { file: ADDRESS_FILE, line: i + 1, cause: err },
        );
      }
    });
    this._chain.restore(snapshot.blocks);

    try {
      this._pool.restore(snapshot.pending);
    } catch (err) {
      const rejected =
        err instanceof IdentityError || (err instanceof LedgerError && err.code === "INVALID_AMOUNT");
      if (!rejected) throw err;
      throw new StoreError(
        "CORRUPT_OR_MISSING_STORE",
        `${TRANSACTIONS_FILE}: ${err.message}`,
        { file: TRANSACTIONS_FILE, cause: err },
      );
    }
    this._initialized = true;

    this._logger.info(
      {
        height: snapshot.metadata.height,
        accounts: snapshot.accounts.length,
        pending: snapshot.pending.length,
      },
      "Store loaded",
    );
  }

  private _requireInitialized(): void {
    if (!this._initialized) {
      throw new StoreError("NOT_INITIALIZED", "Ledger is not initialized; call initialize() first");
    }
  }
}
