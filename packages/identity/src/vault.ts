/**
 * @flatchain/identity — IdentityVault.
 *
 * Holds every account: its key pair, derived address and balance.
 *
 * API surface:
 * - createAccount() / restore(): Add an account (fresh keys / stored record)
 * - getAccount() / hasAccount() / accounts(): Lookups
 * - getAccountByAddress() / hasAddress(): Lookups by derived address
 * - hasSufficientBalance() / balanceOf(): Balance queries
 * - debit() / credit() / moveBalance(): Unchecked balance primitives
 * - sign() / verify(): Signatures with an account's keys
 * - verifyAddress(): Recompute an address from its verifying key
 *
 * Accounts are never removed. Balances change only through debit/credit;
 * callers validate sufficiency first. The vault itself does no I/O.
 */

import type { AccountRecord } from "@flatchain/types";
import { addressMatchesKey, deriveAddress } from "./address.js";
import { fromAccountRecord } from "./account-codec.js";
import { generateKeyPair, signPayload, verifyPayload } from "./keys.js";
import type { Account } from "./types.js";
import { IdentityError } from "./types.js";

/**
 * Characters that would break the text encodings names are embedded in:
 * the `|` separating payload from signature, and line breaks.
 */
const FORBIDDEN_NAME_CHARS = /[|\r\n]/;

interface VaultEntry {
  readonly name: string;
  balance: number;
  readonly signingKey: Uint8Array;
  readonly verifyingKey: Uint8Array;
  readonly address: string;
}

function snapshot(entry: VaultEntry): Account {
  return {
    name: entry.name,
    balance: entry.balance,
    signingKey: entry.signingKey,
    verifyingKey: entry.verifyingKey,
    address: entry.address,
  };
}

/**
 * In-memory registry of accounts keyed by name, indexed by address.
 */
export class IdentityVault {
  private readonly _accounts: Map<string, VaultEntry> = new Map();
  private readonly _addresses: Map<string, string> = new Map();

  // ─── Account Management ──────────────────────────────────────────────

  /**
   * Create an account with a fresh key pair and a zero balance.
   */
  createAccount(name: string): Account {
    this._assertValidName(name);
    this._assertAbsent(name);

    const keys = generateKeyPair();
    const entry: VaultEntry = {
      name,
      balance: 0,
      signingKey: keys.signingKey,
      verifyingKey: keys.verifyingKey,
      address: deriveAddress(keys.verifyingKey),
    };

    this._register(entry);
    return snapshot(entry);
  }

  /**
   * Re-register an account from its stored record (startup path).
   */
  restore(record: AccountRecord): Account {
    this._assertValidName(record.name);
    this._assertAbsent(record.name);

    const account = fromAccountRecord(record);
    const owner = this._addresses.get(account.address);
    if (owner !== undefined) {
      throw new IdentityError(
        "DUPLICATE_ACCOUNT",
        `Account "${record.name}" has the same address as "${owner}": ${account.address}`,
      );
    }
    this._register({ ...account });
    return account;
  }

  getAccount(name: string): Account | undefined {
    const entry = this._accounts.get(name);
    return entry === undefined ? undefined : snapshot(entry);
  }

  hasAccount(name: string): boolean {
    return this._accounts.has(name);
  }

  getAccountByAddress(address: string): Account | undefined {
    const name = this._addresses.get(address);
    return name === undefined ? undefined : this.getAccount(name);
  }

  hasAddress(address: string): boolean {
    return this._addresses.has(address);
  }

  /**
   * All accounts, in creation order.
   */
  accounts(): readonly Account[] {
    return [...this._accounts.values()].map(snapshot);
  }

  get size(): number {
    return this._accounts.size;
  }

  // ─── Balances ────────────────────────────────────────────────────────

  balanceOf(name: string): number {
    return this._require(name).balance;
  }

  hasSufficientBalance(name: string, amount: number): boolean {
    return this._require(name).balance >= amount;
  }

  /**
   * Sum of every account balance.
   */
  totalBalance(): number {
    let total = 0;
    for (const entry of this._accounts.values()) {
      total += entry.balance;
    }
    return total;
  }

  /** Unchecked: callers must have validated sufficiency. */
  debit(name: string, amount: number): void {
    this._require(name).balance -= amount;
  }

  credit(name: string, amount: number): void {
    this._require(name).balance += amount;
  }

  /**
   * Debit `source` and credit `dest` as one step.
   *
   * Both accounts are resolved before either balance changes, so the
   * credit cannot fail once the debit has been applied.
   */
  moveBalance(source: string, dest: string, amount: number): void {
    const from = this._require(source);
    const to = this._require(dest);
    from.balance -= amount;
    to.balance += amount;
  }

  // ─── Signatures ──────────────────────────────────────────────────────

  sign(name: string, payload: string): Uint8Array {
    return signPayload(this._require(name), payload);
  }

  /**
   * Verify a signature made with `name`'s key. Throws SIGNATURE_INVALID
   * on any mismatch.
   */
  verify(name: string, payload: string, signature: Uint8Array): void {
    const entry = this._require(name);
    if (!verifyPayload(entry.verifyingKey, payload, signature)) {
      throw new IdentityError(
        "SIGNATURE_INVALID",
        `Signature does not match payload for account "${name}"`,
      );
    }
  }

  // ─── Integrity ───────────────────────────────────────────────────────

  /**
   * Recompute the account's address from its verifying key and compare.
   */
  verifyAddress(account: Account): boolean {
    return addressMatchesKey(account.address, account.verifyingKey);
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _register(entry: VaultEntry): void {
    this._accounts.set(entry.name, entry);
    this._addresses.set(entry.address, entry.name);
  }

  private _require(name: string): VaultEntry {
    const entry = this._accounts.get(name);
    if (entry === undefined) {
      throw new IdentityError("UNKNOWN_ACCOUNT", `Unknown account: "${name}"`);
    }
    return entry;
  }

  private _assertAbsent(name: string): void {
    if (this._accounts.has(name)) {
      throw new IdentityError("DUPLICATE_ACCOUNT", `Account already exists: "${name}"`);
    }
  }

  private _assertValidName(name: string): void {
    if (name.length === 0 || FORBIDDEN_NAME_CHARS.test(name)) {
      throw new IdentityError(
        "INVALID_NAME",
        `Account name must be non-empty and free of "|" and line breaks: ${JSON.stringify(name)}`,
      );
    }
  }
}
