/**
 * @streamledger/ledger - Value custody seam.
 *
 * The ledger never moves value itself. On withdrawal it asks the host's
 * custody to pay the recipient and treats a refusal as a hard abort.
 *
 * InMemoryCustody is a sandbox book of account balances plus a pool of
 * value held on behalf of open streams.
 */

import type { AccountId } from "@streamledger/types";
import { MAX_AMOUNT, assertAmountInRange } from "./amount.js";

export type TransferResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly reason: string };

export interface ValueCustody {
  /** Pay `amount` out of custody to `to`. */
  transfer(to: AccountId, amount: bigint): TransferResult;
}

export interface InMemoryCustodyOptions {
  /** Value already in the pool, e.g. backing streams restored from disk. */
  readonly held?: bigint | undefined;
}

/**
 * In-process custody book.
 *
 * - deposit() credits an account from outside the system
 * - collect() moves value from an account into the custody pool
 * - transfer() pays value out of the pool to an account
 *
 * Balances and the pool never exceed MAX_AMOUNT.
 */
export class InMemoryCustody implements ValueCustody {
  private readonly _balances = new Map<AccountId, bigint>();
  private _held: bigint;

  constructor(options?: InMemoryCustodyOptions) {
    const held = options?.held ?? 0n;
    if (held < 0n || held > MAX_AMOUNT) {
      throw new RangeError(`Initial pool must lie within [0, ${MAX_AMOUNT.toString()}], got ${held.toString()}`);
    }
    this._held = held;
  }

  deposit(account: AccountId, amount: bigint): bigint {
    if (amount <= 0n) {
      throw new RangeError(`Deposit must be positive, got ${amount.toString()}`);
    }
    const next = this.balanceOf(account) + amount;
    assertAmountInRange(next);
    this._balances.set(account, next);
    return next;
  }

  collect(from: AccountId, amount: bigint): TransferResult {
    if (amount < 0n) {
      return { ok: false, reason: "Amount must not be negative" };
    }
    const balance = this.balanceOf(from);
    if (balance < amount) {
      return {
        ok: false,
        reason: `Account "${from}" holds ${balance.toString()}, needs ${amount.toString()}`,
      };
    }
    if (this._held + amount > MAX_AMOUNT) {
      return {
        ok: false,
        reason: `Custody holds ${this._held.toString()}, cannot take ${amount.toString()} more`,
      };
    }
    this._balances.set(from, balance - amount);
    this._held += amount;
    return { ok: true };
  }

  transfer(to: AccountId, amount: bigint): TransferResult {
    if (amount < 0n) {
      return { ok: false, reason: "Amount must not be negative" };
    }
    if (this._held < amount) {
      return {
        ok: false,
        reason: `Custody holds ${this._held.toString()}, cannot pay ${amount.toString()}`,
      };
    }
    const credited = this.balanceOf(to) + amount;
    if (credited > MAX_AMOUNT) {
      return {
        ok: false,
        reason: `Account "${to}" holds ${this.balanceOf(to).toString()}, cannot receive ${amount.toString()} more`,
      };
    }
    this._held -= amount;
    this._balances.set(to, credited);
    return { ok: true };
  }

  balanceOf(account: AccountId): bigint {
    return this._balances.get(account) ?? 0n;
  }

  /** Value currently held on behalf of streams. */
  get held(): bigint {
    return this._held;
  }
}
