/**
 * @termvault/multivault — Base-asset ledger.
 *
 * Balances of the single base asset, keyed by canonical address, plus
 * the amount held in custody by the engine (vault assets, unsettled
 * fees and dust). Writes go
 * through the journal, so asset movements roll back with the call
 * that made them.
 */

import { canonicalAddress } from "@termvault/types";
import type { Address } from "@termvault/types";
import type { Journal } from "./journal.js";
import { JournaledCell, JournaledMap } from "./journal.js";
import { MultiVaultError } from "./types.js";

export class AssetLedger {
  private readonly balances: JournaledMap<Address, bigint>;
  private readonly custody: JournaledCell<bigint>;

  constructor(journal: Journal) {
    this.balances = new JournaledMap(journal);
    this.custody = new JournaledCell(journal, 0n);
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(canonicalAddress(account)) ?? 0n;
  }

  /** Assets held by the engine. */
  held(): bigint {
    return this.custody.get();
  }

  /** Issue new base assets to `to`. */
  mint(to: Address, amount: bigint): void {
    this.credit(to, amount);
  }

  /** Move `amount` from `from` into custody. */
  pull(from: Address, amount: bigint): void {
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new MultiVaultError(
        "INSUFFICIENT_ASSETS",
        `Account ${from} holds ${balance.toString()} assets, needs ${amount.toString()}`,
      );
    }
    this.balances.set(canonicalAddress(from), balance - amount);
    this.custody.set(this.custody.get() + amount);
  }

  /** Move `amount` out of custody to `to`. */
  pay(to: Address, amount: bigint): void {
    const held = this.custody.get();
    if (held < amount) {
      throw new MultiVaultError(
        "INSUFFICIENT_ASSETS",
        `Custody holds ${held.toString()} assets, cannot pay ${amount.toString()}`,
      );
    }
    this.custody.set(held - amount);
    this.credit(to, amount);
  }

  private credit(to: Address, amount: bigint): void {
    this.balances.set(canonicalAddress(to), this.balanceOf(to) + amount);
  }
}
