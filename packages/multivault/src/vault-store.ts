/**
 * @termvault/multivault — Vault store.
 *
 * The per-(term, curve) ledger: total assets, total shares and every
 * account's share balance. Only three primitives write it (mint, burn
 * and setTotals), and each one raises the event that lets the log
 * rebuild the store.
 *
 * Invariant: for every vault, the balances sum to totalShares once the
 * caller has paired each mint/burn with its totals update.
 */

import { MULTIVAULT_EVENTS } from "@termvault/event-store";
import { ONE_SHARE, canonicalAddress } from "@termvault/types";
import type {
  Address,
  CurveId,
  CurveProvider,
  TermId,
  VaultTotals,
  VaultType,
} from "@termvault/types";
import type { EventRecorder } from "./events.js";
import { totalsPayload } from "./events.js";
import type { Journal } from "./journal.js";
import { JournaledMap } from "./journal.js";
import type { VaultSnapshot } from "./types.js";
import { MultiVaultError } from "./types.js";

interface VaultRecord extends VaultTotals {
  readonly termId: TermId;
  readonly curveId: CurveId;
}

interface ShareBalance {
  readonly termId: TermId;
  readonly curveId: CurveId;
  readonly account: Address;
  readonly amount: bigint;
}

export interface VaultStoreDeps {
  readonly journal: Journal;
  readonly curves: CurveProvider;
  readonly recorder: EventRecorder;
  readonly vaultTypeOf: (termId: TermId) => VaultType;
}

const EMPTY: VaultTotals = { totalAssets: 0n, totalShares: 0n };

function vaultKey(termId: TermId, curveId: CurveId): string {
  return `${termId}:${String(curveId)}`;
}

function balanceKey(account: Address, termId: TermId, curveId: CurveId): string {
  return `${vaultKey(termId, curveId)}:${canonicalAddress(account)}`;
}

export class VaultStore {
  private readonly vaults: JournaledMap<string, VaultRecord>;
  private readonly balances: JournaledMap<string, ShareBalance>;
  private readonly deps: VaultStoreDeps;

  constructor(deps: VaultStoreDeps) {
    this.deps = deps;
    this.vaults = new JournaledMap(deps.journal);
    this.balances = new JournaledMap(deps.journal);
  }

  // ─── Reads ──────────────────────────────────────────────────────────

  getTotals(termId: TermId, curveId: CurveId): VaultTotals {
    const record = this.vaults.get(vaultKey(termId, curveId));
    return record === undefined
      ? EMPTY
      : { totalAssets: record.totalAssets, totalShares: record.totalShares };
  }

  /** A vault is open once it holds shares (its ghost shares at least). */
  isOpen(termId: TermId, curveId: CurveId): boolean {
    return this.getTotals(termId, curveId).totalShares > 0n;
  }

  balanceOf(account: Address, termId: TermId, curveId: CurveId): bigint {
    return this.balances.get(balanceKey(account, termId, curveId))?.amount ?? 0n;
  }

  /**
   * Share price signal for the given totals:
   * - 0 for a vault without shares
   * - the value of one whole share once the vault holds at least one
   * - the curve's marginal price below that
   */
  sharePrice(curveId: CurveId, totals: VaultTotals): bigint {
    if (totals.totalShares === 0n) {
      return 0n;
    }
    if (totals.totalShares >= ONE_SHARE) {
      return this.deps.curves.convertToAssets(curveId, ONE_SHARE, totals);
    }
    return this.deps.curves.currentPrice(curveId, totals);
  }

  /** Every vault with its non-zero balances, ordered by term then curve. */
  snapshot(): VaultSnapshot[] {
    const holders = new Map<string, Map<Address, bigint>>();
    for (const [, balance] of this.balances.entries()) {
      if (balance.amount === 0n) continue;
      const key = vaultKey(balance.termId, balance.curveId);
      let map = holders.get(key);
      if (map === undefined) {
        map = new Map();
        holders.set(key, map);
      }
      map.set(balance.account, balance.amount);
    }

    return [...this.vaults.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, record]) => ({
        termId: record.termId,
        curveId: record.curveId,
        totalAssets: record.totalAssets,
        totalShares: record.totalShares,
        balances: holders.get(key) ?? new Map<Address, bigint>(),
      }));
  }

  // ─── Writes ─────────────────────────────────────────────────────────

  /** Credit shares. Callers pair this with a totals update. */
  mint(holder: Address, termId: TermId, curveId: CurveId, amount: bigint): void {
    if (amount === 0n) return;
    const account = canonicalAddress(holder);
    const key = balanceKey(account, termId, curveId);
    const current = this.balances.get(key)?.amount ?? 0n;
    this.balances.set(key, { termId, curveId, account, amount: current + amount });
    this.deps.recorder.emit(MULTIVAULT_EVENTS.SHARES_MINTED, {
      account,
      termId,
      curveId,
      amount: amount.toString(),
    });
  }

  /**
   * Debit shares.
   *
   * @throws MultiVaultError INSUFFICIENT_BALANCE if `amount` exceeds the balance
   */
  burn(holder: Address, termId: TermId, curveId: CurveId, amount: bigint): void {
    if (amount === 0n) return;
    const account = canonicalAddress(holder);
    const key = balanceKey(account, termId, curveId);
    const current = this.balances.get(key)?.amount ?? 0n;
    if (amount > current) {
      throw new MultiVaultError(
        "INSUFFICIENT_BALANCE",
        `Account ${account} holds ${current.toString()} shares, cannot burn ${amount.toString()}`,
      );
    }
    this.balances.set(key, { termId, curveId, account, amount: current - amount });
    this.deps.recorder.emit(MULTIVAULT_EVENTS.SHARES_BURNED, {
      account,
      termId,
      curveId,
      amount: amount.toString(),
    });
  }

  /**
   * Replace a vault's totals and return the resulting share price.
   */
  setTotals(termId: TermId, curveId: CurveId, totals: VaultTotals): bigint {
    const before = this.getTotals(termId, curveId);
    this.vaults.set(vaultKey(termId, curveId), {
      termId,
      curveId,
      totalAssets: totals.totalAssets,
      totalShares: totals.totalShares,
    });

    const sharePrice = this.sharePrice(curveId, totals);
    this.deps.recorder.emit(MULTIVAULT_EVENTS.TOTALS_CHANGED, {
      termId,
      curveId,
      vaultType: this.deps.vaultTypeOf(termId),
      before: totalsPayload(before),
      after: totalsPayload(totals),
      sharePrice: sharePrice.toString(),
    });
    return sharePrice;
  }
}
