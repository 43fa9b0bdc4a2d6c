/**
 * Curve Registry
 *
 * Maps integer curve ids to BondingCurve implementations and exposes
 * them through the CurveProvider capability the multivault consumes.
 *
 * Design rules:
 * - Curves are registered, not auto-discovered
 * - Ids are assigned sequentially from 1 and never reused
 * - Curve names are unique
 * - Lookups of unknown ids throw
 */

import type { CurveId, CurveProvider, VaultTotals } from "@termvault/types";
import type { BondingCurve } from "./types.js";
import { CurveError } from "./types.js";

export class CurveRegistry implements CurveProvider {
  private readonly curves: Map<CurveId, BondingCurve> = new Map();
  private readonly names: Set<string> = new Set();

  /**
   * Register a curve and return its id.
   * Throws if a curve with the same name is already registered.
   */
  register(curve: BondingCurve): CurveId {
    if (this.names.has(curve.name)) {
      throw new CurveError(
        "DUPLICATE_CURVE_NAME",
        `CurveRegistry: curve named '${curve.name}' is already registered`,
      );
    }
    const id = this.curves.size + 1;
    this.curves.set(id, curve);
    this.names.add(curve.name);
    return id;
  }

  /**
   * Get the curve for an id.
   * Throws if no curve is registered under it.
   */
  get(curveId: CurveId): BondingCurve {
    const curve = this.curves.get(curveId);
    if (!curve) {
      throw new CurveError(
        "CURVE_NOT_FOUND",
        `CurveRegistry: no curve registered for id ${String(curveId)}`,
      );
    }
    return curve;
  }

  getCurveName(curveId: CurveId): string {
    return this.get(curveId).name;
  }

  /**
   * List registered ids with their names.
   */
  list(): readonly { readonly id: CurveId; readonly name: string }[] {
    return [...this.curves.entries()].map(([id, curve]) => ({ id, name: curve.name }));
  }

  // ─── CurveProvider ─────────────────────────────────────────────────

  count(): number {
    return this.curves.size;
  }

  isCurveIdValid(curveId: CurveId): boolean {
    return this.curves.has(curveId);
  }

  previewDeposit(curveId: CurveId, assets: bigint, totals: VaultTotals): bigint {
    return this.get(curveId).previewDeposit(assets, totals);
  }

  previewRedeem(curveId: CurveId, shares: bigint, totals: VaultTotals): bigint {
    return this.get(curveId).previewRedeem(shares, totals);
  }

  previewMint(curveId: CurveId, shares: bigint, totals: VaultTotals): bigint {
    return this.get(curveId).previewMint(shares, totals);
  }

  previewWithdraw(curveId: CurveId, assets: bigint, totals: VaultTotals): bigint {
    return this.get(curveId).previewWithdraw(assets, totals);
  }

  convertToShares(curveId: CurveId, assets: bigint, totals: VaultTotals): bigint {
    return this.get(curveId).convertToShares(assets, totals);
  }

  convertToAssets(curveId: CurveId, shares: bigint, totals: VaultTotals): bigint {
    return this.get(curveId).convertToAssets(shares, totals);
  }

  currentPrice(curveId: CurveId, totals: VaultTotals): bigint {
    return this.get(curveId).currentPrice(totals);
  }

  getCurveMaxAssets(curveId: CurveId): bigint {
    return this.get(curveId).maxAssets;
  }
}
