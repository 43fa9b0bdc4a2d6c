/**
 * Vault routes.
 *
 * POST /api/v1/deposits                                          — Deposit into one vault
 * POST /api/v1/deposits/batch                                    — Deposit into several vaults
 * POST /api/v1/redemptions                                       — Redeem from one vault
 * POST /api/v1/redemptions/batch                                 — Redeem from several vaults
 * GET  /api/v1/curves                                            — Registered bonding curves
 * GET  /api/v1/terms/:termId/vaults/:curveId                     — Vault totals and share price
 * GET  /api/v1/terms/:termId/vaults/:curveId/shares/:account     — An account's position
 * GET  /api/v1/terms/:termId/vaults/:curveId/preview-deposit     — ?assets=
 * GET  /api/v1/terms/:termId/vaults/:curveId/preview-redeem      — ?shares=
 */

import { Hono } from "hono";
import { MultiVaultError } from "@termvault/multivault";
import type { CurveId, TermId } from "@termvault/types";
import type { AppEnv } from "../types/api-contract.js";
import type { MultiVaultService } from "../services/multivault-service.js";
import {
  AddressSchema,
  AssetsQuerySchema,
  DepositBatchSchema,
  DepositSchema,
  RedeemBatchSchema,
  RedeemSchema,
  SharesQuerySchema,
  VaultParamSchema,
} from "../types/dto.js";
import { amounts, depositPreviewView, redeemPreviewView, vaultView } from "../types/views.js";
import { readBody, readParams, readQuery } from "../middleware/validate.js";

const PositionParamSchema = VaultParamSchema.extend({ account: AddressSchema });

/** Views of an unknown term or curve answer 404 rather than an empty vault. */
function requireVault(service: MultiVaultService, termId: TermId, curveId: CurveId): void {
  service.vault.getVaultType(termId);
  if (!service.curves.isCurveIdValid(curveId)) {
    throw new MultiVaultError("INVALID_CURVE_ID", `Curve ${String(curveId)} is not registered`);
  }
}

export function createVaultRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Deposits & Redemptions ────────────────────────────────────────

  routes.post("/deposits", async (c) => {
    const { vault } = c.get("service");
    const body = await readBody(c, DepositSchema);
    const shares = vault.deposit(c.get("account"), body);
    return c.json({ data: { shares: shares.toString() } }, 201);
  });

  routes.post("/deposits/batch", async (c) => {
    const { vault } = c.get("service");
    const body = await readBody(c, DepositBatchSchema);
    const shares = vault.depositBatch(c.get("account"), body);
    return c.json({ data: { shares: amounts(shares) } }, 201);
  });

  routes.post("/redemptions", async (c) => {
    const { vault } = c.get("service");
    const body = await readBody(c, RedeemSchema);
    const assets = vault.redeem(c.get("account"), body);
    return c.json({ data: { assets: assets.toString() } }, 201);
  });

  routes.post("/redemptions/batch", async (c) => {
    const { vault } = c.get("service");
    const body = await readBody(c, RedeemBatchSchema);
    const assets = vault.redeemBatch(c.get("account"), body);
    return c.json({ data: { assets: amounts(assets) } }, 201);
  });

  // ─── Views ─────────────────────────────────────────────────────────

  routes.get("/curves", (c) => {
    const { curves, vault } = c.get("service");
    const defaultCurveId = vault.getConfig().bondingCurve.defaultCurveId;
    const data = curves.list().map(({ id, name }) => ({
      curveId: id,
      name,
      maxAssets: curves.getCurveMaxAssets(id).toString(),
      isDefault: id === defaultCurveId,
    }));
    return c.json({ data });
  });

  routes.get("/terms/:termId/vaults/:curveId", (c) => {
    const service = c.get("service");
    const { vault } = service;
    const { termId, curveId } = readParams(c, VaultParamSchema);
    requireVault(service, termId, curveId);
    const state = vault.getVault(termId, curveId);
    return c.json({ data: vaultView(state, vault.currentSharePrice(termId, curveId)) });
  });

  routes.get("/terms/:termId/vaults/:curveId/shares/:account", (c) => {
    const service = c.get("service");
    const { vault } = service;
    const { termId, curveId, account } = readParams(c, PositionParamSchema);
    requireVault(service, termId, curveId);
    const shares = vault.getShares(account, termId, curveId);
    return c.json({
      data: {
        account,
        termId,
        curveId,
        shares: shares.toString(),
        maxRedeem: vault.maxRedeem(account, termId, curveId).toString(),
        assets: vault.convertToAssets(termId, curveId, shares).toString(),
      },
    });
  });

  routes.get("/terms/:termId/vaults/:curveId/preview-deposit", (c) => {
    const { vault } = c.get("service");
    const { termId, curveId } = readParams(c, VaultParamSchema);
    const { assets } = readQuery(c, AssetsQuerySchema);
    return c.json({ data: depositPreviewView(vault.previewDeposit(termId, curveId, assets)) });
  });

  routes.get("/terms/:termId/vaults/:curveId/preview-redeem", (c) => {
    const { vault } = c.get("service");
    const { termId, curveId } = readParams(c, VaultParamSchema);
    const { shares } = readQuery(c, SharesQuerySchema);
    return c.json({ data: redeemPreviewView(vault.previewRedeem(termId, curveId, shares)) });
  });

  return routes;
}
