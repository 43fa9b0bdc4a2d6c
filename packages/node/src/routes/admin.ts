/**
 * Administration routes.
 *
 * GET  /api/v1/config          — Current multivault parameter snapshot
 * GET  /api/v1/status          — Pause flag and engine-wide totals
 * PUT  /api/v1/admin/config    — Sync a newer snapshot (admin only)
 * POST /api/v1/admin/pause     — Pause or unpause (admin only)
 * POST /api/v1/admin/mint      — Issue base assets (admin only)
 *
 * The engine checks the admin itself; these routes only pass the caller on.
 */

import { Hono } from "hono";
import { z } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { MintSchema, PauseSchema } from "../types/dto.js";
import { configView } from "../types/views.js";
import { readBody } from "../middleware/validate.js";

export function createAdminRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/config", (c) => {
    const { vault } = c.get("service");
    return c.json({ data: configView(vault.getConfig()) });
  });

  routes.get("/status", (c) => {
    const { vault } = c.get("service");
    return c.json({
      data: {
        paused: vault.isPaused(),
        totalTermsCreated: vault.totalTermsCreated(),
        heldAssets: vault.heldAssets().toString(),
      },
    });
  });

  // The engine validates the snapshot and answers INVALID_CONFIG
  routes.put("/admin/config", async (c) => {
    const { vault } = c.get("service");
    const snapshot = await readBody(c, z.unknown());
    const next = vault.syncConfig(c.get("account"), snapshot);
    return c.json({ data: configView(next) });
  });

  routes.post("/admin/pause", async (c) => {
    const { vault } = c.get("service");
    const { paused } = await readBody(c, PauseSchema);
    vault.setPaused(c.get("account"), paused);
    return c.json({ data: { paused: vault.isPaused() } });
  });

  routes.post("/admin/mint", async (c) => {
    const { vault } = c.get("service");
    const { to, amount } = await readBody(c, MintSchema);
    vault.mintAssets(c.get("account"), to, amount);
    return c.json({ data: { to, balance: vault.assetBalanceOf(to).toString() } }, 201);
  });

  return routes;
}
