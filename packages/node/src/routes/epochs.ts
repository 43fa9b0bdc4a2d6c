/**
 * Epoch routes.
 *
 * GET /api/v1/epochs/current  — Wall-clock epoch and the last epoch an action seeded
 * GET /api/v1/epochs/:epoch   — Utilization and protocol fees of one epoch
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { EpochParamSchema } from "../types/dto.js";
import { readParams } from "../middleware/validate.js";

export function createEpochRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/epochs/current", (c) => {
    const { clock, vault } = c.get("service");
    const epoch = clock.currentEpoch();
    return c.json({
      data: {
        epoch,
        endsAt: clock.epochTimestampEnd(epoch),
        lastSeededEpoch: vault.lastSeededEpoch() ?? null,
      },
    });
  });

  routes.get("/epochs/:epoch", (c) => {
    const { sink, vault } = c.get("service");
    const { epoch } = readParams(c, EpochParamSchema);
    return c.json({
      data: {
        epoch,
        totalUtilization: vault.getTotalUtilizationForEpoch(epoch).toString(),
        accumulatedProtocolFees: vault.accumulatedProtocolFees(epoch).toString(),
        distributionEnabled: vault.isProtocolFeeDistributionEnabledAtEpoch(epoch),
        maxClaimableProtocolFees: sink.maxClaimableProtocolFeesForEpoch(epoch).toString(),
      },
    });
  });

  return routes;
}
