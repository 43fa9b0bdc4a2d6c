/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (service running and event log hash chain intact)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { MultiVaultService } from "../services/multivault-service.js";

export function createHealthRoutes(service: MultiVaultService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = service.checkIntegrity();
    const ready = service.isReady();
    const body = {
      status: ready ? "ready" : "not_ready",
      eventStore: integrity.valid
        ? { status: "ok" }
        : { status: "down", detail: `chainValid=false, errors=${String(integrity.errors.length)}` },
      events: service.eventStore.globalPosition(),
      timestamp: new Date().toISOString(),
    };
    return ready ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
