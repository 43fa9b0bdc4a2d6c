/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. main.ts serves it;
 * tests call it in process.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { MultiVaultService } from "./services/multivault-service.js";
import type { MultiVaultServiceConfig } from "./services/multivault-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { accountMiddleware } from "./middleware/account.js";
import { createHealthRoutes } from "./routes/health.js";
import { createTermRoutes } from "./routes/terms.js";
import { createVaultRoutes } from "./routes/vaults.js";
import { createAccountRoutes } from "./routes/accounts.js";
import { createEpochRoutes } from "./routes/epochs.js";
import { createAdminRoutes } from "./routes/admin.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: MultiVaultServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: MultiVaultService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new MultiVaultService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });
  app.use("/api/*", accountMiddleware());

  app.route("/api/v1", createTermRoutes());
  app.route("/api/v1", createVaultRoutes());
  app.route("/api/v1", createAccountRoutes());
  app.route("/api/v1", createEpochRoutes());
  app.route("/api/v1", createAdminRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
