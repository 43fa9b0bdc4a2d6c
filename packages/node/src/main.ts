/**
 * @termvault/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { fileURLToPath } from "node:url";
import { serve } from "@hono/node-server";
import { pino } from "pino";
import { loadConfig, loadMultiVaultConfig } from "./config.js";
import { createApp } from "./app.js";

// =============================================================================
// Re-exports (package public API)
// =============================================================================

export { MultiVaultService } from "./services/multivault-service.js";
export type {
  MultiVaultServiceConfig,
  CommittedEventLogEntry,
} from "./services/multivault-service.js";
export {
  loadConfig,
  loadMultiVaultConfig,
  ConfigSchema,
  DEFAULT_MULTIVAULT_CONFIG_URL,
} from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const multivault = loadMultiVaultConfig(config.MULTIVAULT_CONFIG_PATH);
  logger.info(
    { version: multivault.version, defaultCurveId: multivault.bondingCurve.defaultCurveId },
    "Multivault config loaded",
  );

  const { app, service } = createApp({
    serviceConfig: {
      multivault,
      epochLengthSeconds: config.EPOCH_LENGTH_SECONDS,
      epochStartTimestamp: config.EPOCH_START_TIMESTAMP,
      sinkAddress: config.BONDING_SINK_ADDRESS,
      atomWallets: {
        factory: config.ATOM_WALLET_FACTORY_ADDRESS,
        initCodeHash: config.ATOM_WALLET_INIT_CODE_HASH,
        defaultOwner: config.ATOM_WALLET_OWNER,
      },
      onEvent: (entry) => {
        logger.info(entry, entry.type);
      },
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${String(entry.status)}`);
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, epoch: service.clock.currentEpoch() },
    "termvault node started",
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    service.stop();
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

// Only run when executed directly (not when imported)
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((err: unknown) => {
    // eslint-disable-next-line no-console
    console.error("Fatal startup error:", err);
    process.exit(1);
  });
}
