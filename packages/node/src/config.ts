/**
 * @termvault/node — Configuration.
 *
 * Process settings come from environment variables, validated with Zod.
 * The multivault parameter snapshot comes from a JSON file
 * (MULTIVAULT_CONFIG_PATH, or the bundled config/multivault.json).
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { isAddress } from "@termvault/types";
import type { Address, Hex } from "@termvault/types";
import { parseMultiVaultConfig } from "@termvault/multivault";
import type { MultiVaultConfig } from "@termvault/multivault";

// =============================================================================
// Schema
// =============================================================================

const address = z.custom<Address>((v) => isAddress(v), {
  message: "Expected a 20-byte 0x-prefixed hex address",
});

const bytes32 = z.custom<Hex>(
  (v) => typeof v === "string" && /^0x[0-9a-fA-F]{64}$/.test(v),
  { message: "Expected a 32-byte 0x-prefixed hex string" },
);

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Epochs
  EPOCH_LENGTH_SECONDS: z.coerce.number().int().min(1).default(86400),
  EPOCH_START_TIMESTAMP: z.coerce.number().int().min(0).default(0),

  // Multivault parameters
  MULTIVAULT_CONFIG_PATH: z.string().min(1).optional(),

  // Collaborators
  BONDING_SINK_ADDRESS: address.default("0x000000000000000000000000000000000000b0d5"),
  ATOM_WALLET_FACTORY_ADDRESS: address.default("0x000000000000000000000000000000000000fac7"),
  ATOM_WALLET_INIT_CODE_HASH: bytes32.default(
    "0x0000000000000000000000000000000000000000000000000000000000000001",
  ),
  ATOM_WALLET_OWNER: address.default("0x0000000000000000000000000000000000000a11"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loaders
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var is invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

export const DEFAULT_MULTIVAULT_CONFIG_URL = new URL(
  "../config/multivault.json",
  import.meta.url,
);

/**
 * Read and validate a multivault snapshot from a JSON file.
 *
 * @throws MultiVaultError INVALID_CONFIG if the snapshot fails validation
 */
export function loadMultiVaultConfig(
  path: string | URL = DEFAULT_MULTIVAULT_CONFIG_URL,
): MultiVaultConfig {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return parseMultiVaultConfig(raw);
}
