/**
 * @termvault/multivault — Configuration snapshot.
 *
 * The engine works from a versioned, validated snapshot of its
 * parameters. A snapshot is replaced only through `syncConfig`, and
 * only by a strictly newer version.
 *
 * Amounts may be written as decimal strings, safe integers or bigints
 * and are coerced to bigint. Rates are integers over `feeDenominator`.
 */

import { z } from "zod";
import { isAddress } from "@termvault/types";
import type { Address } from "@termvault/types";
import { MultiVaultError } from "./types.js";

// =============================================================================
// Field Schemas
// =============================================================================

const amount = z
  .union([
    z.string().regex(/^\d+$/, "Expected a non-negative integer string"),
    z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
    z.bigint().nonnegative(),
  ])
  .transform((v) => BigInt(v));

const address = z.custom<Address>((v) => isAddress(v), {
  message: "Expected a 20-byte 0x-prefixed hex address",
});

// =============================================================================
// Schema
// =============================================================================

export const GeneralConfigSchema = z.object({
  admin: address,
  protocolMultisig: address,
  feeDenominator: amount.default(10_000),
  minDeposit: amount,
  minShare: amount,
  atomDataMaxLength: z.number().int().positive(),
  protocolFeeDistributionEnabled: z.boolean().default(false),
});

export const AtomConfigSchema = z.object({
  atomCreationProtocolFee: amount,
  atomWalletDepositFee: amount,
});

export const TripleConfigSchema = z.object({
  tripleCreationProtocolFee: amount,
  totalAtomDepositsOnTripleCreation: amount,
  atomDepositFractionForTriple: amount,
});

export const VaultFeesSchema = z.object({
  entryFee: amount,
  exitFee: amount,
  protocolFee: amount,
});

export const BondingCurveConfigSchema = z.object({
  defaultCurveId: z.number().int().positive(),
});

export const MultiVaultConfigSchema = z
  .object({
    version: z.number().int().nonnegative(),
    general: GeneralConfigSchema,
    atom: AtomConfigSchema,
    triple: TripleConfigSchema,
    vaultFees: VaultFeesSchema,
    bondingCurve: BondingCurveConfigSchema,
  })
  .superRefine((config, ctx) => {
    const { feeDenominator, minShare } = config.general;
    if (feeDenominator === 0n) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["general", "feeDenominator"],
        message: "feeDenominator must be positive",
      });
    }
    if (minShare === 0n) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["general", "minShare"],
        message: "minShare must be positive",
      });
    }

    const rates: ReadonlyArray<readonly [readonly string[], bigint]> = [
      [["atom", "atomWalletDepositFee"], config.atom.atomWalletDepositFee],
      [["triple", "atomDepositFractionForTriple"], config.triple.atomDepositFractionForTriple],
      [["vaultFees", "entryFee"], config.vaultFees.entryFee],
      [["vaultFees", "exitFee"], config.vaultFees.exitFee],
      [["vaultFees", "protocolFee"], config.vaultFees.protocolFee],
    ];
    for (const [path, rate] of rates) {
      if (rate > feeDenominator) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...path],
          message: `Rate ${rate.toString()} exceeds feeDenominator ${feeDenominator.toString()}`,
        });
      }
    }
  });

export type MultiVaultConfig = z.output<typeof MultiVaultConfigSchema>;
export type MultiVaultConfigInput = z.input<typeof MultiVaultConfigSchema>;

// =============================================================================
// Parsing
// =============================================================================

/**
 * Validate a raw snapshot.
 *
 * @throws MultiVaultError INVALID_CONFIG listing every failing path
 */
export function parseMultiVaultConfig(input: unknown): MultiVaultConfig {
  const result = MultiVaultConfigSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new MultiVaultError("INVALID_CONFIG", `Invalid multivault config: ${details}`);
  }
  return result.data;
}

/** Static cost of creating an atom: protocol fee plus one vault's ghost shares. */
export function atomCost(config: MultiVaultConfig): bigint {
  return config.atom.atomCreationProtocolFee + config.general.minShare;
}

/**
 * Static cost of creating a triple: protocol fee, the deposit spread
 * over its atoms, and ghost shares for the triple and counter vaults.
 */
export function tripleCost(config: MultiVaultConfig): bigint {
  return (
    config.triple.tripleCreationProtocolFee +
    config.triple.totalAtomDepositsOnTripleCreation +
    2n * config.general.minShare
  );
}
