/**
 * @termvault/multivault — Deterministic fee arithmetic.
 *
 * Rules:
 * - bigint only, no floating point
 * - Fees round up, so rounding always favors the vault
 */

import { mulDivUp } from "@termvault/types";

/**
 * Fee charged on `amount` at `rate` out of `denominator`, rounded up.
 *
 *   feeOnRaw(1000, 150, 10000) → 15
 *   feeOnRaw(1, 1, 10000)      → 1
 */
export function feeOnRaw(amount: bigint, rate: bigint, denominator: bigint): bigint {
  return mulDivUp(amount, rate, denominator);
}

export function sum(values: readonly bigint[]): bigint {
  return values.reduce((acc, v) => acc + v, 0n);
}
