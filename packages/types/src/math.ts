/**
 * Rounding-explicit bigint arithmetic shared by the curves and the fee
 * engine.
 */

/** floor(a * b / d) */
export function mulDiv(a: bigint, b: bigint, d: bigint): bigint {
  return (a * b) / d;
}

/** ceil(a * b / d) for non-negative operands */
export function mulDivUp(a: bigint, b: bigint, d: bigint): bigint {
  const product = a * b;
  return product === 0n ? 0n : (product - 1n) / d + 1n;
}
