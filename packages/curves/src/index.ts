/**
 * @termvault/curves — Bonding curve registry.
 *
 * Provides:
 * - CurveRegistry, the CurveProvider the multivault prices through
 * - LinearCurve, the pro-rata curve used as the default signal curve
 *
 * @packageDocumentation
 */

export { CurveRegistry } from "./registry.js";
export { LinearCurve } from "./linear-curve.js";
export type { LinearCurveOptions } from "./linear-curve.js";
export { CurveError, ONE_SHARE, MAX_UINT256 } from "./types.js";
export type { BondingCurve, CurveErrorCode } from "./types.js";
