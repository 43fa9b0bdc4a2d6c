/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps domain errors (MultiVaultError, CurveError, PeripheryError,
 * EventStoreError) to HTTP status codes by their code.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { CurveError } from "@termvault/curves";
import { EventStoreError } from "@termvault/event-store";
import { MultiVaultError } from "@termvault/multivault";
import { PeripheryError } from "@termvault/periphery";
import { createErrorEnvelope, RequestValidationError } from "../types/error.js";
import type { AppEnv } from "../types/api-contract.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Existence
  ATOM_EXISTS: 409,
  TRIPLE_EXISTS: 409,
  ATOM_DOES_NOT_EXIST: 404,
  TERM_DOES_NOT_EXIST: 404,
  INVALID_CURVE_ID: 404,
  CURVE_NOT_FOUND: 404,

  // Policy
  UNAUTHORIZED: 403,
  SENDER_NOT_APPROVED: 403,
  CANNOT_APPROVE_SELF: 403,
  PAUSED: 403,
  HAS_COUNTER_STAKE: 403,

  // Economics
  DEPOSIT_BELOW_MINIMUM: 422,
  INSUFFICIENT_CREATION_ASSETS: 422,
  DEPOSIT_TOO_SMALL_FOR_GHOST_SHARES: 422,
  ZERO_SHARES: 422,
  ZERO_ASSETS: 422,
  SLIPPAGE_EXCEEDED: 422,
  INSUFFICIENT_BALANCE: 422,
  INSUFFICIENT_REMAINING_SHARES: 422,
  INSUFFICIENT_ASSETS: 422,
  CURVE_MAX_ASSETS_EXCEEDED: 422,
  MAX_ASSETS_EXCEEDED: 422,
  MAX_SHARES_EXCEEDED: 422,
  NOTHING_TO_CLAIM: 422,

  // Structure
  ATOM_DATA_TOO_LONG: 400,
  ARRAYS_LENGTH_MISMATCH: 400,
  EMPTY_ARRAY: 400,
  INVALID_CONFIG: 400,
  NEGATIVE_AMOUNT: 400,
  STALE_CONFIG: 409,

  // Concurrency
  REENTRANT_CALL: 409,
  CONCURRENCY_CONFLICT: 409,
  MAX_CLAIMABLE_ALREADY_SET: 409,
  EPOCH_NOT_ENDED: 409,
};

function domainCode(err: Error): string | undefined {
  if (
    err instanceof MultiVaultError ||
    err instanceof CurveError ||
    err instanceof PeripheryError ||
    err instanceof EventStoreError
  ) {
    return err.code;
  }
  return undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context<AppEnv>): Response {
  if (err instanceof RequestValidationError) {
    return c.json(
      createErrorEnvelope(err.code, err.message, { issues: err.issues }),
      400,
    );
  }

  const code = domainCode(err);
  const status = code === undefined ? 500 : (STATUS_MAP[code] ?? 500);

  // Internal details stay in the logs
  const message = status === 500 ? "Internal server error" : err.message;

  return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", message), status);
}
