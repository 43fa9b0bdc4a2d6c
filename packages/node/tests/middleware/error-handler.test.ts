/**
 * Tests for error handler middleware.
 *
 * Verifies domain errors are mapped to correct HTTP status codes
 * and the error envelope format.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { CurveError } from "@termvault/curves";
import { EventStoreError } from "@termvault/event-store";
import { MultiVaultError } from "@termvault/multivault";
import { PeripheryError } from "@termvault/periphery";
import { handleError } from "../../src/middleware/error-handler.js";
import type { AppEnv } from "../../src/types/api-contract.js";
import { RequestValidationError } from "../../src/types/error.js";
import { ALICE, actAs, createTestApp } from "../setup.js";

/** A bare app whose only route throws `err`. */
function throwing(err: Error): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  app.onError(handleError);
  app.get("/boom", () => {
    throw err;
  });
  return app;
}

describe("handleError", () => {
  it.each([
    [new MultiVaultError("ATOM_EXISTS", "exists"), 409],
    [new MultiVaultError("TERM_DOES_NOT_EXIST", "missing"), 404],
    [new MultiVaultError("SENDER_NOT_APPROVED", "not approved"), 403],
    [new MultiVaultError("SLIPPAGE_EXCEEDED", "slipped"), 422],
    [new MultiVaultError("EMPTY_ARRAY", "empty"), 400],
    [new CurveError("CURVE_NOT_FOUND", "no curve"), 404],
    [new CurveError("MAX_SHARES_EXCEEDED", "too many"), 422],
    [new PeripheryError("EPOCH_NOT_ENDED", "too early"), 409],
    [new EventStoreError("CONCURRENCY_CONFLICT", "conflict", "multivault"), 409],
  ])("maps %s to %i", async (err, status) => {
    const res = await throwing(err).request("/boom");

    expect(res.status).toBe(status);
    expect(await res.json()).toEqual({ error: { code: err.code, message: err.message } });
  });

  it("answers validation errors with their issues", async () => {
    const err = new RequestValidationError("Request body validation failed", [
      { path: "assets", message: "Required" },
    ]);
    const res = await throwing(err).request("/boom");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: "VALIDATION_ERROR",
        message: "Request body validation failed",
        details: { issues: [{ path: "assets", message: "Required" }] },
      },
    });
  });

  it("hides the message of an unexpected error", async () => {
    const res = await throwing(new Error("connection string leaked")).request("/boom");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });
  });

  it("answers 400 for a body that is not JSON", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/atoms", {
      method: "POST",
      headers: { "Content-Type": "application/json", "X-Account": ALICE },
      body: "{not json",
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: "VALIDATION_ERROR",
        message: "Invalid JSON in request body",
        details: { issues: [] },
      },
    });
  });

  it("reports every failing field", async () => {
    const { app } = createTestApp();
    const res = await app.request(actAs(ALICE, "/api/v1/atoms", {}));

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: {
        details: {
          issues: [
            { path: "data", message: "Expected 0x-prefixed hex bytes" },
            { path: "assets", message: "Required" },
          ],
        },
      },
    });
  });
});
