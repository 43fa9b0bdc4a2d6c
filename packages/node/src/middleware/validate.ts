/**
 * Zod validation helpers.
 *
 * Route handlers parse their body, path and query through these, so the
 * parsed value keeps its schema's output type. Failures throw a
 * RequestValidationError, which the error handler answers with 400.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { RequestValidationError } from "../types/error.js";
import type { ValidationIssue } from "../types/error.js";

function formatZodErrors(error: ZodError): readonly ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

function parseWith<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  input: unknown,
  what: string,
): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new RequestValidationError(`${what} validation failed`, formatZodErrors(result.error));
  }
  return result.data;
}

/**
 * Parse the JSON request body against a Zod schema.
 */
export async function readBody<T>(
  c: Context<AppEnv>,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new RequestValidationError("Invalid JSON in request body");
  }
  return parseWith(schema, body, "Request body");
}

export function readParams<T>(
  c: Context<AppEnv>,
  schema: ZodType<T, ZodTypeDef, unknown>,
): T {
  return parseWith(schema, c.req.param(), "Path parameter");
}

export function readQuery<T>(
  c: Context<AppEnv>,
  schema: ZodType<T, ZodTypeDef, unknown>,
): T {
  return parseWith(schema, c.req.query(), "Query parameter");
}
