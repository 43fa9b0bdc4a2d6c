/**
 * Calling-account middleware.
 *
 * Every write acts as the account named by the X-Account header. There
 * is no signature check: the node trusts whoever sits in front of it,
 * the way a local wallet RPC does. Reads need no account.
 */

import type { MiddlewareHandler } from "hono";
import { canonicalAddress, isAddress } from "@termvault/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const ACCOUNT_HEADER = "X-Account";

const READ_METHODS = new Set(["GET", "HEAD", "OPTIONS"]);

export function accountMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (READ_METHODS.has(c.req.method)) {
      return next();
    }

    const account = c.req.header(ACCOUNT_HEADER);
    if (!isAddress(account)) {
      return c.json(
        createErrorEnvelope(
          "UNAUTHORIZED",
          `Missing or invalid ${ACCOUNT_HEADER} header: expected a 20-byte 0x-prefixed address`,
        ),
        401,
      );
    }

    c.set("account", canonicalAddress(account));
    return next();
  };
}
