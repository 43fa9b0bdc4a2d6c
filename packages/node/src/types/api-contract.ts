/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { Address } from "@termvault/types";
import type { MultiVaultService } from "../services/multivault-service.js";

/**
 * Hono environment type for the termvault app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The engine service (set by the service middleware) */
    service: MultiVaultService;

    /** Calling account from X-Account (set on writes by the account middleware) */
    account: Address;
  };
}
