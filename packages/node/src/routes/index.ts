/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createTermRoutes } from "./terms.js";
export { createVaultRoutes } from "./vaults.js";
export { createAccountRoutes } from "./accounts.js";
export { createEpochRoutes } from "./epochs.js";
export { createAdminRoutes } from "./admin.js";
export { createEventRoutes } from "./events.js";
