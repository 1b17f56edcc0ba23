/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createVaultRoutes } from "./vaults.js";
export { createEventRoutes } from "./events.js";
