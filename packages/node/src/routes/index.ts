/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createShareRoutes } from "./shares.js";
export { createPreferenceRoutes } from "./preferences.js";
export { createCustodyRoutes } from "./custody.js";
export { createDistributionRoutes } from "./distributions.js";
export { createAdminRoutes } from "./admin.js";
export { createEventRoutes } from "./events.js";
