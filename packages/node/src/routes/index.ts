/**
 * Routes barrel.
 */

export { createHealthRoutes } from "./health.js";
export { createConfigRoutes } from "./configs.js";
export { createDistributionRoutes } from "./distribution.js";
export { createReportRoutes } from "./reports.js";
export { createAuditRoutes } from "./audit.js";
