/**
 * Route barrel.
 */

export { createHealthRoutes } from "./health.js";
export { createAllocationRoutes } from "./allocations.js";
export { createAirdropRoutes } from "./airdrops.js";
export { createManagerRoutes } from "./managers.js";
export { createScheduleRoutes } from "./schedules.js";
export { createStatsRoutes } from "./stats.js";
export { createReportRoutes } from "./reports.js";
export { createEventRoutes } from "./events.js";
export { createAdminRoutes } from "./admin.js";
export { createTokenRoutes } from "./token.js";
