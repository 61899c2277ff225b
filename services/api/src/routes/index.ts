/**
 * Routes barrel file.
 * All route modules are exported here for registration in the main server.
 */
export { healthRoutes } from './health.js';
export { entryRoutes } from './entries.js';
export { adminRoutes } from './admin.js';
