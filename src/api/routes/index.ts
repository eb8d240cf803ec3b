/**
 * Route exports
 */

export { healthRoutes, API_VERSION, type HealthRouteOptions } from './health.js';
export { sessionRoutes, type SessionRouteOptions } from './session.js';
